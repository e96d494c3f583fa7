import { describe, it, expect } from 'vitest'
import { probeHost } from '../liveness.js'
import { fakeConnector } from './fakes.js'

describe('probeHost', () => {
  it('is up on the first open port and cancels the other attempts', async () => {
    const fake = fakeConnector({ 443: { outcome: 'open', after: 5 } })
    const started = Date.now()

    const up = await probeHost('10.0.0.2', 5000, { ports: [80, 443, 22], connect: fake.connect })

    expect(up).toBe(true)
    expect(Date.now() - started).toBeLessThan(1000)
    expect(fake.calls).toEqual([80, 443, 22])
    expect(fake.cancelled.sort((a, b) => a - b)).toEqual([22, 80])
  })

  it('counts a refused connection as up', async () => {
    const fake = fakeConnector({ 22: { outcome: 'refused', after: 1 } })
    expect(await probeHost('10.0.0.2', 50, { ports: [80, 22], connect: fake.connect })).toBe(true)
  })

  it('is down when every attempt times out or is unreachable', async () => {
    const fake = fakeConnector({ 80: { outcome: 'unreachable', after: 1 } })
    expect(await probeHost('10.0.0.3', 20, { ports: [80, 443], connect: fake.connect })).toBe(false)
  })

  it('is down without connecting when the run is already aborted', async () => {
    const fake = fakeConnector({ 80: { outcome: 'open', after: 1 } })
    expect(await probeHost('10.0.0.2', 20, { ports: [80], connect: fake.connect, signal: AbortSignal.abort() })).toBe(false)
    expect(fake.calls).toEqual([])
  })

  it('gives up promptly when the run is aborted mid-probe', async () => {
    const fake = fakeConnector({})
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 20)
    const started = Date.now()

    const up = await probeHost('10.0.0.4', 5000, { ports: [80, 443], connect: fake.connect, signal: controller.signal })

    expect(up).toBe(false)
    expect(Date.now() - started).toBeLessThan(1000)
  })

  it('sees a real host with nothing listening on the probe ports as up (RST)', async () => {
    // 127.0.0.1 answers closed ports with RST
    expect(await probeHost('127.0.0.1', 2000, { ports: [9, 7] })).toBe(true)
  })
})
