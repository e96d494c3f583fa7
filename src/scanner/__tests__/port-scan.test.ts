import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import * as net from 'net'
import { portScan } from '../port-scan.js'
import { fakeConnector } from './fakes.js'

describe('portScan', () => {
  it('returns open ports ascending regardless of completion order', async () => {
    const fake = fakeConnector({
      8080: { outcome: 'open', after: 1 },
      22: { outcome: 'open', after: 30 },
      443: { outcome: 'open', after: 10 },
      80: { outcome: 'refused', after: 1 },
    })

    const open = await portScan('10.0.0.2', [8080, 443, 80, 22], 100, 4, { connect: fake.connect })

    expect(open).toEqual([22, 443, 8080])
  })

  it('treats timeouts, refusals and unreachable ports as not open', async () => {
    const fake = fakeConnector({
      1: { outcome: 'timeout', after: 1 },
      2: { outcome: 'refused', after: 1 },
      3: { outcome: 'unreachable', after: 1 },
      4: { outcome: 'open', after: 1 },
    })
    expect(await portScan('10.0.0.2', [1, 2, 3, 4], 50, 2, { connect: fake.connect })).toEqual([4])
  })

  it('tries each port exactly once', async () => {
    const fake = fakeConnector({})
    await portScan('10.0.0.2', [5, 6, 5, 7, 6], 5, 3, { connect: fake.connect })
    expect([...fake.calls].sort((a, b) => a - b)).toEqual([5, 6, 7])
  })

  it('returns an empty set for a silent host within timeout × ceil(ports / concurrency)', async () => {
    const fake = fakeConnector({})
    const ports = Array.from({ length: 20 }, (_, i) => 1000 + i)
    const started = Date.now()

    const open = await portScan('10.0.0.9', ports, 40, 5, { connect: fake.connect })
    const elapsed = Date.now() - started

    expect(open).toEqual([])
    // 4 waves of 40ms
    expect(elapsed).toBeGreaterThanOrEqual(150)
    expect(elapsed).toBeLessThan(1000)
  })

  it('stops issuing connects once the run is aborted', async () => {
    const fake = fakeConnector({})
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 30)
    const ports = Array.from({ length: 100 }, (_, i) => i + 1)
    const started = Date.now()

    const open = await portScan('10.0.0.9', ports, 5000, 10, { connect: fake.connect, signal: controller.signal })

    expect(open).toEqual([])
    expect(fake.calls).toHaveLength(10)
    expect(Date.now() - started).toBeLessThan(1000)
  })

  describe('against a local listener', () => {
    let server: net.Server
    let port: number

    beforeAll(async () => {
      server = net.createServer(socket => socket.destroy())
      await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()))
      const address = server.address()
      if (address === null || typeof address === 'string') throw new Error('no TCP address')
      port = address.port
    })

    afterAll(async () => {
      await new Promise<void>(resolve => server.close(() => resolve()))
    })

    it('finds the listening port among closed neighbours', async () => {
      const candidates = [port]
      for (let p = port + 1; p <= Math.min(port + 5, 65535); p++) candidates.push(p)

      const open = await portScan('127.0.0.1', candidates, 2000, 3)

      expect(open).toContain(port)
    })
  })
})
