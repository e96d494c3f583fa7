import { describe, it, expect } from 'vitest'
import { cidrHostRange, normalizeMac, numToIp, padMac, parseIpv4 } from '../ip-utils.js'

describe('parseIpv4', () => {
  it('parses dotted quads to unsigned numbers', () => {
    expect(parseIpv4('0.0.0.0')).toBe(0)
    expect(parseIpv4('10.0.0.1')).toBe(167772161)
    expect(parseIpv4('255.255.255.255')).toBe(4294967295)
  })

  it('rejects malformed addresses', () => {
    for (const bad of ['', '10.0.0', '10.0.0.1.2', '10.0.0.256', '10.0.0.-1', '10.0..1', 'a.b.c.d', '10.0.0.1/24', '0x0a.0.0.1']) {
      expect(parseIpv4(bad)).toBeNull()
    }
  })
})

describe('numToIp', () => {
  it('formats addresses above 2^31 without going negative', () => {
    expect(numToIp(3232235777)).toBe('192.168.1.1')
    expect(numToIp(4294967295)).toBe('255.255.255.255')
  })
})

describe('cidrHostRange', () => {
  const base = 3232235776 // 192.168.1.0

  it('skips network and broadcast below /31', () => {
    expect(cidrHostRange(base, 24)).toEqual({ first: base + 1, last: base + 254 })
    expect(cidrHostRange(base, 30)).toEqual({ first: base + 1, last: base + 2 })
  })

  it('keeps literal addresses for /31 and /32', () => {
    expect(cidrHostRange(base, 31)).toEqual({ first: base, last: base + 1 })
    expect(cidrHostRange(base + 7, 32)).toEqual({ first: base + 7, last: base + 7 })
  })

  it('masks host bits of the given address', () => {
    expect(cidrHostRange(base + 77, 24)).toEqual({ first: base + 1, last: base + 254 })
  })

  it('handles a /0 without 32-bit shift overflow', () => {
    expect(cidrHostRange(base, 0)).toEqual({ first: 1, last: 4294967294 })
  })
})

describe('normalizeMac', () => {
  it('formats as upper-case colon pairs', () => {
    expect(normalizeMac('aa-bb-cc-dd-ee-0f')).toBe('AA:BB:CC:DD:EE:0F')
    expect(normalizeMac('aabb.ccdd.ee0f')).toBe('AA:BB:CC:DD:EE:0F')
  })

  it('returns invalid input unchanged', () => {
    expect(normalizeMac('not-a-mac')).toBe('not-a-mac')
  })

  it('pads short octets before normalizing', () => {
    expect(normalizeMac(padMac('0:1b:2c:3:4:5'))).toBe('00:1B:2C:03:04:05')
  })
})
