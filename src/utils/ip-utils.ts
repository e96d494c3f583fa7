const OCTET = /^\d{1,3}$/

/**
 * Parse a dotted-quad IPv4 address to an unsigned 32-bit number.
 * Returns null for anything that is not four decimal octets in 0-255.
 */
export function parseIpv4(ip: string): number | null {
  const parts = ip.trim().split('.')
  if (parts.length !== 4) return null

  let num = 0
  for (const part of parts) {
    if (!OCTET.test(part)) return null
    const octet = parseInt(part, 10)
    if (octet > 255) return null
    num = num * 256 + octet
  }
  return num
}

/**
 * Convert number to IP address string
 */
export function numToIp(num: number): string {
  return [
    (num >>> 24) & 255,
    (num >>> 16) & 255,
    (num >>> 8) & 255,
    num & 255,
  ].join('.')
}

export interface HostRange {
  /** First address to probe, as an unsigned number */
  first: number
  /** Last address to probe (inclusive) */
  last: number
}

/**
 * Usable host range of a CIDR block. Network and broadcast addresses are
 * skipped unless the block is a /31 or /32, where every address is literal.
 */
export function cidrHostRange(ipNum: number, prefix: number): HostRange {
  // 2 ** n instead of shifts: a /0 mask does not fit a 32-bit shift
  const size = 2 ** (32 - prefix)
  const networkAddr = Math.floor(ipNum / size) * size
  const broadcastAddr = networkAddr + size - 1

  if (prefix >= 31) {
    return { first: networkAddr, last: broadcastAddr }
  }
  return { first: networkAddr + 1, last: broadcastAddr - 1 }
}

/**
 * Normalize MAC address to AA:BB:CC:DD:EE:FF format
 */
export function normalizeMac(mac: string): string {
  // Remove all separators and convert to uppercase
  const cleaned = mac.replace(/[:.-]/g, '').toUpperCase()
  if (cleaned.length !== 12 || !/^[0-9A-F]{12}$/.test(cleaned)) {
    return mac // Return original if invalid
  }
  return cleaned.match(/.{2}/g)?.join(':') || mac
}

/**
 * Some arp implementations (macOS) drop leading zeros: 0:1b:2c:3:4:5
 */
export function padMac(mac: string): string {
  if (!mac.includes(':')) return mac
  return mac.split(':').map(part => part.padStart(2, '0')).join(':')
}
