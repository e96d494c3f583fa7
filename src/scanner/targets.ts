import { ConfigurationError } from '../errors.js'
import { cidrHostRange, numToIp, parseIpv4 } from '../utils/ip-utils.js'

export type AddressSpecKind = 'host' | 'range' | 'cidr'

export type AddressSpec =
  | { kind: 'host'; address: number }
  | { kind: 'range'; start: number; end: number }
  | { kind: 'cidr'; address: number; prefix: number }

const PREFIX = /^\d{1,2}$/
const LAST_OCTET = /^\d{1,3}$/

function parseHost(input: string): AddressSpec {
  const address = parseIpv4(input)
  if (address === null) {
    throw new ConfigurationError('InvalidAddress', input, `Invalid IP address: ${input}`)
  }
  return { kind: 'host', address }
}

/**
 * Accepts "192.168.0.1-49" (end is the last octet) and
 * "192.168.0.1-192.168.0.49" (end shares the first three octets)
 */
function parseRange(input: string): AddressSpec {
  const invalid = (reason: string): ConfigurationError =>
    new ConfigurationError('InvalidRange', input, `Invalid range ${input}: ${reason}`)

  const parts = input.split('-')
  if (parts.length !== 2) throw invalid('expected <start>-<end>')

  const [left, right] = parts.map(p => p.trim())
  const start = parseIpv4(left)
  if (start === null) throw invalid(`bad start address "${left}"`)

  let end: number | null
  if (LAST_OCTET.test(right)) {
    const octet = parseInt(right, 10)
    end = octet > 255 ? null : Math.floor(start / 256) * 256 + octet
  } else {
    end = parseIpv4(right)
    if (end !== null && Math.floor(end / 256) !== Math.floor(start / 256)) {
      throw invalid('start and end must differ only in the last octet')
    }
  }
  if (end === null) throw invalid(`bad end "${right}"`)
  if (end < start) throw invalid('end is before start')

  return { kind: 'range', start, end }
}

function parseCidrSpec(input: string): AddressSpec {
  const parts = input.split('/')
  if (parts.length !== 2) {
    throw new ConfigurationError('InvalidCIDR', input, `Invalid CIDR ${input}: expected <address>/<prefix>`)
  }

  const [ip, prefixStr] = parts.map(p => p.trim())
  const prefix = PREFIX.test(prefixStr) ? parseInt(prefixStr, 10) : NaN
  if (isNaN(prefix) || prefix < 0 || prefix > 32) {
    throw new ConfigurationError('InvalidCIDR', input, `Invalid CIDR prefix: ${prefixStr}`)
  }

  const address = parseIpv4(ip)
  if (address === null) {
    throw new ConfigurationError('InvalidCIDR', input, `Invalid IP address in CIDR: ${ip}`)
  }

  return { kind: 'cidr', address, prefix }
}

/**
 * Parse target input of a known kind (chosen by --host, --range or --subnet)
 */
export function parseAddressSpec(kind: AddressSpecKind, input: string): AddressSpec {
  switch (kind) {
    case 'host':
      return parseHost(input)
    case 'range':
      return parseRange(input)
    case 'cidr':
      return parseCidrSpec(input)
  }
}

/**
 * Number of addresses a spec expands to, computed without expanding it
 */
export function countAddresses(spec: AddressSpec): number {
  switch (spec.kind) {
    case 'host':
      return 1
    case 'range':
      return spec.end - spec.start + 1
    case 'cidr': {
      const { first, last } = cidrHostRange(spec.address, spec.prefix)
      return last - first + 1
    }
  }
}

function firstAddress(spec: AddressSpec): number {
  switch (spec.kind) {
    case 'host':
      return spec.address
    case 'range':
      return spec.start
    case 'cidr':
      return cidrHostRange(spec.address, spec.prefix).first
  }
}

/**
 * Expand a parsed spec to the ordered list of addresses to probe.
 * Pure computation; fails with TooManyTargets before allocating when the
 * block is larger than `maxTargets`.
 */
export function expandAddressSpec(spec: AddressSpec, maxTargets = Infinity): string[] {
  const count = countAddresses(spec)
  if (count > maxTargets) {
    throw new ConfigurationError(
      'TooManyTargets',
      describeSpec(spec),
      `${describeSpec(spec)} expands to ${count} addresses (limit ${maxTargets})`
    )
  }

  const first = firstAddress(spec)
  const ips: string[] = []
  for (let i = 0; i < count; i++) {
    ips.push(numToIp(first + i))
  }
  return ips
}

export function expandTargets(kind: AddressSpecKind, input: string, maxTargets = Infinity): string[] {
  return expandAddressSpec(parseAddressSpec(kind, input), maxTargets)
}

export function describeSpec(spec: AddressSpec): string {
  switch (spec.kind) {
    case 'host':
      return numToIp(spec.address)
    case 'range':
      return `${numToIp(spec.start)}-${numToIp(spec.end)}`
    case 'cidr':
      return `${numToIp(spec.address)}/${spec.prefix}`
  }
}
