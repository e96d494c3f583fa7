import { ConfigurationError } from '../errors.js'

export const MIN_PORT = 1
export const MAX_PORT = 65535

export type PortSpec =
  | { kind: 'range'; start: number; end: number }
  | { kind: 'list'; ports: number[] }

const NUMBER = /^\d+$/

function toPort(token: string): number | null {
  if (!NUMBER.test(token)) return null
  const port = parseInt(token, 10)
  return port >= MIN_PORT && port <= MAX_PORT ? port : null
}

/**
 * Parse "1-1024" or "22,80,443" (a bare "80" is a list of one).
 *
 * A single bad token rejects the whole spec: scanning a subset the user
 * didn't ask for is worse than refusing to start.
 */
export function parsePortSpec(input: string): PortSpec {
  const spec = input.trim()

  if (spec.includes('-') && !spec.includes(',')) {
    const parts = spec.split('-').map(p => p.trim())
    const start = parts.length === 2 ? toPort(parts[0]) : null
    const end = parts.length === 2 ? toPort(parts[1]) : null
    if (start === null || end === null || start > end) {
      throw new ConfigurationError('InvalidPortRange', input, `Invalid port range: ${input}`)
    }
    return { kind: 'range', start, end }
  }

  const ports: number[] = []
  for (const raw of spec.split(',')) {
    const token = raw.trim()
    if (token === '') continue
    const port = toPort(token)
    if (port === null) {
      throw new ConfigurationError('InvalidPortList', input, `Invalid port "${token}" in list: ${input}`)
    }
    ports.push(port)
  }
  if (ports.length === 0) {
    throw new ConfigurationError('InvalidPortList', input, `No ports in list: ${input}`)
  }
  return { kind: 'list', ports }
}

/**
 * Expand a port spec to unique ports; ranges ascend, lists keep the order
 * given (first occurrence wins)
 */
export function expandPortSpec(spec: PortSpec): number[] {
  if (spec.kind === 'range') {
    const ports: number[] = []
    for (let p = spec.start; p <= spec.end; p++) ports.push(p)
    return ports
  }
  return [...new Set(spec.ports)]
}

export function resolvePorts(input: string): number[] {
  return expandPortSpec(parsePortSpec(input))
}
