import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import { resolvePorts } from './scanner/ports.js'
import { LIVENESS_PORTS } from './scanner/liveness.js'

/**
 * Read-only configuration shared by every unit of work in a run
 */
export interface ScanConfiguration {
  readonly timeoutMs: number
  readonly workers: number
  readonly portConcurrency: number
  readonly maxSockets: number
  readonly ports: readonly number[]
  readonly livenessPorts: readonly number[]
  readonly deadlineMs?: number
  readonly enrich: boolean
  readonly fingerprint: boolean
  readonly fingerprintTimeoutMs: number
  readonly dnsTimeoutMs: number
  readonly maxTargets: number
}

// Keeps the default ceiling under common per-process descriptor limits
const DEFAULT_SOCKET_CEILING = 512

// Node timers clamp delays above 2^31 - 1 ms to 1 ms
const MAX_TIMER_SECONDS = 2_147_483

/**
 * Raw scan options as they come from the command line or environment.
 * Durations are in seconds; omitted fields take their defaults.
 */
const scanOptionsSchema = z.object({
  /** Port spec: "1-1024" or "22,80,443" */
  ports: z.string().trim().min(1).default('1-1024'),
  /** Per-connect timeout */
  timeout: z.number().positive().max(600).default(0.5),
  /** Hosts processed at once */
  workers: z.number().int().min(1).max(1024).default(10),
  /** Port connects in flight per host */
  portConcurrency: z.number().int().min(1).max(4096).default(100),
  /** Ceiling on connects in flight across all hosts */
  maxSockets: z.number().int().min(1).max(65535).optional(),
  /** Run-level deadline */
  deadline: z.number().positive().max(MAX_TIMER_SECONDS).optional(),
  livenessPorts: z.string().trim().min(1).default(LIVENESS_PORTS.join(',')),
  enrich: z.boolean().default(true),
  fingerprint: z.boolean().default(true),
  /** nmap run timeout per host */
  fingerprintTimeout: z.number().positive().max(MAX_TIMER_SECONDS).default(120),
  /** Reverse DNS timeout */
  dnsTimeout: z.number().positive().max(60).default(2),
  maxTargets: z.number().int().min(1).default(65536),
})

export type ScanOptions = z.input<typeof scanOptionsSchema>

function isOptionKey(key: string | number | undefined): key is keyof ScanOptions {
  return typeof key === 'string' && key in scanOptionsSchema.shape
}

const seconds = (value: number): number => Math.max(1, Math.round(value * 1000))

/**
 * Validate raw options and resolve them into the frozen configuration for a
 * run. Throws ConfigurationError naming the offending option.
 */
export function buildScanConfiguration(input: ScanOptions = {}): ScanConfiguration {
  const result = scanOptionsSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const key = issue.path[0]
    const value = isOptionKey(key) ? String(input[key] ?? '') : ''
    throw new ConfigurationError('InvalidOption', value, `Invalid option ${key}=${value}: ${issue.message}`)
  }

  const options = result.data
  const ports = resolvePorts(options.ports)
  const livenessPorts = resolvePorts(options.livenessPorts)

  return Object.freeze({
    timeoutMs: seconds(options.timeout),
    workers: options.workers,
    portConcurrency: options.portConcurrency,
    maxSockets: options.maxSockets
      ?? Math.min(options.workers * options.portConcurrency, DEFAULT_SOCKET_CEILING),
    ports: Object.freeze(ports),
    livenessPorts: Object.freeze(livenessPorts),
    deadlineMs: options.deadline === undefined ? undefined : seconds(options.deadline),
    enrich: options.enrich,
    fingerprint: options.fingerprint,
    fingerprintTimeoutMs: seconds(options.fingerprintTimeout),
    dnsTimeoutMs: seconds(options.dnsTimeout),
    maxTargets: options.maxTargets,
  })
}

