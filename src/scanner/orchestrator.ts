import type { ScanConfiguration } from '../config.js'
import type { Enricher } from '../enrich/types.js'
import { describeError } from '../errors.js'
import type { Logger } from '../utils/logger.js'
import { mapWithConcurrency } from '../utils/pool.js'
import { Semaphore } from '../utils/semaphore.js'
import { probeHost } from './liveness.js'
import { portScan } from './port-scan.js'
import { limitConnector, tcpConnect, type Connector } from './tcp.js'

export interface PortEntry {
  port: number
  protocol: 'tcp'
  /** Service name, '' when unknown */
  service: string
}

export interface HostReport {
  address: string
  hostname?: string
  macAddress?: string
  osGuess?: string
  /** Open ports, ascending */
  ports: PortEntry[]
}

export type HostState =
  | 'pending'
  | 'probing'
  | 'down'
  | 'scanning'
  | 'enriching'
  | 'reported'
  | 'cancelled'

export type LivenessProbe = (ip: string, signal: AbortSignal) => Promise<boolean>
export type PortScanner = (ip: string, signal: AbortSignal) => Promise<number[]>

/**
 * Everything the orchestrator talks to besides the configuration.
 * Swapped for stubs in tests.
 */
export interface ScanCollaborators {
  probe: LivenessProbe
  scan: PortScanner
  enricher: Enricher
  logger: Logger
}

export interface RunScanOptions {
  signal?: AbortSignal
  /** Called on every host state transition */
  onHostState?: (ip: string, state: HostState) => void
  /** Called once per host as soon as its report is final */
  onHostComplete?: (report: Readonly<HostReport>) => void
}

/**
 * Wire the real prober and scanner to the configuration. Both share one
 * semaphore so connects in flight across every host never exceed
 * `config.maxSockets`, whatever `workers × portConcurrency` comes to.
 */
export function createScanCollaborators(
  config: ScanConfiguration,
  logger: Logger,
  enricher: Enricher,
  connect: Connector = tcpConnect
): ScanCollaborators {
  const limited = limitConnector(connect, new Semaphore(config.maxSockets))

  return {
    probe: (ip, signal) => probeHost(ip, config.timeoutMs, {
      ports: config.livenessPorts,
      signal,
      connect: limited,
      logger,
    }),
    scan: (ip, signal) => portScan(ip, config.ports, config.timeoutMs, config.portConcurrency, {
      signal,
      connect: limited,
      logger,
    }),
    enricher,
    logger,
  }
}

function freezeReport(draft: HostReport): Readonly<HostReport> {
  const report: HostReport = { address: draft.address, ports: draft.ports.map(p => Object.freeze({ ...p })) }
  if (draft.hostname) report.hostname = draft.hostname
  if (draft.macAddress) report.macAddress = draft.macAddress
  if (draft.osGuess) report.osGuess = draft.osGuess
  Object.freeze(report.ports)
  return Object.freeze(report)
}

/**
 * Run a best-effort lookup, turning a throw into undefined. Enrichers are
 * not supposed to throw, but one misbehaving source must not take the host
 * down with it.
 */
async function bestEffort<T>(what: string, logger: Logger, lookup: () => Promise<T>): Promise<T | undefined> {
  try {
    return await lookup()
  } catch (err) {
    logger.debug(`${what} failed: ${describeError(err)}`)
    return undefined
  }
}

/**
 * Fill hostname, MAC, OS guess and service names into the host's draft.
 * Each source is independent: whatever fails leaves its field empty.
 */
async function enrichHost(
  draft: HostReport,
  enricher: Enricher,
  logger: Logger,
  signal: AbortSignal
): Promise<void> {
  const ip = draft.address
  const openPorts = draft.ports.map(p => p.port)

  const [hostname, macAddress, fingerprint] = await Promise.all([
    bestEffort(`Hostname lookup ${ip}`, logger, () => enricher.resolveHostname(ip, signal)),
    bestEffort(`MAC lookup ${ip}`, logger, () => enricher.lookupLinkLayerAddress(ip, signal)),
    openPorts.length > 0
      ? bestEffort(`Fingerprint ${ip}`, logger, () => enricher.detectServiceAndOS(ip, openPorts, signal))
      : Promise.resolve(undefined),
  ])

  draft.hostname = hostname
  draft.macAddress = macAddress
  if (fingerprint) {
    draft.osGuess = fingerprint.osGuess
    for (const entry of draft.ports) {
      entry.service = fingerprint.services.get(entry.port) ?? ''
    }
  }
}

interface HostOutcome {
  state: HostState
  report?: Readonly<HostReport>
}

/**
 * pending → probing → down
 *                   → scanning → enriching → reported
 *
 * Any non-terminal state may end in cancelled; a cancelled host yields no
 * report, so a half-enriched host never leaks into the output.
 */
async function processHost(
  ip: string,
  collaborators: ScanCollaborators,
  signal: AbortSignal,
  transition: (state: HostState) => void
): Promise<HostOutcome> {
  const { logger } = collaborators
  const finish = (state: HostState, report?: Readonly<HostReport>): HostOutcome => {
    transition(state)
    return { state, report }
  }

  transition('probing')
  let up: boolean
  try {
    up = await collaborators.probe(ip, signal)
  } catch (err) {
    logger.warn(`Liveness probe ${ip} failed: ${describeError(err)}`)
    up = false
  }
  if (signal.aborted) return finish('cancelled')
  if (!up) return finish('down')

  transition('scanning')
  let openPorts: number[]
  try {
    openPorts = await collaborators.scan(ip, signal)
  } catch (err) {
    logger.warn(`Port scan ${ip} failed: ${describeError(err)}`)
    openPorts = []
  }
  if (signal.aborted) return finish('cancelled')

  transition('enriching')
  const draft: HostReport = {
    address: ip,
    ports: [...new Set(openPorts)]
      .sort((a, b) => a - b)
      .map((port): PortEntry => ({ port, protocol: 'tcp', service: '' })),
  }

  await enrichHost(draft, collaborators.enricher, logger, signal)
  if (signal.aborted) return finish('cancelled')

  return finish('reported', freezeReport(draft))
}

function runSignal(config: ScanConfiguration, external?: AbortSignal): AbortSignal {
  const signals: AbortSignal[] = []
  if (external) signals.push(external)
  if (config.deadlineMs !== undefined) signals.push(AbortSignal.timeout(config.deadlineMs))
  return signals.length > 0 ? AbortSignal.any(signals) : new AbortController().signal
}

/**
 * Scan every target and return reports for the hosts found up, in target
 * order.
 *
 * Hosts run on a pool of `config.workers`; each host's port sweep runs on
 * its own pool inside that. Down hosts are dropped. Per-host failures are
 * contained here: a failed probe counts as down, a failed scan reports the
 * host without ports, failed enrichment leaves fields empty. On abort (the
 * caller's signal or `config.deadlineMs`), no new hosts are started,
 * in-flight connects are cut short and the reports already finished are
 * returned.
 */
export async function runScan(
  targets: readonly string[],
  config: ScanConfiguration,
  collaborators: ScanCollaborators,
  options: RunScanOptions = {}
): Promise<HostReport[]> {
  const { logger } = collaborators
  const signal = runSignal(config, options.signal)
  const started = Date.now()

  logger.info(
    `Scan starting: ${targets.length} targets, ${config.ports.length} ports, ` +
    `workers ${config.workers}, port concurrency ${config.portConcurrency}, timeout ${config.timeoutMs}ms`
  )

  // Each slot is written only by the worker that owns that target index
  const outcomes = await mapWithConcurrency(
    targets,
    config.workers,
    async (ip): Promise<HostOutcome> => {
      const transition = (state: HostState): void => options.onHostState?.(ip, state)
      transition('pending')
      const outcome = await processHost(ip, collaborators, signal, transition)
      if (outcome.report) {
        logger.debug(`Host ${ip}: ${outcome.report.ports.length} open ports`)
        options.onHostComplete?.(outcome.report)
      }
      return outcome
    },
    signal
  )

  const reports: HostReport[] = []
  let down = 0
  let cancelled = 0
  for (const outcome of outcomes) {
    if (!outcome || outcome.state === 'cancelled') cancelled++
    else if (outcome.state === 'down') down++
    else if (outcome.report) reports.push(outcome.report)
  }

  const elapsed = ((Date.now() - started) / 1000).toFixed(1)
  if (signal.aborted) {
    logger.warn(`Scan cancelled after ${elapsed}s: ${reports.length} hosts reported, ${cancelled} not completed`)
  } else {
    logger.info(`Scan complete in ${elapsed}s: ${reports.length}/${targets.length} hosts up, ${down} down`)
  }

  return reports
}
