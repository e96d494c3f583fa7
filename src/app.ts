import yargs from 'yargs'
import { buildScanConfiguration, type ScanConfiguration } from './config.js'
import { createEnricher } from './enrich/index.js'
import { ConfigurationError, isConfigurationError } from './errors.js'
import { formatReport, type OutputFormat } from './report/format.js'
import { createScanCollaborators, runScan, type ScanCollaborators } from './scanner/orchestrator.js'
import { expandTargets, type AddressSpecKind } from './scanner/targets.js'
import { createLogger, LOG_LEVELS, type Logger, type LogLevel } from './utils/logger.js'
import { PRODUCT_NAME, VERSION } from './utils/version.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_CONFIG = 2

export interface CliArgs {
  target: { kind: AddressSpecKind; input: string }
  ports?: string
  timeout?: number
  workers?: number
  portConcurrency?: number
  maxSockets?: number
  deadline?: number
  livenessPorts?: string
  enrich?: boolean
  fingerprint?: boolean
  fingerprintTimeout?: number
  maxTargets?: number
  format: OutputFormat
  logLevel: LogLevel
  logDir?: string
}

/**
 * Parse the command line. Every option may also be set through a
 * NETSWEEP_-prefixed environment variable (NETSWEEP_TIMEOUT=1).
 * Usage errors are thrown as ConfigurationError.
 */
export function parseCliArgs(argv: string[], exitProcess = true): CliArgs {
  const args = yargs(argv)
    .scriptName(PRODUCT_NAME)
    .usage('$0 (--host <ip> | --range <start-end> | --subnet <cidr>) [options]')
    .env('NETSWEEP')
    .option('host', { type: 'string', describe: 'Single host IP (e.g. 192.168.0.10)' })
    .option('range', { type: 'string', describe: 'Address range (e.g. 192.168.0.1-49)' })
    .option('subnet', { type: 'string', describe: 'CIDR block (e.g. 192.168.0.0/24)' })
    .option('ports', { type: 'string', describe: 'Ports: range or list', defaultDescription: '1-1024' })
    .option('timeout', { type: 'number', describe: 'Connect timeout in seconds', defaultDescription: '0.5' })
    .option('workers', { type: 'number', describe: 'Hosts scanned at once', defaultDescription: '10' })
    .option('port-concurrency', { type: 'number', describe: 'Port connects in flight per host', defaultDescription: '100' })
    .option('max-sockets', { type: 'number', describe: 'Connects in flight across all hosts', defaultDescription: 'min(workers × port-concurrency, 512)' })
    .option('deadline', { type: 'number', describe: 'Stop the whole run after this many seconds' })
    .option('liveness-ports', { type: 'string', describe: 'Ports probed to decide a host is up', defaultDescription: '80,443,22,445,139' })
    .option('enrich', { type: 'boolean', default: true, describe: 'Look up hostname, MAC and fingerprint (--no-enrich to skip)' })
    .option('fingerprint', { type: 'boolean', default: true, describe: 'Run nmap service/OS detection when installed' })
    .option('fingerprint-timeout', { type: 'number', describe: 'nmap timeout per host in seconds', defaultDescription: '120' })
    .option('max-targets', { type: 'number', describe: 'Refuse address specs larger than this', defaultDescription: '65536' })
    .option('format', { choices: ['text', 'json'] as const, default: 'text' as const, describe: 'Report format' })
    .option('log-level', { choices: LOG_LEVELS, default: 'info' as const, describe: 'Log verbosity (logs go to stderr)' })
    .option('log-dir', { type: 'string', describe: 'Also write rotating log files to this directory' })
    .conflicts('host', ['range', 'subnet'])
    .conflicts('range', 'subnet')
    .check((parsed) => {
      // yargs collects a repeated flag into an array
      for (const [key, value] of Object.entries(parsed)) {
        if (key !== '_' && Array.isArray(value)) throw new Error(`Option --${key} given more than once`)
      }
      if (parsed.host === undefined && parsed.range === undefined && parsed.subnet === undefined) {
        throw new Error('One of --host, --range or --subnet is required')
      }
      return true
    })
    .strict()
    .version(VERSION)
    .help()
    .exitProcess(exitProcess)
    .fail((msg, err) => {
      throw new ConfigurationError('InvalidOption', argv.join(' '), msg || err?.message || 'Invalid arguments')
    })
    .parseSync()

  let target: CliArgs['target']
  if (args.host !== undefined) target = { kind: 'host', input: args.host }
  else if (args.range !== undefined) target = { kind: 'range', input: args.range }
  else if (args.subnet !== undefined) target = { kind: 'cidr', input: args.subnet }
  else throw new ConfigurationError('InvalidOption', '', 'One of --host, --range or --subnet is required')

  return {
    target,
    ports: args.ports,
    timeout: args.timeout,
    workers: args.workers,
    portConcurrency: args['port-concurrency'],
    maxSockets: args['max-sockets'],
    deadline: args.deadline,
    livenessPorts: args['liveness-ports'],
    enrich: args.enrich,
    fingerprint: args.fingerprint,
    fingerprintTimeout: args['fingerprint-timeout'],
    maxTargets: args['max-targets'],
    format: args.format,
    logLevel: args['log-level'],
    logDir: args['log-dir'],
  }
}

export interface CliIO {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

export interface CliDeps {
  io?: CliIO
  /** Aborting it ends the run early; finished reports are still printed */
  signal?: AbortSignal
  createLogger?: (level: LogLevel, logDir?: string) => Logger
  createCollaborators?: (config: ScanConfiguration, logger: Logger) => Promise<ScanCollaborators>
  /** false keeps yargs from exiting on --help / --version (tests) */
  exitProcess?: boolean
}

const processIO: CliIO = {
  stdout: text => { process.stdout.write(text) },
  stderr: text => { process.stderr.write(text) },
}

async function defaultCollaborators(config: ScanConfiguration, logger: Logger): Promise<ScanCollaborators> {
  const enricher = await createEnricher({
    enabled: config.enrich,
    fingerprint: config.fingerprint,
    fingerprintTimeout: config.fingerprintTimeoutMs,
    dnsTimeout: config.dnsTimeoutMs,
  }, logger)
  return createScanCollaborators(config, logger, enricher)
}

/**
 * Parse, validate, scan and print. Returns the process exit code:
 * 0 for any completed or cancelled run (zero hosts found included),
 * 2 when the input can't be turned into a scan.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIO

  let args: CliArgs
  let config: ScanConfiguration
  let targets: string[]
  try {
    args = parseCliArgs(argv, deps.exitProcess ?? true)
    config = buildScanConfiguration({
      ports: args.ports,
      timeout: args.timeout,
      workers: args.workers,
      portConcurrency: args.portConcurrency,
      maxSockets: args.maxSockets,
      deadline: args.deadline,
      livenessPorts: args.livenessPorts,
      enrich: args.enrich,
      fingerprint: args.fingerprint,
      fingerprintTimeout: args.fingerprintTimeout,
      maxTargets: args.maxTargets,
    })
    targets = expandTargets(args.target.kind, args.target.input, config.maxTargets)
  } catch (err) {
    if (!isConfigurationError(err)) throw err
    io.stderr(`${PRODUCT_NAME}: ${err.message}\n`)
    return EXIT_CONFIG
  }

  const logger = (deps.createLogger ?? createLogger)(args.logLevel, args.logDir)
  logger.debug(`${PRODUCT_NAME} ${VERSION}: ${args.target.kind} ${args.target.input}`)

  const collaborators = await (deps.createCollaborators ?? defaultCollaborators)(config, logger)
  const reports = await runScan(targets, config, collaborators, { signal: deps.signal })

  io.stdout(formatReport(reports, args.format))
  return EXIT_OK
}
