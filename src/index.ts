export { buildScanConfiguration, type ScanConfiguration, type ScanOptions } from './config.js'
export { ConfigurationError, isConfigurationError, type ConfigurationErrorCode } from './errors.js'
export {
  parseAddressSpec,
  expandAddressSpec,
  expandTargets,
  countAddresses,
  type AddressSpec,
  type AddressSpecKind,
} from './scanner/targets.js'
export { parsePortSpec, expandPortSpec, resolvePorts, type PortSpec } from './scanner/ports.js'
export { tcpConnect, limitConnector, type Connector, type ConnectOutcome } from './scanner/tcp.js'
export { probeHost, LIVENESS_PORTS, type ProbeOptions } from './scanner/liveness.js'
export { portScan, type PortScanOptions } from './scanner/port-scan.js'
export {
  runScan,
  createScanCollaborators,
  type HostReport,
  type HostState,
  type PortEntry,
  type ScanCollaborators,
  type RunScanOptions,
} from './scanner/orchestrator.js'
export {
  createEnricher,
  disabledEnricher,
  SystemEnricher,
  emptyFingerprint,
  type Enricher,
  type Fingerprinter,
  type FingerprintResult,
} from './enrich/index.js'
export { NmapFingerprinter, parseNmapOutput } from './enrich/nmap.js'
export { formatReport, formatText, formatJson, type OutputFormat } from './report/format.js'
export { createLogger, createSilentLogger, type Logger, type LogLevel } from './utils/logger.js'
export { Semaphore } from './utils/semaphore.js'
export { mapWithConcurrency } from './utils/pool.js'
