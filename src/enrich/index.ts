import { describeError } from '../errors.js'
import type { Logger } from '../utils/logger.js'
import type { ExecFn } from '../utils/exec.js'
import { reverseLookup } from './hostname.js'
import { lookupArpCache, type ArpLookupOptions } from './arp.js'
import { NmapFingerprinter } from './nmap.js'
import { emptyFingerprint, type Enricher, type Fingerprinter, type FingerprintResult } from './types.js'

export type { Enricher, Fingerprinter, FingerprintResult } from './types.js'
export { emptyFingerprint } from './types.js'

export interface SystemEnricherOptions {
  dnsTimeout?: number
  arp?: Omit<ArpLookupOptions, 'signal'>
}

/**
 * Enricher backed by the host system: reverse DNS, the local ARP cache and,
 * when one was found at startup, an external fingerprinting tool.
 */
export class SystemEnricher implements Enricher {
  readonly name = 'system'

  constructor(
    private readonly logger: Logger,
    private readonly fingerprinter: Fingerprinter | null,
    private readonly options: SystemEnricherOptions = {}
  ) {}

  async resolveHostname(ip: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      return await reverseLookup(ip, this.options.dnsTimeout, signal)
    } catch (err) {
      this.logger.debug(`Reverse lookup ${ip}: ${describeError(err)}`)
      return undefined
    }
  }

  async lookupLinkLayerAddress(ip: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      return await lookupArpCache(ip, { ...this.options.arp, signal })
    } catch (err) {
      this.logger.debug(`ARP cache lookup ${ip}: ${describeError(err)}`)
      return undefined
    }
  }

  async detectServiceAndOS(
    ip: string,
    openPorts: readonly number[],
    signal?: AbortSignal
  ): Promise<FingerprintResult> {
    if (!this.fingerprinter) return emptyFingerprint()
    try {
      return await this.fingerprinter.detect(ip, openPorts, signal)
    } catch (err) {
      this.logger.debug(`${this.fingerprinter.tool} ${ip}: ${describeError(err)}`)
      return emptyFingerprint()
    }
  }
}

/**
 * Enricher that looks nothing up (--no-enrich)
 */
export const disabledEnricher: Enricher = {
  name: 'disabled',
  resolveHostname: async () => undefined,
  lookupLinkLayerAddress: async () => undefined,
  detectServiceAndOS: async () => emptyFingerprint(),
}

export interface CreateEnricherOptions {
  /** false selects the no-op enricher */
  enabled: boolean
  /** false skips the external fingerprinting tool */
  fingerprint: boolean
  fingerprintTimeout: number
  dnsTimeout?: number
  exec?: ExecFn
}

/**
 * Pick the enricher for the run. Tool availability is checked once here;
 * a missing nmap disables fingerprinting for every host rather than being
 * retried per host.
 */
export async function createEnricher(options: CreateEnricherOptions, logger: Logger): Promise<Enricher> {
  if (!options.enabled) {
    logger.info('Host enrichment disabled')
    return disabledEnricher
  }

  let fingerprinter: Fingerprinter | null = null
  if (options.fingerprint) {
    if (await NmapFingerprinter.isAvailable(options.exec)) {
      fingerprinter = new NmapFingerprinter(logger, options.fingerprintTimeout, options.exec)
      logger.info('nmap found: service and OS detection enabled')
    } else {
      logger.info('nmap not found: service and OS detection disabled')
    }
  }

  return new SystemEnricher(logger, fingerprinter, {
    dnsTimeout: options.dnsTimeout,
    arp: options.exec ? { exec: options.exec } : undefined,
  })
}
