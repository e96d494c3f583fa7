export interface FingerprintResult {
  osGuess?: string
  /** port -> service name, for the ports the tool could identify */
  services: Map<number, string>
}

export function emptyFingerprint(): FingerprintResult {
  return { services: new Map() }
}

/**
 * Best-effort host metadata sources.
 *
 * Implementations must not throw: any failure comes back as undefined (or an
 * empty fingerprint) so a lookup can never abort a host or the run.
 */
export interface Enricher {
  readonly name: string
  /** Reverse DNS (PTR) name of the address */
  resolveHostname(ip: string, signal?: AbortSignal): Promise<string | undefined>
  /** MAC from the local neighbour/ARP cache; nothing is sent on the wire */
  lookupLinkLayerAddress(ip: string, signal?: AbortSignal): Promise<string | undefined>
  /** OS guess and service names for the open ports */
  detectServiceAndOS(ip: string, openPorts: readonly number[], signal?: AbortSignal): Promise<FingerprintResult>
}

export interface Fingerprinter {
  readonly tool: string
  detect(ip: string, openPorts: readonly number[], signal?: AbortSignal): Promise<FingerprintResult>
}
