import { tcpConnect, type ConnectOutcome, type Connector } from './tcp.js'
import type { Logger } from '../utils/logger.js'

/**
 * Ports that are open (or at least answer with RST) on most hosts
 */
export const LIVENESS_PORTS = [
  80,    // HTTP
  443,   // HTTPS
  22,    // SSH
  445,   // SMB
  139,   // NetBIOS
]

export interface ProbeOptions {
  ports?: readonly number[]
  signal?: AbortSignal
  connect?: Connector
  logger?: Logger
}

/** An RST proves the host is there just as well as a handshake does */
function provesLiveness(outcome: ConnectOutcome): boolean {
  return outcome === 'open' || outcome === 'refused'
}

/**
 * Decide whether a host is worth a full port scan, without ICMP (which
 * needs raw sockets and elevated privileges).
 *
 * Connects to every liveness port in parallel and answers true on the first
 * open or refused outcome, cancelling the remaining attempts. Hosts that
 * filter all of these ports are reported down even if they accept
 * connections elsewhere.
 *
 * @param ip - Target IP address
 * @param timeout - Per-attempt timeout in ms
 */
export async function probeHost(
  ip: string,
  timeout: number,
  options: ProbeOptions = {}
): Promise<boolean> {
  const { ports = LIVENESS_PORTS, signal, connect = tcpConnect, logger } = options

  if (ports.length === 0 || signal?.aborted) return false

  const settled = new AbortController()
  const attemptSignal = signal ? AbortSignal.any([signal, settled.signal]) : settled.signal

  try {
    const attempts = ports.map(async (port) => {
      const outcome = await connect(ip, port, timeout, attemptSignal)
      if (provesLiveness(outcome)) {
        logger?.debug(`Host ${ip} is up (${port}/tcp ${outcome})`)
        settled.abort()
        return true
      }
      return false
    })

    const results = await Promise.all(attempts)
    return results.some(Boolean)
  } finally {
    settled.abort()
  }
}
