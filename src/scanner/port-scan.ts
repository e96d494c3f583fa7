import { tcpConnect, type Connector } from './tcp.js'
import { mapWithConcurrency } from '../utils/pool.js'
import type { Logger } from '../utils/logger.js'

export interface PortScanOptions {
  signal?: AbortSignal
  connect?: Connector
  logger?: Logger
}

/**
 * Connect-scan a list of TCP ports on a host
 *
 * A port is open only when the handshake completes. Refused, timed out and
 * unreachable attempts all count as not open: a filtered port can't be told
 * apart from a dead one with a connect scan. There is no retry, one timeout
 * is the final answer for that port.
 *
 * @param ip - Target IP address
 * @param ports - Ports to scan
 * @param timeout - Per-port timeout in ms
 * @param concurrency - Max concurrent connections for this host
 * @returns Open ports, ascending
 */
export async function portScan(
  ip: string,
  ports: readonly number[],
  timeout: number,
  concurrency = 10,
  options: PortScanOptions = {}
): Promise<number[]> {
  const { signal, connect = tcpConnect, logger } = options
  const queue = [...new Set(ports)]

  const outcomes = await mapWithConcurrency(
    queue,
    concurrency,
    port => connect(ip, port, timeout, signal),
    signal
  )

  const openPorts = queue
    .filter((_, i) => outcomes[i] === 'open')
    .sort((a, b) => a - b)

  if (signal?.aborted) {
    logger?.debug(`Port scan ${ip}: cancelled after ${outcomes.filter(Boolean).length}/${queue.length} ports`)
  } else if (openPorts.length > 0) {
    logger?.debug(`Port scan ${ip}: ${openPorts.length} open ports [${openPorts.join(', ')}]`)
  }

  return openPorts
}
