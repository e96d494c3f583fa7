import * as net from 'net'
import type { Semaphore } from '../utils/semaphore.js'

/**
 * How a single connect attempt ended.
 *
 * - open: handshake completed
 * - refused: RST received (host present, port closed)
 * - timeout: no answer within the timeout
 * - unreachable: any other socket error (no route, host down, ...)
 * - cancelled: the run was aborted before the attempt finished
 */
export type ConnectOutcome = 'open' | 'refused' | 'timeout' | 'unreachable' | 'cancelled'

export type Connector = (
  ip: string,
  port: number,
  timeout: number,
  signal?: AbortSignal
) => Promise<ConnectOutcome>

function classifyError(err: NodeJS.ErrnoException): ConnectOutcome {
  return err.code === 'ECONNREFUSED' ? 'refused' : 'unreachable'
}

/**
 * Attempt a TCP connect to ip:port. Never rejects; the socket is always
 * destroyed before the promise settles.
 */
export function tcpConnect(
  ip: string,
  port: number,
  timeout: number,
  signal?: AbortSignal
): Promise<ConnectOutcome> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve('cancelled')
      return
    }

    const socket = new net.Socket()
    let settled = false

    const finish = (outcome: ConnectOutcome): void => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      socket.destroy()
      resolve(outcome)
    }

    const onAbort = (): void => finish('cancelled')
    const timer = setTimeout(() => finish('timeout'), timeout)

    socket.on('connect', () => finish('open'))
    socket.on('error', (err: NodeJS.ErrnoException) => finish(classifyError(err)))
    signal?.addEventListener('abort', onAbort, { once: true })

    socket.connect(port, ip)
  })
}

/**
 * Gate a connector on a shared semaphore so the number of sockets open at
 * once stays bounded across every host being scanned.
 */
export function limitConnector(connect: Connector, limiter: Semaphore): Connector {
  return async (ip, port, timeout, signal) => {
    const release = await limiter.acquire(signal)
    if (!release) return 'cancelled'
    try {
      return await connect(ip, port, timeout, signal)
    } finally {
      release()
    }
  }
}
