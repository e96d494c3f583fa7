import type { ConnectOutcome, Connector } from '../tcp.js'

export interface FakeAnswer {
  outcome: ConnectOutcome
  after: number
}

export interface FakeConnector {
  connect: Connector
  calls: number[]
  cancelled: number[]
}

/**
 * Connector that answers per port after a delay and honours aborts.
 * Ports without an answer time out after the given timeout.
 */
export function fakeConnector(answers: Record<number, FakeAnswer>): FakeConnector {
  const calls: number[] = []
  const cancelled: number[] = []
  const connect: Connector = (_ip, port, timeout, signal) => {
    calls.push(port)
    const answer = answers[port] ?? { outcome: 'timeout', after: timeout }
    if (signal?.aborted) return Promise.resolve('cancelled')
    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer)
        cancelled.push(port)
        resolve('cancelled')
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve(answer.outcome)
      }, answer.after)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }
  return { connect, calls, cancelled }
}

/** Resolve after ms, or early (with false) when the signal aborts */
export function abortableDelay(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false)
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      resolve(false)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
