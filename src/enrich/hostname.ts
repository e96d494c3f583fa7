import { promises as dns } from 'dns'

/**
 * Reverse-resolve an IP address (PTR record) and return the first name.
 *
 * Rejects on NXDOMAIN, timeout or cancellation; callers decide what a
 * failure means.
 *
 * @param ip - Address to resolve
 * @param timeout - Resolver timeout in ms (single try)
 */
export async function reverseLookup(
  ip: string,
  timeout = 2000,
  signal?: AbortSignal
): Promise<string | undefined> {
  const resolver = new dns.Resolver({ timeout, tries: 1 })
  const onAbort = (): void => resolver.cancel()
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    const names = await resolver.reverse(ip)
    return names.find(name => name.length > 0)?.replace(/\.$/, '')
  } finally {
    signal?.removeEventListener('abort', onAbort)
  }
}
