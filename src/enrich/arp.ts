import { promises as fs } from 'fs'
import { execCommand, type ExecFn } from '../utils/exec.js'
import { normalizeMac, padMac } from '../utils/ip-utils.js'

const MAC_PATTERN = /\b([0-9a-f]{1,2}[:-]){5}[0-9a-f]{1,2}\b/i
const INCOMPLETE_MAC = '00:00:00:00:00:00'

// ATF_COM in /proc/net/arp flags: entry is resolved
const ATF_COM = 0x2

export interface ArpLookupOptions {
  platform?: NodeJS.Platform
  exec?: ExecFn
  readFile?: (path: string) => Promise<string>
  timeout?: number
  signal?: AbortSignal
}

function cleanMac(raw: string): string | undefined {
  const mac = normalizeMac(padMac(raw.replace(/-/g, ':')))
  return mac === INCOMPLETE_MAC ? undefined : mac
}

/**
 * Find an IP in the Linux kernel neighbour table.
 *
 *   IP address       HW type     Flags       HW address            Mask     Device
 *   192.168.1.1      0x1         0x2         aa:bb:cc:dd:ee:ff     *        eth0
 */
export function parseProcArp(content: string, ip: string): string | undefined {
  for (const line of content.split('\n').slice(1)) {
    const cols = line.trim().split(/\s+/)
    if (cols.length < 4 || cols[0] !== ip) continue

    const flags = parseInt(cols[2], 16)
    if (isNaN(flags) || (flags & ATF_COM) === 0) return undefined

    return cleanMac(cols[3])
  }
  return undefined
}

/**
 * Find an IP in `arp -n` / `arp -a` output. Handles the BSD/macOS form
 * ("? (10.0.0.1) at 0:1b:2c:3:4:5 on en0"), net-tools and Windows tables.
 */
export function parseArpOutput(stdout: string, ip: string): string | undefined {
  for (const line of stdout.split(/\r?\n/)) {
    const tokens = line.trim().split(/\s+/).map(t => t.replace(/^\(|\)$/g, ''))
    if (!tokens.includes(ip)) continue

    const match = line.match(MAC_PATTERN)
    if (match) return cleanMac(match[0])
  }
  return undefined
}

/**
 * Look up the link-layer address of an IP in the local ARP cache.
 *
 * Only consults cache state, nothing is probed: addresses outside the local
 * segment, or hosts we never exchanged a packet with, have no entry.
 */
export async function lookupArpCache(ip: string, options: ArpLookupOptions = {}): Promise<string | undefined> {
  const {
    platform = process.platform,
    exec = execCommand,
    readFile = (path: string) => fs.readFile(path, 'utf8'),
    timeout = 2000,
    signal,
  } = options

  if (platform === 'linux') {
    return parseProcArp(await readFile('/proc/net/arp'), ip)
  }

  const args = platform === 'win32' ? ['-a', ip] : ['-n', ip]
  const { stdout } = await exec('arp', args, { timeout, signal })
  return parseArpOutput(stdout, ip)
}
