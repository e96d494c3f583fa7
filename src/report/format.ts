import type { HostReport } from '../scanner/orchestrator.js'

export type OutputFormat = 'text' | 'json'

const RULE = '='.repeat(60)

function formatHost(host: HostReport): string[] {
  const lines = [
    RULE,
    `IP: ${host.address}`,
    `MAC: ${host.macAddress || '-'}`,
    `Hostname: ${host.hostname || '-'}`,
    `OS: ${host.osGuess || '-'}`,
  ]

  if (host.ports.length === 0) {
    lines.push('Open ports: -')
  } else {
    lines.push('Open ports:')
    for (const p of host.ports) {
      lines.push(`  - ${p.protocol}/${p.port}  ${p.service || '-'}`)
    }
  }
  return lines
}

/**
 * Plain-text report: one block per host, closed by a rule. No colour codes,
 * so it reads the same in a terminal and in a redirected file.
 */
export function formatText(hosts: readonly HostReport[]): string {
  const lines = hosts.flatMap(formatHost)
  lines.push(RULE)
  return lines.join('\n') + '\n'
}

export function formatJson(hosts: readonly HostReport[]): string {
  return JSON.stringify(hosts, null, 2) + '\n'
}

export function formatReport(hosts: readonly HostReport[], format: OutputFormat): string {
  return format === 'json' ? formatJson(hosts) : formatText(hosts)
}
