import { execCommand, failedOutput, type ExecFn } from '../utils/exec.js'
import { describeError } from '../errors.js'
import type { Logger } from '../utils/logger.js'
import { emptyFingerprint, type Fingerprinter, type FingerprintResult } from './types.js'

const PORT_LINE = /^(\d+)\/tcp\s+open\s+(\S+)/
const NEEDS_ROOT = /requires root privileges/i

/**
 * Pull service names and an OS guess out of nmap's normal output.
 *
 * OS sources, most to least specific: "OS details", "Running",
 * the first "Aggressive OS guesses" entry, then the OS field of
 * "Service Info" (from -sV, available without root).
 */
export function parseNmapOutput(stdout: string): FingerprintResult {
  const services = new Map<number, string>()

  for (const line of stdout.split(/\r?\n/)) {
    const match = line.match(PORT_LINE)
    if (!match) continue
    // nmap marks uncertain service names with a trailing "?"
    const name = match[2].replace(/\?$/, '')
    if (name !== 'unknown') services.set(parseInt(match[1], 10), name)
  }

  const details = stdout.match(/^OS details:\s*(.+)$/m)
  const running = stdout.match(/^Running(?: \(JUST GUESSING\))?:\s*(.+)$/m)
  const aggressive = stdout.match(/^Aggressive OS guesses:\s*(.+)$/m)
  const serviceInfo = stdout.match(/^Service Info:.*?\bOS:\s*([^;]+)/m)

  const osGuess =
    details?.[1] ??
    running?.[1] ??
    aggressive?.[1].split(/,\s+/)[0] ??
    serviceInfo?.[1]

  return osGuess ? { osGuess: osGuess.trim(), services } : { services }
}

/**
 * Arguments for a connect-based service/OS scan of the given open ports.
 * -Pn: liveness was already established, skip nmap's own host discovery.
 */
export function buildNmapArgs(ip: string, ports: readonly number[], osDetection: boolean): string[] {
  const args = ['-Pn', '-sV', '-p', ports.join(',')]
  if (osDetection) args.push('-O', '--osscan-guess')
  args.push(ip)
  return args
}

/**
 * Service and OS fingerprinting through an installed nmap binary.
 *
 * OS detection needs raw sockets; when nmap refuses to run it for lack of
 * privileges, the fingerprinter drops -O for the rest of the run instead of
 * failing the same way for every host.
 */
export class NmapFingerprinter implements Fingerprinter {
  readonly tool = 'nmap'
  private osDetection = true

  constructor(
    private readonly logger: Logger,
    private readonly timeout = 120_000,
    private readonly exec: ExecFn = execCommand
  ) {}

  /**
   * Check if nmap is installed and runnable
   */
  static async isAvailable(exec: ExecFn = execCommand): Promise<boolean> {
    try {
      await exec('nmap', ['--version'], { timeout: 5000 })
      return true
    } catch {
      return false
    }
  }

  async detect(ip: string, openPorts: readonly number[], signal?: AbortSignal): Promise<FingerprintResult> {
    if (openPorts.length === 0) return emptyFingerprint()

    try {
      const stdout = await this.run(ip, openPorts, signal)
      const result = parseNmapOutput(stdout)
      this.logger.debug(`nmap ${ip}: ${result.services.size} services, OS ${result.osGuess ?? 'unknown'}`)
      return result
    } catch (err) {
      this.logger.debug(`nmap ${ip} failed: ${describeError(err)}`)
      return emptyFingerprint()
    }
  }

  private async run(ip: string, ports: readonly number[], signal?: AbortSignal): Promise<string> {
    const options = { timeout: this.timeout, signal }

    if (this.osDetection) {
      try {
        const { stdout } = await this.exec('nmap', buildNmapArgs(ip, ports, true), options)
        return stdout
      } catch (err) {
        if (!NEEDS_ROOT.test(failedOutput(err))) throw err
        if (this.osDetection) {
          this.osDetection = false
          this.logger.info('nmap OS detection needs root privileges; continuing with service detection only')
        }
      }
    }

    const { stdout } = await this.exec('nmap', buildNmapArgs(ip, ports, false), options)
    return stdout
  }
}
