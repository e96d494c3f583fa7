import { execFile } from 'child_process'
import { promisify } from 'util'

export interface ExecOptions {
  timeout?: number
  signal?: AbortSignal
}

export interface ExecResult {
  stdout: string
  stderr: string
}

/** Run a command without a shell; rejects on spawn failure or non-zero exit */
export type ExecFn = (file: string, args: string[], options?: ExecOptions) => Promise<ExecResult>

const execFileAsync = promisify(execFile)

export const execCommand: ExecFn = async (file, args, options = {}) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    timeout: options.timeout,
    signal: options.signal,
    maxBuffer: 4 * 1024 * 1024,
    windowsHide: true,
  })
  return { stdout, stderr }
}

/**
 * Output of a failed command, when the child got far enough to write any
 */
export function failedOutput(err: unknown): string {
  if (typeof err !== 'object' || err === null) return ''
  const parts: string[] = []
  if ('stdout' in err && typeof err.stdout === 'string') parts.push(err.stdout)
  if ('stderr' in err && typeof err.stderr === 'string') parts.push(err.stderr)
  return parts.join('\n')
}
