export type ConfigurationErrorCode =
  | 'InvalidAddress'
  | 'InvalidRange'
  | 'InvalidCIDR'
  | 'TooManyTargets'
  | 'InvalidPortRange'
  | 'InvalidPortList'
  | 'InvalidOption'

/**
 * Raised for input that prevents a scan from starting (bad address spec,
 * bad port spec, invalid option). This is the only error that reaches the
 * top level; everything that goes wrong per host or per port is folded into
 * the report as absent data.
 */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode
  readonly input: string

  constructor(code: ConfigurationErrorCode, input: string, message: string) {
    super(message)
    this.name = 'ConfigurationError'
    this.code = code
    this.input = input
  }
}

export function isConfigurationError(err: unknown): err is ConfigurationError {
  return err instanceof ConfigurationError
}

/**
 * Render an unknown thrown value for a log line
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
