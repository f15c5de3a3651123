/** Indicates a configuration problem detected at load time or a client used after release. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}
