/**
 * Raised when the toolkit cannot be configured: a query facade without
 * repositories, or a configuration file that cannot be read or parsed.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}
