/**
 * Raised when the engine is pointed at something that does not exist or is
 * configured with values it cannot work with. Never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
