/**
 * Raised for configuration problems reported through the management surface:
 * unknown or ambiguous Automator selection, disabled targets, missing URLs,
 * malformed requests. Transport and protocol failures are never thrown.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly status: 400 | 404 = 400,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
