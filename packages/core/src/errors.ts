/**
 * Error thrown when a configuration dimension is not a finite number > 0
 */
export class InvalidConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: number
  ) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}
