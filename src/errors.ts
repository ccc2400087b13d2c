/**
 * Raised at decoration time when `loggedApiCall` is applied to something
 * other than a plain function or method.
 */
export class LoggingConfigurationError extends TypeError {
  readonly code = 'DECORATOR_MISUSE';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LoggingConfigurationError';
  }
}
