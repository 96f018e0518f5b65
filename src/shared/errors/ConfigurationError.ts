import { BaseError } from './BaseError';

export class ConfigurationError extends BaseError {
  constructor(message: string = 'Configuration error', setting?: string) {
    super({
      code: 'CONFIGURATION_ERROR',
      message,
      isRetryable: false,
      severity: 'critical',
      context: { metadata: { setting } },
    });
  }

  protected getDefaultUserMessage(): string {
    return 'The bot is misconfigured. Please contact its operator.';
  }
}
