import { BaseError, ErrorDetails, ErrorSeverity } from './BaseError';

export type FetchFailureReason = 'http_status' | 'timeout' | 'network' | 'cancelled' | 'invalid_response';

/**
 * Failure to obtain a battle report from the battle-data API.
 * Raised once per request; callers never retry.
 */
export class FetchError extends BaseError {
  public readonly reason: FetchFailureReason;
  public readonly endpoint?: string;
  public readonly responseStatus?: number;

  constructor(
    reason: FetchFailureReason,
    message: string,
    endpoint?: string,
    responseStatus?: number,
    context?: ErrorDetails['context'],
    cause?: Error
  ) {
    super({
      code: `FETCH_${reason.toUpperCase()}`,
      message,
      context,
      cause,
      isRetryable: false,
      severity: FetchError.getSeverityFor(reason, responseStatus),
    });

    this.reason = reason;
    this.endpoint = endpoint;
    this.responseStatus = responseStatus;
  }

  static httpStatus(status: number, endpoint?: string, context?: ErrorDetails['context'], cause?: Error): FetchError {
    return new FetchError('http_status', `WarBeacon API returned HTTP ${status}`, endpoint, status, context, cause);
  }

  static timeout(endpoint?: string, timeoutMs?: number, context?: ErrorDetails['context'], cause?: Error): FetchError {
    return new FetchError(
      'timeout',
      `WarBeacon API request timeout${timeoutMs ? ` (${timeoutMs}ms)` : ''}`,
      endpoint,
      undefined,
      { ...context, metadata: { ...context?.metadata, timeoutMs } },
      cause
    );
  }

  static network(message: string, endpoint?: string, context?: ErrorDetails['context'], cause?: Error): FetchError {
    return new FetchError('network', `Network error calling WarBeacon API: ${message}`, endpoint, undefined, context, cause);
  }

  static cancelled(endpoint?: string, context?: ErrorDetails['context'], cause?: Error): FetchError {
    return new FetchError('cancelled', 'WarBeacon API request was cancelled', endpoint, undefined, context, cause);
  }

  static invalidResponse(detail: string, endpoint?: string, context?: ErrorDetails['context']): FetchError {
    return new FetchError('invalid_response', `Invalid response from WarBeacon API: ${detail}`, endpoint, undefined, context);
  }

  protected getDefaultUserMessage(): string {
    switch (this.reason) {
      case 'timeout':
      case 'cancelled':
        return 'WarBeacon took too long to answer. Try posting the link again later.';
      case 'http_status':
        return this.responseStatus === 404
          ? 'WarBeacon could not find that battle report.'
          : 'WarBeacon is having trouble right now. Try again later.';
      case 'invalid_response':
        return 'WarBeacon returned data I could not read.';
      case 'network':
        return 'Could not reach WarBeacon. Try again later.';
    }
  }

  private static getSeverityFor(reason: FetchFailureReason, status?: number): ErrorSeverity {
    if (reason === 'cancelled') return 'low';
    if (reason === 'http_status' && status !== undefined && status < 500) return 'medium';
    return 'high';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
      endpoint: this.endpoint,
      responseStatus: this.responseStatus,
    };
  }
}
