export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorContext {
  correlationId?: string;
  guildId?: string | null;
  channelId?: string;
  operation?: string;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}

export interface ErrorDetails {
  code: string;
  message: string;
  userMessage?: string;
  context?: ErrorContext;
  cause?: Error;
  isRetryable?: boolean;
  severity: ErrorSeverity;
}

export abstract class BaseError extends Error {
  public readonly code: string;
  public readonly userMessage?: string;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;
  public readonly isRetryable: boolean;
  public readonly severity: ErrorSeverity;
  public readonly timestamp: Date;

  constructor(details: ErrorDetails) {
    super(details.message);

    this.name = this.constructor.name;
    this.code = details.code;
    this.userMessage = details.userMessage;
    this.context = details.context;
    this.cause = details.cause;
    this.isRetryable = details.isRetryable ?? false;
    this.severity = details.severity;
    this.timestamp = details.context?.timestamp ?? new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      isRetryable: this.isRetryable,
      severity: this.severity,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }

  /**
   * Get user-friendly error message
   */
  getUserMessage(): string {
    return this.userMessage ?? this.getDefaultUserMessage();
  }

  /**
   * Get error for logging (with full context)
   */
  toLogFormat(): { error: Record<string, unknown>; level: 'info' | 'warn' | 'error' | 'fatal' } {
    return {
      error: this.toJSON(),
      level: this.getLogLevel(),
    };
  }

  /**
   * Get default user message based on error type
   */
  protected abstract getDefaultUserMessage(): string;

  /**
   * Get log level based on severity
   */
  private getLogLevel(): 'info' | 'warn' | 'error' | 'fatal' {
    switch (this.severity) {
      case 'low':
        return 'info';
      case 'medium':
        return 'warn';
      case 'high':
        return 'error';
      case 'critical':
        return 'fatal';
    }
  }
}
