// Base error types
export { BaseError } from './BaseError';
export type { ErrorContext, ErrorDetails, ErrorSeverity } from './BaseError';

// Specific error classes
export { FetchError } from './FetchError';
export type { FetchFailureReason } from './FetchError';

export { EmptyBattleError, MalformedKillmailError } from './BattleError';
export type { MalformedKillmailIssue } from './BattleError';

export { ConfigurationError } from './ConfigurationError';
