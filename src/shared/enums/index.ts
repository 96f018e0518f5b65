/**
 * Centralized enum definitions for commonly used string literals
 */

// Log levels
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

// Runtime environments
export enum Environment {
  DEVELOPMENT = 'development',
  STAGING = 'staging',
  PRODUCTION = 'production',
  TEST = 'test',
}

// Battle link shapes
export enum BattleLinkMode {
  SINGLE_SYSTEM = 'single-system',
  MULTI_SYSTEM = 'multi-system',
}

// Where a participant ended up after side computation
export enum SideAssignment {
  SIDE_A = 'sideA',
  SIDE_B = 'sideB',
  EXCLUDED = 'excluded',
}

// Battle outcome
export enum BattleWinner {
  SIDE_A = 'sideA',
  SIDE_B = 'sideB',
  TIE = 'tie',
}

// Result of handling one chat message
export enum MessageOutcome {
  IGNORED = 'ignored',
  POSTED = 'posted',
  FAILED = 'failed',
}
