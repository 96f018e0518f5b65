/**
 * Configuration type definitions with strict validation
 * Using TypeScript's satisfies operator for compile-time validation
 */

import { Environment, LogLevel } from '../shared/enums';

/**
 * Server configuration interface
 */
export interface ServerConfig {
  readonly nodeEnv: Environment;
}

/**
 * Discord configuration interface
 */
export interface DiscordConfig {
  readonly token: string | undefined;
  readonly deleteOriginalMessage: boolean;
}

/**
 * Alliance and corporation ids whose side is rendered as the home side
 */
export interface PreferredAffiliations {
  readonly allianceIds: ReadonlySet<number>;
  readonly corporationIds: ReadonlySet<number>;
}

/**
 * Battle report configuration interface
 */
export interface BattleReportsConfig {
  readonly preferred: PreferredAffiliations;
  readonly debug: boolean;
}

/**
 * APIs configuration interface
 */
export interface ApisConfig {
  readonly warbeacon: {
    readonly baseUrl: string;
  };
}

/**
 * HTTP client configuration interface
 */
export interface HttpConfig {
  readonly timeout: number;
  readonly userAgent: string;
}

/**
 * Logging configuration interface
 */
export interface LoggingConfig {
  readonly level: LogLevel;
}

/**
 * Sentry configuration interface
 */
export interface SentryConfig {
  readonly dsn: string | undefined;
}

/**
 * Complete application configuration interface
 */
export interface ApplicationConfig {
  readonly server: ServerConfig;
  readonly discord: DiscordConfig;
  readonly battleReports: BattleReportsConfig;
  readonly apis: ApisConfig;
  readonly http: HttpConfig;
  readonly logging: LoggingConfig;
  readonly sentry: SentryConfig;
}

/**
 * Configuration validation constraints
 */
export const ConfigurationConstraints = {
  http: {
    timeout: { min: 1000, max: 60000 },
  },
} as const;

/**
 * Check whether a value sits inside a constraint range
 */
export function isWithinConstraints(value: number, constraints: { readonly min: number; readonly max: number }): boolean {
  return value >= constraints.min && value <= constraints.max;
}
