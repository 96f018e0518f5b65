/**
 * Type-safe configuration with compile-time validation
 * Using TypeScript's satisfies operator for strict type checking
 */

import { Environment, LogLevel } from '../shared/enums';
import { parseIdList } from '../shared/utilities/conversion';
import type { ApplicationConfig } from './types';
import { ConfigurationConstraints, isWithinConstraints } from './types';

type Env = Record<string, string | undefined>;

const TRUTHY_VALUES = ['true', '1', 'yes'];

/**
 * Parse environment variable as number with validation
 */
function parseNumber(
  envVar: string | undefined,
  defaultValue: number,
  constraints?: { readonly min: number; readonly max: number }
): number {
  const value = envVar ? Number(envVar) : defaultValue;

  if (isNaN(value)) {
    console.warn(`Invalid number value for environment variable: ${envVar}`);
    return defaultValue;
  }

  if (constraints && !isWithinConstraints(value, constraints)) {
    console.warn(`Value ${value} is outside constraints [${constraints.min}, ${constraints.max}]`);
    return defaultValue;
  }

  return value;
}

/**
 * Parse environment variable as boolean
 */
function parseBoolean(envVar: string | undefined, defaultValue: boolean): boolean {
  if (envVar === undefined || envVar.trim() === '') return defaultValue;
  return TRUTHY_VALUES.includes(envVar.trim().toLowerCase());
}

/**
 * Parse a comma-separated id list, warning about entries that are not integers
 */
function parseIds(envVar: string | undefined, name: string): ReadonlySet<number> {
  return parseIdList(envVar, item => {
    console.warn(`Invalid integer in ${name}: ${item}`);
  });
}

/**
 * Validate log level
 */
function validateLogLevel(level: string): LogLevel {
  const match = Object.values(LogLevel).find(candidate => candidate === level.toLowerCase());
  if (match) return match;

  console.warn(`Invalid log level: ${level}, defaulting to 'info'`);
  return LogLevel.INFO;
}

/**
 * Validate environment
 */
function validateEnvironment(env: string): Environment {
  const match = Object.values(Environment).find(candidate => candidate === env);
  if (match) return match;

  console.warn(`Invalid environment: ${env}, defaulting to 'development'`);
  return Environment.DEVELOPMENT;
}

/**
 * Build the application configuration from an environment map
 */
export function loadConfiguration(env: Env) {
  const debugBattleReports = parseBoolean(env.DEBUG_BR, false);

  return {
    server: {
      nodeEnv: validateEnvironment(env.NODE_ENV ?? 'development'),
    },
    discord: {
      token: env.DISCORD_BOT_TOKEN || undefined,
      deleteOriginalMessage: parseBoolean(env.DELETE_ORIGINAL_MESSAGE, true),
    },
    battleReports: {
      preferred: {
        allianceIds: parseIds(env.PREFERRED_ALLIANCES, 'PREFERRED_ALLIANCES'),
        corporationIds: parseIds(env.PREFERRED_CORPS, 'PREFERRED_CORPS'),
      },
      debug: debugBattleReports,
    },
    apis: {
      warbeacon: {
        baseUrl: env.WARBEACON_BASE_URL ?? 'https://warbeacon.net',
      },
    },
    http: {
      timeout: parseNumber(env.HTTP_TIMEOUT, 15000, ConfigurationConstraints.http.timeout),
      userAgent: 'BeaconBRBot/1.0',
    },
    logging: {
      level: debugBattleReports ? LogLevel.DEBUG : validateLogLevel(env.LOG_LEVEL ?? 'info'),
    },
    sentry: {
      dsn: env.SENTRY_DSN || undefined,
    },
  } as const satisfies ApplicationConfig;
}

/**
 * Type-safe validated configuration object, read once from the process environment
 */
export const ValidatedConfiguration = loadConfiguration(process.env);
