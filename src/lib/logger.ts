import pino from 'pino';
import { ValidatedConfiguration } from '../config/validated';
import { Environment } from '../shared/enums';

const { nodeEnv } = ValidatedConfiguration.server;

// Create base logger configuration
const baseConfig: pino.LoggerOptions = {
  level: nodeEnv === Environment.TEST ? 'silent' : ValidatedConfiguration.logging.level,
  serializers: {
    error: pino.stdSerializers.err,
  },
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
};

// Development configuration with pretty printing
const devConfig: pino.LoggerOptions = {
  ...baseConfig,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
    },
  },
};

// Production configuration (JSON format)
const prodConfig: pino.LoggerOptions = {
  ...baseConfig,
  timestamp: pino.stdTimeFunctions.isoTime,
};

function selectConfig(): pino.LoggerOptions {
  switch (nodeEnv) {
    case Environment.PRODUCTION:
    case Environment.STAGING:
      return prodConfig;
    case Environment.TEST:
      return baseConfig;
    default:
      return devConfig;
  }
}

const logger = pino(selectConfig());

export { logger };
