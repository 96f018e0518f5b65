import 'dotenv/config';

import { ValidatedConfiguration as Configuration } from './config/validated';
import { DiscordClient } from './lib/discord/client';
import { commands } from './lib/discord/commands';
import { logger } from './lib/logger';
import { flushSentry, initSentry } from './lib/sentry';
import { BattleReportService } from './services/BattleReportService';
import { ConfigurationError } from './shared/errors';

initSentry(Configuration.sentry.dsn, Configuration.server.nodeEnv);

async function main(): Promise<void> {
  const token = Configuration.discord.token;
  if (!token) {
    throw new ConfigurationError('DISCORD_BOT_TOKEN is not set', 'DISCORD_BOT_TOKEN');
  }

  const discordClient = new DiscordClient({
    reports: BattleReportService.fromConfig(),
    deleteOriginal: Configuration.discord.deleteOriginalMessage,
    timeoutMs: Configuration.http.timeout,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    discordClient
      .destroy()
      .then(() => flushSentry())
      .then(() => process.exit(0))
      .catch(error => {
        logger.error({ error }, 'Error during shutdown');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.info(
    {
      environment: Configuration.server.nodeEnv,
      preferredAlliances: Configuration.battleReports.preferred.allianceIds.size,
      preferredCorps: Configuration.battleReports.preferred.corporationIds.size,
      debug: Configuration.battleReports.debug,
    },
    'Starting battle report bot'
  );

  await discordClient.login(token);
  await discordClient.registerCommands(commands);
}

process.on('unhandledRejection', reason => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

process.on('uncaughtException', error => {
  logger.fatal({ error }, 'Uncaught exception');
  process.exit(1);
});

main().catch(error => {
  if (error instanceof ConfigurationError) {
    logger.fatal({ error: error.toJSON() }, error.message);
  } else {
    logger.fatal({ error }, 'Failed to start bot');
  }
  process.exit(1);
});
