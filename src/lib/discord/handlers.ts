import type { ChatInputCommandInteraction, MessageCreateOptions } from 'discord.js';
import { matchBattleLink } from '../../domain/battle/BattleLink';
import type { BattleReportProvider } from '../../services/BattleReportService';
import { MessageOutcome } from '../../shared/enums';
import { EmptyBattleError, FetchError } from '../../shared/errors';
import { logger } from '../logger';
import { captureError } from '../sentry';
import { buildBattleEmbed } from './embeds';

const GENERIC_FAILURE_NOTICE = 'Something went wrong while building the battle report.';

/**
 * The parts of a Discord message the battle-link pipeline touches
 */
export interface IncomingMessage {
  readonly id: string;
  readonly content: string;
  readonly author: { readonly bot: boolean; readonly tag: string };
  readonly channelId: string;
  readonly guildId: string | null;
  readonly deletable: boolean;
  readonly channel: {
    send(options: MessageCreateOptions): Promise<unknown>;
  };
  delete(): Promise<unknown>;
}

export interface BattleLinkHandlerDeps {
  reports: BattleReportProvider;
  deleteOriginal: boolean;
  timeoutMs: number;
}

function failureNotice(error: unknown): string {
  if (error instanceof FetchError || error instanceof EmptyBattleError) {
    return error.getUserMessage();
  }
  return GENERIC_FAILURE_NOTICE;
}

async function postFailureNotice(message: IncomingMessage, error: unknown): Promise<void> {
  const context = { messageId: message.id, channelId: message.channelId, guildId: message.guildId };

  if (error instanceof FetchError || error instanceof EmptyBattleError) {
    const { error: details, level } = error.toLogFormat();
    logger[level]({ ...context, error: details }, 'Battle report could not be built');
  } else {
    logger.error({ ...context, error }, 'Unexpected error while handling battle link');
    captureError(error instanceof Error ? error : new Error(String(error)), context);
  }

  try {
    await message.channel.send({ content: failureNotice(error) });
  } catch (sendError) {
    logger.error({ ...context, error: sendError }, 'Failed to post failure notice');
  }
}

async function deleteOriginal(message: IncomingMessage): Promise<void> {
  if (!message.deletable) {
    logger.debug({ messageId: message.id, channelId: message.channelId }, 'Missing permission to delete original message');
    return;
  }

  try {
    await message.delete();
  } catch (error) {
    logger.warn({ messageId: message.id, channelId: message.channelId, error }, 'Failed to delete original message');
  }
}

/**
 * Watch one chat message for a battle link and answer it with a summary embed.
 * Never rejects; the outcome says what happened.
 */
export async function handleBattleLinkMessage(
  message: IncomingMessage,
  deps: BattleLinkHandlerDeps
): Promise<MessageOutcome> {
  if (message.author.bot) {
    return MessageOutcome.IGNORED;
  }

  const link = matchBattleLink(message.content);
  if (!link) {
    return MessageOutcome.IGNORED;
  }

  logger.info(
    { messageId: message.id, channelId: message.channelId, author: message.author.tag, url: link.url },
    'Battle link detected'
  );

  try {
    const report = await deps.reports.buildReport(link, AbortSignal.timeout(deps.timeoutMs));
    await message.channel.send({ embeds: [buildBattleEmbed(report)] });
  } catch (error) {
    await postFailureNotice(message, error);
    return MessageOutcome.FAILED;
  }

  if (deps.deleteOriginal) {
    await deleteOriginal(message);
  }

  return MessageOutcome.POSTED;
}

export async function handlePingCommand(interaction: Pick<ChatInputCommandInteraction, 'reply'>): Promise<void> {
  await interaction.reply({ content: 'pong' });
}
