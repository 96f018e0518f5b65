import { EmbedBuilder } from 'discord.js';
import { mock, MockProxy } from 'jest-mock-extended';
import type { BattleReport } from '../../../../src/domain/battle/BattleSummary';
import { computeBattleSummary } from '../../../../src/domain/battle/sides';
import { handleBattleLinkMessage, handlePingCommand, IncomingMessage } from '../../../../src/lib/discord/handlers';
import { logger } from '../../../../src/lib/logger';
import { captureError } from '../../../../src/lib/sentry';
import type { BattleReportProvider } from '../../../../src/services/BattleReportService';
import { BattleLinkMode, MessageOutcome } from '../../../../src/shared/enums';
import { EmptyBattleError, FetchError } from '../../../../src/shared/errors';

jest.mock('../../../../src/lib/sentry', () => ({
  captureError: jest.fn(),
}));

const LINK = 'https://warbeacon.net/br/related/31000005/202512030400/';

const report: BattleReport = {
  url: LINK,
  systemName: 'Thera',
  timestamp: '12/03/2025',
  summary: computeBattleSummary(
    [{ victim: { characterId: 1, corporationId: 10 }, attackers: [{ characterId: 2, corporationId: 20 }], iskValue: 100 }],
    { allianceIds: new Set(), corporationIds: new Set() }
  ),
};

interface TestMessage {
  message: IncomingMessage;
  send: jest.Mock;
  remove: jest.Mock;
}

function createMessage(overrides: { content?: string; bot?: boolean; deletable?: boolean } = {}): TestMessage {
  const send = jest.fn().mockResolvedValue(undefined);
  const remove = jest.fn().mockResolvedValue(undefined);
  const message: IncomingMessage = {
    id: 'message-1',
    content: overrides.content ?? `gf ${LINK}`,
    author: { bot: overrides.bot ?? false, tag: 'pilot#0001' },
    channelId: 'channel-1',
    guildId: 'guild-1',
    deletable: overrides.deletable ?? true,
    channel: { send },
    delete: remove,
  };
  return { message, send, remove };
}

describe('handleBattleLinkMessage', () => {
  let reports: MockProxy<BattleReportProvider>;

  beforeEach(() => {
    reports = mock<BattleReportProvider>();
  });

  function deps(deleteOriginal = true) {
    return { reports, deleteOriginal, timeoutMs: 5000 };
  }

  it('should ignore messages from bots', async () => {
    const { message, send } = createMessage({ bot: true });

    const outcome = await handleBattleLinkMessage(message, deps());

    expect(outcome).toBe(MessageOutcome.IGNORED);
    expect(reports.buildReport).not.toHaveBeenCalled();
    expect(send).not.toHaveBeenCalled();
  });

  it('should ignore messages without a battle link', async () => {
    const { message, send } = createMessage({ content: 'o7' });

    const outcome = await handleBattleLinkMessage(message, deps());

    expect(outcome).toBe(MessageOutcome.IGNORED);
    expect(send).not.toHaveBeenCalled();
  });

  it('should post one embed and delete the original', async () => {
    // Arrange
    reports.buildReport.mockResolvedValue(report);
    const { message, send, remove } = createMessage();

    // Act
    const outcome = await handleBattleLinkMessage(message, deps());

    // Assert
    expect(outcome).toBe(MessageOutcome.POSTED);
    expect(reports.buildReport).toHaveBeenCalledWith(
      {
        mode: BattleLinkMode.SINGLE_SYSTEM,
        url: LINK,
        systemId: 31000005,
        timestamp: '202512030400',
      },
      expect.any(AbortSignal)
    );
    expect(send).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith({ embeds: [expect.any(EmbedBuilder)] });
    expect(remove).toHaveBeenCalledTimes(1);
  });

  it('should keep the original when deletion is disabled', async () => {
    reports.buildReport.mockResolvedValue(report);
    const { message, remove } = createMessage();

    const outcome = await handleBattleLinkMessage(message, deps(false));

    expect(outcome).toBe(MessageOutcome.POSTED);
    expect(remove).not.toHaveBeenCalled();
  });

  it('should skip deletion without permission', async () => {
    reports.buildReport.mockResolvedValue(report);
    const { message, remove } = createMessage({ deletable: false });

    const outcome = await handleBattleLinkMessage(message, deps());

    expect(outcome).toBe(MessageOutcome.POSTED);
    expect(remove).not.toHaveBeenCalled();
  });

  it('should only log a failed deletion', async () => {
    reports.buildReport.mockResolvedValue(report);
    const { message, remove } = createMessage();
    remove.mockRejectedValue(new Error('Missing Permissions'));

    const outcome = await handleBattleLinkMessage(message, deps());

    expect(outcome).toBe(MessageOutcome.POSTED);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ messageId: 'message-1' }),
      'Failed to delete original message'
    );
  });

  it('should post the fetch error notice when the report cannot be fetched', async () => {
    reports.buildReport.mockRejectedValue(FetchError.httpStatus(404, '/api/br/auto'));
    const { message, send, remove } = createMessage();

    const outcome = await handleBattleLinkMessage(message, deps());

    expect(outcome).toBe(MessageOutcome.FAILED);
    expect(send).toHaveBeenCalledWith({ content: 'WarBeacon could not find that battle report.' });
    expect(remove).not.toHaveBeenCalled();
    expect(captureError).not.toHaveBeenCalled();
  });

  it('should post the timeout notice when the request times out', async () => {
    reports.buildReport.mockRejectedValue(FetchError.timeout('/api/br/auto', 5000));
    const { message, send } = createMessage();

    await handleBattleLinkMessage(message, deps());

    expect(send).toHaveBeenCalledWith({
      content: 'WarBeacon took too long to answer. Try posting the link again later.',
    });
  });

  it('should post a summary notice for an empty battle', async () => {
    reports.buildReport.mockRejectedValue(new EmptyBattleError(0, 0));
    const { message, send } = createMessage();

    const outcome = await handleBattleLinkMessage(message, deps());

    expect(outcome).toBe(MessageOutcome.FAILED);
    expect(send).toHaveBeenCalledWith({ content: 'Could not summarize this battle.' });
  });

  it('should report unexpected errors to monitoring', async () => {
    const failure = new Error('boom');
    reports.buildReport.mockRejectedValue(failure);
    const { message, send } = createMessage();

    const outcome = await handleBattleLinkMessage(message, deps());

    expect(outcome).toBe(MessageOutcome.FAILED);
    expect(send).toHaveBeenCalledWith({ content: 'Something went wrong while building the battle report.' });
    expect(captureError).toHaveBeenCalledWith(failure, {
      messageId: 'message-1',
      channelId: 'channel-1',
      guildId: 'guild-1',
    });
  });

  it('should not reject when posting the notice fails too', async () => {
    reports.buildReport.mockResolvedValue(report);
    const { message, send } = createMessage();
    send.mockRejectedValue(new Error('Missing Access'));

    const outcome = await handleBattleLinkMessage(message, deps());

    expect(outcome).toBe(MessageOutcome.FAILED);
    expect(send).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ messageId: 'message-1' }),
      'Failed to post failure notice'
    );
  });
});

describe('handlePingCommand', () => {
  it('should reply pong', async () => {
    const reply = jest.fn().mockResolvedValue(undefined);

    await handlePingCommand({ reply });

    expect(reply).toHaveBeenCalledWith({ content: 'pong' });
  });
});
