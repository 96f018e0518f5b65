import { BaseError, ErrorDetails } from './BaseError';

/**
 * A battle report with no usable killmails
 */
export class EmptyBattleError extends BaseError {
  public readonly killmailCount: number;
  public readonly skippedCount: number;

  constructor(killmailCount: number, skippedCount: number, context?: ErrorDetails['context']) {
    super({
      code: 'EMPTY_BATTLE',
      message:
        killmailCount === 0
          ? 'Battle report contains no killmails'
          : `All ${killmailCount} killmails in the battle report are malformed`,
      userMessage: 'Could not summarize this battle.',
      context,
      severity: 'low',
    });

    this.killmailCount = killmailCount;
    this.skippedCount = skippedCount;
  }

  protected getDefaultUserMessage(): string {
    return 'Could not summarize this battle.';
  }
}

export type MalformedKillmailIssue = 'missing_victim' | 'missing_affiliation';

/**
 * A killmail that cannot be attributed to a side. Skipped, never fatal on its own.
 */
export class MalformedKillmailError extends BaseError {
  public readonly index: number;
  public readonly issue: MalformedKillmailIssue;
  public readonly killmailId?: number;

  constructor(index: number, issue: MalformedKillmailIssue, killmailId?: number) {
    super({
      code: 'MALFORMED_KILLMAIL',
      message: `Killmail #${index}${killmailId !== undefined ? ` (${killmailId})` : ''} ${
        issue === 'missing_victim' ? 'has no victim' : 'has no victim affiliation'
      }`,
      severity: 'low',
      context: { metadata: { index, issue, killmailId } },
    });

    this.index = index;
    this.issue = issue;
    this.killmailId = killmailId;
  }

  protected getDefaultUserMessage(): string {
    return 'Part of this battle report could not be read.';
  }
}
