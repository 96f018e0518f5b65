/**
 * Utilities for formatting battle values for display
 */
export class FormatUtils {
  static readonly RATIO_BAR_LENGTH = 20;
  static readonly FILLED_BLOCK = '█';
  static readonly EMPTY_BLOCK = '░';

  /**
   * Format an ISK value with a lowercase suffix (k, m, b)
   * @returns e.g. `1.5b`, `250.0m`, `50.0k`, `999`, or `N/A` for non-finite input
   */
  static formatIskShort(value: number): string {
    if (!Number.isFinite(value)) {
      return 'N/A';
    }

    if (value >= 1_000_000_000) {
      return `${(value / 1_000_000_000).toFixed(1)}b`;
    } else if (value >= 1_000_000) {
      return `${(value / 1_000_000).toFixed(1)}m`;
    } else if (value >= 1_000) {
      return `${(value / 1_000).toFixed(1)}k`;
    } else {
      return Math.trunc(value).toString();
    }
  }

  /**
   * Text bar comparing two sides' losses, wrapped in backticks for Discord.
   * The left part is the first side's share. A one-sided or empty fight gives an all-empty bar.
   */
  static makeRatioBar(firstIsk: number, secondIsk: number, length: number = FormatUtils.RATIO_BAR_LENGTH): string {
    const total = firstIsk + secondIsk;
    if (total <= 0 || firstIsk === 0 || secondIsk === 0) {
      return `\`${FormatUtils.EMPTY_BLOCK.repeat(length)}\``;
    }

    const firstBlocks = Math.max(1, Math.min(length - 1, Math.round((firstIsk / total) * length)));
    const secondBlocks = length - firstBlocks;

    return `\`${FormatUtils.FILLED_BLOCK.repeat(firstBlocks)}${FormatUtils.EMPTY_BLOCK.repeat(secondBlocks)}\``;
  }

  /**
   * `1 pilot`, `2 pilots`
   */
  static pluralize(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
  }
}
