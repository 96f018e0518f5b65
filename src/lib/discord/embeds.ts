import { Colors, EmbedBuilder } from 'discord.js';
import type { BattleReport, BattleSummary, SideTotals } from '../../domain/battle/BattleSummary';
import { NO_OPPONENT_KEY } from '../../domain/battle/sides';
import { BattleWinner } from '../../shared/enums';
import { FormatUtils } from '../../shared/utilities/FormatUtils';

const DIVIDER = '--------------------';

/**
 * The two sides in display order
 */
export interface OrderedSides {
  first: SideTotals;
  second: SideTotals;
}

function winningSide(summary: BattleSummary): SideTotals | undefined {
  switch (summary.winner) {
    case BattleWinner.SIDE_A:
      return summary.sideA;
    case BattleWinner.SIDE_B:
      return summary.sideB;
    case BattleWinner.TIE:
      return undefined;
  }
}

/**
 * The side holding a preferred affiliation, when exactly one does
 */
function homeSide(summary: BattleSummary): SideTotals | undefined {
  if (summary.sideA.isHome === summary.sideB.isHome) return undefined;
  return summary.sideA.isHome ? summary.sideA : summary.sideB;
}

/**
 * Home side first when there is one, otherwise the winner. Side A leads a tie.
 */
export function orderSides(summary: BattleSummary): OrderedSides {
  const { sideA, sideB } = summary;
  const lead = homeSide(summary) ?? winningSide(summary) ?? sideA;
  return lead === sideA ? { first: sideA, second: sideB } : { first: sideB, second: sideA };
}

export function selectEmbedColor(summary: BattleSummary): number {
  if (summary.winner === BattleWinner.TIE) {
    return Colors.DarkGrey;
  }

  const home = homeSide(summary);
  if (home && home !== winningSide(summary)) {
    return Colors.Red;
  }
  return Colors.Green;
}

function labelWithCount(side: SideTotals): string {
  return `${side.label} (${side.pilotCount})`;
}

function sideFieldValue(side: SideTotals): string {
  return [
    `* **ISK lost:** ${FormatUtils.formatIskShort(side.iskLost)}`,
    `* **Ships lost:** ${side.shipsLost}`,
    `* **ISK destroyed:** ${FormatUtils.formatIskShort(side.iskDestroyed)}`,
    `* **Ships destroyed:** ${side.shipsDestroyed}`,
  ].join('\n');
}

export function buildFooterText(summary: BattleSummary): string {
  const winner = winningSide(summary);
  let result = 'Even fight';
  if (winner) {
    result = winner.key === NO_OPPONENT_KEY ? 'Uncontested' : `${winner.label} won`;
  }
  return `${result} | ${FormatUtils.pluralize(summary.pilotCount, 'pilot')} | ${FormatUtils.pluralize(
    summary.shipsDestroyed,
    'ship'
  )} destroyed`;
}

/**
 * Render a battle report as a Discord embed
 */
export function buildBattleEmbed(report: BattleReport): EmbedBuilder {
  const { summary } = report;
  const { first, second } = orderSides(summary);

  const split = [
    `**${labelWithCount(first)}** vs **${labelWithCount(second)}**`,
    FormatUtils.makeRatioBar(first.iskLost, second.iskLost),
    `${FormatUtils.formatIskShort(first.iskLost)} vs ${FormatUtils.formatIskShort(second.iskLost)} ISK lost`,
    DIVIDER,
  ].join('\n');

  const totals = [
    `* **ISK lost:** ${FormatUtils.formatIskShort(summary.totalIsk)}`,
    `* **Ships lost:** ${summary.shipsDestroyed}`,
    `* **Pilots:** ${summary.pilotCount}`,
    DIVIDER,
  ].join('\n');

  return new EmbedBuilder()
    .setTitle(`Battle Report - ${report.systemName}`)
    .setURL(report.url)
    .setColor(selectEmbedColor(summary))
    .setDescription(`${report.timestamp}\n${DIVIDER}`)
    .addFields(
      { name: 'ISK Loss Split', value: split, inline: false },
      { name: 'Totals', value: totals, inline: false },
      { name: labelWithCount(first), value: sideFieldValue(first), inline: true },
      { name: labelWithCount(second), value: sideFieldValue(second), inline: true }
    )
    .setFooter({ text: buildFooterText(summary) });
}
