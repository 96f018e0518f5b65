/**
 * Domain model for killmails as they arrive from a battle report
 */

/**
 * A pilot (or structure/NPC) appearing on a killmail
 */
export interface Participant {
  readonly characterId?: number;
  readonly corporationId?: number;
  readonly allianceId?: number;
}

/**
 * One ship destruction. `victim` is absent when the source record was unreadable.
 */
export interface Killmail {
  readonly killmailId?: number;
  readonly victim?: Participant;
  readonly attackers: readonly Participant[];
  readonly iskValue: number;
}

/**
 * Display names for alliances, corporations and characters, keyed by id
 */
export interface BattleNames {
  readonly entities: Readonly<Record<string, string>>;
  readonly tickers: Readonly<Record<string, string>>;
}

export interface BattleLocation {
  readonly id?: number;
  readonly name?: string;
}

/**
 * Everything a battle report fetch yields
 */
export interface BattleData {
  readonly killmails: readonly Killmail[];
  readonly names: BattleNames;
  readonly locations: readonly BattleLocation[];
}

export const EMPTY_NAMES: BattleNames = { entities: {}, tickers: {} };

/**
 * Key of the group a participant fights for: alliance, then corporation, then character.
 * Encoded as `a:<id>`, `c:<id>` or `p:<id>`.
 */
export function affiliationKeyOf(participant: Participant): string | undefined {
  if (participant.allianceId !== undefined) return `a:${participant.allianceId}`;
  if (participant.corporationId !== undefined) return `c:${participant.corporationId}`;
  if (participant.characterId !== undefined) return `p:${participant.characterId}`;
  return undefined;
}

/**
 * Identity of a participant: character, then corporation, then alliance
 */
export function participantKeyOf(participant: Participant): string | undefined {
  if (participant.characterId !== undefined) return `p:${participant.characterId}`;
  if (participant.corporationId !== undefined) return `c:${participant.corporationId}`;
  if (participant.allianceId !== undefined) return `a:${participant.allianceId}`;
  return undefined;
}

/**
 * Human-readable label for an affiliation key: ticker, then name, then raw id
 */
export function labelForAffiliation(key: string, names: BattleNames): string {
  const id = key.slice(key.indexOf(':') + 1);
  if (!/^-?\d+$/.test(id)) return 'Unknown';

  return names.tickers[id] || names.entities[id] || `ID ${id}`;
}
