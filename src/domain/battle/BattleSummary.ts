import { BattleWinner, SideAssignment } from '../../shared/enums';

/**
 * Aggregates for one side of a battle
 */
export interface SideTotals {
  /** Affiliation key of the side's main group, or `none` for an empty side */
  readonly key: string;
  readonly label: string;
  /** Affiliation keys on this side, in order of first appearance */
  readonly affiliations: readonly string[];
  readonly iskLost: number;
  readonly shipsLost: number;
  /** Value of the opposing side's losses */
  readonly iskDestroyed: number;
  readonly shipsDestroyed: number;
  readonly pilotCount: number;
  /** Presentation only: the side holds a preferred alliance or corporation */
  readonly isHome: boolean;
}

/**
 * Losses and pilots that could not be placed on either side
 */
export interface ExcludedTotals {
  readonly iskLost: number;
  readonly shipsLost: number;
  readonly pilotCount: number;
}

/**
 * One alliance, corporation or lone pilot as it fought in the battle
 */
export interface AffiliationGroup {
  readonly key: string;
  readonly label: string;
  readonly side: SideAssignment;
  readonly iskLost: number;
  readonly shipsLost: number;
  /** Value of killmails the group took part in as a non-friendly attacker */
  readonly iskDestroyed: number;
  readonly pilotCount: number;
}

export interface BattleSummary {
  readonly sideA: SideTotals;
  readonly sideB: SideTotals;
  readonly winner: BattleWinner;
  readonly totalIsk: number;
  readonly shipsDestroyed: number;
  readonly pilotCount: number;
  readonly excluded: ExcludedTotals;
  readonly skippedKillmails: number;
  /** Participant key -> side */
  readonly assignments: ReadonlyMap<string, SideAssignment>;
  /** Affiliation groups in order of first appearance */
  readonly groups: readonly AffiliationGroup[];
}

/**
 * A summarized battle ready for rendering
 */
export interface BattleReport {
  readonly url: string;
  readonly systemName: string;
  readonly timestamp: string;
  readonly summary: BattleSummary;
}
