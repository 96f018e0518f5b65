import type { PreferredAffiliations } from '../../config/types';
import { logger } from '../../lib/logger';
import { BattleWinner, SideAssignment } from '../../shared/enums';
import { EmptyBattleError, MalformedKillmailError } from '../../shared/errors';
import type { AffiliationGroup, BattleSummary, ExcludedTotals, SideTotals } from './BattleSummary';
import {
  affiliationKeyOf,
  BattleNames,
  EMPTY_NAMES,
  Killmail,
  labelForAffiliation,
  Participant,
  participantKeyOf,
} from './Killmail';
import { SideDisjointSet, SideRoot } from './SideDisjointSet';

interface ResolvedParticipant {
  participantKey: string;
  affiliationKey: string;
  preferred: boolean;
}

interface ResolvedKillmail {
  index: number;
  victim: ResolvedParticipant;
  attackers: ResolvedParticipant[];
  iskValue: number;
}

interface SideAccumulator {
  iskLost: number;
  shipsLost: number;
  pilotCount: number;
  /** affiliation key -> pilots whose first sighting was under it */
  affiliations: Map<string, number>;
}

interface GroupAccumulator {
  iskLost: number;
  shipsLost: number;
  iskDestroyed: number;
  pilotCount: number;
}

export const NO_OPPONENT_KEY = 'none';
const NO_OPPONENT_LABEL = 'No Opponent';

function isPreferred(participant: Participant, preferred: PreferredAffiliations): boolean {
  return (
    (participant.allianceId !== undefined && preferred.allianceIds.has(participant.allianceId)) ||
    (participant.corporationId !== undefined && preferred.corporationIds.has(participant.corporationId))
  );
}

function resolveParticipant(
  participant: Participant,
  preferred: PreferredAffiliations
): ResolvedParticipant | undefined {
  const affiliationKey = affiliationKeyOf(participant);
  const participantKey = participantKeyOf(participant);
  if (affiliationKey === undefined || participantKey === undefined) return undefined;

  return { participantKey, affiliationKey, preferred: isPreferred(participant, preferred) };
}

function resolveKillmail(killmail: Killmail, index: number, preferred: PreferredAffiliations): ResolvedKillmail {
  if (!killmail.victim) {
    throw new MalformedKillmailError(index, 'missing_victim', killmail.killmailId);
  }

  const victim = resolveParticipant(killmail.victim, preferred);
  if (!victim) {
    throw new MalformedKillmailError(index, 'missing_affiliation', killmail.killmailId);
  }

  const attackers = killmail.attackers
    .map(attacker => resolveParticipant(attacker, preferred))
    .filter((attacker): attacker is ResolvedParticipant => attacker !== undefined);

  return { index, victim, attackers, iskValue: killmail.iskValue };
}

/**
 * Put every attacker opposite the victim it shot, in killmail order
 */
function linkSides(killmails: readonly ResolvedKillmail[]): SideDisjointSet {
  const sides = new SideDisjointSet();

  for (const killmail of killmails) {
    const victimKey = killmail.victim.affiliationKey;
    sides.add(victimKey);

    for (const attacker of killmail.attackers) {
      // Friendly fire does not say anything about sides
      if (attacker.affiliationKey === victimKey) continue;

      if (!sides.separate(victimKey, attacker.affiliationKey)) {
        logger.debug(
          { killmail: killmail.index, victim: victimKey, attacker: attacker.affiliationKey },
          'Ignoring side link that contradicts an earlier assignment'
        );
      }
    }
  }

  return sides;
}

/**
 * Placement of the side A anchor: the first victim of the component that lost the most ISK
 */
function findAnchor(killmails: readonly ResolvedKillmail[], sides: SideDisjointSet): SideRoot {
  const lossByRoot = new Map<string, number>();
  const firstVictimByRoot = new Map<string, string>();

  for (const killmail of killmails) {
    const { root } = sides.find(killmail.victim.affiliationKey);
    lossByRoot.set(root, (lossByRoot.get(root) ?? 0) + killmail.iskValue);
    if (!firstVictimByRoot.has(root)) {
      firstVictimByRoot.set(root, killmail.victim.affiliationKey);
    }
  }

  let mainRoot: string | undefined;
  let mainLoss = -Infinity;
  for (const [root, loss] of lossByRoot) {
    if (loss > mainLoss) {
      mainRoot = root;
      mainLoss = loss;
    }
  }

  const anchorKey =
    mainRoot === undefined ? killmails[0].victim.affiliationKey : (firstVictimByRoot.get(mainRoot) ?? mainRoot);
  return sides.find(anchorKey);
}

function emptyAccumulator(): SideAccumulator {
  return { iskLost: 0, shipsLost: 0, pilotCount: 0, affiliations: new Map() };
}

function primaryAffiliation(affiliations: Map<string, number>): string | undefined {
  let primary: string | undefined;
  let mostPilots = -1;
  for (const [key, pilots] of affiliations) {
    if (pilots > mostPilots) {
      primary = key;
      mostPilots = pilots;
    }
  }
  return primary;
}

function toSideTotals(
  own: SideAccumulator,
  opponent: SideAccumulator,
  homeAffiliations: ReadonlySet<string>,
  names: BattleNames
): SideTotals {
  const affiliations = [...own.affiliations.keys()];
  const primary = primaryAffiliation(own.affiliations);

  let label = NO_OPPONENT_LABEL;
  if (primary !== undefined) {
    label = labelForAffiliation(primary, names);
    if (affiliations.length > 1) {
      label = `${label} +${affiliations.length - 1}`;
    }
  }

  return {
    key: primary ?? NO_OPPONENT_KEY,
    label,
    affiliations,
    iskLost: own.iskLost,
    shipsLost: own.shipsLost,
    iskDestroyed: opponent.iskLost,
    shipsDestroyed: opponent.shipsLost,
    pilotCount: own.pilotCount,
    isHome: affiliations.some(key => homeAffiliations.has(key)),
  };
}

function emptyGroup(): GroupAccumulator {
  return { iskLost: 0, shipsLost: 0, iskDestroyed: 0, pilotCount: 0 };
}

function decideWinner(sideA: SideTotals, sideB: SideTotals): BattleWinner {
  if (sideA.iskDestroyed > sideB.iskDestroyed) return BattleWinner.SIDE_A;
  if (sideB.iskDestroyed > sideA.iskDestroyed) return BattleWinner.SIDE_B;
  return BattleWinner.TIE;
}

/**
 * Split a battle's participants into two sides and decide who came out ahead.
 *
 * Attackers are placed opposite their victims; placements propagate
 * transitively across killmails and the first placement of an affiliation
 * wins. Groups never linked to the main fight are excluded from both sides
 * but still count towards the battle totals.
 *
 * @throws EmptyBattleError when there is no usable killmail
 */
export function computeBattleSummary(
  killmails: readonly Killmail[],
  preferred: PreferredAffiliations,
  names: BattleNames = EMPTY_NAMES
): BattleSummary {
  if (killmails.length === 0) {
    throw new EmptyBattleError(0, 0);
  }

  const usable: ResolvedKillmail[] = [];
  killmails.forEach((killmail, index) => {
    try {
      usable.push(resolveKillmail(killmail, index, preferred));
    } catch (error) {
      if (!(error instanceof MalformedKillmailError)) throw error;
      logger.warn({ error: error.toJSON() }, 'Skipping malformed killmail');
    }
  });

  const skippedKillmails = killmails.length - usable.length;
  if (usable.length === 0) {
    throw new EmptyBattleError(killmails.length, skippedKillmails);
  }

  const sides = linkSides(usable);
  const anchor = findAnchor(usable, sides);

  const sideOf = (affiliationKey: string): SideAssignment => {
    const placement = sides.find(affiliationKey);
    if (placement.root !== anchor.root) return SideAssignment.EXCLUDED;
    return placement.opposite === anchor.opposite ? SideAssignment.SIDE_A : SideAssignment.SIDE_B;
  };

  const totals: Record<SideAssignment, SideAccumulator> = {
    [SideAssignment.SIDE_A]: emptyAccumulator(),
    [SideAssignment.SIDE_B]: emptyAccumulator(),
    [SideAssignment.EXCLUDED]: emptyAccumulator(),
  };

  const participantAffiliation = new Map<string, string>();
  const homeAffiliations = new Set<string>();
  const groups = new Map<string, GroupAccumulator>();
  const groupOf = (affiliationKey: string): GroupAccumulator => {
    let group = groups.get(affiliationKey);
    if (!group) {
      group = emptyGroup();
      groups.set(affiliationKey, group);
    }
    return group;
  };
  let totalIsk = 0;

  for (const killmail of usable) {
    const victimKey = killmail.victim.affiliationKey;
    const victimSide = totals[sideOf(victimKey)];
    victimSide.iskLost += killmail.iskValue;
    victimSide.shipsLost += 1;
    totalIsk += killmail.iskValue;

    const victimGroup = groupOf(victimKey);
    victimGroup.iskLost += killmail.iskValue;
    victimGroup.shipsLost += 1;

    const shooters = new Set(
      killmail.attackers.map(attacker => attacker.affiliationKey).filter(key => key !== victimKey)
    );
    for (const shooter of shooters) {
      groupOf(shooter).iskDestroyed += killmail.iskValue;
    }

    for (const participant of [killmail.victim, ...killmail.attackers]) {
      groupOf(participant.affiliationKey);
      const side = totals[sideOf(participant.affiliationKey)];
      if (!side.affiliations.has(participant.affiliationKey)) {
        side.affiliations.set(participant.affiliationKey, 0);
      }
      if (!participantAffiliation.has(participant.participantKey)) {
        participantAffiliation.set(participant.participantKey, participant.affiliationKey);
      }
      if (participant.preferred) {
        homeAffiliations.add(participant.affiliationKey);
      }
    }
  }

  const assignments = new Map<string, SideAssignment>();
  for (const [participantKey, affiliationKey] of participantAffiliation) {
    const assignment = sideOf(affiliationKey);
    const side = totals[assignment];
    side.pilotCount += 1;
    side.affiliations.set(affiliationKey, (side.affiliations.get(affiliationKey) ?? 0) + 1);
    groupOf(affiliationKey).pilotCount += 1;
    assignments.set(participantKey, assignment);
  }

  const a = totals[SideAssignment.SIDE_A];
  const b = totals[SideAssignment.SIDE_B];
  const sideA = toSideTotals(a, b, homeAffiliations, names);
  const sideB = toSideTotals(b, a, homeAffiliations, names);

  const excludedTotals = totals[SideAssignment.EXCLUDED];
  const excluded: ExcludedTotals = {
    iskLost: excludedTotals.iskLost,
    shipsLost: excludedTotals.shipsLost,
    pilotCount: excludedTotals.pilotCount,
  };

  return {
    sideA,
    sideB,
    winner: decideWinner(sideA, sideB),
    totalIsk,
    shipsDestroyed: usable.length,
    pilotCount: participantAffiliation.size,
    excluded,
    skippedKillmails,
    assignments,
    groups: [...groups].map(
      ([key, group]): AffiliationGroup => ({
        key,
        label: labelForAffiliation(key, names),
        side: sideOf(key),
        ...group,
      })
    ),
  };
}
