import { ValidatedConfiguration } from '../config/validated';
import type { BattleReportsConfig } from '../config/types';
import type { BattleLink } from '../domain/battle/BattleLink';
import type { BattleReport, BattleSummary, SideTotals } from '../domain/battle/BattleSummary';
import type { BattleData, BattleLocation } from '../domain/battle/Killmail';
import { computeBattleSummary } from '../domain/battle/sides';
import { BattleDataSource, WarBeaconClient } from '../infrastructure/http/WarBeaconClient';
import { logger } from '../lib/logger';
import { BattleLinkMode, SideAssignment } from '../shared/enums';
import { formatBattleDate } from '../shared/utilities/time';

const UNKNOWN_SYSTEM = 'Unknown System';
const MULTIPLE_SYSTEMS = 'Multiple Systems';
const COMBINED_REPORT = 'Combined Report';

/**
 * Turns a battle link into a rendered-ready report
 */
export interface BattleReportProvider {
  buildReport(link: BattleLink, signal?: AbortSignal): Promise<BattleReport>;
}

function firstLocationName(locations: readonly BattleLocation[]): string {
  return locations[0]?.name || UNKNOWN_SYSTEM;
}

/**
 * Display name of the system a battle was fought in
 */
export function resolveSystemName(link: BattleLink, locations: readonly BattleLocation[]): string {
  if (link.mode === BattleLinkMode.MULTI_SYSTEM && locations.length > 1) {
    return MULTIPLE_SYSTEMS;
  }
  return firstLocationName(locations);
}

export function resolveTimestamp(link: BattleLink): string {
  return link.mode === BattleLinkMode.SINGLE_SYSTEM ? formatBattleDate(link.timestamp) : COMBINED_REPORT;
}

function pilotsBySide(summary: BattleSummary): Record<SideAssignment, string[]> {
  const pilots: Record<SideAssignment, string[]> = {
    [SideAssignment.SIDE_A]: [],
    [SideAssignment.SIDE_B]: [],
    [SideAssignment.EXCLUDED]: [],
  };
  for (const [participantKey, assignment] of summary.assignments) {
    pilots[assignment].push(participantKey);
  }
  return pilots;
}

function describeSide(side: SideTotals, pilots: readonly string[]) {
  return {
    label: side.label,
    affiliations: side.affiliations,
    pilotCount: side.pilotCount,
    pilots,
    iskLost: side.iskLost,
    shipsLost: side.shipsLost,
    isHome: side.isHome,
  };
}

export class BattleReportService implements BattleReportProvider {
  constructor(
    private readonly source: BattleDataSource,
    private readonly settings: BattleReportsConfig
  ) {}

  static fromConfig(): BattleReportService {
    return new BattleReportService(WarBeaconClient.fromConfig(), ValidatedConfiguration.battleReports);
  }

  async buildReport(link: BattleLink, signal?: AbortSignal): Promise<BattleReport> {
    const data = await this.source.fetchBattle(link, signal);
    const summary = computeBattleSummary(data.killmails, this.settings.preferred, data.names);

    if (this.settings.debug) {
      this.logRawBattle(link, data, summary);
      this.logFinalTeams(link, summary);
    }

    return {
      url: link.url,
      systemName: resolveSystemName(link, data.locations),
      timestamp: resolveTimestamp(link),
      summary,
    };
  }

  private logRawBattle(link: BattleLink, data: BattleData, summary: BattleSummary): void {
    logger.debug(
      {
        url: link.url,
        killmails: data.killmails.length,
        locations: data.locations,
        entities: Object.keys(data.names.entities).length,
        tickers: Object.keys(data.names.tickers).length,
        groups: summary.groups,
      },
      'Raw battle data from WarBeacon'
    );
  }

  private logFinalTeams(link: BattleLink, summary: BattleSummary): void {
    const pilots = pilotsBySide(summary);
    logger.debug(
      {
        url: link.url,
        sideA: describeSide(summary.sideA, pilots[SideAssignment.SIDE_A]),
        sideB: describeSide(summary.sideB, pilots[SideAssignment.SIDE_B]),
        excluded: { ...summary.excluded, pilots: pilots[SideAssignment.EXCLUDED] },
        skippedKillmails: summary.skippedKillmails,
        totalPilots: summary.pilotCount,
        winner: summary.winner,
      },
      'Final teams'
    );
  }
}
