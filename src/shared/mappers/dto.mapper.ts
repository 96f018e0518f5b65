/**
 * DTO Mapping Utilities
 * Converts WarBeacon API DTOs (snake_case) into domain objects (camelCase)
 */

import { logger } from '../../lib/logger';
import type { BattleData, BattleLocation, BattleNames, Killmail, Participant } from '../../domain/battle/Killmail';
import { coerceId, coerceIsk } from '../utilities/conversion';
import { BattleDataDto, BattleNamesDto, KillmailDtoSchema, ParticipantDto } from '../schemas/api-responses';

/**
 * Map a victim or attacker DTO to a domain participant
 */
export function mapParticipantDtoToDomain(dto: ParticipantDto): Participant {
  return {
    characterId: coerceId(dto.character_id),
    corporationId: coerceId(dto.corporation_id),
    allianceId: coerceId(dto.alliance_id),
  };
}

/**
 * Map one raw killmail to the domain model.
 * Records that fail validation come back without a victim.
 */
export function mapKillmailDtoToDomain(raw: unknown, index: number): Killmail {
  const parsed = KillmailDtoSchema.safeParse(raw);
  if (!parsed.success) {
    logger.debug({ index, issues: parsed.error.issues }, 'Killmail failed validation');
    return { attackers: [], iskValue: 0 };
  }

  const dto = parsed.data;
  return {
    killmailId: dto.killmail_id,
    victim: dto.victim ? mapParticipantDtoToDomain(dto.victim) : undefined,
    attackers: (dto.attackers ?? []).map(mapParticipantDtoToDomain),
    iskValue: coerceIsk(dto.total_value),
  };
}

function toStringRecord(values: Record<string, unknown> | null | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [id, value] of Object.entries(values ?? {})) {
    if (typeof value === 'string') {
      result[id] = value;
    }
  }
  return result;
}

export function mapNamesDtoToDomain(dto: BattleNamesDto | null | undefined): BattleNames {
  return {
    entities: toStringRecord(dto?.entities),
    tickers: toStringRecord(dto?.tickers),
  };
}

/**
 * Map the `data` section of a WarBeacon response to domain battle data
 */
export function mapBattleDataDtoToDomain(dto: BattleDataDto | null | undefined): BattleData {
  const locations: BattleLocation[] = (dto?.locations ?? []).map(location => ({
    id: location.id,
    name: location.name,
  }));

  return {
    killmails: (dto?.killmails ?? []).map(mapKillmailDtoToDomain),
    names: mapNamesDtoToDomain(dto?.names),
    locations,
  };
}
