/**
 * WarBeacon API response validation schemas
 * Using Zod for runtime type validation and TypeScript inference
 */

import { z } from 'zod';

/**
 * Ids arrive as numbers, occasionally as numeric strings
 */
const EntityIdSchema = z.union([z.number(), z.string()]).nullish();

/**
 * A victim or attacker on a killmail
 */
export const ParticipantDtoSchema = z
  .object({
    character_id: EntityIdSchema,
    corporation_id: EntityIdSchema,
    alliance_id: EntityIdSchema,
  })
  .passthrough();

/**
 * A single killmail. Validated one at a time so one bad record does not sink the report.
 */
export const KillmailDtoSchema = z
  .object({
    killmail_id: z.number().optional(),
    total_value: z.union([z.number(), z.string()]).nullish(),
    victim: ParticipantDtoSchema.nullish(),
    attackers: z.array(ParticipantDtoSchema).nullish(),
  })
  .passthrough();

export const BattleNamesDtoSchema = z
  .object({
    entities: z.record(z.unknown()).nullish(),
    tickers: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export const BattleLocationDtoSchema = z
  .object({
    id: z.number().optional(),
    name: z.string().optional(),
  })
  .passthrough();

export const BattleDataDtoSchema = z
  .object({
    killmails: z.array(z.unknown()).nullish(),
    names: BattleNamesDtoSchema.nullish(),
    locations: z.array(BattleLocationDtoSchema).nullish(),
  })
  .passthrough();

/**
 * Envelope returned by both the related and report endpoints
 */
export const WarBeaconResponseSchema = z
  .object({
    success: z.boolean(),
    data: BattleDataDtoSchema.nullish(),
  })
  .passthrough();

export type ParticipantDto = z.infer<typeof ParticipantDtoSchema>;
export type KillmailDto = z.infer<typeof KillmailDtoSchema>;
export type BattleNamesDto = z.infer<typeof BattleNamesDtoSchema>;
export type BattleDataDto = z.infer<typeof BattleDataDtoSchema>;
export type WarBeaconResponse = z.infer<typeof WarBeaconResponseSchema>;
