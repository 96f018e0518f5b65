/**
 * Helpers for WarBeacon "related" timestamps (YYYYMMDDHHMM, UTC)
 */

import { UTCDate } from '@date-fns/utc';
import { format, isValid, parse } from 'date-fns';

const RELATED_TIME_FORMAT = 'yyyyMMddHHmm';

/**
 * Parse a related timestamp as UTC. Returns null when it is not a real calendar time.
 */
export function parseRelatedTime(value: string): Date | null {
  if (!/^\d{12}$/.test(value)) return null;

  const parsed = parse(value, RELATED_TIME_FORMAT, new UTCDate(0));
  return isValid(parsed) ? parsed : null;
}

function requireRelatedTime(value: string): Date {
  const parsed = parseRelatedTime(value);
  if (!parsed) {
    throw new RangeError(`Invalid related time: ${value}`);
  }
  return parsed;
}

/**
 * '202512030400' -> '2025-12-03T04:00:00Z'
 */
export function relatedTimeToIso(value: string): string {
  return format(requireRelatedTime(value), "yyyy-MM-dd'T'HH:mm:00'Z'");
}

/**
 * '202512030400' -> '12/03/2025'
 */
export function formatBattleDate(value: string): string {
  return format(requireRelatedTime(value), 'MM/dd/yyyy');
}
