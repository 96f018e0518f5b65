/**
 * Common conversion utilities for raw API and environment values
 */

/**
 * Coerce an EVE entity id (number or numeric string) to an integer
 */
export function coerceId(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!/^-?\d+$/.test(trimmed)) return undefined;
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Coerce an ISK amount to a finite number, defaulting to 0
 */
export function coerceIsk(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/**
 * Parse a comma-separated list of integer ids.
 * Invalid entries are reported through `onInvalid` and skipped.
 */
export function parseIdList(value: string | undefined, onInvalid?: (item: string) => void): Set<number> {
  const result = new Set<number>();
  if (!value) return result;

  for (const item of value.split(',')) {
    const trimmed = item.trim();
    if (!trimmed) continue;

    const id = coerceId(trimmed);
    if (id === undefined) {
      onInvalid?.(trimmed);
      continue;
    }
    result.add(id);
  }

  return result;
}
