// config/timing.ts - Centralized Timing Constants

// =============================================================================
// DURATION PARSING
// =============================================================================

export function parseDuration(value: string): number {
  const match = value.trim().match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i);
  if (!match) throw new Error(`Invalid duration: ${value}`);
  const [, num, unit] = match;
  const n = parseFloat(num ?? '');
  switch ((unit ?? '').toLowerCase()) {
    case 'ms':
      return n;
    case 's':
      return n * 1000;
    case 'm':
      return n * 60_000;
    case 'h':
      return n * 3_600_000;
    case 'd':
      return n * 86_400_000;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

// =============================================================================
// TIMING CONSTANTS
// =============================================================================

export const MS_PER_HOUR = 3_600_000;

/** AWS bills storage per GB-month over a 730-hour month. */
export const HOURS_PER_MONTH = 730;

export const TIMING = {
  PRICE_REFRESH_INTERVAL_MS: 24 * MS_PER_HOUR,
  SPOT_PRICE_LOOKBACK_MS: MS_PER_HOUR,
} as const;

/** Convert a duration to (fractional) hours. */
export function toHours(durationMs: number): number {
  return durationMs / MS_PER_HOUR;
}
