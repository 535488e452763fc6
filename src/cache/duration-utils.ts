import type { Duration } from './cache-interfaces.js';

const DURATION_MULTIPLIERS = {
  s: 1000,
  m: 60000,
  h: 3600000,
  d: 86400000,
  w: 604800000,
} as const;

type DurationUnit = keyof typeof DURATION_MULTIPLIERS;

const isDurationUnit = (value: string): value is DurationUnit => value in DURATION_MULTIPLIERS;

/**
 * Parses a human-readable duration into milliseconds.
 * @param duration - Milliseconds, or a string such as '30s', '10m', '2h', '1d', '1w'
 * @returns Duration in milliseconds
 * @throws Error if the format is invalid
 *
 * @example
 * parseDuration(60000) // 60000
 * parseDuration('30s') // 30000
 * parseDuration('2h')  // 7200000
 */
export function parseDuration(duration: Duration): number {
  if (typeof duration === 'number') {
    if (!Number.isFinite(duration) || duration < 0) {
      throw new Error(`Invalid duration: ${duration}. Expected a non-negative number of milliseconds.`);
    }
    return duration;
  }

  const match = /^(\d+)([smhdw])$/.exec(duration);
  const unit = match?.[2];

  if (!match || unit === undefined || !isDurationUnit(unit)) {
    throw new Error(
      `Invalid duration format: "${duration}". ` +
      `Use formats like '30s', '10m', '2h', '1d', '1w' or a number in milliseconds.`
    );
  }

  return parseInt(match[1], 10) * DURATION_MULTIPLIERS[unit];
}

/**
 * Checks whether a value is a valid duration.
 */
export function isValidDuration(value: unknown): value is Duration {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0;
  }
  if (typeof value === 'string') {
    return /^\d+[smhdw]$/.test(value);
  }
  return false;
}
