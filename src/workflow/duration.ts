import { ValidationError } from '../errors.js';

const UNIT_MS = { ms: 1, s: 1000, m: 60_000, h: 3_600_000, d: 86_400_000 } as const;

/** Longest delay `setTimeout` honours; larger values fire at once. */
export const MAX_TIMER_MS = 2_147_483_647;

function checkTimerRange(ms: number, original: string): number {
  if (ms > MAX_TIMER_MS) {
    throw new ValidationError(`Duration ${original} exceeds the longest supported timer`, [
      { path: 'duration', message: `expected at most ${MAX_TIMER_MS}ms (about 24.8 days)` },
    ]);
  }
  return ms;
}

/**
 * Parse a duration such as "250ms", "90s", "2m", "1h" or "1d" into
 * milliseconds. A bare integer is taken as milliseconds.
 */
export function parseDuration(duration: string): number {
  const match = duration.trim().match(/^(\d+)(ms|s|m|h|d)?$/);
  if (!match || /^0+(ms|s|m|h|d)?$/.test(duration.trim())) {
    throw new ValidationError(`Invalid duration "${duration}"`, [
      { path: 'duration', message: 'expected a positive integer with optional unit ms, s, m, h or d' },
    ]);
  }
  const value = parseInt(match[1], 10);
  const unit = match[2];
  switch (unit) {
    case 'ms':
    case 's':
    case 'm':
    case 'h':
    case 'd':
      return checkTimerRange(value * UNIT_MS[unit], `"${duration}"`);
    default:
      return checkTimerRange(value, `"${duration}"`);
  }
}

/** Milliseconds from a number or a duration string. */
export function toMilliseconds(value: number | string): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ValidationError(`Invalid duration ${value}`, [
        { path: 'duration', message: 'expected a positive number of milliseconds' },
      ]);
    }
    return checkTimerRange(value, String(value));
  }
  return parseDuration(value);
}
