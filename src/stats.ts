import type { DaycareResult, SearchStats } from './types.js';

export const WALKING_THRESHOLD_MINUTES = 15;

const NOT_APPLICABLE = 'N/A';

const UNIT_MINUTES = new Map<string, number>([
  ['day', 24 * 60],
  ['days', 24 * 60],
  ['hour', 60],
  ['hours', 60],
  ['min', 1],
  ['mins', 1],
  ['minute', 1],
  ['minutes', 1]
]);

export type DurationFailure = 'missing' | 'not_applicable' | 'malformed';

export type DurationParseResult = { ok: true; minutes: number } | { ok: false; reason: DurationFailure };

/**
 * Parses a travel duration such as `"15 mins"` or `"1 hour 5 mins"` into minutes.
 * The text must be a sequence of `<integer> <unit>` pairs; `"0 mins"` is a valid zero.
 */
export function parseDuration(text: string | null | undefined): DurationParseResult {
  const trimmed = text?.trim() ?? '';
  if (trimmed === '') {
    return { ok: false, reason: 'missing' };
  }
  if (trimmed.toUpperCase() === NOT_APPLICABLE) {
    return { ok: false, reason: 'not_applicable' };
  }

  const tokens = trimmed.toLowerCase().split(/\s+/);
  if (tokens.length % 2 !== 0) {
    return { ok: false, reason: 'malformed' };
  }

  let minutes = 0;
  for (let i = 0; i < tokens.length; i += 2) {
    const amount = tokens[i];
    const unit = UNIT_MINUTES.get(tokens[i + 1]);
    if (!/^\d+$/.test(amount) || unit === undefined) {
      return { ok: false, reason: 'malformed' };
    }
    minutes += Number(amount) * unit;
  }

  return { ok: true, minutes };
}

/** Whole-number percentage; exact halves round to the even neighbour (12.5 -> 12, 37.5 -> 38). */
export function percentOf(count: number, total: number): number {
  if (total <= 0) {
    return 0;
  }
  const percent = (count / total) * 100;
  const rounded = Math.round(percent);
  return Math.abs(percent % 1) === 0.5 && rounded % 2 !== 0 ? rounded - 1 : rounded;
}

export function emptyStats(): SearchStats {
  return {
    total: 0,
    walkingDistance: 0,
    cwelccCount: 0,
    cwelccPercent: 0,
    subsidyCount: 0,
    subsidyPercent: 0,
    totalSpaces: 0
  };
}

export function calculateStats(results: DaycareResult[]): SearchStats {
  if (results.length === 0) {
    return emptyStats();
  }

  const total = results.length;
  const walkingDistance = results.filter((result) => {
    const walk = parseDuration(result.walkTime);
    return walk.ok && walk.minutes <= WALKING_THRESHOLD_MINUTES;
  }).length;
  const cwelccCount = results.filter((result) => result.cwelcc).length;
  const subsidyCount = results.filter((result) => result.subsidy).length;
  const totalSpaces = results.reduce((sum, result) => sum + result.capacity, 0);

  return {
    total,
    walkingDistance,
    cwelccCount,
    cwelccPercent: percentOf(cwelccCount, total),
    subsidyCount,
    subsidyPercent: percentOf(subsidyCount, total),
    totalSpaces
  };
}
