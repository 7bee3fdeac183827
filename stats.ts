import type { Duration, MetricRecord, StatSummary } from './types.ts';
import { calculateStats, roundHalfEven } from './utils.ts';

/**
 * Reduce per-item durations to avg/med/p90, each rounded to whole seconds.
 * Absent values are skipped; returns null when nothing is left.
 */
export function summarizeDurations(values: Array<Duration | null>): StatSummary | null {
  const seconds = values
    .filter((value): value is Duration => value !== null)
    .map(value => value / 1000);

  const stats = calculateStats(seconds);
  if (!stats) return null;

  return {
    avg: roundHalfEven(stats.mean) * 1000,
    med: roundHalfEven(stats.median) * 1000,
    p90: roundHalfEven(stats.p90) * 1000,
  };
}

/**
 * Same reduction for plain counts, rounded to one decimal
 */
export function summarizeCounts(values: Array<number | null>): StatSummary | null {
  const stats = calculateStats(values.filter((value): value is number => value !== null));
  if (!stats) return null;

  return {
    avg: roundHalfEven(stats.mean, 1),
    med: roundHalfEven(stats.median, 1),
    p90: roundHalfEven(stats.p90, 1),
  };
}

type DurationField = 'timeToFirstResponse' | 'timeToClose' | 'timeToAnswer' | 'timeInDraft';

export function getStatsFor(records: MetricRecord[], field: DurationField): StatSummary | null {
  return summarizeDurations(records.map(record => record[field]));
}
