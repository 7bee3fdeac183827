import type { Duration } from './types.ts';

const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Milliseconds elapsed from start to end (negative if end precedes start)
 */
export function durationBetween(start: Date, end: Date): Duration {
  return end.getTime() - start.getTime();
}

export function days(count: number): Duration {
  return count * SECONDS_PER_DAY * 1000;
}

/**
 * Round half to even
 */
export function roundHalfEven(value: number, decimals = 0): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let rounded: number;
  if (Math.abs(diff - 0.5) < 1e-9) {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  } else {
    rounded = Math.round(scaled);
  }
  return rounded / factor;
}

/**
 * Linear-interpolation percentile over an ascending list, p in [0, 1]
 */
export function percentile(sorted: number[], p: number): number {
  const index = (sorted.length - 1) * p;
  const lower = Math.floor(index);
  const upper = Math.ceil(index);

  if (lower === upper) {
    return sorted[lower];
  }

  return sorted[lower] + (sorted[upper] - sorted[lower]) * (index - lower);
}

/**
 * Calculate mean, median and 90th percentile, or null for an empty list
 */
export function calculateStats(values: number[]): {
  mean: number;
  median: number;
  p90: number;
} | null {
  if (values.length === 0) {
    return null;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, val) => acc + val, 0);

  return {
    mean: sum / sorted.length,
    median: percentile(sorted, 0.5),
    p90: percentile(sorted, 0.9),
  };
}

/**
 * Format a duration as "D days, H:MM:SS", or "None" when absent
 */
export function formatDuration(duration: Duration | null): string {
  if (duration === null) return 'None';

  const totalSeconds = Math.floor(duration / 1000);
  const wholeDays = Math.floor(totalSeconds / SECONDS_PER_DAY);
  const rest = totalSeconds - wholeDays * SECONDS_PER_DAY;

  const hours = Math.floor(rest / 3600);
  const minutes = Math.floor((rest % 3600) / 60);
  const seconds = rest % 60;
  const clock = `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;

  if (wholeDays === 0) return clock;
  return `${wholeDays} ${Math.abs(wholeDays) === 1 ? 'day' : 'days'}, ${clock}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[] = process.argv.slice(2)): {
  envFile: string;
  query: string | null;
} {
  let envFile = '.env';
  let query: string | null = null;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--env-file' && args[i + 1]) {
      envFile = args[i + 1];
      i++;
    } else if (args[i] === '--query' && args[i + 1]) {
      query = args[i + 1];
      i++;
    }
  }

  return { envFile, query };
}
