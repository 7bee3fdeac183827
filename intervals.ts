import type { Duration } from './types.ts';
import { durationBetween } from './utils.ts';

export interface StateTransition {
  entered: boolean;
  at: Date;
}

export interface IntervalOptions {
  createdAt: Date;
  closedAt: Date | null;
  now: Date;
  /** Transitions after closedAt are dropped as if they never happened */
  ignoreAfterClose: boolean;
  /** Treat the state as held from createdAt before the first transition */
  activeAtCreation: boolean;
  /**
   * What to do with an interval still open at the end: close it at closedAt
   * (or now while the item is open), or give up with null once the item is
   * closed.
   */
  openIntervalOnClosedItem: 'close-at-closure' | 'unknown';
}

/**
 * Sum the wall-clock time a boolean state held, given its enter/leave
 * transitions. Returns null when the state never held at all.
 */
export function measureStateDuration(
  transitions: StateTransition[],
  options: IntervalOptions
): Duration | null {
  const { createdAt, closedAt, now } = options;

  const considered = transitions
    .filter(t => !(options.ignoreAfterClose && closedAt && t.at > closedAt))
    .sort((a, b) => a.at.getTime() - b.at.getTime());

  let total: Duration | null = null;
  let openSince: Date | null = options.activeAtCreation ? createdAt : null;
  if (openSince) total = 0;

  for (const transition of considered) {
    if (transition.entered && openSince === null) {
      openSince = transition.at < createdAt ? createdAt : transition.at;
      total = total ?? 0;
    } else if (!transition.entered && openSince !== null) {
      total = (total ?? 0) + durationBetween(openSince, transition.at);
      openSince = null;
    }
  }

  if (openSince !== null) {
    if (closedAt) {
      if (options.openIntervalOnClosedItem === 'unknown') return null;
      total = (total ?? 0) + durationBetween(openSince, closedAt);
    } else {
      total = (total ?? 0) + durationBetween(openSince, now);
    }
  }

  return total;
}
