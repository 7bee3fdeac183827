import { describe, it, expect } from 'vitest';
import { measureStateDuration, type IntervalOptions, type StateTransition } from '../intervals.ts';
import { days } from '../utils.ts';
import { T0, at } from './helpers.ts';

function options(overrides: Partial<IntervalOptions> = {}): IntervalOptions {
  return {
    createdAt: T0,
    closedAt: null,
    now: at(10),
    ignoreAfterClose: false,
    activeAtCreation: false,
    openIntervalOnClosedItem: 'close-at-closure',
    ...overrides,
  };
}

const enter = (day: number): StateTransition => ({ entered: true, at: at(day) });
const leave = (day: number): StateTransition => ({ entered: false, at: at(day) });

describe('measureStateDuration', () => {
  it('returns null when the state never held', () => {
    expect(measureStateDuration([], options())).toBeNull();
  });

  it('sums disjoint intervals regardless of the gap', () => {
    expect(measureStateDuration([enter(1), leave(3), enter(5), leave(6)], options())).toBe(days(3));
    expect(measureStateDuration([enter(1), leave(3), enter(8), leave(9)], options())).toBe(days(3));
  });

  it('sorts transitions before walking them', () => {
    expect(measureStateDuration([leave(3), enter(1)], options())).toBe(days(2));
  });

  it('closes an open interval at now for an open item', () => {
    expect(measureStateDuration([enter(1)], options({ now: at(4) }))).toBe(days(3));
  });

  it('closes an open interval at closure for a closed item', () => {
    expect(measureStateDuration([enter(1)], options({ closedAt: at(5) }))).toBe(days(4));
  });

  it('gives null for an open interval on a closed item when asked to', () => {
    expect(
      measureStateDuration([enter(1)], options({ closedAt: at(5), openIntervalOnClosedItem: 'unknown' }))
    ).toBeNull();
  });

  it('drops transitions after closure when asked to', () => {
    expect(
      measureStateDuration([enter(5)], options({ closedAt: at(3), ignoreAfterClose: true }))
    ).toBeNull();
  });

  it('starts the state at creation when active from the start', () => {
    expect(measureStateDuration([leave(2)], options({ activeAtCreation: true }))).toBe(days(2));
  });

  it('clips an interval entered before creation', () => {
    expect(measureStateDuration([enter(-1), leave(1)], options())).toBe(days(1));
  });

  it('ignores a repeated enter', () => {
    expect(measureStateDuration([enter(1), enter(2), leave(3)], options())).toBe(days(2));
  });

  it('ignores a leave while inactive', () => {
    expect(measureStateDuration([leave(1), enter(2), leave(3)], options())).toBe(days(1));
  });
});
