import type { TimeSpan } from '../types';

function isMillis(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/** Returns null unless both bounds are non-negative integers with start <= end. */
export function createTimeSpan(startMs: number, endMs: number): TimeSpan | null {
  if (!isMillis(startMs) || !isMillis(endMs) || startMs > endMs) return null;
  return { startMs, endMs };
}

export function spanContains(outer: TimeSpan, inner: TimeSpan): boolean {
  return outer.startMs <= inner.startMs && inner.endMs <= outer.endMs;
}

export function spansEqual(left: TimeSpan, right: TimeSpan): boolean {
  return left.startMs === right.startMs && left.endMs === right.endMs;
}
