/**
 * Cross-track matcher: best-effort, primary-driven join of two caption tracks
 * by tolerance-expanded temporal overlap.
 */

import { ALIGN_DEFAULTS } from '@subalign/core';
import type { Caption, CaptionTrack, MatchedPair, TimeSpan } from '@subalign/core';

interface Interval {
  start: number;
  end: number;
}

function expand(span: TimeSpan, toleranceMs: number): Interval {
  return { start: span.startMs - toleranceMs, end: span.endMs + toleranceMs };
}

/** True when the two spans, each widened by the tolerance, are not disjoint. */
export function spansClose(left: TimeSpan, right: TimeSpan, toleranceMs: number): boolean {
  const a = expand(left, toleranceMs);
  const b = expand(right, toleranceMs);
  return !(a.end < b.start || b.end < a.start);
}

/** Overlap over union of the tolerance-expanded spans. */
export function overlapScore(left: TimeSpan, right: TimeSpan, toleranceMs: number): number {
  const a = expand(left, toleranceMs);
  const b = expand(right, toleranceMs);
  const overlap = Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));
  const union = Math.max(a.end, b.end) - Math.min(a.start, b.start);
  return union > 0 ? overlap / union : 0;
}

/**
 * Move the secondary cursor past captions that end before `span` can reach
 * them. Only ever moves forward; the caller threads the result into the next
 * call.
 */
export function advanceCursor(
  secondary: CaptionTrack,
  cursor: number,
  span: TimeSpan,
  toleranceMs: number,
): number {
  let next = cursor;
  while (next < secondary.length && secondary[next].span.endMs + toleranceMs < span.startMs - toleranceMs) {
    next += 1;
  }
  return next;
}

function pickBestCandidate(
  secondary: CaptionTrack,
  cursor: number,
  primary: Caption,
  toleranceMs: number,
): { caption: Caption | null; score: number } {
  const reach = primary.span.endMs + toleranceMs;
  let best: Caption | null = null;
  let bestScore = -1;

  for (let idx = cursor; idx < secondary.length; idx += 1) {
    const candidate = secondary[idx];
    if (candidate.span.startMs - toleranceMs > reach) break;
    if (!spansClose(primary.span, candidate.span, toleranceMs)) continue;

    // Strictly greater: on equal scores the earliest candidate stays.
    const score = overlapScore(primary.span, candidate.span, toleranceMs);
    if (score > bestScore) {
      bestScore = score;
      best = candidate;
    }
  }

  return { caption: best, score: best ? bestScore : 0 };
}

/** NaN and negatives clamp to 0, values past the safe-integer range to its top. */
function normalizeTolerance(toleranceMs: number): number {
  if (Number.isNaN(toleranceMs)) return 0;
  return Math.min(Number.MAX_SAFE_INTEGER, Math.max(0, Math.floor(toleranceMs)));
}

/** One entry per primary caption, in primary order. */
export function matchTracks(
  primary: CaptionTrack,
  secondary: CaptionTrack,
  toleranceMs: number = ALIGN_DEFAULTS.TOLERANCE_MS,
): MatchedPair[] {
  const tolerance = normalizeTolerance(toleranceMs);
  const pairs: MatchedPair[] = [];
  let cursor = 0;

  for (const caption of primary) {
    cursor = advanceCursor(secondary, cursor, caption.span, tolerance);
    const best = pickBestCandidate(secondary, cursor, caption, tolerance);
    pairs.push({ primary: caption, secondary: best.caption, score: best.score });
  }

  return pairs;
}

export function countMatched(pairs: readonly MatchedPair[]): number {
  return pairs.reduce((count, pair) => (pair.secondary ? count + 1 : count), 0);
}
