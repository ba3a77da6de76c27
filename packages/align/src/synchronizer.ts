/**
 * Bidirectional synchronizer: rewrites two caption tracks until neither has a
 * run of captions sitting inside a single caption of the other.
 */

import { ALIGN_DEFAULTS, renumberCaptions, spanContains, spansEqual } from '@subalign/core';
import type { Caption, CaptionTrack, SynchronizedTrackPair, TimeSpan } from '@subalign/core';

export interface SynchronizeOptions {
  /** Upper bound on rounds; non-convergence is reported, not hidden. */
  maxRounds?: number;
}

export interface AbsorbResult {
  captions: Caption[];
  changed: boolean;
}

function findContainer(reference: CaptionTrack, span: TimeSpan): Caption | undefined {
  return reference.find((candidate) => spanContains(candidate.span, span));
}

/**
 * One pass of `target` against `reference`: each caption contained by a
 * reference caption absorbs the following captions that caption also
 * contains, and the run takes the container's span.
 */
export function absorbContained(target: CaptionTrack, reference: CaptionTrack): AbsorbResult {
  const captions: Caption[] = [];
  let changed = false;
  let idx = 0;

  while (idx < target.length) {
    const caption = target[idx];
    const container = findContainer(reference, caption.span);
    if (!container) {
      captions.push(caption);
      idx += 1;
      continue;
    }

    let end = idx + 1;
    while (end < target.length && spanContains(container.span, target[end].span)) end += 1;

    const run = target.slice(idx, end);
    const text = run
      .map((item) => item.text)
      .filter(Boolean)
      .join(' ');

    if (run.length > 1 || text !== caption.text || !spansEqual(container.span, caption.span)) {
      changed = true;
    }
    captions.push({ ordinal: caption.ordinal, span: container.span, text });
    idx = end;
  }

  return { captions, changed };
}

function violationsOneWay(track: CaptionTrack, reference: CaptionTrack): number {
  let count = 0;
  for (let idx = 1; idx < track.length; idx += 1) {
    const previous = track[idx - 1].span;
    const current = track[idx].span;
    if (reference.some((ref) => spanContains(ref.span, previous) && spanContains(ref.span, current))) {
      count += 1;
    }
  }
  return count;
}

/** Adjacent pairs in either track that both sit inside one caption of the other track. */
export function countContainmentViolations(a: CaptionTrack, b: CaptionTrack): number {
  return violationsOneWay(a, b) + violationsOneWay(b, a);
}

function resolveMaxRounds(maxRounds: number | undefined): number {
  if (typeof maxRounds !== 'number' || !Number.isFinite(maxRounds)) return ALIGN_DEFAULTS.MAX_SYNC_ROUNDS;
  return Math.max(1, Math.floor(maxRounds));
}

export function synchronizeTracks(
  a: CaptionTrack,
  b: CaptionTrack,
  options: SynchronizeOptions = {},
): SynchronizedTrackPair {
  const maxRounds = resolveMaxRounds(options.maxRounds);
  let trackA: CaptionTrack = a;
  let trackB: CaptionTrack = b;
  let rounds = 0;
  let converged = false;

  while (rounds < maxRounds) {
    rounds += 1;
    const passB = absorbContained(trackB, trackA);
    const passA = absorbContained(trackA, passB.captions);
    trackB = passB.captions;
    trackA = passA.captions;

    if (!passB.changed && !passA.changed) {
      converged = true;
      break;
    }
  }

  const outA = renumberCaptions(trackA);
  const outB = renumberCaptions(trackB);
  return {
    a: outA,
    b: outB,
    rounds,
    converged,
    remainingViolations: countContainmentViolations(outA, outB),
  };
}
