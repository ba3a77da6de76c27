import type { Caption, CaptionTrack } from '../types';
import { normalizeCaptionText } from './text';

export function renumberCaptions(captions: CaptionTrack): Caption[] {
  return captions.map((caption, idx) => ({ ...caption, ordinal: idx + 1 }));
}

/**
 * Collapse runs of adjacent captions whose normalized text is identical into
 * one caption spanning from the first start to the furthest end.
 */
export function mergeConsecutiveDuplicates(captions: CaptionTrack): Caption[] {
  const merged: Caption[] = [];
  let current: Caption | null = null;

  for (const caption of captions) {
    const text = normalizeCaptionText(caption.text);

    if (current && current.text === text) {
      const prev: Caption = current;
      current = {
        ...prev,
        span: {
          startMs: current.span.startMs,
          endMs: Math.max(current.span.endMs, caption.span.endMs),
        },
      };
      continue;
    }

    if (current) merged.push(current);
    current = { ordinal: 0, span: caption.span, text };
  }

  if (current) merged.push(current);
  return renumberCaptions(merged);
}
