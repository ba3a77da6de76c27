import { normalizeText } from '@subalign/core';
import type { CaptionTrack } from '@subalign/core';
import { formatSrtTimeRange } from './timestamp';

/**
 * Serialize captions as SubRip, numbered from 1. Captions without text are
 * omitted; output ends with a single newline and no trailing blank line.
 */
export function serializeSrt(track: CaptionTrack): string {
  const blocks: string[] = [];
  for (const caption of track) {
    const text = normalizeText(caption.text);
    if (!text) continue;
    blocks.push(`${blocks.length + 1}\n${formatSrtTimeRange(caption.span)}\n${text}`);
  }
  return blocks.length ? `${blocks.join('\n\n')}\n` : '';
}
