/**
 * SubRip parser: bytes to an ordered caption track.
 *
 * Never throws. Blocks without a usable time line are skipped, blocks whose
 * text is noise (music cues, lone glyphs) are filtered, and an input no
 * decoder accepts comes back as `status: 'undecodable'`.
 */

import {
  containsMusicMarker,
  isSingleGlyphAfterTagStrip,
  normalizeCaptionText,
} from '@subalign/core';
import type { Caption, TimeSpan } from '@subalign/core';
import { decodeSubtitleBytes, normalizeLineEndings } from './decode';
import { parseSrtTimeLine } from './timestamp';

const BLANK_LINES_RE = /\n(?:[^\S\n]*\n)+/;
const INDEX_LINE_RE = /^\d+$/;

export type ParseStatus = 'ok' | 'empty' | 'undecodable';
export type FilterReason = 'music' | 'singleGlyph' | 'empty';

export interface ParseStats {
  blocks: number;
  skipped: number;
  filtered: Record<FilterReason, number>;
}

export interface ParseResult {
  /** `'empty'` = decoded but nothing survived; `'undecodable'` = no decoder accepted the bytes. */
  status: ParseStatus;
  encoding: string | null;
  captions: Caption[];
  stats: ParseStats;
}

export interface ParseOptions {
  /** Fallback decoders tried after strict UTF-8. */
  encodings?: readonly string[];
  /** Drop captions whose text normalizes to nothing. Defaults to false. */
  dropEmptyText?: boolean;
}

interface RawBlock {
  span: TimeSpan;
  rawText: string;
}

function createStats(): ParseStats {
  return { blocks: 0, skipped: 0, filtered: { music: 0, singleGlyph: 0, empty: 0 } };
}

function readBlock(block: string): RawBlock | null {
  const lines = block.split('\n');
  let cursor = 0;
  if (INDEX_LINE_RE.test(lines[0].trim())) cursor += 1;
  if (cursor >= lines.length) return null;

  const span = parseSrtTimeLine(lines[cursor]);
  if (!span) return null;

  const textLines = lines.slice(cursor + 1);
  if (!textLines.some((line) => line.trim())) return null;
  return { span, rawText: textLines.join('\n') };
}

function noiseReason(rawText: string): FilterReason | null {
  if (containsMusicMarker(rawText)) return 'music';
  if (isSingleGlyphAfterTagStrip(rawText)) return 'singleGlyph';
  return null;
}

export function parseSrt(input: Uint8Array | string, options: ParseOptions = {}): ParseResult {
  const stats = createStats();
  const decoded = decodeSubtitleBytes(input, options.encodings);
  if (!decoded.ok) {
    return { status: 'undecodable', encoding: null, captions: [], stats };
  }

  const dropEmptyText = options.dropEmptyText ?? false;
  const content = normalizeLineEndings(decoded.text).trim();
  const blocks = content ? content.split(BLANK_LINES_RE) : [];
  const captions: Caption[] = [];

  for (const block of blocks) {
    stats.blocks += 1;
    const raw = readBlock(block.trim());
    if (!raw) {
      stats.skipped += 1;
      continue;
    }

    const reason = noiseReason(raw.rawText);
    if (reason) {
      stats.filtered[reason] += 1;
      continue;
    }

    const text = normalizeCaptionText(raw.rawText);
    if (!text && dropEmptyText) {
      stats.filtered.empty += 1;
      continue;
    }

    captions.push({ ordinal: captions.length + 1, span: raw.span, text });
  }

  return {
    status: captions.length ? 'ok' : 'empty',
    encoding: decoded.encoding,
    captions,
    stats,
  };
}

export function parseSrtTrack(input: Uint8Array | string, options?: ParseOptions): Caption[] {
  return parseSrt(input, options).captions;
}
