import { FALLBACK_ENCODINGS } from '@subalign/core';

export type DecodeResult =
  | { ok: true; text: string; encoding: string }
  | { ok: false; tried: string[] };

function createDecoder(label: string, fatal: boolean): TextDecoder | null {
  try {
    return new TextDecoder(label, { fatal });
  } catch {
    // RangeError: label unknown to this runtime's ICU build.
    return null;
  }
}

function decodeStrictUtf8(bytes: Uint8Array): string | null {
  const decoder = createDecoder('utf-8', true);
  if (!decoder) return null;
  try {
    return decoder.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Decode subtitle bytes: strict UTF-8 first, then each fallback label in
 * order with replacement of undecodable bytes. Strings pass through as-is.
 */
export function decodeSubtitleBytes(
  input: Uint8Array | string,
  encodings: readonly string[] = FALLBACK_ENCODINGS,
): DecodeResult {
  if (typeof input === 'string') return { ok: true, text: input, encoding: 'utf-16' };

  const utf8 = decodeStrictUtf8(input);
  if (utf8 !== null) return { ok: true, text: utf8, encoding: 'utf-8' };

  for (const label of encodings) {
    const decoder = createDecoder(label, false);
    if (!decoder) continue;
    return { ok: true, text: decoder.decode(input), encoding: label };
  }

  return { ok: false, tried: ['utf-8', ...encodings] };
}

/** Drop a leading BOM and turn CRLF / CR line endings into LF. */
export function normalizeLineEndings(text: string): string {
  return text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
}
