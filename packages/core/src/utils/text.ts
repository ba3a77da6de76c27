import { DASH_MARKS, MUSIC_MARKERS } from '../constants';

const TAG_RE = /<[^>]+>/g;
const BRACKETED_RES = [/\([^)]*\)/g, /\[[^\]]*\]/g, /\{[^}]*\}/g];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const DASH = `(?:${DASH_MARKS.map(escapeRegExp).join('|')})`;
const LEADING_DASH_RE = new RegExp(`^(?:${DASH}\\s*)+`);
const TRAILING_DASH_RE = new RegExp(`(?:\\s*${DASH})+$`);

/**
 * Normalize whitespace: collapse multiple spaces/newlines to single space, trim.
 */
export function normalizeText(text: string | undefined | null): string {
  return String(text || '').replace(/\s+/g, ' ').trim();
}

export function stripMarkupTags(text: string): string {
  return text.replace(TAG_RE, '');
}

/** One non-greedy pass per bracket class: parentheses, square, curly. */
export function removeBracketedContent(text: string): string {
  return BRACKETED_RES.reduce((out, re) => out.replace(re, ''), text);
}

export function trimDashes(text: string): string {
  return text.replace(LEADING_DASH_RE, '').replace(TRAILING_DASH_RE, '').trim();
}

/**
 * Clean raw caption text for display and comparison.
 *
 * Tags are stripped before bracketed spans are removed, since tags may wrap
 * the brackets (`<i>(sighs)</i>`). Repeated leading or trailing dash groups
 * are removed as one run, which keeps the function idempotent.
 */
export function normalizeCaptionText(raw: string | null | undefined): string {
  const withoutTags = stripMarkupTags(String(raw || ''));
  const withoutBrackets = removeBracketedContent(withoutTags);
  return trimDashes(normalizeText(withoutBrackets));
}

export function containsMusicMarker(text: string): boolean {
  return MUSIC_MARKERS.some((marker) => text.includes(marker));
}

/** Counts code points, so a lone emoji or CJK character is one glyph. */
export function isSingleGlyphAfterTagStrip(text: string): boolean {
  return Array.from(stripMarkupTags(text).trim()).length === 1;
}
