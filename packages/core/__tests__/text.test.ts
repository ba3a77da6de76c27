import { describe, it, expect } from 'vitest';
import {
  containsMusicMarker,
  isSingleGlyphAfterTagStrip,
  normalizeCaptionText,
  normalizeText,
  removeBracketedContent,
  stripMarkupTags,
} from '../src/index';

describe('normalizeCaptionText', () => {
  it('strips markup and collapses whitespace', () => {
    expect(normalizeCaptionText('<i>Hello</i>  world')).toBe('Hello world');
    expect(normalizeCaptionText('<font color="#ffff00">Line one</font>\nline two')).toBe('Line one line two');
  });

  it('removes bracketed asides of every kind', () => {
    expect(normalizeCaptionText('(laughs) Stop!')).toBe('Stop!');
    expect(normalizeCaptionText('<i>[door slams]</i>\nGet out!')).toBe('Get out!');
    expect(normalizeCaptionText('{\\an8}Top line')).toBe('Top line');
    expect(normalizeCaptionText('Wait (beat) here [quietly] now')).toBe('Wait here now');
  });

  it('trims leading and trailing dash runs but keeps inner hyphens', () => {
    expect(normalizeCaptionText('- Hey there -')).toBe('Hey there');
    expect(normalizeCaptionText('– What?')).toBe('What?');
    expect(normalizeCaptionText('— Fine —')).toBe('Fine');
    expect(normalizeCaptionText('- - Hi')).toBe('Hi');
    expect(normalizeCaptionText('â€“ Wait')).toBe('Wait');
    expect(normalizeCaptionText('A well-known fact')).toBe('A well-known fact');
  });

  it('returns empty string for empty or fully removed input', () => {
    expect(normalizeCaptionText('')).toBe('');
    expect(normalizeCaptionText(null)).toBe('');
    expect(normalizeCaptionText('(applause)')).toBe('');
    expect(normalizeCaptionText(' - ')).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      '<i>Hello</i>  world',
      '- - Hi - -',
      '((a)b) c',
      'x<>y> (z)',
      '[unclosed bracket',
      '  -\t<b>[noise]</b> Mixed — content –  ',
      'â€” odd bytes â€”',
    ];
    for (const sample of samples) {
      const once = normalizeCaptionText(sample);
      expect(normalizeCaptionText(once)).toBe(once);
    }
  });
});

describe('helpers', () => {
  it('normalizeText only touches whitespace', () => {
    expect(normalizeText('  a \n\n b\t')).toBe('a b');
    expect(normalizeText(undefined)).toBe('');
  });

  it('stripMarkupTags removes angle-bracket tags only', () => {
    expect(stripMarkupTags('<b>bold</b> (kept)')).toBe('bold (kept)');
  });

  it('removeBracketedContent removes one level per class', () => {
    expect(removeBracketedContent('a (b) [c] {d} e')).toBe('a    e');
    expect(removeBracketedContent('((a)b)')).toBe('b)');
  });
});

describe('containsMusicMarker', () => {
  it('detects note glyphs in correct and mis-decoded form', () => {
    expect(containsMusicMarker('♪ la la la ♪')).toBe(true);
    expect(containsMusicMarker('♫ humming')).toBe(true);
    expect(containsMusicMarker('â™ª singing')).toBe(true);
    expect(containsMusicMarker('Hello')).toBe(false);
  });
});

describe('isSingleGlyphAfterTagStrip', () => {
  it('is true only for exactly one remaining character', () => {
    expect(isSingleGlyphAfterTagStrip('<i>A</i>')).toBe(true);
    expect(isSingleGlyphAfterTagStrip(' ? ')).toBe(true);
    expect(isSingleGlyphAfterTagStrip('😀')).toBe(true);
    expect(isSingleGlyphAfterTagStrip('Ok')).toBe(false);
    expect(isSingleGlyphAfterTagStrip('<b></b>')).toBe(false);
  });

  it('does not strip brackets', () => {
    expect(isSingleGlyphAfterTagStrip('(A)')).toBe(false);
  });
});
