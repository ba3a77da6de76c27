export {
  normalizeText,
  stripMarkupTags,
  removeBracketedContent,
  trimDashes,
  normalizeCaptionText,
  containsMusicMarker,
  isSingleGlyphAfterTagStrip,
} from './text';

export { createTimeSpan, spanContains, spansEqual } from './time';

export { renumberCaptions, mergeConsecutiveDuplicates } from './captions';
