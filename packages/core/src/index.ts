// Types
export * from './types';

// Constants
export { ALIGN_DEFAULTS, FALLBACK_ENCODINGS, MUSIC_MARKERS, DASH_MARKS, ENV_KEYS } from './constants';

// Utilities
export {
  normalizeText,
  stripMarkupTags,
  removeBracketedContent,
  trimDashes,
  normalizeCaptionText,
  containsMusicMarker,
  isSingleGlyphAfterTagStrip,
  createTimeSpan,
  spanContains,
  spansEqual,
  renumberCaptions,
  mergeConsecutiveDuplicates,
} from './utils';

// Config
export { alignConfigSchema, resolveAlignConfig, alignConfigFromEnv } from './config';
export type { AlignConfig, AlignConfigInput } from './config';

// Errors & logging
export { AlignError, alignError, toAlignErrorInfo } from './errors';
export type { AlignErrorCode, AlignErrorInfo } from './errors';
export { consoleLogger, silentLogger } from './logger';
export type { Logger } from './logger';
