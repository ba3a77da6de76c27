// --- Alignment Defaults ---
export const ALIGN_DEFAULTS = {
  TOLERANCE_MS: 1000,
  MAX_SYNC_ROUNDS: 10,
  CONCURRENCY: 4,
  PRIMARY_LANG: 'en',
  SECONDARY_LANG: 'ru',
} as const;

// --- Decoding ---
// Tried in order after strict UTF-8 fails.
export const FALLBACK_ENCODINGS = ['latin1', 'windows-1252', 'iso-8859-1'] as const;

// --- Caption Text Markers ---
// Music notes as written, plus the forms left by reading UTF-8 bytes as latin1/cp1252.
export const MUSIC_MARKERS = [
  '♪',
  '♫',
  'â™ª',
  'â™«',
  'â\u0099ª',
  'â\u0099«',
] as const;

// Hyphen, en dash, em dash and their mis-decoded byte sequences.
export const DASH_MARKS = [
  '-',
  '–',
  '—',
  'â€“',
  'â€”',
  'â\u0080\u0093',
  'â\u0080\u0094',
] as const;

// --- Environment ---
export const ENV_KEYS = {
  TOLERANCE_MS: 'SUBALIGN_TOLERANCE_MS',
  MAX_SYNC_ROUNDS: 'SUBALIGN_MAX_SYNC_ROUNDS',
  CONCURRENCY: 'SUBALIGN_CONCURRENCY',
  PRIMARY_LANG: 'SUBALIGN_PRIMARY_LANG',
  SECONDARY_LANG: 'SUBALIGN_SECONDARY_LANG',
} as const;
