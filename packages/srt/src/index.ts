export { decodeSubtitleBytes, normalizeLineEndings } from './decode';
export type { DecodeResult } from './decode';

export {
  parseSrtTimestamp,
  parseSrtTimeLine,
  formatSrtTimestamp,
  formatSrtTimeRange,
} from './timestamp';

export { parseSrt, parseSrtTrack } from './parser';
export type { ParseStatus, FilterReason, ParseStats, ParseResult, ParseOptions } from './parser';

export { serializeSrt } from './writer';

export { repairSrt } from './repair';
export type { RepairResult } from './repair';
