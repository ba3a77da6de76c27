export { spansClose, overlapScore, advanceCursor, matchTracks, countMatched } from './matcher';

export { absorbContained, countContainmentViolations, synchronizeTracks } from './synchronizer';
export type { SynchronizeOptions, AbsorbResult } from './synchronizer';

export { toSubtitlePairRecords } from './records';
export type { SubtitlePairRecord, RecordOptions } from './records';

export { pairSubtitleFiles } from './pairing';
export type { PairingOptions, FilePair, FilePairing } from './pairing';

export { fileSource, memorySource, collectPairSources } from './sources';
export type { SubtitleSource, PairSource } from './sources';

export { alignPairs } from './batch';
export type { PairStats, PairOutcome, BatchSummary, AlignPairsOptions } from './batch';
