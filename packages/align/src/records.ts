import type { MatchedPair } from '@subalign/core';
import { formatSrtTimeRange } from '@subalign/srt';

/** Row shape handed to the ingestion layer. */
export interface SubtitlePairRecord {
  seqId: number;
  primaryText: string;
  secondaryText: string;
  primaryFile: string;
  secondaryFile: string;
  primaryTime: string;
  secondaryTime: string | null;
}

export interface RecordOptions {
  primaryFile: string;
  secondaryFile: string;
  startSeq?: number;
}

export function toSubtitlePairRecords(
  pairs: readonly MatchedPair[],
  { primaryFile, secondaryFile, startSeq = 1 }: RecordOptions,
): SubtitlePairRecord[] {
  return pairs.map((pair, idx) => ({
    seqId: startSeq + idx,
    primaryText: pair.primary.text,
    secondaryText: pair.secondary ? pair.secondary.text : '',
    primaryFile,
    secondaryFile,
    primaryTime: formatSrtTimeRange(pair.primary.span),
    secondaryTime: pair.secondary ? formatSrtTimeRange(pair.secondary.span) : null,
  }));
}
