/**
 * Fan-out/fan-in over independent file pairs. Each pair is parsed and matched
 * on its own; a failing pair is reported and never cancels its siblings.
 */

import pLimit from 'p-limit';
import { alignError, consoleLogger, resolveAlignConfig, toAlignErrorInfo } from '@subalign/core';
import type { AlignConfig, AlignConfigInput, AlignErrorInfo, CaptionTrack, Logger, MatchedPair } from '@subalign/core';
import { parseSrt } from '@subalign/srt';
import type { ParseOptions, ParseStats } from '@subalign/srt';
import { countMatched, matchTracks } from './matcher';
import { synchronizeTracks } from './synchronizer';
import { toSubtitlePairRecords } from './records';
import type { SubtitlePairRecord } from './records';
import type { PairSource, SubtitleSource } from './sources';

export interface PairStats {
  primary: ParseStats;
  secondary: ParseStats;
  matched: number;
  /** Set when the tracks were synchronized before matching. */
  syncRounds?: number;
}

export type PairOutcome =
  | { key: string; ok: true; matches: MatchedPair[]; records: SubtitlePairRecord[]; stats: PairStats }
  | { key: string; ok: false; error: AlignErrorInfo };

export interface BatchSummary {
  pairs: number;
  succeeded: number;
  failed: number;
  records: number;
  outcomes: PairOutcome[];
}

export interface AlignPairsOptions {
  config?: AlignConfigInput;
  parse?: ParseOptions;
  logger?: Logger;
  /** Rewrite both tracks to a containment fixed point before matching. */
  synchronize?: boolean;
  /** First `seqId` handed out; numbering continues across pairs in input order. */
  startSeq?: number;
}

type UnitResult =
  | { ok: true; matches: MatchedPair[]; stats: PairStats }
  | { ok: false; error: AlignErrorInfo };

async function readSide(side: SubtitleSource): Promise<Uint8Array | string> {
  try {
    return await side.read();
  } catch (err) {
    throw alignError('READ_FAILED', `${side.name}: ${toAlignErrorInfo(err).message}`);
  }
}

function decodeFailure(side: SubtitleSource): UnitResult {
  return { ok: false, error: { code: 'DECODE_FAILED', message: `${side.name}: no supported text encoding` } };
}

async function alignSource(source: PairSource, config: AlignConfig, options: AlignPairsOptions): Promise<UnitResult> {
  const parseOptions = options.parse;
  const [primaryInput, secondaryInput] = await Promise.all([readSide(source.primary), readSide(source.secondary)]);

  const primary = parseSrt(primaryInput, parseOptions);
  if (primary.status === 'undecodable') return decodeFailure(source.primary);
  const secondary = parseSrt(secondaryInput, parseOptions);
  if (secondary.status === 'undecodable') return decodeFailure(source.secondary);

  const stats: PairStats = { primary: primary.stats, secondary: secondary.stats, matched: 0 };
  let primaryTrack: CaptionTrack = primary.captions;
  let secondaryTrack: CaptionTrack = secondary.captions;
  if (options.synchronize) {
    const synced = synchronizeTracks(primaryTrack, secondaryTrack, { maxRounds: config.maxSyncRounds });
    primaryTrack = synced.a;
    secondaryTrack = synced.b;
    stats.syncRounds = synced.rounds;
  }

  const matches = matchTracks(primaryTrack, secondaryTrack, config.toleranceMs);
  stats.matched = countMatched(matches);
  return { ok: true, matches, stats };
}

export async function alignPairs(
  sources: readonly PairSource[],
  options: AlignPairsOptions = {},
): Promise<BatchSummary> {
  const config = resolveAlignConfig(options.config);
  const logger = options.logger || consoleLogger;
  const limit = pLimit(config.concurrency);

  const results = await Promise.all(
    sources.map((source) =>
      limit(() => alignSource(source, config, options)).catch(
        (err: unknown): UnitResult => ({ ok: false, error: toAlignErrorInfo(err) }),
      ),
    ),
  );

  let nextSeq = options.startSeq ?? 1;
  const outcomes: PairOutcome[] = results.map((result, idx) => {
    const source = sources[idx];
    if (!result.ok) {
      logger.error(`[align] ${source.key} failed: ${result.error.code} ${result.error.message}`);
      return { key: source.key, ok: false, error: result.error };
    }

    const records = toSubtitlePairRecords(result.matches, {
      primaryFile: source.primary.name,
      secondaryFile: source.secondary.name,
      startSeq: nextSeq,
    });
    nextSeq += records.length;
    return { key: source.key, ok: true, matches: result.matches, records, stats: result.stats };
  });

  const succeeded = outcomes.filter((outcome) => outcome.ok).length;
  const records = outcomes.reduce((sum, outcome) => sum + (outcome.ok ? outcome.records.length : 0), 0);
  logger.info(`[align] ${succeeded}/${sources.length} pairs aligned, ${records} records`);

  return {
    pairs: sources.length,
    succeeded,
    failed: sources.length - succeeded,
    records,
    outcomes,
  };
}
