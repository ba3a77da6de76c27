import { mergeConsecutiveDuplicates } from '@subalign/core';
import { parseSrt } from './parser';
import type { ParseOptions, ParseStats, ParseStatus } from './parser';
import { serializeSrt } from './writer';

export interface RepairResult {
  status: ParseStatus;
  encoding: string | null;
  output: string;
  originalCount: number;
  finalCount: number;
  stats: ParseStats;
}

/**
 * Parse, merge repeated captions and write the file back out renumbered.
 * Captions left without text are dropped unless `dropEmptyText` is false.
 */
export function repairSrt(input: Uint8Array | string, options: ParseOptions = {}): RepairResult {
  const parsed = parseSrt(input, { ...options, dropEmptyText: options.dropEmptyText ?? true });
  const merged = mergeConsecutiveDuplicates(parsed.captions);

  return {
    status: parsed.status,
    encoding: parsed.encoding,
    output: serializeSrt(merged),
    originalCount: parsed.captions.length,
    finalCount: merged.filter((caption) => caption.text).length,
    stats: parsed.stats,
  };
}
