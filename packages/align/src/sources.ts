import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { pairSubtitleFiles } from './pairing';
import type { PairingOptions } from './pairing';

export interface SubtitleSource {
  name: string;
  read(): Promise<Uint8Array | string>;
}

export interface PairSource {
  key: string;
  primary: SubtitleSource;
  secondary: SubtitleSource;
}

/** Reads lazily, so building sources touches no file. */
export function fileSource(filePath: string): SubtitleSource {
  return {
    name: path.basename(filePath),
    read: () => readFile(filePath),
  };
}

export function memorySource(name: string, content: Uint8Array | string): SubtitleSource {
  return {
    name,
    read: () => Promise.resolve(content),
  };
}

export function collectPairSources(
  filePaths: readonly string[],
  options: PairingOptions,
): { sources: PairSource[]; unpaired: string[] } {
  const { pairs, unpaired } = pairSubtitleFiles(filePaths, options);
  return {
    sources: pairs.map((pair) => ({
      key: pair.key,
      primary: fileSource(pair.primary),
      secondary: fileSource(pair.secondary),
    })),
    unpaired,
  };
}
