/** Half-open caption interval in integer milliseconds; `startMs <= endMs`. */
export interface TimeSpan {
  readonly startMs: number;
  readonly endMs: number;
}

export interface Caption {
  /** Display-only sequence number, recomputed whenever a track is emitted. */
  ordinal: number;
  span: TimeSpan;
  text: string;
}

/** Captions in file order. Never re-sorted. */
export type CaptionTrack = readonly Caption[];

export interface MatchedPair {
  primary: Caption;
  secondary: Caption | null;
  /** Overlap over union of the tolerance-expanded spans; 0 when unmatched. */
  score: number;
}

export interface SynchronizedTrackPair {
  a: Caption[];
  b: Caption[];
  rounds: number;
  converged: boolean;
  remainingViolations: number;
}
