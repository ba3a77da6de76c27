export type {
  TimeSpan,
  Caption,
  CaptionTrack,
  MatchedPair,
  SynchronizedTrackPair,
} from './caption';
