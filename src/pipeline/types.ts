import type { Fraction } from './fraction';

export interface PcmFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

export interface TrackMetadata {
  artist: string;
  album: string;
  title: string;
}

export interface TimestampEvent {
  /** Unix seconds as written by the now-playing logger */
  time: number;
  /** "artist/album/title" */
  title: string;
  metadata: TrackMetadata;
  isPlaying: boolean;
}

export interface TrackSegment {
  /** 1-based position in the output directory */
  index: number;
  start: Fraction;
  /** Rounded up to the analysis window grid */
  duration: Fraction;
  title: string;
  metadata: TrackMetadata;
}

export type SplitStatus = 'completed' | 'planned' | 'unaligned' | 'aborted';
