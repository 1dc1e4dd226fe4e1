import type { TrackSample, CompressedSample } from '../../entities/track-sample.js';
import type { TrackSession } from '../../entities/track-session.js';

/** A session's samples as of one read. */
export interface TrackSnapshot {
  samples: TrackSample[];
  /** Every sample appended after the read gets a sequence number ≥ nextSeq. */
  nextSeq: number;
}

export interface TrackSampleRepositoryPort {
  findSession(sessionId: string): Promise<TrackSession | null>;
  /** Samples in timestamp order; ties keep insertion order. */
  readSamples(sessionId: string): Promise<TrackSample[]>;
  readSnapshot(sessionId: string): Promise<TrackSnapshot>;
  appendSamples(sessionId: string, samples: TrackSample[]): Promise<number>;
  /**
   * Atomically swaps the samples below `nextSeq` for their compressed form.
   * Samples appended since that snapshot stay, after the compressed ones.
   * Resolves to how many such samples were kept.
   */
  replaceSamples(sessionId: string, samples: CompressedSample[], nextSeq: number): Promise<number>;
}
