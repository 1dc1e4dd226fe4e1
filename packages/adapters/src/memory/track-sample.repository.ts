import type {
  TrackSampleRepositoryPort,
  TrackSample,
  CompressedSample,
  TrackSession,
  TrackSnapshot,
  ClockPort,
} from '@trackfold/domain';
import { SystemClock } from '../clock/clock.js';

export interface NewSessionInput {
  id: string;
  startedAt: Date;
  endedAt?: Date;
}

interface StoredSample {
  seq: number;
  sample: TrackSample;
}

/**
 * Process-local sample store. Backs the API when TRACK_STORE=memory and
 * stands in for PostgreSQL in tests.
 */
export class InMemoryTrackSampleRepository implements TrackSampleRepositoryPort {
  private readonly sessions = new Map<string, TrackSession>();
  private readonly samples = new Map<string, StoredSample[]>();

  constructor(private readonly clock: ClockPort = new SystemClock()) {}

  createSession(input: NewSessionInput): TrackSession {
    const now = this.clock.now();
    const session: TrackSession = {
      id: input.id,
      startedAt: input.startedAt,
      endedAt: input.endedAt,
      sampleCount: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.set(session.id, session);
    this.samples.set(session.id, []);
    return session;
  }

  async findSession(sessionId: string): Promise<TrackSession | null> {
    return this.sessions.get(sessionId) ?? null;
  }

  async readSamples(sessionId: string): Promise<TrackSample[]> {
    return (await this.readSnapshot(sessionId)).samples;
  }

  async readSnapshot(sessionId: string): Promise<TrackSnapshot> {
    const stored = this.samples.get(sessionId) ?? [];
    const samples = [...stored]
      .sort((a, b) => a.sample.timestamp.getTime() - b.sample.timestamp.getTime() || a.seq - b.seq)
      .map((s) => s.sample);
    return { samples, nextSeq: nextSeqOf(stored) };
  }

  async appendSamples(sessionId: string, samples: TrackSample[]): Promise<number> {
    const session = this.requireSession(sessionId);
    const stored = this.samples.get(sessionId) ?? [];
    const nextSeq = nextSeqOf(stored);
    samples.forEach((sample, i) => stored.push({ seq: nextSeq + i, sample }));
    this.samples.set(sessionId, stored);
    this.sessions.set(sessionId, {
      ...session,
      sampleCount: stored.length,
      updatedAt: this.clock.now(),
    });
    return samples.length;
  }

  async replaceSamples(
    sessionId: string,
    samples: CompressedSample[],
    nextSeq: number,
  ): Promise<number> {
    const session = this.requireSession(sessionId);
    assertFitsSnapshot(samples, nextSeq);
    const appended = (this.samples.get(sessionId) ?? []).filter((s) => s.seq >= nextSeq);
    const stored = [...samples.map((sample, seq) => ({ seq, sample })), ...appended];
    this.samples.set(sessionId, stored);
    this.sessions.set(sessionId, {
      ...session,
      sampleCount: stored.length,
      compressedAt: samples[0]?.compressedAt ?? this.clock.now(),
      updatedAt: this.clock.now(),
    });
    return appended.length;
  }

  private requireSession(sessionId: string): TrackSession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new Error(`track session ${sessionId} not found`);
    return session;
  }
}

// Stored samples are kept in ascending seq order.
function nextSeqOf(stored: readonly StoredSample[]): number {
  const last = stored[stored.length - 1];
  return last ? last.seq + 1 : 0;
}

function assertFitsSnapshot(samples: readonly CompressedSample[], nextSeq: number): void {
  if (samples.length > nextSeq) {
    throw new Error(`replacement of ${samples.length} samples exceeds the ${nextSeq} read`);
  }
}
