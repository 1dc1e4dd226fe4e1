import { describe, it, expect, beforeEach } from '@jest/globals';
import type { CompressedSample, TrackSample } from '@trackfold/domain';
import { InMemoryTrackSampleRepository } from '../memory/track-sample.repository.js';
import { DeterministicClock } from '../clock/clock.js';

const T0 = Date.UTC(2026, 0, 10, 7, 0, 0);

function sample(second: number, latitude = 0): TrackSample {
  return {
    timestamp: new Date(T0 + second * 1000),
    latitude,
    longitude: 0,
    rawAltitude: 0,
    horizontalAccuracy: 5,
    verticalAccuracy: 3,
    speed: 1.4,
  };
}

describe('InMemoryTrackSampleRepository', () => {
  let clock: DeterministicClock;
  let repo: InMemoryTrackSampleRepository;

  beforeEach(() => {
    clock = new DeterministicClock(T0, 1_000);
    repo = new InMemoryTrackSampleRepository(clock);
    repo.createSession({ id: 'run-1', startedAt: new Date(T0) });
  });

  it('returns null for an unknown session', async () => {
    await expect(repo.findSession('nope')).resolves.toBeNull();
  });

  it('creates an empty session stamped by the clock', async () => {
    const session = await repo.findSession('run-1');
    expect(session).toMatchObject({ id: 'run-1', sampleCount: 0, createdAt: new Date(T0) });
    await expect(repo.readSamples('run-1')).resolves.toEqual([]);
  });

  it('appends samples and keeps the count current', async () => {
    await expect(repo.appendSamples('run-1', [sample(0), sample(1)])).resolves.toBe(2);
    await expect(repo.appendSamples('run-1', [sample(2)])).resolves.toBe(1);

    const session = await repo.findSession('run-1');
    expect(session?.sampleCount).toBe(3);
    await expect(repo.readSamples('run-1')).resolves.toHaveLength(3);
  });

  it('reads by timestamp, then insertion order', async () => {
    await repo.appendSamples('run-1', [sample(5, 1), sample(1, 2)]);
    await repo.appendSamples('run-1', [sample(1, 3)]);

    const read = await repo.readSamples('run-1');
    expect(read.map((s) => s.latitude)).toEqual([2, 3, 1]);
  });

  it('replaces the track and records the compression time', async () => {
    await repo.appendSamples('run-1', [sample(0), sample(1), sample(2)]);
    const compressedAt = new Date(T0 + 60_000);
    const kept: CompressedSample[] = [
      { ...sample(0), compressionIndex: 0, compressionError: 0, compressedAt },
      { ...sample(2), compressionIndex: 2, compressionError: 0.4, compressedAt },
    ];

    await expect(repo.replaceSamples('run-1', kept, 3)).resolves.toBe(0);

    const session = await repo.findSession('run-1');
    expect(session?.sampleCount).toBe(2);
    expect(session?.compressedAt).toEqual(compressedAt);
    await expect(repo.readSamples('run-1')).resolves.toEqual(kept);
  });

  it('uses the clock when the replacement is empty', async () => {
    const expected = clock.peek();
    await repo.replaceSamples('run-1', [], 0);
    const session = await repo.findSession('run-1');
    expect(session?.compressedAt).toEqual(expected);
  });

  it('reports the next sequence number with each snapshot', async () => {
    await expect(repo.readSnapshot('run-1')).resolves.toEqual({ samples: [], nextSeq: 0 });
    await repo.appendSamples('run-1', [sample(0), sample(1)]);
    const snapshot = await repo.readSnapshot('run-1');
    expect(snapshot.nextSeq).toBe(2);
    expect(snapshot.samples).toHaveLength(2);
  });

  it('keeps samples appended after the snapshot a replacement was built from', async () => {
    await repo.appendSamples('run-1', [sample(0), sample(1), sample(2)]);
    const { nextSeq } = await repo.readSnapshot('run-1');
    await repo.appendSamples('run-1', [sample(3, 7), sample(4, 8)]);

    const compressedAt = new Date(T0 + 60_000);
    const kept: CompressedSample[] = [
      { ...sample(0), compressionIndex: 0, compressionError: 0, compressedAt },
      { ...sample(2), compressionIndex: 2, compressionError: 0, compressedAt },
    ];
    await expect(repo.replaceSamples('run-1', kept, nextSeq)).resolves.toBe(2);

    const read = await repo.readSamples('run-1');
    expect(read.map((s) => s.latitude)).toEqual([0, 0, 7, 8]);
    expect((await repo.findSession('run-1'))?.sampleCount).toBe(4);

    await repo.appendSamples('run-1', [sample(5, 9)]);
    expect((await repo.readSnapshot('run-1')).nextSeq).toBe(6);
  });

  it('refuses a replacement larger than its snapshot', async () => {
    await repo.appendSamples('run-1', [sample(0)]);
    const compressedAt = new Date(T0);
    const kept: CompressedSample[] = [
      { ...sample(0), compressionIndex: 0, compressionError: 0, compressedAt },
      { ...sample(1), compressionIndex: 1, compressionError: 0, compressedAt },
    ];
    await expect(repo.replaceSamples('run-1', kept, 1)).rejects.toThrow('replacement of 2 samples exceeds the 1 read');
  });

  it('rejects writes to an unknown session', async () => {
    await expect(repo.appendSamples('ghost', [sample(0)])).rejects.toThrow('track session ghost not found');
    await expect(repo.replaceSamples('ghost', [], 0)).rejects.toThrow('track session ghost not found');
  });
});
