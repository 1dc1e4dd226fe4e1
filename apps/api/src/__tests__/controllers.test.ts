/**
 * API Controller Tests
 *
 * Builds the Express app over an in-memory sample store and drives it with
 * supertest. No database or network is involved.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import { InMemoryTrackSampleRepository, DeterministicClock } from '@trackfold/adapters';

import { buildApp } from '../app.js';
import { loadConfig } from '../config/app-config.js';
import { straightLine, trackFrom } from './tracks.js';

// ─── Test harness ─────────────────────────────────────────────────────────────

const EPOCH = Date.UTC(2026, 2, 14, 12, 0, 0);

let repository: InMemoryTrackSampleRepository;
let app: ReturnType<typeof buildApp>;

beforeEach(() => {
  const clock = new DeterministicClock(EPOCH);
  repository = new InMemoryTrackSampleRepository(clock);
  app = buildApp({
    config: loadConfig({ TRACK_STORE: 'memory' }),
    repository,
    clock,
  });
});

async function seed(id: string, count: number): Promise<void> {
  repository.createSession({ id, startedAt: new Date(EPOCH) });
  await repository.appendSamples(id, straightLine(count));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Health Check
// ═══════════════════════════════════════════════════════════════════════════════

describe('GET /healthz', () => {
  it('returns status ok and the active store', async () => {
    const res = await request(app).get('/healthz').expect(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.store).toBe('memory');
    expect(res.body.ts).toBeDefined();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Compression Routes
// ═══════════════════════════════════════════════════════════════════════════════

describe('POST /api/compression/compress', () => {
  it('returns the kept indices and ratio', async () => {
    const res = await request(app)
      .post('/api/compression/compress')
      .send({ samples: straightLine(150), epsilon: 5 })
      .expect(200);

    expect(res.body).toEqual({
      keptIndices: [0, 149],
      originalCount: 150,
      compressedCount: 2,
      compressionRatio: 2 / 150,
      keyPointCount: 2,
    });
  });

  it('includes the kept samples and key-point reasons on request', async () => {
    const samples = straightLine(10);
    const res = await request(app)
      .post('/api/compression/compress')
      .send({ samples, epsilon: 5, includeSamples: true, explain: true })
      .expect(200);

    expect(res.body.samples).toHaveLength(2);
    expect(res.body.samples[1].timestamp).toBe(samples[9].timestamp.toISOString());
    expect(res.body.keyPoints).toEqual([
      { index: 0, reasons: ['endpoint'] },
      { index: 9, reasons: ['endpoint'] },
    ]);
  });

  it('accepts epoch-millisecond timestamps', async () => {
    const samples = straightLine(3).map((s) => ({ ...s, timestamp: s.timestamp.getTime() }));
    const res = await request(app)
      .post('/api/compression/compress')
      .send({ samples, epsilon: 1 })
      .expect(200);

    expect(res.body.keptIndices).toEqual([0, 2]);
  });

  it('rejects a missing epsilon', async () => {
    const res = await request(app)
      .post('/api/compression/compress')
      .send({ samples: straightLine(3) })
      .expect(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('rejects a non-positive epsilon', async () => {
    const res = await request(app)
      .post('/api/compression/compress')
      .send({ samples: straightLine(3), epsilon: 0 })
      .expect(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('rejects a malformed sample', async () => {
    const res = await request(app)
      .post('/api/compression/compress')
      .send({ samples: [{ latitude: 'north' }], epsilon: 5 })
      .expect(400);
    expect(res.body.error).toBe('validation_error');
  });
});

describe('POST /api/compression/validate', () => {
  it('flags a compression that loses elevation gain', async () => {
    const original = trackFrom([0, 10, 0, 10].map((altitude, i) => ({ east: i * 10, north: 0, altitude })));
    const res = await request(app)
      .post('/api/compression/validate')
      .send({ original, compressed: [original[0], original[3]] })
      .expect(200);

    expect(res.body.elevationGainError).toBe(10);
    expect(res.body.elevationGainErrorPct).toBe(50);
    expect(res.body.isValid).toBe(false);
  });

  it('rejects a body without both tracks', async () => {
    const res = await request(app)
      .post('/api/compression/validate')
      .send({ original: [] })
      .expect(400);
    expect(res.body.error).toBe('validation_error');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Session Routes
// ═══════════════════════════════════════════════════════════════════════════════

describe('POST /api/sessions/:sessionId/compress', () => {
  it('compresses a stored track', async () => {
    await seed('run-1', 150);

    const res = await request(app).post('/api/sessions/run-1/compress').send({}).expect(200);

    expect(res.body.status).toBe('compressed');
    expect(res.body.persisted).toBe(true);
    expect(res.body.accepted.result.keptIndices).toEqual([0, 149]);
    await expect(repository.readSamples('run-1')).resolves.toHaveLength(2);
  });

  it('leaves the track alone on a dry run', async () => {
    await seed('run-1', 150);

    const res = await request(app)
      .post('/api/sessions/run-1/compress')
      .send({ dryRun: true, epsilon: 2 })
      .expect(200);

    expect(res.body.persisted).toBe(false);
    expect(res.body.attempts[0].epsilon).toBe(2);
    await expect(repository.readSamples('run-1')).resolves.toHaveLength(150);
  });

  it('skips short tracks', async () => {
    await seed('run-2', 20);

    const res = await request(app).post('/api/sessions/run-2/compress').send({}).expect(200);
    expect(res.body.status).toBe('skipped');
  });

  it('returns 404 for an unknown session', async () => {
    const res = await request(app).post('/api/sessions/ghost/compress').send({}).expect(404);
    expect(res.body.error).toBe('track session ghost not found');
  });

  it('rejects invalid options', async () => {
    await seed('run-1', 150);
    const res = await request(app)
      .post('/api/sessions/run-1/compress')
      .send({ epsilon: -1 })
      .expect(400);
    expect(res.body.error).toBe('validation_error');
  });
});

describe('GET /api/sessions/:sessionId/inspection', () => {
  it('returns the sample count and issues', async () => {
    repository.createSession({ id: 'run-3', startedAt: new Date(EPOCH) });
    const [a, b] = straightLine(2);
    await repository.appendSamples('run-3', [a, { ...b, longitude: 181 }]);

    const res = await request(app).get('/api/sessions/run-3/inspection').expect(200);

    expect(res.body.session.id).toBe('run-3');
    expect(res.body.sampleCount).toBe(2);
    expect(res.body.accurateElevationCount).toBe(0);
    expect(res.body.issues).toEqual([
      { index: 1, field: 'longitude', value: 181, message: 'Invalid longitude at point 1: 181' },
    ]);
  });

  it('returns 404 for an unknown session', async () => {
    await request(app).get('/api/sessions/ghost/inspection').expect(404);
  });
});
