import type {
  TrackSampleRepositoryPort,
  TrackSample,
  CompressedSample,
  TrackSession,
  TrackSnapshot,
} from '@trackfold/domain';
import { isCompressedSample } from '@trackfold/domain';
import type { SqlClient, SqlPool } from './pool.js';
import { getPool, withTransaction } from './pool.js';

const SAMPLE_COLUMNS = [
  'session_id',
  'seq',
  'ts',
  'latitude',
  'longitude',
  'raw_altitude',
  'barometric_altitude',
  'fused_altitude',
  'elevation_confidence',
  'elevation_accuracy',
  'horizontal_accuracy',
  'vertical_accuracy',
  'speed',
  'course',
  'compression_index',
  'compression_error',
  'compressed_at',
] as const;

// Keeps each INSERT well under the 65535 bind-parameter limit.
const INSERT_CHUNK_ROWS = 1_000;

export class PgTrackSampleRepository implements TrackSampleRepositoryPort {
  constructor(private readonly pool: SqlPool = getPool()) {}

  async findSession(sessionId: string): Promise<TrackSession | null> {
    const { rows } = await this.pool.query(
      `SELECT * FROM tracks.sessions WHERE id = $1`,
      [sessionId],
    );
    return rows[0] ? mapSessionRow(rows[0]) : null;
  }

  async readSamples(sessionId: string): Promise<TrackSample[]> {
    return (await this.readSnapshot(sessionId)).samples;
  }

  async readSnapshot(sessionId: string): Promise<TrackSnapshot> {
    const { rows } = await this.pool.query(
      `SELECT * FROM tracks.samples
       WHERE session_id = $1
       ORDER BY ts ASC, seq ASC`,
      [sessionId],
    );
    const nextSeq = rows.reduce((next, row) => Math.max(next, Number(row['seq']) + 1), 0);
    return { samples: rows.map(mapSampleRow), nextSeq };
  }

  async appendSamples(sessionId: string, samples: TrackSample[]): Promise<number> {
    if (samples.length === 0) return 0;
    return withTransaction(this.pool, async (client) => {
      await lockSession(client, sessionId);
      const { rows } = await client.query(
        `SELECT COALESCE(MAX(seq) + 1, 0) AS next_seq FROM tracks.samples WHERE session_id = $1`,
        [sessionId],
      );
      const nextSeq = Number(rows[0]?.['next_seq'] ?? 0);
      await insertSamples(client, sessionId, nextSeq, samples);
      await client.query(
        `UPDATE tracks.sessions
         SET sample_count = sample_count + $2, updated_at = now()
         WHERE id = $1`,
        [sessionId, samples.length],
      );
      return samples.length;
    });
  }

  async replaceSamples(
    sessionId: string,
    samples: CompressedSample[],
    nextSeq: number,
  ): Promise<number> {
    if (samples.length > nextSeq) {
      throw new Error(`replacement of ${samples.length} samples exceeds the ${nextSeq} read`);
    }
    return withTransaction(this.pool, async (client) => {
      await lockSession(client, sessionId);
      await client.query(
        `DELETE FROM tracks.samples WHERE session_id = $1 AND seq < $2`,
        [sessionId, nextSeq],
      );
      const { rows } = await client.query(
        `SELECT COUNT(*)::int AS appended FROM tracks.samples WHERE session_id = $1`,
        [sessionId],
      );
      const appended = Number(rows[0]?.['appended'] ?? 0);
      // compressed rows take seq 0..n-1, all below the rows appended since the read
      await insertSamples(client, sessionId, 0, samples);
      await client.query(
        `UPDATE tracks.sessions
         SET sample_count = $2, compressed_at = $3, updated_at = now()
         WHERE id = $1`,
        [sessionId, samples.length + appended, samples[0]?.compressedAt ?? new Date()],
      );
      return appended;
    });
  }
}

/** Serializes writers on one session for the rest of the transaction. */
async function lockSession(client: SqlClient, sessionId: string): Promise<void> {
  const { rowCount } = await client.query(
    `SELECT id FROM tracks.sessions WHERE id = $1 FOR UPDATE`,
    [sessionId],
  );
  if (!rowCount) throw new Error(`track session ${sessionId} not found`);
}

async function insertSamples(
  client: SqlClient,
  sessionId: string,
  firstSeq: number,
  samples: readonly TrackSample[],
): Promise<void> {
  const width = SAMPLE_COLUMNS.length;
  for (let offset = 0; offset < samples.length; offset += INSERT_CHUNK_ROWS) {
    const chunk = samples.slice(offset, offset + INSERT_CHUNK_ROWS);
    const values: unknown[] = [];
    const placeholders = chunk.map((s, i) => {
      const compressed = isCompressedSample(s) ? s : null;
      values.push(
        sessionId,
        firstSeq + offset + i,
        s.timestamp,
        s.latitude,
        s.longitude,
        s.rawAltitude,
        s.barometricAltitude ?? null,
        s.fusedAltitude ?? null,
        s.elevationConfidence ?? null,
        s.elevationAccuracy ?? null,
        s.horizontalAccuracy,
        s.verticalAccuracy,
        s.speed,
        s.course ?? null,
        compressed?.compressionIndex ?? null,
        compressed?.compressionError ?? null,
        compressed?.compressedAt ?? null,
      );
      const cols = Array.from({ length: width }, (_, k) => `$${i * width + k + 1}`);
      return `(${cols.join(',')})`;
    });
    await client.query(
      `INSERT INTO tracks.samples (${SAMPLE_COLUMNS.join(', ')})
       VALUES ${placeholders.join(',')}`,
      values,
    );
  }
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function optionalDate(value: unknown): Date | undefined {
  return value instanceof Date ? value : undefined;
}

function mapSessionRow(row: Record<string, unknown>): TrackSession {
  return {
    id: row['id'] as string,
    startedAt: row['started_at'] as Date,
    endedAt: optionalDate(row['ended_at']),
    sampleCount: row['sample_count'] as number,
    compressedAt: optionalDate(row['compressed_at']),
    createdAt: row['created_at'] as Date,
    updatedAt: row['updated_at'] as Date,
  };
}

function mapSampleRow(row: Record<string, unknown>): TrackSample {
  return {
    timestamp: row['ts'] as Date,
    latitude: row['latitude'] as number,
    longitude: row['longitude'] as number,
    rawAltitude: row['raw_altitude'] as number,
    barometricAltitude: optionalNumber(row['barometric_altitude']),
    fusedAltitude: optionalNumber(row['fused_altitude']),
    elevationConfidence: optionalNumber(row['elevation_confidence']),
    elevationAccuracy: optionalNumber(row['elevation_accuracy']),
    horizontalAccuracy: row['horizontal_accuracy'] as number,
    verticalAccuracy: row['vertical_accuracy'] as number,
    speed: row['speed'] as number,
    course: optionalNumber(row['course']),
  };
}
