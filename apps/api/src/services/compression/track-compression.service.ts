import type {
  ClockPort,
  CompressionAttempt,
  SessionCompressionOptions,
  SessionCompressionOutcome,
  SessionInspection,
  TrackCompressionPort,
  TrackSample,
  TrackSampleRepositoryPort,
} from '@trackfold/domain';
import {
  annotateCompression,
  compressTrack,
  findSampleIssues,
  hasAccurateElevation,
  validateCompression,
  DEFAULT_ELEVATION_THRESHOLD_M,
} from '@trackfold/domain';
import type { CompressionSettings } from '../../config/app-config.js';
import { SessionNotFoundError } from '../../errors/http-error.js';

const log = {
  info: (msg: string, extra?: Record<string, unknown>) =>
    console.log(`[track-compression] ${msg}`, extra ? JSON.stringify(extra) : ''),
  debug: (msg: string, extra?: Record<string, unknown>) =>
    console.debug(`[track-compression] ${msg}`, extra ? JSON.stringify(extra) : ''),
  warn: (msg: string, extra?: Record<string, unknown>) =>
    console.warn(`[track-compression] ${msg}`, extra ? JSON.stringify(extra) : ''),
};

/**
 * Track Compression Service
 *
 * Owns the policy around the pure compressor:
 * - short tracks are skipped
 * - an attempt that fails validation is retried with half the epsilon,
 *   until maxAttempts or minEpsilon is reached
 * - only a validated result replaces the stored track; samples appended
 *   while it was computed are kept after it
 */
export class TrackCompressionService implements TrackCompressionPort {
  constructor(
    private readonly repository: TrackSampleRepositoryPort,
    private readonly clock: ClockPort,
    private readonly settings: CompressionSettings,
  ) {}

  async compressSession(
    sessionId: string,
    options: SessionCompressionOptions = {},
  ): Promise<SessionCompressionOutcome> {
    const session = await this.repository.findSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);

    const { samples, nextSeq } = await this.repository.readSnapshot(sessionId);
    const attempts: CompressionAttempt[] = [];
    const outcome = { sessionId, originalCount: samples.length, attempts };

    if (samples.length <= this.settings.minSamples) {
      log.debug('track too short, skipping', {
        sessionId,
        samples: samples.length,
        minSamples: this.settings.minSamples,
      });
      return { ...outcome, status: 'skipped', persisted: false };
    }

    const accepted = this.searchEpsilon(samples, options, attempts);

    if (!accepted) {
      log.warn('no attempt passed validation, keeping original track', {
        sessionId,
        attempts: attempts.map((a) => ({
          epsilon: a.epsilon,
          elevationGainErrorPct: a.validation.elevationGainErrorPct,
          distanceErrorPct: a.validation.distanceErrorPct,
        })),
      });
      return { ...outcome, status: 'rejected', persisted: false };
    }

    const dryRun = options.dryRun ?? false;
    let appendedSince = 0;
    if (!dryRun) {
      const annotated = annotateCompression(samples, accepted.result.keptIndices, this.clock.now());
      appendedSince = await this.repository.replaceSamples(sessionId, annotated, nextSeq);
    }

    log.info('session compressed', {
      sessionId,
      original: accepted.result.originalCount,
      compressed: accepted.result.compressedCount,
      ratioPct: Number((accepted.result.compressionRatio * 100).toFixed(1)),
      epsilon: accepted.epsilon,
      appendedSince,
      dryRun,
    });

    return { ...outcome, status: 'compressed', persisted: !dryRun, accepted };
  }

  async inspectSession(sessionId: string): Promise<SessionInspection> {
    const session = await this.repository.findSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);

    const samples = await this.repository.readSamples(sessionId);
    return {
      session,
      sampleCount: samples.length,
      accurateElevationCount: samples.filter(hasAccurateElevation).length,
      issues: findSampleIssues(samples),
    };
  }

  /** Appends every attempt to `attempts`; returns the first valid one. */
  private searchEpsilon(
    samples: TrackSample[],
    options: SessionCompressionOptions,
    attempts: CompressionAttempt[],
  ): CompressionAttempt | undefined {
    let epsilon = options.epsilon ?? this.settings.defaultEpsilon;

    while (attempts.length < this.settings.maxAttempts) {
      const result = compressTrack({
        samples,
        epsilon,
        preserveElevationChanges: options.preserveElevationChanges ?? true,
        elevationThreshold: options.elevationThreshold ?? DEFAULT_ELEVATION_THRESHOLD_M,
      });
      const validation = validateCompression(
        samples,
        result.keptIndices.map((i) => samples[i]),
      );
      const attempt: CompressionAttempt = { epsilon, result, validation };
      attempts.push(attempt);

      log.debug('compression attempt', {
        epsilon,
        kept: result.compressedCount,
        valid: validation.isValid,
      });

      if (validation.isValid) return attempt;

      const next = epsilon / 2;
      if (next < this.settings.minEpsilon) break;
      epsilon = next;
    }

    return undefined;
  }
}
