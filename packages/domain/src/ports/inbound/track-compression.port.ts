import type { TrackSession, SampleIssue } from '../../entities/track-session.js';
import type { CompressionResult, ValidationResult } from '../../entities/compression.js';

// ---------------------------------------------------------------------------
// Session compression
// ---------------------------------------------------------------------------

export interface SessionCompressionOptions {
  epsilon?: number;
  preserveElevationChanges?: boolean;
  elevationThreshold?: number;
  dryRun?: boolean;
}

export interface CompressionAttempt {
  epsilon: number;
  result: CompressionResult;
  validation: ValidationResult;
}

/**
 * `compressed`: a valid attempt was found (and stored unless dry-run).
 * `skipped`: the track is too short to be worth compressing.
 * `rejected`: no attempt passed validation; the original track is kept.
 */
export type SessionCompressionStatus = 'compressed' | 'skipped' | 'rejected';

export interface SessionCompressionOutcome {
  sessionId: string;
  status: SessionCompressionStatus;
  persisted: boolean;
  originalCount: number;
  attempts: CompressionAttempt[];
  accepted?: CompressionAttempt;
}

// ---------------------------------------------------------------------------
// Inspection
// ---------------------------------------------------------------------------

export interface SessionInspection {
  session: TrackSession;
  sampleCount: number;
  /** Samples whose elevation is both precise and confident. */
  accurateElevationCount: number;
  issues: SampleIssue[];
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface TrackCompressionPort {
  compressSession(sessionId: string, options?: SessionCompressionOptions): Promise<SessionCompressionOutcome>;
  inspectSession(sessionId: string): Promise<SessionInspection>;
}
