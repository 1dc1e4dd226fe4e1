import type { TrackSample } from './track-sample.js';

export const DEFAULT_EPSILON_M = 5.0;
export const DEFAULT_ELEVATION_THRESHOLD_M = 2.0;

export interface CompressionRequest {
  readonly samples: readonly TrackSample[];
  readonly epsilon: number;                     // meters, > 0
  readonly preserveElevationChanges?: boolean;  // default true
  readonly elevationThreshold?: number;         // meters, default 2.0
}

export interface CompressionResult {
  readonly keptIndices: number[];   // strictly increasing
  readonly originalCount: number;
  readonly compressedCount: number;
  readonly compressionRatio: number; // compressedCount / originalCount
  readonly keyPointCount: number;    // indices forced by the key point pass
}

export type KeyPointReason =
  | 'endpoint'
  | 'elevation-change'
  | 'elevation-extremum'
  | 'turn'
  | 'speed-change';

export interface ValidationResult {
  readonly elevationGainError: number;    // meters
  readonly elevationGainErrorPct: number;
  readonly distanceError: number;         // meters
  readonly distanceErrorPct: number;
  readonly isValid: boolean;
}

export interface DeviationSummary {
  readonly maxDeviation: number;  // meters
  readonly meanDeviation: number; // meters, over discarded samples
  readonly discardedCount: number;
}
