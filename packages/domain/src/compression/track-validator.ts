import type { TrackSample } from '../entities/track-sample.js';
import { elevationChange } from '../entities/track-sample.js';
import type { ValidationResult } from '../entities/compression.js';
import { greatCircleDistance } from '../geo/distance.js';

// Acceptance thresholds, percent. Fixed: they are the accuracy guarantee.
export const MAX_ELEVATION_GAIN_ERROR_PCT = 5.0;
export const MAX_DISTANCE_ERROR_PCT = 2.0;

/** Sum of positive consecutive best-altitude deltas, meters. */
export function elevationGain(samples: readonly TrackSample[]): number {
  let gain = 0;
  for (let i = 1; i < samples.length; i++) {
    const delta = elevationChange(samples[i - 1], samples[i]);
    if (delta > 0) gain += delta;
  }
  return gain;
}

/** Sum of consecutive great-circle distances, meters. */
export function totalDistance(samples: readonly TrackSample[]): number {
  let total = 0;
  for (let i = 1; i < samples.length; i++) {
    total += greatCircleDistance(samples[i - 1], samples[i]);
  }
  return total;
}

function errorPct(error: number, reference: number): number {
  return reference > 0 ? (error / reference) * 100 : 0;
}

/**
 * Compares whole-track aggregates of the original and compressed sequences.
 * Advisory only; deciding what to do with an invalid result is up to the caller.
 */
export function validateCompression(
  original: readonly TrackSample[],
  compressed: readonly TrackSample[],
): ValidationResult {
  const originalGain = elevationGain(original);
  const elevationGainError = Math.abs(originalGain - elevationGain(compressed));
  const elevationGainErrorPct = errorPct(elevationGainError, originalGain);

  const originalDistance = totalDistance(original);
  const distanceError = Math.abs(originalDistance - totalDistance(compressed));
  const distanceErrorPct = errorPct(distanceError, originalDistance);

  return {
    elevationGainError,
    elevationGainErrorPct,
    distanceError,
    distanceErrorPct,
    isValid:
      elevationGainErrorPct < MAX_ELEVATION_GAIN_ERROR_PCT &&
      distanceErrorPct < MAX_DISTANCE_ERROR_PCT,
  };
}
