import type { TrackSample, CompressedSample } from '../entities/track-sample.js';
import { isCompressedSample } from '../entities/track-sample.js';
import type {
  CompressionRequest,
  CompressionResult,
  DeviationSummary,
} from '../entities/compression.js';
import { DEFAULT_ELEVATION_THRESHOLD_M } from '../entities/compression.js';
import { perpendicularDistance } from '../geo/distance.js';
import { detectKeyPoints } from './key-point-detector.js';
import { simplifyIndices } from './douglas-peucker.js';

/**
 * Reduces a track to the union of its key points and its Douglas–Peucker
 * points. Pure: samples are never mutated and no state is retained.
 */
export function compressTrack(request: CompressionRequest): CompressionResult {
  const { samples, epsilon } = request;
  const n = samples.length;

  if (n <= 2) {
    return {
      keptIndices: samples.map((_, i) => i),
      originalCount: n,
      compressedCount: n,
      compressionRatio: 1.0,
      keyPointCount: n,
    };
  }

  const keyIndices = detectKeyPoints(samples, {
    preserveElevationChanges: request.preserveElevationChanges ?? true,
    elevationThreshold: request.elevationThreshold ?? DEFAULT_ELEVATION_THRESHOLD_M,
  });
  const dpIndices = simplifyIndices(samples, epsilon, 0, n - 1);

  const kept = new Set<number>(keyIndices);
  for (const idx of dpIndices) kept.add(idx);
  const keptIndices = [...kept].sort((a, b) => a - b);

  return {
    keptIndices,
    originalCount: n,
    compressedCount: keptIndices.length,
    compressionRatio: keptIndices.length / n,
    keyPointCount: keyIndices.size,
  };
}

/** Same as {@link compressTrack}, returning the kept samples themselves. */
export function compressSamples(request: CompressionRequest): TrackSample[] {
  const { keptIndices } = compressTrack(request);
  return keptIndices.map((i) => request.samples[i]);
}

/** Chord deviation of each sample strictly between `left` and `right`. */
function spanDeviations(
  samples: readonly TrackSample[],
  left: number,
  right: number,
): number[] {
  const out: number[] = [];
  for (let i = left + 1; i < right; i++) {
    out.push(perpendicularDistance(samples[i], samples[left], samples[right]));
  }
  return out;
}

/**
 * Distance of every discarded sample from the chord joining its two
 * bracketing kept samples.
 */
export function measureDeviation(
  samples: readonly TrackSample[],
  keptIndices: readonly number[],
): DeviationSummary {
  let max = 0;
  let sum = 0;
  let count = 0;

  for (let k = 1; k < keptIndices.length; k++) {
    for (const d of spanDeviations(samples, keptIndices[k - 1], keptIndices[k])) {
      if (d > max) max = d;
      sum += d;
      count++;
    }
  }

  return {
    maxDeviation: max,
    meanDeviation: count > 0 ? sum / count : 0,
    discardedCount: count,
  };
}

/**
 * Tags kept samples with their index and the error of the span they close.
 *
 * Re-compressing an annotated track keeps each sample's first
 * `compressionIndex`, and its `compressionError` never shrinks.
 */
export function annotateCompression(
  samples: readonly TrackSample[],
  keptIndices: readonly number[],
  compressedAt: Date,
): CompressedSample[] {
  return keptIndices.map((index, k) => {
    const sample = samples[index];
    const previous = k > 0 ? keptIndices[k - 1] : index;
    const spanError = spanDeviations(samples, previous, index).reduce((m, d) => (d > m ? d : m), 0);
    const prior = isCompressedSample(sample) ? sample : null;
    return {
      ...sample,
      compressionIndex: prior ? prior.compressionIndex : index,
      compressionError: prior && prior.compressionError > spanError ? prior.compressionError : spanError,
      compressedAt,
    };
  });
}
