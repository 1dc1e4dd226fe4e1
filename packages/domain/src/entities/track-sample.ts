export interface TrackSample {
  readonly timestamp: Date;
  readonly latitude: number;
  readonly longitude: number;
  readonly rawAltitude: number;          // device-reported, meters
  readonly barometricAltitude?: number;  // meters, pressure sensor
  readonly fusedAltitude?: number;       // meters, sensor-fusion estimate
  readonly elevationConfidence?: number; // 0.0-1.0, applies to fusedAltitude
  readonly elevationAccuracy?: number;   // meters
  readonly horizontalAccuracy: number;   // meters
  readonly verticalAccuracy: number;     // meters
  readonly speed: number;                // m/s, >= 0
  readonly course?: number;              // degrees [0,360); negative = unknown
}

/** Minimum confidence for the fused estimate to win over the other sources. */
export const FUSED_ALTITUDE_MIN_CONFIDENCE = 0.5;

/**
 * Resolves the single altitude every elevation computation uses.
 * Priority: fused (when confident) → barometric → raw.
 */
export function bestAltitude(sample: TrackSample): number {
  if (
    sample.fusedAltitude !== undefined &&
    sample.elevationConfidence !== undefined &&
    sample.elevationConfidence >= FUSED_ALTITUDE_MIN_CONFIDENCE
  ) {
    return sample.fusedAltitude;
  }
  if (sample.barometricAltitude !== undefined) {
    return sample.barometricAltitude;
  }
  return sample.rawAltitude;
}

/** Signed best-altitude delta going from `from` to `to`. */
export function elevationChange(from: TrackSample, to: TrackSample): number {
  return bestAltitude(to) - bestAltitude(from);
}

/** True when the elevation estimate meets the ±1 m target. */
export function hasAccurateElevation(sample: TrackSample): boolean {
  if (sample.elevationAccuracy === undefined || sample.elevationConfidence === undefined) {
    return false;
  }
  return sample.elevationAccuracy <= 1.0 && sample.elevationConfidence >= 0.7;
}

/**
 * A kept sample after compression, tagged with where it came from.
 * `compressionError` is the largest deviation (meters) among the samples
 * dropped between the previous kept sample and this one.
 */
export interface CompressedSample extends TrackSample {
  readonly compressionIndex: number;
  readonly compressionError: number;
  readonly compressedAt: Date;
}

export function isCompressedSample(sample: TrackSample): sample is CompressedSample {
  return 'compressionIndex' in sample;
}
