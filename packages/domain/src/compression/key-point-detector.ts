import type { TrackSample } from '../entities/track-sample.js';
import { bestAltitude } from '../entities/track-sample.js';
import type { KeyPointReason } from '../entities/compression.js';
import { DEFAULT_ELEVATION_THRESHOLD_M } from '../entities/compression.js';
import { turnAngle } from '../geo/distance.js';

export const TURN_ANGLE_THRESHOLD_DEG = 30;
export const SPEED_CHANGE_THRESHOLD_MPS = 2.0;

export interface KeyPointOptions {
  preserveElevationChanges?: boolean;
  elevationThreshold?: number;
}

/**
 * Single forward pass marking samples that must survive compression for
 * behavioural reasons. Each rule is independent; an index can carry several
 * reasons.
 */
export function explainKeyPoints(
  samples: readonly TrackSample[],
  options: KeyPointOptions = {},
): Map<number, KeyPointReason[]> {
  const preserveElevation = options.preserveElevationChanges ?? true;
  const threshold = options.elevationThreshold ?? DEFAULT_ELEVATION_THRESHOLD_M;
  const reasons = new Map<number, KeyPointReason[]>();
  const n = samples.length;

  const mark = (index: number, reason: KeyPointReason): void => {
    const existing = reasons.get(index);
    if (existing) {
      if (!existing.includes(reason)) existing.push(reason);
    } else {
      reasons.set(index, [reason]);
    }
  };

  if (n === 0) return reasons;

  mark(0, 'endpoint');
  mark(n - 1, 'endpoint');

  for (let i = 1; i < n; i++) {
    const prev = samples[i - 1];
    const current = samples[i];

    if (Math.abs(current.speed - prev.speed) >= SPEED_CHANGE_THRESHOLD_MPS) {
      mark(i, 'speed-change');
    }

    if (i === n - 1) continue;
    const next = samples[i + 1];

    if (preserveElevation) {
      const prevAlt = bestAltitude(prev);
      const alt = bestAltitude(current);
      const nextAlt = bestAltitude(next);
      const riseIn = Math.abs(alt - prevAlt);
      const riseOut = Math.abs(nextAlt - alt);

      if (riseIn >= threshold || riseOut >= threshold) {
        mark(i, 'elevation-change');
      }

      const isPeak = alt > prevAlt && alt > nextAlt;
      const isValley = alt < prevAlt && alt < nextAlt;
      if ((isPeak || isValley) && (riseIn >= threshold || riseOut >= threshold)) {
        mark(i, 'elevation-extremum');
      }
    }

    if (Math.abs(turnAngle(prev, current, next)) >= TURN_ANGLE_THRESHOLD_DEG) {
      mark(i, 'turn');
    }
  }

  return reasons;
}

/** Indices that must be kept regardless of epsilon. */
export function detectKeyPoints(
  samples: readonly TrackSample[],
  options: KeyPointOptions = {},
): Set<number> {
  return new Set(explainKeyPoints(samples, options).keys());
}
