import type { TrackSample } from '../entities/track-sample.js';
import { EARTH_RADIUS_M } from '../geo/distance.js';

/** Meters per degree of latitude (and of longitude on the equator). */
export const M_PER_DEG = (EARTH_RADIUS_M * Math.PI) / 180;

const T0 = Date.UTC(2026, 0, 10, 7, 0, 0);

export function makeSample(overrides: Partial<TrackSample> = {}): TrackSample {
  return {
    timestamp: new Date(T0),
    latitude: 0,
    longitude: 0,
    rawAltitude: 0,
    horizontalAccuracy: 5,
    verticalAccuracy: 3,
    speed: 1.4,
    course: 90,
    ...overrides,
  };
}

/** Local east/north offsets in meters from (0°, 0°), one second apart. */
export function trackFromMeters(
  points: Array<{ east: number; north: number; altitude?: number; speed?: number }>,
): TrackSample[] {
  return points.map((p, i) =>
    makeSample({
      timestamp: new Date(T0 + i * 1000),
      latitude: p.north / M_PER_DEG,
      longitude: p.east / M_PER_DEG,
      rawAltitude: p.altitude ?? 0,
      speed: p.speed ?? 1.4,
    }),
  );
}

/** Straight eastward line along the equator, flat, constant speed. */
export function straightTrack(count: number, spacingM = 1): TrackSample[] {
  return trackFromMeters(Array.from({ length: count }, (_, i) => ({ east: i * spacingM, north: 0 })));
}

/**
 * Gentle arc of the given radius: heading changes by step/radius per sample,
 * far below the turn threshold, so only the endpoints are key points.
 */
export function arcTrack(count: number, radiusM = 500, stepM = 2): TrackSample[] {
  return trackFromMeters(
    Array.from({ length: count }, (_, i) => {
      const theta = (i * stepM) / radiusM;
      return { east: radiusM * Math.sin(theta), north: radiusM * (1 - Math.cos(theta)) };
    }),
  );
}
