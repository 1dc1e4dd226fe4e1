/**
 * Spherical-earth distance helpers shared by the key point pass, the
 * simplifier and the validator.
 */

export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
}

export const EARTH_RADIUS_M = 6_371_000;

function toRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

function toDeg(rad: number): number {
  return (rad * 180) / Math.PI;
}

/** Haversine distance in meters. */
export function greatCircleDistance(p1: GeoPoint, p2: GeoPoint): number {
  const dLat = toRad(p2.latitude - p1.latitude);
  const dLng = toRad(p2.longitude - p1.longitude);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(p1.latitude)) * Math.cos(toRad(p2.latitude)) * Math.sin(dLng / 2) ** 2;
  return EARTH_RADIUS_M * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/**
 * Distance in meters from `point` to the segment lineStart→lineEnd.
 *
 * The projection parameter is found treating lat/lng degrees as planar
 * coordinates, clamped to the segment; the distance to the projected location
 * is then measured with the haversine formula. Fine at single-activity scale
 * (tens of km), not a geodesic projection.
 */
export function perpendicularDistance(
  point: GeoPoint,
  lineStart: GeoPoint,
  lineEnd: GeoPoint,
): number {
  const dLat = lineEnd.latitude - lineStart.latitude;
  const dLng = lineEnd.longitude - lineStart.longitude;
  const lenSq = dLat * dLat + dLng * dLng;

  if (lenSq === 0) return greatCircleDistance(point, lineStart);

  const dot =
    (point.latitude - lineStart.latitude) * dLat +
    (point.longitude - lineStart.longitude) * dLng;
  const t = Math.min(1, Math.max(0, dot / lenSq));

  return greatCircleDistance(point, {
    latitude: lineStart.latitude + t * dLat,
    longitude: lineStart.longitude + t * dLng,
  });
}

/** Initial bearing (forward azimuth) in degrees [0, 360). */
export function bearing(from: GeoPoint, to: GeoPoint): number {
  const lat1 = toRad(from.latitude);
  const lat2 = toRad(to.latitude);
  const dLng = toRad(to.longitude - from.longitude);

  const y = Math.sin(dLng) * Math.cos(lat2);
  const x = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLng);

  const deg = toDeg(Math.atan2(y, x));
  const normalized = deg >= 0 ? deg : deg + 360;
  return normalized === 360 ? 0 : normalized;
}

/**
 * Signed heading change at `via`, in (-180, 180].
 * Positive is a right (clockwise) turn.
 */
export function turnAngle(from: GeoPoint, via: GeoPoint, to: GeoPoint): number {
  let angle = bearing(via, to) - bearing(from, via);
  while (angle > 180) angle -= 360;
  while (angle <= -180) angle += 360;
  return angle;
}
