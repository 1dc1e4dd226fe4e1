import type { GeoPoint } from '../geo/distance.js';
import { perpendicularDistance } from '../geo/distance.js';

interface Farthest {
  index: number;
  distance: number;
}

/**
 * Interior index farthest from the start→end chord; first one wins ties.
 * `index` stays at `start` when no interior point is off the chord.
 */
function findFarthest(points: readonly GeoPoint[], start: number, end: number): Farthest {
  let index = start;
  let distance = 0;
  const a = points[start];
  const b = points[end];
  for (let i = start + 1; i < end; i++) {
    const d = perpendicularDistance(points[i], a, b);
    if (d > distance) {
      distance = d;
      index = i;
    }
  }
  return { index, distance };
}

// A span splits only at a real interior point, so a negative epsilon cannot
// re-queue a collinear span.
function shouldSplit(farthest: Farthest, from: number, epsilon: number): boolean {
  return farthest.index > from && farthest.distance > epsilon;
}

function sortedIndices(kept: Set<number>): number[] {
  return [...kept].sort((x, y) => x - y);
}

/**
 * Douglas–Peucker over the index range [start, end] of `points`, returning
 * original indices (ascending, unique). Uses an explicit work stack so that
 * long irregular tracks cannot exhaust the call stack.
 */
export function simplifyIndices(
  points: readonly GeoPoint[],
  epsilon: number,
  start = 0,
  end = points.length - 1,
): number[] {
  if (points.length === 0 || end < start) return [];

  const kept = new Set<number>();
  const spans: Array<[number, number]> = [[start, end]];

  while (spans.length > 0) {
    const span = spans.pop();
    if (!span) break;
    const [from, to] = span;

    if (to - from <= 1) {
      kept.add(from);
      kept.add(to);
      continue;
    }

    const farthest = findFarthest(points, from, to);
    if (shouldSplit(farthest, from, epsilon)) {
      spans.push([farthest.index, to]);
      spans.push([from, farthest.index]);
    } else {
      kept.add(from);
      kept.add(to);
    }
  }

  return sortedIndices(kept);
}

/**
 * Recursive form of {@link simplifyIndices}. Same output; recursion depth
 * grows with the number of splits, so keep it to tests and short tracks.
 */
export function simplifyIndicesRecursive(
  points: readonly GeoPoint[],
  epsilon: number,
  start = 0,
  end = points.length - 1,
): number[] {
  if (points.length === 0 || end < start) return [];

  const kept = new Set<number>();
  const visit = (from: number, to: number): void => {
    if (to - from <= 1) {
      kept.add(from);
      kept.add(to);
      return;
    }
    const farthest = findFarthest(points, from, to);
    if (shouldSplit(farthest, from, epsilon)) {
      visit(from, farthest.index);
      visit(farthest.index, to);
    } else {
      kept.add(from);
      kept.add(to);
    }
  };

  visit(start, end);
  return sortedIndices(kept);
}
