import type { TrackSample } from './track-sample.js';

export interface TrackSession {
  readonly id: string;
  readonly startedAt: Date;
  readonly endedAt?: Date;
  readonly sampleCount: number;
  readonly compressedAt?: Date;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export type SampleIssueField = 'latitude' | 'longitude' | 'horizontalAccuracy';

export interface SampleIssue {
  readonly index: number;
  readonly field: SampleIssueField;
  readonly value: number;
  readonly message: string;
}

/**
 * Reports samples whose coordinates or accuracy are out of range.
 * Informational: compression accepts these samples as they are.
 */
export function findSampleIssues(samples: readonly TrackSample[]): SampleIssue[] {
  const issues: SampleIssue[] = [];
  samples.forEach((s, index) => {
    if (Math.abs(s.latitude) > 90) {
      issues.push({ index, field: 'latitude', value: s.latitude, message: `Invalid latitude at point ${index}: ${s.latitude}` });
    }
    if (Math.abs(s.longitude) > 180) {
      issues.push({ index, field: 'longitude', value: s.longitude, message: `Invalid longitude at point ${index}: ${s.longitude}` });
    }
    if (s.horizontalAccuracy < 0) {
      issues.push({
        index,
        field: 'horizontalAccuracy',
        value: s.horizontalAccuracy,
        message: `Invalid accuracy at point ${index}: ${s.horizontalAccuracy}`,
      });
    }
  });
  return issues;
}
