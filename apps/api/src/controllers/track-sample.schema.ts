import { z } from 'zod';
import { DEFAULT_ELEVATION_THRESHOLD_M } from '@trackfold/domain';

// Epoch milliseconds or an ISO-8601 string with offset.
const timestampSchema = z
  .union([z.string().datetime({ offset: true }), z.number().int().nonnegative()])
  .transform((value) => new Date(value));

/**
 * Shape check only. Coordinates and accuracies are not range-checked here:
 * compression accepts any finite values, and the inspection endpoint reports them.
 */
export const trackSampleSchema = z.object({
  timestamp: timestampSchema,
  latitude: z.number(),
  longitude: z.number(),
  rawAltitude: z.number(),
  barometricAltitude: z.number().optional(),
  fusedAltitude: z.number().optional(),
  elevationConfidence: z.number().optional(),
  elevationAccuracy: z.number().optional(),
  horizontalAccuracy: z.number(),
  verticalAccuracy: z.number(),
  speed: z.number(),
  course: z.number().optional(),
});

export const compressionParamsSchema = z.object({
  epsilon: z.number().positive(),
  preserveElevationChanges: z.boolean().optional().default(true),
  elevationThreshold: z.number().min(0).optional().default(DEFAULT_ELEVATION_THRESHOLD_M),
});
