import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { compressTrack, explainKeyPoints, validateCompression } from '@trackfold/domain';
import { compressionParamsSchema, trackSampleSchema } from './track-sample.schema.js';

export const compressionRouter = Router();

const compressBodySchema = compressionParamsSchema.extend({
  samples: z.array(trackSampleSchema),
  includeSamples: z.boolean().optional().default(false),
  explain: z.boolean().optional().default(false),
});

const validateBodySchema = z.object({
  original: z.array(trackSampleSchema),
  compressed: z.array(trackSampleSchema),
});

/** POST /api/compression/compress — compress an in-memory track */
compressionRouter.post('/compress', (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = compressBodySchema.parse(req.body);
    const result = compressTrack(body);

    const keyPoints = body.explain
      ? [...explainKeyPoints(body.samples, body).entries()]
          .sort(([a], [b]) => a - b)
          .map(([index, reasons]) => ({ index, reasons }))
      : undefined;

    res.json({
      ...result,
      ...(body.includeSamples ? { samples: result.keptIndices.map((i) => body.samples[i]) } : {}),
      ...(keyPoints ? { keyPoints } : {}),
    });
  } catch (err) {
    next(err);
  }
});

/** POST /api/compression/validate — compare aggregates of two tracks */
compressionRouter.post('/validate', (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = validateBodySchema.parse(req.body);
    res.json(validateCompression(body.original, body.compressed));
  } catch (err) {
    next(err);
  }
});
