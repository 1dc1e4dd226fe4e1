import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TrackCompressionPort } from '@trackfold/domain';

const sessionCompressBodySchema = z.object({
  epsilon: z.number().positive().optional(),
  preserveElevationChanges: z.boolean().optional(),
  elevationThreshold: z.number().min(0).optional(),
  dryRun: z.boolean().optional().default(false),
});

export function sessionsRouter(compression: TrackCompressionPort): Router {
  const router = Router();

  /** POST /api/sessions/:sessionId/compress — compress a stored track with retry */
  router.post('/:sessionId/compress', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = sessionCompressBodySchema.parse(req.body ?? {});
      const outcome = await compression.compressSession(req.params['sessionId'], body);
      res.json(outcome);
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/sessions/:sessionId/inspection — sample counts and out-of-range samples */
  router.get('/:sessionId/inspection', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await compression.inspectSession(req.params['sessionId']));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
