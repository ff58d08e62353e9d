import express from 'express';
import { scoreRequestSchema } from '../validators/scoreSchema';
import { EndpointError, PreconditionError } from '../lib/errors';
import { logger } from '../lib/logger';
import { LmScoreFn } from '../types/score';

export function createScoreRouter(lmScore: LmScoreFn) {
  const router = express.Router();

  router.post('/', async (req, res) => {
    const parsed = scoreRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.errors });
      return;
    }

    try {
      const result = await lmScore(...parsed.data.args);
      res.status(200).json(result);
    } catch (err: unknown) {
      if (err instanceof PreconditionError) {
        res.status(400).json({ error: err.code, message: err.message });
      } else if (err instanceof EndpointError) {
        res.status(502).json({ error: err.code, message: err.message, status: err.status });
      } else {
        logger.error({ err }, 'score route error');
        res.status(500).json({ error: 'internal_error' });
      }
    }
  });

  return router;
}

export default createScoreRouter;
