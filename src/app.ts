import express, { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import { createScoreRouter } from './routes/score';
import { logger } from './lib/logger';
import { LmScoreFn, ScoringConfig } from './types/score';

function clientErrorOf(err: unknown): { status: number; type: string } | null {
  if (typeof err !== 'object' || err === null || !('status' in err) || typeof err.status !== 'number') return null;
  if (err.status < 400 || err.status >= 500) return null;
  const type = 'type' in err && typeof err.type === 'string' ? err.type : 'bad_request';
  return { status: err.status, type };
}

export interface AppDeps {
  lmScore: LmScoreFn;
  config: ScoringConfig;
}

export function createApp({ lmScore, config }: AppDeps) {
  const app = express();
  app.use(bodyParser.json({ limit: '1mb' }));

  app.use('/api/score', createScoreRouter(lmScore));

  app.get('/health', (req, res) => {
    res.json({
      ok: true,
      model: config.endpoint.model,
      ensemble: config.ensemble,
      aggregation: config.aggregation,
      ensembleSize: config.ensembleSize,
      thinking: config.thinkingEnabled
    });
  });

  // error handler; body-parser rejections (bad JSON, oversized body) carry their own 4xx status
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const clientError = clientErrorOf(err);
    if (clientError) {
      res.status(clientError.status).json({ error: clientError.type });
      return;
    }
    logger.error({ err }, 'unhandled error');
    res.status(500).json({ error: 'internal_error' });
  });

  return app;
}

export default createApp;
