import { Router, type Request, type Response } from 'express';

import type { AssistantServices } from '../services';
import type { HealthResponse } from '../types';

export const createHealthRouter = (services: AssistantServices): Router => {
  const router = Router();

  router.get('/', async (_req: Request, res: Response<HealthResponse>) => {
    const { collection, llm } = services;

    try {
      const vectors = await services.index.count();
      res.json({ status: 'ok', index: { collection, vectors }, llm });
    } catch (error) {
      const detail = error instanceof Error ? error.message : 'Unknown error';
      res.status(503).json({ status: 'degraded', index: { collection, error: detail }, llm });
    }
  });

  return router;
};
