import { Router, type Request, type Response } from 'express';
import { z } from 'zod';

import type { RankedMatch } from '../rag/schema';
import type { AssistantServices } from '../services';
import type { ErrorResponse, MatchResponse, RetrieveResponse, ValidationErrorResponse } from '../types';
import { formatIssues } from './query';

const retrieveSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  top_k: z.number().int().min(1).max(50).optional(),
});

const toMatchResponse = (match: RankedMatch): MatchResponse => ({
  id: match.id,
  score: match.score,
  relevance_boost: match.relevanceBoost,
  adjusted_score: match.adjustedScore,
  source_file: match.metadata.sourceFile,
  page: match.metadata.page,
  text: match.metadata.text,
});

export const createRetrieveRouter = (services: AssistantServices): Router => {
  const router = Router();

  router.post('/', async (req: Request, res: Response<RetrieveResponse | ErrorResponse | ValidationErrorResponse>) => {
    const validation = retrieveSchema.safeParse(req.body);

    if (!validation.success) {
      res.status(400).json({ errors: formatIssues(validation.error) });
      return;
    }

    const { query, top_k: topK = services.defaultTopK } = validation.data;

    try {
      const matches = await services.retriever.retrieve(query, topK);
      res.json({ query, matches: matches.map(toMatchResponse) });
    } catch (error) {
      console.error('[QUERY] Retrieval failed.', error);
      const detail = error instanceof Error ? error.message : 'Unknown error';
      res.status(503).json({ error: `Retrieval failed: ${detail}` });
    }
  });

  return router;
};
