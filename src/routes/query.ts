import { Router, type Request, type Response } from 'express';
import { z } from 'zod';

import { answerQuestion } from '../pipeline/answer';
import { isAnswerError } from '../pipeline/synthesize';
import type { AssistantServices } from '../services';
import type {
  AnswerErrorResponse,
  AnswerResponse,
  ErrorResponse,
  QueryRequest,
  ValidationErrorResponse,
} from '../types';

const querySchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  top_k: z.number().int().min(1).max(50).optional(),
  mode: z.enum(['local', 'generative']).optional(),
}) satisfies z.ZodType<QueryRequest>;

export const formatIssues = (error: z.ZodError): ValidationErrorResponse['errors'] =>
  error.issues.map((issue) => ({
    path: issue.path.join('.') || undefined,
    message: issue.message,
  }));

export const createQueryRouter = (services: AssistantServices): Router => {
  const router = Router();

  router.post(
    '/',
    async (req: Request, res: Response<AnswerResponse | AnswerErrorResponse | ErrorResponse | ValidationErrorResponse>) => {
      const validation = querySchema.safeParse(req.body);

      if (!validation.success) {
        res.status(400).json({ errors: formatIssues(validation.error) });
        return;
      }

      const { query, top_k: topK = services.defaultTopK, mode = services.defaultMode } = validation.data;

      try {
        const { result } = await answerQuestion(services, { query, topK, mode });

        if (isAnswerError(result)) {
          res.status(502).json({
            query: result.query,
            error: result.error,
            error_kind: result.errorKind,
            mode: result.mode,
          });
          return;
        }

        res.json({
          query: result.query,
          answer: result.answer,
          sources: result.sources,
          confidence: result.confidence,
          context_used: result.contextUsed,
          mode: result.mode,
        });
      } catch (error) {
        console.error('[QUERY] Retrieval failed.', error);
        const detail = error instanceof Error ? error.message : 'Unknown error';
        res.status(503).json({ error: `Retrieval failed: ${detail}` });
      }
    },
  );

  return router;
};
