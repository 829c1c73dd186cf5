import express, { type ErrorRequestHandler, type Express } from 'express';

import { createHealthRouter } from './routes/health';
import { createQueryRouter } from './routes/query';
import { createRetrieveRouter } from './routes/retrieve';
import type { AssistantServices } from './services';

const statusOf = (error: unknown): number => {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
};

// body-parser failures (bad JSON, oversized bodies) carry their own status
const handleErrors: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
  const status = statusOf(error);

  if (status >= 500) {
    console.error('Unhandled request error.', error);
  }

  res.status(status).json({ error: status >= 500 ? 'Internal server error' : 'Invalid request body' });
};

export const createApp = (services: AssistantServices): Express => {
  const app = express();
  app.use(express.json());

  app.use('/query', createQueryRouter(services));
  app.use('/retrieve', createRetrieveRouter(services));
  app.use('/health', createHealthRouter(services));

  app.use(handleErrors);

  return app;
};
