import dotenv from 'dotenv';

import { createApp } from './app';
import { loadConfig } from './config';
import { createServices } from './services';

dotenv.config();

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

const server = app.listen(config.PORT, () => {
  console.log(`Server listening on port ${config.PORT}`);
});

const shutdown = (signal: string): void => {
  console.log(`Received ${signal}, shutting down.`);
  server.close(() => {
    services
      .close()
      .catch((error: unknown) => {
        console.error('Failed to close services.', error);
        process.exitCode = 1;
      });
  });
};

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
