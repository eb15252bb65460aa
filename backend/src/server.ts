import http from 'http';
import { createApp } from './app';
import { glossaryStore } from './services/glossary.service';
import { env } from './utils/env';
import { logger } from './utils/logger';

const app = createApp();
const server = http.createServer(app);

server.listen(env.port, () => {
  logger.info(`termweave backend listening on port ${env.port}`);

  // Load the knowledge base early so the first request does not pay for it
  glossaryStore.current().catch((error) => {
    logger.error({ error }, 'Failed to load knowledge base');
  });
});
