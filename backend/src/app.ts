import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { routes } from './routes';
import { healthRoutes } from './routes/health.routes';
import { errorHandler } from './utils/errorHandler';
import { logger } from './utils/logger';

export const createApp = () => {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: '*',
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true }));
  app.use(compression());
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, url: req.originalUrl }, 'Incoming request');
    next();
  });

  app.use('/health', healthRoutes);
  app.use('/api', routes);

  app.use(errorHandler);

  return app;
};
