import { Router } from 'express';
import { glossaryRoutes } from './glossary.routes';
import { runRoutes } from './runs.routes';

export const routes = Router();

routes.use('/glossary', glossaryRoutes);
routes.use('/runs', runRoutes);
