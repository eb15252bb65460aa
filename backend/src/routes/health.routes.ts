import { Router } from 'express';
import { listProviders } from '../ai/providers/registry';
import { glossaryStore } from '../services/glossary.service';
import { runService } from '../services/run.service';
import { asyncHandler } from '../utils/asyncHandler';

export const healthRoutes = Router();

healthRoutes.get('/', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

/**
 * Knowledge base version, configured providers and active runs
 */
healthRoutes.get(
  '/status',
  asyncHandler(async (_req, res) => {
    const kb = await glossaryStore.current();
    res.json({
      status: 'ok',
      glossary: { version: kb.version, entries: kb.size },
      providers: listProviders(),
      runs: runService.list().filter((run) => run.status === 'running').length,
      timestamp: new Date().toISOString(),
    });
  }),
);
