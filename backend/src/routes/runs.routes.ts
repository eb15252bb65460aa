import { Router } from 'express';
import { z } from 'zod';
import { chunkSchema } from '../services/chunks.service';
import { runService } from '../services/run.service';
import { ApiError } from '../utils/apiError';
import { asyncHandler } from '../utils/asyncHandler';
import { runConfigSchema } from '../utils/runConfig';

const startRunSchema = z.object({
  chunks: z.array(chunkSchema).min(1),
  mode: z.enum(['tear', 'baseline']).optional(),
  provider: z.string().optional(),
  apiKey: z.string().optional(),
  config: runConfigSchema.partial().optional(),
  resumeRunId: z.string().min(1).optional(),
});

export const runRoutes = Router();

runRoutes.get('/', (_req, res) => {
  res.json(runService.list());
});

runRoutes.post(
  '/',
  asyncHandler(async (req, res) => {
    const payload = startRunSchema.parse(req.body);
    const progress = await runService.start(payload);
    res.status(202).json(progress);
  }),
);

runRoutes.get('/:runId', (req, res) => {
  const progress = runService.get(req.params.runId);
  if (!progress) {
    throw ApiError.notFound('Run not found');
  }
  res.json(progress);
});

runRoutes.post('/:runId/cancel', (req, res) => {
  const progress = runService.cancel(req.params.runId);
  if (!progress) {
    throw ApiError.notFound('Run not found');
  }
  res.json(progress);
});

runRoutes.get('/:runId/output', (req, res) => {
  const progress = runService.get(req.params.runId);
  if (!progress) {
    throw ApiError.notFound('Run not found');
  }
  if (progress.status === 'running' || progress.status === 'cancelling') {
    throw ApiError.conflict('Run is still in progress');
  }
  const output = runService.output(req.params.runId);
  res.json({ runId: progress.runId, status: progress.status, report: progress.report ?? null, output });
});
