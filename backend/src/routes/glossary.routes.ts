import { Router } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { getProvider } from '../ai/providers/registry';
import { RunningContext, TermExtractor, extractAll } from '../ai/termExtractor';
import { chunkSchema } from '../services/chunks.service';
import { glossaryStore } from '../services/glossary.service';
import {
  buildReviewTable,
  parseReviewRows,
  reviewTableFromWorkbook,
  reviewTableToWorkbook,
} from '../services/review.service';
import { ApiError } from '../utils/apiError';
import { asyncHandler } from '../utils/asyncHandler';
import { resolveRunConfig } from '../utils/runConfig';

const extractSchema = z.object({
  chunks: z.array(chunkSchema).min(1),
  provider: z.string().optional(),
  apiKey: z.string().optional(),
  contextWindow: z.number().int().min(0).optional(),
});

const reviewSchema = z.object({
  rows: z.array(z.unknown()),
});

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 5 * 1024 * 1024 } });

export const glossaryRoutes = Router();

// The reviewed glossary a run would see right now
glossaryRoutes.get(
  '/',
  asyncHandler(async (_req, res) => {
    const snapshot = await glossaryStore.snapshot();
    res.json({
      version: snapshot.version,
      worldSummary: snapshot.worldSummary ?? null,
      entries: snapshot.entries(),
    });
  }),
);

glossaryRoutes.get(
  '/review',
  asyncHandler(async (_req, res) => {
    const kb = await glossaryStore.current();
    res.json({ version: kb.version, rows: buildReviewTable(kb) });
  }),
);

glossaryRoutes.get(
  '/review.xlsx',
  asyncHandler(async (_req, res) => {
    const kb = await glossaryStore.current();
    const buffer = reviewTableToWorkbook(buildReviewTable(kb));
    res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    res.setHeader('Content-Disposition', `attachment; filename="glossary_review_v${kb.version}.xlsx"`);
    res.send(buffer);
  }),
);

glossaryRoutes.post(
  '/review',
  asyncHandler(async (req, res) => {
    const { rows } = reviewSchema.parse(req.body);
    const report = await glossaryStore.applyReview(parseReviewRows(rows));
    res.json(report);
  }),
);

glossaryRoutes.post(
  '/review/import',
  upload.single('file'),
  asyncHandler(async (req, res) => {
    if (!req.file) {
      throw ApiError.badRequest('Review workbook is required');
    }
    const rows = reviewTableFromWorkbook(req.file.buffer);
    const report = await glossaryStore.applyReview(rows);
    res.json({ ...report, rows: rows.length });
  }),
);

glossaryRoutes.post(
  '/extract',
  asyncHandler(async (req, res) => {
    const payload = extractSchema.parse(req.body);
    const config = resolveRunConfig();
    const extractor = new TermExtractor(getProvider(payload.provider, payload.apiKey), {
      retry: { retryBudget: config.retryBudget, baseDelayMs: config.retryBaseDelayMs },
    });
    const summary = await extractAll(payload.chunks, extractor, new RunningContext(payload.contextWindow));
    const merge = await glossaryStore.mergeCandidates(summary.candidates, summary.worldSummary);
    res.json({ merge, unresolved: summary.unresolved });
  }),
);
