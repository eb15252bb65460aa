import { z } from 'zod';
import type { RunConfig } from '../types/translation';
import { env } from './env';
import { ValidationError } from './errors';

export const runConfigSchema = z.object({
  maxIterations: z.number().int().min(1),
  fidelityThreshold: z.number().min(0).max(1),
  allowMinorViolations: z.boolean(),
  concurrencyLimit: z.number().int().min(1),
  retryBudget: z.number().int().min(0),
  retryBaseDelayMs: z.number().int().min(0),
  styleReview: z.boolean(),
});

export const defaultRunConfig = (): RunConfig => ({
  maxIterations: env.tearMaxIterations,
  fidelityThreshold: env.tearFidelityThreshold,
  allowMinorViolations: env.tearAllowMinorViolations,
  concurrencyLimit: env.tearConcurrency,
  retryBudget: env.aiMaxRetries,
  retryBaseDelayMs: env.aiRetryDelayMs,
  styleReview: env.tearStyleReview,
});

/** Env defaults overlaid with `overrides`, validated. */
export const resolveRunConfig = (overrides: Partial<RunConfig> = {}): RunConfig => {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const result = runConfigSchema.safeParse({ ...defaultRunConfig(), ...defined });
  if (!result.success) {
    throw new ValidationError('Invalid run configuration', result.error.issues);
  }
  return result.data;
};
