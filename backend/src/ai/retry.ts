import { ExternalCallError, SchemaError } from '../utils/errors';
import { logger } from '../utils/logger';

export type RetryPolicy = {
  /** Extra attempts after the first one. */
  retryBudget: number;
  baseDelayMs: number;
};

const wait = (ms: number) => (ms > 0 ? new Promise<void>((resolve) => setTimeout(resolve, ms)) : Promise.resolve());

/**
 * Runs `operation`, retrying retryable ExternalCallErrors with linear backoff
 * until the budget is spent. Anything else propagates on first sight.
 */
export const callWithRetry = async <T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  context: Record<string, unknown> = {},
): Promise<T> => {
  let attempt = 1;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof ExternalCallError) || !error.retryable || attempt > policy.retryBudget) {
        throw error;
      }
      logger.warn({ ...context, attempt, error: error.message }, 'External call failed, retrying');
      await wait(policy.baseDelayMs * attempt);
      attempt += 1;
    }
  }
};

/**
 * Structured output gets exactly one re-prompt. The second SchemaError
 * propagates with its raw payload.
 */
export const withSchemaReprompt = async <T>(
  produce: (reprompt: boolean) => Promise<T>,
  context: Record<string, unknown> = {},
): Promise<T> => {
  try {
    return await produce(false);
  } catch (error) {
    if (!(error instanceof SchemaError)) throw error;
    logger.warn({ ...context, error: error.message }, 'Malformed model output, re-prompting once');
    return produce(true);
  }
};
