import pLimit from 'p-limit';
import type { RunLedger } from '../services/runLedger.service';
import type { Chunk, LedgerEntry, TranslationRecord } from '../types/translation';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { callWithRetry, withSchemaReprompt, type RetryPolicy } from './retry';
import { classifyError, createPendingRecord } from './tearOrchestrator';
import type { BaselineCapability } from './translator';

export type BaselineOptions = {
  retry: RetryPolicy;
  concurrencyLimit: number;
  ledger?: RunLedger;
};

export type BaselineRunOptions = {
  /** Chunks not yet started when this fires are left out of the result. */
  signal?: AbortSignal;
  onRecord?: (record: TranslationRecord) => void;
};

/**
 * Single-pass translation with no glossary and no evaluation. Produces the
 * same record shape as a finished TEaR chunk so the two can be compared.
 */
export class BaselineTranslator {
  constructor(
    private readonly capability: BaselineCapability,
    private readonly options: BaselineOptions,
  ) {}

  async translateChunk(chunk: Chunk): Promise<TranslationRecord> {
    if (!chunk.id || !chunk.text) {
      throw new ValidationError('Chunk must have an id and non-empty text', { chunkId: chunk.id });
    }
    const startedAt = Date.now();
    const context = { chunkId: chunk.id, step: 'baseline' };
    const result = await withSchemaReprompt(
      () => callWithRetry(() => this.capability.translatePlain(chunk), this.options.retry, context),
      context,
    );

    const record: TranslationRecord = {
      ...createPendingRecord(chunk),
      draft: result.text,
      finalTranslation: result.text,
      iterationCount: 1,
      status: 'done',
      meta: { model: result.model, elapsedMs: Date.now() - startedAt },
    };
    await this.options.ledger?.append({
      chunkId: chunk.id,
      state: 'finalized',
      timestamp: new Date().toISOString(),
      payload: record,
    });
    return record;
  }

  /**
   * Failed chunks come back as failed records; siblings keep going. Chunks
   * the ledger already has as done are reused without a call.
   */
  async translateAll(chunks: Chunk[], runOptions: BaselineRunOptions = {}): Promise<TranslationRecord[]> {
    const previous = (await this.options.ledger?.replay()) ?? new Map<string, LedgerEntry>();
    const limit = pLimit(this.options.concurrencyLimit);
    const outcomes = await Promise.all(
      chunks.map((chunk) => {
        const last = previous.get(chunk.id);
        if (last && last.payload.status === 'done') {
          logger.debug({ chunkId: chunk.id }, 'Baseline chunk already done, skipping');
          return Promise.resolve<TranslationRecord | null>(last.payload);
        }
        return limit(async (): Promise<TranslationRecord | null> => {
          if (runOptions.signal?.aborted) return null;
          let record: TranslationRecord;
          try {
            record = await this.translateChunk(chunk);
          } catch (error) {
            logger.error({ chunkId: chunk.id, error }, 'Baseline translation failed');
            record = { ...createPendingRecord(chunk), status: 'failed', error: classifyError(error) };
          }
          runOptions.onRecord?.(record);
          return record;
        });
      }),
    );
    return outcomes
      .filter((record): record is TranslationRecord => record !== null)
      .sort((a, b) => a.positionKey - b.positionKey);
  }
}
