import pLimit from 'p-limit';
import type { KnowledgeBaseSnapshot } from '../services/knowledgeBase.service';
import type { RunLedger } from '../services/runLedger.service';
import type {
  Chunk,
  ErrorKind,
  IterationOutcome,
  Judgment,
  LedgerEntry,
  RecordError,
  RunConfig,
  RunReport,
  TearState,
  TranslationRecord,
} from '../types/translation';
import { ExternalCallError, SchemaError, ValidationError, errorMessage } from '../utils/errors';
import { logger, previewText } from '../utils/logger';
import type { BackTranslationVerifier } from './backTranslationVerifier';
import { critique } from './critiqueEngine';
import { assertCheckable, type GlossaryChecker } from './glossaryChecker';
import { callWithRetry, withSchemaReprompt, type RetryPolicy } from './retry';
import type { StyleReviewer, TranslationCapability } from './translator';

export type TearDependencies = {
  translator: TranslationCapability;
  verifier: BackTranslationVerifier;
  checker: GlossaryChecker;
  ledger: RunLedger;
  /** Consulted only when the run config enables style review. */
  styleReviewer?: StyleReviewer;
};

export type RunOptions = {
  runId: string;
  signal?: AbortSignal;
  onTransition?: (entry: LedgerEntry) => void;
};

export type RunResult = {
  report: RunReport;
  /** Terminal records (done or failed), in document order. */
  records: TranslationRecord[];
};

type ChunkOutcome = { record: TranslationRecord; cancelled: boolean; skipped: boolean };

export const createPendingRecord = (chunk: Chunk): TranslationRecord => ({
  chunkId: chunk.id,
  positionKey: chunk.positionKey,
  group: chunk.group,
  source: chunk.text,
  draft: null,
  backTranslation: null,
  critique: null,
  violations: [],
  finalTranslation: null,
  iterationCount: 0,
  status: 'pending',
  fidelityScore: null,
  degraded: false,
  iterations: [],
  meta: { model: '', elapsedMs: 0 },
});

/** Fewest violations, then highest fidelity, then the earliest iteration. */
export const pickBestIteration = (iterations: IterationOutcome[]): IterationOutcome | null => {
  let best: IterationOutcome | null = null;
  for (const outcome of iterations) {
    if (
      !best ||
      outcome.violations.length < best.violations.length ||
      (outcome.violations.length === best.violations.length && outcome.fidelityScore > best.fidelityScore)
    ) {
      best = outcome;
    }
  }
  return best;
};

export const classifyError = (error: unknown): RecordError => {
  let kind: ErrorKind = 'unexpected';
  if (error instanceof ExternalCallError) kind = 'external';
  else if (error instanceof SchemaError) kind = 'schema';
  else if (error instanceof ValidationError) kind = 'validation';
  return {
    kind,
    message: errorMessage(error),
    ...(error instanceof SchemaError ? { rawPayload: error.rawPayload } : {}),
  };
};

/**
 * Runs the Translate -> Evaluate -> Refine loop over a document. Chunks run
 * in parallel up to the concurrency limit; inside a chunk every step waits
 * for the previous one, and every state change is in the ledger before the
 * next step starts.
 */
export class TearOrchestrator {
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly deps: TearDependencies,
    private readonly config: RunConfig,
  ) {
    this.retryPolicy = { retryBudget: config.retryBudget, baseDelayMs: config.retryBaseDelayMs };
  }

  async run(chunks: Chunk[], snapshot: KnowledgeBaseSnapshot, options: RunOptions): Promise<RunResult> {
    const seen = new Set<string>();
    for (const chunk of chunks) {
      if (seen.has(chunk.id)) {
        throw new ValidationError(`Duplicate chunk id ${chunk.id}`, { runId: options.runId });
      }
      seen.add(chunk.id);
    }

    const previous = await this.deps.ledger.replay();
    const limit = pLimit(this.config.concurrencyLimit);
    logger.info(
      {
        runId: options.runId,
        chunks: chunks.length,
        resumedFrom: previous.size,
        snapshotVersion: snapshot.version,
        concurrency: this.config.concurrencyLimit,
      },
      'Starting TEaR run',
    );

    const outcomes = await Promise.all(
      chunks.map((chunk) => {
        const last = previous.get(chunk.id);
        if (last && last.payload.status === 'done') {
          logger.debug({ runId: options.runId, chunkId: chunk.id }, 'Chunk already done, skipping');
          return Promise.resolve<ChunkOutcome>({ record: last.payload, cancelled: false, skipped: true });
        }
        return limit(() => this.processChunk(chunk, snapshot, options));
      }),
    );

    const report = this.buildReport(options.runId, outcomes);
    logger.info(
      {
        runId: options.runId,
        done: report.done,
        doneDegraded: report.doneDegraded,
        failed: report.failed,
        cancelled: report.cancelled,
      },
      'TEaR run finished',
    );

    return {
      report,
      records: outcomes
        .filter((outcome) => !outcome.cancelled)
        .map((outcome) => outcome.record)
        .sort((a, b) => a.positionKey - b.positionKey),
    };
  }

  /**
   * One chunk from Pending to a terminal state. Cancellation is only looked
   * at between persisted transitions, so a cancelled chunk's last ledger
   * entry is always a complete record.
   */
  async processChunk(chunk: Chunk, snapshot: KnowledgeBaseSnapshot, options: RunOptions): Promise<ChunkOutcome> {
    const startedAt = Date.now();
    const cancelled = () => options.signal?.aborted === true;
    let record = createPendingRecord(chunk);

    const persist = async (state: TearState, next: TranslationRecord) => {
      record = { ...next, meta: { ...next.meta, elapsedMs: Date.now() - startedAt } };
      const entry: LedgerEntry = { chunkId: chunk.id, state, timestamp: new Date().toISOString(), payload: record };
      await this.deps.ledger.append(entry);
      logger.debug(
        { runId: options.runId, chunkId: chunk.id, state, iteration: record.iterationCount },
        'Chunk transition',
      );
      options.onTransition?.(entry);
    };

    if (cancelled()) {
      return { record, cancelled: true, skipped: false };
    }

    try {
      await persist('pending', record);
      assertCheckable(chunk, snapshot);

      let priorCritique: Judgment | null = null;
      let previousDraft: string | null = null;

      for (let iteration = 1; iteration <= this.config.maxIterations; iteration += 1) {
        if (cancelled()) {
          logger.info({ runId: options.runId, chunkId: chunk.id, iteration }, 'Chunk halted by cancellation');
          return { record, cancelled: true, skipped: false };
        }

        const translation = await this.translate(chunk, snapshot, iteration, priorCritique, previousDraft);
        await persist('translating', {
          ...record,
          status: 'in_progress',
          iterationCount: iteration,
          draft: translation.text,
          backTranslation: null,
          critique: null,
          meta: { ...record.meta, model: translation.model },
        });

        const evaluation = await this.evaluate(chunk, snapshot, translation.text);
        const outcome: IterationOutcome = {
          iteration,
          draft: translation.text,
          backTranslation: evaluation.backTranslation,
          fidelityScore: evaluation.judgment.fidelityScore,
          violations: evaluation.judgment.requiredFixes,
        };
        await persist('evaluating', {
          ...record,
          backTranslation: evaluation.backTranslation,
          critique: evaluation.judgment,
          violations: evaluation.judgment.requiredFixes,
          fidelityScore: evaluation.judgment.fidelityScore,
          iterations: [...record.iterations, outcome],
        });

        if (evaluation.judgment.verdict === 'accept') {
          await persist('accepted', { ...record, finalTranslation: translation.text, status: 'done' });
          return { record, cancelled: false, skipped: false };
        }

        if (iteration < this.config.maxIterations) {
          await persist('refining', record);
          priorCritique = evaluation.judgment;
          previousDraft = translation.text;
          continue;
        }

        const best = pickBestIteration(record.iterations) ?? outcome;
        logger.warn(
          {
            runId: options.runId,
            chunkId: chunk.id,
            iteration: best.iteration,
            violations: best.violations.length,
            fidelity: best.fidelityScore,
          },
          'Iteration budget exhausted, keeping best draft',
        );
        await persist('finalized', {
          ...record,
          draft: best.draft,
          backTranslation: best.backTranslation,
          finalTranslation: best.draft,
          violations: best.violations,
          fidelityScore: best.fidelityScore,
          status: 'done',
          degraded: true,
        });
        return { record, cancelled: false, skipped: false };
      }

      // maxIterations >= 1 is enforced by the run config schema
      throw new ValidationError('maxIterations must be at least 1');
    } catch (error) {
      const failure = classifyError(error);
      logger.error(
        {
          runId: options.runId,
          chunkId: chunk.id,
          kind: failure.kind,
          error: failure.message,
          source: previewText(chunk.text),
        },
        'Chunk failed',
      );
      try {
        await persist('failed', { ...record, status: 'failed', error: failure });
      } catch (persistError) {
        // The failure stays in the returned record even when the ledger cannot take it
        logger.error({ runId: options.runId, chunkId: chunk.id, error: persistError }, 'Could not persist chunk failure');
      }
      return { record, cancelled: false, skipped: false };
    }
  }

  private translate(
    chunk: Chunk,
    snapshot: KnowledgeBaseSnapshot,
    iteration: number,
    priorCritique: Judgment | null,
    previousDraft: string | null,
  ) {
    const context = { chunkId: chunk.id, iteration, step: 'translate' };
    return withSchemaReprompt(
      (reprompt) =>
        callWithRetry(
          () => this.deps.translator.translate({ chunk, snapshot, iteration, priorCritique, previousDraft, reprompt }),
          this.retryPolicy,
          context,
        ),
      context,
    );
  }

  private async evaluate(chunk: Chunk, snapshot: KnowledgeBaseSnapshot, draft: string) {
    const violations = this.deps.checker.check(draft, chunk, snapshot);

    const context = { chunkId: chunk.id, step: 'back-translate' };
    const verification = await withSchemaReprompt(
      (reprompt) => callWithRetry(() => this.deps.verifier.verify(draft, chunk, reprompt), this.retryPolicy, context),
      context,
    );

    const reviewer = this.deps.styleReviewer;
    const styleNotes =
      this.config.styleReview && reviewer
        ? await callWithRetry(
            () => reviewer.review(chunk, draft, verification.backTranslation, snapshot),
            this.retryPolicy,
            { chunkId: chunk.id, step: 'style-review' },
          )
        : [];

    const judgment = critique(violations, verification.fidelityScore, styleNotes, {
      fidelityThreshold: this.config.fidelityThreshold,
      allowMinorViolations: this.config.allowMinorViolations,
    });
    return { judgment, backTranslation: verification.backTranslation };
  }

  private buildReport(runId: string, outcomes: ChunkOutcome[]): RunReport {
    const report: RunReport = {
      runId,
      total: outcomes.length,
      done: 0,
      doneDegraded: 0,
      failed: 0,
      cancelled: 0,
      skipped: 0,
      degradedChunks: [],
      failedChunks: [],
    };

    for (const { record, cancelled, skipped } of outcomes) {
      if (skipped) report.skipped += 1;
      if (cancelled) {
        report.cancelled += 1;
      } else if (record.status === 'failed') {
        report.failed += 1;
        report.failedChunks.push({
          chunkId: record.chunkId,
          positionKey: record.positionKey,
          violations: record.violations,
          error: record.error,
        });
      } else if (record.degraded) {
        report.doneDegraded += 1;
        report.degradedChunks.push({
          chunkId: record.chunkId,
          positionKey: record.positionKey,
          violations: record.violations,
          fidelityScore: record.fidelityScore,
        });
      } else {
        report.done += 1;
      }
    }

    const byPosition = (a: { positionKey: number }, b: { positionKey: number }) => a.positionKey - b.positionKey;
    report.degradedChunks.sort(byPosition);
    report.failedChunks.sort(byPosition);
    return report;
  }
}
