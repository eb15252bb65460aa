import { randomUUID } from 'crypto';
import path from 'path';
import { BaselineTranslator } from '../ai/baseline';
import { BackTranslationVerifier } from '../ai/backTranslationVerifier';
import { GlossaryChecker } from '../ai/glossaryChecker';
import { getProvider } from '../ai/providers/registry';
import type { AIProvider } from '../ai/providers/types';
import { TearOrchestrator } from '../ai/tearOrchestrator';
import { ProviderTranslator } from '../ai/translator';
import type { Chunk, RunConfig, RunReport, TearState, TranslationRecord } from '../types/translation';
import { env } from '../utils/env';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { resolveRunConfig } from '../utils/runConfig';
import { attachPrecedingContext } from './chunks.service';
import { glossaryStore, type GlossaryStore } from './glossary.service';
import { mergeRecords, type MergedDocument } from './merge.service';
import { FileRunLedger, type RunLedger } from './runLedger.service';

export type RunMode = 'tear' | 'baseline';
export type RunStatus = 'running' | 'cancelling' | 'completed' | 'cancelled' | 'error';

export type RunProgress = {
  runId: string;
  mode: RunMode;
  status: RunStatus;
  provider: string;
  snapshotVersion: number | null;
  totalChunks: number;
  finishedChunks: number;
  states: Record<string, TearState>;
  startedAt: string;
  finishedAt?: string;
  report?: RunReport;
  error?: string;
};

export type StartRunInput = {
  chunks: Chunk[];
  mode?: RunMode;
  provider?: string;
  apiKey?: string;
  config?: Partial<RunConfig>;
  /** Continue an earlier run from its ledger. */
  resumeRunId?: string;
};

type RunHandle = {
  progress: RunProgress;
  controller: AbortController;
  records: TranslationRecord[];
  done: Promise<void>;
};

const TERMINAL_STATES: ReadonlySet<TearState> = new Set(['accepted', 'finalized', 'failed']);

/** Wires one provider into every model-backed step of the loop. */
export const createOrchestrator = (provider: AIProvider, config: RunConfig, ledger: RunLedger) => {
  const translator = new ProviderTranslator(provider);
  return new TearOrchestrator(
    {
      translator,
      verifier: new BackTranslationVerifier(translator),
      checker: new GlossaryChecker(),
      styleReviewer: translator,
      ledger,
    },
    config,
  );
};

export type RunServiceDependencies = {
  glossary: GlossaryStore;
  ledgerDir: string;
  resolveProvider: (name?: string, apiKey?: string) => AIProvider;
};

/** Runs started over HTTP: progress, cancellation and merged output, kept in memory. */
export class RunService {
  private readonly runs = new Map<string, RunHandle>();

  constructor(private readonly deps: RunServiceDependencies) {}

  async start(input: StartRunInput): Promise<RunProgress> {
    const mode = input.mode ?? 'tear';
    const config = resolveRunConfig(input.config);
    const provider = this.deps.resolveProvider(input.provider, input.apiKey);
    const runId = input.resumeRunId ?? randomUUID();

    const existing = this.runs.get(runId);
    if (existing && (existing.progress.status === 'running' || existing.progress.status === 'cancelling')) {
      return existing.progress;
    }

    const ledger = FileRunLedger.forRun(this.deps.ledgerDir, runId);
    const controller = new AbortController();
    const progress: RunProgress = {
      runId,
      mode,
      status: 'running',
      provider: provider.name,
      snapshotVersion: null,
      totalChunks: input.chunks.length,
      finishedChunks: 0,
      states: {},
      startedAt: new Date().toISOString(),
    };
    const handle: RunHandle = { progress, controller, records: [], done: Promise.resolve() };
    this.runs.set(runId, handle);

    handle.done = this.execute(handle, attachPrecedingContext(input.chunks), mode, provider, config, ledger).catch((error: unknown) => {
      progress.status = 'error';
      progress.error = errorMessage(error);
      progress.finishedAt = new Date().toISOString();
      logger.error({ runId, error }, 'Run aborted');
    });
    return progress;
  }

  private async execute(
    handle: RunHandle,
    chunks: Chunk[],
    mode: RunMode,
    provider: AIProvider,
    config: RunConfig,
    ledger: FileRunLedger,
  ) {
    const { progress, controller } = handle;

    if (mode === 'baseline') {
      const baseline = new BaselineTranslator(new ProviderTranslator(provider), {
        retry: { retryBudget: config.retryBudget, baseDelayMs: config.retryBaseDelayMs },
        concurrencyLimit: config.concurrencyLimit,
        ledger,
      });
      handle.records = await baseline.translateAll(chunks, {
        signal: controller.signal,
        onRecord: (record) => {
          progress.states[record.chunkId] = record.status === 'done' ? 'finalized' : 'failed';
          progress.finishedChunks += 1;
        },
      });
      progress.finishedChunks = handle.records.length;
    } else {
      const snapshot = await this.deps.glossary.snapshot(chunks.map((chunk) => chunk.id));
      progress.snapshotVersion = snapshot.version;
      const orchestrator = createOrchestrator(provider, config, ledger);
      const result = await orchestrator.run(chunks, snapshot, {
        runId: progress.runId,
        signal: controller.signal,
        onTransition: (entry) => {
          progress.states[entry.chunkId] = entry.state;
          if (TERMINAL_STATES.has(entry.state)) progress.finishedChunks += 1;
        },
      });
      handle.records = result.records;
      progress.report = result.report;
      progress.finishedChunks = result.records.length;
    }

    progress.status = controller.signal.aborted ? 'cancelled' : 'completed';
    progress.finishedAt = new Date().toISOString();
  }

  get(runId: string): RunProgress | null {
    return this.runs.get(runId)?.progress ?? null;
  }

  list(): RunProgress[] {
    return [...this.runs.values()].map((handle) => handle.progress);
  }

  /** Chunks already in flight finish their current step and persist it first. */
  cancel(runId: string): RunProgress | null {
    const handle = this.runs.get(runId);
    if (!handle) return null;
    if (handle.progress.status === 'running') {
      handle.controller.abort();
      handle.progress.status = 'cancelling';
      logger.info({ runId }, 'Run cancellation requested');
    }
    return handle.progress;
  }

  async wait(runId: string): Promise<RunProgress | null> {
    const handle = this.runs.get(runId);
    if (!handle) return null;
    await handle.done;
    return handle.progress;
  }

  output(runId: string): MergedDocument | null {
    const handle = this.runs.get(runId);
    if (!handle) return null;
    return mergeRecords(handle.records);
  }
}

export const runService = new RunService({
  glossary: glossaryStore,
  ledgerDir: path.join(env.dataDir, 'runs'),
  resolveProvider: getProvider,
});
