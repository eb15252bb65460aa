import { randomUUID } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { parseArgs } from 'util';
import { BaselineTranslator } from '../src/ai/baseline';
import { getProvider } from '../src/ai/providers/registry';
import { ProviderTranslator } from '../src/ai/translator';
import { attachPrecedingContext, loadChunks, parseGroupRange, selectChunks } from '../src/services/chunks.service';
import { KnowledgeBase } from '../src/services/knowledgeBase.service';
import { mergeRecords } from '../src/services/merge.service';
import { createOrchestrator } from '../src/services/run.service';
import { FileRunLedger } from '../src/services/runLedger.service';
import type { RunConfig, TranslationRecord } from '../src/types/translation';
import { env } from '../src/utils/env';
import { resolveRunConfig } from '../src/utils/runConfig';

const USAGE = `Usage: translate --input chunks.jsonl [--run-id id] [--output-dir dir] [--glossary-dir dir]
                 [--provider openai|dry-run] [--dry-run] [--baseline]
                 [--max-iterations n] [--fidelity-threshold x] [--allow-minor] [--concurrency n] [--style-review]
                 [--chapters N|N-M] [--max-chapters n] [--max-chunks-per-chapter n]

Passing the --run-id of an interrupted run resumes it from its ledger.`;

const optionalNumber = (value: string | undefined) => (value === undefined ? undefined : Number(value));

async function main() {
  const { values } = parseArgs({
    options: {
      input: { type: 'string' },
      'run-id': { type: 'string' },
      'output-dir': { type: 'string' },
      'glossary-dir': { type: 'string' },
      provider: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      baseline: { type: 'boolean', default: false },
      'max-iterations': { type: 'string' },
      'fidelity-threshold': { type: 'string' },
      'allow-minor': { type: 'boolean' },
      concurrency: { type: 'string' },
      'style-review': { type: 'boolean' },
      chapters: { type: 'string' },
      'max-chapters': { type: 'string' },
      'max-chunks-per-chapter': { type: 'string' },
      help: { type: 'boolean', default: false },
    },
  });

  if (values.help || !values.input) {
    console.log(USAGE);
    process.exitCode = values.help ? 0 : 1;
    return;
  }

  const overrides: Partial<RunConfig> = {
    maxIterations: optionalNumber(values['max-iterations']),
    fidelityThreshold: optionalNumber(values['fidelity-threshold']),
    allowMinorViolations: values['allow-minor'],
    concurrencyLimit: optionalNumber(values.concurrency),
    styleReview: values['style-review'],
  };
  const config = resolveRunConfig(overrides);
  const runId = values['run-id'] ?? randomUUID();
  const outputDir = values['output-dir'] ?? path.join(env.dataDir, 'runs');
  const provider = getProvider(values['dry-run'] ? 'dry-run' : values.provider);
  const ledger = FileRunLedger.forRun(outputDir, runId);
  const chunks = selectChunks(attachPrecedingContext(await loadChunks(values.input)), {
    groups: values.chapters === undefined ? undefined : parseGroupRange(values.chapters),
    maxGroups: optionalNumber(values['max-chapters']),
    maxChunksPerGroup: optionalNumber(values['max-chunks-per-chapter']),
  });

  console.log(`Run ${runId}: ${chunks.length} chunks, provider ${provider.name}, ledger ${ledger.filePath}`);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('Cancelling: in-flight chunks finish their current step, re-run with the same --run-id to resume');
    controller.abort();
  });

  let records: TranslationRecord[];
  if (values.baseline) {
    const baseline = new BaselineTranslator(new ProviderTranslator(provider), {
      retry: { retryBudget: config.retryBudget, baseDelayMs: config.retryBaseDelayMs },
      concurrencyLimit: config.concurrencyLimit,
      ledger,
    });
    records = await baseline.translateAll(chunks, { signal: controller.signal });
    if (controller.signal.aborted) process.exitCode = 2;
  } else {
    const kb = await KnowledgeBase.loadLatest(values['glossary-dir'] ?? path.join(env.dataDir, 'glossary'));
    const snapshot = kb.snapshot({ scope: chunks.map((chunk) => chunk.id) });
    console.log(`Knowledge base v${snapshot.version}: ${snapshot.size} approved terms`);

    const result = await createOrchestrator(provider, config, ledger).run(chunks, snapshot, {
      runId,
      signal: controller.signal,
    });
    records = result.records;

    const { report } = result;
    console.log(
      `done: ${report.done}, done-degraded: ${report.doneDegraded}, failed: ${report.failed}, cancelled: ${report.cancelled}, resumed: ${report.skipped}`,
    );
    report.degradedChunks.forEach((chunk) =>
      console.warn(`  degraded ${chunk.chunkId}: ${chunk.violations.map((violation) => violation.termKey).join(', ') || 'low fidelity'}`),
    );
    report.failedChunks.forEach((chunk) => console.warn(`  failed ${chunk.chunkId}: ${chunk.error?.message ?? 'unknown error'}`));
    if (report.failed > 0 || report.cancelled > 0) process.exitCode = 2;
  }

  const merged = mergeRecords(records);
  await mkdir(outputDir, { recursive: true });
  const textPath = path.join(outputDir, `${runId}.txt`);
  const recordsPath = path.join(outputDir, `${runId}.records.jsonl`);
  await writeFile(textPath, merged.text, 'utf8');
  await writeFile(recordsPath, records.map((record) => JSON.stringify(record)).join('\n') + '\n', 'utf8');
  console.log(`Merged output written to ${textPath}, records to ${recordsPath}`);
}

main().catch((error) => {
  console.error('Translation run failed:', error);
  process.exit(1);
});
