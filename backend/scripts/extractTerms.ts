import path from 'path';
import { parseArgs } from 'util';
import { getProvider } from '../src/ai/providers/registry';
import { RunningContext, TermExtractor, extractAll } from '../src/ai/termExtractor';
import { loadChunks } from '../src/services/chunks.service';
import { KnowledgeBase } from '../src/services/knowledgeBase.service';
import { buildReviewTable, writeReviewFile } from '../src/services/review.service';
import { env } from '../src/utils/env';
import { resolveRunConfig } from '../src/utils/runConfig';

const USAGE = `Usage: extractTerms --input chunks.jsonl [--glossary-dir dir] [--review file.xlsx|file.json]
                    [--provider openai|dry-run] [--dry-run] [--context-window 50]`;

async function main() {
  const { values } = parseArgs({
    options: {
      input: { type: 'string' },
      'glossary-dir': { type: 'string' },
      review: { type: 'string' },
      provider: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      'context-window': { type: 'string' },
      help: { type: 'boolean', default: false },
    },
  });

  if (values.help || !values.input) {
    console.log(USAGE);
    process.exitCode = values.help ? 0 : 1;
    return;
  }

  const contextWindow = Number(values['context-window'] ?? 50);
  if (!Number.isInteger(contextWindow) || contextWindow < 0) {
    console.error('--context-window must be a non-negative integer');
    process.exitCode = 1;
    return;
  }

  const glossaryDir = values['glossary-dir'] ?? path.join(env.dataDir, 'glossary');
  const chunks = await loadChunks(values.input);
  const kb = await KnowledgeBase.loadLatest(glossaryDir);
  console.log(`Loaded ${chunks.length} chunks, knowledge base v${kb.version} with ${kb.size} entries`);

  const config = resolveRunConfig();
  const provider = getProvider(values['dry-run'] ? 'dry-run' : values.provider);
  const extractor = new TermExtractor(provider, {
    retry: { retryBudget: config.retryBudget, baseDelayMs: config.retryBaseDelayMs },
  });

  const summary = await extractAll(chunks, extractor, new RunningContext(contextWindow));
  const report = kb.merge(summary.candidates);
  if (summary.worldSummary && !kb.worldSummary) kb.worldSummary = summary.worldSummary;
  const savedTo = await kb.save(glossaryDir);

  const reviewPath = values.review ?? path.join(env.dataDir, 'review', `glossary_review_v${kb.version}.xlsx`);
  await writeReviewFile(buildReviewTable(kb), reviewPath);

  console.log(`New terms: ${report.added.length}, merged: ${report.merged.length}, kept approved: ${report.keptFinal.length}, new senses: ${report.split.length}`);
  console.log(`Knowledge base saved to ${savedTo}`);
  console.log(`Review table written to ${reviewPath}`);

  if (summary.unresolved.length) {
    console.warn(`${summary.unresolved.length} chunk(s) unresolved, re-run extraction for them:`);
    summary.unresolved.forEach((item) => console.warn(`  ${item.chunkId}: ${item.error}`));
    process.exitCode = 2;
  }
}

main().catch((error) => {
  console.error('Term extraction failed:', error);
  process.exit(1);
});
