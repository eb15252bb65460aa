import path from 'path';
import { parseArgs } from 'util';
import { KnowledgeBase } from '../src/services/knowledgeBase.service';
import { readReviewFile } from '../src/services/review.service';
import { env } from '../src/utils/env';

async function main() {
  const { values } = parseArgs({
    options: {
      review: { type: 'string' },
      'glossary-dir': { type: 'string' },
    },
  });

  if (!values.review) {
    console.log('Usage: applyReview --review file.xlsx|file.json [--glossary-dir dir]');
    process.exitCode = 1;
    return;
  }

  const glossaryDir = values['glossary-dir'] ?? path.join(env.dataDir, 'glossary');
  const kb = await KnowledgeBase.loadLatest(glossaryDir);
  const rows = await readReviewFile(values.review);
  const report = kb.applyReview(rows);
  const savedTo = await kb.save(glossaryDir);

  console.log(`Applied ${rows.length} review rows: ${report.added.length} added, ${report.updated.length} updated`);
  console.log(`${report.approved} approved terms in v${report.version}, saved to ${savedTo}`);
}

main().catch((error) => {
  console.error('Applying review failed:', error);
  process.exit(1);
});
