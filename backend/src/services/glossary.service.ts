import path from 'path';
import type { ExtractedTerm, ReviewRow } from '../types/glossary';
import { env } from '../utils/env';
import { logger } from '../utils/logger';
import { KnowledgeBase, type KnowledgeBaseSnapshot, type MergeReport, type ReviewReport } from './knowledgeBase.service';

/**
 * The service's knowledge base, loaded from the newest saved version and
 * written back after every change. Changes run one at a time.
 */
export class GlossaryStore {
  private kb: KnowledgeBase | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(readonly dir: string) {}

  private async load(): Promise<KnowledgeBase> {
    if (!this.kb) {
      this.kb = await KnowledgeBase.loadLatest(this.dir);
      logger.info({ dir: this.dir, version: this.kb.version, entries: this.kb.size }, 'Loaded knowledge base');
    }
    return this.kb;
  }

  private exclusive<T>(task: (kb: KnowledgeBase) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => task(await this.load()));
    // The caller sees a failure through `run`; the queue moves on
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async current(): Promise<KnowledgeBase> {
    await this.queue;
    return this.load();
  }

  async snapshot(scope?: Iterable<string>): Promise<KnowledgeBaseSnapshot> {
    const kb = await this.current();
    return kb.snapshot({ scope });
  }

  mergeCandidates(extracted: ExtractedTerm[], worldSummary?: string): Promise<MergeReport> {
    return this.exclusive(async (kb) => {
      const report = kb.merge(extracted);
      if (worldSummary && !kb.worldSummary) kb.worldSummary = worldSummary;
      await kb.save(this.dir);
      return report;
    });
  }

  applyReview(rows: ReviewRow[]): Promise<ReviewReport> {
    return this.exclusive(async (kb) => {
      const report = kb.applyReview(rows);
      await kb.save(this.dir);
      return report;
    });
  }
}

export const glossaryStore = new GlossaryStore(path.join(env.dataDir, 'glossary'));
