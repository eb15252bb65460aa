import { appendFile, mkdir, open, readFile, type FileHandle } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { LedgerEntry, TearState, TranslationRecord } from '../types/translation';
import { logger } from '../utils/logger';

export interface RunLedger {
  append(entry: LedgerEntry): Promise<void>;
  /** Last persisted entry per chunk, in first-seen order. */
  replay(): Promise<Map<string, LedgerEntry>>;
}

const violationSchema = z.object({
  termKey: z.string(),
  kind: z.enum(['missing', 'inconsistent', 'wrong-sense']),
  severity: z.enum(['major', 'minor']),
  expected: z.string(),
  found: z.string().nullable(),
  span: z.object({ start: z.number(), end: z.number() }),
});

const judgmentSchema = z.object({
  verdict: z.enum(['accept', 'refine']),
  reasons: z.array(z.string()),
  requiredFixes: z.array(violationSchema),
  fidelityScore: z.number(),
  styleNotes: z.array(z.string()),
});

const recordSchema = z.object({
  chunkId: z.string(),
  positionKey: z.number(),
  group: z.string().optional(),
  source: z.string(),
  draft: z.string().nullable(),
  backTranslation: z.string().nullable(),
  critique: judgmentSchema.nullable(),
  violations: z.array(violationSchema),
  finalTranslation: z.string().nullable(),
  iterationCount: z.number().int(),
  status: z.enum(['pending', 'in_progress', 'done', 'failed']),
  fidelityScore: z.number().nullable(),
  degraded: z.boolean(),
  iterations: z.array(
    z.object({
      iteration: z.number().int(),
      draft: z.string(),
      backTranslation: z.string(),
      fidelityScore: z.number(),
      violations: z.array(violationSchema),
    }),
  ),
  error: z
    .object({
      kind: z.enum(['external', 'schema', 'validation', 'unexpected']),
      message: z.string(),
      rawPayload: z.string().optional(),
    })
    .optional(),
  meta: z.object({ model: z.string(), elapsedMs: z.number() }),
}) satisfies z.ZodType<TranslationRecord>;

const TEAR_STATES = ['pending', 'translating', 'evaluating', 'refining', 'accepted', 'finalized', 'failed'] as const satisfies readonly TearState[];

export const ledgerEntrySchema = z.object({
  chunkId: z.string(),
  state: z.enum(TEAR_STATES),
  timestamp: z.string(),
  payload: recordSchema,
}) satisfies z.ZodType<LedgerEntry>;

const cloneEntry = (entry: LedgerEntry): LedgerEntry => structuredClone(entry);

export class InMemoryRunLedger implements RunLedger {
  readonly entries: LedgerEntry[] = [];

  constructor(seed: LedgerEntry[] = []) {
    this.entries.push(...seed.map(cloneEntry));
  }

  async append(entry: LedgerEntry): Promise<void> {
    this.entries.push(cloneEntry(entry));
  }

  async replay(): Promise<Map<string, LedgerEntry>> {
    const last = new Map<string, LedgerEntry>();
    for (const entry of this.entries) last.set(entry.chunkId, cloneEntry(entry));
    return last;
  }
}

/**
 * JSON Lines file, one entry per state transition. Lines are only ever
 * appended, one write at a time.
 */
export class FileRunLedger implements RunLedger {
  private tail: Promise<void> = Promise.resolve();
  private tailChecked = false;

  constructor(readonly filePath: string) {}

  static forRun(dir: string, runId: string) {
    return new FileRunLedger(path.join(dir, `${runId}.ledger.jsonl`));
  }

  append(entry: LedgerEntry): Promise<void> {
    const line = `${JSON.stringify(entry)}\n`;
    const write = this.tail.then(async () => {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      // A torn line left by an earlier process gets closed off first
      const prefix = !this.tailChecked && (await this.endsMidLine()) ? '\n' : '';
      await appendFile(this.filePath, prefix + line, 'utf8');
      this.tailChecked = true;
    });
    // A failed write is reported to its caller; later writes still run
    this.tail = write.catch((error: unknown) => {
      logger.error({ filePath: this.filePath, chunkId: entry.chunkId, error }, 'Ledger append failed');
    });
    return write;
  }

  private async endsMidLine(): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await open(this.filePath, 'r');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
    try {
      const { size } = await handle.stat();
      if (size === 0) return false;
      const { buffer } = await handle.read(Buffer.alloc(1), 0, 1, size - 1);
      return buffer.toString('utf8') !== '\n';
    } finally {
      await handle.close();
    }
  }

  async replay(): Promise<Map<string, LedgerEntry>> {
    await this.tail;
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return new Map();
      }
      throw error;
    }

    const last = new Map<string, LedgerEntry>();
    const lines = raw.split('\n');
    lines.forEach((line, index) => {
      if (!line.trim()) return;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        logger.warn({ filePath: this.filePath, line: index + 1 }, 'Skipping unreadable ledger line');
        return;
      }
      const result = ledgerEntrySchema.safeParse(parsed);
      if (!result.success) {
        logger.warn({ filePath: this.filePath, line: index + 1 }, 'Skipping malformed ledger entry');
        return;
      }
      last.set(result.data.chunkId, result.data);
    });
    return last;
  }
}
