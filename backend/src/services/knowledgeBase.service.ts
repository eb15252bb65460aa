import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
  TERM_TYPES,
  isNamedEntity,
  type ExtractedTerm,
  type KnowledgeBaseData,
  type ReviewRow,
  type TermCandidate,
  type TermEntry,
  type TermSense,
  type TermType,
} from '../types/glossary';
import type { SourceSpan } from '../types/translation';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { contextSignature, findFirstSurface, jaccard, normalizeKey, toSearchable } from '../utils/tokenize';

// Below this keyword overlap two evidence spans are treated as different meanings
const SENSE_SPLIT_THRESHOLD = 0.4;

const candidateSchema = z.object({
  rendering: z.string(),
  score: z.number().min(0).max(1),
  source: z.enum(['extraction', 'context', 'review']),
  chunkId: z.string().optional(),
});

const senseSchema = z.object({
  id: z.string(),
  final: z.string(),
  gloss: z.string().optional(),
  suggested: z.string().optional(),
  evidence: z.array(z.string()),
  contextSignature: z.array(z.string()),
});

const entrySchema = z.object({
  key: z.string().min(1),
  type: z.enum(TERM_TYPES),
  final: z.string(),
  aliases: z.array(z.string()).default([]),
  candidates: z.array(candidateSchema).default([]),
  evidence: z.array(z.string()).default([]),
  senses: z.array(senseSchema).default([]),
});

export const knowledgeBaseDataSchema = z.object({
  version: z.number().int().min(1),
  worldSummary: z.string().optional(),
  entries: z.array(entrySchema),
});

export type ActiveSense = Readonly<{
  id: string;
  final: string;
  gloss?: string;
  contextSignature: readonly string[];
}>;

/** A reviewed term as the translation loop sees it. */
export type ActiveTerm = Readonly<{
  key: string;
  type: TermType;
  final: string;
  aliases: readonly string[];
  candidates: readonly Readonly<TermCandidate>[];
  /** Signature of the term's main meaning, from its first evidence span. */
  contextSignature: readonly string[];
  senses: readonly ActiveSense[];
}>;

export type TermOccurrence = {
  term: ActiveTerm;
  surface: string;
  span: SourceSpan;
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

/**
 * Read-only view of the reviewed glossary handed to one translation run.
 * Holds copies, so later edits to the knowledge base never reach it.
 */
export class KnowledgeBaseSnapshot {
  readonly takenAt = new Date().toISOString();
  readonly worldSummary?: string;
  private readonly terms: ReadonlyMap<string, ActiveTerm>;
  private readonly scope: ReadonlySet<string> | null;

  constructor(
    readonly version: number,
    terms: ActiveTerm[],
    options: { worldSummary?: string; scope?: Iterable<string> } = {},
  ) {
    this.terms = new Map(terms.map((term) => [term.key, deepFreeze(term)]));
    this.scope = options.scope ? new Set(options.scope) : null;
    this.worldSummary = options.worldSummary;
    Object.freeze(this);
  }

  get size() {
    return this.terms.size;
  }

  entries(): ActiveTerm[] {
    return [...this.terms.values()];
  }

  get(key: string): ActiveTerm | undefined {
    return this.terms.get(normalizeKey(key));
  }

  /** Whether the snapshot was prepared for this chunk. Unscoped snapshots cover everything. */
  covers(chunkId: string): boolean {
    return this.scope === null || this.scope.has(chunkId);
  }

  /** First occurrence of every term (by key or alias) in `text`, in text order. */
  findOccurrences(text: string): TermOccurrence[] {
    const source = toSearchable(text);
    const occurrences: TermOccurrence[] = [];
    for (const term of this.terms.values()) {
      const found = findFirstSurface(source, [term.key, ...term.aliases]);
      if (found) occurrences.push({ term, ...found });
    }
    return occurrences.sort((a, b) => a.span.start - b.span.start || a.term.key.localeCompare(b.term.key));
  }
}

export type MergeReport = {
  total: number;
  added: string[];
  merged: string[];
  keptFinal: string[];
  split: string[];
};

export type ReviewReport = {
  version: number;
  added: string[];
  updated: string[];
  approved: number;
};

const copyEntry = (entry: TermEntry): TermEntry => ({
  ...entry,
  aliases: [...entry.aliases],
  candidates: entry.candidates.map((candidate) => ({ ...candidate })),
  evidence: [...entry.evidence],
  senses: entry.senses.map((sense) => ({
    ...sense,
    evidence: [...sense.evidence],
    contextSignature: [...sense.contextSignature],
  })),
});

/**
 * Aggregated confidence of each rendering: how often it was proposed, how
 * confident the best proposal was, and whether it came with evidence.
 */
export const scoreRenderings = (entry: TermEntry): Array<{ rendering: string; score: number }> => {
  const stats = new Map<string, { frequency: number; maxScore: number; reviewed: boolean }>();
  for (const candidate of entry.candidates) {
    const rendering = candidate.rendering.trim();
    if (!rendering) continue;
    const current = stats.get(rendering) ?? { frequency: 0, maxScore: 0, reviewed: false };
    current.frequency += 1;
    current.maxScore = Math.max(current.maxScore, candidate.score);
    current.reviewed = current.reviewed || candidate.source === 'review';
    stats.set(rendering, current);
  }
  const evidenceBonus = entry.evidence.length > 0 ? 0.1 : 0;
  return [...stats.entries()].map(([rendering, stat]) => ({
    rendering,
    score: Math.min(
      1,
      Math.min(stat.frequency * 0.1, 0.5) + stat.maxScore * 0.4 + (stat.reviewed ? 0.2 : 0) + evidenceBonus,
    ),
  }));
};

/** The rendering a reviewer is offered by default. Ties go to the earliest proposal. */
export const suggestFinal = (entry: TermEntry): string => {
  let best: { rendering: string; score: number } | null = null;
  for (const scored of scoreRenderings(entry)) {
    if (!best || scored.score > best.score) best = scored;
  }
  return best?.rendering ?? '';
};

export class KnowledgeBase {
  private readonly entries = new Map<string, TermEntry>();
  private readonly aliasIndex = new Map<string, string>();

  constructor(
    public version = 1,
    public worldSummary?: string,
  ) {}

  static fromData(data: KnowledgeBaseData): KnowledgeBase {
    const parsed = knowledgeBaseDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError('Invalid knowledge base data', parsed.error.issues);
    }
    const kb = new KnowledgeBase(parsed.data.version, parsed.data.worldSummary);
    for (const entry of parsed.data.entries) {
      kb.put({ ...entry, key: normalizeKey(entry.key) });
    }
    return kb;
  }

  toData(): KnowledgeBaseData {
    return {
      version: this.version,
      worldSummary: this.worldSummary,
      entries: this.list(),
    };
  }

  get size() {
    return this.entries.size;
  }

  list(): TermEntry[] {
    return [...this.entries.values()].map(copyEntry);
  }

  get(keyOrAlias: string): TermEntry | undefined {
    const entry = this.resolve(keyOrAlias);
    return entry ? copyEntry(entry) : undefined;
  }

  private resolve(keyOrAlias: string): TermEntry | undefined {
    const key = normalizeKey(keyOrAlias);
    const direct = this.entries.get(key);
    if (direct) return direct;
    const aliasOf = this.aliasIndex.get(key);
    return aliasOf ? this.entries.get(aliasOf) : undefined;
  }

  private put(entry: TermEntry) {
    this.entries.set(entry.key, entry);
    for (const alias of entry.aliases) {
      const normalized = normalizeKey(alias);
      if (normalized && normalized !== entry.key) {
        this.aliasIndex.set(normalized, entry.key);
      }
    }
  }

  /**
   * Folds extracted candidates in. Never writes `final`: an approved
   * rendering only grows more candidates, evidence and senses around it.
   */
  merge(extracted: ExtractedTerm[]): MergeReport {
    const report: MergeReport = { total: extracted.length, added: [], merged: [], keptFinal: [], split: [] };

    for (const term of extracted) {
      const key = normalizeKey(term.key);
      if (!key) continue;
      const existing = this.resolve(key);

      if (!existing) {
        this.put({
          key,
          type: term.type,
          final: '',
          aliases: [...term.aliases],
          candidates: term.candidates.map((candidate) => ({ ...candidate })),
          evidence: term.evidence ? [term.evidence] : [],
          senses: [],
        });
        report.added.push(key);
        continue;
      }

      const splitSense = this.splitSenseIfNeeded(existing, term);

      existing.candidates.push(...term.candidates.map((candidate) => ({ ...candidate })));
      if (term.evidence && !existing.evidence.includes(term.evidence)) {
        existing.evidence.push(term.evidence);
      }
      for (const alias of term.aliases) {
        if (!existing.aliases.includes(alias) && normalizeKey(alias) !== existing.key) {
          existing.aliases.push(alias);
        }
      }
      this.put(existing);

      if (splitSense) {
        report.split.push(existing.key);
      } else if (existing.final) {
        report.keptFinal.push(existing.key);
      } else {
        report.merged.push(existing.key);
      }
    }

    logger.debug(
      {
        total: report.total,
        added: report.added.length,
        merged: report.merged.length,
        keptFinal: report.keptFinal.length,
        split: report.split.length,
      },
      'Merged term candidates',
    );
    return report;
  }

  // Named entities keep one rendering; only domain terms can be polysemous.
  private splitSenseIfNeeded(existing: TermEntry, term: ExtractedTerm): TermSense | null {
    if (isNamedEntity(existing.type) || !term.evidence || existing.evidence.length === 0) {
      return null;
    }
    if (existing.evidence.includes(term.evidence)) return null;

    const signature = contextSignature(term.evidence);
    if (signature.length === 0) return null;

    const knownSignatures = [
      ...existing.evidence.map((evidence) => contextSignature(evidence)),
      ...existing.senses.map((sense) => sense.contextSignature),
    ];
    if (knownSignatures.some((known) => jaccard(known, signature) >= SENSE_SPLIT_THRESHOLD)) {
      return null;
    }

    const sense: TermSense = {
      id: `${existing.key}#${existing.senses.length + 1}`,
      final: '',
      suggested: term.candidates[0]?.rendering,
      evidence: [term.evidence],
      contextSignature: signature,
    };
    existing.senses.push(sense);
    return sense;
  }

  /**
   * The human-review boundary: the only way `final` and senses get set.
   * Empty `final` cells leave an entry as it was.
   */
  applyReview(rows: ReviewRow[]): ReviewReport {
    const report: ReviewReport = { version: this.version, added: [], updated: [], approved: 0 };

    for (const row of rows) {
      const key = normalizeKey(row.term);
      if (!key) continue;

      let entry = this.resolve(key);
      if (!entry) {
        entry = {
          key,
          type: row.type,
          final: '',
          aliases: [],
          candidates: row.candidates.map((candidate) => ({ ...candidate, source: 'review' as const })),
          evidence: [...row.evidence],
          senses: [],
        };
        this.put(entry);
        report.added.push(key);
      } else {
        report.updated.push(entry.key);
      }

      entry.type = row.type;
      const final = row.final.trim();
      if (final) {
        entry.final = final;
        if (!entry.candidates.some((candidate) => candidate.rendering === final)) {
          entry.candidates.push({ rendering: final, score: 1, source: 'review' });
        }
      }

      entry.senses = this.reviewSenses(entry, row);
      if (entry.final) report.approved += 1;
    }

    this.version += 1;
    report.version = this.version;
    logger.info(
      { version: this.version, added: report.added.length, updated: report.updated.length },
      'Applied glossary review',
    );
    return report;
  }

  private reviewSenses(entry: TermEntry, row: ReviewRow): TermSense[] {
    const byId = new Map(entry.senses.map((sense) => [sense.id, sense]));
    const kept = new Set<string>();
    const senses: TermSense[] = [];
    let nextIndex = entry.senses.reduce((max, sense) => {
      const index = Number(sense.id.split('#').pop());
      return Number.isNaN(index) ? max : Math.max(max, index);
    }, 0);

    for (const reviewed of row.senses) {
      const existing = reviewed.id ? byId.get(reviewed.id) : undefined;
      if (existing) {
        kept.add(existing.id);
        senses.push({ ...existing, final: reviewed.final.trim(), gloss: reviewed.gloss ?? existing.gloss });
        continue;
      }
      nextIndex += 1;
      senses.push({
        id: `${entry.key}#${nextIndex}`,
        final: reviewed.final.trim(),
        gloss: reviewed.gloss,
        evidence: [],
        contextSignature: reviewed.gloss ? contextSignature(reviewed.gloss) : [],
      });
    }

    // Draft senses the reviewer did not touch stay for the next round
    for (const sense of entry.senses) {
      if (!kept.has(sense.id) && !sense.final) senses.push(sense);
    }
    return senses;
  }

  /**
   * Freezes the reviewed part of the knowledge base for one run. Entries and
   * senses without an approved rendering are left out.
   */
  snapshot(options: { scope?: Iterable<string> } = {}): KnowledgeBaseSnapshot {
    const terms: ActiveTerm[] = [];
    for (const entry of this.entries.values()) {
      if (!entry.final.trim()) continue;
      terms.push({
        key: entry.key,
        type: entry.type,
        final: entry.final,
        aliases: [...entry.aliases],
        candidates: entry.candidates.map((candidate) => ({ ...candidate })),
        contextSignature: entry.evidence[0] ? contextSignature(entry.evidence[0]) : [],
        senses: entry.senses
          .filter((sense) => sense.final.trim())
          .map((sense) => ({
            id: sense.id,
            final: sense.final,
            gloss: sense.gloss,
            contextSignature: [...sense.contextSignature],
          })),
      });
    }
    return new KnowledgeBaseSnapshot(this.version, terms, { worldSummary: this.worldSummary, scope: options.scope });
  }

  async save(dir: string): Promise<string> {
    await mkdir(dir, { recursive: true });
    const filePath = path.join(dir, `glossary_v${this.version}.json`);
    await writeFile(filePath, JSON.stringify(this.toData(), null, 2), 'utf8');
    logger.info({ filePath, entries: this.size }, 'Saved knowledge base');
    return filePath;
  }

  static async load(filePath: string): Promise<KnowledgeBase> {
    const raw = await readFile(filePath, 'utf8');
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Knowledge base file ${filePath} is not valid JSON`, { cause: String(error) });
    }
    const parsed = knowledgeBaseDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError(`Knowledge base file ${filePath} is malformed`, parsed.error.issues);
    }
    return KnowledgeBase.fromData(parsed.data);
  }

  /** Highest `glossary_v<n>.json` in `dir`, or an empty knowledge base. */
  static async loadLatest(dir: string): Promise<KnowledgeBase> {
    let files: string[];
    try {
      files = await readdir(dir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return new KnowledgeBase();
      }
      throw error;
    }
    const versions = files
      .map((file) => /^glossary_v(\d+)\.json$/.exec(file))
      .filter((match): match is RegExpExecArray => match !== null)
      .map((match) => ({ file: match[0], version: Number(match[1]) }))
      .sort((a, b) => b.version - a.version);
    if (versions.length === 0) return new KnowledgeBase();
    return KnowledgeBase.load(path.join(dir, versions[0].file));
  }
}
