import { z } from 'zod';
import { normalizeTermType, type ExtractedTerm, type TermCandidate, type TermType } from '../types/glossary';
import type { Chunk, SourceSpan } from '../types/translation';
import { ExternalCallError, SchemaError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { findFirstSurface, normalizeKey, toSearchable, type SearchableText } from '../utils/tokenize';
import { buildExtractionPrompt, defaultPromptOptions, type LanguagePair } from './prompts';
import type { AIProvider } from './providers/types';
import { callWithRetry, withSchemaReprompt, type RetryPolicy } from './retry';
import { stripCodeFence } from './translator';

const EVIDENCE_RADIUS = 30;
const DEFAULT_CANDIDATE_SCORE = 0.5;

const rawCandidateSchema = z.union([
  z.string(),
  z.object({
    rendering: z.string(),
    score: z.number().optional(),
  }),
]);

const rawTermSchema = z.object({
  term: z.string(),
  type: z.string(),
  aliases: z.array(z.string()).optional(),
  candidates: z.array(rawCandidateSchema).default([]),
  evidence: z.string().optional(),
});

const extractionPayloadSchema = z.object({
  terms: z.array(rawTermSchema),
  world_summary: z.string().optional(),
  worldSummary: z.string().optional(),
});

export type ExtractionPayload = z.infer<typeof extractionPayloadSchema>;

export type ExtractionResult =
  | { status: 'resolved'; chunkId: string; candidates: ExtractedTerm[]; worldSummary?: string }
  | { status: 'unresolved'; chunkId: string; error: string; rawPayload: string };

export type UnresolvedExtraction = Extract<ExtractionResult, { status: 'unresolved' }>;

/** Slices the JSON object out of a model reply and validates its shape. */
export const parseExtractionPayload = (text: string): ExtractionPayload => {
  const cleaned = stripCodeFence(text);
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end === -1 || end < start) {
    throw new SchemaError('Provider response did not contain a JSON object', text);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned.slice(start, end + 1));
  } catch (error) {
    throw new SchemaError(`JSON parse error: ${error instanceof Error ? error.message : String(error)}`, text);
  }

  const result = extractionPayloadSchema.safeParse(parsed);
  if (!result.success) {
    throw new SchemaError(`Extraction payload has the wrong shape: ${result.error.issues[0]?.message ?? 'unknown'}`, text);
  }
  return result.data;
};

type KnownTerm = {
  key: string;
  type: TermType;
  aliases: string[];
  rendering: string;
};

/**
 * The terms seen most recently in the document, so a later chunk keeps
 * proposing the renderings an earlier one established.
 */
export class RunningContext {
  private readonly terms = new Map<string, KnownTerm>();

  constructor(private readonly capacity = 50) {}

  get size() {
    return this.terms.size;
  }

  list(): KnownTerm[] {
    return [...this.terms.values()];
  }

  get(key: string): KnownTerm | undefined {
    return this.terms.get(normalizeKey(key));
  }

  observe(extracted: ExtractedTerm[]) {
    for (const term of extracted) {
      const known = this.terms.get(term.key);
      const best = [...term.candidates].sort((a, b) => b.score - a.score)[0];
      if (!known && !best) continue;

      this.terms.delete(term.key);
      this.terms.set(term.key, {
        key: term.key,
        type: known?.type ?? term.type,
        aliases: [...new Set([...(known?.aliases ?? []), ...term.aliases])],
        // First established rendering wins
        rendering: known?.rendering ?? best?.rendering ?? '',
      });
    }
    while (this.terms.size > this.capacity) {
      const oldest = this.terms.keys().next();
      if (oldest.done) break;
      this.terms.delete(oldest.value);
    }
  }
}

const firstSpanOf = (source: SearchableText, surfaces: string[]): SourceSpan | null =>
  findFirstSurface(source, surfaces)?.span ?? null;

const evidenceWindow = (text: string, span: SourceSpan) =>
  text.slice(Math.max(0, span.start - EVIDENCE_RADIUS), Math.min(text.length, span.end + EVIDENCE_RADIUS)).trim();

const clampScore = (score: number | undefined) => {
  if (score === undefined || Number.isNaN(score)) return DEFAULT_CANDIDATE_SCORE;
  return Math.min(1, Math.max(0, score));
};

export type TermExtractorOptions = {
  retry: RetryPolicy;
  language?: LanguagePair;
  model?: string;
};

export class TermExtractor {
  private readonly language: LanguagePair;

  constructor(
    private readonly provider: AIProvider,
    private readonly options: TermExtractorOptions,
  ) {
    this.language = options.language ?? defaultPromptOptions();
  }

  /**
   * Proposes candidate terms for one chunk. Malformed output is re-prompted
   * once and then reported as unresolved with the raw reply; exhausted
   * external calls are reported the same way.
   */
  async extract(chunk: Chunk, context?: RunningContext): Promise<ExtractionResult> {
    if (!chunk.id || !chunk.text) {
      throw new ValidationError('Chunk must have an id and non-empty text', { chunkId: chunk.id });
    }
    const known = (context?.list() ?? []).map((term) => ({ key: term.key, type: term.type, rendering: term.rendering }));

    try {
      const payload = await withSchemaReprompt(async (reprompt) => {
        const { systemPrompt, prompt } = buildExtractionPrompt(chunk, known, this.language, reprompt);
        const response = await callWithRetry(
          () =>
            this.provider.callModel({
              purpose: 'extract',
              prompt,
              systemPrompt,
              model: this.options.model,
              temperature: 0.1,
              maxTokens: 4000,
              sourceText: chunk.text,
            }),
          this.options.retry,
          { chunkId: chunk.id, step: 'extract' },
        );
        return parseExtractionPayload(response.outputText);
      }, { chunkId: chunk.id, step: 'extract' });

      const candidates = this.normalize(payload, chunk, context);
      context?.observe(candidates);
      logger.debug({ chunkId: chunk.id, terms: candidates.length }, 'Extracted term candidates');
      return {
        status: 'resolved',
        chunkId: chunk.id,
        candidates,
        worldSummary: payload.worldSummary ?? payload.world_summary,
      };
    } catch (error) {
      if (error instanceof SchemaError) {
        logger.error({ chunkId: chunk.id, error: error.message }, 'Term extraction unresolved');
        return { status: 'unresolved', chunkId: chunk.id, error: error.message, rawPayload: error.rawPayload };
      }
      if (error instanceof ExternalCallError) {
        logger.error({ chunkId: chunk.id, error: error.message }, 'Term extraction call failed');
        return { status: 'unresolved', chunkId: chunk.id, error: error.message, rawPayload: '' };
      }
      throw error;
    }
  }

  /**
   * Keys normalised and de-duplicated, ordered by first appearance in the
   * chunk. Terms the chunk never mentions are dropped; context terms the
   * model missed are added back with their known rendering.
   */
  normalize(payload: ExtractionPayload, chunk: Chunk, context?: RunningContext): ExtractedTerm[] {
    const byKey = new Map<string, ExtractedTerm>();
    const positions = new Map<string, number>();
    const source = toSearchable(chunk.text);

    for (const raw of payload.terms) {
      const key = normalizeKey(raw.term);
      if (!key) continue;
      const aliases = (raw.aliases ?? []).map(normalizeKey).filter((alias) => alias && alias !== key);
      const span = firstSpanOf(source, [key, ...aliases]);
      if (!span) {
        logger.debug({ chunkId: chunk.id, term: key }, 'Dropping extracted term absent from chunk');
        continue;
      }

      const type = normalizeTermType(raw.type) ?? context?.get(key)?.type ?? 'domain-term';
      const candidates: TermCandidate[] = raw.candidates
        .map((candidate) =>
          typeof candidate === 'string'
            ? { rendering: candidate.trim(), score: DEFAULT_CANDIDATE_SCORE }
            : { rendering: candidate.rendering.trim(), score: clampScore(candidate.score) },
        )
        .filter((candidate) => candidate.rendering.length > 0)
        .map((candidate) => ({ ...candidate, source: 'extraction' as const, chunkId: chunk.id }));

      const evidence =
        raw.evidence && raw.evidence.trim() && chunk.text.includes(raw.evidence.trim())
          ? raw.evidence.trim()
          : evidenceWindow(chunk.text, span);

      const existing = byKey.get(key);
      if (existing) {
        existing.candidates.push(...candidates);
        existing.aliases = [...new Set([...existing.aliases, ...aliases])];
        continue;
      }
      byKey.set(key, { key, type, aliases, candidates, evidence, chunkId: chunk.id });
      positions.set(key, span.start);
    }

    for (const known of context?.list() ?? []) {
      if (byKey.has(known.key) || !known.rendering) continue;
      const span = firstSpanOf(source, [known.key, ...known.aliases]);
      if (!span) continue;
      byKey.set(known.key, {
        key: known.key,
        type: known.type,
        aliases: [...known.aliases],
        candidates: [{ rendering: known.rendering, score: 1, source: 'context', chunkId: chunk.id }],
        evidence: evidenceWindow(chunk.text, span),
        chunkId: chunk.id,
      });
      positions.set(known.key, span.start);
    }

    const positionOf = (key: string) => positions.get(key) ?? 0;
    return [...byKey.values()].sort((a, b) => positionOf(a.key) - positionOf(b.key) || a.key.localeCompare(b.key));
  }
}

export type ExtractionSummary = {
  candidates: ExtractedTerm[];
  unresolved: UnresolvedExtraction[];
  worldSummary?: string;
};

/** Runs the extractor over the document in order, carrying the running context along. */
export const extractAll = async (
  chunks: Chunk[],
  extractor: TermExtractor,
  context = new RunningContext(),
): Promise<ExtractionSummary> => {
  const ordered = [...chunks].sort((a, b) => a.positionKey - b.positionKey);
  const summary: ExtractionSummary = { candidates: [], unresolved: [] };

  for (const chunk of ordered) {
    const result = await extractor.extract(chunk, context);
    if (result.status === 'resolved') {
      summary.candidates.push(...result.candidates);
      if (!summary.worldSummary && result.worldSummary) summary.worldSummary = result.worldSummary;
    } else {
      summary.unresolved.push(result);
    }
  }

  logger.info(
    { chunks: ordered.length, candidates: summary.candidates.length, unresolved: summary.unresolved.length },
    'Term extraction finished',
  );
  return summary;
};
