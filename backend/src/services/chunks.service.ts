import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Chunk } from '../types/translation';
import { ValidationError } from '../utils/errors';

const PRECEDING_CONTEXT_CHARS = 200;

const lineContextSchema = z.object({
  chapter_title: z.string().optional(),
  prev_chunk_tail: z.string().optional(),
});

// Accepts the snake_case layout of segmenter output as well as camelCase
const chunkLineSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    position_key: z.number().optional(),
    positionKey: z.number().optional(),
    text: z.string().min(1),
    group: z.union([z.string(), z.number()]).transform(String).optional(),
    chapter_id: z.union([z.string(), z.number()]).transform(String).optional(),
    title: z.string().optional(),
    chapter_title: z.string().optional(),
    context: z.union([z.string(), lineContextSchema]).optional(),
    prev_chunk_tail: z.string().optional(),
  })
  .transform((line, ctx) => {
    const positionKey = line.positionKey ?? line.position_key;
    if (positionKey === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'position_key is required' });
      return z.NEVER;
    }
    const chunk: Chunk = { id: line.id, positionKey, text: line.text };
    const group = line.group ?? line.chapter_id;
    if (group !== undefined) chunk.group = group;
    const nested = typeof line.context === 'object' ? line.context : undefined;
    const title = line.title ?? line.chapter_title ?? nested?.chapter_title;
    if (title) chunk.title = title;
    const context = typeof line.context === 'string' ? line.context : (line.prev_chunk_tail ?? nested?.prev_chunk_tail);
    if (context) chunk.context = context;
    return chunk;
  });

export const chunkSchema = z.object({
  id: z.string().min(1),
  positionKey: z.number(),
  text: z.string().min(1),
  group: z.string().optional(),
  title: z.string().optional(),
  context: z.string().optional(),
});

export const parseChunksJsonl = (raw: string, source = 'input'): Chunk[] => {
  const chunks: Chunk[] = [];
  const seen = new Set<string>();
  raw.split('\n').forEach((line, index) => {
    if (!line.trim()) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new ValidationError(`${source}:${index + 1} is not valid JSON`);
    }
    const result = chunkLineSchema.safeParse(parsed);
    if (!result.success) {
      throw new ValidationError(`${source}:${index + 1} is not a valid chunk`, result.error.issues);
    }
    if (seen.has(result.data.id)) {
      throw new ValidationError(`${source}:${index + 1} repeats chunk id ${result.data.id}`);
    }
    seen.add(result.data.id);
    chunks.push(result.data);
  });
  return chunks;
};

export const loadChunks = async (filePath: string): Promise<Chunk[]> =>
  parseChunksJsonl(await readFile(filePath, 'utf8'), filePath);

/**
 * Gives every chunk without its own context the tail of the chunk before it
 * in the same group.
 */
export const attachPrecedingContext = (chunks: Chunk[], maxChars = PRECEDING_CONTEXT_CHARS): Chunk[] => {
  const ordered = [...chunks].sort((a, b) => a.positionKey - b.positionKey);
  const previousOf = new Map<string, Chunk>();
  ordered.forEach((chunk, index) => {
    const previous = ordered[index - 1];
    if (previous && previous.group === chunk.group) previousOf.set(chunk.id, previous);
  });
  return chunks.map((chunk) => {
    const previous = previousOf.get(chunk.id);
    if (chunk.context || !previous) return chunk;
    return { ...chunk, context: previous.text.slice(-maxChars) };
  });
};

export type GroupRange = { from: number; to: number };

/** Reads "3" or "1-2". */
export const parseGroupRange = (value: string): GroupRange => {
  const match = /^\s*(\d+)\s*(?:-\s*(\d+)\s*)?$/.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid group range "${value}", expected N or N-M`);
  }
  const from = Number(match[1]);
  const to = match[2] === undefined ? from : Number(match[2]);
  if (to < from) {
    throw new ValidationError(`Invalid group range "${value}", the end comes before the start`);
  }
  return { from, to };
};

export type ChunkSelection = {
  /** Groups whose trailing number falls in the range. */
  groups?: GroupRange;
  maxGroups?: number;
  maxChunksPerGroup?: number;
};

const groupNumber = (group: string | undefined) => {
  const match = group === undefined ? null : /(\d+)$/.exec(group);
  return match ? Number(match[1]) : null;
};

/** Chunks of the selected groups, in position order. */
export const selectChunks = (chunks: Chunk[], selection: ChunkSelection): Chunk[] => {
  const { groups, maxGroups, maxChunksPerGroup } = selection;
  const taken = new Map<string, number>();
  const selected: Chunk[] = [];

  for (const chunk of [...chunks].sort((a, b) => a.positionKey - b.positionKey)) {
    if (groups) {
      const number = groupNumber(chunk.group);
      if (number === null || number < groups.from || number > groups.to) continue;
    }
    const group = chunk.group ?? '';
    if (!taken.has(group) && maxGroups !== undefined && taken.size >= maxGroups) continue;
    const count = taken.get(group) ?? 0;
    if (maxChunksPerGroup !== undefined && count >= maxChunksPerGroup) continue;
    taken.set(group, count + 1);
    selected.push(chunk);
  }
  return selected;
};
