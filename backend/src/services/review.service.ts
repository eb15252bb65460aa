import { readFile, writeFile, mkdir } from 'fs/promises';
import path from 'path';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { normalizeTermType, type ReviewCandidate, type ReviewRow, type ReviewSense } from '../types/glossary';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { scoreRenderings, suggestFinal, type KnowledgeBase } from './knowledgeBase.service';

export const REVIEW_COLUMNS = [
  'term',
  'type',
  'candidates',
  'evidence',
  'suggested_final',
  'final',
  'senses',
  'sense_suggestions',
] as const;

type ReviewColumn = (typeof REVIEW_COLUMNS)[number];
type ReviewCells = Record<ReviewColumn, string>;

const REVIEW_SHEET = 'review';
const CELL_SEPARATOR = ' | ';
const DEFAULT_REVIEW_SCORE = 0.5;

const termTypeSchema = z.string().transform((raw, ctx) => {
  const type = normalizeTermType(raw);
  if (!type) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown term type "${raw}"` });
    return z.NEVER;
  }
  return type;
});

export const reviewRowSchema = z.object({
  term: z.string().trim().min(1),
  type: termTypeSchema,
  candidates: z.array(z.object({ rendering: z.string(), score: z.number().min(0).max(1) })).default([]),
  evidence: z.array(z.string()).default([]),
  suggestedFinal: z.string().default(''),
  final: z.string().default(''),
  senses: z
    .array(
      z.object({
        id: z.string().optional(),
        final: z.string(),
        suggested: z.string().optional(),
        gloss: z.string().optional(),
      }),
    )
    .default([]),
});

export const reviewTableSchema = z.array(reviewRowSchema);

const cellSchema = z.preprocess((value) => (value === undefined || value === null ? '' : String(value)), z.string());

const cellsSchema = z.object({
  term: cellSchema,
  type: cellSchema,
  candidates: cellSchema,
  evidence: cellSchema,
  suggested_final: cellSchema,
  final: cellSchema,
  senses: cellSchema,
  sense_suggestions: cellSchema,
});

/** The table a reviewer edits: every entry, best-scored renderings first. */
export const buildReviewTable = (kb: KnowledgeBase): ReviewRow[] =>
  kb.list().map((entry) => ({
    term: entry.key,
    type: entry.type,
    candidates: scoreRenderings(entry).sort((a, b) => b.score - a.score),
    evidence: [...entry.evidence],
    suggestedFinal: entry.final || suggestFinal(entry),
    final: entry.final,
    senses: entry.senses.map((sense) => ({
      id: sense.id,
      final: sense.final,
      suggested: sense.suggested,
      gloss: sense.gloss,
    })),
  }));

export const parseReviewRows = (input: unknown): ReviewRow[] => {
  const result = reviewTableSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid review table', result.error.issues);
  }
  return result.data;
};

export const formatCandidates = (candidates: ReviewCandidate[]) =>
  candidates.map((candidate) => `${candidate.rendering} (${candidate.score.toFixed(2)})`).join(CELL_SEPARATOR);

export const parseCandidates = (cell: string): ReviewCandidate[] =>
  cell
    .split('|')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      const match = /^(.*?)\s*\((\d*\.?\d+)\)$/.exec(part);
      if (!match) return { rendering: part, score: DEFAULT_REVIEW_SCORE };
      return { rendering: match[1].trim(), score: Math.min(1, Math.max(0, Number(match[2]))) };
    })
    .filter((candidate) => candidate.rendering.length > 0);

export const formatSenses = (senses: ReviewSense[]) =>
  senses.map((sense) => [sense.id ?? '', sense.final, sense.gloss ?? ''].join(CELL_SEPARATOR)).join('\n');

/**
 * One sense per line: `id | final | gloss`, or `final | gloss` for a sense
 * the reviewer adds, or just `final`.
 */
export const parseSenses = (cell: string): ReviewSense[] =>
  cell
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const parts = line.split('|').map((part) => part.trim());
      if (parts.length >= 3) {
        const gloss = parts.slice(2).join(CELL_SEPARATOR);
        return { id: parts[0] || undefined, final: parts[1], gloss: gloss || undefined };
      }
      if (parts.length === 2) {
        return { final: parts[0], gloss: parts[1] || undefined };
      }
      return { final: parts[0] };
    });

const splitLines = (cell: string) =>
  cell
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);

export const rowToCells = (row: ReviewRow): ReviewCells => ({
  term: row.term,
  type: row.type,
  candidates: formatCandidates(row.candidates),
  evidence: row.evidence.join('\n'),
  suggested_final: row.suggestedFinal,
  final: row.final,
  senses: formatSenses(row.senses),
  sense_suggestions: row.senses
    .filter((sense) => sense.suggested)
    .map((sense) => `${sense.id ?? ''}${CELL_SEPARATOR}${sense.suggested ?? ''}`)
    .join('\n'),
});

export const cellsToRow = (cells: ReviewCells): unknown => ({
  term: cells.term,
  type: cells.type,
  candidates: parseCandidates(cells.candidates),
  evidence: splitLines(cells.evidence),
  suggestedFinal: cells.suggested_final.trim(),
  final: cells.final.trim(),
  senses: parseSenses(cells.senses),
});

export const reviewTableToWorkbook = (rows: ReviewRow[]): Buffer => {
  const sheet = XLSX.utils.json_to_sheet(rows.map(rowToCells), { header: [...REVIEW_COLUMNS] });
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, REVIEW_SHEET);
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
};

export const reviewTableFromWorkbook = (buffer: Buffer): ReviewRow[] => {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheetName = workbook.SheetNames.includes(REVIEW_SHEET) ? REVIEW_SHEET : workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new ValidationError('Review workbook has no worksheet');
  }

  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' });
  const rows = records
    .map((record, index) => {
      const cells = cellsSchema.safeParse(record);
      if (!cells.success) {
        throw new ValidationError(`Review row ${index + 2} is unreadable`, cells.error.issues);
      }
      return cells.data;
    })
    // Blank spreadsheet rows
    .filter((cells) => cells.term.trim().length > 0)
    .map(cellsToRow);

  logger.debug({ sheetName, rows: rows.length }, 'Read review workbook');
  return parseReviewRows(rows);
};

export const writeReviewFile = async (rows: ReviewRow[], filePath: string): Promise<void> => {
  await mkdir(path.dirname(filePath), { recursive: true });
  if (path.extname(filePath).toLowerCase() === '.json') {
    await writeFile(filePath, JSON.stringify(rows, null, 2), 'utf8');
  } else {
    await writeFile(filePath, reviewTableToWorkbook(rows));
  }
  logger.info({ filePath, rows: rows.length }, 'Wrote review table');
};

export const readReviewFile = async (filePath: string): Promise<ReviewRow[]> => {
  if (path.extname(filePath).toLowerCase() === '.json') {
    const raw = await readFile(filePath, 'utf8');
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Review file ${filePath} is not valid JSON`, { cause: String(error) });
    }
    return parseReviewRows(data);
  }
  return reviewTableFromWorkbook(await readFile(filePath));
};
