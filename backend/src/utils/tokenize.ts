import type { SourceSpan } from '../types/translation';

const CJK_CHAR = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]/u;

// A CJK character on its own, or a run of other letters/digits
const CONTENT_UNIT =
  /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]|(?:(?![\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}])[\p{L}\p{N}])+/gu;

const STOP_CHARS = new Set(['的', '了', '在', '是', '和', '有', '就', '不', '都', '一', '也', '很', '到', '说', '要', '去', '你', '我', '他', '她', '会', '着', '看', '好', '这', '那']);
const STOP_WORDS = new Set(['the', 'a', 'an', 'of', 'and', 'to', 'in', 'on', 'is', 'was', 'it', 'he', 'she', 'his', 'her', 'that', 'this']);

export const normalizeText = (text: string): string => text.normalize('NFKC').toLowerCase();

/** Normalised source-language surface form used as a knowledge-base key. */
export const normalizeKey = (text: string): string => text.normalize('NFKC').replace(/\s+/g, ' ').trim();

// A base character with any combining marks after it, normalised as one piece
const CLUSTER = /\P{M}\p{M}*|\p{M}+/gsu;

/**
 * Text folded the way keys are (NFKC, lowercase, whitespace runs as one
 * space), with the raw offsets behind every folded character.
 */
export type SearchableText = {
  folded: string;
  starts: number[];
  ends: number[];
};

export const toSearchable = (raw: string): SearchableText => {
  let folded = '';
  const starts: number[] = [];
  const ends: number[] = [];
  for (const match of raw.matchAll(CLUSTER)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    const piece = normalizeText(match[0]).replace(/\s+/g, folded.endsWith(' ') ? '' : ' ');
    for (let i = 0; i < piece.length; i += 1) {
      starts.push(start);
      ends.push(end);
    }
    folded += piece;
  }
  return { folded, starts, ends };
};

/** Raw span of the first occurrence of a surface form, compared as keys are. */
export const findSurface = (source: SearchableText, surface: string): SourceSpan | null => {
  const needle = normalizeKey(surface).toLowerCase();
  if (!needle) return null;
  const index = source.folded.indexOf(needle);
  if (index === -1) return null;
  return { start: source.starts[index], end: source.ends[index + needle.length - 1] };
};

/** Earliest raw span among several surface forms of one term. */
export const findFirstSurface = (
  source: SearchableText,
  surfaces: readonly string[],
): { surface: string; span: SourceSpan } | null => {
  let first: { surface: string; span: SourceSpan } | null = null;
  for (const surface of surfaces) {
    const span = findSurface(source, surface);
    if (span && (!first || span.start < first.span.start)) first = { surface, span };
  }
  return first;
};

export const isCjk = (char: string): boolean => CJK_CHAR.test(char);

/**
 * Content units of a text: every CJK character, every Latin/Cyrillic/etc.
 * word or number. Lowercased, punctuation and whitespace dropped.
 */
export const contentUnits = (text: string): string[] => normalizeText(text).match(CONTENT_UNIT) ?? [];

export const countUnits = (units: string[]): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const unit of units) {
    counts.set(unit, (counts.get(unit) ?? 0) + 1);
  }
  return counts;
};

const keywordCandidates = (text: string): string[] => {
  const units = contentUnits(text);
  const keywords: string[] = [];
  for (let i = 0; i < units.length; i += 1) {
    const unit = units[i];
    if (isCjk(unit)) {
      const next = units[i + 1];
      if (next && isCjk(next) && !(STOP_CHARS.has(unit) && STOP_CHARS.has(next))) {
        keywords.push(unit + next);
      }
    } else if (unit.length > 1 && !STOP_WORDS.has(unit)) {
      keywords.push(unit);
    }
  }
  return keywords;
};

/**
 * The most frequent keywords of a text (CJK bigrams, longer words), sorted.
 * Two evidence spans with overlapping signatures talk about the same thing.
 */
export const contextSignature = (text: string, maxKeywords = 5): string[] => {
  const counts = countUnits(keywordCandidates(text));
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, maxKeywords)
    .map(([keyword]) => keyword)
    .sort();
};

export const jaccard = (left: readonly string[], right: readonly string[]): number => {
  if (left.length === 0 || right.length === 0) return 0;
  const leftSet = new Set(left);
  const rightSet = new Set(right);
  let intersection = 0;
  leftSet.forEach((item) => {
    if (rightSet.has(item)) intersection += 1;
  });
  const union = new Set([...leftSet, ...rightSet]).size;
  return union === 0 ? 0 : intersection / union;
};

/** Every keyword of a text, for checking how well a short signature fits it. */
export const keywordSet = (text: string): Set<string> => new Set(keywordCandidates(text));

/** Share of `signature` found in `keywords`; 0 for an empty signature. */
export const containment = (signature: readonly string[], keywords: ReadonlySet<string>): number => {
  if (signature.length === 0) return 0;
  return signature.filter((keyword) => keywords.has(keyword)).length / signature.length;
};
