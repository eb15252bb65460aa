import { distance as levenshteinDistance } from 'fastest-levenshtein';
import { normalizeText } from './tokenize';

const normalizeForMatch = (text: string) => normalizeText(text).replace(/\s+/g, ' ').trim();

/** 1 - normalised Levenshtein distance, on lowercased, whitespace-collapsed text. */
export const similarityRatio = (left: string, right: string): number => {
  const a = normalizeForMatch(left);
  const b = normalizeForMatch(right);
  if (!a || !b) return 0;
  if (a === b) return 1;
  const maxLength = Math.max(a.length, b.length, 1);
  return Math.max(0, 1 - levenshteinDistance(a, b) / maxLength);
};

export type NearMiss = {
  text: string;
  ratio: number;
};

const wordWindows = (text: string, sizes: number[]): string[] => {
  const words = text.split(/\s+/).map((word) => word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '')).filter(Boolean);
  const windows: string[] = [];
  for (const size of sizes) {
    if (size < 1) continue;
    for (let i = 0; i + size <= words.length; i += 1) {
      windows.push(words.slice(i, i + size).join(' '));
    }
  }
  return windows;
};

const charWindows = (text: string, sizes: number[]): string[] => {
  const chars = [...text.replace(/\s+/g, '')];
  const windows: string[] = [];
  for (const size of sizes) {
    if (size < 1) continue;
    for (let i = 0; i + size <= chars.length; i += 1) {
      windows.push(chars.slice(i, i + size).join(''));
    }
  }
  return windows;
};

/**
 * Finds the stretch of `haystack` that looks most like `needle` without being
 * it: a misspelled or partially changed rendering. Returns null when nothing
 * reaches `threshold` or when the needle occurs verbatim.
 */
export const findNearMiss = (haystack: string, needle: string, threshold = 0.8): NearMiss | null => {
  const target = normalizeForMatch(needle);
  const text = normalizeForMatch(haystack);
  if (!target || !text || text.includes(target)) return null;

  const spaced = /\s/.test(target);
  const windows = spaced
    ? (() => {
        const size = target.split(' ').length;
        return wordWindows(text, [size - 1, size, size + 1]);
      })()
    : /[\p{Script=Latin}\p{Script=Cyrillic}\p{N}]/u.test(target)
      ? wordWindows(text, [1])
      : (() => {
          const size = [...target].length;
          return charWindows(text, [size - 1, size, size + 1]);
        })();

  let best: NearMiss | null = null;
  for (const window of windows) {
    const ratio = similarityRatio(window, target);
    if (ratio >= threshold && ratio < 1 && (!best || ratio > best.ratio)) {
      best = { text: window, ratio };
    }
  }
  return best;
};
