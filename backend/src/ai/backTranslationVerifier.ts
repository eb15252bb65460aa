import type { Chunk } from '../types/translation';
import { contentUnits, countUnits } from '../utils/tokenize';
import type { BackTranslator } from './translator';

export type Verification = {
  fidelityScore: number;
  backTranslation: string;
};

/**
 * Clipped recall of the source's content units in the back-translation.
 * Adding text to the back-translation never lowers the score; a source with
 * nothing to recall scores 1.
 */
export const fidelityScore = (source: string, backTranslation: string): number => {
  const sourceCounts = countUnits(contentUnits(source));
  let total = 0;
  sourceCounts.forEach((count) => {
    total += count;
  });
  if (total === 0) return 1;

  const backCounts = countUnits(contentUnits(backTranslation));
  let matched = 0;
  sourceCounts.forEach((count, unit) => {
    matched += Math.min(count, backCounts.get(unit) ?? 0);
  });
  return matched / total;
};

export class BackTranslationVerifier {
  constructor(private readonly backTranslator: BackTranslator) {}

  async verify(draft: string, sourceChunk: Chunk, reprompt = false): Promise<Verification> {
    const backTranslation = await this.backTranslator.backTranslate(draft, sourceChunk, reprompt);
    return { backTranslation, fidelityScore: fidelityScore(sourceChunk.text, backTranslation) };
  }
}
