import { isNamedEntity } from '../types/glossary';
import type { Chunk, Violation } from '../types/translation';
import type { ActiveTerm, KnowledgeBaseSnapshot } from '../services/knowledgeBase.service';
import { ValidationError } from '../utils/errors';
import { findNearMiss } from '../utils/fuzzy';
import { containment, keywordSet } from '../utils/tokenize';

export type ExpectedRendering = {
  rendering: string;
  senseId: string | null;
};

export const assertCheckable = (chunk: Chunk, snapshot: KnowledgeBaseSnapshot) => {
  if (!chunk.id || !chunk.text) {
    throw new ValidationError('Chunk must have an id and non-empty text', { chunkId: chunk.id });
  }
  if (!snapshot.covers(chunk.id)) {
    throw new ValidationError(`Chunk ${chunk.id} is outside the knowledge base snapshot scope`, {
      chunkId: chunk.id,
      snapshotVersion: snapshot.version,
    });
  }
};

/**
 * The rendering a term should have in this chunk: the sense whose context
 * fits the chunk best, or the main rendering when no sense fits better.
 */
export const resolveExpected = (term: ActiveTerm, chunkKeywords: ReadonlySet<string>): ExpectedRendering => {
  let best: ExpectedRendering = { rendering: term.final, senseId: null };
  let bestScore = containment(term.contextSignature, chunkKeywords);
  for (const sense of term.senses) {
    const score = containment(sense.contextSignature, chunkKeywords);
    if (score > bestScore) {
      best = { rendering: sense.final, senseId: sense.id };
      bestScore = score;
    }
  }
  return best;
};

export class GlossaryChecker {
  constructor(private readonly nearMissThreshold = 0.8) {}

  /**
   * Every snapshot term present in the source must show up in the
   * translation with its approved rendering. Depends on nothing but the
   * three arguments, so re-checking an unchanged draft gives the same list.
   */
  check(translatedText: string, sourceChunk: Chunk, snapshot: KnowledgeBaseSnapshot): Violation[] {
    assertCheckable(sourceChunk, snapshot);

    const target = translatedText.toLowerCase();
    const contains = (rendering: string) => rendering.trim().length > 0 && target.includes(rendering.toLowerCase());
    const chunkKeywords = keywordSet(sourceChunk.text);
    const violations: Violation[] = [];

    for (const { term, span } of snapshot.findOccurrences(sourceChunk.text)) {
      const expected = resolveExpected(term, chunkKeywords);
      if (contains(expected.rendering)) continue;

      const base = { termKey: term.key, expected: expected.rendering, span };
      const accepted = [term.final, ...term.senses.map((sense) => sense.final)];

      const otherSense = accepted.find((rendering) => rendering !== expected.rendering && contains(rendering));
      if (otherSense) {
        violations.push({ ...base, kind: 'wrong-sense', severity: 'major', found: otherSense });
        continue;
      }

      const candidate = term.candidates
        .map((entry) => entry.rendering)
        .find((rendering) => !accepted.includes(rendering) && contains(rendering));
      if (candidate) {
        violations.push({
          ...base,
          kind: 'inconsistent',
          severity: isNamedEntity(term.type) ? 'major' : 'minor',
          found: candidate,
        });
        continue;
      }

      const nearMiss = findNearMiss(translatedText, expected.rendering, this.nearMissThreshold);
      if (nearMiss) {
        violations.push({ ...base, kind: 'inconsistent', severity: 'minor', found: nearMiss.text });
        continue;
      }

      violations.push({ ...base, kind: 'missing', severity: 'major', found: null });
    }

    return violations;
  }
}
