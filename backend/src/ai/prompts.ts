import type { KnowledgeBaseSnapshot, ActiveTerm } from '../services/knowledgeBase.service';
import type { Chunk, Judgment } from '../types/translation';
import { TERM_TYPES } from '../types/glossary';
import { env } from '../utils/env';
import { keywordSet } from '../utils/tokenize';
import { resolveExpected } from './glossaryChecker';

export type LanguagePair = {
  sourceLanguage: string;
  targetLanguage: string;
};

export type PromptOptions = LanguagePair & {
  guidelines?: string[];
};

export type PromptParts = {
  systemPrompt: string;
  prompt: string;
};

export const defaultPromptOptions = (): PromptOptions => ({
  sourceLanguage: env.sourceLanguage,
  targetLanguage: env.targetLanguage,
});

const MAX_GLOSSARY_LINES = 200;

const buildGuidelineSection = (guidelines?: string[]) => {
  if (!guidelines || guidelines.length === 0) {
    return '1. Stay faithful to the narrative rhythm of the original.\n2. Keep the tone and register of the source; avoid modern slang.';
  }
  return guidelines.map((rule, index) => `${index + 1}. ${rule}`).join('\n');
};

const formatTerm = (term: ActiveTerm, chunk: Chunk) => {
  const expected = resolveExpected(term, keywordSet(chunk.text));
  const senses = term.senses.length
    ? ` | senses: ${term.senses.map((sense) => `${sense.final}${sense.gloss ? ` (${sense.gloss})` : ''}`).join('; ')}`
    : '';
  return `- ${term.key} => ${expected.rendering} [${term.type}]${senses}`;
};

/**
 * Terms occurring in the chunk come first and are mandatory; the rest of the
 * glossary follows as background, up to the line cap.
 */
export const buildGlossarySection = (snapshot: KnowledgeBaseSnapshot, chunk: Chunk) => {
  if (snapshot.size === 0) {
    return 'No glossary available.';
  }
  const present = snapshot.findOccurrences(chunk.text).map((occurrence) => occurrence.term);
  const presentKeys = new Set(present.map((term) => term.key));
  const background = snapshot.entries().filter((term) => !presentKeys.has(term.key));

  const lines = ['## Glossary (strict, use these renderings exactly):'];
  if (present.length) {
    lines.push(...present.map((term) => formatTerm(term, chunk)));
  } else {
    lines.push('(no glossary terms occur in this passage)');
  }
  const room = MAX_GLOSSARY_LINES - present.length;
  if (room > 0 && background.length) {
    lines.push('', '## Other established terms:');
    lines.push(...background.slice(0, room).map((term) => `- ${term.key} => ${term.final}`));
  }
  if (snapshot.worldSummary) {
    lines.push('', '## World summary:', snapshot.worldSummary);
  }
  return lines.join('\n');
};

const buildFixesSection = (critique: Judgment) => {
  const lines = ['## Reviewer findings to fix:'];
  critique.reasons.forEach((reason, index) => lines.push(`${index + 1}. ${reason}`));
  return lines.join('\n');
};

/** Chapter heading and preceding text, for continuity only. */
export const buildContextSection = (chunk: Chunk): string | null => {
  const lines: string[] = [];
  if (chunk.title) lines.push(`Chapter: ${chunk.title}`);
  if (chunk.context) lines.push(`Preceding text (do not translate):\n${chunk.context}`);
  return lines.length > 0 ? ['## Context:', ...lines].join('\n') : null;
};

export const buildTranslatePrompt = (
  chunk: Chunk,
  snapshot: KnowledgeBaseSnapshot,
  options: PromptOptions,
  refinement: { critique: Judgment; previousDraft: string } | null,
  reprompt = false,
): PromptParts => {
  const systemPrompt = [
    `You are a literary translator working from ${options.sourceLanguage} into ${options.targetLanguage}.`,
    'Translate the passage so it reads as if originally written in the target language.',
    '',
    '## Guidelines:',
    buildGuidelineSection(options.guidelines),
    '',
    buildGlossarySection(snapshot, chunk),
  ].join('\n');

  const parts: string[] = [];
  const contextSection = buildContextSection(chunk);
  if (contextSection) parts.push(contextSection);
  parts.push(`## Source passage:\n${chunk.text}`);
  if (refinement) {
    parts.push(`## Previous draft:\n${refinement.previousDraft}`, buildFixesSection(refinement.critique));
    parts.push(`Output the corrected ${options.targetLanguage} translation of the whole passage.`);
  } else {
    parts.push(`Output the ${options.targetLanguage} translation directly.`);
  }
  if (reprompt) {
    parts.push('Your previous answer was empty or unusable. Reply with the translated text only: no notes, no markup.');
  }
  return { systemPrompt, prompt: parts.join('\n\n') };
};

export const buildBackTranslatePrompt = (draft: string, options: LanguagePair, reprompt = false): PromptParts => ({
  systemPrompt: `You are a professional translator. Translate the following ${options.targetLanguage} text back into ${options.sourceLanguage} as literally and completely as possible.`,
  prompt: reprompt ? `${draft}\n\n(Reply with the ${options.sourceLanguage} text only.)` : draft,
});

export const buildStyleReviewPrompt = (
  chunk: Chunk,
  draft: string,
  backTranslation: string,
  snapshot: KnowledgeBaseSnapshot,
): PromptParts => ({
  systemPrompt: [
    'You are a demanding translation reviewer. Check the draft for omissions, mistranslations and tone that does not fit the original.',
    'Glossary compliance is verified separately; do not comment on term renderings.',
    '',
    buildGlossarySection(snapshot, chunk),
  ].join('\n'),
  prompt: [
    `## Original:\n${chunk.text}`,
    `## Draft:\n${draft}`,
    `## Back-translation of the draft:\n${backTranslation}`,
    "List concrete suggestions, one per line. If the draft needs no change, reply with 'PASS'.",
  ].join('\n\n'),
});

export const buildExtractionPrompt = (
  chunk: Chunk,
  knownTerms: Array<{ key: string; type: string; rendering: string }>,
  options: LanguagePair,
  reprompt = false,
): PromptParts => {
  const context = knownTerms.length
    ? ['## Terms already seen earlier in the document (keep their renderings if they recur):', ...knownTerms.map((term) => `- ${term.key} => ${term.rendering} [${term.type}]`)].join('\n')
    : '';
  const schema = JSON.stringify({
    terms: [
      {
        term: 'source surface form',
        type: TERM_TYPES.join(' | '),
        aliases: ['other source spellings'],
        candidates: [{ rendering: `${options.targetLanguage} rendering`, score: 0.9 }],
        evidence: 'short quote from the passage showing the meaning',
      },
    ],
  });

  return {
    systemPrompt: [
      `You are a terminology lead preparing a ${options.sourceLanguage} to ${options.targetLanguage} glossary.`,
      'Extract recurring named entities (people, places, organisations, deities, languages, titles and identities) and domain-specific vocabulary.',
      'For each term propose renderings ordered from most to least appropriate, each with a confidence between 0 and 1.',
      context,
    ]
      .filter(Boolean)
      .join('\n'),
    prompt: [
      `## Passage:\n${chunk.text}`,
      `Reply with JSON only, in this shape:\n${schema}`,
      reprompt ? 'Your previous reply could not be parsed. Return a single JSON object and nothing else.' : '',
    ]
      .filter(Boolean)
      .join('\n\n'),
  };
};

export const buildBaselinePrompt = (chunk: Chunk, options: LanguagePair): PromptParts => ({
  systemPrompt: `You are a ${options.sourceLanguage} to ${options.targetLanguage} translator. Translate accurately and fluently.`,
  prompt: `${chunk.text}\n\nOutput the ${options.targetLanguage} translation only, without explanations.`,
});
