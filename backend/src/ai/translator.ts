import type { KnowledgeBaseSnapshot } from '../services/knowledgeBase.service';
import type { Chunk, Judgment } from '../types/translation';
import { SchemaError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  buildBackTranslatePrompt,
  buildBaselinePrompt,
  buildStyleReviewPrompt,
  buildTranslatePrompt,
  defaultPromptOptions,
  type PromptOptions,
} from './prompts';
import type { AIProvider } from './providers/types';

export type TranslateRequest = {
  chunk: Chunk;
  snapshot: KnowledgeBaseSnapshot;
  iteration: number;
  /** Set on Refine iterations. */
  priorCritique: Judgment | null;
  previousDraft: string | null;
  reprompt: boolean;
};

export type TranslateResult = {
  text: string;
  model: string;
};

export interface TranslationCapability {
  translate(request: TranslateRequest): Promise<TranslateResult>;
}

export interface BackTranslator {
  backTranslate(draft: string, chunk: Chunk, reprompt: boolean): Promise<string>;
}

export interface StyleReviewer {
  review(chunk: Chunk, draft: string, backTranslation: string, snapshot: KnowledgeBaseSnapshot): Promise<string[]>;
}

export interface BaselineCapability {
  translatePlain(chunk: Chunk): Promise<TranslateResult>;
}

/** Strips a markdown fence the model sometimes wraps plain text in. */
export const stripCodeFence = (text: string): string => {
  let cleaned = text.trim();
  if (cleaned.startsWith('```')) {
    const lines = cleaned.split('\n');
    if (/^```[\w-]*$/.test(lines[0])) lines.shift();
    if (lines.length > 0 && lines[lines.length - 1].trim() === '```') lines.pop();
    cleaned = lines.join('\n').trim();
  }
  return cleaned;
};

export const parseStyleNotes = (text: string): string[] => {
  const cleaned = stripCodeFence(text);
  if (!cleaned || /^pass\.?$/i.test(cleaned)) return [];
  return cleaned
    .split('\n')
    .map((line) => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim())
    .filter((line) => line.length > 0 && !/^pass\.?$/i.test(line));
};

/** Every model-backed capability of the loop, over a single provider. */
export class ProviderTranslator implements TranslationCapability, BackTranslator, StyleReviewer, BaselineCapability {
  constructor(
    private readonly provider: AIProvider,
    private readonly options: PromptOptions = defaultPromptOptions(),
    private readonly model?: string,
  ) {}

  get modelName() {
    return this.model ?? this.provider.defaultModel;
  }

  async translate(request: TranslateRequest): Promise<TranslateResult> {
    const { chunk, snapshot, priorCritique, previousDraft } = request;
    const refinement = priorCritique && previousDraft !== null ? { critique: priorCritique, previousDraft } : null;
    const { systemPrompt, prompt } = buildTranslatePrompt(chunk, snapshot, this.options, refinement, request.reprompt);

    logger.debug(
      { chunkId: chunk.id, iteration: request.iteration, refine: Boolean(refinement), provider: this.provider.name },
      'Requesting draft translation',
    );
    const response = await this.provider.callModel({
      purpose: 'translate',
      prompt,
      systemPrompt,
      model: this.model,
      sourceText: chunk.text,
    });
    return { text: this.requireText(response.outputText, chunk.id, 'translation'), model: response.model };
  }

  async backTranslate(draft: string, chunk: Chunk, reprompt: boolean): Promise<string> {
    const { systemPrompt, prompt } = buildBackTranslatePrompt(draft, this.options, reprompt);
    const response = await this.provider.callModel({
      purpose: 'back-translate',
      prompt,
      systemPrompt,
      model: this.model,
      temperature: 0,
      sourceText: draft,
    });
    return this.requireText(response.outputText, chunk.id, 'back-translation');
  }

  async review(chunk: Chunk, draft: string, backTranslation: string, snapshot: KnowledgeBaseSnapshot): Promise<string[]> {
    const { systemPrompt, prompt } = buildStyleReviewPrompt(chunk, draft, backTranslation, snapshot);
    const response = await this.provider.callModel({
      purpose: 'style-review',
      prompt,
      systemPrompt,
      model: this.model,
      sourceText: chunk.text,
    });
    return parseStyleNotes(response.outputText);
  }

  async translatePlain(chunk: Chunk): Promise<TranslateResult> {
    const { systemPrompt, prompt } = buildBaselinePrompt(chunk, this.options);
    const response = await this.provider.callModel({
      purpose: 'baseline',
      prompt,
      systemPrompt,
      model: this.model,
      sourceText: chunk.text,
    });
    return { text: this.requireText(response.outputText, chunk.id, 'baseline translation'), model: response.model };
  }

  private requireText(outputText: string, chunkId: string, what: string): string {
    const text = stripCodeFence(outputText);
    if (!text) {
      throw new SchemaError(`Provider returned an empty ${what} for chunk ${chunkId}`, outputText);
    }
    return text;
  }
}
