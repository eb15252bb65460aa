import OpenAI from 'openai';
import { BaseProvider } from './baseProvider';
import type { ProviderPromptRequest, ProviderPromptResponse } from './types';
import { ExternalCallError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';

const REQUEST_TIMEOUT_MS = 120_000;

const RETRYABLE_STATUSES = new Set([408, 409, 429]);

export const toExternalCallError = (error: unknown): ExternalCallError => {
  if (error instanceof OpenAI.APIConnectionError) {
    return new ExternalCallError(`OpenAI connection failed: ${error.message}`, true, { cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const retryable = status === undefined || RETRYABLE_STATUSES.has(status) || status >= 500;
    return new ExternalCallError(`OpenAI API error (${status ?? 'unknown'}): ${error.message}`, retryable, {
      cause: error,
    });
  }
  return new ExternalCallError(`OpenAI request failed: ${errorMessage(error)}`, true, { cause: error });
};

export class OpenAIProvider extends BaseProvider {
  readonly name = 'openai';
  private readonly client: OpenAI | null;

  constructor(apiKey?: string, public readonly defaultModel = 'gpt-4o-mini', baseUrl?: string) {
    super();
    this.client = apiKey
      ? new OpenAI({
          apiKey,
          baseURL: baseUrl || undefined,
          // Retries are owned by the caller's retry budget
          maxRetries: 0,
          timeout: REQUEST_TIMEOUT_MS,
        })
      : null;
  }

  async callModel(request: ProviderPromptRequest): Promise<ProviderPromptResponse> {
    if (!this.client) {
      throw new ExternalCallError('OPENAI_API_KEY is not configured', false);
    }

    const model = this.ensureModel(request.model);
    this.logRequest(request, model);

    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    try {
      const completion = await this.client.chat.completions.create({
        model,
        temperature: request.temperature ?? 0.2,
        max_tokens: request.maxTokens ?? 2048,
        messages,
      });

      const outputText = completion.choices[0]?.message?.content ?? '';
      if (!outputText) {
        logger.warn({ model, purpose: request.purpose }, 'OpenAI API returned empty response');
      }

      return {
        outputText,
        model,
        usage: {
          inputTokens: completion.usage?.prompt_tokens,
          outputTokens: completion.usage?.completion_tokens,
        },
        raw: completion,
      };
    } catch (error) {
      const mapped = toExternalCallError(error);
      logger.error(
        {
          error: mapped.message,
          retryable: mapped.retryable,
          model,
          purpose: request.purpose,
          promptLength: request.prompt.length,
        },
        'OpenAI provider failed',
      );
      throw mapped;
    }
  }
}
