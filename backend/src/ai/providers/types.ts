export type ProviderUsage = {
  inputTokens?: number;
  outputTokens?: number;
  metadata?: Record<string, unknown>;
};

/** What a prompt is for; providers that do not call a model answer by purpose. */
export type PromptPurpose = 'extract' | 'translate' | 'back-translate' | 'style-review' | 'baseline';

export type ProviderPromptRequest = {
  purpose: PromptPurpose;
  prompt: string;
  systemPrompt?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** The text the prompt is about (chunk source, or the draft for back-translation). */
  sourceText: string;
};

export type ProviderPromptResponse = {
  outputText: string;
  model: string;
  usage?: ProviderUsage;
  raw?: unknown;
};

export interface AIProvider {
  readonly name: string;
  readonly defaultModel: string;
  callModel(request: ProviderPromptRequest): Promise<ProviderPromptResponse>;
}
