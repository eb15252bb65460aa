import { env } from '../../utils/env';
import { ValidationError } from '../../utils/errors';
import { DryRunProvider } from './dryRun.provider';
import { OpenAIProvider } from './openai.provider';
import type { AIProvider } from './types';

const providers: Record<string, AIProvider> = {
  openai: new OpenAIProvider(env.openAiApiKey, env.openAiModel, env.openAiBaseUrl),
  'dry-run': new DryRunProvider(),
};

export const getProvider = (name?: string, apiKey?: string): AIProvider => {
  const normalized = (name ?? env.defaultAIProvider ?? 'openai').toLowerCase();
  const provider = providers[normalized];
  if (!provider) {
    throw new ValidationError(`Unknown AI provider "${normalized}"`, { available: Object.keys(providers) });
  }

  // A per-request key gets its own client
  if (apiKey && normalized === 'openai') {
    return new OpenAIProvider(apiKey, env.openAiModel, env.openAiBaseUrl);
  }

  return provider;
};

export const listProviders = () =>
  Object.keys(providers).map((key) => ({
    name: key,
    defaultModel: providers[key].defaultModel,
    hasApiKey: key === 'dry-run' || Boolean(env.openAiApiKey),
  }));
