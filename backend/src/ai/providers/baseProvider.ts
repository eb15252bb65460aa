import { logger } from '../../utils/logger';
import type { AIProvider, ProviderPromptRequest, ProviderPromptResponse } from './types';

export abstract class BaseProvider implements AIProvider {
  abstract readonly name: string;
  abstract readonly defaultModel: string;

  abstract callModel(request: ProviderPromptRequest): Promise<ProviderPromptResponse>;

  protected ensureModel(requested?: string) {
    return requested ?? this.defaultModel;
  }

  protected logRequest(request: ProviderPromptRequest, model: string) {
    logger.debug(
      {
        provider: this.name,
        model,
        purpose: request.purpose,
        promptLength: request.prompt.length,
      },
      'Model request',
    );
  }
}
