import { BaseProvider } from './baseProvider';
import type { PromptPurpose, ProviderPromptRequest, ProviderPromptResponse } from './types';

const RESPONSES: Record<PromptPurpose, (request: ProviderPromptRequest) => string> = {
  extract: () => JSON.stringify({ terms: [] }),
  translate: (request) => `[DRAFT] ${request.sourceText}`,
  baseline: (request) => `[BASELINE] ${request.sourceText}`,
  'back-translate': (request) => request.sourceText,
  'style-review': () => 'PASS',
};

/**
 * Offline provider for exercising the pipeline end to end without a model.
 * Drafts echo the source, back-translations echo the draft.
 */
export class DryRunProvider extends BaseProvider {
  readonly name = 'dry-run';
  readonly defaultModel = 'dry-run';

  async callModel(request: ProviderPromptRequest): Promise<ProviderPromptResponse> {
    const model = this.ensureModel(request.model);
    this.logRequest(request, model);

    const outputText = RESPONSES[request.purpose](request);

    return {
      outputText,
      model,
      usage: { metadata: { mock: true, purpose: request.purpose } },
    };
  }
}
