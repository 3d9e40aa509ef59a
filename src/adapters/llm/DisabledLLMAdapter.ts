import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

/**
 * Used when no API key is configured. Classification cannot work without a
 * model, so it fails loudly; response generation falls back to templates.
 */
export class DisabledLLMAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'DisabledLLMAdapter' });

  async generateText(request: LLMRequest): Promise<LLMResponse> {
    if (request.purpose === 'classification') {
      this.logger.warn('LLM adapter is disabled; cannot classify');
      throw new LLMError('Language model is not configured');
    }
    this.logger.warn('LLM adapter is disabled; returning empty response');
    return { text: '' };
  }
}
