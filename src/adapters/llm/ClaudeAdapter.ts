import Anthropic, { APIUserAbortError } from '@anthropic-ai/sdk';
import type { LLMPort, LLMPurpose, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

/** System prompt with prompt caching; the persona and intent catalogue repeat on every call. */
function buildSystemParam(
  systemPrompt: string | undefined
): Array<{ type: 'text'; text: string; cache_control: { type: 'ephemeral' } }> | undefined {
  if (!systemPrompt?.trim()) {
    return undefined;
  }
  return [
    {
      type: 'text',
      text: systemPrompt,
      cache_control: { type: 'ephemeral' },
    },
  ];
}

function buildUserContent(request: LLMRequest): Array<{ type: 'text'; text: string }> {
  const blocks: Array<{ type: 'text'; text: string }> = [];
  if (request.contextBlock?.trim()) {
    blocks.push({ type: 'text', text: request.contextBlock });
  }
  blocks.push({ type: 'text', text: request.prompt });
  return blocks;
}

export class ClaudeAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'ClaudeAdapter' });
  private readonly client: Anthropic;
  private readonly models: Record<LLMPurpose, string>;

  constructor(config: Config, client?: Anthropic) {
    this.client = client ?? new Anthropic({ apiKey: config.anthropicApiKey, maxRetries: 1 });
    this.models = {
      classification: config.llmClassifierModel,
      response: config.llmResponseModel,
    };
    this.logger.info({ models: this.models }, 'Claude adapter initialized');
  }

  async generateText(request: LLMRequest): Promise<LLMResponse> {
    const purpose = request.purpose ?? 'response';
    const logger = this.logger.child({ method: 'generateText', purpose });
    try {
      const response = await this.client.messages.create(
        {
          model: this.models[purpose],
          max_tokens: request.maxTokens ?? 800,
          temperature: request.temperature ?? 0.2,
          system: buildSystemParam(request.systemPrompt),
          messages: [
            {
              role: 'user',
              content: buildUserContent(request),
            },
          ],
        },
        { signal: request.signal }
      );

      return buildLlmResponse(response);
    } catch (error) {
      if (error instanceof APIUserAbortError || request.signal?.aborted) {
        logger.debug('Claude request aborted');
        throw new LLMError('Claude request aborted', { cause: error });
      }
      logger.error({ error }, 'Claude text generation failed');
      throw new LLMError('Claude text generation failed', { cause: error });
    }
  }
}

function buildLlmResponse(response: unknown): LLMResponse {
  const text = extractText(response);
  const usage = extractUsage(response);
  return {
    text,
    usage,
  };
}

function extractText(response: unknown): string {
  if (!isRecord(response)) {
    return '';
  }
  const content = response.content;
  if (!Array.isArray(content)) {
    return '';
  }
  return content
    .filter((block): block is { type: 'text'; text: string } =>
      isRecord(block) && block.type === 'text' && typeof block.text === 'string'
    )
    .map((block) => block.text)
    .join('');
}

function extractUsage(response: unknown): { inputTokens: number; outputTokens: number } | undefined {
  if (!isRecord(response)) {
    return undefined;
  }
  const usage = response.usage;
  if (!isRecord(usage)) {
    return undefined;
  }
  const inputTokens = typeof usage.input_tokens === 'number' ? usage.input_tokens : undefined;
  const outputTokens = typeof usage.output_tokens === 'number' ? usage.output_tokens : undefined;
  if (inputTokens === undefined || outputTokens === undefined) {
    return undefined;
  }
  return { inputTokens, outputTokens };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
