export type LLMPurpose = 'classification' | 'response';

export interface LLMRequest {
  /** The (normalized) user input or the filled response template. */
  prompt: string;
  systemPrompt?: string;
  /** Rendered session context, sent ahead of the prompt when non-empty. */
  contextBlock?: string;
  purpose?: LLMPurpose;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface LLMResponse {
  text: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMPort {
  generateText(request: LLMRequest): Promise<LLMResponse>;
}
