export interface GenerationMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ToolSpec {
  name: string;
  description: string;
  /** JSON Schema for the tool input. */
  parameters: Record<string, unknown>;
}

export interface GenerationRequest {
  model: string;
  region: string;
  system: string;
  messages: GenerationMessage[];
  temperature: number;
  maxTokens: number;
  tools?: ToolSpec[];
  reasoning?: {
    budgetTokens: number;
  };
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type GenerationDelta =
  | { type: 'content'; text: string }
  | { type: 'end'; usage?: TokenUsage }
  | { type: 'error'; error: Error };

export interface GenerationService {
  /**
   * Stream a response. Transport failures before the first delta are
   * thrown; failures after it arrive as an `error` delta.
   */
  stream(request: GenerationRequest, signal?: AbortSignal): AsyncIterable<GenerationDelta>;
}
