import type { ChatMessage } from '../templates/types.js';

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
}

/**
 * Interface for the LLM chat-completion boundary.
 * Implementations reject with BoundaryError.
 */
export interface IChatCompletionClient {
  complete(request: ChatCompletionRequest): Promise<string>;

  healthCheck(): Promise<boolean>;
}
