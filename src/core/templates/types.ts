import type { MessageRole, PromptKind } from '../entities/Conversation.js';

/**
 * Chat message format sent to the completion endpoint
 */
export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface TemplateInput {
  userText: string;
  /** Live polarity of userText; supplied when the template asks for it */
  polarity?: number;
}

/**
 * Persona template producing the system message for one prompt kind
 */
export interface PromptTemplate {
  readonly kind: PromptKind;

  /** Whether formatSystemPrompt needs `polarity` */
  readonly usesPolarity: boolean;

  formatSystemPrompt(input: TemplateInput): string;

  /**
   * Get the template name
   */
  getName(): string;
}
