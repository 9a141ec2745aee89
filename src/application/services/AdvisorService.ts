import { topicForKind } from '../../core/entities/Conversation.js';
import type { PromptKind } from '../../core/entities/Conversation.js';
import type { Post } from '../../core/entities/Post.js';
import type { IChatCompletionClient } from '../../core/interfaces/IChatCompletionClient.js';
import type { ChatMessage } from '../../core/templates/index.js';
import { BoundaryError, ValidationError, errorMessage } from '../../core/errors.js';
import { createErrorLog } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import type { SessionContext } from '../session/SessionContext.js';
import type { PromptComposer } from './PromptComposer.js';
import { buildCulturalContext } from './ProfileService.js';

export interface CompletionSettings {
  model: string;
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_COMPLETION_SETTINGS: CompletionSettings = {
  model: 'gpt-4',
  temperature: 0.7,
  maxTokens: 1000,
};

/**
 * Outcome of one turn. A boundary failure is a value, not an exception,
 * so a turn never crashes the conversation.
 */
export type AdvisorResult =
  | { ok: true; reply: string; messages: ChatMessage[] }
  | { ok: false; error: BoundaryError; messages: ChatMessage[] };

export type ChatKind = Exclude<PromptKind, 'anonymous_sharing'>;

/**
 * Compose-and-call: the one place the LLM boundary is reached
 */
export class AdvisorService {
  constructor(
    private client: IChatCompletionClient,
    private composer: PromptComposer,
    private settings: CompletionSettings = DEFAULT_COMPLETION_SETTINGS,
    private logger?: Logger
  ) {}

  /**
   * Ask within a session topic. On success the question and reply are appended
   * to that topic's history; on failure history is left as it was.
   */
  async ask(session: SessionContext, kind: ChatKind, userText: string): Promise<AdvisorResult> {
    const text = userText.trim();
    if (!text) {
      throw new ValidationError('Message must not be empty', 'text');
    }

    const context = kind === 'cultural_advice' ? buildCulturalContext(session.profile) : undefined;
    const messages = this.composer.composeForSession(session, kind, text, context);
    const result = await this.call(messages);

    const topic = topicForKind(kind);
    if (result.ok && topic) {
      const history = session.history(topic);
      history.append({ role: 'user', content: text });
      history.append({ role: 'assistant', content: result.reply });
    }
    return result;
  }

  /**
   * Supportive reply to an anonymous post; no history involved
   */
  async supportPost(post: Post): Promise<AdvisorResult> {
    const messages = this.composer.compose('anonymous_sharing', post.content);
    return this.call(messages);
  }

  private async call(messages: ChatMessage[]): Promise<AdvisorResult> {
    try {
      const reply = await this.client.complete({
        model: this.settings.model,
        messages,
        temperature: this.settings.temperature,
        maxTokens: this.settings.maxTokens,
      });
      return { ok: true, reply, messages };
    } catch (error) {
      const boundaryError =
        error instanceof BoundaryError ? error : new BoundaryError(errorMessage(error), error);

      this.logger?.error(
        JSON.stringify(createErrorLog(new Date(), 1, this.settings.model, boundaryError.message))
      );

      return { ok: false, error: boundaryError, messages };
    }
  }
}
