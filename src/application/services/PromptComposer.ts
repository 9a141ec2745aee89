import { topicForKind } from '../../core/entities/Conversation.js';
import type { Message, PromptKind } from '../../core/entities/Conversation.js';
import type { ISentimentScorer } from '../../core/interfaces/ISentimentScorer.js';
import { TemplateFactory } from '../../core/templates/index.js';
import type { ChatMessage } from '../../core/templates/index.js';
import type { SessionContext } from '../session/SessionContext.js';
import { DEFAULT_CONTEXT_WINDOW } from '../session/ConversationHistory.js';

/**
 * Builds the message list for one completion request:
 * persona, optional background, recent history, then the new question.
 */
export class PromptComposer {
  constructor(
    private scorer: ISentimentScorer,
    private contextWindow: number = DEFAULT_CONTEXT_WINDOW
  ) {}

  /**
   * @param history - prior messages of the kind's topic, oldest first; only the
   *   last `contextWindow` are used
   */
  compose(
    kind: PromptKind,
    userText: string,
    context?: string,
    history: readonly Message[] = []
  ): ChatMessage[] {
    const template = TemplateFactory.getTemplate(kind);
    const polarity = template.usesPolarity ? this.scorer.score(userText).polarity : undefined;

    const messages: ChatMessage[] = [
      { role: 'system', content: template.formatSystemPrompt({ userText, polarity }) },
    ];

    if (kind === 'cultural_advice' && context) {
      messages.push({ role: 'user', content: context });
    }

    if (topicForKind(kind) !== null && this.contextWindow > 0) {
      for (const msg of history.slice(-this.contextWindow)) {
        messages.push({ role: msg.role, content: msg.content });
      }
    }

    messages.push({ role: 'user', content: userText });
    return messages;
  }

  /**
   * Compose against the session's own history for the kind's topic
   */
  composeForSession(
    session: SessionContext,
    kind: PromptKind,
    userText: string,
    context?: string
  ): ChatMessage[] {
    const topic = topicForKind(kind);
    const history = topic ? session.history(topic).window(this.contextWindow) : [];
    return this.compose(kind, userText, context, history);
  }
}
