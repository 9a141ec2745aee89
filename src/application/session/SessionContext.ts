import { TOPICS } from '../../core/entities/Conversation.js';
import type { Topic } from '../../core/entities/Conversation.js';
import { DEFAULT_PROFILE } from '../../core/entities/Profile.js';
import type { UserProfile } from '../../core/entities/Profile.js';
import { ConversationHistory, DEFAULT_CONTEXT_WINDOW } from './ConversationHistory.js';

/**
 * Everything one user session owns: a history per topic and the
 * cultural-advice profile. Handed explicitly to every handler.
 */
export class SessionContext {
  readonly createdAt: Date;
  lastActivity: Date;
  profile: UserProfile = { ...DEFAULT_PROFILE };

  private histories = new Map<Topic, ConversationHistory>();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    readonly id: string,
    private readonly contextWindow: number = DEFAULT_CONTEXT_WINDOW,
    now: Date = new Date()
  ) {
    this.createdAt = now;
    this.lastActivity = now;
    for (const topic of TOPICS) {
      this.histories.set(topic, new ConversationHistory(this.contextWindow));
    }
  }

  history(topic: Topic): ConversationHistory {
    let history = this.histories.get(topic);
    if (!history) {
      history = new ConversationHistory(this.contextWindow);
      this.histories.set(topic, history);
    }
    return history;
  }

  clearHistory(topic: Topic): void {
    this.history(topic).clear();
  }

  touch(now: Date = new Date()): void {
    this.lastActivity = now;
  }

  /**
   * Run `handler` after every handler queued before it on this session has settled
   */
  run<T>(handler: (session: SessionContext) => T | Promise<T>): Promise<T> {
    const result = this.queue.then(() => {
      this.touch();
      return handler(this);
    });
    this.queue = result.catch(() => undefined);
    return result;
  }

  dispose(): void {
    for (const history of this.histories.values()) {
      history.clear();
    }
    this.profile = { ...DEFAULT_PROFILE };
  }
}
