import { isMessageRole } from '../../core/entities/Conversation.js';
import type { Message } from '../../core/entities/Conversation.js';
import { IndexOutOfRangeError, ValidationError } from '../../core/errors.js';

export const DEFAULT_CONTEXT_WINDOW = 10;

/**
 * Ordered message log of one topic within one session.
 * Append-only apart from positional deletion and clear.
 */
export class ConversationHistory {
  private entries: Message[] = [];

  constructor(private readonly contextWindow: number = DEFAULT_CONTEXT_WINDOW) {}

  get length(): number {
    return this.entries.length;
  }

  append(message: Message): void {
    if (!isMessageRole(message?.role)) {
      throw new ValidationError(`Invalid message role: ${String(message?.role)}`, 'role');
    }
    if (typeof message.content !== 'string') {
      throw new ValidationError('Message content must be a string', 'content');
    }
    this.entries.push(Object.freeze({ role: message.role, content: message.content }));
  }

  /**
   * Remove the message at `index`; later messages move down one position
   */
  deleteAt(index: number): Message {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      throw new IndexOutOfRangeError(index, this.entries.length);
    }
    const [removed] = this.entries.splice(index, 1);
    return removed;
  }

  /**
   * The last `n` messages, oldest first
   */
  window(n: number = this.contextWindow): Message[] {
    const size = Math.floor(n);
    if (Number.isNaN(size) || size <= 0) {
      return [];
    }
    return this.entries.slice(-size);
  }

  messages(): Message[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}
