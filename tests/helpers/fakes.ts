import type {
  ChatCompletionRequest,
  IChatCompletionClient,
} from '../../src/core/interfaces/IChatCompletionClient.js';
import { BoundaryError } from '../../src/core/errors.js';
import type { Logger } from '../../src/utils/logger.js';

/**
 * In-process stand-in for the LLM endpoint. Replies are consumed in order;
 * an Error in the queue is thrown instead.
 */
export class FakeChatClient implements IChatCompletionClient {
  readonly requests: ChatCompletionRequest[] = [];
  healthy = true;
  private queue: Array<string | Error> = [];

  reply(...replies: Array<string | Error>): this {
    this.queue.push(...replies);
    return this;
  }

  async complete(request: ChatCompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (next === undefined) {
      return 'fake reply';
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

export function boundaryFailure(message = 'HTTP error! status: 503'): BoundaryError {
  return new BoundaryError(message);
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
