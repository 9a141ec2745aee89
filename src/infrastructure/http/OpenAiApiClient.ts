import fetch from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import type {
  ChatCompletionRequest,
  IChatCompletionClient,
} from '../../core/interfaces/IChatCompletionClient.js';
import { BoundaryError, errorMessage } from '../../core/errors.js';
import {
  withRetry,
  isRetryableError,
  CircuitBreaker,
  DEFAULT_RETRY_CONFIG,
} from '../../utils/retry.js';
import type { RetryConfig, RetryLog } from '../../utils/retry.js';

const ChatCompletionBodySchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.unknown() }).optional() })).optional(),
  error: z.object({ message: z.string().optional() }).optional(),
});

type ChatCompletionBody = z.infer<typeof ChatCompletionBodySchema>;

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.unknown() })).optional(),
});

type ModelList = z.infer<typeof ModelListSchema>;

// Unreadable JSON counts as an empty body
function readJson(res: Response): Promise<unknown> {
  return res.json().catch(() => ({}));
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface OpenAiApiClientOptions {
  apiUrl: string;
  apiKey: string;
  circuitBreaker?: CircuitBreaker;
  retryConfig?: RetryConfig;
  onRetryLog?: (log: RetryLog) => void;
  fetchImpl?: FetchLike;
}

/**
 * Client for an OpenAI-compatible chat completions endpoint.
 * Every failure surfaces as BoundaryError.
 */
export class OpenAiApiClient implements IChatCompletionClient {
  private apiUrl: string;
  private apiKey: string;
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;
  private onRetryLog?: (log: RetryLog) => void;
  private fetchImpl: FetchLike;

  constructor(options: OpenAiApiClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.circuitBreaker = options.circuitBreaker || new CircuitBreaker();
    this.retryConfig = options.retryConfig || DEFAULT_RETRY_CONFIG;
    this.onRetryLog = options.onRetryLog;
    this.fetchImpl = options.fetchImpl || fetch;
  }

  async complete(request: ChatCompletionRequest): Promise<string> {
    if (!this.apiKey) {
      throw new BoundaryError('OPENAI_API_KEY is not configured');
    }

    let body: ChatCompletionBody;
    try {
      body = await this.circuitBreaker.execute(() =>
        withRetry(
          async () => {
            const res = await this.fetchImpl(`${this.apiUrl}/chat/completions`, {
              method: 'POST',
              headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${this.apiKey}`,
              },
              body: JSON.stringify({
                model: request.model,
                messages: request.messages,
                temperature: request.temperature,
                max_tokens: request.maxTokens,
              }),
            });

            const parsed = ChatCompletionBodySchema.safeParse(await readJson(res));
            const data: ChatCompletionBody = parsed.success ? parsed.data : {};

            if (!res.ok) {
              const detail = data.error?.message ? ` - ${data.error.message}` : '';
              throw new Error(`HTTP error! status: ${res.status}${detail}`);
            }

            return data;
          },
          this.retryConfig,
          this.onRetryLog,
          isRetryableError
        )
      );
    } catch (error) {
      throw new BoundaryError(errorMessage(error), error);
    }

    const content = body.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new BoundaryError('Malformed completion response: missing choices[0].message.content');
    }
    return content;
  }

  async listModels(): Promise<string[]> {
    const res = await this.fetchImpl(`${this.apiUrl}/models`, {
      method: 'GET',
      headers: { Authorization: `Bearer ${this.apiKey}` },
    });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);

    const parsed = ModelListSchema.safeParse(await readJson(res));
    const data: ModelList = parsed.success ? parsed.data : {};
    return (data.data ?? [])
      .map((model) => model.id)
      .filter((id): id is string => typeof id === 'string');
  }

  async healthCheck(): Promise<boolean> {
    if (!this.apiKey) {
      return false;
    }
    try {
      await this.listModels();
      return true;
    } catch {
      return false;
    }
  }

  getCircuitBreakerState() {
    return this.circuitBreaker.getState();
  }
}
