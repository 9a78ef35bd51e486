import axios, { AxiosInstance, isAxiosError } from 'axios';
import { jsonrepair } from 'jsonrepair';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { ExtractionError, errorMessage } from '../core/errors';
import { withTimeout } from '../utils/timeout';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface LLMOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

interface ChatCompletionResponse {
  model?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

class RateLimiter {
  private queue: Array<() => Promise<void>> = [];
  private processing = false;
  private minDelay: number;
  private lastRequestTime = 0;

  constructor(requestsPerMinute: number = 50) {
    this.minDelay = 60000 / requestsPerMinute;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await fn());
        } catch (error) {
          reject(error);
        }
      });

      if (!this.processing) {
        void this.processQueue();
      }
    });
  }

  private async processQueue(): Promise<void> {
    this.processing = true;

    while (this.queue.length > 0) {
      const timeSinceLastRequest = Date.now() - this.lastRequestTime;

      if (timeSinceLastRequest < this.minDelay) {
        await new Promise(resolve => setTimeout(resolve, this.minDelay - timeSinceLastRequest));
      }

      const task = this.queue.shift();
      if (task) {
        this.lastRequestTime = Date.now();
        await task();
      }
    }

    this.processing = false;
  }
}

export class LLMService {
  private client: AxiosInstance;
  private rateLimiter: RateLimiter;

  constructor() {
    this.client = axios.create({
      baseURL: config.llm.baseUrl,
      headers: {
        Authorization: `Bearer ${config.llm.apiKey}`,
        'X-Title': 'Form Pilot',
        'Content-Type': 'application/json',
      },
      timeout: config.extraction.timeout,
    });

    this.rateLimiter = new RateLimiter(config.llm.requestsPerMinute);
  }

  async chat(messages: LLMMessage[], options: LLMOptions = {}): Promise<LLMResponse> {
    const {
      model = config.models.extraction,
      temperature = 0.1,
      maxTokens = 500,
      timeoutMs = config.extraction.timeout,
    } = options;

    if (messages.length === 0) {
      throw new ExtractionError('LLMService: at least one message is required');
    }

    return this.rateLimiter.execute(async () => {
      try {
        logger.debug('LLM Request', { model, messageCount: messages.length });

        const response = await withTimeout(
          this.client.post<ChatCompletionResponse>('/chat/completions', {
            model,
            messages,
            temperature,
            max_tokens: maxTokens,
          }),
          timeoutMs,
          `LLM request timeout for ${model}`
        );

        const content = response.data.choices?.[0]?.message?.content || '';
        const usage = response.data.usage;

        logger.debug('LLM Response', {
          model,
          contentLength: content.length,
          tokens: usage?.total_tokens,
        });

        return {
          content,
          model: response.data.model || model,
          usage: usage
            ? {
                promptTokens: usage.prompt_tokens,
                completionTokens: usage.completion_tokens,
                totalTokens: usage.total_tokens,
              }
            : undefined,
        };
      } catch (error) {
        const responseData = isAxiosError(error) ? error.response?.data : undefined;
        logger.error('LLM Error', { error: errorMessage(error), response: responseData });

        throw new ExtractionError(`LLM request failed: ${errorMessage(error)}`, {
          originalError: responseData ?? errorMessage(error),
        });
      }
    });
  }

  /**
   * Chat completion whose answer must be a JSON object. Prose around the
   * object and minor syntax damage are tolerated.
   */
  async chatWithJSON(messages: LLMMessage[], options: LLMOptions = {}): Promise<unknown> {
    const { content } = await this.chat(messages, options);
    return parseJSONContent(content);
  }
}

export function parseJSONContent(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (e) {
    const firstBracket = content.indexOf('{');
    const lastBracket = content.lastIndexOf('}');

    if (firstBracket === -1 || lastBracket === -1 || firstBracket >= lastBracket) {
      throw new ExtractionError('No valid JSON structure found in LLM response', {
        preview: content.slice(0, 200),
      });
    }

    try {
      return JSON.parse(jsonrepair(content.substring(firstBracket, lastBracket + 1)));
    } catch (repairError) {
      throw new ExtractionError(`JSON failure: ${errorMessage(e)}`, {
        repairError: errorMessage(repairError),
      });
    }
  }
}

export const llmService = new LLMService();
