/**
 * Client for OpenAI-compatible chat-completions endpoints (OpenRouter by default)
 */
import axios, { AxiosInstance } from 'axios';
import { ApiError, ConfigError, describeHttpFailure, LlmApiError, VlmApiError } from './errors';
import { isRecord } from '../models/ParseTypes';
import { logger } from './logger';

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string | ChatContentPart[];
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
}

export interface ChatCompletion {
  id: string;
  content: string;
}

/**
 * The part of an axios instance the clients call. Tests pass a stub.
 */
export type HttpPoster = Pick<AxiosInstance, 'post'>;

export interface ChatCompletionClientOptions {
  apiKey: string;
  baseUrl: string;
  timeout: number;
  /** Which error type failures surface as */
  service: 'llm' | 'vlm';
}

const COMPLETIONS_ENDPOINT = '/chat/completions';

export class ChatCompletionClient {
  private client: HttpPoster;
  private service: 'llm' | 'vlm';

  constructor(options: ChatCompletionClientOptions, http?: HttpPoster) {
    if (!options.apiKey) {
      throw new ConfigError(`An API key is required for the ${options.service.toUpperCase()} endpoint (LLM_API_KEY)`);
    }
    this.service = options.service;

    this.client =
      http ??
      axios.create({
        baseURL: options.baseUrl.replace(/\/+$/, ''),
        timeout: options.timeout,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${options.apiKey}`,
        },
      });
  }

  private apiError(message: string, status?: number, responseData?: unknown, networkCode?: string): ApiError {
    return this.service === 'vlm'
      ? new VlmApiError(message, COMPLETIONS_ENDPOINT, status, responseData, networkCode)
      : new LlmApiError(message, COMPLETIONS_ENDPOINT, status, responseData, networkCode);
  }

  /**
   * Send one chat-completions request and return the first choice's text
   */
  async complete(request: ChatCompletionRequest): Promise<ChatCompletion> {
    const startTime = Date.now();
    let data: unknown;

    try {
      const response = await this.client.post<unknown>(COMPLETIONS_ENDPOINT, {
        model: request.model,
        messages: request.messages,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      });
      data = response.data;
    } catch (error) {
      const failure = describeHttpFailure(error);
      throw this.apiError(failure.message, failure.status, failure.responseData, failure.networkCode);
    }

    logger.debug(`${this.service} chat completion finished in ${Date.now() - startTime}ms`, {
      model: request.model,
    });

    const content = extractContent(data);
    if (content === undefined) {
      throw this.apiError('Response carried no message content', undefined, data);
    }

    return {
      id: isRecord(data) && typeof data.id === 'string' ? data.id : '',
      content,
    };
  }
}

/**
 * `choices[0].message.content` of a completion payload
 */
export function extractContent(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) {
    return undefined;
  }
  const choices: unknown[] = data.choices;
  const first = choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return undefined;
  }
  const content = first.message.content;
  return typeof content === 'string' ? content : undefined;
}
