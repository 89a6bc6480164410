/**
 * ExtractionProvider.ts
 * Pulls report metadata out of a document, either from its Markdown through
 * a chat model or from the file itself through TextIn.
 */
import { config, Config, ExtractionProviderName } from '../config';
import { TextInClient, ExtractionResult } from './TextInClient';
import { ChatCompletionClient, HttpPoster } from '../utils/ChatCompletionClient';
import { ExtractionError, withRetry } from '../utils/errors';
import { isRecord } from '../models/ParseTypes';
import { logger } from '../utils/logger';
import {
  buildExtractionSystemPrompt,
  EXTRACTION_FIELDS,
  ExtractionField,
} from '../prompts/extractionPrompt';

export interface ExtractionInput {
  filePath?: string;
  markdown?: string;
  fields?: ExtractionField[];
}

export interface ExtractionProvider {
  readonly name: ExtractionProviderName;
  /** Model name, when the provider is model-backed */
  readonly model?: string;
  extract(input: ExtractionInput): Promise<ExtractionResult>;
}

/**
 * Parse a model's JSON answer, tolerating code fences and surrounding prose
 */
export function parseJsonObject(response: string): Record<string, unknown> | undefined {
  let text = response.trim();

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    text = fenced[1].trim();
  }

  const attempt = (candidate: string): Record<string, unknown> | undefined => {
    try {
      const parsed: unknown = JSON.parse(candidate);
      return isRecord(parsed) ? parsed : undefined;
    } catch {
      return undefined;
    }
  };

  const direct = attempt(text);
  if (direct) {
    return direct;
  }

  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first >= 0 && last > first) {
    return attempt(text.slice(first, last + 1));
  }
  return undefined;
}

export class TextInExtractionProvider implements ExtractionProvider {
  readonly name = 'textin';

  constructor(private readonly client: TextInClient) {}

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    if (!input.filePath) {
      throw new ExtractionError('A file path is required', this.name);
    }
    return this.client.extractEntities(input.filePath, input.fields ?? EXTRACTION_FIELDS);
  }
}

export class LlmExtractionProvider implements ExtractionProvider {
  readonly name = 'llm';
  readonly model: string;
  private client: ChatCompletionClient;
  private settings: Config;

  constructor(settings: Config = config, http?: HttpPoster) {
    this.settings = settings;
    this.model = settings.llm.model;
    this.client = new ChatCompletionClient(
      {
        apiKey: settings.llm.apiKey,
        baseUrl: settings.llm.baseUrl,
        timeout: settings.llm.timeout,
        service: 'llm',
      },
      http
    );
  }

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    if (!input.markdown) {
      throw new ExtractionError('Markdown content is required', this.name);
    }

    const { llm, processing } = this.settings;
    const content = input.markdown.slice(0, llm.contextChars);
    const startTime = Date.now();

    const completion = await withRetry(
      () =>
        this.client.complete({
          model: this.model,
          messages: [
            { role: 'system', content: buildExtractionSystemPrompt(input.fields ?? EXTRACTION_FIELDS) },
            { role: 'user', content },
          ],
          maxTokens: llm.maxTokens,
          temperature: llm.temperature,
        }),
      processing.maxRetries,
      processing.retryDelayMs,
      processing.maxRetryDelayMs,
      (attempt, error, delayMs) =>
        logger.warn(`Metadata extraction failed, retry ${attempt}/${processing.maxRetries} in ${delayMs}ms`, error)
    );

    const fields = parseJsonObject(completion.content);
    if (!fields) {
      throw new ExtractionError(`Model reply is not a JSON object: ${completion.content.slice(0, 200)}`, this.name);
    }

    return {
      fields,
      requestId: completion.id,
      durationMs: Date.now() - startTime,
      model: this.model,
    };
  }
}

/**
 * Provider selected by `extraction.provider`
 */
export function createExtractionProvider(settings: Config = config, textin?: TextInClient): ExtractionProvider {
  if (settings.extraction.provider === 'textin') {
    return new TextInExtractionProvider(textin ?? new TextInClient(settings));
  }
  return new LlmExtractionProvider(settings);
}
