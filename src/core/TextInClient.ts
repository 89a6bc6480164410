/**
 * TextInClient.ts
 * Client for the TextIn ParseX (document to Markdown) and entity-extraction APIs.
 */
import axios, { AxiosRequestConfig } from 'axios';
import fs from 'fs-extra';
import path from 'path';
import { config, Config } from '../config';
import { ApiError, ConfigError, describeHttpFailure, TextInApiError, withRetry } from '../utils/errors';
import { HttpPoster } from '../utils/ChatCompletionClient';
import { emojiLogger } from '../utils/emojiLogger';
import { logger } from '../utils/logger';
import {
  isRecord,
  ParseResult,
  toDocumentElement,
  toPageInfo,
  toRecords,
} from '../models/ParseTypes';
import { EXTRACTION_FIELDS, ExtractionField } from '../prompts/extractionPrompt';

export const PARSEX_ENDPOINT = '/ai/service/v1/x_to_markdown';
export const EXTRACTION_ENDPOINT = '/ai/service/v2/entity_extraction';

export const DEFAULT_PARSEX_PARAMS: Readonly<Record<string, string>> = {
  pdf_parse_mode: 'auto',
  remove_watermark: '0',
  md_detail: '2',
  md_table_flavor: 'html',
  md_title: '1',
  pdf_dpi: '144',
  get_excel: '0',
};

export interface ParseOptions {
  parseMode?: string;
  getExcel?: boolean;
  mdDetail?: number;
}

export interface ExtractionResult {
  fields: Record<string, unknown>;
  requestId: string;
  durationMs: number;
  pageCount?: number;
  category?: Record<string, unknown>;
  model?: string;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

/**
 * Convert the `result` object of a ParseX response
 */
export function toParseResult(data: Record<string, unknown>): ParseResult {
  const detail = toRecords(data.detail).map(toDocumentElement);
  const excel = data.excel;

  return {
    markdown: stringOr(data.markdown, ''),
    detail,
    pages: toRecords(data.pages).map(toPageInfo),
    excelBase64: typeof excel === 'string' && excel ? excel : undefined,
    totalPageNumber: numberOr(data.total_page_number, 0),
    validPageNumber: numberOr(data.valid_page_number, 0),
    srcPageCount: numberOr(data.src_page_count, 0),
    durationMs: numberOr(data.duration, 0),
    requestId: stringOr(data.request_id, ''),
    hasChart: detail.some(
      el => el.type === 'image' && (el.sub_type === 'chart' || el.image_type === 'chart')
    ),
  };
}

/**
 * Convert the `result` object of an entity-extraction response. Each field
 * holds either a list of candidates (first wins) or a single `{value}`.
 */
export function toExtractionResult(data: Record<string, unknown>): ExtractionResult {
  const fields: Record<string, unknown> = {};
  if (isRecord(data.details)) {
    for (const [key, entries] of Object.entries(data.details)) {
      if (Array.isArray(entries) && entries.length > 0) {
        const first: unknown = entries[0];
        fields[key] = isRecord(first) ? first.value ?? '' : '';
      } else if (isRecord(entries)) {
        fields[key] = entries.value ?? '';
      }
    }
  }

  return {
    fields,
    requestId: stringOr(data.request_id, ''),
    durationMs: numberOr(data.duration, 0),
    pageCount: numberOr(data.page_count, 0),
    category: isRecord(data.category) ? data.category : undefined,
  };
}

export class TextInClient {
  private client: HttpPoster;
  private defaultParseMode: string;
  private maxRetries: number;
  private retryDelayMs: number;
  private maxRetryDelayMs: number;

  constructor(settings: Config = config, http?: HttpPoster) {
    const { appId, secretCode } = settings.textin;
    if (!appId || !secretCode) {
      throw new ConfigError('TextIn credentials are required (TEXTIN_APP_ID, TEXTIN_SECRET_CODE)');
    }

    this.defaultParseMode = settings.textin.parseMode;
    this.maxRetries = settings.processing.maxRetries;
    this.retryDelayMs = settings.processing.retryDelayMs;
    this.maxRetryDelayMs = settings.processing.maxRetryDelayMs;

    this.client =
      http ??
      axios.create({
        baseURL: settings.textin.baseUrl,
        timeout: settings.textin.timeout,
        headers: {
          'x-ti-app-id': appId,
          'x-ti-secret-code': secretCode,
        },
      });
  }

  /**
   * Query parameters sent to ParseX; also stored with each parse
   */
  getParseConfig(options: ParseOptions = {}): Record<string, string> {
    const { parseMode, getExcel = false, mdDetail = 2 } = options;
    return {
      ...DEFAULT_PARSEX_PARAMS,
      pdf_parse_mode: parseMode || this.defaultParseMode || DEFAULT_PARSEX_PARAMS.pdf_parse_mode,
      get_excel: getExcel ? '1' : '0',
      md_detail: String(mdDetail),
    };
  }

  /**
   * Convert a document to Markdown plus layout detail
   */
  async parseFile(filePath: string, options: ParseOptions = {}): Promise<ParseResult> {
    const params = this.getParseConfig(options);
    const bytes = await fs.readFile(filePath);

    emojiLogger.api(`ParseX ${path.basename(filePath)} (${bytes.length} bytes, mode=${params.pdf_parse_mode})`);

    const result = await this.post(PARSEX_ENDPOINT, bytes, {
      params,
      headers: { 'Content-Type': 'application/octet-stream' },
    });
    return toParseResult(result);
  }

  /**
   * Extract named fields straight from the document
   */
  async extractEntities(filePath: string, fields: ExtractionField[] = EXTRACTION_FIELDS): Promise<ExtractionResult> {
    const bytes = await fs.readFile(filePath);

    emojiLogger.api(`Entity extraction ${path.basename(filePath)} (${bytes.length} bytes, ${fields.length} fields)`);

    const result = await this.post(EXTRACTION_ENDPOINT, {
      file: bytes.toString('base64'),
      fields,
    });
    return toExtractionResult(result);
  }

  /**
   * POST with retries on 5xx and network failures, then unwrap the
   * `{code, message, result}` envelope
   */
  private async post(
    endpoint: string,
    body: unknown,
    requestConfig: AxiosRequestConfig = {}
  ): Promise<Record<string, unknown>> {
    const data = await withRetry(
      async () => {
        try {
          const response = await this.client.post<unknown>(endpoint, body, {
            maxBodyLength: Infinity,
            maxContentLength: Infinity,
            ...requestConfig,
          });
          return response.data;
        } catch (error) {
          const failure = describeHttpFailure(error);
          throw new ApiError(
            failure.message,
            'textin',
            endpoint,
            failure.status,
            failure.responseData,
            failure.networkCode
          );
        }
      },
      this.maxRetries,
      this.retryDelayMs,
      this.maxRetryDelayMs,
      (attempt, error, delayMs) =>
        logger.warn(`TextIn ${endpoint} failed, retry ${attempt}/${this.maxRetries} in ${delayMs}ms`, error)
    );

    if (!isRecord(data)) {
      throw new TextInApiError(0, 'Response body is not a JSON object', endpoint, data);
    }
    const code = numberOr(data.code, 0);
    if (code !== 200) {
      throw new TextInApiError(code, stringOr(data.message, 'Unknown TextIn error'), endpoint, data);
    }
    return isRecord(data.result) ? data.result : {};
  }
}

export default TextInClient;
