/**
 * Custom error types for the application
 */
import axios from 'axios';

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    // Only capture stack trace if Error.captureStackTrace is available (Node.js)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error related to configuration
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

/**
 * Error related to API calls
 */
export class ApiError extends AppError {
  public status?: number;
  public service: string;
  public endpoint: string;
  public responseData?: unknown;
  /** Socket-level error code when no response arrived */
  public networkCode?: string;

  constructor(
    message: string,
    service: string,
    endpoint: string,
    status?: number,
    responseData?: unknown,
    networkCode?: string
  ) {
    super(`API Error (${service}/${endpoint}): ${message}`);
    this.status = status;
    this.service = service;
    this.endpoint = endpoint;
    this.responseData = responseData;
    this.networkCode = networkCode;
  }
}

/**
 * What an HTTP failure looked like, for building an ApiError
 */
export interface HttpFailure {
  message: string;
  status?: number;
  responseData?: unknown;
  networkCode?: string;
}

export function describeHttpFailure(error: unknown): HttpFailure {
  if (axios.isAxiosError(error)) {
    return {
      message: error.message,
      status: error.response?.status,
      responseData: error.response?.data,
      networkCode: error.response ? undefined : error.code,
    };
  }
  return { message: errorMessage(error) };
}

/**
 * TextIn answered, but its envelope carried a non-200 code
 */
export class TextInApiError extends ApiError {
  public code: number;

  constructor(code: number, message: string, endpoint: string, responseData?: unknown) {
    super(`[${code}] ${message}`, 'textin', endpoint, undefined, responseData);
    this.code = code;
  }
}

/**
 * Error from the chat-completions endpoint used for metadata extraction
 */
export class LlmApiError extends ApiError {
  constructor(message: string, endpoint: string, status?: number, responseData?: unknown, networkCode?: string) {
    super(message, 'llm', endpoint, status, responseData, networkCode);
  }
}

/**
 * Error from the vision model used for chart/table regions
 */
export class VlmApiError extends ApiError {
  constructor(message: string, endpoint: string, status?: number, responseData?: unknown, networkCode?: string) {
    super(message, 'vlm', endpoint, status, responseData, networkCode);
  }
}

/**
 * Document processing error for use in individual pipeline stages
 */
export class DocProcessingError extends AppError {
  public stage: string;
  public filePath?: string;

  constructor(message: string, stage: string, filePath?: string) {
    super(`Document Processing Error (${stage}): ${message}`);
    this.stage = stage;
    this.filePath = filePath;
  }
}

/**
 * Rendering or cropping a page region failed
 */
export class RegionExtractionError extends AppError {
  public filePath: string;
  public pageIndex?: number;

  constructor(message: string, filePath: string, pageIndex?: number) {
    super(`Region Extraction Error: ${message}`);
    this.filePath = filePath;
    this.pageIndex = pageIndex;
  }
}

/**
 * The extraction provider returned something unusable
 */
export class ExtractionError extends AppError {
  public provider: string;

  constructor(message: string, provider: string) {
    super(`Extraction Error (${provider}): ${message}`);
    this.provider = provider;
  }
}

/**
 * Error related to file operations
 */
export class FileError extends AppError {
  public filePath: string;
  public operation: string;

  constructor(message: string, operation: string, filePath: string) {
    super(`File Error (${operation}): ${message}`);
    this.operation = operation;
    this.filePath = filePath;
  }
}

/**
 * Error related to validation
 */
export class ValidationError extends AppError {
  public data?: unknown;

  constructor(message: string, data?: unknown) {
    super(`Validation Error: ${message}`);
    this.data = data;
  }
}

const RETRYABLE_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'ENETUNREACH', 'ECONNREFUSED']);

function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) {
    return false;
  }
  return status === 429 || (status >= 500 && status < 600);
}

/**
 * Returns a human-readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Determines if an error is retryable
 * @param error The error to check
 * @returns True if the error is retryable, false otherwise
 */
export function isRetryableError(error: unknown): boolean {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return isRetryableStatus(error.response.status);
    }
    // No response at all: network failure or timeout
    return error.code !== undefined && RETRYABLE_NETWORK_CODES.has(error.code);
  }

  // TextIn envelope errors are answers, not transport failures
  if (error instanceof TextInApiError) {
    return false;
  }

  if (error instanceof ApiError) {
    if (error.status === undefined && error.networkCode !== undefined) {
      return RETRYABLE_NETWORK_CODES.has(error.networkCode);
    }
    return isRetryableStatus(error.status);
  }

  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return RETRYABLE_NETWORK_CODES.has(error.code);
  }

  return false;
}

/** A filesystem error for a path that does not exist */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Implements exponential backoff for retrying operations
 * @param attempt Current attempt number (0-indexed)
 * @param baseDelayMs Base delay in milliseconds
 * @param maxDelayMs Maximum delay in milliseconds
 * @returns Delay time in milliseconds
 */
export function getRetryDelayMs(
  attempt: number,
  baseDelayMs = 500,
  maxDelayMs = 30000
): number {
  const exponentialDelay = Math.min(
    maxDelayMs,
    baseDelayMs * Math.pow(2, attempt)
  );

  // Add jitter (±12.5%)
  const jitter = exponentialDelay * 0.25 * (Math.random() - 0.5);

  return Math.min(maxDelayMs, Math.max(baseDelayMs, Math.floor(exponentialDelay + jitter)));
}

/**
 * Utility to retry a function with exponential backoff
 * @param fn Function to retry
 * @param maxRetries Maximum number of retries after the first attempt
 * @param baseDelayMs Base delay in milliseconds
 * @param maxDelayMs Maximum delay in milliseconds
 * @param onRetry Called before each wait
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries = 3,
  baseDelayMs = 500,
  maxDelayMs = 30000,
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
): Promise<T> {
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt < maxRetries && isRetryableError(error)) {
        const delay = getRetryDelayMs(attempt, baseDelayMs, maxDelayMs);
        onRetry?.(attempt + 1, error, delay);
        await new Promise(resolve => setTimeout(resolve, delay));
      } else {
        break;
      }
    }
  }

  throw lastError;
}

export default {
  AppError,
  ConfigError,
  ApiError,
  TextInApiError,
  LlmApiError,
  VlmApiError,
  DocProcessingError,
  RegionExtractionError,
  ExtractionError,
  FileError,
  ValidationError,
  errorMessage,
  describeHttpFailure,
  isRetryableError,
  isNotFoundError,
  getRetryDelayMs,
  withRetry,
};
