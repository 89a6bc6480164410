import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs-extra';
import { ConfigError } from '../utils/errors';
import { findLogLevel, LOG_LEVELS, LogLevel } from '../utils/logger';

// Load environment variables from .env file
dotenv.config();

export type ExtractionProviderName = 'llm' | 'textin';

/**
 * Configuration for the application
 */
export interface Config {
  // TextIn ParseX / entity extraction
  textin: {
    appId: string;
    secretCode: string;
    baseUrl: string;
    parseMode: string;
    maxConcurrent: number;
    timeout: number;
  };

  // OpenAI-compatible chat completions, used for metadata extraction
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
    maxTokens: number;
    temperature: number;
    contextChars: number;
    timeout: number;
  };

  // Vision model for chart/table regions. An empty model disables enhancement.
  vlm: {
    model: string;
    maxTokens: number;
    renderScale: number;
    timeout: number;
  };

  extraction: {
    provider: ExtractionProviderName;
  };

  processing: {
    maxRetries: number;
    retryDelayMs: number;
    maxRetryDelayMs: number;
  };

  paths: {
    dataDir: string;
    parsedDir: string;
    extractionDir: string;
  };

  dates: {
    timezone: string;
  };

  logging: {
    level: LogLevel;
  };
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Config = {
  textin: {
    appId: '',
    secretCode: '',
    baseUrl: 'https://api.textin.com',
    parseMode: 'auto',
    maxConcurrent: 3,
    timeout: 300000, // 5 minutes
  },
  llm: {
    apiKey: '',
    baseUrl: 'https://openrouter.ai/api/v1',
    model: 'openai/gpt-4o-mini',
    maxTokens: 1024,
    temperature: 0,
    contextChars: 4000,
    timeout: 120000, // 2 minutes
  },
  vlm: {
    model: '',
    maxTokens: 300,
    renderScale: 2,
    timeout: 120000,
  },
  extraction: {
    provider: 'llm',
  },
  processing: {
    maxRetries: 2,
    retryDelayMs: 4000,
    maxRetryDelayMs: 16000,
  },
  paths: {
    dataDir: path.join(process.cwd(), 'data'),
    parsedDir: path.join(process.cwd(), 'data', 'parsed'),
    extractionDir: path.join(process.cwd(), 'data', 'extraction'),
  },
  dates: {
    timezone: 'UTC',
  },
  logging: {
    level: 'info',
  },
};

function parseNumber(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (!raw) {
    return DEFAULT_CONFIG.logging.level;
  }
  const level = findLogLevel(raw);
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

function parseProvider(raw: string | undefined): ExtractionProviderName {
  if (!raw) {
    return DEFAULT_CONFIG.extraction.provider;
  }
  const value = raw.toLowerCase();
  if (value !== 'llm' && value !== 'textin') {
    throw new ConfigError(`EXTRACTION_PROVIDER must be "llm" or "textin", got "${raw}"`);
  }
  return value;
}

/**
 * Load configuration from environment variables and merge with defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const dataDir = env.DATA_DIR ? path.resolve(env.DATA_DIR) : DEFAULT_CONFIG.paths.dataDir;

  return {
    textin: {
      appId: env.TEXTIN_APP_ID || DEFAULT_CONFIG.textin.appId,
      secretCode: env.TEXTIN_SECRET_CODE || DEFAULT_CONFIG.textin.secretCode,
      baseUrl: env.TEXTIN_BASE_URL || DEFAULT_CONFIG.textin.baseUrl,
      parseMode: env.TEXTIN_PARSE_MODE || DEFAULT_CONFIG.textin.parseMode,
      maxConcurrent: parseNumber('TEXTIN_MAX_CONCURRENT', env.TEXTIN_MAX_CONCURRENT, DEFAULT_CONFIG.textin.maxConcurrent),
      timeout: parseNumber('TEXTIN_TIMEOUT', env.TEXTIN_TIMEOUT, DEFAULT_CONFIG.textin.timeout),
    },
    llm: {
      apiKey: env.LLM_API_KEY || DEFAULT_CONFIG.llm.apiKey,
      baseUrl: env.LLM_BASE_URL || DEFAULT_CONFIG.llm.baseUrl,
      model: env.LLM_MODEL || DEFAULT_CONFIG.llm.model,
      maxTokens: parseNumber('LLM_MAX_TOKENS', env.LLM_MAX_TOKENS, DEFAULT_CONFIG.llm.maxTokens),
      temperature: parseNumber('LLM_TEMPERATURE', env.LLM_TEMPERATURE, DEFAULT_CONFIG.llm.temperature),
      contextChars: parseNumber('LLM_CONTEXT_CHARS', env.LLM_CONTEXT_CHARS, DEFAULT_CONFIG.llm.contextChars),
      timeout: parseNumber('LLM_TIMEOUT', env.LLM_TIMEOUT, DEFAULT_CONFIG.llm.timeout),
    },
    vlm: {
      model: env.VLM_MODEL || DEFAULT_CONFIG.vlm.model,
      maxTokens: parseNumber('VLM_MAX_TOKENS', env.VLM_MAX_TOKENS, DEFAULT_CONFIG.vlm.maxTokens),
      renderScale: parseNumber('VLM_RENDER_SCALE', env.VLM_RENDER_SCALE, DEFAULT_CONFIG.vlm.renderScale),
      timeout: parseNumber('VLM_TIMEOUT', env.VLM_TIMEOUT, DEFAULT_CONFIG.vlm.timeout),
    },
    extraction: {
      provider: parseProvider(env.EXTRACTION_PROVIDER),
    },
    processing: {
      maxRetries: parseNumber('MAX_RETRIES', env.MAX_RETRIES, DEFAULT_CONFIG.processing.maxRetries),
      retryDelayMs: parseNumber('RETRY_DELAY_MS', env.RETRY_DELAY_MS, DEFAULT_CONFIG.processing.retryDelayMs),
      maxRetryDelayMs: parseNumber('MAX_RETRY_DELAY_MS', env.MAX_RETRY_DELAY_MS, DEFAULT_CONFIG.processing.maxRetryDelayMs),
    },
    paths: {
      dataDir,
      parsedDir: path.join(dataDir, 'parsed'),
      extractionDir: path.join(dataDir, 'extraction'),
    },
    dates: {
      timezone: env.DATE_TIMEZONE || DEFAULT_CONFIG.dates.timezone,
    },
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
    },
  };
}

/**
 * Create the data directories the pipeline writes into
 */
export async function ensureDataDirs(settings: Config): Promise<void> {
  await fs.ensureDir(settings.paths.parsedDir);
  await fs.ensureDir(settings.paths.extractionDir);
}

// Export default config instance
export const config = loadConfig();

export default config;
