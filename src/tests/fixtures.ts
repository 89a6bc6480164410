/**
 * Shared test doubles and settings
 */
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { Config, loadConfig } from '../config';
import { Rect } from '../core/CoordinateMapper';
import { PageRenderer, RenderableDocument } from '../core/PageRenderer';
import { RegionSummarizer } from '../core/VisionSummarizer';
import { ExtractionProvider, ExtractionInput } from '../core/ExtractionProvider';
import { ExtractionResult } from '../core/TextInClient';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'rdp-test-'));
}

/**
 * Settings with placeholder credentials and millisecond retry delays
 */
export function testSettings(dataDir: string, env: NodeJS.ProcessEnv = {}): Config {
  return loadConfig({
    DATA_DIR: dataDir,
    TEXTIN_APP_ID: 'test-app',
    TEXTIN_SECRET_CODE: 'test-secret',
    LLM_API_KEY: 'test-secret',
    RETRY_DELAY_MS: '1',
    MAX_RETRY_DELAY_MS: '2',
    ...env,
  });
}

/**
 * Axios-shaped response wrapping a TextIn envelope
 */
export function textinResponse(result: Record<string, unknown>) {
  return { data: { code: 200, message: 'success', result } };
}

export function chatResponse(content: string, id = 'cmpl-test') {
  return { data: { id, choices: [{ message: { role: 'assistant', content } }] } };
}

export const LETTER_PAGE: Rect = { x0: 0, y0: 0, x1: 612, y1: 792 };

/**
 * Renderer whose every page is US Letter and whose renders are a fixed buffer
 */
export function fakeRenderer(pageCount = 5) {
  const renderRegion = jest.fn(async (_pageIndex: number, _clip: Rect, _scale: number) => Buffer.from('png-bytes'));
  const close = jest.fn(async () => undefined);
  const document: RenderableDocument = {
    pageCount,
    pageRect: () => ({ ...LETTER_PAGE }),
    renderRegion,
    close,
  };
  const open = jest.fn(async (_documentPath: string) => document);
  const renderer: PageRenderer = { open };
  return { renderer, open, renderRegion, close };
}

export function fakeSummarizer(chartSummary = 'S', tableMarkdown = '| A | B |\n| --- | --- |\n| 1 | 2 |') {
  const summarizeChart = jest.fn(async (_image: Buffer, _contextText?: string) => chartSummary);
  const summarizeTable = jest.fn(async (_image: Buffer, _contextText?: string) => tableMarkdown);
  const summarizer: RegionSummarizer = { summarizeChart, summarizeTable };
  return { summarizer, summarizeChart, summarizeTable };
}

export function fakeExtractionProvider(fields: Record<string, unknown>) {
  const extract = jest.fn(
    async (_input: ExtractionInput): Promise<ExtractionResult> => ({
      fields,
      requestId: 'extract-1',
      durationMs: 5,
      model: 'test-model',
    })
  );
  const provider: ExtractionProvider = { name: 'llm', model: 'test-model', extract };
  return { provider, extract };
}
