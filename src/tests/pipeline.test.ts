/**
 * Tests for the ProcessingPipeline
 */
import path from 'path';
import fs from 'fs-extra';
import { ProcessingPipeline } from '../pipeline/ProcessingPipeline';
import { RegionEnhancer } from '../core/RegionEnhancer';
import { TextInClient } from '../core/TextInClient';
import { Config } from '../config';
import { DocProcessingError, FileError, ValidationError } from '../utils/errors';
import { readResult, resultExists } from '../utils/resultStore';
import {
  fakeExtractionProvider,
  fakeRenderer,
  fakeSummarizer,
  makeTempDir,
  testSettings,
  textinResponse,
} from './fixtures';

const CHART_HTML = '<table><tr><td>fake</td></tr></table>';

function parseResult(markdown: string, detail: unknown[] = []) {
  return textinResponse({
    markdown,
    detail,
    pages: [{ page_id: 1, width: 612, height: 792 }],
    total_page_number: 2,
    valid_page_number: 2,
    src_page_count: 2,
    duration: 800,
    request_id: 'parse-1',
  });
}

const METADATA = { title: 'Weekly', broker: 'Test Securities', publish_date: '2024-01-15' };

describe('ProcessingPipeline', () => {
  let root: string;
  let dataDir: string;
  let reportPath: string;
  let settings: Config;
  let post: jest.Mock;

  beforeEach(async () => {
    root = await makeTempDir();
    dataDir = path.join(root, 'data');
    reportPath = path.join(root, 'report.pdf');
    await fs.writeFile(reportPath, 'fake pdf');
    settings = testSettings(dataDir);
    post = jest.fn().mockResolvedValue(parseResult('# Weekly\n关注macroamy\nBody\n'));
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  function buildPipeline(
    fields: Record<string, unknown> = METADATA,
    extra: { settings?: Config; enhancer?: RegionEnhancer } = {}
  ) {
    const { provider, extract } = fakeExtractionProvider(fields);
    const pipelineSettings = extra.settings ?? settings;
    const pipeline = new ProcessingPipeline(pipelineSettings, {
      textin: new TextInClient(pipelineSettings, { post }),
      extractionProvider: provider,
      enhancer: extra.enhancer,
    });
    return { pipeline, extract };
  }

  test('parses, strips watermarks, stores artifacts and records metadata', async () => {
    const { pipeline, extract } = buildPipeline();

    const record = await pipeline.processFile(reportPath);

    expect(record).not.toBeNull();
    if (!record) return;
    expect(record.sha256).toMatch(/^[0-9a-f]{64}$/);
    expect(record.fileName).toBe('report.pdf');
    expect(record.source).toBe('local');
    expect(record.mimeType).toBe('application/pdf');
    expect(record.fileSizeBytes).toBe(8);
    expect(record.title).toBe('Weekly');
    expect(record.broker).toBe('Test Securities');
    expect(record.publishDate).toBe(1705276800);
    expect(record.extraction).toMatchObject({ status: 'completed', provider: 'llm', model: 'test-model' });
    expect(record.parse).toMatchObject({ requestId: 'parse-1', pageCount: 2, chartCount: 0, tableCount: 0 });
    expect(record.parse.parseConfig.pdf_parse_mode).toBe('auto');

    expect(extract).toHaveBeenCalledWith({ filePath: reportPath, markdown: '# Weekly\nBody\n' });
    const stored = path.join(settings.paths.parsedDir, record.parse.markdownPath);
    expect(await fs.readFile(stored, 'utf8')).toBe('# Weekly\nBody\n');
    const raw = path.join(settings.paths.parsedDir, record.parse.rawMarkdownPath);
    expect(await fs.readFile(raw, 'utf8')).toBe('# Weekly\n关注macroamy\nBody\n');
    expect(await readResult(settings.paths.extractionDir, record.sha256)).toEqual(record);
  });

  test('skips a file that already has a result unless forced', async () => {
    const { pipeline } = buildPipeline();

    const first = await pipeline.processFile(reportPath);
    expect(await pipeline.processFile(reportPath)).toBeNull();
    expect(post).toHaveBeenCalledTimes(1);

    const forced = await pipeline.processFile(reportPath, { force: true, parseMode: 'scan' });
    expect(forced?.sha256).toBe(first?.sha256);
    expect(post).toHaveBeenCalledTimes(2);
    expect(post.mock.calls[1][2].params.pdf_parse_mode).toBe('scan');
    expect(forced?.parse.parseConfig.pdf_parse_mode).toBe('scan');
  });

  test('a failed extraction is recorded without failing the document', async () => {
    const { pipeline, extract } = buildPipeline();
    extract.mockRejectedValueOnce(new Error('model offline'));

    const record = await pipeline.processFile(reportPath);

    expect(record?.extraction).toMatchObject({ status: 'failed', provider: 'llm', errorMessage: 'model offline' });
    expect(record?.title).toBeUndefined();
    expect(record?.publishDate).toBeNull();
    expect(record && (await resultExists(settings.paths.extractionDir, record.sha256))).toBe(true);
  });

  test('a parse failure is a DocProcessingError and writes nothing', async () => {
    post.mockResolvedValue({ data: { code: 40003, message: 'quota exceeded' } });
    const { pipeline } = buildPipeline();

    await expect(pipeline.processFile(reportPath)).rejects.toBeInstanceOf(DocProcessingError);
    expect(await fs.readdir(settings.paths.extractionDir)).toEqual([]);
  });

  test('missing and unsupported files are rejected', async () => {
    const { pipeline } = buildPipeline();
    const notes = path.join(root, 'notes.txt');
    await fs.writeFile(notes, 'hello');

    await expect(pipeline.processFile(path.join(root, 'missing.pdf'))).rejects.toBeInstanceOf(FileError);
    await expect(pipeline.processFile(notes)).rejects.toBeInstanceOf(ValidationError);
  });

  describe('enhancement', () => {
    test('charts are replaced when a vision model is configured', async () => {
      post.mockResolvedValue(
        parseResult(`Intro\n${CHART_HTML}\n`, [
          { type: 'image', sub_type: 'chart', text: CHART_HTML, page_id: 1, position: [10, 10, 100, 100] },
        ])
      );
      const { renderer } = fakeRenderer();
      const { summarizer } = fakeSummarizer('Revenue rose.');
      const enhancer = new RegionEnhancer(summarizer, { renderer });
      const { pipeline } = buildPipeline(METADATA, {
        settings: testSettings(dataDir, { VLM_MODEL: 'test-vlm' }),
        enhancer,
      });

      const record = await pipeline.processFile(reportPath);

      expect(record?.parse).toMatchObject({ chartCount: 1, tableCount: 0, hasChart: true });
      const stored = path.join(dataDir, 'parsed', record?.parse.markdownPath ?? '');
      expect(await fs.readFile(stored, 'utf8')).toBe('Intro\n[Chart Summary] Revenue rose.\n');
    });

    test('no enhancement without a vision model', async () => {
      const enhancer = new RegionEnhancer(fakeSummarizer().summarizer, { renderer: fakeRenderer().renderer });
      const enhance = jest.spyOn(enhancer, 'enhance');
      const { pipeline } = buildPipeline(METADATA, { enhancer });

      await pipeline.processFile(reportPath);

      expect(enhance).not.toHaveBeenCalled();
    });

    test('an enhancer failure falls back to the parsed markdown', async () => {
      const enhancer = new RegionEnhancer(fakeSummarizer().summarizer, { renderer: fakeRenderer().renderer });
      jest.spyOn(enhancer, 'enhance').mockRejectedValue(new Error('renderer down'));
      const { pipeline } = buildPipeline(METADATA, {
        settings: testSettings(dataDir, { VLM_MODEL: 'test-vlm' }),
        enhancer,
      });

      const record = await pipeline.processFile(reportPath);

      expect(record?.parse.chartCount).toBe(0);
      const stored = path.join(dataDir, 'parsed', record?.parse.markdownPath ?? '');
      expect(await fs.readFile(stored, 'utf8')).toBe('# Weekly\nBody\n');
    });
  });

  test('processDirectory handles every supported file', async () => {
    const inbox = path.join(root, 'inbox');
    await fs.ensureDir(path.join(inbox, 'sub'));
    await fs.writeFile(path.join(inbox, 'a.pdf'), 'first');
    await fs.writeFile(path.join(inbox, 'sub', 'b.png'), 'second');
    await fs.writeFile(path.join(inbox, 'notes.txt'), 'ignored');
    const { pipeline } = buildPipeline();

    const { outcomes, stats } = await pipeline.processDirectory(inbox);

    expect(outcomes.map(o => path.relative(inbox, o.filePath))).toEqual(['a.pdf', path.join('sub', 'b.png')]);
    expect(outcomes.every(o => o.success)).toBe(true);
    expect(stats).toMatchObject({ totalItems: 2, successfulItems: 2, failedItems: 0 });
  });

  test('processPath reports a single file failure as an outcome', async () => {
    post.mockResolvedValue({ data: { code: 40003, message: 'quota exceeded' } });
    const { pipeline } = buildPipeline();

    const { outcomes, stats } = await pipeline.processPath(reportPath);

    expect(outcomes[0].success).toBe(false);
    expect(outcomes[0].error).toBeInstanceOf(DocProcessingError);
    expect(stats.failedItems).toBe(1);
    await expect(pipeline.processPath(path.join(root, 'nowhere'))).rejects.toBeInstanceOf(FileError);
  });

  test('processPath only reports a missing path as not existing', async () => {
    const { pipeline } = buildPipeline();
    const underAFile = path.join(reportPath, 'inner.pdf');

    const failure = await pipeline.processPath(underAFile).catch((error: unknown) => error);

    expect(failure).not.toBeInstanceOf(FileError);
    expect(failure).toMatchObject({ code: 'ENOTDIR' });
  });

  describe('reExtract', () => {
    test('updates the metadata from the stored markdown', async () => {
      const { pipeline, extract } = buildPipeline();
      const record = await pipeline.processFile(reportPath);
      const sha = record?.sha256 ?? '';
      extract.mockResolvedValueOnce({ fields: { title: 'Revised' }, requestId: 'extract-2', durationMs: 3 });

      const updated = await pipeline.reExtract(sha.slice(0, 8), { force: true });

      expect(updated?.title).toBe('Revised');
      expect(updated?.extraction?.requestId).toBe('extract-2');
      expect(extract).toHaveBeenLastCalledWith({ filePath: reportPath, markdown: '# Weekly\nBody\n' });
      expect((await readResult(settings.paths.extractionDir, sha)).title).toBe('Revised');
    });

    test('a failed attempt keeps the previous metadata', async () => {
      const { pipeline, extract } = buildPipeline();
      const record = await pipeline.processFile(reportPath);
      extract.mockRejectedValueOnce(new Error('model offline'));

      const updated = await pipeline.reExtract(record?.sha256 ?? '', { force: true });

      expect(updated?.title).toBe('Weekly');
      expect(updated?.extraction?.status).toBe('failed');
    });

    test('a completed extraction is skipped unless forced', async () => {
      const { pipeline, extract } = buildPipeline();
      const record = await pipeline.processFile(reportPath);
      const sha = record?.sha256 ?? '';

      expect(await pipeline.reExtract(sha)).toBeNull();
      expect(extract).toHaveBeenCalledTimes(1);
      expect(await readResult(settings.paths.extractionDir, sha)).toEqual(record);
    });

    test('a failed extraction is retried without forcing', async () => {
      const { pipeline, extract } = buildPipeline();
      extract.mockRejectedValueOnce(new Error('model offline'));
      const record = await pipeline.processFile(reportPath);

      const updated = await pipeline.reExtract(record?.sha256 ?? '');

      expect(extract).toHaveBeenCalledTimes(2);
      expect(updated?.extraction?.status).toBe('completed');
      expect(updated?.title).toBe('Weekly');
    });

    test('an unknown prefix is a ValidationError', async () => {
      const { pipeline } = buildPipeline();
      await expect(pipeline.reExtract('ffff')).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
