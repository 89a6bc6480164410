/**
 * ProcessingPipeline.ts
 * Parse -> enhance -> strip watermarks -> store -> extract, for local files.
 */
import fs from 'fs-extra';
import path from 'path';
import { config, Config, ensureDataDirs } from '../config';
import { TextInClient } from '../core/TextInClient';
import { RegionEnhancer } from '../core/RegionEnhancer';
import { VisionSummarizer } from '../core/VisionSummarizer';
import { stripWatermarks } from '../core/WatermarkFilter';
import { createExtractionProvider, ExtractionProvider } from '../core/ExtractionProvider';
import { toExtractedMetadata } from '../models/ExtractedMetadata';
import { ParseResult } from '../models/ParseTypes';
import { BatchProcessor, BatchProcessStats } from '../utils/batchProcessor';
import { parseDateToEpoch } from '../utils/dateUtils';
import { emojiLogger } from '../utils/emojiLogger';
import { DocProcessingError, errorMessage, FileError, isNotFoundError, ValidationError } from '../utils/errors';
import { FileType, getFileType, getMimeType, listSupportedFiles, sha256File } from '../utils/fileUtils';
import {
  DocumentRecord,
  ExtractionSummary,
  readResult,
  readStoredMarkdown,
  resolveShaPrefix,
  resultExists,
  storeParseArtifacts,
  writeResult,
} from '../utils/resultStore';

export interface ProcessOptions {
  /** Reprocess even when a result already exists */
  force?: boolean;
  /** ParseX pdf_parse_mode override */
  parseMode?: string;
}

export interface PipelineDependencies {
  textin?: TextInClient;
  extractionProvider?: ExtractionProvider;
  enhancer?: RegionEnhancer;
}

/**
 * Outcome for one file of a directory run
 */
export interface FileOutcome {
  filePath: string;
  success: boolean;
  /** null when the file was skipped as already processed */
  record?: DocumentRecord | null;
  error?: Error;
}

export interface DirectoryResult {
  outcomes: FileOutcome[];
  stats: BatchProcessStats;
}

type MetadataColumns = Pick<
  DocumentRecord,
  | 'title'
  | 'broker'
  | 'authors'
  | 'publishDate'
  | 'market'
  | 'sector'
  | 'documentType'
  | 'targetCompany'
  | 'tickerSymbol'
>;

const EMPTY_METADATA: MetadataColumns = { publishDate: null };

export class ProcessingPipeline {
  private settings: Config;
  private textinClient?: TextInClient;
  private extractionProvider?: ExtractionProvider;
  private regionEnhancer?: RegionEnhancer;

  constructor(settings: Config = config, dependencies: PipelineDependencies = {}) {
    this.settings = settings;
    this.textinClient = dependencies.textin;
    this.extractionProvider = dependencies.extractionProvider;
    this.regionEnhancer = dependencies.enhancer;
  }

  private get textin(): TextInClient {
    this.textinClient ??= new TextInClient(this.settings);
    return this.textinClient;
  }

  private get extractor(): ExtractionProvider {
    this.extractionProvider ??= createExtractionProvider(this.settings, this.textinClient);
    return this.extractionProvider;
  }

  private get enhancer(): RegionEnhancer {
    this.regionEnhancer ??= new RegionEnhancer(new VisionSummarizer(this.settings), {
      scale: this.settings.vlm.renderScale,
    });
    return this.regionEnhancer;
  }

  /**
   * Run one local file through the whole pipeline.
   * @returns The stored record, or null when it was already processed
   */
  async processFile(filePath: string, options: ProcessOptions = {}): Promise<DocumentRecord | null> {
    const absolutePath = path.resolve(filePath);
    if (!(await fs.pathExists(absolutePath))) {
      throw new FileError(`File does not exist: ${absolutePath}`, 'read', absolutePath);
    }
    const fileType = getFileType(absolutePath);
    if (fileType === FileType.UNKNOWN) {
      throw new ValidationError(`Unsupported file type: ${path.basename(absolutePath)}`);
    }

    const { paths } = this.settings;
    await ensureDataDirs(this.settings);

    const sha = await sha256File(absolutePath);
    if (!options.force && (await resultExists(paths.extractionDir, sha))) {
      emojiLogger.info(`Skipping ${path.basename(absolutePath)}: already processed (${sha.slice(0, 12)})`);
      return null;
    }

    emojiLogger.pipeline(`Processing ${path.basename(absolutePath)} (${sha.slice(0, 12)})`);
    const startTime = Date.now();

    let parsed: ParseResult;
    try {
      parsed = await this.textin.parseFile(absolutePath, { parseMode: options.parseMode });
    } catch (error) {
      throw new DocProcessingError(errorMessage(error), 'parse', absolutePath);
    }
    emojiLogger.parse(
      `${parsed.validPageNumber}/${parsed.totalPageNumber} pages, ${parsed.detail.length} elements`,
      { requestId: parsed.requestId }
    );

    let markdown = parsed.markdown;
    let chartCount = 0;
    let tableCount = 0;
    if (this.settings.vlm.model) {
      try {
        const enhanced = await this.enhancer.enhance(absolutePath, markdown, parsed.detail, parsed.pages);
        markdown = enhanced.enhancedMarkdown;
        chartCount = enhanced.chartCount;
        tableCount = enhanced.tableCount;
        emojiLogger.enhance(`${chartCount} charts, ${tableCount} tables replaced`);
      } catch (error) {
        emojiLogger.warn(`Enhancement skipped: ${errorMessage(error)}`);
      }
    }
    // Idempotent, so running it again after the enhancer is harmless
    markdown = stripWatermarks(markdown);

    const stored = await storeParseArtifacts(paths.parsedDir, sha, {
      markdown,
      rawMarkdown: parsed.markdown,
      detail: parsed.detail,
      pages: parsed.pages,
      excelBase64: parsed.excelBase64,
    });

    const { summary, metadata } = await this.runExtraction(absolutePath, markdown);

    const stat = await fs.stat(absolutePath);
    const record: DocumentRecord = {
      sha256: sha,
      fileName: path.basename(absolutePath),
      source: 'local',
      localPath: absolutePath,
      mimeType: getMimeType(absolutePath),
      fileSizeBytes: stat.size,
      processedAt: new Date().toISOString(),
      parse: {
        ...stored,
        requestId: parsed.requestId,
        durationMs: parsed.durationMs,
        pageCount: parsed.totalPageNumber,
        validPageCount: parsed.validPageNumber,
        srcPageCount: parsed.srcPageCount,
        hasChart: parsed.hasChart,
        chartCount,
        tableCount,
        parseConfig: this.textin.getParseConfig({ parseMode: options.parseMode }),
      },
      extraction: summary,
      ...metadata,
    };

    await writeResult(paths.extractionDir, record);
    emojiLogger.time(`Processed ${record.fileName}`, Date.now() - startTime);
    return record;
  }

  /**
   * Every supported file under `dir`, at most `textin.maxConcurrent` at a time
   */
  async processDirectory(dir: string, options: ProcessOptions = {}): Promise<DirectoryResult> {
    const files = await listSupportedFiles(path.resolve(dir));
    emojiLogger.pipeline(`Found ${files.length} documents in ${dir}`);

    const batch = new BatchProcessor<string, DocumentRecord | null>(this.settings.textin.maxConcurrent, 0);
    const results = await batch.processItems(
      files,
      file => this.processFile(file, options),
      (completed, total) => emojiLogger.progress(completed, total, 'documents done')
    );

    return {
      outcomes: files.map((filePath, i) => ({
        filePath,
        success: results[i].success,
        record: results[i].result,
        error: results[i].error,
      })),
      stats: batch.getStats(results),
    };
  }

  /**
   * A file or a directory of files
   */
  async processPath(target: string, options: ProcessOptions = {}): Promise<DirectoryResult> {
    const stat = await fs.stat(target).catch((error: unknown) => {
      if (isNotFoundError(error)) {
        throw new FileError(`Path does not exist: ${target}`, 'read', target);
      }
      throw error;
    });
    if (stat.isDirectory()) {
      return this.processDirectory(target, options);
    }

    const startTime = Date.now();
    let outcome: FileOutcome;
    try {
      outcome = { filePath: target, success: true, record: await this.processFile(target, options) };
    } catch (error) {
      outcome = { filePath: target, success: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
    const durationMs = Date.now() - startTime;
    return {
      outcomes: [outcome],
      stats: {
        totalItems: 1,
        successfulItems: outcome.success ? 1 : 0,
        failedItems: outcome.success ? 0 : 1,
        totalTimeMs: durationMs,
        averageItemTimeMs: durationMs,
      },
    };
  }

  /**
   * Run extraction again for a stored document, by hash or unique hash prefix.
   * A completed extraction is only redone with `force`; null means skipped.
   */
  async reExtract(shaPrefix: string, options: { force?: boolean } = {}): Promise<DocumentRecord | null> {
    const { paths } = this.settings;
    const sha = await resolveShaPrefix(paths.extractionDir, shaPrefix);
    const record = await readResult(paths.extractionDir, sha);
    if (!options.force && record.extraction?.status === 'completed') {
      emojiLogger.info(`Skipping ${sha.slice(0, 12)}: extraction already completed`);
      return null;
    }
    const markdown = await readStoredMarkdown(paths.parsedDir, record.parse.markdownPath);

    const { summary, metadata } = await this.runExtraction(record.localPath, markdown);
    // A failed attempt keeps the metadata from the previous run
    const updated: DocumentRecord =
      summary.status === 'completed'
        ? { ...record, ...metadata, extraction: summary }
        : { ...record, extraction: summary };
    await writeResult(paths.extractionDir, updated);
    return updated;
  }

  /**
   * Extraction never fails the document; a failure is recorded instead
   */
  private async runExtraction(
    filePath: string,
    markdown: string
  ): Promise<{ summary: ExtractionSummary; metadata: MetadataColumns }> {
    const extractedAt = () => new Date().toISOString();
    try {
      const provider = this.extractor;
      const result = await provider.extract({ filePath, markdown });
      const fields = await toExtractedMetadata(result.fields);

      emojiLogger.extract(`${provider.name}: ${fields.title ?? '(no title)'} / ${fields.broker ?? '(no broker)'}`);

      return {
        summary: {
          status: 'completed',
          provider: provider.name,
          model: result.model ?? provider.model,
          requestId: result.requestId,
          durationMs: result.durationMs,
          fields: result.fields,
          extractedAt: extractedAt(),
        },
        metadata: {
          title: fields.title,
          broker: fields.broker,
          authors: fields.authors,
          publishDate: parseDateToEpoch(fields.publish_date, this.settings.dates.timezone),
          market: fields.market,
          sector: fields.sector,
          documentType: fields.document_type,
          targetCompany: fields.target_company,
          tickerSymbol: fields.ticker_symbol,
        },
      };
    } catch (error) {
      emojiLogger.warn(`Extraction failed for ${path.basename(filePath)}: ${errorMessage(error)}`);
      return {
        summary: {
          status: 'failed',
          provider: this.settings.extraction.provider,
          errorMessage: errorMessage(error),
          extractedAt: extractedAt(),
        },
        metadata: EMPTY_METADATA,
      };
    }
  }
}

export default ProcessingPipeline;
