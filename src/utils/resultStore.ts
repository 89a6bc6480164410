/**
 * Flat-file storage for parse artifacts and per-document result records.
 *
 *   <parsedDir>/<sha[0:4]>/<sha>/output.md, output_raw.md, detail.json, pages.json, tables.xlsx
 *   <extractionDir>/<sha[0:4]>/<sha>.json
 */
import fs from 'fs-extra';
import path from 'path';
import { DocumentElement, isRecord, PageInfo } from '../models/ParseTypes';
import { FileError, ValidationError } from './errors';
import { logger } from './logger';

export interface ParseArtifacts {
  markdown: string;
  rawMarkdown: string;
  detail: DocumentElement[];
  pages: PageInfo[];
  excelBase64?: string;
}

/** Paths relative to the parsed directory */
export interface StoredArtifactPaths {
  markdownPath: string;
  rawMarkdownPath: string;
  detailJsonPath: string;
  pagesJsonPath: string;
  excelPath?: string;
}

export interface ParseSummary extends StoredArtifactPaths {
  requestId: string;
  durationMs: number;
  pageCount: number;
  validPageCount: number;
  srcPageCount: number;
  hasChart: boolean;
  chartCount: number;
  tableCount: number;
  parseConfig: Record<string, string>;
}

export type ExtractionStatus = 'completed' | 'failed';

export interface ExtractionSummary {
  status: ExtractionStatus;
  provider: string;
  model?: string;
  requestId?: string;
  durationMs?: number;
  fields?: Record<string, unknown>;
  errorMessage?: string;
  extractedAt: string;
}

/**
 * One processed document
 */
export interface DocumentRecord {
  sha256: string;
  fileName: string;
  source: string;
  localPath: string;
  mimeType?: string;
  fileSizeBytes: number;
  processedAt: string;
  parse: ParseSummary;
  extraction: ExtractionSummary | null;
  title?: string;
  broker?: string;
  authors?: string;
  publishDate: number | null;
  market?: string;
  sector?: string;
  documentType?: string;
  targetCompany?: string;
  tickerSymbol?: string;
}

const SHA256_PATTERN = /^[0-9a-f]{64}$/;

function shardDir(baseDir: string, sha: string): string {
  return path.join(baseDir, sha.slice(0, 4));
}

export function artifactDir(parsedDir: string, sha: string): string {
  return path.join(shardDir(parsedDir, sha), sha);
}

export function resultPath(extractionDir: string, sha: string): string {
  return path.join(shardDir(extractionDir, sha), `${sha}.json`);
}

/**
 * Write the parser output for one document and return where it went
 */
export async function storeParseArtifacts(
  parsedDir: string,
  sha: string,
  artifacts: ParseArtifacts
): Promise<StoredArtifactPaths> {
  const dir = artifactDir(parsedDir, sha);
  const relative = (name: string) => path.relative(parsedDir, path.join(dir, name));

  try {
    await fs.ensureDir(dir);
    await fs.writeFile(path.join(dir, 'output.md'), artifacts.markdown, 'utf8');
    await fs.writeFile(path.join(dir, 'output_raw.md'), artifacts.rawMarkdown, 'utf8');
    await fs.writeJson(path.join(dir, 'detail.json'), artifacts.detail, { spaces: 2 });
    await fs.writeJson(path.join(dir, 'pages.json'), artifacts.pages, { spaces: 2 });

    let excelPath: string | undefined;
    if (artifacts.excelBase64) {
      await fs.writeFile(path.join(dir, 'tables.xlsx'), Buffer.from(artifacts.excelBase64, 'base64'));
      excelPath = relative('tables.xlsx');
    }

    return {
      markdownPath: relative('output.md'),
      rawMarkdownPath: relative('output_raw.md'),
      detailJsonPath: relative('detail.json'),
      pagesJsonPath: relative('pages.json'),
      excelPath,
    };
  } catch (error) {
    throw new FileError(
      `Failed to store parse artifacts: ${error instanceof Error ? error.message : String(error)}`,
      'write',
      dir
    );
  }
}

export async function readStoredMarkdown(parsedDir: string, relativePath: string): Promise<string> {
  const fullPath = path.join(parsedDir, relativePath);
  if (!(await fs.pathExists(fullPath))) {
    throw new FileError(`Stored markdown not found: ${fullPath}`, 'read', fullPath);
  }
  return fs.readFile(fullPath, 'utf8');
}

export async function resultExists(extractionDir: string, sha: string): Promise<boolean> {
  return fs.pathExists(resultPath(extractionDir, sha));
}

export async function writeResult(extractionDir: string, record: DocumentRecord): Promise<string> {
  const target = resultPath(extractionDir, record.sha256);
  await fs.ensureDir(path.dirname(target));
  await fs.writeJson(target, record, { spaces: 2 });
  return target;
}

function isDocumentRecord(value: unknown): value is DocumentRecord {
  return (
    isRecord(value) &&
    typeof value.sha256 === 'string' &&
    typeof value.fileName === 'string' &&
    typeof value.processedAt === 'string' &&
    isRecord(value.parse)
  );
}

export async function readResult(extractionDir: string, sha: string): Promise<DocumentRecord> {
  const source = resultPath(extractionDir, sha);
  if (!(await fs.pathExists(source))) {
    throw new FileError(`No result for ${sha}`, 'read', source);
  }
  const data: unknown = await fs.readJson(source);
  if (!isDocumentRecord(data)) {
    throw new ValidationError(`Malformed result file ${source}`);
  }
  return data;
}

/**
 * Every stored record, newest first. Unreadable files are logged and skipped.
 */
export async function listResults(extractionDir: string): Promise<DocumentRecord[]> {
  if (!(await fs.pathExists(extractionDir))) {
    return [];
  }

  const records: DocumentRecord[] = [];
  for (const shard of await fs.readdir(extractionDir)) {
    const shardPath = path.join(extractionDir, shard);
    if (!(await fs.stat(shardPath)).isDirectory()) {
      continue;
    }
    for (const file of await fs.readdir(shardPath)) {
      const sha = path.basename(file, '.json');
      if (!file.endsWith('.json') || !SHA256_PATTERN.test(sha)) {
        continue;
      }
      try {
        records.push(await readResult(extractionDir, sha));
      } catch (error) {
        logger.warn(`Skipping unreadable result ${file}`, error);
      }
    }
  }

  return records.sort((a, b) => b.processedAt.localeCompare(a.processedAt));
}

/**
 * The one stored hash starting with `prefix`
 */
export async function resolveShaPrefix(extractionDir: string, prefix: string): Promise<string> {
  const wanted = prefix.trim().toLowerCase();
  if (!wanted) {
    throw new ValidationError('A hash prefix is required');
  }

  const matches = (await listResults(extractionDir))
    .map(record => record.sha256)
    .filter(sha => sha.startsWith(wanted));

  if (matches.length === 0) {
    throw new ValidationError(`No results found for prefix '${prefix}'`);
  }
  if (matches.length > 1) {
    throw new ValidationError(`Ambiguous prefix '${prefix}' matches ${matches.length} results`);
  }
  return matches[0];
}
