/**
 * RegionEnhancer.ts
 * Replaces the parser's text for chart and table elements with what a vision
 * model reads from the rendered region, then strips watermarks.
 */
import { extractRegion, DEFAULT_RENDER_SCALE } from './RegionExtractor';
import { PageRenderer } from './PageRenderer';
import { RegionSummarizer } from './VisionSummarizer';
import { stripWatermarks } from './WatermarkFilter';
import {
  DocumentElement,
  EnhancementResult,
  PageInfo,
  PageSizeIndex,
} from '../models/ParseTypes';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const CHART_SUMMARY_TAG = '[Chart Summary]';
export const PAGE_CONTEXT_LIMIT = 1000;

type RegionKind = 'chart' | 'table';

export interface RegionEnhancerOptions {
  renderer?: PageRenderer;
  scale?: number;
  contextLimit?: number;
}

export function isChartElement(element: DocumentElement): boolean {
  return element.type === 'image' && element.sub_type === 'chart';
}

export function isTableElement(element: DocumentElement): boolean {
  return element.type === 'table';
}

/**
 * `page_id`, else `page_number`, else page 1
 */
export function resolvePageId(element: DocumentElement | PageInfo): number {
  return element.page_id || element.page_number || 1;
}

/**
 * Page sizes the parser measured positions against, for pages that report both dimensions
 */
export function buildPageSizeIndex(pages: PageInfo[] = []): PageSizeIndex {
  const index: PageSizeIndex = new Map();
  for (const page of pages) {
    const pageId = page.page_id || page.page_number;
    if (pageId && page.width && page.height) {
      index.set(pageId, { width: page.width, height: page.height });
    }
  }
  return index;
}

/**
 * Text of the non-image elements on a page, in document order, cut at `limit` characters
 */
export function gatherPageText(
  detail: DocumentElement[],
  pageId: number,
  exclude?: DocumentElement,
  limit = PAGE_CONTEXT_LIMIT
): string {
  return detail
    .filter(el => el !== exclude && el.type !== 'image' && resolvePageId(el) === pageId && el.text)
    .map(el => el.text)
    .join('\n')
    .slice(0, limit);
}

/**
 * Replace the first literal occurrence of `original`
 */
export function replaceFirst(body: string, original: string, replacement: string): string {
  const at = body.indexOf(original);
  if (at === -1) {
    return body;
  }
  return body.slice(0, at) + replacement + body.slice(at + original.length);
}

export function formatChartSummary(summary: string): string {
  return `${CHART_SUMMARY_TAG} ${summary.replace(/\s*\n\s*/g, ' ').trim()}`;
}

export class RegionEnhancer {
  private renderer?: PageRenderer;
  private scale: number;
  private contextLimit: number;

  constructor(
    private readonly summarizer: RegionSummarizer,
    options: RegionEnhancerOptions = {}
  ) {
    this.renderer = options.renderer;
    this.scale = options.scale ?? DEFAULT_RENDER_SCALE;
    this.contextLimit = options.contextLimit ?? PAGE_CONTEXT_LIMIT;
  }

  /**
   * Enhance every chart and then every table element, one at a time.
   *
   * With no chart or table elements the input comes back untouched and
   * watermarks are not stripped; the caller decides about those documents.
   * A failing element is logged and left as the parser wrote it.
   */
  async enhance(
    documentPath: string,
    markdown: string,
    detail: DocumentElement[],
    pages?: PageInfo[]
  ): Promise<EnhancementResult> {
    const charts = detail.filter(isChartElement);
    const tables = detail.filter(isTableElement);

    if (charts.length === 0 && tables.length === 0) {
      return Object.freeze({ enhancedMarkdown: markdown, chartCount: 0, tableCount: 0 });
    }

    const pageSizes = buildPageSizeIndex(pages);
    const work: Array<[RegionKind, DocumentElement]> = [
      ...charts.map((el): [RegionKind, DocumentElement] => ['chart', el]),
      ...tables.map((el): [RegionKind, DocumentElement] => ['table', el]),
    ];

    let enhanced = markdown;
    let chartCount = 0;
    let tableCount = 0;

    for (const [kind, element] of work) {
      const pageId = resolvePageId(element);
      const original = element.text;

      if (!original || element.position == null) {
        logger.warn(`Skipping ${kind} on page ${pageId}: missing text or position`);
        continue;
      }
      if (!enhanced.includes(original)) {
        logger.warn(`Skipping ${kind} on page ${pageId}: its text is not in the document body`);
        continue;
      }

      try {
        const replacement = await this.enhanceElement(
          kind,
          documentPath,
          element.position,
          pageId,
          gatherPageText(detail, pageId, element, this.contextLimit),
          pageSizes
        );
        enhanced = replaceFirst(enhanced, original, replacement);
        if (kind === 'chart') {
          chartCount += 1;
        } else {
          tableCount += 1;
        }
      } catch (error) {
        logger.warn(`Failed to enhance ${kind} on page ${pageId}: ${errorMessage(error)}`);
      }
    }

    logger.info(`Enhanced ${chartCount}/${charts.length} charts and ${tableCount}/${tables.length} tables`, {
      documentPath,
    });

    return Object.freeze({
      enhancedMarkdown: stripWatermarks(enhanced),
      chartCount,
      tableCount,
    });
  }

  private async enhanceElement(
    kind: RegionKind,
    documentPath: string,
    position: unknown,
    pageId: number,
    pageText: string,
    pageSizes: PageSizeIndex
  ): Promise<string> {
    const image = await extractRegion(documentPath, pageId - 1, position, {
      pageSizeHint: pageSizes.get(pageId),
      scale: this.scale,
      renderer: this.renderer,
    });

    if (kind === 'chart') {
      return formatChartSummary(await this.summarizer.summarizeChart(image, pageText || undefined));
    }
    return this.summarizer.summarizeTable(image, pageText || undefined);
  }
}

export default RegionEnhancer;
