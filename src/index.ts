/**
 * Research report parsing: OCR via TextIn, chart/table enhancement through a
 * vision model, watermark stripping and metadata extraction.
 */
import 'reflect-metadata';

export { config, loadConfig, ensureDataDirs } from './config';
export type { Config, ExtractionProviderName } from './config';

export { toRect, envelope, rectWidth, rectHeight } from './core/CoordinateMapper';
export type { Rect, Point } from './core/CoordinateMapper';
export { stripWatermarks } from './core/WatermarkFilter';
export { extractRegion, DEFAULT_RENDER_SCALE } from './core/RegionExtractor';
export type { ExtractRegionOptions } from './core/RegionExtractor';
export {
  DocumentPageRenderer,
  PdfPageRenderer,
  ImagePageRenderer,
} from './core/PageRenderer';
export type { PageRenderer, RenderableDocument, CairoRasterizer } from './core/PageRenderer';
export {
  RegionEnhancer,
  buildPageSizeIndex,
  gatherPageText,
  resolvePageId,
  replaceFirst,
  CHART_SUMMARY_TAG,
} from './core/RegionEnhancer';
export { VisionSummarizer } from './core/VisionSummarizer';
export type { RegionSummarizer } from './core/VisionSummarizer';
export { TextInClient } from './core/TextInClient';
export type { ExtractionResult, ParseOptions } from './core/TextInClient';
export {
  createExtractionProvider,
  LlmExtractionProvider,
  TextInExtractionProvider,
} from './core/ExtractionProvider';
export type { ExtractionProvider, ExtractionInput } from './core/ExtractionProvider';

export { ExtractedMetadata, toExtractedMetadata } from './models/ExtractedMetadata';
export type {
  DocumentElement,
  PageInfo,
  PageSize,
  PageSizeIndex,
  ParseResult,
  EnhancementResult,
} from './models/ParseTypes';

export { ProcessingPipeline } from './pipeline/ProcessingPipeline';
export type { ProcessOptions, DirectoryResult, FileOutcome } from './pipeline/ProcessingPipeline';
export { listResults, resolveShaPrefix } from './utils/resultStore';
export type { DocumentRecord } from './utils/resultStore';
export { parseDateToEpoch } from './utils/dateUtils';
export * from './utils/errors';
