/**
 * RegionExtractor.ts
 * Crops one element's bounding box out of a rendered page.
 */
import { toRect } from './CoordinateMapper';
import { DocumentPageRenderer, PageRenderer } from './PageRenderer';
import { PageSize } from '../models/ParseTypes';

export const DEFAULT_RENDER_SCALE = 2;

export interface ExtractRegionOptions {
  /** Page size the position was measured against */
  pageSizeHint?: PageSize;
  /** Multiple of native resolution; 2 is 144 DPI for a PDF */
  scale?: number;
  renderer?: PageRenderer;
}

const defaultRenderer = new DocumentPageRenderer();

/**
 * Render the region described by `position` on the 0-based page `pageIndex`
 * and return it as PNG. The document is opened for this call only and closed
 * again whatever happens; errors propagate.
 */
export async function extractRegion(
  documentPath: string,
  pageIndex: number,
  position: unknown,
  options: ExtractRegionOptions = {}
): Promise<Buffer> {
  const { pageSizeHint, scale = DEFAULT_RENDER_SCALE, renderer = defaultRenderer } = options;

  const document = await renderer.open(documentPath);
  try {
    const pageRect = document.pageRect(pageIndex);
    const clip = toRect(position, pageRect, pageSizeHint);
    return await document.renderRegion(pageIndex, clip, scale);
  } finally {
    await document.close();
  }
}
