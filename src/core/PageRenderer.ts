/**
 * PageRenderer.ts
 * Opens a document and renders clipped page regions to PNG. PDFs are measured
 * with pdf-lib and rasterised with poppler's pdftocairo; images are cropped
 * with sharp.
 */
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import sharp from 'sharp';
import { PDFDocument } from 'pdf-lib';
import { Poppler } from 'node-poppler';
import { Rect, rectHeight, rectWidth } from './CoordinateMapper';
import { RegionExtractionError } from '../utils/errors';
import { FileType, getFileType } from '../utils/fileUtils';
import { logger } from '../utils/logger';

/**
 * An open document. Page rectangles are in the document's native units
 * (PDF points, image pixels) with the origin at the top-left corner.
 */
export interface RenderableDocument {
  readonly pageCount: number;
  pageRect(pageIndex: number): Rect;
  /** PNG of `clip` at `scale` times native resolution */
  renderRegion(pageIndex: number, clip: Rect, scale: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface PageRenderer {
  open(documentPath: string): Promise<RenderableDocument>;
}

/**
 * Options for pdftocairo
 */
export interface PdfToCairoOptions {
  firstPageToConvert: number;
  lastPageToConvert: number;
  pngFile: boolean;
  singleFile: boolean;
  resolutionXYAxis: number;
  cropXAxis: number;
  cropYAxis: number;
  cropWidth: number;
  cropHeight: number;
}

/**
 * The slice of node-poppler this module uses
 */
export interface CairoRasterizer {
  pdfToCairo(file: string, outputFile: string, options: PdfToCairoOptions): Promise<unknown>;
}

/**
 * Intersect a clip with the page; pdftocairo and sharp both reject crops
 * outside the raster.
 */
export function clipToPage(clip: Rect, page: Rect): Rect | undefined {
  const clipped: Rect = {
    x0: Math.max(clip.x0, page.x0),
    y0: Math.max(clip.y0, page.y0),
    x1: Math.min(clip.x1, page.x1),
    y1: Math.min(clip.y1, page.y1),
  };
  return rectWidth(clipped) > 0 && rectHeight(clipped) > 0 ? clipped : undefined;
}

function assertPageIndex(documentPath: string, pageIndex: number, pageCount: number): void {
  if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= pageCount) {
    throw new RegionExtractionError(
      `Page index ${pageIndex} out of range (document has ${pageCount} pages)`,
      documentPath,
      pageIndex
    );
  }
}

function requireClip(documentPath: string, pageIndex: number, clip: Rect, page: Rect): Rect {
  const clipped = clipToPage(clip, page);
  if (!clipped) {
    throw new RegionExtractionError(
      `Clip (${clip.x0}, ${clip.y0}, ${clip.x1}, ${clip.y1}) does not overlap the page`,
      documentPath,
      pageIndex
    );
  }
  return clipped;
}

class PdfDocumentHandle implements RenderableDocument {
  private renderCount = 0;

  constructor(
    private readonly documentPath: string,
    private readonly pageRects: Rect[],
    private readonly workDir: string,
    private readonly rasterizer: CairoRasterizer
  ) {}

  get pageCount(): number {
    return this.pageRects.length;
  }

  pageRect(pageIndex: number): Rect {
    assertPageIndex(this.documentPath, pageIndex, this.pageCount);
    return { ...this.pageRects[pageIndex] };
  }

  async renderRegion(pageIndex: number, clip: Rect, scale: number): Promise<Buffer> {
    const page = this.pageRect(pageIndex);
    const region = requireClip(this.documentPath, pageIndex, clip, page);

    const cropX = Math.floor(region.x0 * scale);
    const cropY = Math.floor(region.y0 * scale);
    const options: PdfToCairoOptions = {
      firstPageToConvert: pageIndex + 1,
      lastPageToConvert: pageIndex + 1,
      pngFile: true,
      singleFile: true,
      resolutionXYAxis: 72 * scale,
      cropXAxis: cropX,
      cropYAxis: cropY,
      cropWidth: Math.max(1, Math.ceil(region.x1 * scale) - cropX),
      cropHeight: Math.max(1, Math.ceil(region.y1 * scale) - cropY),
    };

    this.renderCount += 1;
    const outputPrefix = path.join(this.workDir, `page-${pageIndex + 1}-${this.renderCount}`);
    const outputFile = `${outputPrefix}.png`;

    logger.debug('Rendering PDF region', { documentPath: this.documentPath, pageIndex, options });
    await this.rasterizer.pdfToCairo(this.documentPath, outputPrefix, options);

    if (!(await fs.pathExists(outputFile))) {
      throw new RegionExtractionError('pdftocairo produced no output', this.documentPath, pageIndex);
    }
    const png = await fs.readFile(outputFile);
    await fs.remove(outputFile);
    return png;
  }

  async close(): Promise<void> {
    await fs.remove(this.workDir);
  }
}

/**
 * PDF pages via pdf-lib (geometry) and pdftocairo (pixels)
 */
export class PdfPageRenderer implements PageRenderer {
  private rasterizer?: CairoRasterizer;

  /**
   * @param rasterizer Defaults to node-poppler, created on first use
   */
  constructor(rasterizer?: CairoRasterizer) {
    this.rasterizer = rasterizer;
  }

  async open(documentPath: string): Promise<RenderableDocument> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(documentPath);
    } catch (error) {
      throw new RegionExtractionError(
        `Failed to read document: ${error instanceof Error ? error.message : String(error)}`,
        documentPath
      );
    }

    const pdf = await PDFDocument.load(bytes, { ignoreEncryption: true });
    // pdftocairo renders the CropBox, which may be smaller than the MediaBox
    const pageRects = pdf.getPages().map(page => {
      const { width, height } = page.getCropBox();
      const quarterTurn = page.getRotation().angle % 180 !== 0;
      return quarterTurn
        ? { x0: 0, y0: 0, x1: height, y1: width }
        : { x0: 0, y0: 0, x1: width, y1: height };
    });

    this.rasterizer ??= new Poppler();
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'region-'));
    return new PdfDocumentHandle(documentPath, pageRects, workDir, this.rasterizer);
  }
}

class ImageDocumentHandle implements RenderableDocument {
  readonly pageCount = 1;

  constructor(
    private readonly documentPath: string,
    private readonly image: Buffer,
    private readonly bounds: Rect
  ) {}

  pageRect(pageIndex: number): Rect {
    assertPageIndex(this.documentPath, pageIndex, this.pageCount);
    return { ...this.bounds };
  }

  async renderRegion(pageIndex: number, clip: Rect, scale: number): Promise<Buffer> {
    const page = this.pageRect(pageIndex);
    const region = requireClip(this.documentPath, pageIndex, clip, page);

    const left = Math.floor(region.x0);
    const top = Math.floor(region.y0);
    const width = Math.max(1, Math.ceil(region.x1) - left);
    const height = Math.max(1, Math.ceil(region.y1) - top);

    let pipeline = sharp(this.image).extract({ left, top, width, height });
    if (scale !== 1) {
      pipeline = pipeline.resize(
        Math.max(1, Math.round(width * scale)),
        Math.max(1, Math.round(height * scale))
      );
    }
    return pipeline.png().toBuffer();
  }

  async close(): Promise<void> {
    // Nothing held open
  }
}

/**
 * Single-page raster images
 */
export class ImagePageRenderer implements PageRenderer {
  async open(documentPath: string): Promise<RenderableDocument> {
    const image = await fs.readFile(documentPath);
    const { width, height } = await sharp(image).metadata();
    if (!width || !height) {
      throw new RegionExtractionError('Unable to read image dimensions', documentPath);
    }
    return new ImageDocumentHandle(documentPath, image, { x0: 0, y0: 0, x1: width, y1: height });
  }
}

/**
 * Picks the PDF or image renderer from the file extension
 */
export class DocumentPageRenderer implements PageRenderer {
  constructor(
    private readonly pdfRenderer: PageRenderer = new PdfPageRenderer(),
    private readonly imageRenderer: PageRenderer = new ImagePageRenderer()
  ) {}

  async open(documentPath: string): Promise<RenderableDocument> {
    switch (getFileType(documentPath)) {
      case FileType.PDF:
        return this.pdfRenderer.open(documentPath);
      case FileType.IMAGE:
        return this.imageRenderer.open(documentPath);
      default:
        throw new RegionExtractionError('Unsupported document type', documentPath);
    }
  }
}
