/**
 * Tests for region extraction and the page renderers
 */
import path from 'path';
import fs from 'fs-extra';
import sharp from 'sharp';
import { degrees, PDFDocument } from 'pdf-lib';
import { extractRegion } from '../core/RegionExtractor';
import {
  DocumentPageRenderer,
  ImagePageRenderer,
  PdfPageRenderer,
  PdfToCairoOptions,
} from '../core/PageRenderer';
import { RegionExtractionError } from '../utils/errors';
import { fakeRenderer, makeTempDir } from './fixtures';

const RENDERED_PNG = Buffer.from('rendered-region');

function fakeRasterizer() {
  const outputs: string[] = [];
  const pdfToCairo = jest.fn(async (_file: string, outputFile: string, _options: PdfToCairoOptions) => {
    outputs.push(outputFile);
    await fs.writeFile(`${outputFile}.png`, RENDERED_PNG);
    return '';
  });
  return { rasterizer: { pdfToCairo }, pdfToCairo, outputs };
}

async function writePdf(filePath: string, rotate = false): Promise<void> {
  const pdf = await PDFDocument.create();
  const page = pdf.addPage([612, 792]);
  if (rotate) {
    page.setRotation(degrees(90));
  }
  await fs.writeFile(filePath, await pdf.save());
}

describe('RegionExtractor', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('with a stand-in renderer', () => {
    test('maps the position with the size hint and renders at the given scale', async () => {
      const { renderer, renderRegion, close } = fakeRenderer();

      const png = await extractRegion('report.pdf', 0, [100, 100, 400, 100, 400, 300, 100, 300], {
        pageSizeHint: { width: 1224, height: 1584 },
        scale: 2,
        renderer,
      });

      expect(png.toString()).toBe('png-bytes');
      expect(renderRegion).toHaveBeenCalledWith(0, { x0: 50, y0: 50, x1: 200, y1: 150 }, 2);
      expect(close).toHaveBeenCalledTimes(1);
    });

    test('closes the document when rendering fails', async () => {
      const { renderer, renderRegion, close } = fakeRenderer();
      renderRegion.mockRejectedValueOnce(new Error('render failed'));

      await expect(extractRegion('report.pdf', 0, [0, 0, 10, 10], { renderer })).rejects.toThrow(
        'render failed'
      );
      expect(close).toHaveBeenCalledTimes(1);
    });
  });

  describe('images', () => {
    let imagePath: string;

    beforeEach(async () => {
      imagePath = path.join(tempDir, 'page.png');
      await sharp({
        create: { width: 200, height: 100, channels: 3, background: { r: 255, g: 0, b: 0 } },
      })
        .png()
        .toFile(imagePath);
    });

    test('crops the region and scales it', async () => {
      const png = await extractRegion(imagePath, 0, [10, 20, 60, 70], { scale: 2 });
      const meta = await sharp(png).metadata();
      expect(meta.format).toBe('png');
      expect(meta.width).toBe(100);
      expect(meta.height).toBe(100);
    });

    test('x/y/width/height at native scale', async () => {
      const png = await extractRegion(imagePath, 0, { x: 0, y: 0, width: 40, height: 30 }, { scale: 1 });
      const meta = await sharp(png).metadata();
      expect([meta.width, meta.height]).toEqual([40, 30]);
    });

    test('an unknown position renders the whole image', async () => {
      const png = await extractRegion(imagePath, 0, 'somewhere', { scale: 1 });
      const meta = await sharp(png).metadata();
      expect([meta.width, meta.height]).toEqual([200, 100]);
    });

    test('a clip partly off the image is cut to the image', async () => {
      const png = await extractRegion(imagePath, 0, [150, 50, 300, 200], { scale: 1 });
      const meta = await sharp(png).metadata();
      expect([meta.width, meta.height]).toEqual([50, 50]);
    });

    test('a clip entirely off the image is rejected', async () => {
      await expect(extractRegion(imagePath, 0, [300, 300, 400, 400], { scale: 1 })).rejects.toBeInstanceOf(
        RegionExtractionError
      );
    });

    test('images have a single page', async () => {
      await expect(extractRegion(imagePath, 1, [0, 0, 10, 10])).rejects.toBeInstanceOf(RegionExtractionError);
    });

    test('ImagePageRenderer reports pixel dimensions', async () => {
      const document = await new ImagePageRenderer().open(imagePath);
      expect(document.pageCount).toBe(1);
      expect(document.pageRect(0)).toEqual({ x0: 0, y0: 0, x1: 200, y1: 100 });
      await document.close();
    });
  });

  describe('PDFs', () => {
    let pdfPath: string;

    beforeEach(async () => {
      pdfPath = path.join(tempDir, 'report.pdf');
      await writePdf(pdfPath);
    });

    test('passes the crop in pixels to pdftocairo and returns its PNG', async () => {
      const { rasterizer, pdfToCairo } = fakeRasterizer();

      const png = await extractRegion(pdfPath, 0, [100, 100, 400, 100, 400, 300, 100, 300], {
        renderer: new PdfPageRenderer(rasterizer),
        scale: 2,
      });

      expect(png.equals(RENDERED_PNG)).toBe(true);
      expect(pdfToCairo).toHaveBeenCalledTimes(1);
      const [file, , options] = pdfToCairo.mock.calls[0];
      expect(file).toBe(pdfPath);
      expect(options).toEqual({
        firstPageToConvert: 1,
        lastPageToConvert: 1,
        pngFile: true,
        singleFile: true,
        resolutionXYAxis: 144,
        cropXAxis: 200,
        cropYAxis: 200,
        cropWidth: 600,
        cropHeight: 400,
      });
    });

    test('removes its working directory on close', async () => {
      const { rasterizer, outputs } = fakeRasterizer();

      await extractRegion(pdfPath, 0, [0, 0, 100, 100], { renderer: new PdfPageRenderer(rasterizer) });

      expect(outputs).toHaveLength(1);
      expect(await fs.pathExists(path.dirname(outputs[0]))).toBe(false);
    });

    test('a page index past the end is rejected before rendering', async () => {
      const { rasterizer, pdfToCairo } = fakeRasterizer();

      await expect(
        extractRegion(pdfPath, 3, [0, 0, 100, 100], { renderer: new PdfPageRenderer(rasterizer) })
      ).rejects.toBeInstanceOf(RegionExtractionError);
      expect(pdfToCairo).not.toHaveBeenCalled();
    });

    test('a quarter-turned page swaps width and height', async () => {
      const rotatedPath = path.join(tempDir, 'rotated.pdf');
      await writePdf(rotatedPath, true);

      const document = await new PdfPageRenderer(fakeRasterizer().rasterizer).open(rotatedPath);
      expect(document.pageRect(0)).toEqual({ x0: 0, y0: 0, x1: 792, y1: 612 });
      await document.close();
    });

    test('a cropped page is measured and cut from its CropBox', async () => {
      const croppedPath = path.join(tempDir, 'cropped.pdf');
      const pdf = await PDFDocument.create();
      pdf.addPage([612, 792]).setCropBox(36, 36, 540, 720);
      await fs.writeFile(croppedPath, await pdf.save());
      const { rasterizer, pdfToCairo } = fakeRasterizer();
      const renderer = new PdfPageRenderer(rasterizer);

      const document = await renderer.open(croppedPath);
      expect(document.pageRect(0)).toEqual({ x0: 0, y0: 0, x1: 540, y1: 720 });
      await document.close();

      await extractRegion(croppedPath, 0, [100, 100, 400, 300], {
        pageSizeHint: { width: 1080, height: 1440 },
        scale: 2,
        renderer,
      });
      expect(pdfToCairo.mock.calls[0][2]).toMatchObject({
        resolutionXYAxis: 144,
        cropXAxis: 100,
        cropYAxis: 100,
        cropWidth: 300,
        cropHeight: 200,
      });
    });

    test('a missing file is a RegionExtractionError', async () => {
      const renderer = new PdfPageRenderer(fakeRasterizer().rasterizer);
      await expect(renderer.open(path.join(tempDir, 'missing.pdf'))).rejects.toBeInstanceOf(
        RegionExtractionError
      );
    });
  });

  test('DocumentPageRenderer rejects unsupported files', async () => {
    await expect(new DocumentPageRenderer().open('notes.txt')).rejects.toBeInstanceOf(RegionExtractionError);
  });
});
