/**
 * CoordinateMapper.ts
 * Turns the parser's bounding-box formats into one axis-aligned rectangle in
 * the renderer's page space.
 */
import { logger } from '../utils/logger';
import { isRecord, PageSize } from '../models/ParseTypes';

export interface Rect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export type Point = [number, number];

export function rectWidth(rect: Rect): number {
  return rect.x1 - rect.x0;
}

export function rectHeight(rect: Rect): number {
  return rect.y1 - rect.y0;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isNumberList(value: unknown[]): value is number[] {
  return value.every(isFiniteNumber);
}

/**
 * Min/max envelope of a set of points
 */
export function envelope(points: Point[]): Rect {
  const xs = points.map(([x]) => x);
  const ys = points.map(([, y]) => y);
  return {
    x0: Math.min(...xs),
    y0: Math.min(...ys),
    x1: Math.max(...xs),
    y1: Math.max(...ys),
  };
}

function toPoints(value: unknown): Point[] | undefined {
  if (!Array.isArray(value) || value.length === 0) {
    return undefined;
  }
  const items: unknown[] = value;
  const points: Point[] = [];
  for (const item of items) {
    if (!Array.isArray(item)) {
      return undefined;
    }
    const pair: unknown[] = item;
    const [x, y] = pair;
    if (!isFiniteNumber(x) || !isFiniteNumber(y)) {
      return undefined;
    }
    points.push([x, y]);
  }
  return points;
}

function fromSequence(position: unknown[]): Rect | undefined {
  if (!isNumberList(position)) {
    return undefined;
  }
  if (position.length === 8) {
    return envelope([
      [position[0], position[1]],
      [position[2], position[3]],
      [position[4], position[5]],
      [position[6], position[7]],
    ]);
  }
  if (position.length === 4) {
    const [x0, y0, x1, y1] = position;
    // Normalise so x0 <= x1 and y0 <= y1 even for reversed corners
    return envelope([[x0, y0], [x1, y1]]);
  }
  return undefined;
}

function fromMapping(position: Record<string, unknown>): Rect | undefined {
  const pointList = position.quad ?? position.points;
  if (pointList !== undefined) {
    const points = toPoints(pointList);
    return points ? envelope(points) : undefined;
  }

  if (isFiniteNumber(position.x) && isFiniteNumber(position.y)) {
    const width = isFiniteNumber(position.width) ? position.width : 0;
    const height = isFiniteNumber(position.height) ? position.height : 0;
    return envelope([
      [position.x, position.y],
      [position.x + width, position.y + height],
    ]);
  }

  return undefined;
}

/**
 * Map a parser position onto the page.
 *
 * Recognised shapes are a flat list of 8 numbers (four corners), a flat list
 * of 4 numbers, `{quad}` / `{points}` point lists and `{x, y, width?, height?}`.
 * Anything else yields the whole page, unscaled. When `pageSizeHint` is
 * given, the rectangle is scaled from that size into `pageRect`. Results are
 * not clamped to the page.
 */
export function toRect(position: unknown, pageRect: Rect, pageSizeHint?: PageSize): Rect {
  let rect: Rect | undefined;

  if (Array.isArray(position)) {
    rect = fromSequence(position);
  } else if (isRecord(position)) {
    rect = fromMapping(position);
  }

  if (!rect) {
    logger.warn('Unrecognised position format, using the full page', { position });
    return { ...pageRect };
  }

  if (pageSizeHint && pageSizeHint.width > 0 && pageSizeHint.height > 0) {
    const sx = rectWidth(pageRect) / pageSizeHint.width;
    const sy = rectHeight(pageRect) / pageSizeHint.height;
    rect = {
      x0: rect.x0 * sx,
      y0: rect.y0 * sy,
      x1: rect.x1 * sx,
      y1: rect.y1 * sy,
    };
  }

  return rect;
}
