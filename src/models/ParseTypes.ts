/**
 * ParseTypes.ts
 * Shapes of the layout parser's structured output, as consumed by the
 * enhancement and storage code.
 */

/**
 * One structural unit of a parsed document. `text` of image/table elements
 * is the parser's own rendering of the region, which for charts is often
 * invented. `position` is kept as received; CoordinateMapper interprets it.
 */
export interface DocumentElement {
  type?: string;
  sub_type?: string;
  image_type?: string;
  text?: string;
  page_id?: number;
  page_number?: number;
  position?: unknown;
  [key: string]: unknown;
}

/**
 * Page metadata in the coordinate space the parser used for `position`
 */
export interface PageInfo {
  page_id?: number;
  page_number?: number;
  width?: number;
  height?: number;
  angle?: number;
  [key: string]: unknown;
}

export interface PageSize {
  width: number;
  height: number;
}

/**
 * 1-based page id -> the size the parser measured positions against
 */
export type PageSizeIndex = Map<number, PageSize>;

export interface ParseResult {
  markdown: string;
  detail: DocumentElement[];
  pages: PageInfo[];
  excelBase64?: string;
  totalPageNumber: number;
  validPageNumber: number;
  srcPageCount: number;
  durationMs: number;
  requestId: string;
  hasChart: boolean;
}

export interface EnhancementResult {
  readonly enhancedMarkdown: string;
  readonly chartCount: number;
  readonly tableCount: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Keep every field of a raw element, retyping the ones the code reads
 */
export function toDocumentElement(raw: Record<string, unknown>): DocumentElement {
  return {
    ...raw,
    type: optionalString(raw.type),
    sub_type: optionalString(raw.sub_type),
    image_type: optionalString(raw.image_type),
    text: optionalString(raw.text),
    page_id: optionalNumber(raw.page_id),
    page_number: optionalNumber(raw.page_number),
    position: raw.position,
  };
}

export function toPageInfo(raw: Record<string, unknown>): PageInfo {
  return {
    ...raw,
    page_id: optionalNumber(raw.page_id),
    page_number: optionalNumber(raw.page_number),
    width: optionalNumber(raw.width),
    height: optionalNumber(raw.height),
    angle: optionalNumber(raw.angle),
  };
}

/**
 * Drop anything in a raw list that is not an object
 */
export function toRecords(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}
