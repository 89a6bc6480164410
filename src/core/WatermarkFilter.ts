/**
 * WatermarkFilter.ts
 * Strips publisher watermark residue from parsed report Markdown.
 *
 * Four passes run in a fixed order:
 *   1. inline signature fragments are cut out of otherwise valid lines
 *   2. lines carrying a watermark marker or tagline are dropped
 *   3. social-stats tables (follower and engagement counts) are dropped
 *   4. HTML comments repeated three or more times are dropped
 * Passes 3 and 4 can expose a line that pass 2 drops, so the four passes
 * repeat until the text stops changing. Every pass only removes text.
 */

/** Signature + "compiled by" fragments that sit inside real sentences. */
const INLINE_FRAGMENTS = ['macroamy整理', 'nacroany整理', 'roamy整理'];

/** A line containing any of these is watermark residue. Includes OCR misreads of the brand. */
const LINE_MARKERS = [
  'macroamy',
  'nacroany',
  'mroamy',
  'macrcy',
  'roamy',
  '付费',
  '扫一扫',
  '坦途宏观',
  '查看微博主页',
  '微信收藏',
  'GMF Research（坦途宏观）',
  '()■()',
];

/** Matched against the trimmed line. */
const LINE_PATTERNS = [
  /^专业的宏(?:观.*)?$/,
  /^<!--\s*\*{0,2}联系我们\*{0,2}\s*-->$/,
  /^<!--.*?@Degg.*?-->$/,
  /^<!--\s*微博\s*-->$/,
];

const EMPTY_COMMENT = /<!--\s*-->/g;
const TABLE_BLOCK = /<table[\s>][\s\S]*?<\/table>/g;
const HTML_COMMENT = /<!--[\s\S]*?-->/g;

const SOCIAL_TABLE_MARKERS = ['粉丝', '转评赞'];

export const REPEATED_COMMENT_THRESHOLD = 3;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function removeInlineFragments(text: string): string {
  return INLINE_FRAGMENTS.reduce((result, fragment) => result.split(fragment).join(''), text);
}

function isWatermarkLine(line: string): boolean {
  if (LINE_MARKERS.some(marker => line.includes(marker))) {
    return true;
  }
  const trimmed = line.trim();
  return LINE_PATTERNS.some(pattern => pattern.test(trimmed));
}

export function removeWatermarkLines(text: string): string {
  return text
    .replace(EMPTY_COMMENT, '')
    .split(/\r?\n/)
    .filter(line => !isWatermarkLine(line))
    .join('\n');
}

export function removeSocialTables(text: string): string {
  return text.replace(TABLE_BLOCK, table =>
    SOCIAL_TABLE_MARKERS.every(marker => table.includes(marker)) ? '' : table
  );
}

export function removeRepeatedComments(text: string): string {
  const counts = new Map<string, number>();
  for (const comment of text.match(HTML_COMMENT) ?? []) {
    counts.set(comment, (counts.get(comment) ?? 0) + 1);
  }

  const repeated = [...counts]
    .filter(([, count]) => count >= REPEATED_COMMENT_THRESHOLD)
    .map(([comment]) => comment);
  if (repeated.length === 0) {
    return text;
  }

  let result = text;
  for (const comment of repeated) {
    result = result.replace(new RegExp(`\\n*${escapeRegExp(comment)}\\n*`, 'g'), '\n');
  }

  result = result.replace(/^\n+|\n+$/g, '');
  return result.trim() ? `${result}\n` : result;
}

/**
 * Remove watermark residue from a Markdown body. Pure and idempotent.
 */
export function stripWatermarks(text: string): string {
  let previous: string;
  let result = text;
  do {
    previous = result;
    result = removeInlineFragments(result);
    result = removeWatermarkLines(result);
    result = removeSocialTables(result);
    result = removeRepeatedComments(result);
  } while (result !== previous);
  return result;
}

export default stripWatermarks;
