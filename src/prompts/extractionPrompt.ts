// src/prompts/extractionPrompt.ts - Metadata fields and the prompt that asks for them

export interface ExtractionField {
  key: string;
  description: string;
}

/**
 * Fields extracted from every research report
 */
export const EXTRACTION_FIELDS: ExtractionField[] = [
  { key: 'title', description: 'Report title' },
  { key: 'broker', description: 'Issuing broker, bank or research institution' },
  { key: 'authors', description: 'Analyst names, comma separated' },
  { key: 'publish_date', description: 'Publication date, YYYY-MM-DD' },
  { key: 'market', description: 'Market or region covered, e.g. China A-share, US, Hong Kong' },
  { key: 'sector', description: 'Industry or sector covered' },
  { key: 'document_type', description: 'Report type, e.g. company report, industry report, macro, strategy' },
  { key: 'target_company', description: 'Main company covered, if any' },
  { key: 'ticker_symbol', description: 'Ticker of the main company covered, if any' },
];

/**
 * System prompt listing the fields to return
 */
export function buildExtractionSystemPrompt(fields: ExtractionField[] = EXTRACTION_FIELDS): string {
  const fieldLines = fields.map(field => `- ${field.key}: ${field.description}`).join('\n');

  return `You are a financial document metadata extractor. Read the research report below and extract its bibliographic metadata.

Return ONLY valid JSON with these keys:
${fieldLines}

For any field you cannot determine, use null.`;
}
