/**
 * ExtractedMetadata.ts
 * Report metadata as returned by an extraction provider, normalised and
 * validated with class-transformer / class-validator decorators
 */
import 'reflect-metadata';
import { Expose, plainToInstance, Transform } from 'class-transformer';
import { IsOptional, IsString, MaxLength, validate } from 'class-validator';
import { ValidationError } from '../utils/errors';

const NULL_WORDS = new Set(['null', 'none', 'n/a', 'unknown']);

/**
 * Providers answer with strings, numbers, lists or null; keep one trimmed string or nothing
 */
export function normalizeFieldValue(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed && !NULL_WORDS.has(trimmed.toLowerCase()) ? trimmed : undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = value
      .map(normalizeFieldValue)
      .filter((part): part is string => part !== undefined);
    return parts.length > 0 ? parts.join(', ') : undefined;
  }
  return undefined;
}

export class ExtractedMetadata {
  @Expose()
  @Transform(({ value }) => normalizeFieldValue(value))
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  title?: string;

  @Expose()
  @Transform(({ value }) => normalizeFieldValue(value))
  @IsOptional()
  @IsString()
  @MaxLength(200)
  broker?: string;

  @Expose()
  @Transform(({ value }) => normalizeFieldValue(value))
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  authors?: string;

  @Expose()
  @Transform(({ value }) => normalizeFieldValue(value))
  @IsOptional()
  @IsString()
  @MaxLength(100)
  publish_date?: string;

  @Expose()
  @Transform(({ value }) => normalizeFieldValue(value))
  @IsOptional()
  @IsString()
  @MaxLength(200)
  market?: string;

  @Expose()
  @Transform(({ value }) => normalizeFieldValue(value))
  @IsOptional()
  @IsString()
  @MaxLength(200)
  sector?: string;

  @Expose()
  @Transform(({ value }) => normalizeFieldValue(value))
  @IsOptional()
  @IsString()
  @MaxLength(200)
  document_type?: string;

  @Expose()
  @Transform(({ value }) => normalizeFieldValue(value))
  @IsOptional()
  @IsString()
  @MaxLength(200)
  target_company?: string;

  @Expose()
  @Transform(({ value }) => normalizeFieldValue(value))
  @IsOptional()
  @IsString()
  @MaxLength(50)
  ticker_symbol?: string;
}

/**
 * Build and validate metadata from a provider's raw field map. Unknown keys are dropped.
 */
export async function toExtractedMetadata(fields: Record<string, unknown>): Promise<ExtractedMetadata> {
  const metadata = plainToInstance(ExtractedMetadata, fields, { excludeExtraneousValues: true });
  const errors = await validate(metadata);
  if (errors.length > 0) {
    throw new ValidationError(
      `Extracted metadata failed validation: ${errors.map(e => e.property).join(', ')}`,
      errors.map(e => ({ property: e.property, constraints: e.constraints }))
    );
  }
  return metadata;
}
