import fs from 'fs-extra';
import path from 'path';
import crypto from 'crypto';
import { FileError } from './errors';

/**
 * File types supported by the application
 */
export enum FileType {
  PDF = 'pdf',
  IMAGE = 'image',
  UNKNOWN = 'unknown',
}

const MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
  '.webp': 'image/webp',
};

/**
 * Get the file type based on the file extension
 */
export function getFileType(filePath: string): FileType {
  const ext = path.extname(filePath).toLowerCase();

  if (ext === '.pdf') {
    return FileType.PDF;
  } else if (ext in MIME_TYPES) {
    return FileType.IMAGE;
  }

  return FileType.UNKNOWN;
}

/**
 * Get the MIME type for a file based on its extension
 * @returns MIME type string or undefined if unknown
 */
export function getMimeType(filePath: string): string | undefined {
  return MIME_TYPES[path.extname(filePath).toLowerCase()];
}

/**
 * Convert a Buffer to a base64 string
 * @param mimeType Optional MIME type to include in the data URL
 */
export function bufferToBase64(buffer: Buffer, mimeType?: string): string {
  const base64 = buffer.toString('base64');
  if (mimeType) {
    return `data:${mimeType};base64,${base64}`;
  }
  return base64;
}

/**
 * SHA-256 of a file's contents, hex encoded
 */
export async function sha256File(filePath: string): Promise<string> {
  if (!(await fs.pathExists(filePath))) {
    throw new FileError(`File does not exist: ${filePath}`, 'hash', filePath);
  }

  return new Promise<string>((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    fs.createReadStream(filePath)
      .on('data', chunk => hash.update(chunk))
      .on('error', err => reject(new FileError(`Failed to read file: ${err.message}`, 'hash', filePath)))
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Supported documents directly inside `dir` (or below it when `recursive`), sorted by path
 */
export async function listSupportedFiles(dir: string, recursive = true): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) {
        files.push(...(await listSupportedFiles(fullPath, recursive)));
      }
    } else if (entry.isFile() && getFileType(fullPath) !== FileType.UNKNOWN) {
      files.push(fullPath);
    }
  }

  return files.sort();
}
