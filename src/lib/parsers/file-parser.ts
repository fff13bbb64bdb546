/**
 * File Text Extraction
 *
 * Extracts plain text from uploaded document bytes:
 * - Plain text (.txt)
 * - Markdown (.md)
 * - Word documents (.docx)
 */

import mammoth from 'mammoth';
import { ExtractionFailedError, getErrorMessage } from '@/lib/errors';

// =============================================================================
// Types
// =============================================================================

/**
 * Bytes in, plain text out.
 */
export interface TextExtractor {
  /** @throws ExtractionFailedError */
  extract(bytes: Buffer, filename: string): Promise<string>;
}

export const SUPPORTED_EXTENSIONS = ['.txt', '.md', '.docx'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB

// =============================================================================
// File Type Detection
// =============================================================================

/**
 * Get file extension from filename.
 */
export function getFileExtension(filename: string): string {
  const lastDot = filename.lastIndexOf('.');
  if (lastDot === -1) return '';
  return filename.slice(lastDot).toLowerCase();
}

export function isSupportedExtension(ext: string): ext is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

export function isSupportedFileType(filename: string): boolean {
  return isSupportedExtension(getFileExtension(filename));
}

// =============================================================================
// Parsers
// =============================================================================

function normalizeText(raw: string): string {
  return raw
    .replace(/\r\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Parse plain text or Markdown (formatting is kept as is).
 */
function parseText(buffer: Buffer): string {
  return normalizeText(buffer.toString('utf-8'));
}

/**
 * Parse DOCX file and extract text.
 */
async function parseDOCX(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  return normalizeText(result.value);
}

// =============================================================================
// Extractor
// =============================================================================

export class FileTextExtractor implements TextExtractor {
  private maxFileSize: number;

  constructor(options: { maxFileSize?: number } = {}) {
    this.maxFileSize = options.maxFileSize ?? MAX_FILE_SIZE;
  }

  async extract(bytes: Buffer, filename: string): Promise<string> {
    const ext = getFileExtension(filename);

    if (!isSupportedExtension(ext)) {
      throw new ExtractionFailedError(
        `unsupported file type "${ext || filename}" (supported: ${SUPPORTED_EXTENSIONS.join(', ')})`
      );
    }
    if (bytes.length > this.maxFileSize) {
      throw new ExtractionFailedError(`file too large (maximum ${this.maxFileSize / 1024 / 1024}MB)`);
    }

    switch (ext) {
      case '.txt':
      case '.md':
        return parseText(bytes);
      case '.docx':
        try {
          return await parseDOCX(bytes);
        } catch (error) {
          throw new ExtractionFailedError(`unreadable .docx file: ${getErrorMessage(error)}`, error);
        }
    }
  }
}
