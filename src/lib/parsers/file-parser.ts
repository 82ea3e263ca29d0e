/**
 * File Parser Utility
 *
 * Extracts text content from uploaded files:
 * - PDF (.pdf)
 * - Plain text (.txt)
 * - Markdown (.md)
 * - Word documents (.docx)
 * - Spreadsheets (.xlsx) and slide decks (.pptx)
 * - HTML pages (.html, .htm)
 *
 * The declared content type wins when it names a supported format;
 * otherwise the filename extension decides.
 */

import mammoth from 'mammoth';
import { UnsupportedFormatError, getErrorMessage } from '@/lib/errors';

// =============================================================================
// Types
// =============================================================================

export type DocumentFormat = 'pdf' | 'text' | 'markdown' | 'docx' | 'xlsx' | 'pptx' | 'html';

export interface ParseResult {
  content: string;
  format: DocumentFormat;
  metadata: {
    pageCount?: number;
    wordCount: number;
    charCount: number;
  };
}

export type SupportedMimeType =
  | 'application/pdf'
  | 'text/plain'
  | 'text/markdown'
  | 'application/vnd.openxmlformats-officedocument.wordprocessingml.document'
  | 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
  | 'application/vnd.openxmlformats-officedocument.presentationml.presentation'
  | 'text/html';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.md', '.docx', '.xlsx', '.pptx', '.html', '.htm'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const MIME_TYPE_MAP: Record<SupportedExtension, SupportedMimeType> = {
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  '.pptx': 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  '.html': 'text/html',
  '.htm': 'text/html',
};

const FORMAT_BY_EXTENSION: Record<SupportedExtension, DocumentFormat> = {
  '.pdf': 'pdf',
  '.txt': 'text',
  '.md': 'markdown',
  '.docx': 'docx',
  '.xlsx': 'xlsx',
  '.pptx': 'pptx',
  '.html': 'html',
  '.htm': 'html',
};

const FORMAT_BY_MIME: ReadonlyMap<string, DocumentFormat> = new Map([
  ['application/pdf', 'pdf'],
  ['text/plain', 'text'],
  ['text/markdown', 'markdown'],
  ['text/x-markdown', 'markdown'],
  ['application/vnd.openxmlformats-officedocument.wordprocessingml.document', 'docx'],
  ['application/vnd.openxmlformats-officedocument.spreadsheetml.sheet', 'xlsx'],
  ['application/vnd.openxmlformats-officedocument.presentationml.presentation', 'pptx'],
  ['text/html', 'html'],
  ['application/xhtml+xml', 'html'],
]);

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

function isSupportedExtension(ext: string): ext is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

/**
 * Check if file type is supported.
 */
export function isSupportedFileType(filename: string): boolean {
  return isSupportedExtension(getFileExtension(filename));
}

/**
 * Get MIME type from filename.
 */
export function getMimeType(filename: string): SupportedMimeType | null {
  const ext = getFileExtension(filename);
  return isSupportedExtension(ext) ? MIME_TYPE_MAP[ext] : null;
}

/**
 * Resolve the document format from content type and filename.
 * Returns null when neither names a supported format.
 */
export function resolveFormat(filename: string, contentType?: string): DocumentFormat | null {
  const mime = contentType?.split(';')[0]?.trim().toLowerCase();
  const declared = mime ? FORMAT_BY_MIME.get(mime) : undefined;
  if (declared) {
    return declared;
  }

  const ext = getFileExtension(filename);
  return isSupportedExtension(ext) ? FORMAT_BY_EXTENSION[ext] : null;
}

// =============================================================================
// Parsers
// =============================================================================

function countWords(content: string): number {
  return content.split(/\s+/).filter(Boolean).length;
}

/**
 * Parse PDF file and extract text.
 * pdf-parse is loaded on first use; it pulls in pdf.js.
 */
async function parsePDF(buffer: Buffer): Promise<ParseResult> {
  const { PDFParse } = await import('pdf-parse');
  const parser = new PDFParse({ data: buffer });

  try {
    const result = await parser.getText();
    const content = result.text
      .replace(/-- \d+ of \d+ --/g, '') // Page markers
      .trim();

    return {
      content,
      format: 'pdf',
      metadata: {
        pageCount: result.pages.length,
        wordCount: countWords(content),
        charCount: content.length,
      },
    };
  } finally {
    await parser.destroy();
  }
}

/**
 * Parse plain text or Markdown (formatting preserved).
 */
function parseText(buffer: Buffer, format: 'text' | 'markdown'): ParseResult {
  const content = buffer.toString('utf-8').replace(/^\uFEFF/, '').trim();

  return {
    content,
    format,
    metadata: {
      wordCount: countWords(content),
      charCount: content.length,
    },
  };
}

/**
 * Parse DOCX file and extract text.
 */
async function parseDOCX(buffer: Buffer): Promise<ParseResult> {
  const result = await mammoth.extractRawText({ buffer });
  const content = result.value.trim();

  return {
    content,
    format: 'docx',
    metadata: {
      wordCount: countWords(content),
      charCount: content.length,
    },
  };
}

/**
 * Parse XLSX or PPTX (sheet cells and slide text).
 * officeparser is loaded on first use, like pdf-parse.
 */
async function parseOffice(buffer: Buffer, format: 'xlsx' | 'pptx'): Promise<ParseResult> {
  const { parseOfficeAsync } = await import('officeparser');
  const text = await parseOfficeAsync(buffer);
  const content = text.trim();

  return {
    content,
    format,
    metadata: {
      wordCount: countWords(content),
      charCount: content.length,
    },
  };
}

const HTML_ENTITIES: ReadonlyMap<string, string> = new Map([
  ['&nbsp;', ' '],
  ['&lt;', '<'],
  ['&gt;', '>'],
  ['&quot;', '"'],
  ['&#39;', "'"],
  ['&apos;', "'"],
]);

/**
 * Reduce an HTML page to its visible text.
 * Scripts, styles and comments are dropped; block-level tags become line breaks.
 */
export function stripHtml(html: string): string {
  return html
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<(script|style|noscript|template)\b[\s\S]*?<\/\1\s*>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|section|article|li|tr|h[1-6]|pre|blockquote|table|ul|ol)\s*>/gi, '\n\n')
    .replace(/<[^>]*>/g, '')
    .replace(/&(nbsp|lt|gt|quot|apos|#39);/g, (entity) => HTML_ENTITIES.get(entity) ?? entity)
    .replace(/&amp;/g, '&')
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function parseHTML(buffer: Buffer): ParseResult {
  const content = stripHtml(buffer.toString('utf-8').replace(/^\uFEFF/, ''));

  return {
    content,
    format: 'html',
    metadata: {
      wordCount: countWords(content),
      charCount: content.length,
    },
  };
}

// =============================================================================
// Main Parser
// =============================================================================

/**
 * Parse a file and extract text content.
 *
 * @param buffer - File contents
 * @param filename - Original filename (fallback type detection)
 * @param contentType - Declared MIME type, if any
 * @throws UnsupportedFormatError if the format is unknown or the file cannot be read
 */
export async function parseFile(
  buffer: Buffer,
  filename: string,
  contentType?: string
): Promise<ParseResult> {
  const format = resolveFormat(filename, contentType);

  if (!format) {
    throw new UnsupportedFormatError(
      `Unsupported file type: ${contentType || getFileExtension(filename) || filename}. ` +
        `Supported types: ${SUPPORTED_EXTENSIONS.join(', ')}`,
      { context: { filename, contentType } }
    );
  }

  try {
    switch (format) {
      case 'pdf':
        return await parsePDF(buffer);
      case 'docx':
        return await parseDOCX(buffer);
      case 'xlsx':
      case 'pptx':
        return await parseOffice(buffer, format);
      case 'html':
        return parseHTML(buffer);
      case 'text':
      case 'markdown':
        return parseText(buffer, format);
      default:
        throw new UnsupportedFormatError(`No parser for format: ${String(format)}`, {
          context: { filename, format },
        });
    }
  } catch (error) {
    if (error instanceof UnsupportedFormatError) throw error;
    throw new UnsupportedFormatError(
      `Could not read ${filename} as ${format}: ${getErrorMessage(error)}`,
      { cause: error, context: { filename, format } }
    );
  }
}

/**
 * Validate file before parsing.
 */
export function validateFile(
  file: { name: string; size: number }
): { valid: boolean; error?: string } {
  if (!isSupportedFileType(file.name)) {
    return {
      valid: false,
      error: `Unsupported file type. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`,
    };
  }

  if (file.size > MAX_FILE_SIZE) {
    return {
      valid: false,
      error: `File too large. Maximum size: ${MAX_FILE_SIZE / 1024 / 1024}MB`,
    };
  }

  if (file.size === 0) {
    return {
      valid: false,
      error: 'File is empty',
    };
  }

  return { valid: true };
}
