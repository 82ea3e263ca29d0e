/**
 * Tests for file parser utility.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  pdfGetText: vi.fn(),
  pdfDestroy: vi.fn(),
  extractRawText: vi.fn(),
  parseOfficeAsync: vi.fn(),
}));

// Mock pdf-parse (v2.x class-based API)
vi.mock('pdf-parse', () => ({
  PDFParse: class MockPDFParse {
    getText = mocks.pdfGetText;
    destroy = mocks.pdfDestroy;
  },
}));

vi.mock('mammoth', () => ({
  default: {
    extractRawText: mocks.extractRawText,
  },
}));

vi.mock('officeparser', () => ({
  parseOfficeAsync: mocks.parseOfficeAsync,
}));

import {
  parseFile,
  stripHtml,
  validateFile,
  resolveFormat,
  isSupportedFileType,
  getFileExtension,
  getMimeType,
  SUPPORTED_EXTENSIONS,
  MAX_FILE_SIZE,
} from '../file-parser';
import { UnsupportedFormatError } from '@/lib/errors';

// =============================================================================
// Test Fixtures
// =============================================================================

const createTextBuffer = (content: string): Buffer => Buffer.from(content, 'utf-8');

const sampleText = `
This is a sample document for testing purposes.

It contains multiple paragraphs with various content.
The parser should extract all text correctly.
`.trim();

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

// =============================================================================
// Tests: File Type Detection
// =============================================================================

describe('file-parser', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.pdfDestroy.mockResolvedValue(undefined);
  });

  describe('getFileExtension', () => {
    it('should extract a lowercase extension', () => {
      expect(getFileExtension('report.2024.final.PDF')).toBe('.pdf');
      expect(getFileExtension('notes.md')).toBe('.md');
    });

    it('should return empty string for no extension', () => {
      expect(getFileExtension('README')).toBe('');
    });
  });

  describe('isSupportedFileType', () => {
    it('should accept the supported extensions', () => {
      expect(isSupportedFileType('document.pdf')).toBe(true);
      expect(isSupportedFileType('Notes.TXT')).toBe(true);
      expect(isSupportedFileType('readme.md')).toBe(true);
      expect(isSupportedFileType('report.docx')).toBe(true);
      expect(isSupportedFileType('sheet.xlsx')).toBe(true);
      expect(isSupportedFileType('deck.pptx')).toBe(true);
      expect(isSupportedFileType('page.HTM')).toBe(true);
    });

    it('should reject other extensions', () => {
      expect(isSupportedFileType('image.png')).toBe(false);
      expect(isSupportedFileType('legacy.xls')).toBe(false);
    });
  });

  describe('getMimeType', () => {
    it('should map supported extensions to MIME types', () => {
      expect(getMimeType('file.pdf')).toBe('application/pdf');
      expect(getMimeType('file.docx')).toBe(DOCX_MIME);
    });

    it('should return null for unsupported files', () => {
      expect(getMimeType('file.png')).toBeNull();
    });
  });

  describe('resolveFormat', () => {
    it('should prefer a supported content type over the extension', () => {
      expect(resolveFormat('upload.bin', 'application/pdf')).toBe('pdf');
      expect(resolveFormat('notes.txt', 'text/markdown; charset=utf-8')).toBe('markdown');
    });

    it('should fall back to the extension for generic content types', () => {
      expect(resolveFormat('report.docx', 'application/octet-stream')).toBe('docx');
      expect(resolveFormat('notes.md')).toBe('markdown');
    });

    it('should return null when nothing matches', () => {
      expect(resolveFormat('photo.png', 'image/png')).toBeNull();
    });

    it('should ignore content types that collide with object properties', () => {
      expect(resolveFormat('notes.txt', 'constructor')).toBe('text');
      expect(resolveFormat('notes.txt', 'toString')).toBe('text');
      expect(resolveFormat('upload', '__proto__')).toBeNull();
    });
  });

  // ===========================================================================
  // Tests: File Validation
  // ===========================================================================

  describe('validateFile', () => {
    it('should accept valid files', () => {
      expect(validateFile({ name: 'document.pdf', size: 1024 })).toEqual({ valid: true });
    });

    it('should reject unsupported file types', () => {
      const result = validateFile({ name: 'image.png', size: 1024 });
      expect(result.valid).toBe(false);
      expect(result.error).toBe(
        'Unsupported file type. Supported: .pdf, .txt, .md, .docx, .xlsx, .pptx, .html, .htm'
      );
    });

    it('should reject files that are too large', () => {
      const result = validateFile({ name: 'large.pdf', size: MAX_FILE_SIZE + 1 });
      expect(result).toEqual({ valid: false, error: 'File too large. Maximum size: 10MB' });
    });

    it('should reject empty files', () => {
      expect(validateFile({ name: 'empty.pdf', size: 0 })).toEqual({
        valid: false,
        error: 'File is empty',
      });
    });

    it('should accept files at exactly max size', () => {
      expect(validateFile({ name: 'maxsize.pdf', size: MAX_FILE_SIZE }).valid).toBe(true);
    });
  });

  // ===========================================================================
  // Tests: Text Parsing
  // ===========================================================================

  describe('parseFile - TXT and Markdown', () => {
    it('should parse plain text files', async () => {
      const result = await parseFile(createTextBuffer(sampleText), 'document.txt');

      expect(result.content).toBe(sampleText);
      expect(result.format).toBe('text');
      expect(result.metadata.charCount).toBe(sampleText.length);
    });

    it('should strip a byte order mark', async () => {
      const result = await parseFile(createTextBuffer('\uFEFFhello'), 'bom.txt');

      expect(result.content).toBe('hello');
    });

    it('should preserve markdown formatting', async () => {
      const result = await parseFile(createTextBuffer('**bold** and `code`'), 'file.md');

      expect(result.content).toBe('**bold** and `code`');
      expect(result.format).toBe('markdown');
    });

    it('should count words across mixed whitespace', async () => {
      const result = await parseFile(createTextBuffer('word1    word2\n\nword3\t\tword4'), 'f.txt');

      expect(result.metadata.wordCount).toBe(4);
    });
  });

  // ===========================================================================
  // Tests: Error Handling
  // ===========================================================================

  describe('parseFile - Error handling', () => {
    it('should throw UnsupportedFormatError for unknown types', async () => {
      await expect(parseFile(createTextBuffer('x'), 'image.png', 'image/png')).rejects.toBeInstanceOf(
        UnsupportedFormatError
      );
    });

    it('should name the rejected type and the supported ones', async () => {
      await expect(parseFile(createTextBuffer('x'), 'README')).rejects.toThrow(
        'Unsupported file type: README. Supported types: .pdf, .txt, .md, .docx, .xlsx, .pptx, .html, .htm'
      );
    });

    it('should reject a content type named after an object property', async () => {
      await expect(parseFile(createTextBuffer('x'), 'upload', 'constructor')).rejects.toBeInstanceOf(
        UnsupportedFormatError
      );
    });
  });

  // ===========================================================================
  // Tests: PDF Parsing (mocked)
  // ===========================================================================

  describe('parseFile - PDF', () => {
    it('should extract text and page count', async () => {
      mocks.pdfGetText.mockResolvedValue({
        text: 'This is PDF content.\n-- 1 of 2 --\nSecond page.',
        pages: [{}, {}],
      });

      const result = await parseFile(Buffer.from('fake pdf'), 'document.pdf');

      expect(result.content).toBe('This is PDF content.\n\nSecond page.');
      expect(result.metadata.pageCount).toBe(2);
      expect(mocks.pdfDestroy).toHaveBeenCalledTimes(1);
    });

    it('should wrap parser failures as UnsupportedFormat and release the parser', async () => {
      mocks.pdfGetText.mockRejectedValue(new Error('Invalid PDF'));

      const error = await parseFile(Buffer.from('nope'), 'bad.pdf').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnsupportedFormatError);
      expect(error).toMatchObject({ message: 'Could not read bad.pdf as pdf: Invalid PDF' });
      expect(mocks.pdfDestroy).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Tests: DOCX Parsing (mocked)
  // ===========================================================================

  describe('parseFile - DOCX', () => {
    it('should extract raw text with mammoth', async () => {
      mocks.extractRawText.mockResolvedValue({ value: '  Quarterly report\n\nSummary.  ', messages: [] });

      const buffer = Buffer.from('fake docx');
      const result = await parseFile(buffer, 'upload', DOCX_MIME);

      expect(mocks.extractRawText).toHaveBeenCalledWith({ buffer });
      expect(result.content).toBe('Quarterly report\n\nSummary.');
      expect(result.format).toBe('docx');
    });

    it('should wrap mammoth failures', async () => {
      mocks.extractRawText.mockRejectedValue(new Error('Invalid DOCX'));

      await expect(parseFile(Buffer.from('x'), 'doc.docx')).rejects.toMatchObject({
        kind: 'UnsupportedFormat',
      });
    });
  });

  // ===========================================================================
  // Tests: Office and HTML Parsing
  // ===========================================================================

  describe('parseFile - XLSX and PPTX', () => {
    it('should extract spreadsheet text with officeparser', async () => {
      mocks.parseOfficeAsync.mockResolvedValue('  Region Revenue\nNorth 120\n');

      const buffer = Buffer.from('fake xlsx');
      const result = await parseFile(buffer, 'sales.xlsx');

      expect(mocks.parseOfficeAsync).toHaveBeenCalledWith(buffer);
      expect(result.content).toBe('Region Revenue\nNorth 120');
      expect(result.format).toBe('xlsx');
      expect(result.metadata.wordCount).toBe(4);
    });

    it('should resolve slide decks from the content type', async () => {
      mocks.parseOfficeAsync.mockResolvedValue('Roadmap\nQ3 launch');

      const result = await parseFile(
        Buffer.from('fake pptx'),
        'upload',
        'application/vnd.openxmlformats-officedocument.presentationml.presentation'
      );

      expect(result.format).toBe('pptx');
      expect(result.content).toBe('Roadmap\nQ3 launch');
    });

    it('should wrap officeparser failures', async () => {
      mocks.parseOfficeAsync.mockRejectedValue(new Error('Corrupted zip'));

      await expect(parseFile(Buffer.from('x'), 'deck.pptx')).rejects.toMatchObject({
        kind: 'UnsupportedFormat',
        message: 'Could not read deck.pptx as pptx: Corrupted zip',
      });
    });
  });

  describe('parseFile - HTML', () => {
    it('should keep visible text and drop scripts and styles', async () => {
      const html =
        '<html><head><style>p { color: red; }</style><script>track()</script></head>' +
        '<body><h1>Setup</h1><p>Plug in the cable &amp; press <b>Start</b>.</p></body></html>';

      const result = await parseFile(createTextBuffer(html), 'guide.html');

      expect(result.format).toBe('html');
      expect(result.content).toBe('Setup\n\nPlug in the cable & press Start.');
    });
  });

  describe('stripHtml', () => {
    it('should decode common entities once', () => {
      expect(stripHtml('a&nbsp;&lt;b&gt; &quot;c&quot; &#39;d&#39; &amp;lt;')).toBe('a <b> "c" \'d\' &lt;');
    });

    it('should turn line breaks and list items into new lines', () => {
      expect(stripHtml('<ul><li>One</li><li>Two</li></ul>line<br/>next')).toBe('One\n\nTwo\n\nline\nnext');
    });

    it('should drop comments', () => {
      expect(stripHtml('keep<!-- hidden -->this')).toBe('keepthis');
    });
  });

  describe('Constants', () => {
    it('should list the supported extensions', () => {
      expect(SUPPORTED_EXTENSIONS).toEqual(['.pdf', '.txt', '.md', '.docx', '.xlsx', '.pptx', '.html', '.htm']);
    });
  });
});
