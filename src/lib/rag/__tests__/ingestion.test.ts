/**
 * Tests for the ingestion pipeline.
 */

import { describe, it, expect } from 'vitest';
import { IngestionPipeline, hashContent } from '../ingestion';
import { EmptyContentError, UnsupportedFormatError } from '@/lib/errors';

const pipeline = new IngestionPipeline({ chunkSize: 1000, chunkOverlap: 200 });

describe('IngestionPipeline', () => {
  describe('prepare', () => {
    it('should normalize and chunk a text file', async () => {
      const bytes = Buffer.from('Refund policy\r\n\r\n\r\nRefunds   are issued within 30 days.');

      const { document, chunks } = await pipeline.prepare({
        bytes,
        filename: 'policy.txt',
        contentType: 'text/plain',
        documentId: 'policy',
        metadata: { team: 'support' },
      });

      expect(document).toMatchObject({
        id: 'policy',
        filename: 'policy.txt',
        contentType: 'text/plain',
        text: 'Refund policy\n\nRefunds are issued within 30 days.',
        metadata: { team: 'support' },
      });
      expect(document.contentHash).toBe(hashContent(document.text));
      expect(chunks).toHaveLength(1);
      expect(chunks[0]).toMatchObject({ id: 'policy:0', ordinal: 0, content: document.text });
    });

    it('should produce 7 chunks for a 5000-character document', async () => {
      const text = 'abcdefghij '.repeat(454) + 'abcdef';

      const { chunks } = await pipeline.prepare({
        bytes: Buffer.from(text),
        filename: 'long.txt',
        documentId: 'long',
      });

      expect(chunks).toHaveLength(7);
      expect(chunks.every((c) => c.charCount <= 1000)).toBe(true);
    });

    it('should generate a document id when none is given', async () => {
      const { document } = await pipeline.prepare({ bytes: Buffer.from('hello'), filename: 'a.md' });

      expect(document.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(document.contentType).toBe('markdown');
    });

    it('should reject whitespace-only files with EmptyContent', async () => {
      await expect(
        pipeline.prepare({ bytes: Buffer.from('  \n\n\t '), filename: 'blank.txt' })
      ).rejects.toBeInstanceOf(EmptyContentError);
    });

    it('should reject unsupported formats', async () => {
      await expect(
        pipeline.prepare({ bytes: Buffer.from('GIF89a'), filename: 'x.gif', contentType: 'image/gif' })
      ).rejects.toBeInstanceOf(UnsupportedFormatError);
    });

    it('should reject a content type named after an object property', async () => {
      await expect(
        pipeline.prepare({ bytes: Buffer.from('hello'), filename: 'upload', contentType: 'constructor' })
      ).rejects.toBeInstanceOf(UnsupportedFormatError);
    });

    it('should reject files over the size limit', async () => {
      const small = new IngestionPipeline({ chunkSize: 100, chunkOverlap: 10, maxFileSize: 4 });

      await expect(small.prepare({ bytes: Buffer.from('hello'), filename: 'a.txt' })).rejects.toMatchObject({
        kind: 'InvalidRequest',
      });
    });
  });

  describe('prepareText', () => {
    it('should be deterministic for the same input', () => {
      const source = { documentId: 'd', filename: 'd.txt', contentType: 'text/plain' };
      const text = 'word '.repeat(600);

      const first = pipeline.prepareText(text, source);
      const second = pipeline.prepareText(text, source);

      expect(second.chunks).toEqual(first.chunks);
      expect(second.document.contentHash).toBe(first.document.contentHash);
    });
  });
});
