import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilePathSource } from '../../../src/infrastructure/sources/FilePathSource.js';
import { LineParser } from '../../../src/infrastructure/parsers/LineParser.js';
import type { Target } from '../../../src/domain/model/Target.js';

let testDir: string;

beforeAll(() => {
  testDir = mkdtempSync(join(tmpdir(), 'scrapeflow-filepathsource-'));
});

afterAll(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string): string {
  const filePath = join(testDir, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

describe('FilePathSource', () => {
  describe('read()', () => {
    it('should stream file content as chunks', async () => {
      const filePath = writeTempFile('read-basic.txt', 'https://a.test\nhttps://b.test\n');

      const chunks: string[] = [];
      for await (const chunk of new FilePathSource(filePath).read()) {
        chunks.push(chunk);
      }

      expect(chunks.join('')).toBe('https://a.test\nhttps://b.test\n');
    });

    it('should stream large content in multiple chunks', async () => {
      const content = 'https://shop.example.test/product/1234567890\n'.repeat(2000);
      const filePath = writeTempFile('read-large.txt', content);

      const chunks: string[] = [];
      for await (const chunk of new FilePathSource(filePath, { highWaterMark: 256 }).read()) {
        chunks.push(chunk);
      }

      expect(chunks.length).toBeGreaterThan(1);
      expect(chunks.join('')).toBe(content);
    });

    it('should feed a parser line by line across chunk boundaries', async () => {
      const lines = Array.from({ length: 300 }, (_, i) => `https://example.test/p/${String(i)}`);
      const filePath = writeTempFile('targets.txt', `${lines.join('\n')}\n`);

      const targets: Target[] = [];
      for await (const target of new LineParser().parse(new FilePathSource(filePath, { highWaterMark: 64 }).read())) {
        targets.push(target);
      }

      expect(targets).toEqual(lines);
    });
  });

  describe('metadata()', () => {
    it('should return file name and size', () => {
      const content = 'https://a.test\n';
      const filePath = writeTempFile('meta.txt', content);

      const meta = new FilePathSource(filePath).metadata();
      expect(meta.fileName).toBe('meta.txt');
      expect(meta.fileSize).toBe(Buffer.byteLength(content));
      expect(meta.mimeType).toBe('text/plain');
    });

    it('should detect CSV and TSV mime types', () => {
      expect(new FilePathSource(writeTempFile('detect.csv', 'url\n')).metadata().mimeType).toBe('text/csv');
      expect(new FilePathSource(writeTempFile('detect.tsv', 'url\n')).metadata().mimeType).toBe(
        'text/tab-separated-values',
      );
    });

    it('should fall back to a generic type for unknown extensions', () => {
      expect(new FilePathSource(writeTempFile('detect.xyz', 'data')).metadata().mimeType).toBe(
        'application/octet-stream',
      );
    });
  });
});
