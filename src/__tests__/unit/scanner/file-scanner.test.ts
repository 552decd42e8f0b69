import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  scanDirectory,
  isRecordablePath,
  listFiles,
  calculateFileHash,
  toRemotePath,
  bytesToMB,
  estimateUploadSeconds,
  formatBytes,
} from '../../../core/scanner/file-scanner.js';
import type { SkippedFile } from '../../../types/scanner.js';
import { createTestProject, type TestProject } from '../../helpers/integration-helpers.js';

const HELLO_MD5 = '5d41402abc4b2a76b9719d911017c592';

describe('File Scanner', () => {
  let project: TestProject;

  beforeEach(() => {
    project = createTestProject({
      'hello.txt': 'hello',
      'nested/deep/copy.txt': 'hello',
      'nested/other.txt': 'other content',
      '.hidden': 'dotfile',
    });
  });

  afterEach(() => {
    project.cleanup();
  });

  describe('listFiles', () => {
    it('should list every file with forward slashes, sorted', async () => {
      const files = await listFiles(project.sourceDir);
      expect(files).toEqual(['.hidden', 'hello.txt', 'nested/deep/copy.txt', 'nested/other.txt']);
    });

    it('should apply exclude patterns', async () => {
      const files = await listFiles(project.sourceDir, ['nested/**']);
      expect(files).toEqual(['.hidden', 'hello.txt']);
    });
  });

  describe('calculateFileHash', () => {
    it('should default to MD5', async () => {
      const hash = await calculateFileHash(`${project.sourceDir}/hello.txt`);
      expect(hash).toBe(HELLO_MD5);
    });

    it('should support SHA-256', async () => {
      const hash = await calculateFileHash(`${project.sourceDir}/hello.txt`, 'sha256');
      expect(hash).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
    });
  });

  describe('scanDirectory', () => {
    it('should put every new file on the worklist', async () => {
      const result = await scanDirectory({
        sourceDir: project.sourceDir,
        maxFileSizeMB: 500,
        knownHashes: new Set(),
      });

      expect(result.worklist.map((w) => w.relativePath)).toEqual([
        '.hidden',
        'hello.txt',
        'nested/deep/copy.txt',
        'nested/other.txt',
      ]);
      expect(result.skipped).toEqual([]);
      expect(result.totalBytes).toBe(7 + 5 + 5 + 13);
    });

    it('should skip files whose content is already in the ledger, whatever their name', async () => {
      const skips: SkippedFile[] = [];
      const result = await scanDirectory({
        sourceDir: project.sourceDir,
        maxFileSizeMB: 500,
        knownHashes: new Set([HELLO_MD5]),
        onSkip: (file) => skips.push(file),
      });

      expect(result.worklist.map((w) => w.relativePath)).toEqual(['.hidden', 'nested/other.txt']);
      expect(result.skipped.map((s) => [s.relativePath, s.reason])).toEqual([
        ['hello.txt', 'already-uploaded'],
        ['nested/deep/copy.txt', 'already-uploaded'],
      ]);
      expect(skips).toEqual(result.skipped);
    });

    it('should skip files over the size ceiling', async () => {
      const result = await scanDirectory({
        sourceDir: project.sourceDir,
        // 10 bytes and a bit: "hello" (5) fits, "other content" (13) does not
        maxFileSizeMB: 0.00001,
        knownHashes: new Set(),
      });

      expect(result.skipped).toEqual([
        { relativePath: 'nested/other.txt', reason: 'too-large', sizeMB: bytesToMB(13) },
      ]);
      expect(result.worklist).toHaveLength(3);
    });

    it('should skip names the ledger cannot record before hashing them', async () => {
      const odd = createTestProject({ 'a|b.txt': 'pipe', 'z.txt': 'zulu' });
      try {
        const result = await scanDirectory({
          sourceDir: odd.sourceDir,
          maxFileSizeMB: 500,
          knownHashes: new Set(),
        });

        expect(result.skipped).toEqual([
          { relativePath: 'a|b.txt', reason: 'unrecordable-path', sizeMB: bytesToMB(4) },
        ]);
        expect(result.worklist.map((w) => w.relativePath)).toEqual(['z.txt']);
        expect(result.totalBytes).toBe(4);
      } finally {
        odd.cleanup();
      }
    });

    it('should not modify the known hash set', async () => {
      const known = new Set<string>();
      await scanDirectory({ sourceDir: project.sourceDir, maxFileSizeMB: 500, knownHashes: known });
      expect(known.size).toBe(0);
    });

    it('should record absolute paths, hashes and sizes', async () => {
      const result = await scanDirectory({
        sourceDir: project.sourceDir,
        maxFileSizeMB: 500,
        knownHashes: new Set(),
      });

      const hello = result.worklist.find((w) => w.relativePath === 'hello.txt');
      expect(hello).toEqual({
        absolutePath: `${project.sourceDir}/hello.txt`,
        relativePath: 'hello.txt',
        contentHash: HELLO_MD5,
        size: 5,
      });
    });

    it('should return an empty worklist for an empty directory', async () => {
      const empty = createTestProject();
      try {
        const result = await scanDirectory({
          sourceDir: empty.sourceDir,
          maxFileSizeMB: 500,
          knownHashes: new Set(),
        });
        expect(result).toEqual({ worklist: [], skipped: [], totalBytes: 0 });
      } finally {
        empty.cleanup();
      }
    });
  });

  describe('helpers', () => {
    it('should reject ledger separators and line breaks in paths', () => {
      expect(isRecordablePath('docs/report final.pdf')).toBe(true);
      expect(isRecordablePath('a|b.txt')).toBe(false);
      expect(isRecordablePath('line\nbreak.txt')).toBe(false);
      expect(isRecordablePath('line\rbreak.txt')).toBe(false);
    });

    it('should normalize remote paths', () => {
      expect(toRemotePath('a\\b\\c.txt')).toBe('a/b/c.txt');
      expect(toRemotePath('/a/b.txt')).toBe('a/b.txt');
    });

    it('should estimate upload time from size and speed', () => {
      expect(estimateUploadSeconds(10 * 1024 * 1024, 5)).toBe(2);
      expect(estimateUploadSeconds(1024, 0)).toBe(Infinity);
    });

    it('should format bytes', () => {
      expect(formatBytes(0)).toBe('0 Bytes');
      expect(formatBytes(1536)).toBe('1.5 KB');
      expect(formatBytes(5 * 1024 * 1024)).toBe('5 MB');
    });
  });
});
