import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  FilePublishStateStore,
  MemoryPublishStateStore,
} from '../../../core/publisher/publish-state.js';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

describe('Publish state', () => {
  describe('FilePublishStateStore', () => {
    let testDir: string;
    let sentinel: string;

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'archive-ledger-state-'));
      sentinel = join(testDir, '.push_state');
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('should read clean when the sentinel is absent', async () => {
      const store = new FilePublishStateStore(sentinel);
      expect(await store.read()).toBe('clean');
    });

    it('should create the sentinel with a timestamp for pending-publish', async () => {
      const store = new FilePublishStateStore(sentinel, () => new Date('2024-01-02T03:04:05.000Z'));

      await store.write('pending-publish');

      expect(await store.read()).toBe('pending-publish');
      expect(readFileSync(sentinel, 'utf-8')).toBe('2024-01-02T03:04:05.000Z');
    });

    it('should remove the sentinel for clean', async () => {
      const store = new FilePublishStateStore(sentinel);
      await store.write('pending-publish');

      await store.write('clean');

      expect(existsSync(sentinel)).toBe(false);
      expect(await store.read()).toBe('clean');
    });

    it('should accept clean when already clean', async () => {
      const store = new FilePublishStateStore(sentinel);
      await store.write('clean');
      expect(await store.read()).toBe('clean');
    });
  });

  describe('MemoryPublishStateStore', () => {
    it('should start from the given state and record writes', async () => {
      const store = new MemoryPublishStateStore('pending-publish');

      await store.write('clean');

      expect(await store.read()).toBe('clean');
      expect(store.history).toEqual(['clean']);
    });
  });
});
