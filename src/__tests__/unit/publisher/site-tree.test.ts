import { describe, it, expect } from '@jest/globals';
import { buildSiteTree, downloadUrl } from '../../../core/publisher/site-tree.js';
import type { LedgerEntry } from '../../../types/ledger.js';

const BASE = 'https://archive.org/download';

const entry = (uploader: string, itemId: string, relativePath: string): LedgerEntry => ({
  itemId,
  uploader,
  relativePath,
  contentHash: `hash-${relativePath}`,
  timestamp: '2024-01-02T03:04:05.000Z',
});

describe('Site tree', () => {
  it('should build download URLs', () => {
    expect(downloadUrl(BASE, 'item1', 'a/b.txt')).toBe('https://archive.org/download/item1/a/b.txt');
    expect(downloadUrl(`${BASE}//`, 'item1', 'x.txt')).toBe('https://archive.org/download/item1/x.txt');
  });

  it('should nest files under uploader and folders', () => {
    const tree = buildSiteTree(
      [entry('alice', 'item1', 'a/b.txt'), entry('alice', 'item1', 'a/c.txt')],
      BASE
    );

    expect(tree).toEqual({
      alice: {
        a: {
          'b.txt': 'https://archive.org/download/item1/a/b.txt',
          'c.txt': 'https://archive.org/download/item1/a/c.txt',
        },
      },
    });
  });

  it('should keep uploaders apart', () => {
    const tree = buildSiteTree(
      [entry('alice', 'item1', 'x.txt'), entry('bob', 'item2', 'x.txt')],
      BASE
    );

    expect(Object.keys(tree)).toEqual(['alice', 'bob']);
    expect(tree.bob).toEqual({ 'x.txt': 'https://archive.org/download/item2/x.txt' });
  });

  it('should let a later entry for the same path win', () => {
    const tree = buildSiteTree(
      [entry('alice', 'item1', 'x.txt'), entry('alice', 'item2', 'x.txt')],
      BASE
    );

    expect(tree.alice).toEqual({ 'x.txt': 'https://archive.org/download/item2/x.txt' });
  });

  it('should return an empty tree for an empty ledger', () => {
    expect(buildSiteTree([], BASE)).toEqual({});
  });
});
