import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ensureGitignoreEntries, missingGitignoreEntries } from '../../../core/utils/gitignore.js';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

describe('Gitignore', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'archive-ledger-gitignore-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should do nothing outside a git repository', () => {
    expect(ensureGitignoreEntries(['.push_state'], testDir, true)).toEqual([]);
    expect(existsSync(join(testDir, '.gitignore'))).toBe(false);
  });

  it('should create .gitignore with the entries', () => {
    mkdirSync(join(testDir, '.git'));

    const added = ensureGitignoreEntries(['.push_state', 'Failed.log'], testDir, true);

    expect(added).toEqual(['.push_state', 'Failed.log']);
    expect(readFileSync(join(testDir, '.gitignore'), 'utf-8')).toBe(
      '# archive-ledger local state\n.push_state\nFailed.log\n'
    );
  });

  it('should append only the missing entries', () => {
    mkdirSync(join(testDir, '.git'));
    writeFileSync(join(testDir, '.gitignore'), 'node_modules\n/.push_state');

    const added = ensureGitignoreEntries(['.push_state', 'Failed.log'], testDir, true);

    expect(added).toEqual(['Failed.log']);
    expect(readFileSync(join(testDir, '.gitignore'), 'utf-8')).toBe(
      'node_modules\n/.push_state\n\n# archive-ledger local state\nFailed.log\n'
    );
  });

  it('should report every entry missing when there is no .gitignore', () => {
    expect(missingGitignoreEntries(join(testDir, '.gitignore'), ['a', 'b'])).toEqual(['a', 'b']);
  });
});
