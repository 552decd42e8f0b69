import { describe, it, expect } from '@jest/globals';
import { mergeConfigs } from '../../../core/config/merger.js';

describe('Config Merger', () => {
  it('should let later layers win field by field', () => {
    const merged = mergeConfigs(
      { workDir: '/base', upload: { maxFileSizeMB: 100, rateLimitMs: 1000 } },
      { upload: { rateLimitMs: 0 }, publish: { pagesBranch: 'docs' } }
    );

    expect(merged).toEqual({
      workDir: '/base',
      credentials: {},
      archive: {},
      upload: { maxFileSizeMB: 100, rateLimitMs: 0 },
      files: {},
      publish: { pagesBranch: 'docs' },
    });
  });

  it('should override the work directory', () => {
    expect(mergeConfigs({ workDir: '/a' }, { workDir: '/b' }).workDir).toBe('/b');
  });

  it('should keep credentials from an earlier layer when a later one has none', () => {
    const merged = mergeConfigs(
      { credentials: { accessKey: 'test-access', secretKey: 'test-secret' } },
      { upload: { uploadRetries: 5 } }
    );

    expect(merged.credentials).toEqual({ accessKey: 'test-access', secretKey: 'test-secret' });
  });
});
