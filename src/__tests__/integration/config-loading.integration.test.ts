/**
 * Config loading integration tests
 *
 * Defaults, config file and environment layered through loadConfig
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, resolveFilePaths } from '../../core/config/index.js';
import { ConfigError } from '../../core/errors.js';

const ENV_KEYS = ['ARCHIVE_LEDGER_RATE_LIMIT_MS', 'ARCHIVE_LEDGER_UPLOAD_RETRIES'];

describe('Config Loading Integration', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'archive-ledger-config-'));
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should use defaults rooted at the working directory when there is no config file', async () => {
    const { config, configPath } = await loadConfig({ cwd: testDir, skipEnvFiles: true });

    expect(configPath).toBeNull();
    expect(config.workDir).toBe(testDir);
    expect(config.upload.maxFileSizeMB).toBe(500);
    expect(resolveFilePaths(config)).toEqual({
      ledger: join(testDir, 'uploaded.log'),
      failureLog: join(testDir, 'Failed.log'),
      pendingPublish: join(testDir, '.push_state'),
      site: join(testDir, 'index.html'),
    });
  });

  it('should layer the config file over defaults', async () => {
    writeFileSync(
      join(testDir, 'archive-ledger.config.ts'),
      `export default {
        upload: { maxFileSizeMB: 50, rateLimitMs: 2000 },
        files: { site: 'public/index.html' },
      };`
    );

    const { config, configPath } = await loadConfig({ cwd: testDir, skipEnvFiles: true });

    expect(configPath).toBe(join(testDir, 'archive-ledger.config.ts'));
    expect(config.upload).toMatchObject({ maxFileSizeMB: 50, rateLimitMs: 2000, uploadRetries: 2 });
    expect(resolveFilePaths(config).site).toBe(join(testDir, 'public/index.html'));
  });

  it('should layer environment variables over the config file', async () => {
    writeFileSync(
      join(testDir, 'archive-ledger.config.ts'),
      `export default { upload: { rateLimitMs: 2000 } };`
    );
    writeFileSync(join(testDir, '.env'), 'ARCHIVE_LEDGER_RATE_LIMIT_MS=0\nARCHIVE_LEDGER_UPLOAD_RETRIES=5\n');

    const { config, envFiles } = await loadConfig({ cwd: testDir });

    expect(envFiles).toEqual(['.env']);
    expect(config.upload.rateLimitMs).toBe(0);
    expect(config.upload.uploadRetries).toBe(5);
  });

  it('should load an explicit config path', async () => {
    writeFileSync(
      join(testDir, 'custom.config.ts'),
      `export default { publish: { pagesBranch: 'docs' } };`
    );

    const { config } = await loadConfig({
      cwd: testDir,
      configPath: 'custom.config.ts',
      skipEnvFiles: true,
    });

    expect(config.publish.pagesBranch).toBe('docs');
  });

  it('should reject invalid merged values', async () => {
    process.env.ARCHIVE_LEDGER_UPLOAD_RETRIES = 'lots';

    await expect(loadConfig({ cwd: testDir, skipEnvFiles: true })).rejects.toThrow(ConfigError);
  });
});
