import { describe, it, expect, beforeAll, beforeEach, afterEach, jest } from '@jest/globals';
import chalk from 'chalk';
import { ConsoleReporter, formatDuration } from '../../../cli/utils/reporter.js';
import { PublishConfigError, PublishError } from '../../../core/errors.js';
import type { WorkItem } from '../../../types/scanner.js';

const item: WorkItem = {
  absolutePath: '/tmp/files/a.txt',
  relativePath: 'a.txt',
  contentHash: 'h1',
  size: 5,
};

describe('Console Reporter', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  describe('formatDuration', () => {
    it('should format seconds, minutes and hours', () => {
      expect(formatDuration(0)).toBe('0s');
      expect(formatDuration(4.2)).toBe('5s');
      expect(formatDuration(125)).toBe('2m 5s');
      expect(formatDuration(3725)).toBe('1h 2m 5s');
    });

    it('should show an unknown estimate for infinite durations', () => {
      expect(formatDuration(Infinity)).toBe('unknown');
    });
  });

  describe('onEvent (non-interactive)', () => {
    let reporter: ConsoleReporter;

    const captureConsole = () => ({
      log: jest.spyOn(console, 'log').mockImplementation(() => undefined),
      error: jest.spyOn(console, 'error').mockImplementation(() => undefined),
    });

    beforeEach(() => {
      reporter = new ConsoleReporter(false);
    });

    afterEach(() => {
      reporter.dispose();
      jest.restoreAllMocks();
    });

    it('should print one line per upload step', () => {
      const { log } = captureConsole();
      reporter.onEvent({ type: 'upload', event: { type: 'start', item, index: 1, total: 2 } });
      reporter.onEvent({
        type: 'upload',
        event: { type: 'attempt-failed', item, attempt: 1, error: new Error('HTTP 503'), delayMs: 5000 },
      });
      reporter.onEvent({ type: 'upload', event: { type: 'succeeded', item, index: 1, total: 2 } });

      expect(log).toHaveBeenNthCalledWith(1, 'ℹ', 'Uploading (1/2): a.txt');
      expect(log).toHaveBeenNthCalledWith(2, '⚠', 'Attempt 1 failed for a.txt: HTTP 503. Retrying in 5s');
      expect(log).toHaveBeenNthCalledWith(3, '✓', 'Uploaded a.txt');
    });

    it('should print final failures as errors', () => {
      const { error } = captureConsole();
      reporter.onEvent({ type: 'upload', event: { type: 'failed', item, error: new Error('boom') } });

      expect(error).toHaveBeenCalledWith('✗', 'Final upload failure for a.txt: boom');
    });

    it('should print remote hints for publish misconfiguration', () => {
      const { log, error } = captureConsole();
      reporter.onEvent({
        type: 'publish-failed',
        error: new PublishConfigError("No Git remote named 'origin' found", ['git init']),
      });

      expect(error).toHaveBeenCalledWith('✗', "No Git remote named 'origin' found");
      expect(log).toHaveBeenCalledWith('  git init');
    });

    it('should explain that a failed push will be offered again', () => {
      const { log, error } = captureConsole();
      reporter.onEvent({ type: 'publish-failed', error: new PublishError('Publishing failed: denied') });

      expect(error).toHaveBeenCalledWith('✗', 'Publishing failed: denied');
      expect(log).toHaveBeenCalledWith('ℹ', 'The site will be offered for publishing on the next run');
    });
  });
});
