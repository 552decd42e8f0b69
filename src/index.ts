/**
 * archive-ledger - Internet Archive uploads with a GitHub Pages index
 *
 * Main library exports
 */

// Export types
export * from './types/config.js';
export * from './types/ledger.js';
export * from './types/scanner.js';
export * from './types/uploader.js';
export * from './types/publish.js';
export * from './types/workflow.js';

// Export core functionality
export * from './core/errors.js';
export * from './core/config/index.js';
export * from './core/ledger/index.js';
export * from './core/scanner/index.js';
export * from './core/archive/index.js';
export * from './core/uploader/index.js';
export * from './core/publisher/index.js';
export * from './core/workflow/index.js';
export { withRetry, sleep, RetryExhaustedError } from './core/utils/retry.js';
export type { RetryOptions } from './core/utils/retry.js';
