// Re-export everything
export * from './index';

// Test utilities (below)
export { TestHarness, HARNESS_EPOCH, type TestHarnessOptions } from './test/harness';
export * from './test/handlers';
export * from './test/flows';
