export * from './sandbox.js';
export * from './harness.js';
export * from './failure-attribution.js';
export * from './validation-runner.js';
