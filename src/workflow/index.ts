/**
 * Healing workflow module
 */

export * from './state-machine.js';
export * from './healing-logger.js';
export * from './file-locks.js';
export * from './fix-applier.js';
export * from './run-report.js';
export * from './rollback.js';
export * from './orchestrator.js';
