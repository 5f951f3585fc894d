/**
 * CLI commands index
 * Exports all command creators
 */

export { createRunCommand, EXIT_CODES } from './run.js';
export { createDetectCommand } from './detect.js';
export { createDiagnoseCommand } from './diagnose.js';
export { createRollbackCommand } from './rollback.js';
export { createPresetsCommand } from './presets.js';
export { createReportCommand } from './report.js';
