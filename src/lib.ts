/**
 * flask-mender library entry point
 */

export * from './types/index.js';
export { loadConfig, parseConfig, resolveStateDir, ConfigSchema } from './config/index.js';
export type { Config, ConfigInput } from './config/index.js';
export { detectProject } from './detection/project-detector.js';
export { ANALYZERS, AnalysisContext, RULE_CATALOG, runAnalyzers } from './analyzers/index.js';
export type { Analyzer, AnalysisResult } from './analyzers/index.js';
export { CORRECTORS, planFixes } from './correctors/index.js';
export type { Corrector, CorrectorContext, PlanningResult } from './correctors/index.js';
export { PresetManager, BUILTIN_PRESETS } from './presets/preset-manager.js';
export * from './state/index.js';
export * from './validation/index.js';
export * from './workflow/index.js';
