/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';
import { RuleOverridesSchema } from '../types/rules.js';

/**
 * Console output settings schema
 */
export const OutputSettingsSchema = z.object({
  verbose: z.boolean().default(false),
  /** Print orchestrator transitions as NDJSON */
  events: z.boolean().default(false),
  /** Write JSON and Markdown run reports under `<stateDir>/reports` */
  writeReports: z.boolean().default(true),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  rootPath: z.string().default('.'),
  /** Built-in preset name or path to a YAML/JSON preset file */
  preset: z.string().nullable().default(null),
  maxIterations: z.number().int().min(1).max(20).default(3),
  simulateAuth: z.boolean().default(true),
  sandboxTimeoutMs: z.number().int().min(100).default(30_000),
  ruleOverrides: RuleOverridesSchema.default({}),
  minConfidence: z.number().min(0).max(1).default(0.3),
  pythonExecutable: z.string().min(1).default('python3'),
  stateDir: z.string().min(1).default('.mender'),
  dryRun: z.boolean().default(false),
  maxLineLength: z.number().int().min(40).default(120),
  output: OutputSettingsSchema.default({
    verbose: false,
    events: false,
    writeReports: true,
  }),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;

/**
 * Shape accepted from files, env and flags before defaults are applied
 */
export type ConfigInput = z.input<typeof ConfigSchema>;
