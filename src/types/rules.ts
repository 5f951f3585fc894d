/**
 * Ruleset and preset type definitions.
 */
import { z } from 'zod';
import { IssueSeveritySchema, type IssueCategory, type IssueSeverity } from './issue.js';

export const RuleOverrideSchema = z.object({
  enabled: z.boolean().optional(),
  severity: IssueSeveritySchema.optional(),
});
export type RuleOverride = z.infer<typeof RuleOverrideSchema>;

/**
 * Keys are either an exact rule id (`routing/missing-return`) or a category
 * wildcard (`routing/*`).
 */
export const RuleOverridesSchema = z.record(z.string(), RuleOverrideSchema);
export type RuleOverrides = z.infer<typeof RuleOverridesSchema>;

export const PresetRequirementsSchema = z.object({
  requiredRoutes: z.array(z.string()).default([]),
  recommendedRoutes: z.array(z.string()).default([]),
  requiredTemplates: z.array(z.string()).default([]),
  recommendedTemplates: z.array(z.string()).default([]),
  requiredModels: z.array(z.string()).default([]),
  requiredFields: z.record(z.string(), z.array(z.string())).default({}),
});
export type PresetRequirements = z.infer<typeof PresetRequirementsSchema>;

export const PresetSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  rules: RuleOverridesSchema.default({}),
  requirements: PresetRequirementsSchema.default({}),
});
export type Preset = z.infer<typeof PresetSchema>;

export interface RuleDefinition {
  id: string;
  category: IssueCategory;
  severity: IssueSeverity;
  enabled: boolean;
  description: string;
}

export interface RuleSetting {
  enabled: boolean;
  severity: IssueSeverity;
}

/**
 * The merged ruleset analyzers run against.
 */
export interface ResolvedRuleset {
  presetName: string | null;
  rules: Readonly<Record<string, RuleSetting>>;
  requirements: PresetRequirements;
  maxLineLength: number;
  minConfidence: number;
  /** Override keys that name no known rule or category */
  unknownOverrideKeys: string[];
}

export function emptyRequirements(): PresetRequirements {
  return {
    requiredRoutes: [],
    recommendedRoutes: [],
    requiredTemplates: [],
    recommendedTemplates: [],
    requiredModels: [],
    requiredFields: {},
  };
}
