/**
 * Project model type definitions.
 *
 * The structural model produced by the detector: entry point, architecture
 * pattern, module sets and per-field confidence scores.
 */
import { z } from 'zod';

export const ArchitecturePatternSchema = z.enum(['monolithic', 'factory', 'blueprint', 'unknown']);
export type ArchitecturePattern = z.infer<typeof ArchitecturePatternSchema>;

export const EntryPointSchema = z.object({
  file: z.string(),
  /** Factory function name or module-level app variable */
  symbol: z.string(),
  kind: z.enum(['factory', 'instance']),
  line: z.number().int(),
});
export type EntryPoint = z.infer<typeof EntryPointSchema>;

export const BlueprintDeclSchema = z.object({
  file: z.string(),
  variable: z.string(),
  name: z.string().optional(),
  urlPrefix: z.string().optional(),
  line: z.number().int(),
});
export type BlueprintDecl = z.infer<typeof BlueprintDeclSchema>;

export const AuthMechanismSchema = z.object({
  kind: z.enum(['flask_login', 'jwt', 'session']),
  file: z.string(),
  /** Endpoint path of the login route, when one was found */
  loginRoute: z.string().optional(),
});
export type AuthMechanism = z.infer<typeof AuthMechanismSchema>;

export const DatabaseKindSchema = z.enum(['sqlite', 'postgresql', 'mysql', 'mongodb', 'unknown_sql']);
export type DatabaseKind = z.infer<typeof DatabaseKindSchema>;

export const ConfidenceFieldSchema = z.enum([
  'entryPoint',
  'architecturePattern',
  'routeModules',
  'templateDirs',
  'modelModules',
]);
export type ConfidenceField = z.infer<typeof ConfidenceFieldSchema>;

export const ProjectModelSchema = z.object({
  root: z.string(),
  entryPoint: EntryPointSchema,
  architecturePattern: ArchitecturePatternSchema,
  routeModules: z.array(z.string()),
  templateDirs: z.array(z.string()),
  modelModules: z.array(z.string()),
  staticDirs: z.array(z.string()),
  migrationDirs: z.array(z.string()),
  sourceFiles: z.array(z.string()),
  blueprints: z.array(BlueprintDeclSchema),
  authMechanism: AuthMechanismSchema.nullable(),
  database: z.object({ kind: DatabaseKindSchema, file: z.string() }).nullable(),
  usesMigrationTool: z.boolean(),
  confidence: z.object({
    entryPoint: z.number().min(0).max(1),
    architecturePattern: z.number().min(0).max(1),
    routeModules: z.number().min(0).max(1),
    templateDirs: z.number().min(0).max(1),
    modelModules: z.number().min(0).max(1),
  }),
});
export type ProjectModel = z.infer<typeof ProjectModelSchema>;

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * Read-only view handed to analyzers and correctors. The detector deep-freezes
 * the model at runtime as well.
 */
export type FrozenProjectModel = DeepReadonly<ProjectModel>;

/**
 * Recursively freeze a value in place.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
