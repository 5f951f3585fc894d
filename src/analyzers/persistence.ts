/**
 * Persistence analyzer.
 *
 * Checks ORM models for structural problems and compares them against the
 * table/column state replayed from Alembic revisions.
 */

import type { AnalysisContext } from './context.js';
import { FindingCollector } from './shared.js';
import type { ModelDecl, ModelField } from '../flask/models.js';
import type { IssueDraft } from '../types/issue.js';

const USER_MODEL_RE = /(User|Account|Member)$/;
const PASSWORD_FIELD_RE = /pass|pwd/i;

/** Final segment of a relationship target (`app.models.User` -> `User`) */
export function targetClass(target: string): string {
  return target.split('.').pop() ?? target;
}

/**
 * Attribute names available on each model, including backrefs other models
 * declare onto it.
 */
function attributeNames(models: readonly ModelDecl[]): Map<string, Set<string>> {
  const names = new Map<string, Set<string>>();
  for (const model of models) names.set(model.className, new Set(model.fields.map((f) => f.name)));
  for (const model of models) {
    for (const field of model.fields) {
      if (field.kind !== 'relationship' || !field.target || !field.backref) continue;
      names.get(targetClass(field.target))?.add(field.backref);
    }
  }
  return names;
}

/**
 * Whether an attribute satisfies a required field name: exact, or a
 * `<name>_` prefixed column such as `password_hash` or `author_id`.
 */
export function satisfiesField(attributes: ReadonlySet<string>, required: string): boolean {
  if (attributes.has(required)) return true;
  for (const name of attributes) if (name.startsWith(`${required}_`)) return true;
  return false;
}

function columnData(field: ModelField): Record<string, unknown> {
  return {
    column: field.columnName,
    typeExpression: field.columnTypeExpression,
    primaryKey: field.primaryKey,
    foreignKey: field.foreignKey,
    nullable: field.nullable,
  };
}

export async function analyzePersistence(ctx: AnalysisContext): Promise<IssueDraft[]> {
  const findings = new FindingCollector(ctx.ruleset);
  const index = await ctx.index();
  const { project, ruleset } = ctx;
  const models = index.models;
  const byClass = new Map(models.map((m) => [m.className, m]));
  const attributes = attributeNames(models);

  for (const model of models) {
    const classSpan = { file: model.file, startLine: model.classDef.line, endLine: model.classDef.endLine };
    const columns = model.fields.filter((f) => f.kind === 'column');

    if (columns.length === 0) {
      findings.add({
        rule: 'persistence/empty-model',
        signature: `empty-model:${model.className}`,
        location: classSpan,
        description: `Model ${model.className} declares no columns`,
      });
    }

    if (USER_MODEL_RE.test(model.className) && !model.fields.some((f) => PASSWORD_FIELD_RE.test(f.name))) {
      findings.add({
        rule: 'persistence/user-model-without-password',
        signature: `user-model-without-password:${model.className}`,
        location: classSpan,
        description: `Model ${model.className} looks like a user account but stores no password`,
        data: { className: model.className, field: 'password_hash' },
      });
    }

    for (const field of model.fields) {
      if (field.kind !== 'relationship' || !field.target) continue;
      const fieldSpan = { file: model.file, startLine: field.assignment.line, endLine: field.assignment.endLine };
      const targetName = targetClass(field.target);
      const target = byClass.get(targetName);
      if (!target) {
        findings.add({
          rule: 'persistence/unknown-relationship-target',
          signature: `unknown-relationship-target:${model.className}.${field.name}`,
          location: fieldSpan,
          description: `${model.className}.${field.name} relates to unknown model '${field.target}'`,
        });
        continue;
      }
      if (!field.backPopulates) continue;
      const mirror = target.fields.find((f) => f.name === field.backPopulates);
      if (mirror && mirror.kind === 'relationship' && mirror.backPopulates === field.name) continue;
      findings.add({
        rule: 'persistence/asymmetric-relationship',
        signature: `asymmetric-relationship:${model.className}.${field.name}`,
        location: fieldSpan,
        description: mirror
          ? `${targetName}.${field.backPopulates} does not back-populate ${model.className}.${field.name}`
          : `${model.className}.${field.name} back-populates ${targetName}.${field.backPopulates}, which does not exist`,
        data: {
          className: model.className,
          field: field.name,
          target: targetName,
          targetField: field.backPopulates,
          mirrorMissing: !mirror,
        },
      });
    }
  }

  // Migration state
  if (models.length > 0) {
    const migrations = index.migrations;
    if (!project.usesMigrationTool && migrations.revisions.length === 0) {
      const first = models[0];
      findings.add({
        rule: 'persistence/no-migration-tooling',
        signature: 'no-migration-tooling',
        location: { file: first.file, startLine: 1, endLine: 1 },
        description: `${models.length} model(s) found but no migration tooling (Flask-Migrate or Alembic) is configured`,
      });
    } else {
      for (const model of models) {
        const columns = model.fields.filter((f) => f.kind === 'column');
        const tableColumns = migrations.tables.get(model.tableName);
        if (!tableColumns) {
          if (columns.length === 0) continue;
          findings.add({
            rule: 'persistence/missing-table-migration',
            signature: `missing-table-migration:${model.tableName}`,
            location: { file: model.file, startLine: model.classDef.line, endLine: model.classDef.endLine },
            description: `Table '${model.tableName}' for model ${model.className} is never created by a migration`,
            data: { table: model.tableName, className: model.className, columns: columns.map(columnData) },
          });
          continue;
        }
        for (const field of columns) {
          if (tableColumns.has(field.columnName)) continue;
          findings.add({
            rule: 'persistence/missing-migration',
            signature: `missing-migration:${model.tableName}.${field.columnName}`,
            location: { file: model.file, startLine: field.assignment.line, endLine: field.assignment.endLine },
            description: `Column ${model.tableName}.${field.columnName} (${model.className}.${field.name}) has no migration`,
            data: { table: model.tableName, className: model.className, ...columnData(field) },
          });
        }
      }
    }
  }

  // Preset requirements
  const primary = project.modelModules[0] ?? project.entryPoint.file;
  for (const className of ruleset.requirements.requiredModels) {
    if (byClass.has(className)) continue;
    findings.add({
      rule: 'persistence/required-model',
      signature: `required-model:${className}`,
      location: { file: primary, startLine: 1, endLine: 1 },
      description: `Model ${className} required by preset '${ruleset.presetName ?? 'custom'}' is not defined`,
      data: { className },
    });
  }
  for (const [className, fields] of Object.entries(ruleset.requirements.requiredFields)) {
    const model = byClass.get(className);
    if (!model) continue;
    const available = attributes.get(className) ?? new Set<string>();
    for (const field of fields) {
      if (satisfiesField(available, field)) continue;
      findings.add({
        rule: 'persistence/required-field',
        signature: `required-field:${className}.${field}`,
        location: { file: model.file, startLine: model.classDef.line, endLine: model.classDef.line },
        description: `Model ${className} lacks field '${field}' required by preset '${ruleset.presetName ?? 'custom'}'`,
        data: { className, field },
      });
    }
  }

  return findings.results();
}
