/**
 * Persistence corrector: writes Alembic revisions for unmigrated tables and
 * columns, and adds missing model fields and relationship mirrors.
 */

import { createHash } from 'node:crypto';
import {
  dataBoolean,
  dataRecords,
  dataString,
  isInside,
  plannedEdit,
  type Corrector,
  type CorrectorContext,
} from './corrector.js';
import type { ModelDecl } from '../flask/models.js';
import type { Issue } from '../types/issue.js';
import type { PlannedFix } from '../types/fix.js';

// ---------------------------------------------------------------------------
// Column types
// ---------------------------------------------------------------------------

const NAME_TYPES: Array<{ pattern: RegExp; type: string }> = [
  { pattern: /pass|pwd/, type: 'db.String(255)' },
  { pattern: /^(is_|has_)|^(active|enabled|published|visible)$/, type: 'db.Boolean, default=False' },
  { pattern: /(^|_)(date|time|at)$|^(created|updated|timestamp)/, type: 'db.DateTime' },
  { pattern: /(price|total|amount|cost|balance)/, type: 'db.Numeric(10, 2)' },
  { pattern: /(stock|count|quantity|qty|position|order)$/, type: 'db.Integer' },
  { pattern: /(content|description|body|text|bio|summary)/, type: 'db.Text' },
  { pattern: /(email)/, type: 'db.String(120)' },
];

/**
 * Column declaration for a field inferred from its name.
 */
export function inferColumnType(field: string): string {
  for (const { pattern, type } of NAME_TYPES) {
    if (pattern.test(field)) return type;
  }
  return 'db.String(255)';
}

/**
 * Convert a model column type (`db.String(80)`, `Integer`) to its Alembic
 * form (`sa.String(80)`, `sa.Integer()`).
 */
export function toAlembicType(expression: string | null): string {
  if (!expression) return 'sa.String()';
  const bare = expression.trim().replace(/^(?:db|sa|sqlalchemy)\./, '');
  if (!/^[A-Z]\w*/.test(bare)) return 'sa.String()';
  return `sa.${/\(/.test(bare) ? bare : `${bare}()`}`;
}

// ---------------------------------------------------------------------------
// Revision files
// ---------------------------------------------------------------------------

export interface RevisionColumn {
  column: string;
  typeExpression: string | null;
  primaryKey: boolean;
  foreignKey: string | null;
  nullable: boolean;
}

function columnRecord(record: Record<string, unknown>): RevisionColumn | null {
  if (typeof record.column !== 'string') return null;
  return {
    column: record.column,
    typeExpression: typeof record.typeExpression === 'string' ? record.typeExpression : null,
    primaryKey: record.primaryKey === true,
    foreignKey: typeof record.foreignKey === 'string' ? record.foreignKey : null,
    nullable: record.nullable !== false,
  };
}

function saColumn(col: RevisionColumn, forceNullable: boolean): string {
  const parts = [`'${col.column}'`, toAlembicType(col.typeExpression)];
  if (col.foreignKey) parts.push(`sa.ForeignKey('${col.foreignKey}')`);
  if (col.primaryKey) parts.push('primary_key=True');
  else parts.push(`nullable=${forceNullable || col.nullable ? 'True' : 'False'}`);
  return `sa.Column(${parts.join(', ')})`;
}

/** Revision id derived from the issue so re-planning is deterministic */
export function revisionId(issueId: string): string {
  return createHash('sha256').update(issueId).digest('hex').slice(0, 12);
}

function pyDownRevision(heads: readonly string[]): string {
  if (heads.length === 0) return 'None';
  if (heads.length === 1) return `'${heads[0]}'`;
  return `(${heads.map((h) => `'${h}'`).join(', ')})`;
}

function revisesLine(heads: readonly string[]): string {
  return `Revises: ${heads.join(', ')}`;
}

function downRevisionLine(heads: readonly string[]): string {
  return `down_revision = ${pyDownRevision(heads)}`;
}

export interface RevisionSpec {
  revision: string;
  downRevisions: readonly string[];
  message: string;
  createDate: Date;
  upgrade: string[];
  downgrade: string[];
}

/**
 * Source of an Alembic revision file.
 */
export function renderRevision(spec: RevisionSpec): string {
  const body = (lines: string[]): string => lines.map((l) => `    ${l}`).join('\n');
  return [
    `"""${spec.message}`,
    '',
    `Revision ID: ${spec.revision}`,
    revisesLine(spec.downRevisions),
    `Create Date: ${spec.createDate.toISOString()}`,
    '',
    '"""',
    'from alembic import op',
    'import sqlalchemy as sa',
    '',
    '',
    '# revision identifiers, used by Alembic.',
    `revision = '${spec.revision}'`,
    downRevisionLine(spec.downRevisions),
    'branch_labels = None',
    'depends_on = None',
    '',
    '',
    'def upgrade():',
    body(spec.upgrade),
    '',
    '',
    'def downgrade():',
    body(spec.downgrade),
    '',
  ].join('\n');
}

function slug(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_|_$/g, '').slice(0, 40);
}

function planRevision(
  issue: Issue,
  ctx: CorrectorContext,
  message: string,
  upgrade: string[],
  downgrade: string[]
): PlannedFix {
  const revision = revisionId(issue.id);
  const file = `${ctx.analysis.versionsDir()}/${revision}_${slug(message)}.py`;
  const content = renderRevision({
    revision,
    downRevisions: ctx.migrationHeads,
    message,
    createDate: ctx.now,
    upgrade,
    downgrade,
  });
  return plannedEdit(issue, 'persistence', file, null, [{ start: 0, end: 0, replacement: content }], message);
}

/**
 * Links revisions written in one pass into a single line of history.
 *
 * Each revision is planned on top of the heads on disk. As revisions are
 * written, `rechain` points the next one at the last revision that actually
 * reached disk, so a revision that was rejected or failed to write is never
 * named as a `down_revision`.
 */
export class RevisionChain {
  private heads: readonly string[];

  constructor(
    private readonly versionsDir: string,
    heads: readonly string[]
  ) {
    this.heads = heads;
  }

  get currentHeads(): readonly string[] {
    return this.heads;
  }

  /** Whether the plan creates a new revision file */
  owns(plan: PlannedFix): boolean {
    return (
      plan.corrector === 'persistence' &&
      plan.baseContent === null &&
      plan.edits.length === 1 &&
      isInside(plan.file, [this.versionsDir])
    );
  }

  /** The plan with its revision pointed at the current heads */
  rechain(plan: PlannedFix): PlannedFix {
    if (!this.owns(plan)) return plan;
    const edits = plan.edits.map((edit) => ({
      ...edit,
      replacement: edit.replacement
        .replace(/^Revises: .*$/m, () => revisesLine(this.heads))
        .replace(/^down_revision = .*$/m, () => downRevisionLine(this.heads)),
    }));
    return { ...plan, edits };
  }

  /** Record a revision file as written */
  advance(plan: PlannedFix): void {
    if (!this.owns(plan)) return;
    const revision = /^revision = '([^']+)'$/m.exec(plan.edits[0]?.replacement ?? '');
    if (revision) this.heads = [revision[1]];
  }
}

async function planMissingTable(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const table = dataString(issue, 'table');
  const columns = dataRecords(issue, 'columns')
    .map(columnRecord)
    .filter((c): c is RevisionColumn => c !== null);
  if (!table || columns.length === 0) return null;
  const upgrade = [
    `op.create_table('${table}',`,
    ...columns.map((c) => `    ${saColumn(c, false)},`),
    ')',
  ];
  return planRevision(issue, ctx, `create ${table} table`, upgrade, [`op.drop_table('${table}')`]);
}

async function planMissingColumn(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const table = dataString(issue, 'table');
  const column = issue.data ? columnRecord(issue.data) : null;
  if (!table || !column) return null;
  return planRevision(
    issue,
    ctx,
    `add ${table}.${column.column}`,
    [`op.add_column('${table}', ${saColumn(column, true)})`],
    [`op.drop_column('${table}', '${column.column}')`]
  );
}

// ---------------------------------------------------------------------------
// Model edits
// ---------------------------------------------------------------------------

function findModel(ctx: CorrectorContext, className: string | null): ModelDecl | undefined {
  return className ? ctx.index.models.find((m) => m.className === className) : undefined;
}

/**
 * Planned insertion of one attribute line at the end of a model class body.
 */
function appendToClass(issue: Issue, ctx: CorrectorContext, model: ModelDecl, line: string, description: string): PlannedFix | null {
  const module = ctx.index.modules.get(model.file);
  const indent = model.classDef.bodyIndentText;
  if (!module || indent === null) return null;
  const at = model.classDef.endOffset;
  return plannedEdit(issue, 'persistence', model.file, module.source, [{ start: at, end: at, replacement: `\n${indent}${line}` }], description);
}

/** Whether the model is declared in the Flask-SQLAlchemy `db.` style */
function usesDbStyle(model: ModelDecl): boolean {
  return model.classDef.bases.some((b) => b.startsWith('db.')) || model.fields.some((f) => /^db\./.test(f.assignment.value));
}

async function planAddField(issue: Issue, ctx: CorrectorContext, fieldName: string | null): Promise<PlannedFix | null> {
  const model = findModel(ctx, dataString(issue, 'className'));
  if (!model || !fieldName || !/^[A-Za-z_]\w*$/.test(fieldName)) return null;
  if (model.fields.some((f) => f.name === fieldName)) return null;

  const related = ctx.index.models.find((m) => m.className.toLowerCase() === fieldName.toLowerCase());
  if (!usesDbStyle(model)) return null;
  if (related) {
    const pk = related.fields.find((f) => f.primaryKey)?.columnName ?? 'id';
    const column = `${fieldName}_id`;
    if (model.fields.some((f) => f.name === column)) return null;
    return appendToClass(
      issue,
      ctx,
      model,
      `${column} = db.Column(db.Integer, db.ForeignKey('${related.tableName}.${pk}'))`,
      `Add ${model.className}.${column} referencing ${related.className}`
    );
  }
  if (ctx.index.models.some((m) => `${m.className.toLowerCase()}s` === fieldName.toLowerCase() || `${m.className.toLowerCase()}es` === fieldName.toLowerCase())) {
    return null;
  }
  const type = inferColumnType(fieldName);
  return appendToClass(issue, ctx, model, `${fieldName} = db.Column(${type})`, `Add column ${model.className}.${fieldName}`);
}

async function planRelationshipMirror(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  if (!dataBoolean(issue, 'mirrorMissing')) return null;
  const source = dataString(issue, 'className');
  const field = dataString(issue, 'field');
  const target = findModel(ctx, dataString(issue, 'target'));
  const targetField = dataString(issue, 'targetField');
  if (!source || !field || !target || !targetField) return null;
  if (target.fields.some((f) => f.name === targetField)) return null;
  if (!usesDbStyle(target)) return null;
  return appendToClass(
    issue,
    ctx,
    target,
    `${targetField} = db.relationship('${source}', back_populates='${field}')`,
    `Add ${target.className}.${targetField} mirroring ${source}.${field}`
  );
}

export const persistenceCorrector: Corrector = {
  category: 'persistence',

  canWrite(file, ctx) {
    const { project } = ctx.analysis;
    return project.modelModules.includes(file) || isInside(file, [ctx.analysis.versionsDir(), ...project.migrationDirs]);
  },

  async plan(issue, ctx) {
    switch (issue.rule) {
      case 'persistence/missing-table-migration':
        return planMissingTable(issue, ctx);
      case 'persistence/missing-migration':
        return planMissingColumn(issue, ctx);
      case 'persistence/asymmetric-relationship':
        return planRelationshipMirror(issue, ctx);
      case 'persistence/user-model-without-password':
      case 'persistence/required-field':
        return planAddField(issue, ctx, dataString(issue, 'field'));
      default:
        return null;
    }
  },
};
