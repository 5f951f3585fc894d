/**
 * SQLAlchemy model extraction.
 */

import {
  findCalls,
  keywordArgument,
  positionalArgument,
  stringLiteral,
  type Assignment,
  type ClassDef,
  type PythonModule,
} from '../parsers/python-source.js';

export type ModelFieldKind = 'column' | 'relationship';

export interface ModelField {
  /** Attribute name on the class */
  name: string;
  kind: ModelFieldKind;
  /** Database column name (explicit first argument, else the attribute) */
  columnName: string;
  /** Column type name (`String`, `Integer`, ...), when recognizable */
  columnType: string | null;
  /** Raw type argument as written (`db.String(80)`) */
  columnTypeExpression: string | null;
  nullable: boolean;
  primaryKey: boolean;
  foreignKey: string | null;
  /** Relationship target class */
  target: string | null;
  backPopulates: string | null;
  backref: string | null;
  assignment: Assignment;
}

export interface ModelDecl {
  file: string;
  className: string;
  tableName: string;
  fields: ModelField[];
  classDef: ClassDef;
}

const MODEL_BASE_RE = /(^|\.)(Model|Base)$/;
const DECLARATIVE_BASE_RE = /(^|\.)DeclarativeBase$/;
const COLUMN_RE = /^(?:db\.|sa\.|sqlalchemy\.|orm\.)?(Column|mapped_column)\s*\(/;
const RELATIONSHIP_RE = /^(?:db\.|orm\.|sqlalchemy\.orm\.)?relationship\s*\(/;

/**
 * Default table name for a model class: `OrderItem` -> `order_item`.
 */
export function defaultTableName(className: string): string {
  return className
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();
}

function typeName(expression: string): string | null {
  const match = /^(?:db\.|sa\.|sqlalchemy\.)?([A-Z]\w*)/.exec(expression.trim());
  return match ? match[1] : null;
}

function parseField(module: PythonModule, assignment: Assignment): ModelField | null {
  if (assignment.target.includes('.') || assignment.target.startsWith('__')) return null;
  const range = { start: assignment.valueOffset, end: assignment.endOffset };

  if (COLUMN_RE.test(assignment.value)) {
    const call = findCalls(module, '(?:db\\.|sa\\.|sqlalchemy\\.|orm\\.)?(?:Column|mapped_column)', range)[0];
    if (!call) return null;
    const first = positionalArgument(call, 0);
    const explicitName = first ? stringLiteral(first.value) : null;
    const typeArg = explicitName !== null ? positionalArgument(call, 1) : first;
    const fk = findCalls(module, '(?:db\\.|sa\\.|sqlalchemy\\.)?ForeignKey', {
      start: call.openParen,
      end: call.closeParen,
    })[0];
    const fkArg = fk ? positionalArgument(fk, 0) : undefined;
    const primary = keywordArgument(call, 'primary_key');
    return {
      name: assignment.target,
      kind: 'column',
      columnName: explicitName ?? assignment.target,
      columnType: typeArg && !typeArg.value.includes('ForeignKey') ? typeName(typeArg.value) : null,
      columnTypeExpression: typeArg && !typeArg.value.includes('ForeignKey') ? typeArg.value : null,
      nullable: keywordArgument(call, 'nullable')?.value !== 'False' && primary?.value !== 'True',
      primaryKey: primary?.value === 'True',
      foreignKey: fkArg ? stringLiteral(fkArg.value) : null,
      target: null,
      backPopulates: null,
      backref: null,
      assignment,
    };
  }

  if (RELATIONSHIP_RE.test(assignment.value)) {
    const call = findCalls(module, '(?:db\\.|orm\\.|sqlalchemy\\.orm\\.)?relationship', range)[0];
    if (!call) return null;
    const first = positionalArgument(call, 0);
    const target = first ? stringLiteral(first.value) ?? first.value.trim() : null;
    const backPopulates = keywordArgument(call, 'back_populates');
    const backrefArg = keywordArgument(call, 'backref');
    let backref: string | null = null;
    if (backrefArg) {
      backref = stringLiteral(backrefArg.value);
      const inner = /backref\s*\(\s*(['"])(\w+)\1/.exec(backrefArg.value);
      if (backref === null && inner) backref = inner[2];
    }
    return {
      name: assignment.target,
      kind: 'relationship',
      columnName: assignment.target,
      columnType: null,
      columnTypeExpression: null,
      nullable: true,
      primaryKey: false,
      foreignKey: null,
      target,
      backPopulates: backPopulates ? stringLiteral(backPopulates.value) : null,
      backref,
      assignment,
    };
  }

  return null;
}

/**
 * Whether a class looks like an ORM model.
 */
export function isModelClass(cls: ClassDef, knownModels: ReadonlySet<string> = new Set()): boolean {
  if (cls.assignments.some((a) => a.target === '__abstract__' && a.value === 'True')) return false;
  return cls.bases.some((base) => MODEL_BASE_RE.test(base) || knownModels.has(base));
}

/**
 * ORM models declared in a module.
 */
export function extractModels(module: PythonModule): ModelDecl[] {
  const models: ModelDecl[] = [];
  const known = new Set<string>();
  for (const cls of module.classes) {
    if (cls.bases.some((base) => DECLARATIVE_BASE_RE.test(base))) {
      known.add(cls.name);
      continue;
    }
    if (!isModelClass(cls, known)) continue;
    known.add(cls.name);
    const tableAssignment = cls.assignments.find((a) => a.target === '__tablename__');
    const explicitTable = tableAssignment ? stringLiteral(tableAssignment.value) : null;
    models.push({
      file: module.path,
      className: cls.name,
      tableName: explicitTable ?? defaultTableName(cls.name),
      fields: cls.assignments
        .map((assignment) => parseField(module, assignment))
        .filter((field): field is ModelField => field !== null),
      classDef: cls,
    });
  }
  return models;
}
