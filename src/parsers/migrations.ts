/**
 * Alembic migration state reader.
 *
 * Replays the `upgrade()` operations of every revision along the
 * down_revision chain to recover which tables and columns the migrations
 * create.
 */

import {
  findCalls,
  parsePythonModule,
  positionalArgument,
  stringLiteral,
  type CallSite,
  type PythonModule,
} from './python-source.js';

export type MigrationOperation =
  | { kind: 'create_table'; table: string; columns: string[] }
  | { kind: 'drop_table'; table: string }
  | { kind: 'add_column'; table: string; column: string }
  | { kind: 'drop_column'; table: string; column: string };

export interface MigrationRevision {
  /** Root-relative POSIX path */
  file: string;
  revision: string;
  /** Parent revisions; empty for a base revision */
  downRevisions: string[];
  operations: MigrationOperation[];
}

export interface MigrationState {
  revisions: MigrationRevision[];
  /** Revisions nothing descends from; normally exactly one */
  heads: string[];
  tables: Map<string, Set<string>>;
}

function columnName(call: CallSite): string | null {
  const first = positionalArgument(call, 0);
  return first ? stringLiteral(first.value) : null;
}

/**
 * `sa.Column('name', ...)` calls nested inside a create_table argument list.
 */
function nestedColumns(module: PythonModule, call: CallSite): string[] {
  return findCalls(module, '(?:sa\\.|sqlalchemy\\.)?Column', {
    start: call.openParen + 1,
    end: call.closeParen,
  })
    .map(columnName)
    .filter((name): name is string => name !== null);
}

function readRevisionId(module: PythonModule, name: string): string[] | null {
  const assignment = module.assignments.find((a) => a.target === name);
  if (!assignment) return null;
  const value = assignment.value.replace(/^\(|\)$/g, '');
  return value
    .split(',')
    .map((part) => stringLiteral(part.trim()))
    .filter((id): id is string => id !== null);
}

/**
 * Parse one Alembic revision file.
 */
export function parseMigrationRevision(file: string, source: string): MigrationRevision | null {
  const module = parsePythonModule(file, source);
  const revision = readRevisionId(module, 'revision')?.[0];
  if (!revision) return null;

  const upgrade = module.functions.find((fn) => fn.name === 'upgrade' && fn.indent === 0);
  const found: Array<{ at: number; op: MigrationOperation }> = [];
  const push = (at: number, op: MigrationOperation): void => {
    found.push({ at, op });
  };
  if (upgrade) {
    const range = {
      start: module.lineStarts[upgrade.line - 1],
      end: upgrade.endOffset,
    };

    for (const call of findCalls(module, 'op\\.create_table', range)) {
      const table = columnName(call);
      if (table) push(call.start, { kind: 'create_table', table, columns: nestedColumns(module, call) });
    }
    for (const call of findCalls(module, 'op\\.drop_table', range)) {
      const table = columnName(call);
      if (table) push(call.start, { kind: 'drop_table', table });
    }
    for (const call of findCalls(module, 'op\\.add_column', range)) {
      const table = columnName(call);
      const column = nestedColumns(module, call)[0];
      if (table && column) push(call.start, { kind: 'add_column', table, column });
    }
    for (const call of findCalls(module, 'op\\.drop_column', range)) {
      const table = columnName(call);
      const second = positionalArgument(call, 1);
      const column = second ? stringLiteral(second.value) : null;
      if (table && column) push(call.start, { kind: 'drop_column', table, column });
    }

    // with op.batch_alter_table('t') as batch_op: batch_op.add_column(...)
    for (const batch of findCalls(module, 'op\\.batch_alter_table', range)) {
      const table = columnName(batch);
      const alias = /^\s*as\s+(\w+)\s*:/.exec(module.masked.slice(batch.end));
      if (!table || !alias) continue;
      const header = module.logicalLines.find(
        (l) => l.startOffset <= batch.start && batch.start < l.endOffset
      );
      if (!header) continue;
      const after = module.logicalLines.filter((l) => l.startOffset > header.startOffset);
      const bodyEnd = after.find((l) => l.indent <= header.indent)?.startOffset ?? range.end;
      const body = { start: header.endOffset, end: Math.min(bodyEnd, range.end) };
      for (const call of findCalls(module, `${alias[1]}\\.add_column`, body)) {
        const column = nestedColumns(module, call)[0];
        if (column) push(call.start, { kind: 'add_column', table, column });
      }
      for (const call of findCalls(module, `${alias[1]}\\.drop_column`, body)) {
        const first = positionalArgument(call, 0);
        const column = first ? stringLiteral(first.value) : null;
        if (column) push(call.start, { kind: 'drop_column', table, column });
      }
    }
  }

  return {
    file,
    revision,
    downRevisions: readRevisionId(module, 'down_revision') ?? [],
    operations: found.sort((a, b) => a.at - b.at).map((entry) => entry.op),
  };
}

/**
 * Order revisions from base to heads. Revisions whose parents are unknown
 * are treated as bases; ties keep file order.
 */
export function orderRevisions(revisions: MigrationRevision[]): MigrationRevision[] {
  const byId = new Map(revisions.map((r) => [r.revision, r]));
  const ordered: MigrationRevision[] = [];
  const placed = new Set<string>();
  const sorted = [...revisions].sort((a, b) => a.file.localeCompare(b.file));

  let progress = true;
  while (ordered.length < sorted.length && progress) {
    progress = false;
    for (const rev of sorted) {
      if (placed.has(rev.revision)) continue;
      const ready = rev.downRevisions.every((parent) => placed.has(parent) || !byId.has(parent));
      if (ready) {
        ordered.push(rev);
        placed.add(rev.revision);
        progress = true;
      }
    }
  }
  // Cycles: append the rest in file order
  for (const rev of sorted) {
    if (!placed.has(rev.revision)) ordered.push(rev);
  }
  return ordered;
}

/**
 * Replay revisions into table/column state.
 */
export function buildMigrationState(revisions: MigrationRevision[]): MigrationState {
  const ordered = orderRevisions(revisions);
  const tables = new Map<string, Set<string>>();

  for (const rev of ordered) {
    for (const op of rev.operations) {
      switch (op.kind) {
        case 'create_table':
          tables.set(op.table, new Set(op.columns));
          break;
        case 'drop_table':
          tables.delete(op.table);
          break;
        case 'add_column': {
          const columns = tables.get(op.table) ?? new Set<string>();
          columns.add(op.column);
          tables.set(op.table, columns);
          break;
        }
        case 'drop_column':
          tables.get(op.table)?.delete(op.column);
          break;
      }
    }
  }

  const parents = new Set(revisions.flatMap((r) => r.downRevisions));
  const heads = ordered.filter((r) => !parents.has(r.revision)).map((r) => r.revision);
  return { revisions: ordered, heads, tables };
}
