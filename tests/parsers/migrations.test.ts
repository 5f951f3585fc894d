import { describe, it, expect } from 'vitest';
import { buildMigrationState, parseMigrationRevision } from '../../src/parsers/migrations.js';

const INIT = [
  "revision = 'a1'",
  'down_revision = None',
  '',
  '',
  'def upgrade():',
  '    op.create_table(',
  "        'user',",
  "        sa.Column('id', sa.Integer(), nullable=False),",
  "        sa.Column('email', sa.String(length=120)),",
  '    )',
  '',
].join('\n');

const POSTS = [
  "revision = 'b2'",
  "down_revision = 'a1'",
  '',
  '',
  'def upgrade():',
  "    op.add_column('user', sa.Column('name', sa.String()))",
  "    with op.batch_alter_table('user') as batch_op:",
  "        batch_op.drop_column('email')",
  "    op.create_table('post', sa.Column('id', sa.Integer()))",
  '',
  '',
  'def downgrade():',
  "    op.drop_table('post')",
  '',
].join('\n');

describe('parseMigrationRevision', () => {
  it('should read revision ids and upgrade operations in source order', () => {
    const revision = parseMigrationRevision('migrations/versions/b2_posts.py', POSTS);

    expect(revision).toEqual({
      file: 'migrations/versions/b2_posts.py',
      revision: 'b2',
      downRevisions: ['a1'],
      operations: [
        { kind: 'add_column', table: 'user', column: 'name' },
        { kind: 'drop_column', table: 'user', column: 'email' },
        { kind: 'create_table', table: 'post', columns: ['id'] },
      ],
    });
  });

  it('should treat a None down_revision as a base', () => {
    expect(parseMigrationRevision('m/a1.py', INIT)?.downRevisions).toEqual([]);
  });

  it('should return null for files without a revision id', () => {
    expect(parseMigrationRevision('m/env.py', 'from alembic import context\n')).toBeNull();
  });
});

describe('buildMigrationState', () => {
  it('should replay revisions along the chain regardless of file order', () => {
    const posts = parseMigrationRevision('migrations/versions/0001_posts.py', POSTS);
    const init = parseMigrationRevision('migrations/versions/0002_init.py', INIT);
    if (!posts || !init) throw new Error('fixture did not parse');

    const state = buildMigrationState([posts, init]);

    expect(state.revisions.map((r) => r.revision)).toEqual(['a1', 'b2']);
    expect(state.heads).toEqual(['b2']);
    expect([...(state.tables.get('user') ?? [])].sort()).toEqual(['id', 'name']);
    expect([...(state.tables.get('post') ?? [])]).toEqual(['id']);
  });

  it('should report every head when the history branches', () => {
    const init = parseMigrationRevision('m/a1.py', INIT);
    const posts = parseMigrationRevision('m/b2.py', POSTS);
    const branch = parseMigrationRevision('m/c3.py', "revision = 'c3'\ndown_revision = 'a1'\n");
    if (!init || !posts || !branch) throw new Error('fixture did not parse');

    expect(buildMigrationState([init, posts, branch]).heads.sort()).toEqual(['b2', 'c3']);
  });
});
