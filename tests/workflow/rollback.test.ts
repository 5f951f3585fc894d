import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, promises as fs } from 'node:fs';
import path from 'node:path';
import { DEFAULT_CONFIG, type Config } from '../../src/config/index.js';
import { IssueRegistry } from '../../src/state/registry.js';
import { HealingOrchestrator } from '../../src/workflow/orchestrator.js';
import { rollback } from '../../src/workflow/rollback.js';
import { templateAwareLauncher } from '../helpers/fake-launcher.js';
import { MISSING_TEMPLATE_APP, makeTempDir, readProjectFile, writeProject } from '../helpers/project.js';

const UNTIDY_APP = MISSING_TEMPLATE_APP['app.py'].replace('app = Flask(__name__)', 'app = Flask(__name__)  ');

describe('rollback', () => {
  let root: string;
  let config: Config;

  beforeEach(async () => {
    root = await makeTempDir('mender-rollback-');
    config = { ...DEFAULT_CONFIG, rootPath: root, output: { ...DEFAULT_CONFIG.output, writeReports: false } };
    await writeProject(root, {
      ...MISSING_TEMPLATE_APP,
      'app.py': UNTIDY_APP,
    });
    const launcher = templateAwareLauncher({ '/': 'index.html', '/missing': 'missing.html' }, (template) =>
      existsSync(path.join(root, 'templates', template))
    );
    await new HealingOrchestrator({ config, launcher }).run();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function ledger(): Promise<IssueRegistry> {
    const registry = new IssueRegistry({ ledgerPath: path.join(root, '.mender', 'ledger.json') });
    await registry.load();
    return registry;
  }

  it('should delete a created file and reopen its issue', async () => {
    const before = await ledger();
    const created = before.listFixes().find((fix) => fix.file === 'templates/missing.html');
    if (!created) throw new Error('template fix missing');

    const result = await rollback(config, { fixId: created.id });

    expect(result.restored.map((r) => [r.fixId, r.file, r.blobPath])).toEqual([[created.id, 'templates/missing.html', null]]);
    expect(result.reopened).toEqual([created.issueId]);
    expect(existsSync(path.join(root, 'templates', 'missing.html'))).toBe(false);

    const after = await ledger();
    expect(after.get(created.issueId)?.status).toBe('Detected');
    expect(after.getFix(created.id)).toMatchObject({ rolledBack: true, verified: false });
  });

  it('should restore every file on a full rollback', async () => {
    expect(await readProjectFile(root, 'app.py')).toBe(MISSING_TEMPLATE_APP['app.py']);

    const result = await rollback(config, { all: true });

    expect(result.restored.map((r) => r.file).sort()).toEqual(['app.py', 'templates/missing.html']);
    expect(await readProjectFile(root, 'app.py')).toBe(UNTIDY_APP);
    expect(existsSync(path.join(root, 'templates', 'missing.html'))).toBe(false);
  });

  it('should refuse a fix that was already rolled back', async () => {
    const fix = (await ledger()).listFixes()[0];
    await rollback(config, { fixId: fix.id });

    await expect(rollback(config, { fixId: fix.id })).rejects.toThrow(`No backup to restore for fix ${fix.id}`);
  });
});
