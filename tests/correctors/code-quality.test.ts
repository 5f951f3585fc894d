import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { analyzeCode, DEBUG_FROM_ENV, N_PLUS_ONE_NOTE, SECRET_KEY_FROM_ENV } from '../../src/analyzers/code-quality.js';
import { codeCorrector, rewriteImport } from '../../src/correctors/code-quality.js';
import { CORRECTORS, planFixes } from '../../src/correctors/index.js';
import { buildPatch, applyPatch } from '../../src/correctors/patch.js';
import type { Corrector } from '../../src/correctors/corrector.js';
import { parsePythonModule } from '../../src/parsers/python-source.js';
import { issueFromDraft } from '../helpers/issues.js';
import { applyPlan, contextFor, correctorContextFor, makeTempDir, writeProject } from '../helpers/project.js';

const APP = [
  'import os',
  'import json',
  'from flask import Flask',
  'from .utils import slugify',
  '',
  'app = Flask(__name__)',
  "app.config['SECRET_KEY'] = 'test-secret'",
  '',
  '',
  'def check(value):   ',
  '    try:',
  '        return value == None',
  '    except:',
  '        return os.getcwd()',
  '',
  '',
  "if __name__ == '__main__':",
  '    app.run(debug=True)',
].join('\n');

describe('codeCorrector', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function setup() {
    const analysis = await contextFor(root);
    const issues = (await analyzeCode(analysis)).map(issueFromDraft);
    return { issues, ctx: await correctorContextFor(analysis) };
  }

  async function planFor(rule: string, signature?: string) {
    const { issues, ctx } = await setup();
    const issue = issues.find((i) => i.rule === rule && (!signature || i.signature === signature));
    if (!issue) throw new Error(`no ${rule} finding`);
    return codeCorrector.plan(issue, ctx);
  }

  it('should fix each mechanical finding on its own', async () => {
    await writeProject(root, { 'app.py': APP });

    const unused = await planFor('code/unused-import', 'unused-import:json');
    const whitespace = await planFor('code/trailing-whitespace');
    const newline = await planFor('code/missing-final-newline');
    const none = await planFor('code/none-comparison');
    const bare = await planFor('code/bare-except');

    expect(unused?.description).toBe('Remove unused import of json');
    expect(unused && applyPlan(unused)).toBe(APP.replace('import json\n', ''));
    expect(whitespace && applyPlan(whitespace)).toBe(APP.replace('def check(value):   ', 'def check(value):'));
    expect(newline && applyPlan(newline)).toBe(`${APP}\n`);
    expect(none && applyPlan(none)).toBe(APP.replace('value == None', 'value is None'));
    expect(bare && applyPlan(bare)).toBe(APP.replace('    except:', '    except Exception:'));
  });

  it('should keep the used names and the comment of a partly unused import', async () => {
    const source = ['from flask import Flask, jsonify  # web', '', 'app = Flask(__name__)', ''].join('\n');
    await writeProject(root, { 'app.py': source });

    const plan = await planFor('code/unused-import');

    expect(plan?.description).toBe('Drop jsonify from import');
    expect(plan && applyPlan(plan)).toBe(source.replace('Flask, jsonify  # web', 'Flask  # web'));
  });

  it('should read debug mode and the secret key from the environment', async () => {
    await writeProject(root, { 'app.py': APP });

    const debug = await planFor('code/debug-enabled');
    const secret = await planFor('code/hardcoded-secret');

    expect(debug?.description).toBe('Enable debug mode only when FLASK_DEBUG=1');
    expect(debug && applyPlan(debug)).toBe(APP.replace('debug=True', `debug=${DEBUG_FROM_ENV}`));
    expect(secret && applyPlan(secret)).toBe(APP.replace("'test-secret'", SECRET_KEY_FROM_ENV));
  });

  it('should import os when an environment fix needs it', async () => {
    const source = ['from flask import Flask', '', 'app = Flask(__name__)', 'app.debug = True', ''].join('\n');
    await writeProject(root, { 'app.py': source });

    const plan = await planFor('code/debug-enabled');

    expect(plan && applyPlan(plan)).toBe(
      ['from flask import Flask', 'import os', '', 'app = Flask(__name__)', `app.debug = ${DEBUG_FROM_ENV}`, ''].join('\n')
    );
  });

  it('should leave secrets other than the session key to a person', async () => {
    await writeProject(root, { 'app.py': "from flask import Flask\n\napp = Flask(__name__)\nAPI_TOKEN = 'test-token'\n" });

    expect(await planFor('code/hardcoded-secret')).toBeNull();
  });

  it('should switch insecure settings to safe values', async () => {
    const config = ['class Config:', '    WTF_CSRF_ENABLED = False', '    TESTING = True', ''].join('\n');
    await writeProject(root, { 'app.py': 'from flask import Flask\n\napp = Flask(__name__)\n', 'config.py': config });

    const csrf = await planFor('code/insecure-config', 'insecure-config:WTF_CSRF_ENABLED');
    const testing = await planFor('code/insecure-config', 'insecure-config:TESTING');

    expect(csrf?.description).toBe('Use a safe value for WTF_CSRF_ENABLED');
    expect(csrf && applyPlan(csrf)).toBe(config.replace('= False', '= True'));
    expect(testing && applyPlan(testing)).toBe(
      `import os\n${config.replace('TESTING = True', "TESTING = os.environ.get('FLASK_TESTING') == '1'")}`
    );
  });

  it('should mark a per-row query loop once', async () => {
    const views = [
      'from flask import Flask, jsonify',
      'from models import Customer, Order',
      '',
      'app = Flask(__name__)',
      '',
      '',
      "@app.route('/orders')",
      'def orders():',
      '    names = []',
      '    for order in Order.query.all():',
      '        names.append(Customer.query.get(order.customer_id).name)',
      '    return jsonify(names)',
      '',
    ].join('\n');
    await writeProject(root, {
      'app.py': views,
      'models.py': 'class Customer:\n    pass\n\n\nclass Order:\n    pass\n',
    });

    const plan = await planFor('code/n-plus-one-query');
    const marked = views.replace('Order.query.all():', `Order.query.all():  ${N_PLUS_ONE_NOTE}`);
    expect(plan && applyPlan(plan)).toBe(marked);

    await writeProject(root, { 'app.py': marked });
    const { issues } = await setup();
    expect(issues.filter((i) => i.rule === 'code/n-plus-one-query')).toEqual([]);
  });

  it('should never write migration revisions', async () => {
    await writeProject(root, { 'app.py': APP });
    const { ctx } = await setup();

    expect(codeCorrector.canWrite('app.py', ctx)).toBe(true);
    expect(codeCorrector.canWrite('migrations/versions/a1_init.py', ctx)).toBe(false);
    expect(codeCorrector.canWrite('templates/index.html', ctx)).toBe(false);
  });
});

describe('rewriteImport', () => {
  it('should rebuild the statement from the remaining names', () => {
    const module = parsePythonModule('app.py', 'from ..shop import a, b as c, d\nimport os, sys as system\n');

    expect(rewriteImport(module.imports[0], new Set(['c']))).toBe('from ..shop import a, d');
    expect(rewriteImport(module.imports[1], new Set(['os']))).toBe('import sys as system');
    expect(rewriteImport(module.imports[1], new Set(['os', 'system']))).toBe('');
  });
});

describe('planFixes', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await writeProject(root, { 'app.py': APP });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should accept every non-overlapping fix and set aside the rest', async () => {
    const analysis = await contextFor(root);
    const issues = (await analyzeCode(analysis)).map(issueFromDraft);

    const result = await planFixes(issues, await correctorContextFor(analysis));

    expect(result.accepted).toHaveLength(8);
    expect(result.conflicts).toEqual([]);
    expect(result.rejected).toEqual([]);
    expect(result.unfixable.map((i) => i.rule)).toEqual(['code/unresolved-import']);

    const patch = buildPatch('app.py', APP, result.accepted.flatMap((plan) => plan.edits));
    expect(applyPatch(APP, patch)).toBe(
      [
        'import os',
        'from flask import Flask',
        '',
        'app = Flask(__name__)',
        `app.config['SECRET_KEY'] = ${SECRET_KEY_FROM_ENV}`,
        '',
        '',
        'def check(value):',
        '    try:',
        '        return value is None',
        '    except Exception:',
        '        return os.getcwd()',
        '',
        '',
        "if __name__ == '__main__':",
        `    app.run(debug=${DEBUG_FROM_ENV})`,
        '',
      ].join('\n')
    );
  });

  it('should reject plans outside write authority and corrector errors', async () => {
    const analysis = await contextFor(root);
    const issues = (await analyzeCode(analysis)).map(issueFromDraft);
    const whitespace = issues.filter((i) => i.rule === 'code/trailing-whitespace');
    const bare = issues.filter((i) => i.rule === 'code/bare-except');
    const outOfBounds: Corrector = {
      category: 'code',
      canWrite: () => false,
      plan: async (issue) => ({
        issueId: issue.id,
        corrector: 'code',
        file: 'templates/index.html',
        description: 'edit a template',
        baseContent: null,
        edits: [{ start: 0, end: 0, replacement: 'x' }],
      }),
    };
    const failing: Corrector = {
      category: 'code',
      canWrite: () => true,
      plan: async () => {
        throw new Error('boom');
      },
    };
    const ctx = await correctorContextFor(analysis);

    const rejected = await planFixes(whitespace, ctx, { ...CORRECTORS, code: outOfBounds });
    const errored = await planFixes(bare, ctx, { ...CORRECTORS, code: failing });

    expect(rejected.rejected.map((r) => r.reason)).toEqual([
      "templates/index.html is outside the code corrector's write authority",
    ]);
    expect(errored.rejected.map((r) => r.reason)).toEqual(['corrector error: boom']);
    expect(errored.accepted).toEqual([]);
  });
});
