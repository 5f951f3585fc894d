/**
 * Project detector.
 *
 * Builds the structural ProjectModel through a prioritized, confidence-scored
 * heuristic chain: factory signatures, conventional file names, then
 * content patterns. Every candidate entry point is scored and ranked; the
 * detector fails only when no Flask instance or factory exists at all.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  findCalls,
  keywordArgument,
  stringLiteral,
  topLevelFunctions,
  type PythonModule,
  parsePythonModule,
} from '../parsers/python-source.js';
import { extractBlueprints, extractRoutes, hasRouteDecorators, staticUrl } from '../flask/routes.js';
import { extractModels } from '../flask/models.js';
import {
  deepFreeze,
  type AuthMechanism,
  type BlueprintDecl,
  type DatabaseKind,
  type EntryPoint,
  type FrozenProjectModel,
  type ProjectModel,
} from '../types/project.js';
import { DetectionFailure } from '../types/errors.js';
import { MIGRATION_DIR_NAMES, pathExists, safeRead, walkDir, type WalkEntry } from './fs-utils.js';

// ---------------------------------------------------------------------------
// Heuristic weights
// ---------------------------------------------------------------------------

export const FACTORY_NAMES = ['create_app', 'make_app', 'get_app', 'setup_app', 'init_app'];

export const CONVENTIONAL_ENTRY_FILES = [
  'app.py', 'wsgi.py', 'run.py', 'main.py', 'application.py', 'server.py', 'manage.py', '__init__.py',
];

const WEIGHTS = {
  namedFactory: 0.6,
  anonymousFactory: 0.5,
  namedDelegate: 0.4,
  instance: 0.4,
  conventionalName: 0.2,
  flaskImport: 0.1,
  routeModule: 0.3,
  routeModuleFlaskImport: 0.1,
  modelModule: 0.4,
  sqlalchemyInstance: 0.2,
} as const;

const FLASK_IMPORT_RE = /^(flask)(\.|$)/;

export interface DetectOptions {
  /** State directory name to ignore while walking */
  stateDir?: string;
}

interface EntryCandidate {
  entry: EntryPoint;
  score: number;
}

function clamp(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 1000) / 1000;
}

function importsFlask(module: PythonModule): boolean {
  return module.imports.some((imp) => FLASK_IMPORT_RE.test(imp.module));
}

function importsModule(module: PythonModule, pattern: RegExp): boolean {
  return module.imports.some((imp) => pattern.test(imp.module) || imp.names.some((n) => pattern.test(n.name)));
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

function scoreEntryCandidates(module: PythonModule): EntryCandidate[] {
  const base =
    (CONVENTIONAL_ENTRY_FILES.includes(path.posix.basename(module.path)) ? WEIGHTS.conventionalName : 0) +
    (importsFlask(module) ? WEIGHTS.flaskImport : 0);
  const candidates: EntryCandidate[] = [];

  for (const fn of topLevelFunctions(module)) {
    const start = module.lineStarts[fn.line - 1];
    const createsFlask = findCalls(module, '(?:flask\\.)?Flask', { start, end: fn.endOffset }).length > 0;
    const named = FACTORY_NAMES.includes(fn.name);
    if (!named && !(createsFlask && fn.returns.length > 0)) continue;
    const weight = named && createsFlask ? WEIGHTS.namedFactory : named ? WEIGHTS.namedDelegate : WEIGHTS.anonymousFactory;
    candidates.push({
      entry: { file: module.path, symbol: fn.name, kind: 'factory', line: fn.line },
      score: clamp(weight + base),
    });
  }

  for (const assignment of module.assignments) {
    if (!/^(?:flask\.)?Flask\s*\(/.test(assignment.value)) continue;
    candidates.push({
      entry: { file: module.path, symbol: assignment.target, kind: 'instance', line: assignment.line },
      score: clamp(WEIGHTS.instance + base),
    });
  }

  return candidates;
}

/**
 * Rank candidates: highest score, factories before instances, then path.
 */
export function rankEntryCandidates<T extends { entry: EntryPoint; score: number }>(candidates: T[]): T[] {
  return [...candidates].sort(
    (a, b) =>
      b.score - a.score ||
      (a.entry.kind === b.entry.kind ? 0 : a.entry.kind === 'factory' ? -1 : 1) ||
      a.entry.file.localeCompare(b.entry.file) ||
      a.entry.line - b.entry.line
  );
}

// ---------------------------------------------------------------------------
// Secondary facts
// ---------------------------------------------------------------------------

const DATABASE_PATTERNS: Array<{ kind: DatabaseKind; pattern: RegExp }> = [
  { kind: 'sqlite', pattern: /sqlite:\/\// },
  { kind: 'postgresql', pattern: /postgres(?:ql)?(?:\+\w+)?:\/\// },
  { kind: 'mysql', pattern: /mysql(?:\+\w+)?:\/\// },
  { kind: 'mongodb', pattern: /mongodb(?:\+srv)?:\/\// },
];

function detectDatabase(modules: PythonModule[]): ProjectModel['database'] {
  for (const module of modules) {
    for (const { kind, pattern } of DATABASE_PATTERNS) {
      if (pattern.test(module.source)) return { kind, file: module.path };
    }
  }
  for (const module of modules) {
    if (importsModule(module, /^(flask_pymongo|pymongo|mongoengine|flask_mongoengine)$/)) {
      return { kind: 'mongodb', file: module.path };
    }
  }
  for (const module of modules) {
    if (findCalls(module, 'SQLAlchemy').length > 0) return { kind: 'unknown_sql', file: module.path };
  }
  return null;
}

function detectAuth(modules: PythonModule[], blueprints: BlueprintDecl[]): AuthMechanism | null {
  let mechanism: AuthMechanism | null = null;
  for (const module of modules) {
    if (importsModule(module, /^flask_login$/)) {
      mechanism = { kind: 'flask_login', file: module.path };
      break;
    }
  }
  if (!mechanism) {
    for (const module of modules) {
      if (importsModule(module, /^(flask_jwt_extended|flask_jwt|jwt)$/)) {
        mechanism = { kind: 'jwt', file: module.path };
        break;
      }
    }
  }
  if (!mechanism) {
    for (const module of modules) {
      if (/\bsession\s*\[\s*['"]\w*user\w*['"]\s*\]\s*=/.test(module.source)) {
        mechanism = { kind: 'session', file: module.path };
        break;
      }
    }
  }
  if (!mechanism) return null;

  for (const module of modules) {
    const login = extractRoutes(module, blueprints).find((route) => /login|signin/i.test(route.endpoint));
    if (!login) continue;
    const decl = blueprints.find((bp) => bp.file === module.path && bp.variable === login.owner);
    const url = staticUrl(login, decl?.urlPrefix ?? null);
    if (url) return { ...mechanism, loginRoute: url };
  }
  return mechanism;
}

async function findMigrationDirs(root: string, entries: WalkEntry[]): Promise<string[]> {
  const candidates = new Set<string>();
  const parents = ['', ...entries.filter((e) => e.isDir && !e.relativePath.includes('/')).map((e) => e.relativePath)];
  for (const parent of parents) {
    for (const name of MIGRATION_DIR_NAMES) {
      const rel = parent ? `${parent}/${name}/versions` : `${name}/versions`;
      if (await pathExists(path.join(root, rel))) candidates.add(rel);
    }
  }
  return [...candidates].sort();
}

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

/**
 * Scan `rootPath` and build a frozen ProjectModel.
 *
 * @throws DetectionFailure when the root is missing or holds no Flask
 *   application instance or factory
 */
export async function detectProject(rootPath: string, options: DetectOptions = {}): Promise<FrozenProjectModel> {
  const root = path.resolve(rootPath);
  const stat = await fs.stat(root).catch((error: unknown) => {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  });
  if (!stat || !stat.isDirectory()) {
    throw new DetectionFailure(root, 'root path is not a directory');
  }

  const skip = new Set([...MIGRATION_DIR_NAMES, options.stateDir ?? '.mender']);
  const entries = await walkDir(root, { skip });
  const pyEntries = entries.filter((e) => !e.isDir && e.relativePath.endsWith('.py'));
  if (pyEntries.length === 0) {
    throw new DetectionFailure(root, 'no Python sources found');
  }

  const modules: PythonModule[] = [];
  for (const entry of pyEntries) {
    const source = await safeRead(entry.absolutePath);
    if (source !== undefined) modules.push(parsePythonModule(entry.relativePath, source));
  }

  const ranked = rankEntryCandidates(modules.flatMap(scoreEntryCandidates));
  const best = ranked[0];
  if (!best) {
    throw new DetectionFailure(root, 'no Flask application instance or factory found');
  }

  const blueprints = modules.flatMap(extractBlueprints);

  // Route modules
  const routeModules = modules.filter(hasRouteDecorators);
  const routeScore = routeModules.reduce(
    (sum, m) => sum + WEIGHTS.routeModule + (importsFlask(m) || blueprints.some((bp) => bp.file === m.path) ? WEIGHTS.routeModuleFlaskImport : 0),
    0
  );

  // Model modules
  const modelModules = modules.filter((m) => extractModels(m).length > 0);
  const hasSqlAlchemy = modules.some((m) => findCalls(m, 'SQLAlchemy').length > 0);
  const modelScore = modelModules.length === 0 ? 0 : modelModules.length * WEIGHTS.modelModule + (hasSqlAlchemy ? WEIGHTS.sqlalchemyInstance : 0);

  // Template and static directories
  const templateDirs = new Set<string>();
  let configuredTemplates = false;
  for (const module of modules) {
    for (const call of findCalls(module, '(?:flask\\.)?Flask')) {
      const folder = keywordArgument(call, 'template_folder');
      const value = folder ? stringLiteral(folder.value) : null;
      if (value) {
        const rel = path.posix.normalize(path.posix.join(path.posix.dirname(module.path), value));
        if (await pathExists(path.join(root, rel))) {
          templateDirs.add(rel);
          configuredTemplates = true;
        }
      }
    }
  }
  const dirs = entries.filter((e) => e.isDir);
  for (const dir of dirs) {
    if (path.posix.basename(dir.relativePath) === 'templates') templateDirs.add(dir.relativePath);
  }
  const templateFiles = entries.filter(
    (e) => !e.isDir && [...templateDirs].some((d) => e.relativePath.startsWith(`${d}/`))
  );
  const templateScore =
    templateDirs.size === 0 ? 0 : configuredTemplates ? 1 : templateFiles.length > 0 ? 0.9 : 0.5;

  const staticDirs = dirs.filter((d) => path.posix.basename(d.relativePath) === 'static').map((d) => d.relativePath);

  // Migrations
  const migrationDirs = await findMigrationDirs(root, entries);
  const usesMigrationTool =
    migrationDirs.length > 0 ||
    modules.some((m) => importsModule(m, /^flask_migrate$/) || findCalls(m, 'Migrate').length > 0) ||
    (await pathExists(path.join(root, 'alembic.ini')));

  const entryKind = best.entry.kind;
  const architecturePattern: ProjectModel['architecturePattern'] =
    entryKind === 'factory' ? 'factory' : blueprints.length > 0 ? 'blueprint' : 'monolithic';
  const architectureScore = entryKind === 'factory' ? 0.9 : blueprints.length > 0 ? 0.8 : 0.7;

  const model: ProjectModel = {
    root,
    entryPoint: best.entry,
    architecturePattern,
    routeModules: routeModules.map((m) => m.path).sort(),
    templateDirs: [...templateDirs].sort(),
    modelModules: modelModules.map((m) => m.path).sort(),
    staticDirs: staticDirs.sort(),
    migrationDirs,
    sourceFiles: modules.map((m) => m.path).sort(),
    blueprints,
    authMechanism: detectAuth(modules, blueprints),
    database: detectDatabase(modules),
    usesMigrationTool,
    confidence: {
      entryPoint: best.score,
      architecturePattern: clamp(architectureScore),
      routeModules: clamp(routeScore),
      templateDirs: clamp(templateScore),
      modelModules: clamp(modelScore),
    },
  };

  return deepFreeze(model);
}
