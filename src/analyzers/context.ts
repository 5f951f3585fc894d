/**
 * Per-pass analysis context.
 *
 * Wraps the frozen ProjectModel and the resolved ruleset, and lazily builds a
 * ProjectIndex (parsed modules, routes, templates, models, migration state)
 * that every analyzer and corrector of one pass shares. A new context is
 * created for each Diagnosing pass so fixes applied in between are seen.
 */

import path from 'node:path';
import { parsePythonModule, findCalls, type PythonModule } from '../parsers/python-source.js';
import { parseJinjaTemplate, type JinjaTemplate } from '../parsers/jinja-template.js';
import {
  buildMigrationState,
  parseMigrationRevision,
  type MigrationRevision,
  type MigrationState,
} from '../parsers/migrations.js';
import {
  extractBlueprints,
  extractRegistrations,
  extractRenderCalls,
  extractRoutes,
  type BlueprintRegistration,
  type RenderCall,
  type RouteDecl,
} from '../flask/routes.js';
import { extractModels, type ModelDecl } from '../flask/models.js';
import { safeRead, walkDir } from '../detection/fs-utils.js';
import type { BlueprintDecl, FrozenProjectModel } from '../types/project.js';
import type { ResolvedRuleset } from '../types/rules.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TemplateFile {
  /** Name as passed to render_template (relative to its template dir) */
  name: string;
  /** Template dir, root-relative */
  dir: string;
  /** Root-relative path */
  file: string;
}

export interface ProjectIndex {
  modules: Map<string, PythonModule>;
  routes: RouteDecl[];
  renderCalls: RenderCall[];
  blueprints: BlueprintDecl[];
  registrations: BlueprintRegistration[];
  models: ModelDecl[];
  /** Template name -> file; the first template dir wins on duplicates */
  templates: Map<string, TemplateFile>;
  /** Template name -> parsed template */
  parsedTemplates: Map<string, JinjaTemplate>;
  migrations: MigrationState;
  /** Whether any module registers a context processor */
  hasContextProcessor: boolean;
}

const TEMPLATE_EXTENSIONS = new Set(['.html', '.htm', '.jinja', '.jinja2', '.j2', '.txt', '.xml']);

export const DEFAULT_VERSIONS_DIR = 'migrations/versions';

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export class AnalysisContext {
  readonly project: FrozenProjectModel;
  readonly ruleset: ResolvedRuleset;
  private indexPromise: Promise<ProjectIndex> | null = null;
  private readonly fileCache = new Map<string, Promise<string | undefined>>();

  constructor(project: FrozenProjectModel, ruleset: ResolvedRuleset) {
    this.project = project;
    this.ruleset = ruleset;
  }

  get root(): string {
    return this.project.root;
  }

  /**
   * Absolute path of a root-relative POSIX path.
   */
  resolve(relativePath: string): string {
    return path.join(this.project.root, ...relativePath.split('/'));
  }

  /**
   * Read a root-relative file once per pass.
   */
  readFile(relativePath: string): Promise<string | undefined> {
    let pending = this.fileCache.get(relativePath);
    if (!pending) {
      pending = safeRead(this.resolve(relativePath));
      this.fileCache.set(relativePath, pending);
    }
    return pending;
  }

  /**
   * Template dir new templates go to.
   */
  defaultTemplateDir(): string {
    const first = this.project.templateDirs[0];
    if (first !== undefined) return first;
    const entryDir = path.posix.dirname(this.project.entryPoint.file);
    return entryDir === '.' ? 'templates' : `${entryDir}/templates`;
  }

  /**
   * Alembic versions dir new revisions go to.
   */
  versionsDir(): string {
    return this.project.migrationDirs[0] ?? DEFAULT_VERSIONS_DIR;
  }

  index(): Promise<ProjectIndex> {
    if (!this.indexPromise) this.indexPromise = this.buildIndex();
    return this.indexPromise;
  }

  private async buildIndex(): Promise<ProjectIndex> {
    const modules = new Map<string, PythonModule>();
    for (const file of this.project.sourceFiles) {
      const source = await this.readFile(file);
      if (source !== undefined) modules.set(file, parsePythonModule(file, source));
    }

    const parsed = [...modules.values()];
    const blueprints = parsed.flatMap(extractBlueprints);
    const routes = parsed.flatMap((m) => extractRoutes(m, blueprints));
    const renderCalls = parsed.flatMap(extractRenderCalls);
    const registrations = parsed.flatMap(extractRegistrations);
    const models = parsed.flatMap(extractModels);
    const hasContextProcessor = parsed.some(
      (m) =>
        /@\w+\.(?:app_)?context_processor\b/.test(m.masked) ||
        findCalls(m, '\\w+\\.(?:app_)?context_processor').length > 0
    );

    const { templates, parsedTemplates } = await this.indexTemplates();
    const migrations = buildMigrationState(await this.readRevisions());

    return {
      modules,
      routes,
      renderCalls,
      blueprints,
      registrations,
      models,
      templates,
      parsedTemplates,
      migrations,
      hasContextProcessor,
    };
  }

  private async indexTemplates(): Promise<{
    templates: Map<string, TemplateFile>;
    parsedTemplates: Map<string, JinjaTemplate>;
  }> {
    const templates = new Map<string, TemplateFile>();
    const parsedTemplates = new Map<string, JinjaTemplate>();
    const dirs = [...new Set([...this.project.templateDirs, this.defaultTemplateDir()])];

    for (const dir of dirs) {
      const entries = await walkDir(this.resolve(dir));
      for (const entry of entries) {
        if (entry.isDir || !TEMPLATE_EXTENSIONS.has(path.posix.extname(entry.relativePath))) continue;
        const name = entry.relativePath;
        if (templates.has(name)) continue;
        const file = `${dir}/${name}`;
        templates.set(name, { name, dir, file });
        const source = await this.readFile(file);
        if (source !== undefined) parsedTemplates.set(name, parseJinjaTemplate(file, source));
      }
    }
    return { templates, parsedTemplates };
  }

  private async readRevisions(): Promise<MigrationRevision[]> {
    const dirs = [...new Set([...this.project.migrationDirs, this.versionsDir()])];
    const revisions: MigrationRevision[] = [];
    for (const dir of dirs) {
      const entries = await walkDir(this.resolve(dir), { maxDepth: 0 });
      for (const entry of entries) {
        if (entry.isDir || !entry.relativePath.endsWith('.py')) continue;
        const file = `${dir}/${entry.relativePath}`;
        const source = await this.readFile(file);
        if (source === undefined) continue;
        const revision = parseMigrationRevision(file, source);
        if (revision) revisions.push(revision);
      }
    }
    return revisions;
  }
}
