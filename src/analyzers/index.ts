/**
 * Analyzer registry and concurrent runner.
 */

import { AnalysisContext } from './context.js';
import { analyzeRouting } from './routing.js';
import { analyzeTemplating } from './templating.js';
import { analyzePersistence } from './persistence.js';
import { analyzeCode } from './code-quality.js';
import { FindingCollector } from './shared.js';
import { AnalysisError } from '../types/errors.js';
import type { IssueCategory, IssueDraft } from '../types/issue.js';

export interface Analyzer {
  category: IssueCategory;
  analyze(ctx: AnalysisContext): Promise<IssueDraft[]>;
}

export const ANALYZERS: readonly Analyzer[] = [
  { category: 'routing', analyze: analyzeRouting },
  { category: 'templating', analyze: analyzeTemplating },
  { category: 'persistence', analyze: analyzePersistence },
  { category: 'code', analyze: analyzeCode },
];

export interface AnalysisResult {
  drafts: IssueDraft[];
  errors: AnalysisError[];
}

/**
 * Run analyzers concurrently over one context. A failing analyzer becomes a
 * `code/analysis-error` finding; the others still report.
 */
export async function runAnalyzers(
  ctx: AnalysisContext,
  analyzers: readonly Analyzer[] = ANALYZERS
): Promise<AnalysisResult> {
  const settled = await Promise.allSettled(analyzers.map((analyzer) => analyzer.analyze(ctx)));
  const drafts: IssueDraft[] = [];
  const errors: AnalysisError[] = [];
  const failures = new FindingCollector(ctx.ruleset);

  settled.forEach((outcome, i) => {
    const analyzer = analyzers[i];
    if (outcome.status === 'fulfilled') {
      drafts.push(...outcome.value);
      return;
    }
    const error = new AnalysisError(analyzer.category, outcome.reason);
    errors.push(error);
    failures.add({
      rule: 'code/analysis-error',
      signature: `analysis-error:${analyzer.category}`,
      location: { file: ctx.project.entryPoint.file, startLine: 0, endLine: 0 },
      description: error.message,
    });
  });

  return { drafts: [...drafts, ...failures.results()], errors };
}

export { AnalysisContext } from './context.js';
export type { ProjectIndex, TemplateFile } from './context.js';
export { RULE_CATALOG, findRule } from './rules.js';
