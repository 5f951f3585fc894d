/**
 * Diagnose command
 * One analysis pass, nothing recorded and nothing written
 */

import { Command } from 'commander';
import { AnalysisContext, runAnalyzers } from '../../analyzers/index.js';
import { detectProject } from '../../detection/project-detector.js';
import { PresetManager } from '../../presets/preset-manager.js';
import { failSpinner, printDrafts, printWarning, startSpinner, succeedSpinner } from '../output.js';
import { commonOverrides, loadCommandConfig, type CommonOptions } from './shared.js';

interface DiagnoseOptions extends CommonOptions {
  json?: boolean;
}

export function createDiagnoseCommand(): Command {
  return new Command('diagnose')
    .description('Analyze a Flask project and list issues without fixing them')
    .argument('[directory]', 'Project directory', '.')
    .option('-p, --preset <name>', 'Preset name or preset file')
    .option('--state-dir <dir>', 'State directory relative to the project')
    .option('--json', 'Output as JSON')
    .action(async (directory: string, options: DiagnoseOptions) => {
      const config = await loadCommandConfig(directory, commonOverrides(options));
      if (!options.json) startSpinner('Analyzing project...');
      try {
        const ruleset = await new PresetManager().resolve(config.preset, config.ruleOverrides, {
          maxLineLength: config.maxLineLength,
          minConfidence: config.minConfidence,
        });
        const project = await detectProject(config.rootPath, { stateDir: config.stateDir });
        const { drafts, errors } = await runAnalyzers(new AnalysisContext(project, ruleset));

        if (options.json) {
          console.log(JSON.stringify(drafts, null, 2));
          return;
        }
        succeedSpinner(`${drafts.length} issue(s) found`);
        for (const error of errors) printWarning(error.message);
        printDrafts(drafts);
        if (drafts.length > 0) process.exitCode = 1;
      } catch (error) {
        failSpinner('Diagnosis failed');
        throw error;
      }
    });
}
