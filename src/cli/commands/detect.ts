/**
 * Detect command
 * Prints the project model without analyzing anything
 */

import { Command } from 'commander';
import { detectProject } from '../../detection/project-detector.js';
import { failSpinner, printProjectModel, startSpinner, succeedSpinner } from '../output.js';
import { commonOverrides, loadCommandConfig, type CommonOptions } from './shared.js';

interface DetectOptions extends CommonOptions {
  json?: boolean;
}

export function createDetectCommand(): Command {
  return new Command('detect')
    .description('Detect the structure of a Flask project')
    .argument('[directory]', 'Project directory', '.')
    .option('--state-dir <dir>', 'State directory relative to the project')
    .option('--json', 'Output as JSON')
    .action(async (directory: string, options: DetectOptions) => {
      const config = await loadCommandConfig(directory, commonOverrides(options));
      if (!options.json) startSpinner('Detecting project...');
      try {
        const project = await detectProject(config.rootPath, { stateDir: config.stateDir });
        if (options.json) {
          console.log(JSON.stringify(project, null, 2));
          return;
        }
        succeedSpinner('Project detected');
        printProjectModel(project);
      } catch (error) {
        failSpinner('Detection failed');
        throw error;
      }
    });
}
