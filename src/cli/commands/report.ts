/**
 * Report command
 * Shows the latest run report
 */

import { Command } from 'commander';
import { resolveStateDir } from '../../config/index.js';
import { getStatePaths } from '../../state/persistence.js';
import { readLatestReport, renderMarkdown } from '../../workflow/run-report.js';
import { printInfo, printRunReport } from '../output.js';
import { commonOverrides, loadCommandConfig, type CommonOptions } from './shared.js';

interface ReportOptions extends CommonOptions {
  json?: boolean;
  markdown?: boolean;
}

export function createReportCommand(): Command {
  return new Command('report')
    .description('Show the latest healing run report')
    .argument('[directory]', 'Project directory', '.')
    .option('--state-dir <dir>', 'State directory relative to the project')
    .option('--json', 'Output as JSON')
    .option('--markdown', 'Output as Markdown')
    .action(async (directory: string, options: ReportOptions) => {
      const config = await loadCommandConfig(directory, commonOverrides(options));
      const report = await readLatestReport(getStatePaths(resolveStateDir(config)).reportsDir);
      if (!report) {
        printInfo(`No run report found for ${config.rootPath}. Run "flask-mender run" first.`);
        process.exitCode = 1;
        return;
      }
      if (options.json) console.log(JSON.stringify(report, null, 2));
      else if (options.markdown) console.log(renderMarkdown(report));
      else printRunReport(report);
    });
}
