/**
 * Run command
 * Detects, diagnoses, heals and validates a project
 */

import { Command } from 'commander';
import { HealingOrchestrator } from '../../workflow/orchestrator.js';
import type { TerminalState } from '../../types/report.js';
import {
  failSpinner,
  printRunReport,
  startSpinner,
  stopSpinner,
  succeedSpinner,
  updateSpinner,
} from '../output.js';
import { commonOverrides, loadCommandConfig, parseInteger, type CommonOptions } from './shared.js';

interface RunOptions extends CommonOptions {
  maxIterations?: number;
  dryRun?: boolean;
  events?: boolean;
  simulateAuth: boolean;
  timeout?: number;
  python?: string;
  report: boolean;
  json?: boolean;
}

/** Process exit code for each terminal state */
export const EXIT_CODES: Record<TerminalState, number> = {
  Resolved: 0,
  PartialFailure: 1,
  Escalated: 1,
  Aborted: 2,
};

export function createRunCommand(): Command {
  return new Command('run')
    .description('Detect, diagnose, heal and validate a Flask project')
    .argument('[directory]', 'Project directory', '.')
    .option('-p, --preset <name>', 'Preset name or preset file')
    .option('-n, --max-iterations <n>', 'Maximum healing iterations', parseInteger)
    .option('--dry-run', 'Diagnose and plan fixes without writing anything')
    .option('--events', 'Print orchestrator transitions as NDJSON')
    .option('--no-simulate-auth', 'Do not replay a login during validation')
    .option('--timeout <ms>', 'Validation sandbox timeout', parseInteger)
    .option('--python <path>', 'Python interpreter for the validation sandbox')
    .option('--state-dir <dir>', 'State directory relative to the project')
    .option('--no-report', 'Do not write report files')
    .option('--json', 'Print the run report as JSON')
    .option('-v, --verbose', 'Verbose healing log')
    .action(async (directory: string, options: RunOptions) => {
      const overrides = commonOverrides(options);
      if (options.maxIterations !== undefined) overrides.maxIterations = options.maxIterations;
      if (options.dryRun) overrides.dryRun = true;
      if (!options.simulateAuth) overrides.simulateAuth = false;
      if (options.timeout !== undefined) overrides.sandboxTimeoutMs = options.timeout;
      if (options.python !== undefined) overrides.pythonExecutable = options.python;
      overrides.output = {
        ...(options.verbose ? { verbose: true } : {}),
        ...(options.events ? { events: true } : {}),
        ...(options.report ? {} : { writeReports: false }),
      };

      const config = await loadCommandConfig(directory, overrides);
      const quiet = config.output.events || options.json === true;
      const orchestrator = new HealingOrchestrator({ config });

      orchestrator.onTransition((event) => {
        if (config.output.events) {
          console.log(JSON.stringify(event));
        } else if (!quiet) {
          updateSpinner(`${event.to} (iteration ${event.iteration})`);
        }
      });

      if (!quiet) startSpinner(`Healing ${config.rootPath}...`);
      try {
        const report = await orchestrator.run();
        if (!quiet) {
          if (report.terminalState === 'Resolved') succeedSpinner('Healing run finished');
          else failSpinner(`Healing run ended ${report.terminalState}`);
        }
        if (options.json) console.log(JSON.stringify(report, null, 2));
        else if (!config.output.events) printRunReport(report);
        process.exitCode = EXIT_CODES[report.terminalState];
      } catch (error) {
        stopSpinner();
        throw error;
      }
    });
}
