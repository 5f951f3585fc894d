/**
 * Presets command
 */

import { Command } from 'commander';
import { PresetManager } from '../../presets/preset-manager.js';
import { printHeader, printInfo, printKeyValue } from '../output.js';

export function createPresetsCommand(): Command {
  return new Command('presets')
    .description('List the built-in presets')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const presets = await new PresetManager().list();
      if (options.json) {
        console.log(JSON.stringify(presets, null, 2));
        return;
      }
      if (presets.length === 0) {
        printInfo('No presets installed');
        return;
      }
      printHeader('Presets');
      for (const preset of presets) {
        printKeyValue(preset.name, preset.description || '(no description)');
      }
    });
}
