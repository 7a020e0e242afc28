// ============================================================================
// Add Command - 手动保存一条采集
// ============================================================================

import { Command } from 'commander';
import { jsonOutput, terminalOutput } from '../output';
import { cleanup, fail, initializeCLIServices, readStdin } from '../bootstrap';
import type { AppOption, CLIGlobalOptions } from '../types';

export const addCommand = new Command('add')
  .description('Save one capture from arguments or stdin')
  .requiredOption('--app <name>', 'app the text belongs to')
  .argument('[text...]', 'text to save (reads stdin when omitted)')
  .action(async (textParts: string[], options: AppOption, command: Command) => {
    const globalOpts = command.optsWithGlobals<CLIGlobalOptions>();

    try {
      const content = textParts.length > 0 ? textParts.join(' ') : await readStdin();
      const saver = initializeCLIServices(globalOpts);
      const result = saver.save({ appName: options.app, content });
      if (!result.ok) {
        fail(result.error, globalOpts, 'save');
      }

      if (globalOpts.json) {
        jsonOutput.result({ success: true, id: result.value });
      } else {
        terminalOutput.success(`Saved capture #${result.value} for ${options.app}`);
      }
    } catch (error) {
      fail(error, globalOpts, 'save');
    }
    cleanup();
  });
