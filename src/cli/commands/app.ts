// ============================================================================
// App Command - 按应用浏览
// ============================================================================

import { Command } from 'commander';
import { BROWSE } from '../../shared/constants';
import { jsonOutput, terminalOutput } from '../output';
import { cleanup, fail, initializeCLIServices, parsePositiveInt } from '../bootstrap';
import type { CLIGlobalOptions, LimitOption } from '../types';

export const appCommand = new Command('app')
  .description('Show recent captures from one app')
  .argument('<name>', 'app name, as captured')
  .option('-l, --limit <n>', 'number of captures to show', parsePositiveInt, BROWSE.BY_APP_LIMIT)
  .action((appName: string, options: LimitOption, command: Command) => {
    const globalOpts = command.optsWithGlobals<CLIGlobalOptions>();

    try {
      const saver = initializeCLIServices(globalOpts);
      const captures = saver.byApp(appName, options.limit);
      if (globalOpts.json) {
        jsonOutput.result(captures);
      } else if (captures.length === 0) {
        const known = saver.store.appNames();
        terminalOutput.warn(`No captures for '${appName}'`);
        if (known.length > 0) {
          terminalOutput.info(`Captured apps: ${known.join(', ')}`);
        }
      } else {
        terminalOutput.captures(`📱 ${captures.length} captures from ${appName}:`, captures);
      }
    } catch (error) {
      fail(error, globalOpts, 'byApp');
    }
    cleanup();
  });
