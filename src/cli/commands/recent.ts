// ============================================================================
// Recent Command - 最近采集
// ============================================================================

import { Command } from 'commander';
import { CONSOLE } from '../../shared/constants';
import { jsonOutput, terminalOutput } from '../output';
import { cleanup, fail, initializeCLIServices, parsePositiveInt } from '../bootstrap';
import type { CLIGlobalOptions } from '../types';

export const recentCommand = new Command('recent')
  .description('Show the most recent captures')
  .argument('[count]', 'number of captures to show', parsePositiveInt, CONSOLE.DEFAULT_LIMIT)
  .action((count: number, _options: unknown, command: Command) => {
    const globalOpts = command.optsWithGlobals<CLIGlobalOptions>();

    try {
      const captures = initializeCLIServices(globalOpts).recent(count);
      if (globalOpts.json) {
        jsonOutput.result(captures);
      } else {
        terminalOutput.captures(`📋 ${captures.length} Most Recent Captures:`, captures);
      }
    } catch (error) {
      fail(error, globalOpts, 'recent');
    }
    cleanup();
  });
