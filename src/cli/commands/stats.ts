// ============================================================================
// Stats Command - 采集统计
// ============================================================================

import { Command } from 'commander';
import { jsonOutput, terminalOutput } from '../output';
import { cleanup, fail, initializeCLIServices } from '../bootstrap';
import type { CLIGlobalOptions } from '../types';

export const statsCommand = new Command('stats')
  .description('Show capture statistics')
  .action((_options: unknown, command: Command) => {
    const globalOpts = command.optsWithGlobals<CLIGlobalOptions>();

    try {
      const stats = initializeCLIServices(globalOpts).statistics();
      if (globalOpts.json) {
        jsonOutput.result(stats);
      } else {
        terminalOutput.statistics(stats);
      }
    } catch (error) {
      fail(error, globalOpts, 'statistics');
    }
    cleanup();
  });
