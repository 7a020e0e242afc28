// ============================================================================
// Console Command - 交互式搜索控制台
// ============================================================================

import { Command } from 'commander';
import { SearchConsole } from '../console/searchConsole';
import { cleanup, fail, initializeCLIServices } from '../bootstrap';
import type { CLIGlobalOptions } from '../types';

export const consoleCommand = new Command('console')
  .description('Interactive search console')
  .action(async (_options: unknown, command: Command) => {
    const globalOpts = command.optsWithGlobals<CLIGlobalOptions>();

    try {
      const saver = initializeCLIServices(globalOpts);
      await new SearchConsole(saver).run();
    } catch (error) {
      fail(error, globalOpts, 'console');
    }
    cleanup();
  });
