// ============================================================================
// Rebuild Index Command - 重建全文索引
// ============================================================================

import { Command } from 'commander';
import { jsonOutput, terminalOutput } from '../output';
import { cleanup, fail, initializeCLIServices } from '../bootstrap';
import type { CLIGlobalOptions } from '../types';

export const rebuildIndexCommand = new Command('rebuild-index')
  .description('Drop and rebuild the full-text search index')
  .action((_options: unknown, command: Command) => {
    const globalOpts = command.optsWithGlobals<CLIGlobalOptions>();

    try {
      const saver = initializeCLIServices(globalOpts);
      if (!globalOpts.json) {
        terminalOutput.startSpinner('Rebuilding search index...');
      }

      const result = saver.rebuildIndex();
      if (!result.ok) {
        if (!globalOpts.json) terminalOutput.failSpinner('Rebuild failed');
        fail(result.error, globalOpts, 'rebuildIndex');
      }

      const indexed = saver.store.getIndexMaintainer().indexCount();
      if (globalOpts.json) {
        jsonOutput.result({ success: true, indexed });
      } else {
        terminalOutput.succeedSpinner(`Search index rebuilt (${indexed} captures)`);
      }
    } catch (error) {
      fail(error, globalOpts, 'rebuildIndex');
    }
    cleanup();
  });
