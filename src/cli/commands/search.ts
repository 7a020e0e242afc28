// ============================================================================
// Search Command - 全文 + 模糊搜索
// ============================================================================

import { Command } from 'commander';
import { jsonOutput, terminalOutput } from '../output';
import { cleanup, fail, initializeCLIServices, parsePositiveInt, parseScore } from '../bootstrap';
import type { CLIGlobalOptions, SearchCommandOptions } from '../types';

export const searchCommand = new Command('search')
  .description('Search captured text')
  .argument('<query...>', 'search terms')
  .option('-l, --limit <n>', 'maximum number of results', parsePositiveInt)
  .option('-a, --app <name>', 'only search captures from this app')
  .option('-m, --min-score <score>', 'minimum score for fuzzy matches (0-1)', parseScore)
  .action((queryParts: string[], options: SearchCommandOptions, command: Command) => {
    const globalOpts = command.optsWithGlobals<CLIGlobalOptions>();
    const query = queryParts.join(' ');

    try {
      const saver = initializeCLIServices(globalOpts);
      const results = saver.search(query, {
        limit: options.limit,
        appFilter: options.app,
        minScore: options.minScore,
      });

      if (globalOpts.json) {
        jsonOutput.result({ query, count: results.length, results });
      } else {
        terminalOutput.searchResults(query, results);
      }
    } catch (error) {
      fail(error, globalOpts, 'search');
    }
    cleanup();
  });
