// ============================================================================
// Search Console - 交互式搜索
// ============================================================================

import * as readline from 'readline';
import chalk from 'chalk';
import { CONSOLE } from '../../shared/constants';
import type { CaptureQueries } from '../../main/saver';
import {
  formatCaptureList,
  formatSearchResults,
  formatStatistics,
  type LineWriter,
} from '../output/terminal';

export type ConsoleStep = 'continue' | 'quit';

const HELP_LINES = [
  'Commands:',
  '  <search query>     - Search your captures',
  '  :limit <number>    - Set result limit',
  '  :app <name>        - Filter by app name',
  '  :clear             - Clear limit and app filter',
  '  :stats             - Show database statistics',
  '  :recent [number]   - Show most recent captures',
  '  :help              - Show this help',
  '  :quit              - Exit console',
];

function parseCount(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const value = Number.parseInt(raw, 10);
  return value > 0 ? value : null;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SearchConsole {
  private limit: number = CONSOLE.DEFAULT_LIMIT;
  private appFilter: string | null = null;

  constructor(
    private readonly queries: CaptureQueries,
    private readonly write: LineWriter = (line) => console.log(line)
  ) {}

  getLimit(): number {
    return this.limit;
  }

  getAppFilter(): string | null {
    return this.appFilter;
  }

  /**
   * Prompt showing the active filters, e.g. "search [limit=5, app=VSCode]> "
   */
  prompt(): string {
    const filters: string[] = [];
    if (this.limit !== CONSOLE.DEFAULT_LIMIT) filters.push(`limit=${this.limit}`);
    if (this.appFilter) filters.push(`app=${this.appFilter}`);
    return filters.length > 0 ? `search [${filters.join(', ')}]> ` : 'search> ';
  }

  /**
   * Handle one input line: a ':' command or a query
   */
  handle(line: string): ConsoleStep {
    const input = line.trim();
    if (!input) return 'continue';

    if (input.startsWith(':')) {
      return this.handleCommand(input.slice(1));
    }

    this.runSearch(input);
    return 'continue';
  }

  private handleCommand(raw: string): ConsoleStep {
    const [name = '', ...rest] = raw.trim().split(/\s+/);
    const arg = rest.join(' ');

    switch (name.toLowerCase()) {
      case 'quit':
      case 'exit':
      case 'q':
        return 'quit';

      case 'help':
      case 'h':
        HELP_LINES.forEach((l) => this.write(l));
        break;

      case 'limit': {
        if (!arg) {
          this.fail('Usage: :limit <number>');
          break;
        }
        const value = parseCount(arg);
        if (value === null) {
          this.fail('Invalid number format');
          break;
        }
        this.limit = value;
        this.ok(`Result limit set to ${value}`);
        break;
      }

      case 'app':
        if (!arg) {
          this.fail('Usage: :app <name>');
          break;
        }
        this.appFilter = arg;
        this.ok(`Filtering by app: ${arg}`);
        break;

      case 'clear':
        this.limit = CONSOLE.DEFAULT_LIMIT;
        this.appFilter = null;
        this.ok('Filters cleared');
        break;

      case 'stats':
        this.guard(() => formatStatistics(this.queries.statistics()));
        break;

      case 'recent': {
        const count = arg ? parseCount(arg) : CONSOLE.DEFAULT_RECENT;
        if (count === null) {
          this.fail('Invalid number format');
          break;
        }
        this.guard(() => {
          const captures = this.queries.recent(count);
          return formatCaptureList(`📋 ${captures.length} Most Recent Captures:`, captures);
        });
        break;
      }

      default:
        this.fail(`Unknown command: ${name}`);
    }
    return 'continue';
  }

  private runSearch(query: string): void {
    this.write(chalk.dim(`🔍 Searching for: '${query}'...`));
    this.guard(() =>
      formatSearchResults(
        query,
        this.queries.search(query, {
          limit: this.limit,
          appFilter: this.appFilter ?? undefined,
        })
      )
    );
  }

  private guard(render: () => string[]): void {
    try {
      render().forEach((l) => this.write(l));
    } catch (error) {
      this.fail(`Error: ${describe(error)}`);
    }
  }

  private ok(message: string): void {
    this.write(chalk.green(`✓ ${message}`));
  }

  private fail(message: string): void {
    this.write(chalk.red(`❌ ${message}`));
  }

  /**
   * Read lines until :quit, EOF or Ctrl+C
   */
  run(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
    terminal: boolean = Boolean(process.stdin.isTTY)
  ): Promise<void> {
    this.write(chalk.cyan.bold('🔎 Saver search console'));
    this.write(chalk.dim("Type a query to search, ':help' for commands"));

    const rl = readline.createInterface({ input, output, terminal });

    return new Promise((resolve) => {
      let finished = false;
      const promptUser = () => {
        rl.setPrompt(this.prompt());
        rl.prompt();
      };

      rl.on('line', (line) => {
        if (finished) return;
        if (this.handle(line) === 'quit') {
          finished = true;
          rl.close();
          return;
        }
        promptUser();
      });

      rl.on('SIGINT', () => rl.close());

      rl.on('close', () => {
        this.write('👋 Goodbye!');
        resolve();
      });

      promptUser();
    });
  }
}
