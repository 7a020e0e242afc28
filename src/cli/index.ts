#!/usr/bin/env node
// ============================================================================
// Saver CLI - Entry Point
// ============================================================================

import { Command } from 'commander';
import { VERSION } from '../shared/constants';
import {
  addCommand,
  appCommand,
  captureCommand,
  configCommand,
  consoleCommand,
  rebuildIndexCommand,
  recentCommand,
  searchCommand,
  statsCommand,
} from './commands';
import { terminalOutput } from './output';
import { cleanup } from './bootstrap';

const program = new Command();

program
  .name('saver')
  .description('Search the text you typed, by app and by time')
  .version(VERSION, '-v, --version', 'show version');

// Global options
program
  .option('-c, --config <path>', 'config file (default: $SAVER_CONFIG or ~/.saver/config.yaml)')
  .option('--json', 'JSON output')
  .option('--debug', 'debug logging');

// Register commands
program.addCommand(searchCommand);
program.addCommand(recentCommand);
program.addCommand(appCommand);
program.addCommand(statsCommand);
program.addCommand(rebuildIndexCommand);
program.addCommand(addCommand);
program.addCommand(captureCommand);
program.addCommand(consoleCommand);
program.addCommand(configCommand);

// Parse and run
program.parseAsync().catch((error: unknown) => {
  terminalOutput.error(error instanceof Error ? error.message : String(error));
  cleanup();
  process.exit(1);
});
