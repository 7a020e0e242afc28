// ============================================================================
// Capture Command - 把 stdin 当作键入流送进采集引擎
// ============================================================================

import { Command } from 'commander';
import { jsonOutput, terminalOutput } from '../output';
import { cleanup, fail, initializeCLIServices } from '../bootstrap';
import type { AppOption, CLIGlobalOptions } from '../types';

export const captureCommand = new Command('capture')
  .description('Stream stdin into the capture engine as typed text until EOF')
  .requiredOption('--app <name>', 'app the typed text is attributed to')
  .action(async (options: AppOption, command: Command) => {
    const globalOpts = command.optsWithGlobals<CLIGlobalOptions>();

    try {
      const engine = initializeCLIServices(globalOpts).createCaptureEngine();

      if (!engine.shouldCaptureApp(options.app)) {
        terminalOutput.warn(`'${options.app}' is not captured by the current app filter`);
        cleanup();
        return;
      }
      if (!engine.start()) {
        terminalOutput.warn('Capture is disabled in config');
        cleanup();
        return;
      }

      engine.setActiveApp(options.app);
      process.stdin.setEncoding('utf-8');
      for await (const chunk of process.stdin) {
        engine.handleKeystroke(String(chunk));
      }

      const saved = engine.stop();
      if (globalOpts.json) {
        jsonOutput.result({ success: true, saved });
      } else {
        terminalOutput.success(`Capture finished, ${saved} saved on exit`);
      }
    } catch (error) {
      fail(error, globalOpts, 'capture');
    }
    cleanup();
  });
