// ============================================================================
// Config Command - 查看 / 初始化配置
// ============================================================================

import { Command } from 'commander';
import * as yaml from 'yaml';
import { ConfigService } from '../../main/config/configService';
import { jsonOutput, terminalOutput } from '../output';
import { fail } from '../bootstrap';
import type { CLIGlobalOptions } from '../types';

export const configCommand = new Command('config')
  .description('Show the effective configuration')
  .option('--init', 'write the effective configuration to the config file')
  .action((options: { init?: boolean }, command: Command) => {
    const globalOpts = command.optsWithGlobals<CLIGlobalOptions>();

    try {
      const service = new ConfigService({ configPath: globalOpts.config });
      if (options.init) {
        service.save();
      }

      const config = service.getConfig();
      if (globalOpts.json) {
        jsonOutput.result({
          configPath: service.getConfigPath(),
          databasePath: service.getDatabasePath(),
          config,
        });
        return;
      }

      if (options.init) {
        terminalOutput.success(`Wrote ${service.getConfigPath()}`);
      }
      terminalOutput.info(`Config file: ${service.getConfigPath()}`);
      terminalOutput.info(`Database: ${service.getDatabasePath()}`);
      console.log(yaml.stringify(config));
    } catch (error) {
      fail(error, globalOpts, 'config');
    }
  });
