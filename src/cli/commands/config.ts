/**
 * CLI config command: show one resolved configuration value and where it
 * came from (env, project config file or default).
 */

import { Command } from 'commander';
import { getConfigValue } from '../../core/config.js';
import { StmError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getCliRuntime } from '../context.js';
import { cliError, cliOutput } from '../renderers/index.js';

export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Inspect configuration');

  config
    .command('get <key>')
    .description('Get a configuration value by dotted path (e.g. api.port)')
    .action(async (key: string) => {
      try {
        const resolved = await getConfigValue(key, getCliRuntime().cwd);
        if (resolved.value === undefined) {
          throw new StmError(ExitCode.CONFIG_ERROR, `Unknown config key: ${key}`, {
            fix: 'Use a dotted path such as storage.engine or api.port',
          });
        }
        cliOutput({ key, value: resolved.value, source: resolved.source }, { command: 'config.get' });
      } catch (err) {
        cliError(err);
      }
    });
}
