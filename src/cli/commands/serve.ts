/**
 * CLI command: serve. Starts the REST API on the configured host and port.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { buildServer } from '../../api/server.js';
import { Orchestrator } from '../../core/orchestrator.js';
import { closeLogger, getLogger } from '../../core/logger.js';
import { parseInput } from '../../core/validation.js';
import { getCliRuntime } from '../context.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { parseInteger } from './parsers.js';

const serveOptionsSchema = z.object({
  host: z.string().optional(),
  port: z.number().int().min(0).max(65535).optional(),
});

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the REST API server')
    .option('--host <host>', 'Interface to bind (default from config)')
    .option('--port <port>', 'Port to listen on (default from config)', parseInteger)
    .action(async (opts: Record<string, unknown>) => {
      const { config, options } = getCliRuntime();
      const log = getLogger('serve');
      let orchestrator: Orchestrator | null = null;
      try {
        const { host, port } = parseInput(serveOptionsSchema, opts);
        orchestrator = await Orchestrator.create(options);
        const app = await buildServer(orchestrator, config);
        const url = await app.listen({ host: host ?? config.api.host, port: port ?? config.api.port });
        cliOutput({ url }, { command: 'serve' });

        const running = orchestrator;
        const shutdown = async (signal: string): Promise<void> => {
          log.info({ signal }, 'Shutting down');
          try {
            await app.close();
            await running.close();
          } catch (err) {
            cliError(err);
          } finally {
            closeLogger();
          }
        };
        process.once('SIGINT', (signal) => void shutdown(signal));
        process.once('SIGTERM', (signal) => void shutdown(signal));
      } catch (err) {
        await orchestrator?.close();
        cliError(err);
      }
    });
}
