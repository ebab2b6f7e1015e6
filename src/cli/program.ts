/**
 * Commander program for the `stm` binary.
 *
 * createProgram() builds a fresh program on every call so tests can run
 * commands in-process with exitOverride().
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { loadConfig, resolveOrchestratorOptions } from '../core/config.js';
import { getDataDirAbsolute } from '../core/paths.js';
import { initLogger } from '../core/logger.js';
import { parseInput } from '../core/validation.js';
import { resolveFormat, setFormatContext } from './format-context.js';
import { setCliRuntime } from './context.js';
import { registerUserCommand } from './commands/user.js';
import { registerCategoryCommand, registerTagCommand } from './commands/labels.js';
import { registerTaskCommand } from './commands/task.js';
import { registerServeCommand } from './commands/serve.js';
import { registerConfigCommand } from './commands/config.js';

export interface CreateProgramOptions {
  /** Start the rolling file logger before each command. Default true. */
  initLogging?: boolean;
  /** Working directory the data directory resolves against. */
  cwd?: string;
  /** Throw CommanderError instead of exiting the process. Subcommands inherit it. */
  exitOverride?: boolean;
}

const globalOptionsSchema = z.object({
  json: z.boolean().optional(),
  human: z.boolean().optional(),
  quiet: z.boolean().optional(),
  engine: z.string().optional(),
});

const packageJsonSchema = z.object({ version: z.string() });

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  let pkg: unknown;
  try {
    // src/cli/program.ts and dist/cli/program.js both sit two levels down
    pkg = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  } catch {
    return '0.0.0';
  }
  const parsed = packageJsonSchema.safeParse(pkg);
  return parsed.success ? parsed.data.version : '0.0.0';
}

export function createProgram(options: CreateProgramOptions = {}): Command {
  const { initLogging = true, cwd, exitOverride = false } = options;
  const program = new Command();
  if (exitOverride) {
    program.exitOverride();
  }

  program
    .name('stm')
    .description('Smart Task Manager - per-user tasks, categories and tags')
    .version(getPackageVersion())
    .option('--json', 'Output in JSON format (default)')
    .option('--human', 'Output in human-readable format')
    .option('--quiet', 'Suppress non-essential output for scripting')
    .addOption(new Option('--engine <engine>', 'Storage engine (overrides config)').choices(['sqlite', 'json']));

  registerUserCommand(program);
  registerCategoryCommand(program);
  registerTagCommand(program);
  registerTaskCommand(program);
  registerServeCommand(program);
  registerConfigCommand(program);

  // Resolve output format, load config and open the log before any command.
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    const globals = parseInput(globalOptionsSchema, actionCommand.optsWithGlobals());
    setFormatContext(resolveFormat(globals));

    const config = await loadConfig(cwd);
    if (initLogging) {
      initLogger(getDataDirAbsolute(cwd), config.logging);
    }
    setCliRuntime({ config, options: resolveOrchestratorOptions(config, cwd, globals.engine), cwd });
  });

  return program;
}
