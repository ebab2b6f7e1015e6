/**
 * CLI runtime context.
 *
 * Singleton holding the configuration and Orchestrator options resolved by
 * the preAction hook. Commands open an Orchestrator per invocation through
 * withOrchestrator(), which also routes failures to cliError().
 */

import { Orchestrator, type OrchestratorOptions } from '../core/orchestrator.js';
import { StmError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import type { AppConfig } from '../types/config.js';
import { cliError } from './renderers/index.js';

export interface CliRuntime {
  config: AppConfig;
  options: OrchestratorOptions;
  /** Working directory the data directory was resolved against. */
  cwd?: string;
}

let currentRuntime: CliRuntime | null = null;

export function setCliRuntime(runtime: CliRuntime): void {
  currentRuntime = runtime;
}

export function getCliRuntime(): CliRuntime {
  if (!currentRuntime) {
    throw new StmError(ExitCode.GENERAL_ERROR, 'CLI runtime used before configuration was loaded');
  }
  return currentRuntime;
}

/**
 * Open an Orchestrator, run `fn`, and close it again. Errors are reported
 * with cliError(), which sets the process exit code.
 */
export async function withOrchestrator(fn: (orchestrator: Orchestrator) => Promise<void>): Promise<void> {
  let orchestrator: Orchestrator | null = null;
  try {
    orchestrator = await Orchestrator.create(getCliRuntime().options);
    await fn(orchestrator);
  } catch (err) {
    cliError(err);
  } finally {
    await orchestrator?.close();
  }
}

/** Resolve a username to its user id. */
export async function userIdFor(orchestrator: Orchestrator, username: string): Promise<number> {
  return (await orchestrator.getUserByUsername(username)).id;
}
