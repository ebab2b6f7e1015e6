/**
 * Central output dispatch for CLI commands.
 *
 * Commands call:
 *   cliOutput(data, { command: 'task.show' })
 *
 * JSON (the default) prints the `{ success: true, data }` envelope on one
 * line; --human dispatches to the renderer registered for the command.
 * Errors go through cliError(), which prints to stderr and sets the exit code.
 */

import { getFormatContext } from '../format-context.js';
import { StmError, isStmError } from '../../core/errors.js';
import { ExitCode, getExitCodeName } from '../../types/exit-codes.js';
import type { ConfigSource } from '../../types/config.js';
import type { Task } from '../../types/task.js';
import type { Label, PublicUser } from '../../types/user.js';
import {
  renderDeletedTask, renderTask, renderTaskCategories, renderTaskList,
} from './tasks.js';
import { renderLabel, renderLabelList, renderUser, renderUserList } from './users.js';

// ---------------------------------------------------------------------------
// Command outputs: the data each command emits
// ---------------------------------------------------------------------------

type LabelChange = { label: Label; action: 'added' | 'removed' };

export interface CommandOutputs {
  'user.register': { user: PublicUser };
  'user.login': { user: PublicUser };
  'user.show': { user: PublicUser };
  'user.list': { users: PublicUser[] };
  'user.update': { user: PublicUser };
  'category.add': LabelChange;
  'category.remove': LabelChange;
  'category.list': { labels: Label[] };
  'tag.add': LabelChange;
  'tag.remove': LabelChange;
  'tag.list': { labels: Label[] };
  'task.add': { task: Task };
  'task.show': { task: Task };
  'task.update': { task: Task };
  'task.complete': { task: Task };
  'task.delete': { task: Task };
  'task.list': { tasks: Task[]; total: number };
  'task.categories': { categories: string[] };
  'serve': { url: string };
  'config.get': { key: string; value: unknown; source: ConfigSource };
}

export type CliCommand = keyof CommandOutputs;

// ---------------------------------------------------------------------------
// Renderer registry: maps command name to human renderer function
// ---------------------------------------------------------------------------

type HumanRenderer<K extends CliCommand> = (data: CommandOutputs[K], quiet: boolean) => string;

const renderers: { [K in CliCommand]: HumanRenderer<K> } = {
  'user.register': renderUser,
  'user.login': renderUser,
  'user.show': renderUser,
  'user.list': renderUserList,
  'user.update': renderUser,
  'category.add': renderLabel,
  'category.remove': renderLabel,
  'category.list': renderLabelList,
  'tag.add': renderLabel,
  'tag.remove': renderLabel,
  'tag.list': renderLabelList,
  'task.add': renderTask,
  'task.show': renderTask,
  'task.update': renderTask,
  'task.complete': renderTask,
  'task.delete': renderDeletedTask,
  'task.list': renderTaskList,
  'task.categories': renderTaskCategories,
  'serve': (data, quiet) => (quiet ? data.url : `Listening on ${data.url}`),
  'config.get': (data, quiet) =>
    quiet ? JSON.stringify(data.value) : `${data.key} = ${JSON.stringify(data.value)} (${data.source})`,
};

export interface CliOutputOptions<K extends CliCommand> {
  /** Command name (used to pick the human renderer). */
  command: K;
}

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 */
export function cliOutput<K extends CliCommand>(data: CommandOutputs[K], opts: CliOutputOptions<K>): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const renderer: HumanRenderer<K> = renderers[opts.command];
    const text = renderer(data, ctx.quiet);
    if (text) {
      console.log(text);
    }
    return;
  }

  console.log(JSON.stringify({ success: true, data }));
}

/**
 * Output an error in the resolved format and set the process exit code.
 * Anything that is not an StmError is reported as GENERAL_ERROR.
 */
export function cliError(err: unknown): ExitCode {
  const error = isStmError(err)
    ? err
    : new StmError(ExitCode.GENERAL_ERROR, err instanceof Error ? err.message : String(err), { cause: err });
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    console.error(`Error: ${error.message} (${getExitCodeName(error.code)})`);
    if (error.fix && !ctx.quiet) {
      console.error(`  Fix: ${error.fix}`);
    }
  } else {
    console.error(JSON.stringify(error.toJSON()));
  }

  process.exitCode = error.code;
  return error.code;
}
