/**
 * CLI task commands: add, list, show, update, complete, delete, categories.
 * Every command acts on behalf of the user named by --user.
 */

import { Command, Option } from 'commander';
import { z } from 'zod';
import { userIdFor, withOrchestrator } from '../context.js';
import { cliOutput } from '../renderers/index.js';
import { parseInput, prioritySchema } from '../../core/validation.js';
import { collectParam, parseInteger, parseList } from './parsers.js';

const userOption = { user: z.string() };

const addOptionsSchema = z.object({
  ...userOption,
  description: z.string().optional(),
  category: z.string().optional(),
  priority: prioritySchema.optional(),
  due: z.string().optional(),
  tags: z.array(z.string()).optional(),
  param: z.record(z.unknown()).optional(),
});

const listOptionsSchema = z.object({
  ...userOption,
  completed: z.boolean().optional(),
  open: z.boolean().optional(),
  category: z.string().optional(),
  tag: z.string().optional(),
  priority: z.number().optional(),
});

const updateOptionsSchema = z.object({
  ...userOption,
  name: z.string().optional(),
  description: z.string().optional(),
  category: z.string().optional(),
  priority: prioritySchema.optional(),
  due: z.union([z.string(), z.literal(false)]).optional(),
  tags: z.array(z.string()).optional(),
  param: z.record(z.unknown()).optional(),
});

const userOnlySchema = z.object(userOption);

function userOptionFor(cmd: Command): Command {
  return cmd.requiredOption('-u, --user <username>', 'Acting user');
}

/**
 * Register the task command group.
 */
export function registerTaskCommand(program: Command): void {
  const task = program.command('task').description('Manage tasks');

  userOptionFor(
    task
      .command('add')
      .description('Create a new task')
      .argument('<name>', 'Task name'),
  )
    .option('-d, --description <text>', 'Task description')
    .option('-c, --category <name>', 'Category name (default: General)')
    .option('-p, --priority <n>', 'Priority 0-3', parseInteger)
    .option('--due <date>', 'Due date (ISO-8601)')
    .option('-t, --tags <tags>', 'Comma-separated tag names', parseList)
    .option('--param <key=value>', 'Task parameter (repeatable)', collectParam)
    .action(async (name: string, opts: Record<string, unknown>) => {
      const { user, description, category, priority, due, tags, param } = parseInput(addOptionsSchema, opts);
      await withOrchestrator(async (orchestrator) => {
        const ownerId = await userIdFor(orchestrator, user);
        const created = await orchestrator.createTask(ownerId, {
          name,
          description,
          category,
          priority,
          dueDate: due,
          tags,
          parameters: param,
        });
        cliOutput({ task: created }, { command: 'task.add' });
      });
    });

  userOptionFor(task.command('list').alias('ls').description('List tasks'))
    .addOption(new Option('--completed', 'Only completed tasks').conflicts('open'))
    .addOption(new Option('--open', 'Only open tasks'))
    .option('-c, --category <name>', 'Filter by category')
    .option('--tag <name>', 'Filter by tag')
    .option('-p, --priority <n>', 'Filter by priority', parseInteger)
    .action(async (opts: Record<string, unknown>) => {
      const { user, completed, open, category, tag, priority } = parseInput(listOptionsSchema, opts);
      await withOrchestrator(async (orchestrator) => {
        const ownerId = await userIdFor(orchestrator, user);
        const tasks = await orchestrator.listTasks(ownerId, {
          completed: completed ? true : open ? false : undefined,
          category,
          tag,
          priority,
        });
        cliOutput({ tasks, total: tasks.length }, { command: 'task.list' });
      });
    });

  userOptionFor(
    task
      .command('show')
      .description('Show a task')
      .argument('<taskId>', 'Task id', parseInteger),
  ).action(async (taskId: number, opts: Record<string, unknown>) => {
    const { user } = parseInput(userOnlySchema, opts);
    await withOrchestrator(async (orchestrator) => {
      const ownerId = await userIdFor(orchestrator, user);
      cliOutput({ task: await orchestrator.getTask(taskId, ownerId) }, { command: 'task.show' });
    });
  });

  userOptionFor(
    task
      .command('update')
      .description('Update a task')
      .argument('<taskId>', 'Task id', parseInteger),
  )
    .option('--name <name>', 'New name')
    .option('-d, --description <text>', 'New description')
    .option('-c, --category <name>', 'New category')
    .option('-p, --priority <n>', 'New priority 0-3', parseInteger)
    .option('--due <date>', 'New due date (ISO-8601)')
    .option('--no-due', 'Clear the due date')
    .option('-t, --tags <tags>', 'Replace tags (comma-separated)', parseList)
    .option('--param <key=value>', 'Replace parameters (repeatable)', collectParam)
    .action(async (taskId: number, opts: Record<string, unknown>) => {
      const { user, name, description, category, priority, due, tags, param } = parseInput(updateOptionsSchema, opts);
      await withOrchestrator(async (orchestrator) => {
        const ownerId = await userIdFor(orchestrator, user);
        const updated = await orchestrator.updateTask(taskId, ownerId, {
          name,
          description,
          category,
          priority,
          dueDate: due === false ? null : due,
          tags,
          parameters: param,
        });
        cliOutput({ task: updated }, { command: 'task.update' });
      });
    });

  userOptionFor(
    task
      .command('complete')
      .alias('done')
      .description('Mark a task completed')
      .argument('<taskId>', 'Task id', parseInteger),
  ).action(async (taskId: number, opts: Record<string, unknown>) => {
    const { user } = parseInput(userOnlySchema, opts);
    await withOrchestrator(async (orchestrator) => {
      const ownerId = await userIdFor(orchestrator, user);
      cliOutput({ task: await orchestrator.completeTask(taskId, ownerId) }, { command: 'task.complete' });
    });
  });

  userOptionFor(
    task
      .command('delete')
      .alias('rm')
      .description('Delete a task')
      .argument('<taskId>', 'Task id', parseInteger),
  ).action(async (taskId: number, opts: Record<string, unknown>) => {
    const { user } = parseInput(userOnlySchema, opts);
    await withOrchestrator(async (orchestrator) => {
      const ownerId = await userIdFor(orchestrator, user);
      cliOutput({ task: await orchestrator.deleteTask(taskId, ownerId) }, { command: 'task.delete' });
    });
  });

  userOptionFor(task.command('categories').description('List the categories in use by your tasks'))
    .action(async (opts: Record<string, unknown>) => {
      const { user } = parseInput(userOnlySchema, opts);
      await withOrchestrator(async (orchestrator) => {
        const ownerId = await userIdFor(orchestrator, user);
        cliOutput({ categories: await orchestrator.listTaskCategories(ownerId) }, { command: 'task.categories' });
      });
    });
}
