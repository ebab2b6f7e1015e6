/**
 * CLI user commands: register, login, show, list, update.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { withOrchestrator } from '../context.js';
import { cliOutput } from '../renderers/index.js';
import { parseInput } from '../../core/validation.js';

const registerOptionsSchema = z.object({
  password: z.string(),
  email: z.string().optional(),
  fullName: z.string().optional(),
});

const loginOptionsSchema = z.object({
  password: z.string().optional(),
});

const updateOptionsSchema = z.object({
  email: z.string().optional(),
  fullName: z.string().optional(),
  rename: z.string().optional(),
  disable: z.boolean().optional(),
  enable: z.boolean().optional(),
});

/**
 * Register the user command group.
 */
export function registerUserCommand(program: Command): void {
  const user = program.command('user').description('Manage users');

  user
    .command('register <username>')
    .description('Register a new user')
    .requiredOption('--password <password>', 'Account password')
    .option('--email <email>', 'Email address')
    .option('--full-name <name>', 'Full name')
    .action(async (username: string, opts: Record<string, unknown>) => {
      const { password, email, fullName } = parseInput(registerOptionsSchema, opts);
      await withOrchestrator(async (orchestrator) => {
        const created = await orchestrator.registerUser({ username, password, email, fullName });
        cliOutput({ user: created }, { command: 'user.register' });
      });
    });

  user
    .command('login <username>')
    .description('Check a password, or without one look the user up and create it if missing')
    .option('--password <password>', 'Account password')
    .action(async (username: string, opts: Record<string, unknown>) => {
      const { password } = parseInput(loginOptionsSchema, opts);
      await withOrchestrator(async (orchestrator) => {
        if (password === undefined) {
          cliOutput({ user: await orchestrator.ensureUser(username) }, { command: 'user.login' });
          return;
        }
        const identity = await orchestrator.authenticate(username, password);
        cliOutput({ user: await orchestrator.getUser(identity.userId) }, { command: 'user.login' });
      });
    });

  user
    .command('show <username>')
    .description('Show a user')
    .action(async (username: string) => {
      await withOrchestrator(async (orchestrator) => {
        cliOutput({ user: await orchestrator.getUserByUsername(username) }, { command: 'user.show' });
      });
    });

  user
    .command('list')
    .alias('ls')
    .description('List all users')
    .action(async () => {
      await withOrchestrator(async (orchestrator) => {
        cliOutput({ users: await orchestrator.listUsers() }, { command: 'user.list' });
      });
    });

  user
    .command('update <username>')
    .description('Update profile fields or enable/disable a user')
    .option('--email <email>', 'New email address')
    .option('--full-name <name>', 'New full name')
    .option('--rename <username>', 'New username')
    .option('--disable', 'Disable the account')
    .option('--enable', 'Re-enable the account')
    .action(async (username: string, opts: Record<string, unknown>) => {
      const { email, fullName, rename, disable, enable } = parseInput(updateOptionsSchema, opts);
      const disabled = disable ? true : enable ? false : undefined;
      await withOrchestrator(async (orchestrator) => {
        const current = await orchestrator.getUserByUsername(username);
        const updated = await orchestrator.updateUser(current.id, { username: rename, email, fullName, disabled });
        cliOutput({ user: updated }, { command: 'user.update' });
      });
    });
}
