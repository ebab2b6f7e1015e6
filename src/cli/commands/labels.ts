/**
 * CLI category and tag commands. Both groups share one shape:
 *   stm category add <name> <color> --user <username>
 *   stm category remove <name> --user <username>
 *   stm category list --user <username>
 */

import { Command } from 'commander';
import { z } from 'zod';
import { userIdFor, withOrchestrator } from '../context.js';
import { cliOutput } from '../renderers/index.js';
import { parseInput } from '../../core/validation.js';
import type { LabelKind } from '../../types/user.js';

const userOptionSchema = z.object({ user: z.string() });

function registerLabelCommand(program: Command, kind: LabelKind): void {
  const plural = kind === 'category' ? 'categories' : 'tags';
  const group = program.command(kind).description(`Manage a user's ${plural}`);

  group
    .command('add <name> <color>')
    .description(`Add a ${kind} (color as #RGB or #RRGGBB)`)
    .requiredOption('-u, --user <username>', 'Owning user')
    .action(async (name: string, color: string, opts: Record<string, unknown>) => {
      const { user } = parseInput(userOptionSchema, opts);
      await withOrchestrator(async (orchestrator) => {
        const userId = await userIdFor(orchestrator, user);
        const label = kind === 'category'
          ? await orchestrator.addCategory(userId, name, color)
          : await orchestrator.addTag(userId, name, color);
        cliOutput({ label, action: 'added' }, { command: kind === 'category' ? 'category.add' : 'tag.add' });
      });
    });

  group
    .command('remove <name>')
    .alias('rm')
    .description(`Remove a ${kind}`)
    .requiredOption('-u, --user <username>', 'Owning user')
    .action(async (name: string, opts: Record<string, unknown>) => {
      const { user } = parseInput(userOptionSchema, opts);
      await withOrchestrator(async (orchestrator) => {
        const userId = await userIdFor(orchestrator, user);
        const label = kind === 'category'
          ? await orchestrator.removeCategory(userId, name)
          : await orchestrator.removeTag(userId, name);
        cliOutput({ label, action: 'removed' }, { command: kind === 'category' ? 'category.remove' : 'tag.remove' });
      });
    });

  group
    .command('list')
    .alias('ls')
    .description(`List a user's ${plural}`)
    .requiredOption('-u, --user <username>', 'Owning user')
    .action(async (opts: Record<string, unknown>) => {
      const { user } = parseInput(userOptionSchema, opts);
      await withOrchestrator(async (orchestrator) => {
        const userId = await userIdFor(orchestrator, user);
        const labels = kind === 'category'
          ? await orchestrator.listCategories(userId)
          : await orchestrator.listTags(userId);
        cliOutput({ labels }, { command: kind === 'category' ? 'category.list' : 'tag.list' });
      });
    });
}

export function registerCategoryCommand(program: Command): void {
  registerLabelCommand(program, 'category');
}

export function registerTagCommand(program: Command): void {
  registerLabelCommand(program, 'tag');
}
