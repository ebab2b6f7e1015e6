/**
 * Human-readable renderers for user, category and tag commands.
 */

import type { Label, PublicUser } from '../../types/user.js';
import { BOLD, DIM, NC, GREEN, RED } from './colors.js';

export function renderUser(data: { user: PublicUser }, quiet: boolean): string {
  const { user } = data;
  if (quiet) return String(user.id);
  const lines = [
    `${BOLD}${user.username}${NC} ${DIM}(#${user.id})${NC}${user.disabled ? ` ${RED}disabled${NC}` : ''}`,
  ];
  if (user.fullName) lines.push(`  ${DIM}Name:${NC}       ${user.fullName}`);
  if (user.email) lines.push(`  ${DIM}Email:${NC}      ${user.email}`);
  lines.push(`  ${DIM}Categories:${NC} ${user.categories.map((c) => c.name).join(', ') || '-'}`);
  lines.push(`  ${DIM}Tags:${NC}       ${user.tags.map((t) => t.name).join(', ') || '-'}`);
  return lines.join('\n');
}

export function renderUserList(data: { users: PublicUser[] }, quiet: boolean): string {
  if (quiet) return data.users.map((u) => u.username).join('\n');
  if (data.users.length === 0) return 'No users registered.';
  return data.users
    .map((u) => `${String(u.id).padStart(4)} ${u.username}${u.disabled ? ` ${DIM}(disabled)${NC}` : ''}`)
    .join('\n');
}

/** `name  #color` */
export function formatLabel(label: Label): string {
  return `${label.name}  ${DIM}${label.color}${NC}`;
}

export function renderLabel(data: { label: Label; action: 'added' | 'removed' }, quiet: boolean): string {
  if (quiet) return data.label.name;
  return `${data.action === 'added' ? 'Added' : 'Removed'} ${formatLabel(data.label)}`;
}

export function renderLabelList(data: { labels: Label[] }, quiet: boolean): string {
  if (quiet) return data.labels.map((l) => l.name).join('\n');
  if (data.labels.length === 0) return 'None.';
  return data.labels.map(formatLabel).join('\n');
}
