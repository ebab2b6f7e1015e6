/**
 * Human-readable renderers for task commands.
 *
 * Each renderer takes the same data shape that the JSON envelope carries
 * and returns a string suitable for terminal display.
 */

import type { Task } from '../../types/task.js';
import {
  BOLD, DIM, NC, GREEN,
  BOX, hRule,
  completionSymbol, priorityColor, priorityLabel, shortDate,
} from './colors.js';

// ---------------------------------------------------------------------------
// single task detail
// ---------------------------------------------------------------------------

/** Render a single task in a box. */
export function renderTask(data: { task: Task }, quiet: boolean): string {
  const { task } = data;
  if (quiet) return String(task.id);

  const lines: string[] = [];
  const hr = hRule(65);
  const pCol = priorityColor(task.priority);

  lines.push(`${BOX.tl}${hr}${BOX.tr}`);
  lines.push(`${BOX.v}  ${BOLD}#${task.id}${NC} ${completionSymbol(task.completed)} ${pCol}[${priorityLabel(task.priority)}]${NC}`);
  lines.push(`${BOX.v}  ${task.name}`);
  lines.push(`${BOX.ml}${hr}${BOX.mr}`);
  lines.push(`${BOX.v}  ${DIM}Status:${NC}      ${task.completed ? 'completed' : 'open'}`);
  lines.push(`${BOX.v}  ${DIM}Priority:${NC}    ${task.priority}`);
  lines.push(`${BOX.v}  ${DIM}Category:${NC}    ${task.category}`);
  if (task.tags.length) lines.push(`${BOX.v}  ${DIM}Tags:${NC}        ${task.tags.join(', ')}`);
  const due = shortDate(task.dueDate);
  if (due) lines.push(`${BOX.v}  ${DIM}Due:${NC}         ${due}`);

  if (task.description) {
    lines.push(`${BOX.ml}${hr}${BOX.mr}`);
    lines.push(`${BOX.v}  ${BOLD}Description${NC}`);
    for (const line of task.description.split('\n')) {
      lines.push(`${BOX.v}    ${line}`);
    }
  }

  const params = Object.entries(task.parameters);
  if (params.length) {
    lines.push(`${BOX.ml}${hr}${BOX.mr}`);
    lines.push(`${BOX.v}  ${BOLD}Parameters${NC}`);
    for (const [key, value] of params) {
      lines.push(`${BOX.v}    ${key} = ${JSON.stringify(value)}`);
    }
  }

  lines.push(`${BOX.bl}${hr}${BOX.br}`);
  return lines.join('\n');
}

export function renderDeletedTask(data: { task: Task }, quiet: boolean): string {
  if (quiet) return String(data.task.id);
  return `${GREEN}Deleted${NC} task #${data.task.id}: ${data.task.name}`;
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

/** One line per task. */
export function formatTaskLine(task: Task): string {
  const pCol = priorityColor(task.priority);
  const due = shortDate(task.dueDate);
  const tags = task.tags.length ? ` ${DIM}#${task.tags.join(' #')}${NC}` : '';
  return `${String(task.id).padStart(4)} ${completionSymbol(task.completed)} ${pCol}[${task.priority}]${NC} ${task.name} ${DIM}(${task.category})${NC}${due ? ` due ${due}` : ''}${tags}`;
}

export function renderTaskList(data: { tasks: Task[]; total: number }, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => String(t.id)).join('\n');
  if (data.total === 0) return 'No tasks found.';
  const open = data.tasks.filter((t) => !t.completed).length;
  return [
    ...data.tasks.map(formatTaskLine),
    '',
    `${DIM}${data.total} task${data.total === 1 ? '' : 's'}, ${open} open${NC}`,
  ].join('\n');
}

export function renderTaskCategories(data: { categories: string[] }, quiet: boolean): string {
  if (data.categories.length === 0) return quiet ? '' : 'No categories in use.';
  return data.categories.join('\n');
}
