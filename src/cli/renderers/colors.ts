/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain ASCII when Unicode is not supported.
 */

import type { TaskPriority } from '../../types/task.js';

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

/** Whether Unicode box-drawing characters are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const BOLD = ansi('\x1b[1m');
export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');
export const GREEN = ansi('\x1b[0;32m');
export const YELLOW = ansi('\x1b[1;33m');
export const BLUE = ansi('\x1b[0;34m');
export const CYAN = ansi('\x1b[0;36m');

// ---------------------------------------------------------------------------
// Completion and priority
// ---------------------------------------------------------------------------

/** Checkbox for a task's completion state. */
export function completionSymbol(completed: boolean): string {
  if (unicodeEnabled) return completed ? '✔' : '○';
  return completed ? '[x]' : '[ ]';
}

const PRIORITY_LABELS: Record<TaskPriority, string> = {
  0: 'none',
  1: 'low',
  2: 'medium',
  3: 'high',
};

export function priorityLabel(priority: TaskPriority): string {
  return PRIORITY_LABELS[priority];
}

/** Map task priority to a color escape. */
export function priorityColor(priority: TaskPriority): string {
  switch (priority) {
    case 3: return RED;
    case 2: return YELLOW;
    case 1: return BLUE;
    default: return DIM;
  }
}

// ---------------------------------------------------------------------------
// Box drawing
// ---------------------------------------------------------------------------

export const BOX = unicodeEnabled
  ? { tl: '╭', tr: '╮', bl: '╰', br: '╯', h: '─', v: '│', ml: '├', mr: '┤' }
  : { tl: '+', tr: '+', bl: '+', br: '+', h: '-', v: '|', ml: '+', mr: '+' };

/** Create a horizontal rule with box-drawing characters. */
export function hRule(width: number = 65): string {
  return BOX.h.repeat(width);
}

/** Format a date string as YYYY-MM-DD. */
export function shortDate(isoDate: string | null | undefined): string {
  if (!isoDate) return '';
  return isoDate.split('T')[0] ?? isoDate;
}
