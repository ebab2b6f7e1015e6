/**
 * Drizzle ORM schema for stm.db (SQLite via sql.js + sqlite-proxy).
 *
 * Tables: users, tasks, schema_meta. Categories and tags are JSON columns on the user
 * row; task parameters and tag names are JSON columns on the task row.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { TaskParameters, TaskPriority } from '../types/task.js';
import type { Category, Tag } from '../types/user.js';

// === USERS TABLE ===

export const users = sqliteTable('users', {
  id: integer('id').primaryKey(),
  username: text('username').notNull().unique(),
  email: text('email').notNull().default(''),
  hashedPassword: text('hashed_password').notNull(),
  fullName: text('full_name').notNull().default(''),
  disabled: integer('disabled', { mode: 'boolean' }).notNull().default(false),
  categories: text('categories', { mode: 'json' }).$type<Category[]>().notNull(),
  tags: text('tags', { mode: 'json' }).$type<Tag[]>().notNull(),
});

// === TASKS TABLE ===

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey(),
  ownerId: integer('owner_id').notNull().references(() => users.id),
  name: text('name').notNull(),
  description: text('description').notNull().default(''),
  category: text('category').notNull().default('General'),
  dueDate: text('due_date'),
  parameters: text('parameters', { mode: 'json' }).$type<TaskParameters>().notNull(),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  tags: text('tags', { mode: 'json' }).$type<string[]>().notNull(),
  priority: integer('priority').$type<TaskPriority>().notNull().default(0),
}, (table) => [
  index('idx_tasks_owner_id').on(table.ownerId),
  index('idx_tasks_completed').on(table.completed),
]);

// === SCHEMA META TABLE ===

export const schemaMeta = sqliteTable('schema_meta', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});

// === TYPE EXPORTS ===

export type UserRow = typeof users.$inferSelect;
export type NewUserRow = typeof users.$inferInsert;
export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = typeof tasks.$inferInsert;

/**
 * DDL matching the tables above. Applied with IF NOT EXISTS on every open.
 */
export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY,
  username TEXT NOT NULL UNIQUE,
  email TEXT NOT NULL DEFAULT '',
  hashed_password TEXT NOT NULL,
  full_name TEXT NOT NULL DEFAULT '',
  disabled INTEGER NOT NULL DEFAULT 0,
  categories TEXT NOT NULL DEFAULT '[]',
  tags TEXT NOT NULL DEFAULT '[]'
);
CREATE TABLE IF NOT EXISTS tasks (
  id INTEGER PRIMARY KEY,
  owner_id INTEGER NOT NULL REFERENCES users(id),
  name TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  category TEXT NOT NULL DEFAULT 'General',
  due_date TEXT,
  parameters TEXT NOT NULL DEFAULT '{}',
  completed INTEGER NOT NULL DEFAULT 0,
  tags TEXT NOT NULL DEFAULT '[]',
  priority INTEGER NOT NULL DEFAULT 0 CHECK (priority BETWEEN 0 AND 3)
);
CREATE INDEX IF NOT EXISTS idx_tasks_owner_id ON tasks(owner_id);
CREATE INDEX IF NOT EXISTS idx_tasks_completed ON tasks(completed);
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;
