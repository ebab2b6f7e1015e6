/**
 * Input validation for every Orchestrator operation.
 *
 * Schemas trim and default their input the way entities are stored, so a
 * parsed value can be handed to a backend as-is. `parseInput` converts zod
 * failures into StmError with an Invalid-category exit code.
 */

import { z } from 'zod';
import { StmError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { DEFAULT_TASK_CATEGORY, TASK_PRIORITIES } from '../types/task.js';

/** `#RGB` or `#RRGGBB`. */
export const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}){1,2}$/;

const nameSchema = z.string().trim().min(1, 'must not be empty');

export const colorSchema = z.string().trim().regex(HEX_COLOR, 'must be a hex color like #RGB or #RRGGBB');

// === LABELS ===

export const labelSchema = z.object({
  name: nameSchema,
  color: colorSchema,
});

export const categorySchema = labelSchema;
export const tagSchema = labelSchema;

// === TASKS ===

export const prioritySchema = z.union(
  [z.literal(0), z.literal(1), z.literal(2), z.literal(3)],
  { errorMap: () => ({ message: `must be one of ${TASK_PRIORITIES.join(', ')}` }) },
);

const categoryNameSchema = z
  .string()
  .trim()
  .transform((name) => (name === '' ? DEFAULT_TASK_CATEGORY : name));

/** Any date string Date can parse, normalized to an ISO-8601 timestamp. */
export const dueDateSchema = z
  .string()
  .trim()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'must be an ISO-8601 date or timestamp')
  .transform((value) => new Date(value).toISOString())
  .nullable();

const parametersSchema = z.record(z.unknown());

const taskTagsSchema = z.array(nameSchema);

export const taskCreateSchema = z.object({
  name: nameSchema,
  description: z.string().trim().default(''),
  category: categoryNameSchema.default(DEFAULT_TASK_CATEGORY),
  dueDate: dueDateSchema.default(null),
  parameters: parametersSchema.default({}),
  completed: z.boolean().default(false),
  tags: taskTagsSchema.default([]),
  priority: prioritySchema.default(0),
});

export type TaskCreateInput = z.input<typeof taskCreateSchema>;

export const taskUpdateSchema = z.object({
  name: nameSchema.optional(),
  description: z.string().trim().optional(),
  category: categoryNameSchema.optional(),
  dueDate: dueDateSchema.optional(),
  parameters: parametersSchema.optional(),
  completed: z.boolean().optional(),
  tags: taskTagsSchema.optional(),
  priority: prioritySchema.optional(),
});

export type TaskUpdateInput = z.input<typeof taskUpdateSchema>;

/** Filters arrive typed from the CLI and as strings from a query string. */
export const taskFiltersSchema = z.object({
  completed: z
    .union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')])
    .optional(),
  category: nameSchema.optional(),
  tag: nameSchema.optional(),
  priority: z.coerce.number().pipe(prioritySchema).optional(),
});

export type TaskFiltersInput = z.input<typeof taskFiltersSchema>;

// === USERS ===

export const userRegisterSchema = z.object({
  username: nameSchema,
  email: z.string().trim().default(''),
  password: z.string().min(1, 'must not be empty'),
  fullName: z.string().trim().default(''),
  categories: z.array(labelSchema).optional(),
  tags: z.array(labelSchema).optional(),
});

export type UserRegisterInput = z.input<typeof userRegisterSchema>;

export const userUpdateSchema = z.object({
  username: nameSchema.optional(),
  email: z.string().trim().optional(),
  fullName: z.string().trim().optional(),
  disabled: z.boolean().optional(),
});

export type UserUpdateInput = z.input<typeof userUpdateSchema>;

export const credentialsSchema = z.object({
  username: z.string().trim(),
  password: z.string(),
});

/** Positive integer id, from a number or a numeric path segment. */
export const idSchema = z.coerce.number().int().positive();

// === PARSING ===

function exitCodeForPath(path: ReadonlyArray<string | number>): ExitCode {
  const field = path[path.length - 1];
  if (field === 'priority') return ExitCode.INVALID_PRIORITY;
  if (field === 'color') return ExitCode.INVALID_COLOR;
  return ExitCode.VALIDATION_ERROR;
}

/**
 * Parse `value` with `schema`, throwing StmError on failure.
 * The first issue decides the exit code and the message.
 */
export function parseInput<T, I>(schema: z.ZodType<T, z.ZodTypeDef, I>, value: unknown): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const first = result.error.issues[0];
  const code = first ? exitCodeForPath(first.path) : ExitCode.VALIDATION_ERROR;
  const label = issues[0]?.path ? `${issues[0].path}: ` : '';
  throw new StmError(code, `Invalid input: ${label}${issues[0]?.message ?? 'validation failed'}`, {
    details: { issues },
  });
}
