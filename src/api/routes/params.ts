/**
 * Path-parameter parsing shared by the route modules.
 */

import { z } from 'zod';
import { idSchema, parseInput } from '../../core/validation.js';

const userParamsSchema = z.object({ userId: idSchema });
const taskParamsSchema = z.object({ taskId: idSchema });
const labelParamsSchema = z.object({ userId: idSchema, name: z.string() });

export function parseUserId(params: unknown): number {
  return parseInput(userParamsSchema, params).userId;
}

export function parseTaskId(params: unknown): number {
  return parseInput(taskParamsSchema, params).taskId;
}

export function parseLabelParams(params: unknown): { userId: number; name: string } {
  return parseInput(labelParamsSchema, params);
}
