/**
 * Zod schemas for request payloads, query strings and path ids.
 * Server-controlled fields (id, created_at, updated_at, start_date, end_date) are not part of any
 * input schema; unknown keys are stripped.
 */
import { z, ZodError } from 'zod';
import { TASK_STATUSES, TASK_PRIORITY_NAMES, type TaskPriority } from './db/types';
import { priorityName } from './repositories/TaskRepository';

export const taskStatusSchema = z.enum(TASK_STATUSES);

// name ("medium") or ordinal (2); always handed on as the name
export const taskPrioritySchema = z
  .union([z.enum(TASK_PRIORITY_NAMES), z.literal(1), z.literal(2), z.literal(3)])
  .transform((v): TaskPriority => (typeof v === 'number' ? priorityName(v) : v));

// the datetime check accepts offsets such as +99:99 that Date cannot represent
const isoTimestamp = z
  .string()
  .datetime({ offset: true })
  .transform((v, ctx) => {
    const ms = Date.parse(v);
    if (Number.isNaN(ms)) {
      ctx.addIssue({ code: z.ZodIssueCode.invalid_date, message: 'Invalid datetime' });
      return z.NEVER;
    }
    return new Date(ms).toISOString();
  });

const positiveId = z.number().int().min(1).max(Number.MAX_SAFE_INTEGER);

// Task
export const createTaskSchema = z.object({
  title: z.string().min(1).max(100),
  description: z.string().max(1000).nullable().optional(),
  due_date: isoTimestamp.nullable().optional(),
  status: taskStatusSchema.default('pending'),
  priority: taskPrioritySchema.default('medium'),
});

export const updateTaskSchema = z.object({
  title: z.string().min(1).max(100).optional(),
  description: z.string().max(1000).nullable().optional(),
  due_date: isoTimestamp.nullable().optional(),
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
});

// Character
export const createCharacterSchema = z.object({
  name: z.string().min(1).max(100),
  village: z.string().min(1).max(50),
  rank: z.string().max(50).nullable().optional(),
});

export const updateCharacterSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  village: z.string().min(1).max(50).optional(),
  rank: z.string().max(50).nullable().optional(),
});

// Jutsu
export const createJutsuSchema = z.object({
  name: z.string().min(1).max(100),
  type: z.string().min(1).max(50),
  chakra_cost: z.number().int().min(1).default(10),
  character_id: positiveId.nullable().optional(),
});

export const updateJutsuSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  type: z.string().min(1).max(50).optional(),
  chakra_cost: z.number().int().min(1).optional(),
  character_id: positiveId.nullable().optional(),
});

// Query strings arrive as text
export const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).max(Number.MAX_SAFE_INTEGER).default(1),
  size: z.coerce.number().int().min(1).max(100).default(10),
  search: z.string().min(3).max(50).optional(),
});

export const jutsuPageQuerySchema = pageQuerySchema.extend({
  character_id: z.coerce.number().int().min(1).max(Number.MAX_SAFE_INTEGER).optional(),
});

const pathId = z.coerce.number().int().min(1).max(Number.MAX_SAFE_INTEGER);

/**
 * 処理名: パス ID 検証
 * 処理概要: `/characters/:character_id` などのパス上の id を 1 以上の整数として取り出す。
 *          失敗時はパラメータ名を path に付けた ZodError を送出する。
 * @param name パラメータ名（エラーの field になる）
 * @param raw req.params の値
 */
export function parsePathId(name: string, raw: unknown): number {
  const result = pathId.safeParse(raw);
  if (!result.success) {
    throw new ZodError(result.error.issues.map((issue) => ({ ...issue, path: [name, ...issue.path] })));
  }
  return result.data;
}

export type CreateTaskInput = z.infer<typeof createTaskSchema>;
export type UpdateTaskInput = z.infer<typeof updateTaskSchema>;
export type CreateCharacterInput = z.infer<typeof createCharacterSchema>;
export type UpdateCharacterInput = z.infer<typeof updateCharacterSchema>;
export type CreateJutsuInput = z.infer<typeof createJutsuSchema>;
export type UpdateJutsuInput = z.infer<typeof updateJutsuSchema>;

export interface FieldError {
  field: string;
  message: string;
  type: string;
}

/**
 * 処理名: 検証エラー整形
 * 処理概要: ZodError を 422 レスポンス用の `{ field, message, type }` 配列に変換する。
 *          field は問題箇所のパスの末尾（ボディ全体の場合は "body"）。
 */
export function fieldErrors(error: ZodError): FieldError[] {
  return error.errors.map((e) => {
    const last = e.path[e.path.length - 1];
    return {
      field: last === undefined ? 'body' : String(last),
      message: e.message,
      type: e.code,
    };
  });
}
