/**
 * 処理名: 行スキーマ
 * 処理概要: SQLite から読み出した行（列名 → 値）を検証してエンティティ型へ変換する zod スキーマ。
 *          テーブル定義と型定義がずれた場合は読み出し時にエラーになる。
 */
import { z } from 'zod';
import { TASK_STATUSES, type Character, type Jutsu, type TaskRow } from './types';

const timestamp = z.string();

export const characterRowSchema: z.ZodType<Character> = z.object({
    id: z.number().int(),
    name: z.string(),
    village: z.string(),
    rank: z.string().nullable(),
    created_at: timestamp,
    updated_at: timestamp,
});

export const jutsuRowSchema: z.ZodType<Jutsu> = z.object({
    id: z.number().int(),
    name: z.string(),
    type: z.string(),
    chakra_cost: z.number().int(),
    created_at: timestamp,
    updated_at: timestamp,
    character_id: z.number().int().nullable(),
});

export const taskRowSchema: z.ZodType<TaskRow> = z.object({
    id: z.number().int(),
    title: z.string(),
    description: z.string().nullable(),
    due_date: timestamp.nullable(),
    start_date: timestamp.nullable(),
    end_date: timestamp.nullable(),
    status: z.enum(TASK_STATUSES),
    priority: z.union([z.literal(1), z.literal(2), z.literal(3)]),
    created_at: timestamp,
});

export const countRowSchema = z.object({ total: z.number().int() });
