/**
 * 処理名: エンティティ型定義
 * 処理概要: DB に保存される各エンティティの素のデータ表現。振る舞いは持たず、操作はリポジトリ関数が担う。
 */

export const TASK_STATUSES = ['pending', 'in_progress', 'completed', 'cancelled'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITY_NAMES = ['low', 'medium', 'high'] as const;
export type TaskPriority = (typeof TASK_PRIORITY_NAMES)[number];

export const TASK_PRIORITIES = { low: 1, medium: 2, high: 3 } as const satisfies Record<TaskPriority, number>;
export type TaskPriorityValue = (typeof TASK_PRIORITIES)[TaskPriority];

/** Task as stored in the `tasks` table (priority is kept as its ordinal). */
export interface TaskRow {
    id: number;
    title: string;
    description: string | null;
    due_date: string | null;
    start_date: string | null;
    end_date: string | null;
    status: TaskStatus;
    priority: TaskPriorityValue;
    created_at: string;
}

/** Task as returned to clients (priority by name). */
export interface Task extends Omit<TaskRow, 'priority'> {
    priority: TaskPriority;
}

export interface Character {
    id: number;
    name: string;
    village: string;
    rank: string | null;
    created_at: string;
    updated_at: string;
}

export interface Jutsu {
    id: number;
    name: string;
    type: string;
    chakra_cost: number;
    created_at: string;
    updated_at: string;
    character_id: number | null;
}

/**
 * 処理名: ページ情報
 * 処理概要: 一覧 API が返すページエンベロープ
 */
export interface Page<T> {
    items: T[];
    total: number;
    page: number;
    size: number;
    pages: number;
    has_next: boolean;
    has_prev: boolean;
}

export interface PageQuery {
    page: number;
    size: number;
    search?: string;
}
