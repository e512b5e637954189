import type { DbSession } from '../db/DatabaseManager';
import {
  TASK_PRIORITIES,
  TASK_PRIORITY_NAMES,
  type Page,
  type PageQuery,
  type Task,
  type TaskPriority,
  type TaskRow,
  type TaskStatus,
} from '../db/types';
import type { SqlRow } from '../db/connection';
import { taskRowSchema } from '../db/rows';
import { containsPattern, deleteRow, emptyFilter, insertRow, selectPage, updateColumns } from './sql';

const TABLE = 'tasks';

export interface TaskInsert {
  title: string;
  description: string | null;
  due_date: string | null;
  start_date: string | null;
  end_date: string | null;
  status: TaskStatus;
  priority: TaskPriority;
}

export interface TaskChanges {
  title?: string;
  description?: string | null;
  due_date?: string | null;
  start_date?: string;
  end_date?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
}

/**
 * 処理名: 優先度名の逆引き
 * 処理概要: DB に保存された序数（1..3）を low / medium / high に戻す。
 */
export function priorityName(value: number): TaskPriority {
  const found = TASK_PRIORITY_NAMES.find((k) => TASK_PRIORITIES[k] === value);
  if (!found) {
    throw new Error(`Unknown task priority value: ${value}`);
  }
  return found;
}

export function toTask(row: TaskRow): Task {
  return { ...row, priority: priorityName(row.priority) };
}

function readTask(row: SqlRow): Task {
  return toTask(taskRowSchema.parse(row));
}

export async function insertTask(db: DbSession, input: TaskInsert, now: string): Promise<number> {
  return insertRow(db, TABLE, {
    title: input.title,
    description: input.description,
    due_date: input.due_date,
    start_date: input.start_date,
    end_date: input.end_date,
    status: input.status,
    priority: TASK_PRIORITIES[input.priority],
    created_at: now,
  });
}

export async function getTask(db: DbSession, id: number): Promise<Task | null> {
  const row = await db.get(`SELECT * FROM ${TABLE} WHERE id = ?`, id);
  return row ? readTask(row) : null;
}

/**
 * 処理名: タスク一覧
 * 処理概要: タイトルの部分一致で絞り込み、id 昇順でページ取得する。
 */
export async function listTasks(db: DbSession, query: PageQuery): Promise<Page<Task>> {
  const filter = emptyFilter();
  if (query.search) {
    filter.clauses.push(`title LIKE ? ESCAPE '\\'`);
    filter.params.push(containsPattern(query.search));
  }
  return selectPage(db, TABLE, filter, query.page, query.size, readTask);
}

/**
 * 処理名: タスク更新
 * 処理概要: 指定された列だけを上書きする。タスクには updated_at 列は無い。
 */
export async function updateTask(db: DbSession, id: number, changes: TaskChanges): Promise<number> {
  return updateColumns(db, TABLE, id, {
    title: changes.title,
    description: changes.description,
    due_date: changes.due_date,
    start_date: changes.start_date,
    end_date: changes.end_date,
    status: changes.status,
    priority: changes.priority === undefined ? undefined : TASK_PRIORITIES[changes.priority],
  });
}

export async function deleteTask(db: DbSession, id: number): Promise<boolean> {
  return deleteRow(db, TABLE, id);
}
