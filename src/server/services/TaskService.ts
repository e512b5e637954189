import type { DbSession } from '../db/DatabaseManager';
import type { Page, PageQuery, Task, TaskStatus } from '../db/types';
import * as TaskRepo from '../repositories/TaskRepository';
import type { CreateTaskInput, UpdateTaskInput } from '../schemas';
import { InternalError, NotFoundError, ValidationError } from '../errors';
import Logger from '../logger';
import { guard, type ServiceOptions } from './guard';

/**
 * 処理名: ステータス遷移スタンプ
 * 処理概要: in_progress への遷移で start_date、completed / cancelled への遷移で end_date に現在時刻を設定する。
 *          それ以外のステータスでは何も設定しない。
 * @param status 新しいステータス（未指定なら遷移なし）
 * @param now ISO 時刻文字列
 */
export function statusStamps(status: TaskStatus | undefined, now: string): { start_date?: string; end_date?: string } {
    if (status === 'in_progress') return { start_date: now };
    if (status === 'completed' || status === 'cancelled') return { end_date: now };
    return {};
}

/**
 * TaskService
 *
 * 処理名: タスク業務サービス
 * 処理概要: タスクの作成・取得・一覧・部分更新・削除を行う。失敗はドメインエラー（NotFound / Validation / Internal）に分類して送出する。
 *
 * リクエスト単位のセッション（Database）を受け取って動作し、接続の開閉は呼び出し側が行う。
 *
 * @example
 * const task = await withSession(config, (db) => new TaskService(db).create({ title: 'Write report', status: 'pending', priority: 'medium' }));
 *
 * @class
 */
export class TaskService {
    private readonly correlationId: string | null;
    private readonly now: () => Date;

    /**
     * @param db リクエストスコープのセッション
     * @param [options] 相関ID・時計
     */
    constructor(private readonly db: DbSession, options: ServiceOptions = {}) {
        this.correlationId = options.correlationId ?? null;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * 処理名: タスク作成
     * 処理概要: 既定値（pending / medium）を反映した入力から行を作成し、採番後のタスクを返す。
     *          作成時のステータスにも遷移スタンプを適用する。
     * @param input 検証済みの入力
     */
    async create(input: CreateTaskInput): Promise<Task> {
        return guard('creating task', () => new ValidationError('Could not create task'), this.correlationId, async () => {
            const now = this.now().toISOString();
            const stamps = statusStamps(input.status, now);
            const id = await TaskRepo.insertTask(this.db, {
                title: input.title,
                description: input.description ?? null,
                due_date: input.due_date ?? null,
                start_date: stamps.start_date ?? null,
                end_date: stamps.end_date ?? null,
                status: input.status,
                priority: input.priority,
            }, now);
            const task = await this.getById(id);
            Logger.info(`Created task: ${task.title}`, this.correlationId, { id });
            return task;
        });
    }

    async getById(id: number): Promise<Task> {
        return guard(`retrieving task ${id}`, () => new InternalError('Error retrieving task'), this.correlationId, async () => {
            const task = await TaskRepo.getTask(this.db, id);
            if (!task) {
                Logger.warn(`Task not found: ${id}`, this.correlationId);
                throw new NotFoundError('Task not found');
            }
            return task;
        });
    }

    async list(query: PageQuery): Promise<Page<Task>> {
        return guard('retrieving tasks', () => new InternalError('Error retrieving tasks'), this.correlationId, () =>
            TaskRepo.listTasks(this.db, query)
        );
    }

    /**
     * 処理名: タスク部分更新
     * 処理概要: 入力に存在するフィールドだけを反映する。status を含む場合は遷移スタンプを併せて更新する。
     * @param id
     * @param changes 検証済みの部分入力
     * @returns 更新後のタスク
     */
    async update(id: number, changes: UpdateTaskInput): Promise<Task> {
        return guard(`updating task ${id}`, () => new ValidationError('Could not update task'), this.correlationId, async () => {
            await this.getById(id);
            const now = this.now().toISOString();
            await TaskRepo.updateTask(this.db, id, { ...changes, ...statusStamps(changes.status, now) });
            Logger.info(`Updated task: ${id}`, this.correlationId);
            return this.getById(id);
        });
    }

    async delete(id: number): Promise<void> {
        return guard(`deleting task ${id}`, () => new InternalError('Could not delete task'), this.correlationId, async () => {
            await this.getById(id);
            await TaskRepo.deleteTask(this.db, id);
            Logger.info(`Deleted task: ${id}`, this.correlationId);
        });
    }
}

export default TaskService;
