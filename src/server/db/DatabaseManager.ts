import path from 'path';
import type { AppConfig } from '../config';
import { openDatabaseFile, type DbSession } from './connection';

export type { DbSession } from './connection';

/**
 * 処理名: データベースパス解決
 *
 * 処理概要:
 * DATABASE_URL 形式の文字列（`sqlite:///./data/app.db`、`sqlite:////abs/app.db`、
 * `file:data/app.db` またはプレーンなパス）から SQLite ファイルの絶対パスを求める。
 * 相対パスはカレントワーキングディレクトリを基準に解決する。
 *
 * @param databaseUrl 設定値
 * @returns DB ファイルへの絶対パス
 */
export function resolveDatabasePath(databaseUrl: string): string {
    let target = databaseUrl.trim();
    if (target.startsWith('sqlite:///')) {
        target = target.slice('sqlite:///'.length);
    } else if (target.startsWith('sqlite://')) {
        target = target.slice('sqlite://'.length);
    } else if (target.startsWith('file:')) {
        target = target.slice('file:'.length);
    }
    if (target.length === 0 || target === ':memory:') {
        throw new Error(`Unsupported database url: ${databaseUrl}`);
    }
    return path.resolve(target);
}

/**
 * 処理名: セッションオープン
 *
 * 処理概要:
 * 設定から解決したファイルを開き、外部キー制約を有効化したセッションを返す。
 * 格納ディレクトリが存在しなければ作成する。同じファイルのセッションは 1 つずつ順に開かれるため、
 * 呼び出し側は必ず close する責務を負う。
 *
 * @param config アプリケーション設定
 * @returns オープン済みのセッション
 */
export async function openSession(config: Pick<AppConfig, 'databaseUrl'>): Promise<DbSession> {
    return openDatabaseFile(resolveDatabasePath(config.databaseUrl));
}

/**
 * 処理名: スコープ付きセッション実行
 *
 * 処理概要:
 * 接続を開いて fn に渡し、成功・失敗に関わらず接続を閉じる。fn の戻り値・例外はそのまま呼び出し元へ返す。
 *
 * @param config アプリケーション設定
 * @param fn 接続を使う処理
 * @returns fn の結果
 */
export async function withSession<T>(
    config: Pick<AppConfig, 'databaseUrl'>,
    fn: (db: DbSession) => Promise<T>
): Promise<T> {
    const db = await openSession(config);
    try {
        return await fn(db);
    } finally {
        await db.close();
    }
}

/**
 * 処理名: データベーススキーマ初期化
 *
 * 処理概要:
 * characters / jutsus / tasks テーブルとインデックスを存在しなければ作成する。何度実行しても既存データは壊さない。
 * jutsus.character_id はキャラクター削除時に NULL へ更新される（所有者なしの術として残る）。
 *
 * @param config アプリケーション設定
 */
export async function initializeDatabase(config: Pick<AppConfig, 'databaseUrl'>): Promise<void> {
    await withSession(config, async (db) => {
        await db.exec(`
            CREATE TABLE IF NOT EXISTS characters (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                name TEXT NOT NULL,
                village TEXT NOT NULL,
                rank TEXT,
                created_at TEXT NOT NULL,
                updated_at TEXT NOT NULL
            )
        `);
        await db.exec('CREATE INDEX IF NOT EXISTS ix_characters_name ON characters (name)');

        await db.exec(`
            CREATE TABLE IF NOT EXISTS jutsus (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                name TEXT NOT NULL,
                type TEXT NOT NULL,
                chakra_cost INTEGER NOT NULL DEFAULT 10 CHECK (chakra_cost >= 1),
                created_at TEXT NOT NULL,
                updated_at TEXT NOT NULL,
                character_id INTEGER,
                FOREIGN KEY (character_id) REFERENCES characters(id) ON DELETE SET NULL
            )
        `);
        await db.exec('CREATE INDEX IF NOT EXISTS ix_jutsus_name ON jutsus (name)');
        await db.exec('CREATE INDEX IF NOT EXISTS ix_jutsus_character_id ON jutsus (character_id)');

        await db.exec(`
            CREATE TABLE IF NOT EXISTS tasks (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                title TEXT NOT NULL,
                description TEXT,
                due_date TEXT,
                start_date TEXT,
                end_date TEXT,
                status TEXT NOT NULL DEFAULT 'pending'
                    CHECK (status IN ('pending', 'in_progress', 'completed', 'cancelled')),
                priority INTEGER NOT NULL DEFAULT 2 CHECK (priority BETWEEN 1 AND 3),
                created_at TEXT NOT NULL
            )
        `);
        await db.exec('CREATE INDEX IF NOT EXISTS ix_tasks_title ON tasks (title)');
    });
}

/**
 * Run `SELECT 1` against a fresh session.
 * @returns true when the store answered
 */
export async function pingDatabase(config: Pick<AppConfig, 'databaseUrl'>): Promise<boolean> {
    return withSession(config, async (db) => {
        const row = await db.get('SELECT 1 AS ok');
        return row?.ok === 1;
    });
}
