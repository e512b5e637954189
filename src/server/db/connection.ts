import fs from 'fs';
import path from 'path';
import initSqlJs from 'sql.js';
import type { Database as SqlJsDatabase, SqlJsStatic, SqlValue } from 'sql.js';

/** Value that can be bound to a `?` placeholder. */
export type BindValue = string | number | null;

/** One result row keyed by column name. */
export type SqlRow = Record<string, SqlValue>;

/**
 * 処理名: RunResult型定義
 * 処理概要: INSERT / UPDATE / DELETE の変更件数と、最後に採番された rowid
 */
export interface RunResult {
    changes: number;
    lastID: number;
}

/**
 * 処理名: DbSessionインターフェース
 * 処理概要: リポジトリが利用する非同期 SQLite 操作 API。行は列名をキーとする素のオブジェクトで返し、
 *          型付けは呼び出し側（リポジトリ）の行スキーマが行う。
 */
export interface DbSession {
    all(sql: string, ...params: BindValue[]): Promise<SqlRow[]>;
    get(sql: string, ...params: BindValue[]): Promise<SqlRow | undefined>;
    run(sql: string, ...params: BindValue[]): Promise<RunResult>;
    exec(sql: string): Promise<void>;
    close(): Promise<void>;
}

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

/** Load the WASM build once per process. */
function loadSqlJs(): Promise<SqlJsStatic> {
    if (!sqlJsPromise) {
        sqlJsPromise = initSqlJs().catch((err: unknown) => {
            sqlJsPromise = null;
            throw err;
        });
    }
    return sqlJsPromise;
}

/**
 * 処理名: FileDatabaseクラス
 * 処理概要: sql.js のメモリ上データベースを Promise ベースの DbSession として公開する。
 *          書き込みがあった場合のみ close 時にファイルへ書き戻す（一時ファイル経由で置き換える）。
 */
class FileDatabase implements DbSession {
    private closed = false;
    private dirty = false;

    /**
     * @param db ファイル内容を読み込んだ sql.js のデータベース
     * @param filePath 書き戻し先
     * @param release close 時に呼ぶセッションロック解放処理
     */
    constructor(
        private readonly db: SqlJsDatabase,
        private readonly filePath: string,
        private readonly release: () => void
    ) {}

    private assertOpen(): void {
        if (this.closed) {
            throw new Error('Database is closed');
        }
    }

    async all(sql: string, ...params: BindValue[]): Promise<SqlRow[]> {
        this.assertOpen();
        const statement = this.db.prepare(sql);
        try {
            statement.bind(params);
            const rows: SqlRow[] = [];
            while (statement.step()) {
                rows.push(statement.getAsObject());
            }
            return rows;
        } finally {
            statement.free();
        }
    }

    async get(sql: string, ...params: BindValue[]): Promise<SqlRow | undefined> {
        const rows = await this.all(sql, ...params);
        return rows[0];
    }

    /**
     * 処理名: runラッパ
     * 処理概要: 更新系 SQL を実行し、変更件数と last_insert_rowid() を返す。
     */
    async run(sql: string, ...params: BindValue[]): Promise<RunResult> {
        this.assertOpen();
        this.db.run(sql, params);
        const changes = this.db.getRowsModified();
        if (changes > 0) this.dirty = true;
        const [result] = this.db.exec('SELECT last_insert_rowid() AS id');
        const lastID = result?.values[0]?.[0];
        return { changes, lastID: typeof lastID === 'number' ? lastID : 0 };
    }

    async exec(sql: string): Promise<void> {
        this.assertOpen();
        this.db.exec(sql);
        this.dirty = true;
    }

    /**
     * 処理名: closeラッパ
     * 処理概要: 変更があればファイルへ書き戻してからメモリ上のデータベースを解放する。
     *          多重クローズは何もしない。書き戻しに失敗しても解放とロック返却は必ず行う。
     */
    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        try {
            if (this.dirty) {
                const tmpPath = `${this.filePath}.${process.pid}.tmp`;
                fs.writeFileSync(tmpPath, this.db.export());
                fs.renameSync(tmpPath, this.filePath);
            }
        } finally {
            try {
                this.db.close();
            } finally {
                this.release();
            }
        }
    }
}

const sessionQueues: Map<string, Promise<void>> = new Map();

/**
 * 処理名: セッションロック取得
 * 処理概要: 同じファイルに対するセッションを 1 つずつ順番に開かせる。
 *          各セッションはファイル全体を読み込んで close 時に書き戻すため、重なると後勝ちで更新が失われる。
 * @param filePath DB ファイルの絶対パス
 * @returns ロック解放関数
 */
async function acquireSessionLock(filePath: string): Promise<() => void> {
    const previous = sessionQueues.get(filePath) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
        release = resolve;
    });
    const tail = previous.then(() => current);
    sessionQueues.set(filePath, tail);
    await previous;
    return () => {
        release();
        if (sessionQueues.get(filePath) === tail) {
            sessionQueues.delete(filePath);
        }
    };
}

/**
 * 処理名: データベースファイルオープン
 * 処理概要: 格納ディレクトリを用意し、ファイルがあれば内容を読み込んで（無ければ空で）DbSession を返す。
 *          外部キー制約はセッションごとに有効化する。
 * @param filePath DB ファイルの絶対パス
 */
export async function openDatabaseFile(filePath: string): Promise<DbSession> {
    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });
    if (!fs.statSync(dir).isDirectory()) {
        throw new Error(`Database directory is not a directory: ${dir}`);
    }

    const SQL = await loadSqlJs();
    const release = await acquireSessionLock(filePath);
    try {
        const db = fs.existsSync(filePath) ? new SQL.Database(fs.readFileSync(filePath)) : new SQL.Database();
        try {
            db.exec('PRAGMA foreign_keys = ON');
        } catch (err) {
            db.close();
            throw err;
        }
        return new FileDatabase(db, filePath, release);
    } catch (err) {
        release();
        throw err;
    }
}
