import type { DbSession } from '../db/DatabaseManager';
import type { BindValue, SqlRow } from '../db/connection';
import { countRowSchema } from '../db/rows';
import type { Page } from '../db/types';

/**
 * 処理名: ページ数計算
 * 処理概要: ceil(total / size)。件数 0 のときは 0 ページ。
 * @param total 条件に一致した総件数
 * @param size 1 ページあたりの件数（1 以上）
 */
export function pageCount(total: number, size: number): number {
  return Math.ceil(total / size);
}

/**
 * 処理名: ページエンベロープ構築
 * 処理概要: 取得済みの items と総件数からページ情報を組み立てる。page が範囲外でもエラーにはしない。
 */
export function buildPage<T>(items: T[], total: number, page: number, size: number): Page<T> {
  const pages = pageCount(total, size);
  return {
    items,
    total,
    page,
    size,
    pages,
    has_next: page < pages,
    has_prev: page > 1,
  };
}

/**
 * Escape `%`, `_` and the escape character itself so the term matches literally
 * inside `LIKE ? ESCAPE '\'`.
 */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (c) => '\\' + c);
}

/** `%term%` pattern for substring containment. */
export function containsPattern(term: string): string {
  return `%${escapeLike(term)}%`;
}

export interface Filter {
  clauses: string[];
  params: BindValue[];
}

export function emptyFilter(): Filter {
  return { clauses: [], params: [] };
}

function whereSql(filter: Filter): string {
  return filter.clauses.length > 0 ? ` WHERE ${filter.clauses.map((c) => `(${c})`).join(' AND ')}` : '';
}

/**
 * 処理名: ページ取得
 * 処理概要: 同じ WHERE 条件で COUNT(*) と id 昇順の LIMIT/OFFSET 取得を行い、行を変換してページを返す。
 * @param db セッション
 * @param table テーブル名（コード内の定数のみ）
 * @param filter WHERE 条件とバインドパラメータ
 * @param page 1 始まりのページ番号
 * @param size 1 ページの件数
 * @param mapRow 行からエンティティへの変換
 */
export async function selectPage<T>(
  db: DbSession,
  table: string,
  filter: Filter,
  page: number,
  size: number,
  mapRow: (row: SqlRow) => T
): Promise<Page<T>> {
  const where = whereSql(filter);
  const { total } = countRowSchema.parse(
    await db.get(`SELECT COUNT(*) AS total FROM ${table}${where}`, ...filter.params)
  );
  const offset = (page - 1) * size;
  if (offset >= total) {
    return buildPage([], total, page, size);
  }
  const rows = await db.all(
    `SELECT * FROM ${table}${where} ORDER BY id ASC LIMIT ? OFFSET ?`,
    ...filter.params,
    size,
    offset
  );
  return buildPage(rows.map(mapRow), total, page, size);
}

/**
 * 処理名: 部分更新
 * 処理概要: changes に実際に存在するキー（undefined でないもの）だけを SET 句にして UPDATE を実行する。
 *          null は明示的な上書きとして扱う。更新対象の列が無ければ何もしない。
 * @param db セッション
 * @param table テーブル名
 * @param id 対象行の id
 * @param changes 列名と値（列名は呼び出し側で許可済みのもの）
 * @returns 更新した行数
 */
export async function updateColumns(
  db: DbSession,
  table: string,
  id: number,
  changes: Record<string, BindValue | undefined>
): Promise<number> {
  const entries: [string, BindValue][] = [];
  for (const [column, value] of Object.entries(changes)) {
    if (value !== undefined) entries.push([column, value]);
  }
  if (entries.length === 0) return 0;
  const assignments = entries.map(([column]) => `${column} = ?`).join(', ');
  const result = await db.run(`UPDATE ${table} SET ${assignments} WHERE id = ?`, ...entries.map(([, v]) => v), id);
  return result.changes;
}

/**
 * Insert one row and return the id SQLite assigned to it.
 */
export async function insertRow(
  db: DbSession,
  table: string,
  values: Record<string, BindValue>
): Promise<number> {
  const columns = Object.keys(values);
  const placeholders = columns.map(() => '?').join(', ');
  const result = await db.run(
    `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${placeholders})`,
    ...columns.map((c) => values[c])
  );
  if (result.changes === 0 || result.lastID <= 0) {
    throw new Error(`insert into ${table} did not return a row id`);
  }
  return result.lastID;
}

export async function deleteRow(db: DbSession, table: string, id: number): Promise<boolean> {
  const result = await db.run(`DELETE FROM ${table} WHERE id = ?`, id);
  return result.changes > 0;
}
