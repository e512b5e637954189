import type { DbSession } from '../db/DatabaseManager';
import type { Character, Page, PageQuery } from '../db/types';
import { characterRowSchema } from '../db/rows';
import { containsPattern, deleteRow, emptyFilter, insertRow, selectPage, updateColumns } from './sql';

const TABLE = 'characters';

export interface CharacterInsert {
  name: string;
  village: string;
  rank: string | null;
}

export interface CharacterChanges {
  name?: string;
  village?: string;
  rank?: string | null;
}

/**
 * 処理名: キャラクター作成
 * 処理概要: characters に 1 行追加して採番された id を返す。created_at / updated_at は同じ時刻。
 */
export async function insertCharacter(db: DbSession, input: CharacterInsert, now: string): Promise<number> {
  return insertRow(db, TABLE, {
    name: input.name,
    village: input.village,
    rank: input.rank,
    created_at: now,
    updated_at: now,
  });
}

export async function getCharacter(db: DbSession, id: number): Promise<Character | null> {
  const row = await db.get(`SELECT * FROM ${TABLE} WHERE id = ?`, id);
  return row ? characterRowSchema.parse(row) : null;
}

export async function characterExists(db: DbSession, id: number): Promise<boolean> {
  const row = await db.get(`SELECT id FROM ${TABLE} WHERE id = ?`, id);
  return row !== undefined;
}

/**
 * 処理名: キャラクター一覧
 * 処理概要: 名前または里に検索語を含むキャラクターを id 昇順でページ取得する。
 */
export async function listCharacters(db: DbSession, query: PageQuery): Promise<Page<Character>> {
  const filter = emptyFilter();
  if (query.search) {
    const pattern = containsPattern(query.search);
    filter.clauses.push(`name LIKE ? ESCAPE '\\' OR village LIKE ? ESCAPE '\\'`);
    filter.params.push(pattern, pattern);
  }
  return selectPage(db, TABLE, filter, query.page, query.size, (row) => characterRowSchema.parse(row));
}

/**
 * 処理名: キャラクター更新
 * 処理概要: 指定された列だけを上書きし、updated_at を now に更新する。
 */
export async function updateCharacter(db: DbSession, id: number, changes: CharacterChanges, now: string): Promise<number> {
  return updateColumns(db, TABLE, id, {
    name: changes.name,
    village: changes.village,
    rank: changes.rank,
    updated_at: now,
  });
}

export async function deleteCharacter(db: DbSession, id: number): Promise<boolean> {
  return deleteRow(db, TABLE, id);
}
