import type { DbSession } from '../db/DatabaseManager';
import type { Jutsu, Page, PageQuery } from '../db/types';
import { jutsuRowSchema } from '../db/rows';
import { containsPattern, deleteRow, emptyFilter, insertRow, selectPage, updateColumns } from './sql';

const TABLE = 'jutsus';

export interface JutsuInsert {
  name: string;
  type: string;
  chakra_cost: number;
  character_id: number | null;
}

export interface JutsuChanges {
  name?: string;
  type?: string;
  chakra_cost?: number;
  character_id?: number | null;
}

export interface JutsuPageQuery extends PageQuery {
  characterId?: number;
}

export async function insertJutsu(db: DbSession, input: JutsuInsert, now: string): Promise<number> {
  return insertRow(db, TABLE, {
    name: input.name,
    type: input.type,
    chakra_cost: input.chakra_cost,
    character_id: input.character_id,
    created_at: now,
    updated_at: now,
  });
}

export async function getJutsu(db: DbSession, id: number): Promise<Jutsu | null> {
  const row = await db.get(`SELECT * FROM ${TABLE} WHERE id = ?`, id);
  return row ? jutsuRowSchema.parse(row) : null;
}

/**
 * 処理名: 術一覧
 * 処理概要: 名前の部分一致と所有キャラクターで絞り込み、id 昇順でページ取得する。
 */
export async function listJutsus(db: DbSession, query: JutsuPageQuery): Promise<Page<Jutsu>> {
  const filter = emptyFilter();
  if (query.search) {
    filter.clauses.push(`name LIKE ? ESCAPE '\\'`);
    filter.params.push(containsPattern(query.search));
  }
  if (query.characterId !== undefined) {
    filter.clauses.push('character_id = ?');
    filter.params.push(query.characterId);
  }
  return selectPage(db, TABLE, filter, query.page, query.size, (row) => jutsuRowSchema.parse(row));
}

export async function updateJutsu(db: DbSession, id: number, changes: JutsuChanges, now: string): Promise<number> {
  return updateColumns(db, TABLE, id, {
    name: changes.name,
    type: changes.type,
    chakra_cost: changes.chakra_cost,
    character_id: changes.character_id,
    updated_at: now,
  });
}

export async function deleteJutsu(db: DbSession, id: number): Promise<boolean> {
  return deleteRow(db, TABLE, id);
}
