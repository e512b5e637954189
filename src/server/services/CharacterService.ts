import type { DbSession } from '../db/DatabaseManager';
import type { Character, Jutsu, Page, PageQuery } from '../db/types';
import * as CharacterRepo from '../repositories/CharacterRepository';
import * as JutsuRepo from '../repositories/JutsuRepository';
import type { CreateCharacterInput, CreateJutsuInput, UpdateCharacterInput } from '../schemas';
import { InternalError, NotFoundError, ValidationError } from '../errors';
import Logger from '../logger';
import { guard, type ServiceOptions } from './guard';

/**
 * 処理名: キャラクター業務サービス
 * 処理概要: キャラクターの CRUD と、キャラクターへの術の追加を行う。
 *          キャラクターを削除すると所有していた術の character_id は NULL になる（術自体は残る）。
 * @class
 */
export class CharacterService {
    private readonly correlationId: string | null;
    private readonly now: () => Date;

    constructor(private readonly db: DbSession, options: ServiceOptions = {}) {
        this.correlationId = options.correlationId ?? null;
        this.now = options.now ?? (() => new Date());
    }

    async create(input: CreateCharacterInput): Promise<Character> {
        return guard('creating character', () => new ValidationError('Could not create character'), this.correlationId, async () => {
            const id = await CharacterRepo.insertCharacter(this.db, {
                name: input.name,
                village: input.village,
                rank: input.rank ?? null,
            }, this.now().toISOString());
            const character = await this.getById(id);
            Logger.info(`Created character: ${character.name}`, this.correlationId, { id });
            return character;
        });
    }

    async getById(id: number): Promise<Character> {
        return guard(`retrieving character ${id}`, () => new InternalError('Error retrieving character'), this.correlationId, async () => {
            const character = await CharacterRepo.getCharacter(this.db, id);
            if (!character) {
                Logger.warn(`Character not found: ${id}`, this.correlationId);
                throw new NotFoundError('Character not found');
            }
            return character;
        });
    }

    /**
     * 処理名: キャラクター一覧
     * 処理概要: 名前または里での部分一致検索とページングを行う。
     */
    async list(query: PageQuery): Promise<Page<Character>> {
        return guard('retrieving characters', () => new InternalError('Error retrieving characters'), this.correlationId, () =>
            CharacterRepo.listCharacters(this.db, query)
        );
    }

    /**
     * 処理名: キャラクター部分更新
     * 処理概要: 入力に存在するフィールドだけを反映し、updated_at を更新する。
     */
    async update(id: number, changes: UpdateCharacterInput): Promise<Character> {
        return guard(`updating character ${id}`, () => new ValidationError('Could not update character'), this.correlationId, async () => {
            await this.getById(id);
            await CharacterRepo.updateCharacter(this.db, id, changes, this.now().toISOString());
            Logger.info(`Updated character: ${id}`, this.correlationId);
            return this.getById(id);
        });
    }

    async delete(id: number): Promise<void> {
        return guard(`deleting character ${id}`, () => new InternalError('Could not delete character'), this.correlationId, async () => {
            await this.getById(id);
            await CharacterRepo.deleteCharacter(this.db, id);
            Logger.info(`Deleted character: ${id}`, this.correlationId);
        });
    }

    /**
     * 処理名: 術の追加
     * 処理概要: キャラクターの存在を確認してから、そのキャラクターを所有者とする術を作成する。
     *          入力に character_id が含まれていてもパス上の characterId が優先される。
     * @param characterId 所有者となるキャラクター
     * @param input 検証済みの術入力
     * @returns 作成された術
     */
    async addJutsu(characterId: number, input: CreateJutsuInput): Promise<Jutsu> {
        return guard(`adding jutsu to character ${characterId}`, () => new ValidationError('Could not add jutsu to character'), this.correlationId, async () => {
            await this.getById(characterId);
            const id = await JutsuRepo.insertJutsu(this.db, {
                name: input.name,
                type: input.type,
                chakra_cost: input.chakra_cost,
                character_id: characterId,
            }, this.now().toISOString());
            const jutsu = await JutsuRepo.getJutsu(this.db, id);
            if (!jutsu) {
                throw new Error(`jutsu ${id} vanished after insert`);
            }
            Logger.info(`Added jutsu ${jutsu.name} to character ${characterId}`, this.correlationId);
            return jutsu;
        });
    }
}

export default CharacterService;
