import type { DbSession } from '../db/DatabaseManager';
import type { Jutsu, Page } from '../db/types';
import * as JutsuRepo from '../repositories/JutsuRepository';
import { characterExists } from '../repositories/CharacterRepository';
import type { CreateJutsuInput, UpdateJutsuInput } from '../schemas';
import { InternalError, NotFoundError, ValidationError } from '../errors';
import Logger from '../logger';
import { guard, type ServiceOptions } from './guard';

/**
 * 処理名: 術業務サービス
 * 処理概要: 術の CRUD を行う。character_id を指定する作成・更新では参照先キャラクターの存在を確認し、
 *          存在しなければ NotFound（Character not found）とする。
 * @class
 */
export class JutsuService {
    private readonly correlationId: string | null;
    private readonly now: () => Date;

    constructor(private readonly db: DbSession, options: ServiceOptions = {}) {
        this.correlationId = options.correlationId ?? null;
        this.now = options.now ?? (() => new Date());
    }

    private async assertCharacter(characterId: number | null | undefined): Promise<void> {
        if (characterId === null || characterId === undefined) return;
        if (!(await characterExists(this.db, characterId))) {
            Logger.warn(`Character not found: ${characterId}`, this.correlationId);
            throw new NotFoundError('Character not found');
        }
    }

    async create(input: CreateJutsuInput): Promise<Jutsu> {
        return guard('creating jutsu', () => new ValidationError('Could not create jutsu'), this.correlationId, async () => {
            await this.assertCharacter(input.character_id);
            const id = await JutsuRepo.insertJutsu(this.db, {
                name: input.name,
                type: input.type,
                chakra_cost: input.chakra_cost,
                character_id: input.character_id ?? null,
            }, this.now().toISOString());
            const jutsu = await this.getById(id);
            Logger.info(`Created jutsu: ${jutsu.name}`, this.correlationId, { id });
            return jutsu;
        });
    }

    async getById(id: number): Promise<Jutsu> {
        return guard(`retrieving jutsu ${id}`, () => new InternalError('Error retrieving jutsu'), this.correlationId, async () => {
            const jutsu = await JutsuRepo.getJutsu(this.db, id);
            if (!jutsu) {
                Logger.warn(`Jutsu not found: ${id}`, this.correlationId);
                throw new NotFoundError('Jutsu not found');
            }
            return jutsu;
        });
    }

    /**
     * 処理名: 術一覧
     * 処理概要: 名前の部分一致と所有キャラクター ID で絞り込んでページングする。
     */
    async list(query: JutsuRepo.JutsuPageQuery): Promise<Page<Jutsu>> {
        return guard('retrieving jutsus', () => new InternalError('Error retrieving jutsus'), this.correlationId, () =>
            JutsuRepo.listJutsus(this.db, query)
        );
    }

    /**
     * 処理名: 術部分更新
     * 処理概要: 入力に存在するフィールドだけを反映し、updated_at を更新する。
     *          character_id に null を指定すると所有者なしになる。
     */
    async update(id: number, changes: UpdateJutsuInput): Promise<Jutsu> {
        return guard(`updating jutsu ${id}`, () => new ValidationError('Could not update jutsu'), this.correlationId, async () => {
            await this.getById(id);
            await this.assertCharacter(changes.character_id);
            await JutsuRepo.updateJutsu(this.db, id, changes, this.now().toISOString());
            Logger.info(`Updated jutsu: ${id}`, this.correlationId);
            return this.getById(id);
        });
    }

    async delete(id: number): Promise<void> {
        return guard(`deleting jutsu ${id}`, () => new InternalError('Could not delete jutsu'), this.correlationId, async () => {
            await this.getById(id);
            await JutsuRepo.deleteJutsu(this.db, id);
            Logger.info(`Deleted jutsu: ${id}`, this.correlationId);
        });
    }
}

export default JutsuService;
