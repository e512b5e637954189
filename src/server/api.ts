import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import type { AppConfig } from './config';
import { withSession } from './db/DatabaseManager';
import { CharacterService } from './services/CharacterService';
import { JutsuService } from './services/JutsuService';
import { TaskService } from './services/TaskService';
import type { ServiceOptions } from './services/guard';
import {
    createCharacterSchema,
    updateCharacterSchema,
    createJutsuSchema,
    updateJutsuSchema,
    createTaskSchema,
    updateTaskSchema,
    pageQuerySchema,
    jutsuPageQuerySchema,
    parsePathId,
} from './schemas';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Wrap an async route so rejected promises reach the error middleware.
 */
export function asyncHandler(fn: AsyncHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        fn(req, res).catch(next);
    };
}

/** Correlation id taken from the X-Request-ID header, or null. */
export function requestId(req: Request): string | null {
    return req.get('X-Request-ID') ?? null;
}

function serviceOptions(req: Request): ServiceOptions {
    return { correlationId: requestId(req) };
}

/**
 * 処理名: キャラクタールーター
 * 処理概要: /characters 配下の CRUD と /characters/:character_id/jutsus（術の追加）を提供する。
 *          各リクエストは withSession で専用の接続を取得し、処理後に必ず解放する。
 */
export function createCharacterRouter(config: AppConfig): Router {
    const router = Router();

    router.post('/', asyncHandler(async (req, res) => {
        const input = createCharacterSchema.parse(req.body);
        const character = await withSession(config, (db) => new CharacterService(db, serviceOptions(req)).create(input));
        res.status(201).json(character);
    }));

    router.get('/', asyncHandler(async (req, res) => {
        const query = pageQuerySchema.parse(req.query);
        const page = await withSession(config, (db) => new CharacterService(db, serviceOptions(req)).list(query));
        res.json(page);
    }));

    router.get('/:character_id', asyncHandler(async (req, res) => {
        const id = parsePathId('character_id', req.params.character_id);
        const character = await withSession(config, (db) => new CharacterService(db, serviceOptions(req)).getById(id));
        res.json(character);
    }));

    router.patch('/:character_id', asyncHandler(async (req, res) => {
        const id = parsePathId('character_id', req.params.character_id);
        const changes = updateCharacterSchema.parse(req.body);
        const character = await withSession(config, (db) => new CharacterService(db, serviceOptions(req)).update(id, changes));
        res.json(character);
    }));

    router.delete('/:character_id', asyncHandler(async (req, res) => {
        const id = parsePathId('character_id', req.params.character_id);
        await withSession(config, (db) => new CharacterService(db, serviceOptions(req)).delete(id));
        res.status(204).end();
    }));

    router.post('/:character_id/jutsus', asyncHandler(async (req, res) => {
        const id = parsePathId('character_id', req.params.character_id);
        const input = createJutsuSchema.parse(req.body);
        const jutsu = await withSession(config, (db) => new CharacterService(db, serviceOptions(req)).addJutsu(id, input));
        res.status(201).json(jutsu);
    }));

    return router;
}

/**
 * 処理名: 術ルーター
 * 処理概要: /jutsus 配下の CRUD。一覧は search と character_id で絞り込める。
 */
export function createJutsuRouter(config: AppConfig): Router {
    const router = Router();

    router.post('/', asyncHandler(async (req, res) => {
        const input = createJutsuSchema.parse(req.body);
        const jutsu = await withSession(config, (db) => new JutsuService(db, serviceOptions(req)).create(input));
        res.status(201).json(jutsu);
    }));

    router.get('/', asyncHandler(async (req, res) => {
        const { character_id, ...query } = jutsuPageQuerySchema.parse(req.query);
        const page = await withSession(config, (db) =>
            new JutsuService(db, serviceOptions(req)).list({ ...query, characterId: character_id })
        );
        res.json(page);
    }));

    router.get('/:jutsu_id', asyncHandler(async (req, res) => {
        const id = parsePathId('jutsu_id', req.params.jutsu_id);
        const jutsu = await withSession(config, (db) => new JutsuService(db, serviceOptions(req)).getById(id));
        res.json(jutsu);
    }));

    router.patch('/:jutsu_id', asyncHandler(async (req, res) => {
        const id = parsePathId('jutsu_id', req.params.jutsu_id);
        const changes = updateJutsuSchema.parse(req.body);
        const jutsu = await withSession(config, (db) => new JutsuService(db, serviceOptions(req)).update(id, changes));
        res.json(jutsu);
    }));

    router.delete('/:jutsu_id', asyncHandler(async (req, res) => {
        const id = parsePathId('jutsu_id', req.params.jutsu_id);
        await withSession(config, (db) => new JutsuService(db, serviceOptions(req)).delete(id));
        res.status(204).end();
    }));

    return router;
}

export function createTaskRouter(config: AppConfig): Router {
    const router = Router();

    router.post('/', asyncHandler(async (req, res) => {
        const input = createTaskSchema.parse(req.body);
        const task = await withSession(config, (db) => new TaskService(db, serviceOptions(req)).create(input));
        res.status(201).json(task);
    }));

    router.get('/', asyncHandler(async (req, res) => {
        const query = pageQuerySchema.parse(req.query);
        const page = await withSession(config, (db) => new TaskService(db, serviceOptions(req)).list(query));
        res.json(page);
    }));

    router.get('/:task_id', asyncHandler(async (req, res) => {
        const id = parsePathId('task_id', req.params.task_id);
        const task = await withSession(config, (db) => new TaskService(db, serviceOptions(req)).getById(id));
        res.json(task);
    }));

    router.patch('/:task_id', asyncHandler(async (req, res) => {
        const id = parsePathId('task_id', req.params.task_id);
        const changes = updateTaskSchema.parse(req.body);
        const task = await withSession(config, (db) => new TaskService(db, serviceOptions(req)).update(id, changes));
        res.json(task);
    }));

    router.delete('/:task_id', asyncHandler(async (req, res) => {
        const id = parsePathId('task_id', req.params.task_id);
        await withSession(config, (db) => new TaskService(db, serviceOptions(req)).delete(id));
        res.status(204).end();
    }));

    return router;
}

/**
 * 処理名: API ルーター
 * 処理概要: 3 種類のリソースルーターを束ねる。設定の apiPrefix の下にマウントされる。
 */
export function createApiRouter(config: AppConfig): Router {
    const router = Router();
    router.use('/characters', createCharacterRouter(config));
    router.use('/jutsus', createJutsuRouter(config));
    router.use('/tasks', createTaskRouter(config));
    return router;
}

export default createApiRouter;
