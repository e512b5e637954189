import express, { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import cors, { type CorsOptions } from 'cors';
import { ZodError } from 'zod';
import type { AppConfig } from './config';
import { createApiRouter, requestId } from './api';
import { createHealthRouter } from './health';
import { isAppError } from './errors';
import { fieldErrors } from './schemas';
import Logger, { errorMessage } from './logger';

/**
 * 処理名: CORS 設定
 * 処理概要: 許可オリジン一覧から cors ミドルウェアの設定を組み立てる。"*" を含む場合はリクエストのオリジンをそのまま許可する。
 *          資格情報付きリクエストを許可し、プリフライトには 204 で応答する。
 * @param origins 許可するオリジンの一覧
 */
export function corsOptions(origins: string[]): CorsOptions {
    return {
        origin: origins.includes('*') ? true : origins,
        credentials: true,
        methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
        maxAge: 600,
    };
}

/** Log every request once it has been answered. */
export function requestLogger(): RequestHandler {
    return (req, res, next) => {
        const started = process.hrtime.bigint();
        res.on('finish', () => {
            const ms = Number(process.hrtime.bigint() - started) / 1e6;
            Logger.info(`${req.method} ${req.originalUrl} -> ${res.statusCode} (${ms.toFixed(1)}ms)`, requestId(req));
        });
        next();
    };
}

interface ExposedHttpError {
    status: number;
    message: string;
    type?: string;
}

/**
 * Errors raised by express' body parser (http-errors) carry a status and `expose: true`
 * when their message is safe to show.
 */
function exposedHttpError(err: unknown): ExposedHttpError | null {
    if (!(err instanceof Error) || !('status' in err) || !('expose' in err)) return null;
    const { status, expose } = err;
    if (typeof status !== 'number' || expose !== true) return null;
    const type = 'type' in err && typeof err.type === 'string' ? err.type : undefined;
    return { status, message: err.message, type };
}

function sendValidationError(req: Request, res: Response, errors: { field: string; message: string; type: string }[]) {
    res.status(422).json({
        success: false,
        message: 'Validation error',
        errors,
        path: req.originalUrl.split('?')[0],
    });
}

/**
 * 処理名: エラーハンドリングミドルウェア
 * 処理概要: 例外を HTTP レスポンスへ変換する唯一の場所。
 *          - ZodError → 422（field / message / type の配列）
 *          - 不正な JSON ボディ → 422（field: body, type: json_invalid）
 *          - AppError → statusCode と detail
 *          - それ以外 → 500 と汎用メッセージ（内部情報は返さずログにのみ残す）
 *          いずれも request_id に X-Request-ID ヘッダの値を入れる。
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) {
        next(err);
        return;
    }
    const rid = requestId(req);

    if (err instanceof ZodError) {
        sendValidationError(req, res, fieldErrors(err));
        return;
    }

    if (isAppError(err)) {
        res.status(err.statusCode).json({ detail: err.detail, request_id: rid });
        return;
    }

    const httpError = exposedHttpError(err);
    if (httpError) {
        if (httpError.type === 'entity.parse.failed') {
            sendValidationError(req, res, [{ field: 'body', message: 'JSON decode error', type: 'json_invalid' }]);
            return;
        }
        res.status(httpError.status).json({ detail: httpError.message, request_id: rid });
        return;
    }

    Logger.error(`Unhandled error on ${req.method} ${req.originalUrl}: ${errorMessage(err)}`, rid, {
        stack: err instanceof Error ? err.stack ?? null : null,
    });
    res.status(500).json({ detail: 'An unexpected error occurred.', request_id: rid });
};

export const notFoundHandler: RequestHandler = (req, res) => {
    res.status(404).json({ detail: 'Not Found', request_id: requestId(req) });
};

/**
 * 処理名: アプリケーション構築
 * 処理概要: 設定を受け取り Express アプリを組み立てる。ルート情報（/）・ヘルスチェック・API ルーター・
 *          404 ハンドラ・エラーハンドラの順に登録する。listen は呼び出し側が行う。
 * @param config 起動時に構築した設定
 */
export function createApp(config: AppConfig): express.Express {
    const app = express();
    app.disable('x-powered-by');

    app.use(cors(corsOptions(config.corsOrigins)));
    app.use(requestLogger());
    app.use(express.json());

    app.get('/', (_req, res) => {
        res.json({ app_name: config.appName, version: config.version });
    });
    app.use(createHealthRouter(config));
    app.use(config.apiPrefix || '/', createApiRouter(config));

    app.use(notFoundHandler);
    app.use(errorHandler);
    return app;
}

export default createApp;
