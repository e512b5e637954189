import os from 'os';
import { Router } from 'express';
import type { AppConfig } from './config';
import { pingDatabase } from './db/DatabaseManager';
import Logger, { errorMessage } from './logger';
import { asyncHandler, requestId } from './api';

export interface SystemMetrics {
    cpu_usage: number;
    memory_usage: number;
}

function roundPercent(value: number): number {
    return Math.round(Math.min(Math.max(value, 0), 100) * 10) / 10;
}

/**
 * 処理名: システムメトリクス取得
 * 処理概要: 1 分平均のロードアベレージを CPU 数で割った値を CPU 使用率、空きメモリから算出した値をメモリ使用率（いずれも %）として返す。
 */
export function systemMetrics(): SystemMetrics {
    const cpuCount = os.cpus().length || 1;
    const [load1] = os.loadavg();
    const total = os.totalmem();
    return {
        cpu_usage: roundPercent((load1 / cpuCount) * 100),
        memory_usage: roundPercent(total > 0 ? (1 - os.freemem() / total) * 100 : 0),
    };
}

/**
 * 処理名: ヘルスチェックルーター
 * 処理概要: /health（稼働状態とメトリクス）と /health/db（SELECT 1 による接続確認）を提供する。
 *          DB 接続エラーの内容はレスポンスには含めずログにのみ出力する。
 */
export function createHealthRouter(config: AppConfig): Router {
    const router = Router();

    router.get('/health', (_req, res) => {
        res.json({ status: 'running', system: systemMetrics() });
    });

    router.get('/health/db', asyncHandler(async (req, res) => {
        try {
            const ok = await pingDatabase(config);
            if (ok) {
                res.json({ status: 'healthy', database: 'connected' });
                return;
            }
            Logger.warn('Database health check returned an unexpected result', requestId(req));
        } catch (err) {
            Logger.error(`Database health check failed: ${errorMessage(err)}`, requestId(req));
        }
        res.json({ status: 'unhealthy', database: 'disconnected' });
    }));

    return router;
}

export default createHealthRouter;
