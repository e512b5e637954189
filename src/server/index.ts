import type { Server } from 'http';
import { type AppConfig, loadConfigFromEnvFile } from './config';
import { initializeDatabase } from './db/DatabaseManager';
import { createApp } from './app';
import Logger, { errorMessage } from './logger';

/**
 * 処理名: サーバ起動
 * 処理概要: ロガー設定を反映し、スキーマを初期化してから HTTP リスナを開始する。
 *          listen 完了後に Server を返す（port 0 を渡すと空きポートが割り当てられる）。
 * @param config 起動時に一度だけ構築した設定
 * @returns listen 済みの HTTP サーバ
 */
export async function startServer(config: AppConfig): Promise<Server> {
    Logger.configure({ level: config.logLevel, json: config.logJson, file: config.logFile });
    Logger.info('Starting application...');

    await initializeDatabase(config);
    Logger.info('Database tables created');

    const app = createApp(config);
    return new Promise<Server>((resolve, reject) => {
        const server = app.listen(config.port, config.host, () => {
            server.off('error', reject);
            Logger.info(`${config.appName} listening on http://${config.host}:${config.port}${config.apiPrefix}`);
            resolve(server);
        });
        server.once('error', reject);
    });
}

/**
 * 処理名: サーバ停止
 * 処理概要: 新規接続の受付を止め、処理中のリクエストが終わるのを待ってからログファイルを閉じる。
 */
export async function stopServer(server: Server): Promise<void> {
    Logger.info('Shutting down application...');
    await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
    Logger.info('HTTP server closed');
    Logger.closeFile();
}

async function main() {
    const config = loadConfigFromEnvFile();
    const server = await startServer(config);

    const shutdown = async (signal: string) => {
        Logger.info('Received ' + signal);
        try {
            await stopServer(server);
            process.exit(0);
        } catch (err) {
            Logger.error('Error during shutdown', null, { err: errorMessage(err) });
            process.exit(1);
        }
    };
    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

if (require.main === module) {
    main().catch((error) => {
        Logger.error('Failed to start server', null, { err: errorMessage(error) });
        process.exit(1);
    });
}
