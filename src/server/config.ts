import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { LogLevel } from './logger';

/**
 * 処理名: AppConfig 型
 * 処理概要: プロセス起動時に一度だけ構築し、アプリケーション・DB セッション・ロガーへ明示的に渡す設定値
 */
export interface AppConfig {
  appName: string;
  version: string;
  databaseUrl: string;
  apiPrefix: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  logJson: boolean;
  logFile: string | null;
  corsOrigins: string[];
}

export const APP_VERSION = '1.0.0';

const booleanFlag = z
  .string()
  .transform((v) => ['1', 'true', 'yes'].includes(v.trim().toLowerCase()));

const envSchema = z.object({
  APP_NAME: z.string().trim().min(1).default('Shinobi Registry API'),
  DATABASE_URL: z.string().trim().min(1).default('sqlite:///./data/app.db'),
  API_V1_PREFIX: z
    .string()
    .trim()
    .default('')
    .refine((p) => p === '' || /^(\/[A-Za-z0-9._~-]+)+\/?$/.test(p), {
      message: 'must be empty or a path such as /api/v1',
    }),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_JSON: booleanFlag.default('0'),
  LOG_FILE: z.string().trim().optional(),
  CORS_ORIGINS: z.string().default('*'),
});

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * 処理名: 設定読み込み
 * 処理概要: 環境変数（と任意の .env ファイル）を検証して AppConfig を構築する。
 *          不正な値はまとめて ConfigError として送出する。
 * @param env 参照する環境変数（既定は process.env）
 * @returns 構築済みの設定
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }
  const e = parsed.data;
  return {
    appName: e.APP_NAME,
    version: APP_VERSION,
    databaseUrl: e.DATABASE_URL,
    apiPrefix: e.API_V1_PREFIX.replace(/\/$/, ''),
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    logJson: e.LOG_JSON,
    logFile: e.LOG_FILE ? path.resolve(e.LOG_FILE) : null,
    corsOrigins: e.CORS_ORIGINS.split(',').map((o) => o.trim()).filter((o) => o.length > 0),
  };
}

/**
 * Read an optional .env file into process.env (existing variables win), then build the config.
 * @param envFile Path of the dotenv file
 */
export function loadConfigFromEnvFile(envFile = path.resolve(process.cwd(), '.env')): AppConfig {
  dotenv.config({ path: envFile });
  return loadConfig(process.env);
}
