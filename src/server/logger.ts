/* Logger for the API server
 * - default: write to stderr
 * - supports JSON mode and plain text
 * - optional append to a log file (LOG_FILE)
 * - test hook: collect logs in memory when enableMemoryHook() is called
 */
import fs from 'fs';
import path from 'path';
import { Writable } from 'stream';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  msg: string;
  correlationId?: string | null;
  extra?: Record<string, unknown> | null;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  file?: string | null;
}

/**
 * 処理名: LoggerClass（ロギングユーティリティ）
 * 処理概要: レベル付きログを標準エラー出力へ書き出す。JSON 形式とプレーンテキストを切り替えられ、
 *          設定があればログファイルへも追記する。テスト用にメモリへ収集するフックを持つ。
 */
export class LoggerClass {
  private level: LogLevel = 'info';
  private json = false;
  private out: Writable;
  private fileOut: fs.WriteStream | null = null;
  private memory: LogRecord[] | null = null;

  /**
   * @param out 出力先ストリーム（既定は stderr）
   */
  constructor(out: Writable = process.stderr) {
    this.out = out;
  }

  /**
   * 処理名: configure（設定反映）
   * 処理概要: 起動時に読み込んだ設定からレベル・JSON モード・ログファイルを反映する。
   *          ログファイルを指定した場合は親ディレクトリを作成して追記モードで開く。
   * @param options ロガー設定
   */
  configure(options: LoggerOptions) {
    if (options.level !== undefined) this.setLevel(options.level);
    if (options.json !== undefined) this.json = options.json;
    if (options.file !== undefined) {
      this.closeFile();
      if (options.file) {
        fs.mkdirSync(path.dirname(options.file), { recursive: true });
        this.fileOut = fs.createWriteStream(options.file, { flags: 'a' });
      }
    }
  }

  /**
   * 処理名: closeFile（ログファイルクローズ）
   * 処理概要: configure で開いたログファイルのストリームを閉じる。シャットダウン時に呼び出す。
   */
  closeFile() {
    if (this.fileOut) {
      this.fileOut.end();
      this.fileOut = null;
    }
  }

  enableMemoryHook() {
    this.memory = [];
  }

  disableMemoryHook() {
    this.memory = null;
  }

  /**
   * 処理名: getMemory（メモリログ取得）
   * 処理概要: メモリに収集したログのコピーを返す。
   */
  getMemory(): LogRecord[] {
    return this.memory ? [...this.memory] : [];
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(l: LogLevel) {
    if (LOG_LEVELS[l] === undefined) return;
    this.level = l;
  }

  private shouldLog(l: LogLevel) {
    return LOG_LEVELS[l] <= LOG_LEVELS[this.level];
  }

  /**
   * 処理名: format（ログ整形）
   * 処理概要: JSON モードなら 1 行の JSON、それ以外は `[時刻] LEVEL: msg cid=... {extra}` 形式に整形する。
   * @param rec ログレコード
   */
  format(rec: LogRecord): string {
    if (this.json) return JSON.stringify(rec);
    const cid = rec.correlationId ? ' cid=' + rec.correlationId : '';
    const extra = rec.extra ? ' ' + JSON.stringify(rec.extra) : '';
    return `[${rec.timestamp}] ${rec.level.toUpperCase()}: ${rec.msg}${cid}${extra}`;
  }

  private record(level: LogLevel, msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    const rec: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      correlationId: correlationId ?? null,
      extra: extra ?? null,
    };

    if (this.memory) this.memory.push(rec);

    const line = this.format(rec) + '\n';
    try {
      this.out.write(line);
      if (this.fileOut) this.fileOut.write(line);
    } catch (e) {
      // ログ出力の失敗は呼び出し元へ伝播させない
      if (this.memory) this.memory.push({ ...rec, level: 'error', msg: 'log write failed: ' + String(e) });
    }
  }

  error(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('error')) return;
    this.record('error', msg, correlationId, extra);
  }

  warn(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('warn')) return;
    this.record('warn', msg, correlationId, extra);
  }

  info(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('info')) return;
    this.record('info', msg, correlationId, extra);
  }

  debug(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('debug')) return;
    this.record('debug', msg, correlationId, extra);
  }
}

const Logger = new LoggerClass();

export default Logger;

/**
 * Turn an unknown thrown value into a loggable message.
 * @param err Caught value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
