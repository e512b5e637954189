import Logger, { errorMessage } from '../logger';
import { AppError, isAppError } from '../errors';

export interface ServiceOptions {
    /** X-Request-ID of the calling request, attached to every log line */
    correlationId?: string | null;
    /** clock used for created_at / updated_at / status stamps */
    now?: () => Date;
}

/**
 * 処理名: エラー分類ガード
 * 処理概要: fn を実行し、既に分類済みの AppError はそのまま再送出する。
 *          それ以外の例外は元のメッセージを文脈付きでログに残し、fallback が返す汎用エラーに置き換える。
 *          ストア由来のメッセージがクライアントへ届くことはない。
 * @param action ログに出す処理名（例: "creating task"）
 * @param fallback 置き換える汎用エラーの生成関数
 * @param correlationId 相関ID
 * @param fn 実処理
 */
export async function guard<T>(
    action: string,
    fallback: () => AppError,
    correlationId: string | null,
    fn: () => Promise<T>
): Promise<T> {
    try {
        return await fn();
    } catch (err) {
        if (isAppError(err)) throw err;
        Logger.error(`Error ${action}: ${errorMessage(err)}`, correlationId);
        throw fallback();
    }
}
