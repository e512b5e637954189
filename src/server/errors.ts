/**
 * 処理名: AppError（ドメインエラー基底クラス）
 * 処理概要: HTTP ステータスとクライアントへ返してよいメッセージ（detail）を保持する。
 *          エラーハンドリングミドルウェアはこの型だけを信頼してレスポンスを組み立てる。
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly detail: string
  ) {
    super(detail);
    this.name = new.target.name;
  }
}

/** Requested id does not exist (404). */
export class NotFoundError extends AppError {
  constructor(detail = 'Not Found') {
    super(404, detail);
  }
}

/** Client data rejected by the store or referencing something invalid (400). */
export class ValidationError extends AppError {
  constructor(detail: string) {
    super(400, detail);
  }
}

/** Unexpected persistence or runtime failure (500). */
export class InternalError extends AppError {
  constructor(detail: string) {
    super(500, detail);
  }
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}
