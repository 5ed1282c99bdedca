/**
 * ジャーナル操作で発生するエラーの基底クラス。`code` は CLI や MCP 側での判定に使う。
 */
export class JournalError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'JournalError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ValidatedField = 'title' | 'content';

export class ValidationError extends JournalError {
  public readonly field: ValidatedField;
  public readonly limit: number;

  constructor(field: ValidatedField, limit: number, options?: ErrorOptions) {
    super(`${field} は ${limit} 文字以内で入力してください。`, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
    this.field = field;
    this.limit = limit;
  }
}

export class NotFoundError extends JournalError {
  public readonly entryId: string;

  constructor(entryId: string, options?: ErrorOptions) {
    super(`entry not found: ${entryId}`, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
    this.entryId = entryId;
  }
}

export class MalformedStoreError extends JournalError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(`ジャーナルファイルを解釈できません (${filePath}): ${reason}`, 'MALFORMED_STORE', options);
    this.name = 'MalformedStoreError';
    this.filePath = filePath;
  }
}

export class NoTagsError extends JournalError {
  constructor(options?: ErrorOptions) {
    super('タグ付きのエントリがありません。', 'NO_TAGS', options);
    this.name = 'NoTagsError';
  }
}

export class StoreLockedError extends JournalError {
  public readonly lockPath: string;

  constructor(lockPath: string, options?: ErrorOptions) {
    super(`ジャーナルファイルは別のプロセスが使用中です: ${lockPath}`, 'STORE_LOCKED', options);
    this.name = 'StoreLockedError';
    this.lockPath = lockPath;
  }
}

/**
 * Node の fs 系 API が投げるエラーのうち、指定した `code` を持つものかどうかを判定する。
 */
export const hasErrorCode = (error: unknown, code: string): boolean => {
  return error instanceof Error && 'code' in error && error.code === code;
};
