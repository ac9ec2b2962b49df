/**
 * ドメインエラー型定義
 * 明示的なエラー型でEither処理を実現（モジュール境界を越えて例外を投げない）
 */

// エラーコード（Tagged Union）
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'STATE_ERROR' // 状態機械の不正遷移
  | 'ORACLE_FAILED' // オラクル呼び出し失敗
  | 'ORACLE_TIMEOUT' // オラクル呼び出しタイムアウト
  | 'STORE_FAILED' // 実行境界/レコードストア失敗
  | 'STORE_TIMEOUT' // 実行境界タイムアウト
  | 'PRINCIPAL_NOT_FOUND'
  | 'SEED_INVALID'; // シードファイルの形式不正

// ドメインエラー型
export interface DomainError {
  readonly _tag: 'DomainError';
  readonly code: ErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

// エラー生成関数
export const domainError = (code: ErrorCode, message: string, cause?: unknown): DomainError => ({
  _tag: 'DomainError',
  code,
  message,
  cause,
});

// よく使うエラー生成のショートカット
export const validationError = (message: string): DomainError =>
  domainError('VALIDATION_ERROR', message);

export const stateError = (from: string, to: string): DomainError =>
  domainError('STATE_ERROR', `illegal transition: ${from} -> ${to}`);

export const storeError = (cause: unknown): DomainError =>
  domainError('STORE_FAILED', 'database operation failed', cause);

export const storeTimeoutError = (timeoutMs: number): DomainError =>
  domainError('STORE_TIMEOUT', `database operation timed out after ${timeoutMs}ms`);

export const principalNotFoundError = (id: number): DomainError =>
  domainError('PRINCIPAL_NOT_FOUND', `principal not found: ${id}`);

export const seedInvalidError = (message: string, cause?: unknown): DomainError =>
  domainError('SEED_INVALID', message, cause);
