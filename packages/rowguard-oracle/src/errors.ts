/**
 * @rowguard/oracle エラー型定義
 * パターン: apps/rowguard/src/domain/errors.ts
 */

export type OracleErrorCode =
  | "ORACLE_UNAVAILABLE" // プロバイダー利用不可
  | "TIMEOUT" // タイムアウト
  | "REMOTE_API_FAILED" // リモートAPI呼び出し失敗
  | "INVALID_RESPONSE" // レスポンス形式不正
  | "SCRIPT_EXHAUSTED"; // スクリプト済み応答の枯渇

export interface OracleError {
  readonly _tag: "OracleError";
  readonly code: OracleErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

export const oracleError = (
  code: OracleErrorCode,
  message: string,
  cause?: unknown
): OracleError =>
  cause === undefined
    ? { _tag: "OracleError", code, message }
    : { _tag: "OracleError", code, message, cause };

// ========== ショートカット関数 ==========

export const oracleUnavailableError = (
  message = "Text oracle is unavailable"
): OracleError => oracleError("ORACLE_UNAVAILABLE", message);

export const oracleTimeoutError = (timeoutMs: number): OracleError =>
  oracleError("TIMEOUT", `Request timed out after ${timeoutMs}ms`);

export const remoteApiError = (message: string, cause?: unknown): OracleError =>
  oracleError("REMOTE_API_FAILED", message, cause);

export const invalidResponseError = (message: string, cause?: unknown): OracleError =>
  oracleError("INVALID_RESPONSE", message, cause);

export const scriptExhaustedError = (calls: number): OracleError =>
  oracleError("SCRIPT_EXHAUSTED", `No scripted response left for call #${calls}`);

// ========== 型ガード ==========

export const isOracleError = (e: unknown): e is OracleError =>
  typeof e === "object" && e !== null && "_tag" in e && e._tag === "OracleError";
