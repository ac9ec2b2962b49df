/**
 * @rowguard/oracle 型定義
 */

import type * as TE from "fp-ts/TaskEither";
import type { OracleError } from "./errors.js";

/** プロバイダー状態 */
export type OracleStatus = "available" | "unavailable" | "degraded";

/** オラクルへの1回の問い合わせ */
export interface OracleRequest {
  readonly systemInstruction: string;
  readonly userMessage: string;
}

/**
 * Text Oracle
 * 固定のsystem instructionとユーザーメッセージを受け取り、自由形式のテキストを返す。
 * 出力は非決定的で信頼できない入力として扱う。
 */
export interface TextOracle {
  /** モデル名（例: "gpt-3.5-turbo"） */
  readonly model: string;
  readonly status: OracleStatus;

  complete(systemInstruction: string, userMessage: string): TE.TaskEither<OracleError, string>;
}

/**
 * OpenAI Chat Completions 互換エンドポイントの設定
 */
export interface RemoteOracleConfig {
  /** ベースURL（例: "https://openrouter.ai/api/v1"） */
  readonly endpoint: string;
  readonly apiKey: string;
  readonly model: string;
  /** デフォルト: 0 */
  readonly temperature?: number;
}

export const DEFAULT_ORACLE_ENDPOINT = "https://openrouter.ai/api/v1";
export const DEFAULT_ORACLE_MODEL = "gpt-3.5-turbo";
