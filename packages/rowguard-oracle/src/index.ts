/**
 * @rowguard/oracle - Text Oracle
 *
 * - TextOracle interface
 * - OpenAI Chat Completions 互換リモートプロバイダー
 * - スクリプト化/利用不可プロバイダー（テスト・オフライン用）
 */

export type { OracleStatus, OracleRequest, TextOracle, RemoteOracleConfig } from "./types.js";
export { DEFAULT_ORACLE_ENDPOINT, DEFAULT_ORACLE_MODEL } from "./types.js";

export type { OracleError, OracleErrorCode } from "./errors.js";
export {
  oracleError,
  oracleUnavailableError,
  oracleTimeoutError,
  remoteApiError,
  invalidResponseError,
  scriptExhaustedError,
  isOracleError,
} from "./errors.js";

export { createRemoteOracle, validateEndpoint } from "./providers/remote.js";
export type { RemoteOracleOptions } from "./providers/remote.js";

export { createScriptedOracle, createUnavailableOracle } from "./providers/scripted.js";
export type { ScriptStep, ScriptedResponder, ScriptedOracle } from "./providers/scripted.js";
