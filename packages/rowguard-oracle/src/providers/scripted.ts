/**
 * @rowguard/oracle スクリプト化オラクル
 *
 * テストとオフライン実行用。あらかじめ用意した応答を順に返すか、
 * 問い合わせ内容から応答を決める関数に委譲する。
 */

import * as TE from "fp-ts/TaskEither";
import type { OracleRequest, TextOracle } from "../types.js";
import type { OracleError } from "../errors.js";
import { isOracleError, oracleUnavailableError, scriptExhaustedError } from "../errors.js";

/** 1回分の応答（テキスト、または失敗） */
export type ScriptStep = string | OracleError;

export type ScriptedResponder = (request: OracleRequest) => ScriptStep;

export interface ScriptedOracle extends TextOracle {
  /** 受け取った問い合わせ（呼び出し順） */
  readonly calls: readonly OracleRequest[];
}

const toTask = (step: ScriptStep): TE.TaskEither<OracleError, string> =>
  isOracleError(step) ? TE.left(step) : TE.right(step);

/**
 * スクリプト化オラクルを作成
 * 配列を渡した場合は枯渇後 SCRIPT_EXHAUSTED を返す
 */
export const createScriptedOracle = (
  source: readonly ScriptStep[] | ScriptedResponder,
  model = "scripted"
): ScriptedOracle => {
  const calls: OracleRequest[] = [];
  const queue = typeof source === "function" ? undefined : [...source];

  return {
    model,
    status: "available",
    calls,

    // 呼び出しは実行時に記録する（TaskEither生成時ではない）
    complete:
      (systemInstruction: string, userMessage: string): TE.TaskEither<OracleError, string> =>
      () => {
        const request: OracleRequest = { systemInstruction, userMessage };
        calls.push(request);
        if (typeof source === "function") return toTask(source(request))();
        const next = queue?.shift();
        return next === undefined ? TE.left(scriptExhaustedError(calls.length))() : toTask(next)();
      },
  };
};

/**
 * 利用不可のスタブオラクル（テスト用）
 */
export const createUnavailableOracle = (): TextOracle => ({
  model: "unavailable",
  status: "unavailable",

  complete: (): TE.TaskEither<OracleError, string> =>
    TE.left(oracleUnavailableError("Oracle is unavailable")),
});
