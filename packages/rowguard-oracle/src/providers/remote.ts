/**
 * @rowguard/oracle リモートオラクルプロバイダー
 *
 * OpenAI Chat Completions API互換のエンドポイントをサポート
 * （OpenRouter / OpenAI / ローカルの互換サーバー）
 */

import * as TE from "fp-ts/TaskEither";
import { pipe } from "fp-ts/function";
import { z } from "zod";
import type { OracleStatus, RemoteOracleConfig, TextOracle } from "../types.js";
import type { OracleError } from "../errors.js";
import {
  invalidResponseError,
  isOracleError,
  oracleTimeoutError,
  remoteApiError,
} from "../errors.js";

// ========== 型定義 ==========

/**
 * Chat Completions レスポンスのうち参照する部分
 * 悪意あるエンドポイントからの不正データは形式検証で弾く
 */
const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

/** レスポンス本文の上限（文字数） */
const MAX_COMPLETION_LENGTH = 16_000;

/**
 * リモートプロバイダー拡張設定
 */
export interface RemoteOracleOptions extends RemoteOracleConfig {
  /** タイムアウト（ミリ秒）。デフォルト: 30000 */
  readonly timeoutMs?: number;
  /** リトライ回数。デフォルト: 0（ステージ側では再試行しない） */
  readonly maxRetries?: number;
  /** リトライ間隔（ミリ秒）。デフォルト: 1000 */
  readonly retryDelayMs?: number;
}

// ========== セキュリティヘルパー ==========

/**
 * エンドポイントURLのセキュリティ検証
 * SSRF攻撃とAPIキー流出を防止
 *
 * @throws エンドポイントが安全でない場合
 */
export const validateEndpoint = (endpoint: string): void => {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new Error(`Invalid endpoint URL: ${endpoint}`);
  }

  // HTTPSのみ許可（開発時のlocalhost/127.0.0.1は例外）
  const isLocalhost = url.hostname === "localhost" || url.hostname === "127.0.0.1";
  if (url.protocol !== "https:" && !isLocalhost) {
    throw new Error(
      `Insecure endpoint protocol: ${url.protocol}. Only HTTPS is allowed (localhost exempt for development).`
    );
  }

  const hostname = url.hostname;
  const privateIpPatterns = [
    /^10\./, // 10.0.0.0/8
    /^172\.(1[6-9]|2[0-9]|3[01])\./, // 172.16.0.0/12
    /^192\.168\./, // 192.168.0.0/16
    /^169\.254\./, // リンクローカル
    /^0\./, // 0.0.0.0/8
  ];

  if (!isLocalhost) {
    for (const pattern of privateIpPatterns) {
      if (pattern.test(hostname)) {
        throw new Error(`Access to internal network address is not allowed: ${hostname}`);
      }
    }
  }
};

const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

// ========== プロバイダー作成 ==========

/**
 * リモートオラクルを作成
 *
 * - POST {endpoint}/chat/completions
 * - messages: system + user の2件
 * - temperature: 既定0
 *
 * @throws エンドポイントが安全でない場合
 */
export const createRemoteOracle = (config: RemoteOracleOptions): TextOracle => {
  const {
    endpoint,
    apiKey,
    model,
    temperature = 0,
    timeoutMs = 30000,
    maxRetries = 0,
    retryDelayMs = 1000,
  } = config;

  validateEndpoint(endpoint);
  const baseUrl = endpoint.replace(/\/+$/, "");

  let status: OracleStatus = "available";

  /**
   * 1回のリクエスト（ヘッダー受信から本文の読み取りまで）
   */
  const request = async (
    systemInstruction: string,
    userMessage: string,
    signal: AbortSignal
  ): Promise<unknown> => {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (apiKey !== "") headers["Authorization"] = `Bearer ${apiKey}`;

    const response = await fetch(`${baseUrl}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model,
        temperature,
        messages: [
          { role: "system", content: systemInstruction },
          { role: "user", content: userMessage },
        ],
      }),
      signal,
    });

    if (!response.ok) {
      // レート制限の場合はdegradedに
      if (response.status === 429) {
        status = "degraded";
      } else if (response.status >= 500) {
        status = "unavailable";
      }
      throw remoteApiError(`API error: ${response.status} ${response.statusText}`);
    }

    status = "available";
    const body: unknown = await response.json();
    return body;
  };

  /**
   * API呼び出し
   * 本文の読み取りまでを timeoutMs で打ち切り、OracleError(TIMEOUT) として投げる
   */
  const callApi = async (systemInstruction: string, userMessage: string): Promise<unknown> => {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(oracleTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        request(systemInstruction, userMessage, controller.signal),
        deadline,
      ]);
    } catch (e) {
      if (e instanceof Error && e.name === "AbortError") {
        throw oracleTimeoutError(timeoutMs);
      }
      throw e;
    } finally {
      clearTimeout(timeoutId);
    }
  };

  /**
   * リトライ付きAPI呼び出し
   */
  const callApiWithRetry = async (
    systemInstruction: string,
    userMessage: string
  ): Promise<unknown> => {
    let lastError: unknown = undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await callApi(systemInstruction, userMessage);
      } catch (e) {
        lastError = e;
        if (attempt < maxRetries) {
          await new Promise((resolve) => setTimeout(resolve, retryDelayMs));
        }
      }
    }

    throw lastError;
  };

  const extractContent = (body: unknown): TE.TaskEither<OracleError, string> => {
    const parsed = ChatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      return TE.left(invalidResponseError("Unexpected completion response shape", parsed.error));
    }
    const content = parsed.data.choices[0]?.message.content;
    if (content === undefined || content === null) {
      return TE.left(invalidResponseError("Completion response has no content"));
    }
    if (content.length > MAX_COMPLETION_LENGTH) {
      return TE.left(
        invalidResponseError(
          `Completion length ${content.length} exceeds maximum ${MAX_COMPLETION_LENGTH}`
        )
      );
    }
    return TE.right(content);
  };

  return {
    get model(): string {
      return model;
    },

    get status(): OracleStatus {
      return status;
    },

    complete: (systemInstruction: string, userMessage: string): TE.TaskEither<OracleError, string> =>
      pipe(
        TE.tryCatch(
          () => callApiWithRetry(systemInstruction, userMessage),
          (e): OracleError => (isOracleError(e) ? e : remoteApiError(errorMessage(e), e))
        ),
        TE.chain(extractContent)
      ),
  };
};
