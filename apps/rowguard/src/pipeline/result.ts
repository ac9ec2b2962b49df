/**
 * パイプラインの結果と表示
 * ユーザーに見せるテキストはここでのみ組み立てる
 */
import type { ErrorCode } from '../domain/errors.js';

export type PipelineResult =
  | {
      readonly kind: 'denied';
      readonly reason: string;
      readonly sensitiveFields: readonly string[];
    }
  | {
      readonly kind: 'blocked';
      readonly reason: string;
      readonly suggestedQuery: string | null;
    }
  | {
      readonly kind: 'answered';
      readonly response: string;
      /** 出力ステージが書き換えた場合 true */
      readonly sanitized: boolean;
      readonly reason: string | null;
    }
  | {
      readonly kind: 'errored';
      readonly code: ErrorCode;
      readonly message: string;
      readonly retryable: true;
    };

export const RETRY_PROMPT = "Let's try that again.";

/**
 * 結果を表示行に変換
 */
export function renderResult(result: PipelineResult): string[] {
  switch (result.kind) {
    case 'denied':
      return result.sensitiveFields.length > 0
        ? [
            `Access Denied: ${result.reason}`,
            `Sensitive fields detected: ${result.sensitiveFields.join(', ')}`,
          ]
        : [`Access Denied: ${result.reason}`];
    case 'blocked':
      return result.suggestedQuery !== null
        ? [`SQL Query Blocked: ${result.reason}`, `Suggested safe query: ${result.suggestedQuery}`]
        : [`SQL Query Blocked: ${result.reason}`];
    case 'answered':
      return result.sanitized
        ? [`Output Sanitized: ${result.reason ?? ''}`, `AI: ${result.response}`]
        : [`AI: ${result.response}`];
    case 'errored':
      return [`Error: ${result.message}`, RETRY_PROMPT];
  }
}
