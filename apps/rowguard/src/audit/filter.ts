/**
 * 機密データフィルタリング
 * ログに機密情報を残さないためのユーティリティ
 */
import { createHash } from "crypto";

/**
 * 文字列のSHA256ダイジェストを生成
 * リクエスト/応答の内容をログに残さず、検証用ハッシュのみ記録
 */
export function computeDigest(content: string): string {
  return `sha256:${createHash("sha256").update(content, "utf8").digest("hex")}`;
}

/**
 * エラーメッセージから機密情報を除去
 * スタックトレースやパス情報、メールアドレスやSSN形式の値を含まないメッセージを返す
 */
export function sanitizeErrorMessage(error: unknown): string {
  const raw =
    error instanceof Error
      ? error.message
      : typeof error === "object" && error !== null && "message" in error && typeof error.message === "string"
        ? error.message
        : String(error);
  return raw
    .replace(/\/[^\s]+/g, "[PATH]")
    .replace(/\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi, "[EMAIL]")
    .replace(/\b\d{3}-\d{2}-\d{4}\b/g, "[SSN]");
}
