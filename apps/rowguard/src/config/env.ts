/**
 * 環境変数の読み込みとバリデーション
 * rowguard の設定を管理
 */
import { z } from "zod";
import { DEFAULT_ORACLE_ENDPOINT, DEFAULT_ORACLE_MODEL } from "@rowguard/oracle";

// "true"/"false" 文字列を boolean に変換（未設定時は既定値）
const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((v) => (v === undefined ? defaultValue : v === "true" || v === "1"));

// 環境変数スキーマ定義
const envSchema = z.object({
  // DuckDB パス（":memory:" も可）
  ROWGUARD_DB: z.string().min(1).default("users.db"),

  // オラクル（OpenAI互換エンドポイント）
  ROWGUARD_ORACLE_ENDPOINT: z.string().url().default(DEFAULT_ORACLE_ENDPOINT),
  ROWGUARD_ORACLE_API_KEY: z.string().optional(),
  ROWGUARD_ORACLE_MODEL: z.string().min(1).default(DEFAULT_ORACLE_MODEL),
  ROWGUARD_ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // 実行境界のタイムアウト
  ROWGUARD_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // ステージ構成
  ROWGUARD_SAFETY_MODE: z.enum(["separate", "combined", "off"]).default("separate"),
  ROWGUARD_OUTPUT_SANITIZATION: booleanFlag(true),
  ROWGUARD_MECHANICAL_REDACTION: booleanFlag(true),
  ROWGUARD_FALLBACK: booleanFlag(true),

  // 監査ログ出力先（ファイルパス）
  AUDIT_LOG_PATH: z.string().optional(),

  // 実行環境
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * 環境変数を読み込み、バリデーションを実行
 * 本番環境では ROWGUARD_ORACLE_API_KEY が必須
 */
export function loadEnv(): Env {
  if (cachedEnv) return cachedEnv;

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`ENV_VALIDATION_FAILED: ${errors}`);
  }

  const env = result.data;

  if (env.NODE_ENV === "production" && !env.ROWGUARD_ORACLE_API_KEY) {
    throw new Error("ENV_VALIDATION_FAILED: ROWGUARD_ORACLE_API_KEY is required in production");
  }

  cachedEnv = env;
  return env;
}

/**
 * テスト用: キャッシュをクリア
 */
export function clearEnvCache(): void {
  cachedEnv = null;
}
