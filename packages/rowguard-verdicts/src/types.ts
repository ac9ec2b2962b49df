import type { z } from 'zod';

/**
 * フィールドのパース規則
 * - boolean: 残り部分に "true" トークンがある場合のみ true
 * - text: トリム済みの自由記述
 * - stringSet: `[a, b]` 形式のカンマ区切り集合
 * - nullableString: `null` または空なら値なし
 */
export type FieldRule = 'boolean' | 'text' | 'stringSet' | 'nullableString';

/** オラクル出力の1行 `key: value` に対応するフィールド定義 */
export interface FieldSpec {
  /** ワイヤ上のキー名（snake_case、大文字小文字は区別しない） */
  readonly key: string;
  readonly rule: FieldRule;
}

/** フィールド値（シリアライズ時に使用） */
export type FieldValue = boolean | string | readonly string[] | null;

/**
 * パース済みフィールドの読み取りインターフェース
 * 未出現のフィールドは最も安全な値を返す
 */
export interface ParsedFields {
  flag(key: string): boolean;
  text(key: string): string | undefined;
  set(key: string): readonly string[];
  optional(key: string): string | null;
}

/**
 * Verdictスキーマ
 * fields の順序がプレフィックス照合の優先順位になる
 */
export interface VerdictSchema<V> {
  readonly name: string;
  readonly fields: readonly FieldSpec[];
  /** 組み立て後の最終検証 */
  readonly codec: z.ZodType<V>;
  readonly assemble: (fields: ParsedFields) => V;
  /** すべての boolean が false、任意フィールドが空の安全側レコード */
  readonly fallback: (reason: string) => V;
  readonly project: (verdict: V) => Readonly<Record<string, FieldValue>>;
}

export interface ParseResult<V> {
  /** 1つ以上のフィールドを認識し、検証を通過したか */
  ok: boolean;
  value: V;
  errors?: string[];
}
