/** オラクル出力がどのフィールドにも一致しなかった場合の理由 */
export const INVALID_FORMAT_REASON = 'Invalid response format';

export const parseFailureReason = (message: string): string =>
  `Error parsing response: ${message}`;

/** フィールド値の上限長（これを超える出力はパース失敗として扱う） */
export const MAX_FIELD_LENGTH = 4000;

/**
 * 機密フィールド分類
 * 本人であれば閲覧可能だが、出力時に追加のredact/truncateが必要
 */
export const SENSITIVE_FIELDS = ['ssn', 'phone_number', 'address', 'date_of_birth'] as const;
export type SensitiveField = (typeof SENSITIVE_FIELDS)[number];

export function isSensitiveField(name: string): boolean {
  const normalized = name.trim().toLowerCase();
  return SENSITIVE_FIELDS.some((field) => field === normalized);
}
