/**
 * Verdictスキーマ定義
 *
 * 各ステージのオラクル出力を「順序付きフィールド列 + 組み立て関数」として明示する。
 * パーサーは1つだけで、ステージごとのアドホックなパースは持たない。
 */
import { z } from 'zod';
import type { VerdictSchema } from './types.js';
import { INVALID_FORMAT_REASON, MAX_FIELD_LENGTH } from './defaults.js';

const boundedText = z.string().max(MAX_FIELD_LENGTH);
const fieldSet = z.array(boundedText.min(1)).readonly();

// ========== Authorization ==========

export const AuthorizationVerdictSchema = z
  .object({
    authorized: z.boolean(),
    reason: boundedText,
    sensitiveFields: fieldSet,
    candidateQuery: boundedText.min(1).nullable(),
  })
  .readonly();
export type AuthorizationVerdict = z.infer<typeof AuthorizationVerdictSchema>;

export const authorizationSchema: VerdictSchema<AuthorizationVerdict> = {
  name: 'authorization',
  fields: [
    { key: 'authorized', rule: 'boolean' },
    { key: 'reason', rule: 'text' },
    { key: 'sensitive_fields', rule: 'stringSet' },
    { key: 'sql_query', rule: 'nullableString' },
  ],
  codec: AuthorizationVerdictSchema,
  assemble: (f) => {
    const authorized = f.flag('authorized');
    return {
      authorized,
      reason: f.text('reason') ?? INVALID_FORMAT_REASON,
      sensitiveFields: f.set('sensitive_fields'),
      // 未認可の場合は候補クエリを保持しない
      candidateQuery: authorized ? f.optional('sql_query') : null,
    };
  },
  fallback: (reason) => ({
    authorized: false,
    reason,
    sensitiveFields: [],
    candidateQuery: null,
  }),
  project: (v) => ({
    authorized: v.authorized,
    reason: v.reason,
    sensitive_fields: v.sensitiveFields,
    sql_query: v.candidateQuery,
  }),
};

// ========== Safety Verification ==========

export const SafetyVerdictSchema = z
  .object({
    safe: z.boolean(),
    reason: boundedText,
    suggestedQuery: boundedText.min(1).nullable(),
  })
  .readonly();
export type SafetyVerdict = z.infer<typeof SafetyVerdictSchema>;

export const safetySchema: VerdictSchema<SafetyVerdict> = {
  name: 'safety',
  fields: [
    { key: 'safe', rule: 'boolean' },
    { key: 'reason', rule: 'text' },
    { key: 'suggested_query', rule: 'nullableString' },
  ],
  codec: SafetyVerdictSchema,
  assemble: (f) => ({
    safe: f.flag('safe'),
    reason: f.text('reason') ?? INVALID_FORMAT_REASON,
    suggestedQuery: f.optional('suggested_query'),
  }),
  fallback: (reason) => ({ safe: false, reason, suggestedQuery: null }),
  project: (v) => ({
    safe: v.safe,
    reason: v.reason,
    suggested_query: v.suggestedQuery,
  }),
};

// ========== Output Sanitization ==========

export const SanitizationVerdictSchema = z
  .object({
    safe: z.boolean(),
    reason: boundedText,
    sanitizedResponse: boundedText.min(1).nullable(),
    originalResponse: boundedText.min(1).nullable(),
  })
  .readonly();
export type SanitizationVerdict = z.infer<typeof SanitizationVerdictSchema>;

export const sanitizationSchema: VerdictSchema<SanitizationVerdict> = {
  name: 'sanitization',
  fields: [
    { key: 'safe', rule: 'boolean' },
    { key: 'reason', rule: 'text' },
    { key: 'sanitized_response', rule: 'nullableString' },
    { key: 'original_response', rule: 'nullableString' },
  ],
  codec: SanitizationVerdictSchema,
  assemble: (f) => ({
    safe: f.flag('safe'),
    reason: f.text('reason') ?? INVALID_FORMAT_REASON,
    sanitizedResponse: f.optional('sanitized_response'),
    originalResponse: f.optional('original_response'),
  }),
  fallback: (reason) => ({
    safe: false,
    reason,
    sanitizedResponse: null,
    originalResponse: null,
  }),
  project: (v) => ({
    safe: v.safe,
    reason: v.reason,
    sanitized_response: v.sanitizedResponse,
    original_response: v.originalResponse,
  }),
};

// ========== Combined single-pass ==========

export const CombinedVerdictSchema = z
  .object({
    authorized: z.boolean(),
    reason: boundedText,
    sensitiveFields: fieldSet,
    candidateQuery: boundedText.min(1).nullable(),
    safe: z.boolean(),
    sqlReason: boundedText,
    suggestedQuery: boundedText.min(1).nullable(),
  })
  .readonly();
export type CombinedVerdict = z.infer<typeof CombinedVerdictSchema>;

/**
 * 認可とSQL安全性を1回のオラクル呼び出しで判定する形式
 * プレフィックスはコロンまで含めて照合するため `reason` と `sql_reason` は衝突しない
 */
export const combinedSchema: VerdictSchema<CombinedVerdict> = {
  name: 'combined',
  fields: [
    { key: 'authorized', rule: 'boolean' },
    { key: 'reason', rule: 'text' },
    { key: 'sensitive_fields', rule: 'stringSet' },
    { key: 'sql_query', rule: 'nullableString' },
    { key: 'safe', rule: 'boolean' },
    { key: 'sql_reason', rule: 'text' },
    { key: 'suggested_query', rule: 'nullableString' },
  ],
  codec: CombinedVerdictSchema,
  assemble: (f) => {
    const authorized = f.flag('authorized');
    return {
      authorized,
      reason: f.text('reason') ?? INVALID_FORMAT_REASON,
      sensitiveFields: f.set('sensitive_fields'),
      candidateQuery: authorized ? f.optional('sql_query') : null,
      safe: f.flag('safe'),
      sqlReason: f.text('sql_reason') ?? INVALID_FORMAT_REASON,
      suggestedQuery: f.optional('suggested_query'),
    };
  },
  fallback: (reason) => ({
    authorized: false,
    reason,
    sensitiveFields: [],
    candidateQuery: null,
    safe: false,
    sqlReason: reason,
    suggestedQuery: null,
  }),
  project: (v) => ({
    authorized: v.authorized,
    reason: v.reason,
    sensitive_fields: v.sensitiveFields,
    sql_query: v.candidateQuery,
    safe: v.safe,
    sql_reason: v.sqlReason,
    suggested_query: v.suggestedQuery,
  }),
};
