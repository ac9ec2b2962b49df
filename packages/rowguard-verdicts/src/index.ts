/**
 * @rowguard/verdicts - オラクル出力を型付きVerdictに変換する
 *
 * このパッケージは以下を提供します：
 * - Verdict data model (認可/安全性/サニタイズ/統合)
 * - Ordered verdict schemas (順序付きフィールド定義)
 * - Tolerant line parser (寛容パーサー、失敗時は安全側)
 * - Serializer (parse と往復可能な書き戻し)
 * - Sensitive field taxonomy (機密フィールド分類)
 */

export type { FieldRule, FieldSpec, FieldValue, ParsedFields, VerdictSchema, ParseResult } from './types.js';

export {
  AuthorizationVerdictSchema,
  SafetyVerdictSchema,
  SanitizationVerdictSchema,
  CombinedVerdictSchema,
  authorizationSchema,
  safetySchema,
  sanitizationSchema,
  combinedSchema,
} from './schemas.js';
export type {
  AuthorizationVerdict,
  SafetyVerdict,
  SanitizationVerdict,
  CombinedVerdict,
} from './schemas.js';

export {
  parseVerdict,
  parseVerdictResult,
  serializeVerdict,
  safeDefault,
  parseFlag,
  parseStringSet,
  parseNullableString,
} from './parser.js';

export {
  INVALID_FORMAT_REASON,
  MAX_FIELD_LENGTH,
  SENSITIVE_FIELDS,
  isSensitiveField,
  parseFailureReason,
} from './defaults.js';
export type { SensitiveField } from './defaults.js';
