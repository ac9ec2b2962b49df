/**
 * @rowguard/boundary - 決定的なガード
 *
 * - Query scope gate (候補クエリが現在のprincipalの行だけを読むか)
 * - Record text redaction (出力に残った機密値の縮約)
 */

export {
  checkQueryScope,
  mentionedSensitiveFields,
  normalizeQuery,
  RECORD_TABLE,
} from './scope.js';
export type { ScopeCheckResult, ScopeViolation, ScopeViolationCode } from './scope.js';

export { redactRecordText, SSN_REPLACEMENT } from './redact.js';
export type { RedactionHit, RedactionKind, RedactionResult } from './redact.js';
