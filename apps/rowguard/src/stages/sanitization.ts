/**
 * Output Sanitization Stage
 *
 * - safe=true: 元のテキストをそのまま公開可能
 * - safe=false: sanitizedResponse を必ず設定する（オラクルが省略したら WITHHELD_NOTICE）
 * - 機械的縮約で変化があれば safe=false に倒す
 * - originalResponse は監査用に常に元テキスト
 */
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import type { SanitizationVerdict } from '@rowguard/verdicts';
import { sanitizationSchema } from '@rowguard/verdicts';
import { redactRecordText } from '@rowguard/boundary';
import type { DomainError } from '../domain/errors.js';
import { sanitizationInstruction, sanitizationMessage } from './instructions.js';
import type { StageDeps } from './verdict.js';
import { requestVerdict } from './verdict.js';

export const WITHHELD_NOTICE =
  'This response was withheld because it may contain sensitive information.';

export const OUTPUT_REVIEW_DISABLED_REASON = 'Output review disabled';

export interface SanitizationDeps extends StageDeps {
  readonly mechanicalRedaction: boolean;
}

/**
 * オラクルの判定を公開用の Verdict に確定させる
 */
export const finalizeSanitization = (
  verdict: SanitizationVerdict,
  rawText: string,
  mechanicalRedaction: boolean
): SanitizationVerdict => {
  let released = verdict.safe ? rawText : (verdict.sanitizedResponse ?? WITHHELD_NOTICE);
  // 書き換えと称して元テキストを含む応答は採用しない
  if (!verdict.safe && rawText.trim() !== '' && released.includes(rawText)) {
    released = WITHHELD_NOTICE;
  }
  const settled: SanitizationVerdict = {
    safe: verdict.safe,
    reason: verdict.reason,
    sanitizedResponse: released,
    originalResponse: rawText,
  };
  if (!mechanicalRedaction) return settled;

  const { redacted, hits } = redactRecordText(released);
  if (hits.length === 0) return settled;
  return {
    safe: false,
    reason: verdict.safe
      ? `Sensitive values redacted: ${hits.map((h) => h.kind).join(', ')}`
      : verdict.reason,
    sanitizedResponse: redacted,
    originalResponse: rawText,
  };
};

export const sanitizeOutput =
  (deps: SanitizationDeps) =>
  (rawText: string): TE.TaskEither<DomainError, SanitizationVerdict> =>
    pipe(
      requestVerdict(
        deps.oracle,
        sanitizationSchema,
        sanitizationInstruction(deps.principal),
        sanitizationMessage(rawText)
      ),
      TE.map((verdict) => finalizeSanitization(verdict, rawText, deps.mechanicalRedaction))
    );

/**
 * オラクルによる出力レビューが無効な構成用: 機械的縮約のみ（常に有効）
 */
export const redactOutput = (rawText: string): SanitizationVerdict =>
  finalizeSanitization(
    {
      safe: true,
      reason: OUTPUT_REVIEW_DISABLED_REASON,
      sanitizedResponse: null,
      originalResponse: null,
    },
    rawText,
    true
  );
