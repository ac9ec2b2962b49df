/**
 * 認可とSQL安全性の1回判定
 * 結果は通常の2ステージと同じ Verdict の組に分けて返す
 */
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import type { AuthorizationVerdict, CombinedVerdict, SafetyVerdict } from '@rowguard/verdicts';
import { combinedSchema } from '@rowguard/verdicts';
import type { DomainError } from '../domain/errors.js';
import { withQueryFields } from './authorization.js';
import { authorizationMessage, combinedInstruction } from './instructions.js';
import type { StageDeps } from './verdict.js';
import { requestVerdict } from './verdict.js';

export interface SplitVerdict {
  readonly authorization: AuthorizationVerdict;
  readonly safety: SafetyVerdict;
}

export const splitCombinedVerdict = (v: CombinedVerdict): SplitVerdict => ({
  authorization: withQueryFields({
    authorized: v.authorized,
    reason: v.reason,
    sensitiveFields: v.sensitiveFields,
    candidateQuery: v.candidateQuery,
  }),
  safety: { safe: v.safe, reason: v.sqlReason, suggestedQuery: v.suggestedQuery },
});

export const authorizeAndVerify =
  (deps: StageDeps) =>
  (request: string): TE.TaskEither<DomainError, SplitVerdict> =>
    pipe(
      requestVerdict(
        deps.oracle,
        combinedSchema,
        combinedInstruction(deps.principal),
        authorizationMessage(request)
      ),
      TE.map(splitCombinedVerdict)
    );
