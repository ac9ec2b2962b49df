/**
 * Safety Verification Stage
 *
 * オラクルによる判定に、機械的なスコープゲートを AND で重ねる。
 * ゲートが拒否した場合はその理由を優先する。
 */
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import type { SafetyVerdict } from '@rowguard/verdicts';
import { safetySchema } from '@rowguard/verdicts';
import { checkQueryScope } from '@rowguard/boundary';
import type { DomainError } from '../domain/errors.js';
import { safetyInstruction, safetyMessage } from './instructions.js';
import type { StageDeps } from './verdict.js';
import { requestVerdict } from './verdict.js';

const SCOPE_REJECTED = 'Query failed the scope check';

/**
 * スコープゲートを適用
 * 提案クエリはゲートを通るものだけ残す（自動実行はしない）
 */
export const applyScopeGate = (
  verdict: SafetyVerdict,
  query: string,
  principalId: number
): SafetyVerdict => {
  const gate = checkQueryScope(query, principalId);
  const suggestedQuery =
    verdict.suggestedQuery !== null && checkQueryScope(verdict.suggestedQuery, principalId).allowed
      ? verdict.suggestedQuery
      : null;
  if (!gate.allowed) {
    return { safe: false, reason: gate.reason ?? SCOPE_REJECTED, suggestedQuery };
  }
  return { safe: verdict.safe, reason: verdict.reason, suggestedQuery };
};

export const verifyQuery =
  (deps: StageDeps) =>
  (candidateQuery: string): TE.TaskEither<DomainError, SafetyVerdict> =>
    pipe(
      requestVerdict(
        deps.oracle,
        safetySchema,
        safetyInstruction(deps.principal),
        safetyMessage(candidateQuery)
      ),
      TE.map((verdict) => applyScopeGate(verdict, candidateQuery, deps.principal.id))
    );
