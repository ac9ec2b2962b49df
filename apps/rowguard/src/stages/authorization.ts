/**
 * Authorization Stage
 * 自然言語の要求を、現在のprincipalに限定した候補クエリに変換する
 */
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import type { AuthorizationVerdict } from '@rowguard/verdicts';
import { authorizationSchema } from '@rowguard/verdicts';
import { mentionedSensitiveFields } from '@rowguard/boundary';
import type { DomainError } from '../domain/errors.js';
import { authorizationInstruction, authorizationMessage } from './instructions.js';
import type { StageDeps } from './verdict.js';
import { requestVerdict } from './verdict.js';

/**
 * 候補クエリが参照する機密フィールドを追記する（オラクルの申告順を保つ）
 */
export const withQueryFields = (verdict: AuthorizationVerdict): AuthorizationVerdict => {
  if (verdict.candidateQuery === null) return verdict;
  const missing = mentionedSensitiveFields(verdict.candidateQuery).filter(
    (field) => !verdict.sensitiveFields.includes(field)
  );
  return missing.length === 0
    ? verdict
    : { ...verdict, sensitiveFields: [...verdict.sensitiveFields, ...missing] };
};

export const authorizeRequest =
  (deps: StageDeps) =>
  (request: string): TE.TaskEither<DomainError, AuthorizationVerdict> =>
    pipe(
      requestVerdict(
        deps.oracle,
        authorizationSchema,
        authorizationInstruction(deps.principal),
        authorizationMessage(request)
      ),
      TE.map(withQueryFields)
    );
