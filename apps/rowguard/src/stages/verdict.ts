/**
 * ステージ共通: オラクル問い合わせ → Verdict パース
 */
import * as E from 'fp-ts/Either';
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import type { OracleError, TextOracle } from '@rowguard/oracle';
import type { VerdictSchema } from '@rowguard/verdicts';
import { parseVerdictResult } from '@rowguard/verdicts';
import type { DomainError } from '../domain/errors.js';
import { domainError } from '../domain/errors.js';
import { sanitizeErrorMessage } from '../audit/filter.js';
import type { Principal } from '../domain/types.js';

export interface StageDeps {
  readonly oracle: TextOracle;
  readonly principal: Principal;
}

/** OracleError を協調先失敗の DomainError に写す */
export const fromOracleError = (e: OracleError): DomainError =>
  domainError(e.code === 'TIMEOUT' ? 'ORACLE_TIMEOUT' : 'ORACLE_FAILED', e.message, e);

/**
 * オラクルに問い合わせる
 * complete が例外を投げた・reject した場合も ORACLE_FAILED の Left にする
 */
export const askOracle = (
  oracle: TextOracle,
  instruction: string,
  message: string
): TE.TaskEither<DomainError, string> =>
  pipe(
    TE.tryCatch(
      () => oracle.complete(instruction, message)(),
      (e): DomainError => domainError('ORACLE_FAILED', sanitizeErrorMessage(e), e)
    ),
    TE.chainEitherK((result: E.Either<OracleError, string>) =>
      pipe(result, E.mapLeft(fromOracleError))
    )
  );

/**
 * オラクルに問い合わせて Verdict を得る
 * パース失敗は安全側の既定値になり、ログにのみ残る
 */
export const requestVerdict = <V>(
  oracle: TextOracle,
  schema: VerdictSchema<V>,
  instruction: string,
  message: string
): TE.TaskEither<DomainError, V> =>
  pipe(
    askOracle(oracle, instruction, message),
    TE.map((raw) => {
      const result = parseVerdictResult(schema, raw);
      if (!result.ok) {
        console.error(
          `[pipeline] ${schema.name} verdict fell back to defaults: ${(result.errors ?? []).join('; ')}`
        );
      }
      return result.value;
    })
  );
