/**
 * Pipeline Orchestrator
 *
 * 1リクエストを状態機械に沿って順に処理する。
 * - 協調先（オラクル/ストア）の失敗や例外は ERRORED、部分的な応答は返さない
 * - 実行結果は必ず SANITIZING を通る（レビュー無効でも機械的縮約は行う）
 * - RESPONDED のときだけ SessionState に追記する
 * - 認可ステージとスコープゲートはステージ構成によらず常に有効
 */
import * as E from 'fp-ts/Either';
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import type { TextOracle } from '@rowguard/oracle';
import type { AuthorizationVerdict, SafetyVerdict, SanitizationVerdict } from '@rowguard/verdicts';
import type { DomainError } from '../domain/errors.js';
import { domainError } from '../domain/errors.js';
import type { Principal, StageProfile } from '../domain/types.js';
import { DEFAULT_STAGE_PROFILE } from '../domain/types.js';
import { validateRequest } from '../domain/validation.js';
import { computeDigest, sanitizeErrorMessage } from '../audit/filter.js';
import { appendAuditFile } from '../store/logs.js';
import { DEFAULT_EXECUTION_TIMEOUT_MS, executeQuery } from '../store/execute.js';
import type { SessionState } from '../state/sessionState.js';
import { authorizeRequest } from '../stages/authorization.js';
import { authorizeAndVerify } from '../stages/combined.js';
import { answerOpenEnded } from '../stages/fallback.js';
import { WITHHELD_NOTICE, redactOutput, sanitizeOutput } from '../stages/sanitization.js';
import { applyScopeGate, verifyQuery } from '../stages/safety.js';
import type { PipelineResult } from './result.js';
import type { PipelineState } from './states.js';
import { PipelineRun } from './states.js';

export const NO_QUERY_REASON = 'No query could be derived';
export const SAFETY_DISABLED_REASON = 'Safety verification disabled';

export type QueryExecutor = (query: string) => TE.TaskEither<DomainError, string>;

export interface OrchestratorDeps {
  readonly oracle: TextOracle;
  readonly principal: Principal;
  readonly session: SessionState;
  readonly profile?: StageProfile;
  /** 機械的縮約（既定: 有効） */
  readonly mechanicalRedaction?: boolean;
  /** 実行境界（既定: executeQuery） */
  readonly execute?: QueryExecutor;
  readonly storeTimeoutMs?: number;
}

export interface PipelineOutcome {
  readonly requestId: string;
  readonly result: PipelineResult;
  readonly trace: readonly PipelineState[];
}

export interface Orchestrator {
  readonly profile: StageProfile;
  handle(request: string): Promise<PipelineOutcome>;
}

/** 正常終了した1リクエストの結果（RESPONDED のときは応答本文付き） */
interface Settled {
  readonly result: PipelineResult;
  readonly response?: string;
}

const denied = (verdict: Pick<AuthorizationVerdict, 'reason' | 'sensitiveFields'>): Settled => ({
  result: { kind: 'denied', reason: verdict.reason, sensitiveFields: verdict.sensitiveFields },
});

const answered = (verdict: SanitizationVerdict, rawText: string): Settled => {
  const response = verdict.safe ? rawText : (verdict.sanitizedResponse ?? WITHHELD_NOTICE);
  return {
    result: { kind: 'answered', response, sanitized: !verdict.safe, reason: verdict.reason },
    response,
  };
};

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const profile = deps.profile ?? DEFAULT_STAGE_PROFILE;
  const { principal, session } = deps;
  const stageDeps = { oracle: deps.oracle, principal };
  const sanitize = sanitizeOutput({
    ...stageDeps,
    mechanicalRedaction: deps.mechanicalRedaction ?? true,
  });
  const storeTimeoutMs = deps.storeTimeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
  const runQuery: QueryExecutor =
    deps.execute ?? ((query) => executeQuery(query, storeTimeoutMs));
  // 実行境界が例外を投げた・reject した場合も STORE_FAILED の Left にする
  const execute: QueryExecutor = (query) =>
    pipe(
      TE.tryCatch(
        () => runQuery(query)(),
        (e): DomainError => domainError('STORE_FAILED', sanitizeErrorMessage(e), e)
      ),
      TE.chainEitherK((result: E.Either<DomainError, string>) => result)
    );

  /**
   * 認可（combined では安全性判定も同時に得る）
   */
  const authorize = async (
    request: string
  ): Promise<E.Either<DomainError, { auth: AuthorizationVerdict; safety?: SafetyVerdict }>> => {
    if (profile.safety === 'combined') {
      const split = await authorizeAndVerify(stageDeps)(request)();
      return E.isLeft(split)
        ? split
        : E.right({ auth: split.right.authorization, safety: split.right.safety });
    }
    const auth = await authorizeRequest(stageDeps)(request)();
    return E.isLeft(auth) ? auth : E.right({ auth: auth.right });
  };

  /**
   * 安全性判定（どのモードでもスコープゲートを通す）
   */
  const verify = async (
    query: string,
    combined: SafetyVerdict | undefined
  ): Promise<E.Either<DomainError, SafetyVerdict>> => {
    switch (profile.safety) {
      case 'separate':
        return verifyQuery(stageDeps)(query)();
      case 'combined':
        return E.right(
          applyScopeGate(
            combined ?? { safe: false, reason: NO_QUERY_REASON, suggestedQuery: null },
            query,
            principal.id
          )
        );
      case 'off':
        return E.right(
          applyScopeGate(
            { safe: true, reason: SAFETY_DISABLED_REASON, suggestedQuery: null },
            query,
            principal.id
          )
        );
    }
  };

  /**
   * 候補クエリなしの要求: 回答エージェント → 出力サニタイズ
   */
  const answerWithoutQuery = async (
    run: PipelineRun,
    request: string,
    auth: AuthorizationVerdict
  ): Promise<E.Either<DomainError, Settled>> => {
    if (!profile.fallback) {
      const moved = run.advance('DENIED');
      return E.isLeft(moved)
        ? moved
        : E.right(denied({ reason: NO_QUERY_REASON, sensitiveFields: auth.sensitiveFields }));
    }
    const answer = await answerOpenEnded(stageDeps)(request, session.history())();
    if (E.isLeft(answer)) return answer;

    const moved = run.advance('SANITIZING');
    if (E.isLeft(moved)) return moved;
    const verdict = await sanitize(answer.right)();
    return E.isLeft(verdict) ? verdict : E.right(answered(verdict.right, answer.right));
  };

  /**
   * 候補クエリあり: 安全性判定 → 実行 → 出力サニタイズ
   */
  const answerWithQuery = async (
    run: PipelineRun,
    query: string,
    combined: SafetyVerdict | undefined
  ): Promise<E.Either<DomainError, Settled>> => {
    let moved = run.advance('VERIFYING_SAFETY');
    if (E.isLeft(moved)) return moved;
    const safety = await verify(query, combined);
    if (E.isLeft(safety)) return safety;
    if (!safety.right.safe) {
      moved = run.advance('BLOCKED');
      if (E.isLeft(moved)) return moved;
      return E.right({
        result: {
          kind: 'blocked',
          reason: safety.right.reason,
          suggestedQuery: safety.right.suggestedQuery,
        },
      });
    }

    moved = run.advance('VERIFIED');
    if (E.isLeft(moved)) return moved;
    moved = run.advance('EXECUTING');
    if (E.isLeft(moved)) return moved;
    const raw = await execute(query)();
    if (E.isLeft(raw)) return raw;

    moved = run.advance('SANITIZING');
    if (E.isLeft(moved)) return moved;
    if (!profile.sanitization) return E.right(answered(redactOutput(raw.right), raw.right));
    const verdict = await sanitize(raw.right)();
    return E.isLeft(verdict) ? verdict : E.right(answered(verdict.right, raw.right));
  };

  const drive = async (
    run: PipelineRun,
    request: string
  ): Promise<E.Either<DomainError, Settled>> => {
    const validated = validateRequest(request);
    if (E.isLeft(validated)) {
      const moved = run.advance('DENIED');
      return E.isLeft(moved)
        ? moved
        : E.right(denied({ reason: validated.left.message, sensitiveFields: [] }));
    }

    let moved = run.advance('AUTHORIZING');
    if (E.isLeft(moved)) return moved;
    const authorized = await authorize(validated.right);
    if (E.isLeft(authorized)) return authorized;
    const { auth, safety } = authorized.right;
    if (!auth.authorized) {
      moved = run.advance('DENIED');
      return E.isLeft(moved) ? moved : E.right(denied(auth));
    }

    moved = run.advance('AUTHORIZED');
    if (E.isLeft(moved)) return moved;
    const settled =
      auth.candidateQuery === null
        ? await answerWithoutQuery(run, validated.right, auth)
        : await answerWithQuery(run, auth.candidateQuery, safety);
    if (E.isLeft(settled) || settled.right.response === undefined) return settled;

    moved = run.advance('RESPONDED');
    return E.isLeft(moved) ? moved : settled;
  };

  const audit = (
    requestId: string,
    request: string,
    run: PipelineRun,
    settled: E.Either<DomainError, Settled>
  ): void => {
    try {
      appendAuditFile({
        request_id: requestId,
        principal_id: principal.id,
        op: 'request',
        final_state: run.state,
        ok: run.state === 'RESPONDED',
        trace: [...run.trace],
        payload_digest: computeDigest(request),
        ...(E.isRight(settled) && settled.right.response !== undefined
          ? { response_digest: computeDigest(settled.right.response) }
          : {}),
        ...(E.isLeft(settled) ? { error_code: settled.left.code } : {}),
      });
    } catch (err) {
      console.error(`[pipeline] Failed to write audit record: ${sanitizeErrorMessage(err)}`);
    }
  };

  return {
    profile,

    async handle(request: string): Promise<PipelineOutcome> {
      const requestId = `req_${crypto.randomUUID().slice(0, 8)}`;
      const run = new PipelineRun();
      const settled = await drive(run, request);

      let result: PipelineResult;
      if (E.isLeft(settled)) {
        run.fail();
        console.error(
          `[pipeline] ${requestId} ${settled.left.code}: ${sanitizeErrorMessage(settled.left.message)}`
        );
        result = {
          kind: 'errored',
          code: settled.left.code,
          message: settled.left.message,
          retryable: true,
        };
      } else {
        result = settled.right.result;
        if (settled.right.response !== undefined) {
          session.append(request.trim(), settled.right.response);
        }
      }

      audit(requestId, request, run, settled);
      return { requestId, result, trace: run.trace };
    },
  };
}
