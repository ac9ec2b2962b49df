/**
 * パイプライン状態機械
 *
 * 状態遷移図:
 * RECEIVED → AUTHORIZING → (DENIED | AUTHORIZED)
 * AUTHORIZED → VERIFYING_SAFETY → (BLOCKED | VERIFIED) → EXECUTING → SANITIZING → RESPONDED
 * AUTHORIZED → SANITIZING（候補クエリなし: 回答エージェント）
 * 非終端状態 → ERRORED
 */
import * as E from 'fp-ts/Either';
import type { DomainError } from '../domain/errors.js';
import { stateError } from '../domain/errors.js';

export type PipelineState =
  | 'RECEIVED'
  | 'AUTHORIZING'
  | 'DENIED'
  | 'AUTHORIZED'
  | 'VERIFYING_SAFETY'
  | 'BLOCKED'
  | 'VERIFIED'
  | 'EXECUTING'
  | 'SANITIZING'
  | 'RESPONDED'
  | 'ERRORED';

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  // 入力検証で拒否する場合は AUTHORIZING を経ずに DENIED
  RECEIVED: ['AUTHORIZING', 'DENIED', 'ERRORED'],
  AUTHORIZING: ['DENIED', 'AUTHORIZED', 'ERRORED'],
  // 回答エージェント無効時は DENIED
  AUTHORIZED: ['VERIFYING_SAFETY', 'SANITIZING', 'DENIED', 'ERRORED'],
  VERIFYING_SAFETY: ['BLOCKED', 'VERIFIED', 'ERRORED'],
  VERIFIED: ['EXECUTING', 'ERRORED'],
  EXECUTING: ['SANITIZING', 'ERRORED'],
  SANITIZING: ['RESPONDED', 'ERRORED'],
  DENIED: [],
  BLOCKED: [],
  RESPONDED: [],
  ERRORED: [],
};

export const canTransition = (from: PipelineState, to: PipelineState): boolean =>
  TRANSITIONS[from].includes(to);

export const isTerminal = (state: PipelineState): boolean => TRANSITIONS[state].length === 0;

/**
 * 1リクエスト分の状態と遷移履歴
 */
export class PipelineRun {
  private current: PipelineState = 'RECEIVED';
  private readonly visited: PipelineState[] = ['RECEIVED'];

  get state(): PipelineState {
    return this.current;
  }

  get trace(): readonly PipelineState[] {
    return [...this.visited];
  }

  advance(to: PipelineState): E.Either<DomainError, PipelineState> {
    if (!canTransition(this.current, to)) {
      return E.left(stateError(this.current, to));
    }
    this.current = to;
    this.visited.push(to);
    return E.right(to);
  }

  /**
   * ERRORED に遷移（終端状態からは何もしない）
   */
  fail(): void {
    if (!isTerminal(this.current)) {
      this.current = 'ERRORED';
      this.visited.push('ERRORED');
    }
  }
}
