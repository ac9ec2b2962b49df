/**
 * 回答エージェント
 * クエリを伴わない要求に自由文で答える。出力は必ずサニタイズを通す。
 */
import type * as TE from 'fp-ts/TaskEither';
import type { DomainError } from '../domain/errors.js';
import type { Exchange } from '../state/sessionState.js';
import { fallbackInstruction } from './instructions.js';
import type { StageDeps } from './verdict.js';
import { askOracle } from './verdict.js';

/** これまでのやり取りを読み取り専用のテキストにする */
export const renderTranscript = (history: readonly Exchange[]): string =>
  history.map((e) => `User: ${e.request}\nAssistant: ${e.response}`).join('\n');

export const answerOpenEnded =
  (deps: StageDeps) =>
  (request: string, history: readonly Exchange[]): TE.TaskEither<DomainError, string> => {
    const transcript = renderTranscript(history);
    const message =
      transcript === ''
        ? request
        : `Conversation so far:\n${transcript}\n\nCurrent question: ${request}`;
    return askOracle(deps.oracle, fallbackInstruction(deps.principal), message);
  };
