import * as E from 'fp-ts/Either';
import type * as TE from 'fp-ts/TaskEither';

/**
 * TaskEither に期限を付ける
 * 期限切れの時点で onTimeout() の Left を返す（元の処理の完了は待たない）
 */
export const withDeadline =
  <L>(timeoutMs: number, onTimeout: () => L) =>
  <A>(task: TE.TaskEither<L, A>): TE.TaskEither<L, A> =>
  async () => {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<E.Either<L, A>>((resolve) => {
      timer = setTimeout(() => resolve(E.left(onTimeout())), timeoutMs);
    });
    try {
      return await Promise.race([task(), deadline]);
    } finally {
      clearTimeout(timer);
    }
  };
