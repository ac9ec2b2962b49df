/**
 * Principal lookup
 * セッション開始時に1度だけ呼ばれ、現在のユーザーを決める
 */
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import { z } from 'zod';
import { getConnection } from '../db/connection.js';
import type { DomainError } from '../domain/errors.js';
import { principalNotFoundError, storeError } from '../domain/errors.js';
import type { Principal } from '../domain/types.js';

const PrincipalRowSchema = z.object({
  id: z.number().int(),
  email: z.string(),
  first_name: z.string(),
  last_name: z.string(),
});
type PrincipalRow = z.infer<typeof PrincipalRowSchema>;

const toPrincipal = (row: PrincipalRow): Principal => ({
  id: row.id,
  identity: row.email,
  firstName: row.first_name,
  lastName: row.last_name,
  displayName: `${row.first_name} ${row.last_name}`,
  capability: 'basic',
});

const selectOne = (
  sql: string,
  params: number[] = []
): TE.TaskEither<DomainError, Principal | undefined> =>
  TE.tryCatch(async () => {
    const conn = await getConnection();
    const reader = await conn.runAndReadAll(sql, params);
    const row = reader.getRowObjects()[0];
    return row === undefined ? undefined : toPrincipal(PrincipalRowSchema.parse(row));
  }, storeError);

/**
 * ランダムに1人選ぶ（ストアが空なら undefined）
 */
export const getPrincipal = (): TE.TaskEither<DomainError, Principal | undefined> =>
  selectOne('SELECT id, email, first_name, last_name FROM users ORDER BY RANDOM() LIMIT 1');

/**
 * IDを指定して取得（決定的なセッション用）
 */
export const getPrincipalById = (id: number): TE.TaskEither<DomainError, Principal> =>
  pipe(
    selectOne('SELECT id, email, first_name, last_name FROM users WHERE id = $1', [id]),
    TE.chain((principal) =>
      principal === undefined ? TE.left(principalNotFoundError(id)) : TE.right(principal)
    )
  );
