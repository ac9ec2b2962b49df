/**
 * Record store への書き込み（シード投入）
 * 偽データ生成は扱わず、JSONファイルから読み込んだレコードを挿入する
 */
import { readFile } from 'fs/promises';
import * as E from 'fp-ts/Either';
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import { z } from 'zod';
import { getConnection } from '../db/connection.js';
import type { DomainError } from '../domain/errors.js';
import { seedInvalidError, storeError } from '../domain/errors.js';
import type { UserRecord } from '../domain/types.js';

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

/** シードファイルの1レコード（snake_case） */
const SeedRecordSchema = z
  .object({
    first_name: z.string().min(1),
    last_name: z.string().min(1),
    email: z.string().email(),
    phone_number: optionalText,
    date_of_birth: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, 'date_of_birth must be YYYY-MM-DD')
      .nullish()
      .transform((v) => v ?? null),
    address: optionalText,
    ssn: optionalText,
  })
  .transform(
    (r): UserRecord => ({
      firstName: r.first_name,
      lastName: r.last_name,
      email: r.email,
      phoneNumber: r.phone_number,
      dateOfBirth: r.date_of_birth,
      address: r.address,
      ssn: r.ssn,
    })
  );

const SeedFileSchema = z.array(SeedRecordSchema);

/**
 * JSON値をレコード列として検証
 */
export const parseRecords = (json: unknown): E.Either<DomainError, UserRecord[]> => {
  const result = SeedFileSchema.safeParse(json);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    return E.left(seedInvalidError(`invalid seed records: ${errors}`, result.error));
  }
  return E.right(result.data);
};

/**
 * シードファイル（JSON配列）を読み込む
 */
export const loadRecordsFile = (path: string): TE.TaskEither<DomainError, UserRecord[]> =>
  pipe(
    TE.tryCatch(
      async (): Promise<unknown> => JSON.parse(await readFile(path, 'utf-8')),
      (e) => seedInvalidError(`cannot read seed file: ${path}`, e)
    ),
    TE.chainEitherK(parseRecords)
  );

/**
 * レコードをパラメータ化INSERTで挿入（全件成功か全件ロールバック）
 * @returns 挿入件数
 */
export const insertRecords = (records: readonly UserRecord[]): TE.TaskEither<DomainError, number> =>
  TE.tryCatch(async () => {
    const conn = await getConnection();
    await conn.run('BEGIN TRANSACTION');
    try {
      for (const r of records) {
        await conn.run(
          `INSERT INTO users (first_name, last_name, email, phone_number, date_of_birth, address, ssn)
           VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [r.firstName, r.lastName, r.email, r.phoneNumber, r.dateOfBirth, r.address, r.ssn]
        );
      }
      await conn.run('COMMIT');
    } catch (e) {
      await conn.run('ROLLBACK');
      throw e;
    }
    return records.length;
  }, storeError);

/**
 * 登録件数
 */
export const countRecords = (): TE.TaskEither<DomainError, number> =>
  TE.tryCatch(async () => {
    const conn = await getConnection();
    const reader = await conn.runAndReadAll('SELECT COUNT(*) AS cnt FROM users');
    const rows = reader.getRows();
    return Number(rows[0]?.[0] ?? 0);
  }, storeError);
