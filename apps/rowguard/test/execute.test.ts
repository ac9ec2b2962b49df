import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as E from 'fp-ts/Either';
import * as TE from 'fp-ts/TaskEither';
import { closeDb, initDb, initSchema, resetDbAsync } from '../src/db/connection.js';
import { insertRecords, loadRecordsFile } from '../src/store/records.js';
import { executeQuery, formatRows, NO_DATA, NO_RESULTS } from '../src/store/execute.js';
import { withDeadline } from '../src/utils/deadline.js';
import { formatCell } from '../src/utils/serialization.js';
import { SEED_FILE } from './helpers.js';

beforeAll(async () => {
  await resetDbAsync();
  await initDb(':memory:');
  await initSchema();
  const records = await loadRecordsFile(SEED_FILE)();
  if (E.isLeft(records)) throw new Error(records.left.message);
  await insertRecords(records.right)();
});

afterAll(async () => {
  await closeDb();
});

describe('formatRows', () => {
  it('行数と列数で整形を切り替える', () => {
    expect(formatRows(['a'], [])).toBe(NO_RESULTS);
    expect(formatRows(['a'], [['x']])).toBe('x');
    expect(formatRows(['a'], [[null]])).toBe(NO_DATA);
    expect(formatRows(['a'], [['x'], [null], ['z']])).toBe('x\nN/A\nz');
    expect(formatRows(['a', 'b'], [['x', null], ['y', 2]])).toBe('x | N/A\ny | 2');
  });
});

describe('formatCell', () => {
  it('タイムスタンプは ISO 8601、bigint は整数表記', () => {
    expect(formatCell({ micros: 0n })).toBe('1970-01-01T00:00:00.000Z');
    expect(formatCell(42n)).toBe('42');
    expect(formatCell(undefined)).toBeNull();
  });
});

describe('executeQuery', () => {
  it('1列1行は値そのもの', async () => {
    expect(await executeQuery('SELECT address FROM users WHERE id = 1')()).toEqual(
      E.right('12 Birch Lane\nAnytown, CA 90210')
    );
  });

  it('複数列は " | " 区切り', async () => {
    expect(await executeQuery('SELECT first_name, last_name FROM users WHERE id = 1')()).toEqual(
      E.right('Ada | Quill')
    );
    expect(await executeQuery('SELECT first_name, phone_number FROM users WHERE id = 3')()).toEqual(
      E.right('Chen | N/A')
    );
  });

  it('NULL・0行・複数行', async () => {
    expect(await executeQuery('SELECT phone_number FROM users WHERE id = 3')()).toEqual(
      E.right(NO_DATA)
    );
    expect(await executeQuery('SELECT email FROM users WHERE id = 42')()).toEqual(
      E.right(NO_RESULTS)
    );
    expect(await executeQuery('SELECT first_name FROM users ORDER BY id')()).toEqual(
      E.right('Ada\nBen\nChen')
    );
    expect(await executeQuery('SELECT COUNT(*) FROM users')()).toEqual(E.right('3'));
  });

  it('SQLエラーは STORE_FAILED', async () => {
    const result = await executeQuery('SELECT no_such_column FROM users WHERE id = 1')();
    expect(E.isLeft(result) && result.left.code).toBe('STORE_FAILED');
  });
});

describe('withDeadline', () => {
  it('期限内に終われば結果をそのまま返す', async () => {
    const task = withDeadline(1000, () => 'late')(TE.right<string, number>(5));
    expect(await task()).toEqual(E.right(5));
  });

  it('期限切れは onTimeout の Left', async () => {
    const never: TE.TaskEither<string, number> = () => new Promise(() => undefined);
    expect(await withDeadline(10, () => 'late')(never)()).toEqual(E.left('late'));
  });
});
