/**
 * Execution Boundary
 * 検証済みクエリをリクエスト単位のコネクションで実行し、結果をテキスト化する
 */
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import { withConnection } from '../db/connection.js';
import type { DomainError } from '../domain/errors.js';
import { domainError, storeTimeoutError } from '../domain/errors.js';
import { sanitizeErrorMessage } from '../audit/filter.js';
import { withDeadline } from '../utils/deadline.js';
import { formatCell } from '../utils/serialization.js';

export const NO_RESULTS = 'No results found.';
export const NO_DATA = 'No data available';
export const NULL_CELL = 'N/A';

export const DEFAULT_EXECUTION_TIMEOUT_MS = 10_000;

/**
 * 結果行をテキスト化
 *
 * - 0行: NO_RESULTS
 * - 1列1行: 値そのもの（NULL は NO_DATA）
 * - 1列複数行: 改行区切り
 * - 複数列: 列を " | "、行を改行で連結
 */
export function formatRows(
  columns: readonly string[],
  rows: readonly (readonly unknown[])[]
): string {
  if (rows.length === 0) return NO_RESULTS;
  if (columns.length === 1) {
    if (rows.length === 1) {
      return formatCell(rows[0]?.[0]) ?? NO_DATA;
    }
    return rows.map((row) => formatCell(row[0]) ?? NULL_CELL).join('\n');
  }
  return rows.map((row) => row.map((cell) => formatCell(cell) ?? NULL_CELL).join(' | ')).join('\n');
}

/**
 * クエリを実行して表示用テキストを返す
 * 失敗は STORE_FAILED、期限切れは STORE_TIMEOUT
 */
export const executeQuery = (
  query: string,
  timeoutMs: number = DEFAULT_EXECUTION_TIMEOUT_MS
): TE.TaskEither<DomainError, string> =>
  pipe(
    TE.tryCatch(
      () =>
        withConnection(async (conn) => {
          const reader = await conn.runAndReadAll(query);
          return formatRows(reader.columnNames(), reader.getRows());
        }),
      (e): DomainError => domainError('STORE_FAILED', sanitizeErrorMessage(e), e)
    ),
    withDeadline(timeoutMs, () => storeTimeoutError(timeoutMs))
  );
