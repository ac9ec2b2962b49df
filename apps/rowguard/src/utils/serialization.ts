/**
 * シリアライゼーションユーティリティ
 * DuckDBの値を表示用テキストに変換
 *
 * 背景:
 * DuckDB Node API (@duckdb/node-api) はTIMESTAMP列を {micros: bigint} オブジェクトで返す。
 * BIGINT列（COUNT(*) など）は bigint で返るため、タイムスタンプとは区別する。
 */

/**
 * DuckDBタイムスタンプ値の型
 */
interface DuckDBTimestamp {
  micros: bigint;
}

function isDuckDBTimestamp(value: unknown): value is DuckDBTimestamp {
  return (
    typeof value === 'object' &&
    value !== null &&
    'micros' in value &&
    typeof value.micros === 'bigint'
  );
}

/**
 * DuckDBタイムスタンプ/DateをISO 8601文字列に変換
 * それ以外はそのまま返す
 */
export function normalizeTimestamp(value: unknown): unknown {
  if (isDuckDBTimestamp(value)) {
    return new Date(Number(value.micros / 1000n)).toISOString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

/**
 * 1セルをテキスト化する
 * NULL は null を返し、表示上の置換（"N/A" など）は呼び出し側が決める
 */
export function formatCell(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const normalized = normalizeTimestamp(value);
  if (typeof normalized === 'string') return normalized;
  // number / bigint / boolean と DuckDB の値クラス（toString 実装済み）
  return String(normalized);
}
