import { DuckDBInstance, DuckDBConnection } from '@duckdb/node-api';
import { SCHEMA_SQL } from './schema.js';

let instance: DuckDBInstance | null = null;
let cachedConnection: DuckDBConnection | null = null;
let instancePath: string | null = null;

const DEFAULT_DB_PATH = 'users.db';

/**
 * DuckDB インスタンスを初期化
 * パス未指定時は ROWGUARD_DB（既定: users.db）
 */
export async function initDb(path?: string): Promise<DuckDBInstance> {
  if (instance) return instance;
  const dbPath = path ?? process.env['ROWGUARD_DB'] ?? DEFAULT_DB_PATH;
  instance = await DuckDBInstance.create(dbPath);
  instancePath = dbPath;
  return instance;
}

/**
 * 初期化済みの DuckDB インスタンスを取得
 * initDb() が先に呼ばれている必要がある
 */
export function getDb(): DuckDBInstance {
  if (!instance) {
    throw new Error('Database not initialized. Call initDb() first.');
  }
  return instance;
}

/**
 * 管理用コネクションを取得（スキーマ初期化・シード投入・principal参照）
 * 単一コネクションを再利用し、無効なら再作成
 */
export async function getConnection(): Promise<DuckDBConnection> {
  if (cachedConnection) {
    try {
      await cachedConnection.runAndReadAll('SELECT 1');
      return cachedConnection;
    } catch (err) {
      console.error(`[DB] Reconnecting after stale connection: ${String(err)}`);
      closeQuietly(cachedConnection);
      cachedConnection = null;
    }
  }
  cachedConnection = await getDb().connect();
  return cachedConnection;
}

/**
 * リクエスト単位のコネクションで処理を実行
 * open → run → close（失敗時もクローズする）
 */
export async function withConnection<T>(fn: (conn: DuckDBConnection) => Promise<T>): Promise<T> {
  const conn = await getDb().connect();
  try {
    return await fn(conn);
  } finally {
    closeQuietly(conn);
  }
}

function closeQuietly(conn: DuckDBConnection): void {
  try {
    conn.closeSync();
  } catch (err) {
    console.error(`[DB] Failed to close connection: ${String(err)}`);
  }
}

/**
 * スキーマを初期化（冪等）
 */
export async function initSchema(): Promise<void> {
  const conn = await getConnection();
  const statements = SCHEMA_SQL.split(';')
    .map((s) => s.trim())
    .filter(Boolean);
  for (const stmt of statements) {
    await conn.run(stmt);
  }
}

/**
 * テスト用: DB をリセット
 * コネクションをクローズしてからインスタンス参照を解放
 */
export async function resetDbAsync(): Promise<void> {
  if (cachedConnection) {
    closeQuietly(cachedConnection);
  }
  cachedConnection = null;
  instance = null;
  instancePath = null;
}

/**
 * DB接続を明示的にクローズ（CLI終了時）
 *
 * @remarks
 * - ファイルDBでは CHECKPOINT で WAL をフラッシュしてからクローズ
 * - DuckDBInstance は close を持たないため参照解放で GC に委ねる
 * - 複数回呼び出しても安全
 */
export async function closeDb(): Promise<void> {
  if (cachedConnection) {
    if (instancePath !== ':memory:') {
      try {
        await cachedConnection.run('CHECKPOINT');
      } catch (err) {
        console.error(`[DB] Checkpoint failed (data may not be fully persisted): ${String(err)}`);
      }
    }
    closeQuietly(cachedConnection);
    cachedConnection = null;
  }
  instance = null;
  instancePath = null;
}
