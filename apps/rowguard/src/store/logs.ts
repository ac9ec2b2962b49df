import { appendFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";

/**
 * 監査ログファイルのレコード（JSONL形式）
 * リクエスト/応答本文は保存せず、ダイジェストのみ
 */
export interface AuditFileRecord {
  ts: string; // ISO 8601 timestamp
  request_id: string;
  principal_id: number;
  op: string;
  final_state: string;
  ok: boolean;
  trace: string[];
  payload_digest: string;
  response_digest?: string;
  error_code?: string;
}

// 監査ログファイルパス（環境変数から取得）
let auditLogPath: string | null = null;

/**
 * 監査ログファイルパスを設定（undefined で無効化）
 */
export function setAuditLogPath(path: string | undefined): void {
  auditLogPath = path ?? null;
}

/**
 * 監査ログファイルへの追記（append-only JSONL形式）
 * AUDIT_LOG_PATH が設定されている場合のみ出力
 */
export function appendAuditFile(record: Omit<AuditFileRecord, "ts">): void {
  if (!auditLogPath) return;

  const dir = dirname(auditLogPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const fullRecord: AuditFileRecord = {
    ts: new Date().toISOString(),
    ...record,
  };

  appendFileSync(auditLogPath, JSON.stringify(fullRecord) + "\n", { encoding: "utf-8" });
}
