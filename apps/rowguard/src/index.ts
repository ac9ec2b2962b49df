#!/usr/bin/env node
/**
 * rowguard CLI エントリーポイント
 */
import * as E from 'fp-ts/Either';
import { createRemoteOracle } from '@rowguard/oracle';
import { loadEnv } from './config/env.js';
import { closeDb, initDb, initSchema } from './db/connection.js';
import { sanitizeErrorMessage } from './audit/filter.js';
import { setAuditLogPath } from './store/logs.js';
import { getPrincipal, getPrincipalById } from './store/principals.js';
import { insertRecords, loadRecordsFile } from './store/records.js';
import { SessionState } from './state/sessionState.js';
import { createOrchestrator } from './pipeline/orchestrator.js';
import { USAGE, parseCliArgs } from './cli/args.js';
import { runRepl } from './cli/repl.js';

const APP_NAME = 'rowguard';

async function seed(file: string): Promise<number> {
  const records = await loadRecordsFile(file)();
  if (E.isLeft(records)) {
    console.error(`[${APP_NAME}] ${records.left.message}`);
    return 1;
  }
  const inserted = await insertRecords(records.right)();
  if (E.isLeft(inserted)) {
    const detail = sanitizeErrorMessage(inserted.left.cause ?? inserted.left.message);
    console.error(`[${APP_NAME}] Seeding failed: ${detail}`);
    return 1;
  }
  console.error(`[${APP_NAME}] Inserted ${inserted.right} records`);
  return 0;
}

async function chat(userId: number | undefined): Promise<number> {
  const env = loadEnv();
  const principal =
    userId === undefined ? await getPrincipal()() : await getPrincipalById(userId)();
  if (E.isLeft(principal)) {
    console.error(`Error: ${principal.left.message}`);
    return 1;
  }
  if (principal.right === undefined) {
    console.error(
      'Error: Could not get a user from the database. Please ensure the database is populated.'
    );
    return 1;
  }

  const oracle = createRemoteOracle({
    endpoint: env.ROWGUARD_ORACLE_ENDPOINT,
    apiKey: env.ROWGUARD_ORACLE_API_KEY ?? '',
    model: env.ROWGUARD_ORACLE_MODEL,
    timeoutMs: env.ROWGUARD_ORACLE_TIMEOUT_MS,
  });
  const orchestrator = createOrchestrator({
    oracle,
    principal: principal.right,
    session: new SessionState(principal.right.id),
    profile: {
      safety: env.ROWGUARD_SAFETY_MODE,
      sanitization: env.ROWGUARD_OUTPUT_SANITIZATION,
      fallback: env.ROWGUARD_FALLBACK,
    },
    mechanicalRedaction: env.ROWGUARD_MECHANICAL_REDACTION,
    storeTimeoutMs: env.ROWGUARD_STORE_TIMEOUT_MS,
  });
  const { safety, sanitization } = orchestrator.profile;
  console.error(`[${APP_NAME}] oracle: ${oracle.model}, safety: ${safety}, sanitization: ${sanitization}`);

  await runRepl(orchestrator, principal.right);
  return 0;
}

export async function main(argv: readonly string[]): Promise<number> {
  const command = parseCliArgs(argv);
  if (E.isLeft(command)) {
    console.error(`[${APP_NAME}] ${command.left.message}`);
    console.error(USAGE);
    return 2;
  }

  const env = loadEnv();
  setAuditLogPath(env.AUDIT_LOG_PATH);
  await initDb(command.right.db ?? env.ROWGUARD_DB);
  await initSchema();

  try {
    return command.right.kind === 'seed'
      ? await seed(command.right.file)
      : await chat(command.right.userId);
  } finally {
    await closeDb();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`[${APP_NAME}] Fatal error:`, sanitizeErrorMessage(err));
    process.exit(1);
  });
