import { describe, it, expect, beforeAll, beforeEach, afterAll, afterEach, vi } from 'vitest';
import * as E from 'fp-ts/Either';
import * as TE from 'fp-ts/TaskEither';
import { createScriptedOracle, oracleTimeoutError } from '@rowguard/oracle';
import type { ScriptStep, TextOracle } from '@rowguard/oracle';
import { closeDb, initDb, initSchema, resetDbAsync } from '../src/db/connection.js';
import { domainError } from '../src/domain/errors.js';
import type { StageProfile } from '../src/domain/types.js';
import { insertRecords, loadRecordsFile } from '../src/store/records.js';
import { SessionState } from '../src/state/sessionState.js';
import { createOrchestrator } from '../src/pipeline/orchestrator.js';
import type { QueryExecutor } from '../src/pipeline/orchestrator.js';
import { SEED_FILE, ada } from './helpers.js';

const authorized = (query: string | null, fields = '[]'): string =>
  [
    'authorized: true',
    'reason: The user is asking for their own data',
    `sensitive_fields: ${fields}`,
    `sql_query: ${query ?? 'null'}`,
  ].join('\n');

const SAFE = 'safe: true\nreason: Single SELECT restricted to the current user\nsuggested_query: null';
const NOTHING_SENSITIVE =
  'safe: true\nreason: Nothing sensitive\nsanitized_response: null\noriginal_response: null';

const setup = (
  script: readonly ScriptStep[],
  options: { profile?: StageProfile; execute?: QueryExecutor } = {}
) => {
  const oracle = createScriptedOracle(script);
  const session = new SessionState(ada.id);
  const impl: QueryExecutor = options.execute ?? (() => TE.right('Ada'));
  const execute = vi.fn(impl);
  const orchestrator = createOrchestrator({
    oracle,
    principal: ada,
    session,
    profile: options.profile,
    execute,
  });
  return { oracle, session, execute, orchestrator };
};

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Scenario A: 本人の住所', () => {
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

  it('実行結果を市・州だけに縮約して応答する', async () => {
    const oracle = createScriptedOracle([
      authorized('SELECT address FROM users WHERE id = 1', '[address]'),
      SAFE,
      [
        'safe: false',
        'reason: Full address reduced to city and state',
        'sanitized_response: You live in Anytown, CA',
        'original_response: 12 Birch Lane',
      ].join('\n'),
    ]);
    const session = new SessionState(ada.id);
    const orchestrator = createOrchestrator({ oracle, principal: ada, session });

    const outcome = await orchestrator.handle("What's my address?");

    expect(outcome.result).toEqual({
      kind: 'answered',
      response: 'You live in Anytown, CA',
      sanitized: true,
      reason: 'Full address reduced to city and state',
    });
    expect(outcome.trace).toEqual([
      'RECEIVED',
      'AUTHORIZING',
      'AUTHORIZED',
      'VERIFYING_SAFETY',
      'VERIFIED',
      'EXECUTING',
      'SANITIZING',
      'RESPONDED',
    ]);
    expect(oracle.calls[2]?.userMessage).toBe(
      'Response to verify: 12 Birch Lane\nAnytown, CA 90210'
    );
    expect(session.history()).toEqual([
      { request: "What's my address?", response: 'You live in Anytown, CA' },
    ]);
  });
});

describe('Scenario B: 他人のデータ', () => {
  it('DENIED で終わり、クエリは実行されない', async () => {
    const { oracle, session, execute, orchestrator } = setup([
      [
        'authorized: false',
        "reason: The request asks for another user's data",
        'sensitive_fields: [phone_number]',
        'sql_query: null',
      ].join('\n'),
    ]);

    const outcome = await orchestrator.handle("What's Alice's phone number?");

    expect(outcome.result).toEqual({
      kind: 'denied',
      reason: "The request asks for another user's data",
      sensitiveFields: ['phone_number'],
    });
    expect(outcome.trace).toEqual(['RECEIVED', 'AUTHORIZING', 'DENIED']);
    expect(oracle.calls).toHaveLength(1);
    expect(execute).not.toHaveBeenCalled();
    expect(session.size).toBe(0);
  });
});

describe('Scenario C: 恒真条件を含むクエリ', () => {
  it('BLOCKED で終わり、提案クエリを示す', async () => {
    const { execute, orchestrator } = setup([
      authorized('SELECT * FROM users WHERE id = 1 OR 1=1'),
      [
        'safe: false',
        'reason: The OR condition makes the filter always true',
        'suggested_query: SELECT * FROM users WHERE id = 1',
      ].join('\n'),
    ]);

    const outcome = await orchestrator.handle('Show me my data or everything');

    expect(outcome.result).toEqual({
      kind: 'blocked',
      reason: 'Query contains an OR condition',
      suggestedQuery: 'SELECT * FROM users WHERE id = 1',
    });
    expect(outcome.trace).toEqual([
      'RECEIVED',
      'AUTHORIZING',
      'AUTHORIZED',
      'VERIFYING_SAFETY',
      'BLOCKED',
    ]);
    expect(execute).not.toHaveBeenCalled();
  });
});

describe('Scenario D: 空の応答', () => {
  it('認可の応答が空なら拒否する', async () => {
    const { execute, orchestrator } = setup(['']);

    const outcome = await orchestrator.handle('What is my email?');

    expect(outcome.result).toEqual({
      kind: 'denied',
      reason: 'Invalid response format',
      sensitiveFields: [],
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('安全性の応答が空ならブロックする', async () => {
    const { execute, orchestrator } = setup([
      authorized('SELECT email FROM users WHERE id = 1'),
      '',
    ]);

    const outcome = await orchestrator.handle('What is my email?');

    expect(outcome.result).toEqual({
      kind: 'blocked',
      reason: 'Invalid response format',
      suggestedQuery: null,
    });
    expect(execute).not.toHaveBeenCalled();
  });
});

describe('協調先の失敗', () => {
  it('オラクルのタイムアウトは ERRORED、セッションは変わらない', async () => {
    const { session, orchestrator } = setup([oracleTimeoutError(50)]);

    const outcome = await orchestrator.handle('What is my email?');

    expect(outcome.result).toEqual({
      kind: 'errored',
      code: 'ORACLE_TIMEOUT',
      message: 'Request timed out after 50ms',
      retryable: true,
    });
    expect(outcome.trace).toEqual(['RECEIVED', 'AUTHORIZING', 'ERRORED']);
    expect(session.size).toBe(0);
  });

  it('実行境界の失敗はサニタイズに進まない', async () => {
    const { oracle, session, orchestrator } = setup(
      [authorized('SELECT email FROM users WHERE id = 1'), SAFE],
      { execute: () => TE.left(domainError('STORE_FAILED', 'database operation failed')) }
    );

    const outcome = await orchestrator.handle('What is my email?');

    expect(outcome.result.kind).toBe('errored');
    expect(outcome.trace.slice(-2)).toEqual(['EXECUTING', 'ERRORED']);
    expect(oracle.calls).toHaveLength(2);
    expect(session.size).toBe(0);
  });

  it('スクリプトが尽きたら ORACLE_FAILED', async () => {
    const { orchestrator } = setup([authorized('SELECT email FROM users WHERE id = 1')]);

    const outcome = await orchestrator.handle('What is my email?');

    expect(outcome.result).toEqual({
      kind: 'errored',
      code: 'ORACLE_FAILED',
      message: 'No scripted response left for call #2',
      retryable: true,
    });
  });
});

describe('協調先の例外', () => {
  it('オラクルが例外を投げても ERRORED で終わる', async () => {
    const oracle: TextOracle = {
      model: 'test-model',
      status: 'available',
      complete: () => {
        throw new Error('socket closed');
      },
    };
    const session = new SessionState(ada.id);
    const orchestrator = createOrchestrator({ oracle, principal: ada, session });

    const outcome = await orchestrator.handle('What is my email?');

    expect(outcome.result).toEqual({
      kind: 'errored',
      code: 'ORACLE_FAILED',
      message: 'socket closed',
      retryable: true,
    });
    expect(outcome.trace).toEqual(['RECEIVED', 'AUTHORIZING', 'ERRORED']);
    expect(session.size).toBe(0);
  });

  it('オラクルの Task が reject しても ERRORED で終わる', async () => {
    const oracle: TextOracle = {
      model: 'test-model',
      status: 'available',
      complete: () => () => Promise.reject(new Error('connection reset')),
    };
    const orchestrator = createOrchestrator({
      oracle,
      principal: ada,
      session: new SessionState(ada.id),
    });

    const outcome = await orchestrator.handle('What is my email?');

    expect(outcome.result).toEqual({
      kind: 'errored',
      code: 'ORACLE_FAILED',
      message: 'connection reset',
      retryable: true,
    });
  });

  it('実行境界の Task が reject しても ERRORED で終わる', async () => {
    const { session, orchestrator } = setup(
      [authorized('SELECT email FROM users WHERE id = 1'), SAFE],
      { execute: () => () => Promise.reject(new Error('driver crash')) }
    );

    const outcome = await orchestrator.handle('What is my email?');

    expect(outcome.result).toEqual({
      kind: 'errored',
      code: 'STORE_FAILED',
      message: 'driver crash',
      retryable: true,
    });
    expect(outcome.trace.slice(-2)).toEqual(['EXECUTING', 'ERRORED']);
    expect(session.size).toBe(0);
  });
});

describe('入力検証', () => {
  it('空の要求はオラクルを呼ばずに拒否する', async () => {
    const { oracle, orchestrator } = setup([]);

    const outcome = await orchestrator.handle('   ');

    expect(outcome.result).toEqual({
      kind: 'denied',
      reason: 'request cannot be empty',
      sensitiveFields: [],
    });
    expect(outcome.trace).toEqual(['RECEIVED', 'DENIED']);
    expect(oracle.calls).toHaveLength(0);
  });

  it('長すぎる要求は拒否する', async () => {
    const { orchestrator } = setup([]);

    const outcome = await orchestrator.handle('x'.repeat(2001));

    expect(outcome.result).toEqual({
      kind: 'denied',
      reason: 'request exceeds maximum length of 2000',
      sensitiveFields: [],
    });
  });
});

describe('ステージ構成', () => {
  it('combined: 1回の判定でもスコープゲートは外れない', async () => {
    const { oracle, execute, orchestrator } = setup(
      [
        [
          'authorized: true',
          'reason: Own data',
          'sensitive_fields: []',
          'sql_query: SELECT first_name FROM users WHERE id = 2',
          'safe: true',
          'sql_reason: Looks fine',
          'suggested_query: null',
        ].join('\n'),
      ],
      { profile: { safety: 'combined', sanitization: true, fallback: true } }
    );

    const outcome = await orchestrator.handle('What is my first name?');

    expect(outcome.result).toEqual({
      kind: 'blocked',
      reason: 'Query is not restricted to id = 1',
      suggestedQuery: null,
    });
    expect(oracle.calls).toHaveLength(1);
    expect(execute).not.toHaveBeenCalled();
  });

  it('off: WHERE のないクエリはブロックする', async () => {
    const { execute, orchestrator } = setup([authorized('SELECT first_name FROM users')], {
      profile: { safety: 'off', sanitization: false, fallback: false },
    });

    const outcome = await orchestrator.handle('What is my first name?');

    expect(outcome.result).toEqual({
      kind: 'blocked',
      reason: 'Query has no WHERE restriction',
      suggestedQuery: null,
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('off + 出力レビュー無効: SANITIZING を経て機械的縮約だけを行う', async () => {
    const { oracle, orchestrator } = setup(
      [authorized('SELECT first_name FROM users WHERE id = 1')],
      { profile: { safety: 'off', sanitization: false, fallback: false } }
    );

    const outcome = await orchestrator.handle('What is my first name?');

    expect(outcome.result).toEqual({
      kind: 'answered',
      response: 'Ada',
      sanitized: false,
      reason: 'Output review disabled',
    });
    expect(outcome.trace).toEqual([
      'RECEIVED',
      'AUTHORIZING',
      'AUTHORIZED',
      'VERIFYING_SAFETY',
      'VERIFIED',
      'EXECUTING',
      'SANITIZING',
      'RESPONDED',
    ]);
    expect(oracle.calls).toHaveLength(1);
  });

  it('出力レビュー無効でも SSN は縮約される', async () => {
    const { oracle, orchestrator } = setup(
      [authorized('SELECT ssn FROM users WHERE id = 1', '[ssn]'), SAFE],
      {
        profile: { safety: 'separate', sanitization: false, fallback: true },
        execute: () => TE.right('123-45-6789'),
      }
    );

    const outcome = await orchestrator.handle('What is my SSN?');

    expect(outcome.result).toEqual({
      kind: 'answered',
      response: 'REDACTED',
      sanitized: true,
      reason: 'Sensitive values redacted: ssn',
    });
    expect(outcome.trace.slice(-3)).toEqual(['EXECUTING', 'SANITIZING', 'RESPONDED']);
    expect(oracle.calls).toHaveLength(2);
  });

  it('off: 本人条件を真偽値で包んだクエリは実行しない', async () => {
    const { execute, orchestrator } = setup(
      [authorized('SELECT email FROM users WHERE id = 1 IS FALSE')],
      { profile: { safety: 'off', sanitization: true, fallback: true } }
    );

    const outcome = await orchestrator.handle('What is my email?');

    expect(outcome.result).toEqual({
      kind: 'blocked',
      reason: 'Query is not restricted to id = 1',
      suggestedQuery: null,
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('回答エージェント: 結果はサニタイズを通り、履歴が次の問い合わせに渡る', async () => {
    const { oracle, session, orchestrator } = setup([
      authorized(null),
      'Hello Ada, how can I help?',
      NOTHING_SENSITIVE,
      authorized(null),
      'You are welcome.',
      NOTHING_SENSITIVE,
    ]);

    const first = await orchestrator.handle('Hello');
    await orchestrator.handle('Thanks');

    expect(first.result).toEqual({
      kind: 'answered',
      response: 'Hello Ada, how can I help?',
      sanitized: false,
      reason: 'Nothing sensitive',
    });
    expect(first.trace).toEqual([
      'RECEIVED',
      'AUTHORIZING',
      'AUTHORIZED',
      'SANITIZING',
      'RESPONDED',
    ]);
    expect(oracle.calls[4]?.userMessage).toBe(
      'Conversation so far:\nUser: Hello\nAssistant: Hello Ada, how can I help?\n\nCurrent question: Thanks'
    );
    expect(session.size).toBe(2);
  });

  it('回答エージェント無効: クエリが作れなければ拒否する', async () => {
    const { orchestrator } = setup([authorized(null)], {
      profile: { safety: 'separate', sanitization: true, fallback: false },
    });

    const outcome = await orchestrator.handle('Tell me a joke');

    expect(outcome.result).toEqual({
      kind: 'denied',
      reason: 'No query could be derived',
      sensitiveFields: [],
    });
    expect(outcome.trace).toEqual(['RECEIVED', 'AUTHORIZING', 'AUTHORIZED', 'DENIED']);
  });

  it('オラクルが safe と判定しても機械的縮約で SSN を隠す', async () => {
    const { orchestrator } = setup(
      [authorized('SELECT ssn FROM users WHERE id = 1', '[ssn]'), SAFE, NOTHING_SENSITIVE],
      { execute: () => TE.right('111-22-3333') }
    );

    const outcome = await orchestrator.handle('What is my SSN?');

    expect(outcome.result).toEqual({
      kind: 'answered',
      response: 'REDACTED',
      sanitized: true,
      reason: 'Sensitive values redacted: ssn',
    });
  });
});
