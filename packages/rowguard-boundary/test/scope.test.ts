import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { checkQueryScope, mentionedSensitiveFields } from '../src/index.js';

const codes = (query: string, principalId: number): string[] =>
  checkQueryScope(query, principalId).violations.map((v) => v.code);

describe('checkQueryScope', () => {
  it('本人の行だけを読む SELECT を許可する', () => {
    expect(checkQueryScope('SELECT address FROM users WHERE id = 7', 7)).toEqual({
      allowed: true,
      violations: [],
    });
    expect(checkQueryScope("SELECT first_name, last_name FROM users WHERE id = '7';", 7).allowed).toBe(
      true
    );
    expect(checkQueryScope('SELECT "address" FROM "users" WHERE "id" = 7;', 7).allowed).toBe(true);
    expect(checkQueryScope('SELECT phone_number FROM users WHERE users.id = 7', 7).allowed).toBe(true);
  });

  it('他のprincipalの行は拒否する', () => {
    const result = checkQueryScope('SELECT address FROM users WHERE id = 8', 7);
    expect(result.allowed).toBe(false);
    expect(result.reason).toBe('Query is not restricted to id = 7');
    expect(result.violations.map((v) => v.code)).toEqual(['MISSING_SCOPE', 'FOREIGN_ID']);
  });

  it('前方一致する別IDは本人扱いしない', () => {
    expect(codes('SELECT address FROM users WHERE id = 70', 7)).toContain('MISSING_SCOPE');
  });

  it('本人IDに加えて別IDを参照すると拒否する', () => {
    const result = checkQueryScope('SELECT email FROM users WHERE id = 7 AND id = 8', 7);
    expect(result.violations.map((v) => v.code)).toEqual(['FOREIGN_ID']);
    expect(result.reason).toBe('Query references rows other than id = 7');
  });

  it('WHERE のないクエリは拒否する', () => {
    const result = checkQueryScope('SELECT * FROM users', 7);
    expect(result.reason).toBe('Query has no WHERE restriction');
    expect(result.violations.map((v) => v.code)).toEqual(['MISSING_WHERE', 'MISSING_SCOPE']);
  });

  it('OR による恒真条件を拒否する', () => {
    expect(codes('SELECT * FROM users WHERE id = 7 OR 1=1', 7)).toEqual([
      'OR_CONDITION',
      'MISSING_SCOPE',
      'TAUTOLOGY',
    ]);
  });

  it('UNION を拒否する', () => {
    expect(
      codes('SELECT first_name FROM users WHERE id = 7 UNION SELECT ssn FROM users', 7)
    ).toEqual(['UNION', 'SUBQUERY']);
  });

  it('サブクエリを拒否する', () => {
    const result = checkQueryScope(
      "SELECT address FROM users WHERE id = (SELECT id FROM users WHERE email = 'a@b.com')",
      7
    );
    expect(result.allowed).toBe(false);
    expect(result.violations.map((v) => v.code)).toContain('SUBQUERY');
  });

  it('文字列連結・パターンマッチ・文字列関数を拒否する', () => {
    expect(codes('SELECT first_name || ssn FROM users WHERE id = 7', 7)).toEqual([
      'CONCATENATION',
    ]);
    expect(codes("SELECT address FROM users WHERE id = 7 AND address LIKE '%'", 7)).toEqual([
      'PATTERN_MATCH',
    ]);
    expect(codes('SELECT substr(ssn, 1, 3) FROM users WHERE id = 7', 7)).toEqual([
      'FORBIDDEN_FUNCTION',
    ]);
  });

  it('更新系・複文・コメントを拒否する', () => {
    expect(codes('DELETE FROM users WHERE id = 7', 7)).toEqual(['NOT_SELECT', 'MUTATION']);
    expect(codes('SELECT address FROM users WHERE id = 7; DROP TABLE users', 7)).toEqual(
      expect.arrayContaining(['MULTIPLE_STATEMENTS', 'MUTATION'])
    );
    expect(codes('SELECT address FROM users WHERE id = 7 -- trailing', 7)).toEqual([
      'COMMENT',
      'MISSING_SCOPE',
    ]);
  });

  it('システムテーブルを拒否する', () => {
    expect(codes('SELECT name FROM sqlite_master WHERE id = 7', 7)).toEqual([
      'SYSTEM_CATALOG',
      'WRONG_TABLE',
    ]);
  });

  it('文字列リテラル内の述語は本人条件として数えない', () => {
    const result = checkQueryScope("SELECT address FROM users WHERE address = 'id = 7'", 7);
    expect(result.violations.map((v) => v.code)).toEqual(['MISSING_SCOPE']);
  });

  it('本人条件を否定・真偽値で包んだクエリを拒否する', () => {
    for (const query of [
      'SELECT * FROM users WHERE id = 1 IS FALSE',
      'SELECT * FROM users WHERE (id = 1) = false',
      'SELECT * FROM users WHERE id = 1 IS NOT TRUE',
      'SELECT * FROM users WHERE CASE WHEN id = 1 THEN false ELSE true END',
      'SELECT * FROM users WHERE NOT (id = 1)',
    ]) {
      expect(codes(query, 1)).toEqual(['MISSING_SCOPE', 'BOOLEAN_EXPRESSION']);
    }
  });

  it('BETWEEN の境界に本人条件を置いたクエリを拒否する', () => {
    const result = checkQueryScope('SELECT ssn FROM users WHERE id BETWEEN 0 AND id = 1', 1);
    expect(result.allowed).toBe(false);
    expect(result.violations.map((v) => v.code)).toContain('BOOLEAN_EXPRESSION');
  });

  it('本人条件が AND の1項であれば括弧や後続句があっても許可する', () => {
    expect(checkQueryScope('SELECT email FROM users WHERE (id = 7)', 7).allowed).toBe(true);
    expect(
      checkQueryScope("SELECT email FROM users WHERE first_name = 'Ada' AND (id = 7)", 7).allowed
    ).toBe(true);
    expect(
      checkQueryScope('SELECT email FROM users WHERE (last_name = ? AND id = 7) LIMIT 1', 7).allowed
    ).toBe(true);
    expect(checkQueryScope('SELECT email FROM users WHERE id = 7 ORDER BY id', 7).allowed).toBe(
      true
    );
  });

  it('空のクエリを拒否する', () => {
    expect(checkQueryScope('   ', 7)).toEqual({
      allowed: false,
      reason: 'Query is empty',
      violations: [{ code: 'EMPTY_QUERY', message: 'Query is empty' }],
    });
  });
});

describe('Property: scope gate', () => {
  const columnArb = fc.constantFrom(
    'first_name',
    'last_name',
    'email',
    'phone_number',
    'address',
    'date_of_birth',
    'ssn'
  );
  const idArb = fc.integer({ min: 1, max: 100000 });

  it('Property: 本人IDに限定した単一列SELECTは常に許可される', () => {
    fc.assert(
      fc.property(columnArb, idArb, (column, id) => {
        return checkQueryScope(`SELECT ${column} FROM users WHERE id = ${id}`, id).allowed;
      })
    );
  });

  it('Property: 別IDに限定したクエリは常に拒否される', () => {
    fc.assert(
      fc.property(columnArb, idArb, idArb, (column, principal, other) => {
        fc.pre(principal !== other);
        return !checkQueryScope(`SELECT ${column} FROM users WHERE id = ${other}`, principal).allowed;
      })
    );
  });
});

describe('mentionedSensitiveFields', () => {
  it('クエリ中の機密フィールドを分類順で返す', () => {
    expect(mentionedSensitiveFields('SELECT address, phone_number FROM users WHERE id = 1')).toEqual([
      'phone_number',
      'address',
    ]);
  });

  it('SELECT * はすべての機密フィールドを含む', () => {
    expect(mentionedSensitiveFields('SELECT * FROM users WHERE id = 1')).toEqual([
      'ssn',
      'phone_number',
      'address',
      'date_of_birth',
    ]);
  });

  it('リテラル内の語は数えない', () => {
    expect(
      mentionedSensitiveFields("SELECT first_name FROM users WHERE id = 1 AND email = 'ssn'")
    ).toEqual([]);
  });
});
