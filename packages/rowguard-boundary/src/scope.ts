/**
 * Query scope gate
 *
 * 候補クエリが「現在のprincipalの行だけを読む単一のSELECT」であることを機械的に検査する。
 * WHERE 句は括弧の外側の AND で連結した述語のみとし、その1項が `id = <principalId>` でなければならない。
 * オラクルの判定とは独立しており、どのステージ構成でもバイパスされない。
 * 文法ベースのSQL検証器ではなく、既知の逸脱パターンを保守的に拒否する。
 */
import { SENSITIVE_FIELDS } from '@rowguard/verdicts';
import type { SensitiveField } from '@rowguard/verdicts';

export type ScopeViolationCode =
  | 'EMPTY_QUERY'
  | 'MULTIPLE_STATEMENTS'
  | 'COMMENT'
  | 'NOT_SELECT'
  | 'MUTATION'
  | 'UNION'
  | 'JOIN'
  | 'SUBQUERY'
  | 'OR_CONDITION'
  | 'PATTERN_MATCH'
  | 'CONCATENATION'
  | 'FORBIDDEN_FUNCTION'
  | 'SYSTEM_CATALOG'
  | 'WRONG_TABLE'
  | 'MISSING_WHERE'
  | 'MISSING_SCOPE'
  | 'FOREIGN_ID'
  | 'BOOLEAN_EXPRESSION'
  | 'TAUTOLOGY';

export interface ScopeViolation {
  code: ScopeViolationCode;
  message: string;
}

export interface ScopeCheckResult {
  allowed: boolean;
  reason?: string;
  violations: ScopeViolation[];
}

/** 読み取り対象として許可する唯一のテーブル */
export const RECORD_TABLE = 'users';

const MUTATION_KEYWORDS =
  /\b(insert|update|delete|merge|upsert|replace|create|drop|alter|truncate|attach|detach|copy|export|import|install|load|pragma|vacuum|grant|revoke|call|set|reset|checkpoint)\b/;

const FORBIDDEN_FUNCTIONS =
  /\b(substr|substring|instr|strpos|position|left|right|chr|char|ascii|unicode|hex|unhex|md5|sha256|regexp_\w+|read_\w+|glob|getenv|current_setting|sleep|load_extension)\s*\(/;

const SYSTEM_CATALOGS = /\b(sqlite_\w+|information_schema|pg_catalog|pg_\w+|duckdb_\w+)\b/;

// 数値以外の文字列リテラルを `?` に置き換える（リテラル内の語を述語やキーワードとして扱わない）
const maskLiterals = (sql: string): string =>
  sql.replace(/'(?:[^']|'')*'/g, (literal) => (/^'-?\d+'$/.test(literal) ? literal : '?'));

// "id" のような二重引用符付き識別子は裸の識別子として扱う
const unquoteIdentifiers = (sql: string): string => sql.replace(/"([A-Za-z_][\w]*)"/g, '$1');

/**
 * 検査用に正規化する
 * 末尾のセミコロン1つは許容し、空白の連続は1つにまとめる
 */
export function normalizeQuery(query: string): string {
  return unquoteIdentifiers(query)
    .trim()
    .replace(/;\s*$/, '')
    .replace(/\s+/g, ' ')
    .trim();
}

// WHERE 句の範囲（後続の ORDER BY / LIMIT などは含めない）
const afterWhere = (sql: string): string | undefined => {
  const m = /\bwhere\b(.*)$/s.exec(sql);
  const clause = m?.[1];
  if (clause === undefined) return undefined;
  const end = /\b(group by|order by|limit|offset|having|qualify|window|union|intersect|except)\b/.exec(
    clause
  );
  return end === null ? clause : clause.slice(0, end.index);
};

// `id` への参照（`users.id` を含む、`user_id` などは除く）
const ID_REFERENCE = /(?<![\w.])(?:users\.)?id\b/g;

// `id = N` / `id = 'N'` / `id == N` の等価述語
const ID_EQUALITY = /(?<![\w.])(?:users\.)?id\s*==?\s*('?)(-?\d+)\1(?![\w.])/g;

// 連言の1項がちょうど `id = N` であること
const SCOPE_CONJUNCT = /^(?:users\.)?id\s*==?\s*('?)(-?\d+)\1$/;

// 述語を真偽値として包む構文（否定・IS 判定・CASE・真偽値リテラル・BETWEEN）
const BOOLEAN_WRAPPERS = /\b(not|is|case|true|false|between)\b/;

const closingParen = (expr: string): number => {
  let depth = 0;
  for (let i = 0; i < expr.length; i++) {
    if (expr[i] === '(') depth++;
    else if (expr[i] === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
};

const stripOuterParens = (expr: string): string => {
  let e = expr.trim();
  while (e.startsWith('(') && closingParen(e) === e.length - 1) {
    e = e.slice(1, -1).trim();
  }
  return e;
};

/**
 * 括弧の外側にある AND で分割した連言項
 * 分割できない式は1項として返す
 */
function topLevelConjuncts(expr: string): string[] {
  const e = stripOuterParens(expr);
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < e.length; i++) {
    const c = e[i];
    if (c === '(') depth++;
    else if (c === ')') depth--;
    else if (depth === 0 && e.startsWith(' and ', i)) {
      parts.push(e.slice(start, i));
      start = i + ' and '.length;
      i = start - 1;
    }
  }
  parts.push(e.slice(start));
  if (parts.length === 1) return [e];
  return parts.flatMap(topLevelConjuncts);
}

function scopeViolations(whereClause: string, principalId: number): ScopeViolation[] {
  const violations: ScopeViolation[] = [];
  const references = whereClause.match(ID_REFERENCE)?.length ?? 0;
  const equalities = Array.from(whereClause.matchAll(ID_EQUALITY), (m) => Number(m[2]));
  const scoped = equalities.filter((value) => value === principalId).length;
  const restricted = topLevelConjuncts(whereClause).some((conjunct) => {
    const m = SCOPE_CONJUNCT.exec(conjunct);
    return m !== null && Number(m[2]) === principalId;
  });

  if (!restricted) {
    violations.push({
      code: 'MISSING_SCOPE',
      message: `Query is not restricted to id = ${principalId}`,
    });
  }
  if (references > scoped) {
    violations.push({
      code: 'FOREIGN_ID',
      message: `Query references rows other than id = ${principalId}`,
    });
  }
  if (BOOLEAN_WRAPPERS.test(whereClause)) {
    violations.push({
      code: 'BOOLEAN_EXPRESSION',
      message: 'Query wraps its conditions in a boolean expression',
    });
  }
  return violations;
}

function hasTautology(whereClause: string): boolean {
  return (
    /(?<![\w.])(\d+)\s*==?\s*\1(?![\w.])/.test(whereClause) ||
    /('-?\d+')\s*==?\s*\1/.test(whereClause) ||
    /\?\s*==?\s*\?/.test(whereClause) ||
    /(?<![\w.])([a-z_][\w.]*)\s*==?\s*\1(?![\w.])/.test(whereClause) ||
    /\bwhere\s+(true|1)\b/.test(`where ${whereClause.trim()}`) ||
    /\band\s+(true|1)\b/.test(whereClause)
  );
}

/**
 * 候補クエリが principalId の行のみを読む単一のSELECTかを検査する
 */
export function checkQueryScope(query: string, principalId: number): ScopeCheckResult {
  const normalized = normalizeQuery(query);
  const violations: ScopeViolation[] = [];
  const add = (code: ScopeViolationCode, message: string): void => {
    violations.push({ code, message });
  };

  if (normalized === '') {
    add('EMPTY_QUERY', 'Query is empty');
    return { allowed: false, reason: 'Query is empty', violations };
  }

  const lower = normalized.toLowerCase();
  const masked = maskLiterals(lower);

  if (masked.includes(';')) add('MULTIPLE_STATEMENTS', 'Query contains multiple statements');
  if (/--|\/\*|\*\/|#/.test(masked)) add('COMMENT', 'Query contains a comment');
  if (!/^select\b/.test(masked)) add('NOT_SELECT', 'Only SELECT statements are allowed');
  if (MUTATION_KEYWORDS.test(masked)) add('MUTATION', 'Query contains a data-modifying keyword');
  if (/\b(union|intersect|except)\b/.test(masked)) add('UNION', 'Query combines result sets');
  if (/\bjoin\b/.test(masked) || /\bfrom\s+[\w.]+(\s+(as\s+)?\w+)?\s*,/.test(masked)) {
    add('JOIN', 'Query reads from more than one table');
  }
  if ((masked.match(/\bselect\b/g)?.length ?? 0) > 1) add('SUBQUERY', 'Query contains a subquery');
  if (/\bor\b/.test(masked)) add('OR_CONDITION', 'Query contains an OR condition');
  if (/\b(like|ilike|glob|similar|regexp)\b/.test(masked) || /~~/.test(masked)) {
    add('PATTERN_MATCH', 'Query uses pattern matching');
  }
  if (masked.includes('||')) add('CONCATENATION', 'Query uses string concatenation');
  if (FORBIDDEN_FUNCTIONS.test(masked)) add('FORBIDDEN_FUNCTION', 'Query uses a forbidden function');
  if (SYSTEM_CATALOGS.test(masked)) add('SYSTEM_CATALOG', 'Query accesses system tables');

  const tables = Array.from(masked.matchAll(/\bfrom\s+([\w.]+)/g), (m) => m[1] ?? '');
  const readsOnlyRecords =
    tables.length > 0 &&
    tables.every((t) => t === RECORD_TABLE || t === `main.${RECORD_TABLE}`);
  if (!readsOnlyRecords) add('WRONG_TABLE', `Query must read from the ${RECORD_TABLE} table only`);

  const whereClause = afterWhere(masked);
  if (whereClause === undefined) {
    add('MISSING_WHERE', 'Query has no WHERE restriction');
    add('MISSING_SCOPE', `Query is not restricted to id = ${principalId}`);
  } else {
    violations.push(...scopeViolations(whereClause, principalId));
    if (hasTautology(whereClause)) add('TAUTOLOGY', 'Query contains an always-true condition');
  }

  const first = violations[0];
  return first === undefined
    ? { allowed: true, violations }
    : { allowed: false, reason: first.message, violations };
}

/**
 * クエリが参照する機密フィールド
 * `SELECT *` はすべての機密フィールドを含むとみなす
 */
export function mentionedSensitiveFields(query: string): SensitiveField[] {
  const masked = maskLiterals(normalizeQuery(query).toLowerCase());
  if (/\bselect\s+(distinct\s+)?(\w+\.)?\*/.test(masked)) return [...SENSITIVE_FIELDS];
  return SENSITIVE_FIELDS.filter((field) => new RegExp(`(?<![\\w])${field}\\b`).test(masked));
}
