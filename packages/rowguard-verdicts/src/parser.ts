/**
 * 行指向 `key: value` テキストの寛容パーサー
 *
 * 不変条件:
 * - パーサーは例外を境界外に投げない（失敗時はスキーマの安全側レコード）
 * - 壊れた/途中で切れた/敵対的な出力で boolean が true に反転することはない
 */
import type { FieldSpec, FieldValue, ParsedFields, ParseResult, VerdictSchema } from './types.js';
import { INVALID_FORMAT_REASON, parseFailureReason } from './defaults.js';

interface FieldMatcher {
  readonly field: FieldSpec;
  readonly pattern: RegExp;
}

const escapeRegExp = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const buildMatchers = (fields: readonly FieldSpec[]): FieldMatcher[] =>
  fields.map((field) => ({
    field,
    pattern: new RegExp(`^${escapeRegExp(field.key)}\\s*:`, 'i'),
  }));

const QUOTE_WRAPPED = /^(['"`])(.*)\1$/s;

// 値を囲む1組の引用符/バッククォートを外す
const stripQuotes = (value: string): string => {
  const m = QUOTE_WRAPPED.exec(value);
  return m?.[2] !== undefined ? m[2].trim() : value;
};

/** "true" トークンがあり、かつ "false" トークンがない場合のみ true */
export function parseFlag(remainder: string): boolean {
  const tokens = remainder.toLowerCase().split(/[^a-z]+/).filter(Boolean);
  return tokens.includes('true') && !tokens.includes('false');
}

export function parseStringSet(remainder: string): readonly string[] {
  let body = remainder.trim();
  if (body.startsWith('[')) body = body.slice(1);
  if (body.endsWith(']')) body = body.slice(0, -1);
  if (body.trim().toLowerCase() === 'null') return [];

  const items = body
    .split(',')
    .map((token) => stripQuotes(token.trim()).toLowerCase())
    .filter((token) => token.length > 0);
  return Array.from(new Set(items));
}

export function parseNullableString(remainder: string): string | null {
  const value = stripQuotes(remainder.trim());
  if (value === '' || value.toLowerCase() === 'null') return null;
  return value;
}

/**
 * 各行をスキーマのフィールドに割り当てる
 * - 行はトリムし、空白の連続は1つにまとめる
 * - 空行とどのプレフィックスにも一致しない行は無視
 * - boolean は出現ごとにAND（1回でもfalseならfalse）
 * - それ以外は後勝ち
 */
function collectFields(
  matchers: readonly FieldMatcher[],
  text: string
): { fields: ParsedFields; recognized: number } {
  const flags = new Map<string, boolean>();
  const texts = new Map<string, string>();
  const sets = new Map<string, readonly string[]>();
  const optionals = new Map<string, string | null>();
  let recognized = 0;

  for (const rawLine of text.split(/\r\n|\r|\n/)) {
    const line = rawLine.trim().replace(/\s+/g, ' ');
    if (line === '') continue;

    const match = matchers.find((m) => m.pattern.test(line));
    if (!match) continue;
    recognized++;

    const { key, rule } = match.field;
    const remainder = line.replace(match.pattern, '').trim();
    switch (rule) {
      case 'boolean':
        flags.set(key, (flags.get(key) ?? true) && parseFlag(remainder));
        break;
      case 'text':
        texts.set(key, remainder);
        break;
      case 'stringSet':
        sets.set(key, parseStringSet(remainder));
        break;
      case 'nullableString':
        optionals.set(key, parseNullableString(remainder));
        break;
    }
  }

  return {
    recognized,
    fields: {
      flag: (key) => flags.get(key) ?? false,
      text: (key) => texts.get(key),
      set: (key) => sets.get(key) ?? [],
      optional: (key) => optionals.get(key) ?? null,
    },
  };
}

/**
 * オラクル出力をVerdictにパース（診断情報付き）
 * 例外・検証失敗はすべて安全側レコードに変換する
 */
export function parseVerdictResult<V>(schema: VerdictSchema<V>, raw: unknown): ParseResult<V> {
  try {
    if (typeof raw !== 'string') {
      throw new TypeError(`expected string, got ${raw === null ? 'null' : typeof raw}`);
    }
    if (raw.trim() === '') {
      return { ok: false, value: schema.fallback(INVALID_FORMAT_REASON), errors: ['empty response'] };
    }

    const { fields, recognized } = collectFields(buildMatchers(schema.fields), raw);
    const checked = schema.codec.safeParse(schema.assemble(fields));
    if (!checked.success) {
      const message = checked.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join(', ');
      return { ok: false, value: schema.fallback(parseFailureReason(message)), errors: [message] };
    }
    if (recognized === 0) {
      return { ok: false, value: checked.data, errors: ['no recognized fields'] };
    }
    return { ok: true, value: checked.data };
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, value: schema.fallback(parseFailureReason(message)), errors: [message] };
  }
}

export function parseVerdict<V>(schema: VerdictSchema<V>, raw: unknown): V {
  return parseVerdictResult(schema, raw).value;
}

const renderValue = (field: FieldSpec, value: FieldValue | undefined): string => {
  if (value === undefined || value === null) return 'null';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'string') {
    // パース時に外れる1組を補い、引用符付きの値をそのまま戻す
    return field.rule === 'nullableString' && QUOTE_WRAPPED.test(value) ? `"${value}"` : value;
  }
  return `[${value.join(', ')}]`;
};

/**
 * VerdictをオラクルのFormatに戻す
 * parseVerdict(schema, serializeVerdict(schema, v)) は v と等しい
 */
export function serializeVerdict<V>(schema: VerdictSchema<V>, verdict: V): string {
  const projected = schema.project(verdict);
  return schema.fields.map((f) => `${f.key}: ${renderValue(f, projected[f.key])}`).join('\n');
}

export function safeDefault<V>(schema: VerdictSchema<V>, reason: string = INVALID_FORMAT_REASON): V {
  return schema.fallback(reason);
}
