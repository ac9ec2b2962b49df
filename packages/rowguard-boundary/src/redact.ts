/**
 * Record text redaction
 *
 * 出力テキストに残った機密値を機械的に縮約する。
 * オラクルのサニタイズ結果に対して後段で適用されるため、冪等でなければならない。
 */

// 縮約で前後が連結されて新たに一致することがあるため、変化がなくなるまで繰り返す（上限あり）
const MAX_PASSES = 8;

export type RedactionKind = 'ssn' | 'email' | 'date' | 'phone' | 'address';

export interface RedactionHit {
  kind: RedactionKind;
  count: number;
}

export interface RedactionResult {
  redacted: string;
  hits: RedactionHit[];
}

export const SSN_REPLACEMENT = 'REDACTED';

interface RedactRule {
  kind: RedactionKind;
  pattern: RegExp;
  replace: (match: string, group: string | undefined) => string;
}

/**
 * 適用順序が意味を持つ（SSN・日付を先に縮約してから電話番号を探す）
 */
const REDACT_RULES: readonly RedactRule[] = [
  {
    kind: 'ssn',
    pattern: /\b\d{3}-\d{2}-\d{4}\b/g,
    replace: () => SSN_REPLACEMENT,
  },
  {
    // ローカル部のみ残す
    kind: 'email',
    pattern: /\b([A-Z0-9._%+-]+)@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi,
    replace: (match, local) => local ?? match,
  },
  {
    // 年のみ残す
    kind: 'date',
    pattern: /\b(\d{4})-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\d|3[01])\b/g,
    replace: (match, year) => year ?? match,
  },
  {
    // 末尾4桁のみ残す
    kind: 'phone',
    pattern: /(?:\+?1[-. ]?)?\(?\b\d{3}\)?[-. ]?\d{3}[-. ]?(\d{4})(?!\d)(?:\s*(?:x|ext\.?)\s*\d+)?/gi,
    replace: (match, last4) => (last4 === undefined ? match : `***-***-${last4}`),
  },
  {
    // 番地の行を落とし、郵便番号を外して市・州だけ残す
    kind: 'address',
    pattern:
      /\b\d{1,6}(?: +[A-Z][A-Za-z]*){1,4}? +(?:Street|St|Avenue|Ave|Road|Rd|Lane|Ln|Drive|Dr|Boulevard|Blvd|Court|Ct|Way|Place|Pl|Terrace|Ter|Circle|Cir|Parkway|Pkwy)\b\.?(?:,? *(?:Apt|Suite|Unit)\.? *\w+)?(?: *, *| *\r?\n\s*)?|(, *[A-Z]{2}) +\d{5}(?:-\d{4})?\b/g,
    replace: (_match, state) => state ?? '',
  },
];

export function redactRecordText(text: string): RedactionResult {
  const counts = new Map<RedactionKind, number>();
  let redacted = text;

  for (let pass = 0; pass < MAX_PASSES; pass++) {
    let changed = false;
    for (const rule of REDACT_RULES) {
      redacted = redacted.replace(rule.pattern, (match: string, ...args: unknown[]) => {
        changed = true;
        counts.set(rule.kind, (counts.get(rule.kind) ?? 0) + 1);
        return rule.replace(match, typeof args[0] === 'string' ? args[0] : undefined);
      });
    }
    if (!changed) break;
  }

  const hits = REDACT_RULES.flatMap((rule): RedactionHit[] => {
    const count = counts.get(rule.kind);
    return count === undefined ? [] : [{ kind: rule.kind, count }];
  });
  return { redacted, hits };
}
