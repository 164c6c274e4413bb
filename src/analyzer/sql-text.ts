import type { StatementKind } from './types';

// ---------------------------------------------------------------------------
// Lexical layer. Everything here works on text, never on the AST, and is
// used either as a pre-filter or where no grammar accepts the statement.
// ---------------------------------------------------------------------------

const LITERAL_OR_COMMENT = /'(?:[^']|'')*'|--[^\n]*|\/\*[\s\S]*?\*\//g;

/**
 * Blank out comments (replaced by a space) and string bodies (replaced by
 * an empty literal) so pattern matching only sees code.
 */
export function maskSql(sql: string): string {
  return sql.replace(LITERAL_OR_COMMENT, (m) => (m.startsWith("'") ? "''" : ' '));
}

/** Apply `fn` to code segments only, leaving literals and comments untouched. */
export function mapCode(sql: string, fn: (code: string) => string): string {
  let out = '';
  let last = 0;
  for (const m of sql.matchAll(LITERAL_OR_COMMENT)) {
    const start = m.index ?? 0;
    out += fn(sql.slice(last, start)) + m[0];
    last = start + m[0].length;
  }
  return out + fn(sql.slice(last));
}

/** String literal bodies, unescaped, in order of appearance */
export function stringLiterals(sql: string): string[] {
  const out: string[] = [];
  for (const m of sql.matchAll(LITERAL_OR_COMMENT)) {
    if (m[0].startsWith("'")) out.push(m[0].slice(1, -1).replace(/''/g, "'"));
  }
  return out;
}

const BIND_PATTERNS: RegExp[] = [
  /=\s*\?/,
  /\(\s*\?/,
  /,\s*\?/,
  /\?\s*\)/,
  /\?\s*,/,
  /(?<![:\w]):[A-Za-z_]\w*/,
  /\$\d+/,
];

/** Whether the statement uses bind-parameter syntax outside literals and comments. */
export function hasBindVariables(sql: string): boolean {
  const masked = maskSql(sql);
  return BIND_PATTERNS.some((re) => re.test(masked));
}

/** Count calls to any of `names` in masked SQL. */
export function countFunctionCalls(masked: string, names: readonly string[]): number {
  if (names.length === 0) return 0;
  const re = new RegExp(`\\b(?:${names.join('|')})\\s*\\(`, 'gi');
  return [...masked.matchAll(re)].length;
}

export function detectStatementKind(masked: string): StatementKind {
  const s = masked.replace(/^[\s(;]+/, '');
  const head = /^([A-Za-z]+)/.exec(s)?.[1]?.toUpperCase() ?? '';
  switch (head) {
    case 'SELECT':
      return 'SELECT';
    case 'WITH': {
      const main = /\)\s*(INSERT|UPDATE|DELETE|MERGE)\b/i.exec(s)?.[1]?.toUpperCase();
      if (main === 'INSERT' || main === 'UPDATE' || main === 'DELETE' || main === 'MERGE') return main;
      return 'SELECT';
    }
    case 'INSERT':
      return 'INSERT';
    case 'UPDATE':
      return 'UPDATE';
    case 'DELETE':
      return 'DELETE';
    case 'MERGE':
      return 'MERGE';
    case 'CALL':
      return 'CALL';
    case 'COPY':
      return 'COPY';
    case 'CREATE':
      if (/^CREATE\s+(?:UNIQUE\s+)?INDEX\b/i.test(s)) return 'CREATE_INDEX';
      if (/^CREATE\s+(?:OR\s+REPLACE\s+)?(?:\w+\s+)*?TABLE\b/i.test(s)) return 'CREATE_TABLE';
      return 'OTHER';
    default:
      return 'OTHER';
  }
}

// ---------------------------------------------------------------------------
// Parser preprocessing
// ---------------------------------------------------------------------------

/**
 * Replace a function call (with balanced parentheses) with a substitute string.
 * `funcName` is a regex fragment, so multi-word heads like LATERAL\s+FLATTEN work.
 */
export function replaceBalancedCall(s: string, funcName: string, replacement: string): string {
  const re = new RegExp(`\\b${funcName}\\s*\\(`, 'gi');
  let match;
  while ((match = re.exec(s)) !== null) {
    const start = match.index;
    const parenStart = start + match[0].length - 1;
    let depth = 1;
    let i = parenStart + 1;
    while (i < s.length && depth > 0) {
      if (s[i] === '(') depth++;
      else if (s[i] === ')') depth--;
      i++;
    }
    if (depth === 0) {
      s = s.slice(0, start) + replacement + s.slice(i);
      re.lastIndex = start + replacement.length;
    }
  }
  return s;
}

/**
 * Rewrite warehouse-specific syntax the grammars cannot handle, so we get
 * an AST more often. Used as a fallback when native parsing fails; the
 * lexical flags are always computed from the original text.
 */
export function preprocessForParser(sql: string): string {
  let bind = 0;
  let s = mapCode(sql, (code) =>
    code
      // ::TYPE casts, optionally with precision e.g. ::NUMBER(10,2)
      .replace(/::[A-Za-z_][A-Za-z0-9_]*(?:\s*\(\s*\d+(?:\s*,\s*\d+)?\s*\))?/g, '')
      // positional bind markers become named parameters
      .replace(/\?/g, () => `:bind${++bind}`)
      .replace(/\bFETCH\s+(?:FIRST|NEXT)\s+(\d+)\s+ROWS?\s+ONLY\b/gi, 'LIMIT $1'),
  );

  s = replaceBalancedCall(s, 'LATERAL\\s+FLATTEN', '(SELECT 1 AS value)');

  // QUALIFY filters window results; drop it, the flag is recorded lexically
  s = s.replace(/\bQUALIFY\b[\s\S]*?(?=\bORDER\s+BY\b|\bLIMIT\b|;|$)/i, ' ');

  return s.trim().replace(/;\s*$/, '');
}

/** Length of the longest string literal body */
export function largestLiteralLength(sql: string): number {
  return stringLiterals(sql).reduce((max, lit) => Math.max(max, lit.length), 0);
}

/** Strip quoting from an identifier and keep its last dotted part. */
export function bareName(identifier: string): string {
  const parts = identifier.split('.');
  return (parts[parts.length - 1] ?? identifier).replace(/["`[\]]/g, '').trim();
}

/** Case- and quote-insensitive identifier key */
export function identKey(identifier: string): string {
  return bareName(identifier).toUpperCase();
}
