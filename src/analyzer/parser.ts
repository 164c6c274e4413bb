import { Parser } from 'node-sql-parser';
import { config } from '../config';
import { logger } from '../utils/logger';
import {
  type Node,
  child,
  children,
  collect,
  identifier,
  isNode,
  isSelect,
  nodeType,
  str,
  unwrapStatement,
  walk,
} from './ast';
import { ParseError } from './errors';
import {
  bareName,
  detectStatementKind,
  hasBindVariables,
  identKey,
  largestLiteralLength,
  maskSql,
  preprocessForParser,
} from './sql-text';
import type {
  CopyShape,
  CreateIndexShape,
  InsertShape,
  JoinClause,
  OperandKind,
  OrderByItem,
  ParsedQuery,
  Predicate,
  PredicateOperator,
  PredicateSource,
  StatementKind,
  TableRef,
} from './types';

const log = logger.child({ module: 'parser' });
const sqlParser = new Parser();

export interface ParseOptions {
  /** node-sql-parser grammars to try, in order */
  dialects?: readonly string[];
}

// ---------------------------------------------------------------------------
// Operands
// ---------------------------------------------------------------------------

interface Operand {
  text: string;
  kind: OperandKind;
  column: string | null;
  qualifier: string | null;
  wrappedBy: string | null;
}

const ARITHMETIC_OPERATORS = new Set(['+', '-', '*', '/', '%', '||']);

function columnRef(node: Node): { column: string; qualifier: string | null } | null {
  const column = identifier(node.column);
  if (column === null) return null;
  return { column, qualifier: identifier(node.table) };
}

function describeOperand(value: unknown): Operand {
  const operand = (text: string, kind: OperandKind): Operand => ({
    text,
    kind,
    column: null,
    qualifier: null,
    wrappedBy: null,
  });

  if (!isNode(value)) return operand(String(value ?? 'NULL'), 'literal');
  if (isSelect(value) || isSelect(value.ast)) return operand('(subquery)', 'subquery');

  const type = nodeType(value) ?? '';
  switch (type) {
    case 'column_ref': {
      const ref = columnRef(value);
      if (ref === null) return operand('<column>', 'expression');
      const text = ref.qualifier ? `${ref.qualifier}.${ref.column}` : ref.column;
      return { text, kind: 'column', column: ref.column, qualifier: ref.qualifier, wrappedBy: null };
    }
    case 'number':
      return operand(String(value.value), 'literal');
    case 'bool':
    case 'boolean':
      return operand(String(value.value).toUpperCase(), 'literal');
    case 'null':
      return operand('NULL', 'literal');
    case 'star':
      return operand('*', 'expression');
    case 'param':
      return operand(`:${identifier(value.value) ?? ''}`, 'parameter');
    case 'var': {
      const prefix = str(value, 'prefix') ?? '$';
      return operand(`${prefix}${identifier(value.name) ?? ''}`, 'parameter');
    }
    case 'origin':
      return operand(identifier(value.value) ?? '?', value.value === '?' ? 'parameter' : 'expression');
    case 'date':
    case 'time':
    case 'timestamp':
    case 'datetime':
      return operand(`${type.toUpperCase()} '${identifier(value.value) ?? ''}'`, 'literal');
    case 'expr_list': {
      const items = children(value, 'value');
      if (items.some((i) => isSelect(i) || isSelect(i.ast))) return operand('(subquery)', 'subquery');
      return operand(`(${items.map((i) => describeOperand(i).text).join(', ')})`, 'list');
    }
    case 'function':
    case 'aggr_func': {
      const name = (identifier(value.name) ?? 'FUNC').toUpperCase();
      const argsNode = child(value, 'args');
      const args = argsNode ? [...children(argsNode, 'value'), ...children(argsNode, 'expr')] : [];
      const text = `${name}(${args.map((a) => describeOperand(a).text).join(', ')})`;
      return wrapped(text, name, value);
    }
    case 'cast': {
      const inner = describeOperand(value.expr);
      const target = children(value, 'target')
        .map((t) => str(t, 'dataType'))
        .filter((t): t is string => t !== null)
        .join(' ');
      return wrapped(`CAST(${inner.text} AS ${target || '?'})`, 'CAST', value);
    }
    case 'binary_expr': {
      const op = (str(value, 'operator') ?? '').toUpperCase();
      const l = describeOperand(value.left);
      const r = describeOperand(value.right);
      const text = `${l.text} ${op} ${r.text}`;
      if (ARITHMETIC_OPERATORS.has(op)) return wrapped(text, op === '||' ? 'CONCAT' : 'ARITHMETIC', value);
      return operand(text, 'expression');
    }
    case 'unary_expr':
      return operand(`${str(value, 'operator') ?? ''} ${describeOperand(value.expr).text}`.trim(), 'expression');
    case 'interval':
      return operand(`INTERVAL ${describeOperand(value.expr).text} ${str(value, 'unit') ?? ''}`.trim(), 'literal');
    case 'case':
      return wrapped('CASE ... END', 'CASE', value);
    default:
      if (type.endsWith('string')) return operand(`'${identifier(value.value) ?? ''}'`, 'literal');
      return operand('<expr>', 'expression');
  }
}

/** An expression wrapping a column reference somewhere in its arguments. */
function wrapped(text: string, wrapper: string, node: Node): Operand {
  const inner = collect(node, (n) => nodeType(n) === 'column_ref' && n !== node)
    .map(columnRef)
    .find((r) => r !== null);
  if (!inner) return { text, kind: 'expression', column: null, qualifier: null, wrappedBy: null };
  return { text, kind: 'expression', column: inner.column, qualifier: inner.qualifier, wrappedBy: wrapper };
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

export function operatorClass(op: string): PredicateOperator | null {
  switch (op.toUpperCase()) {
    case '=':
    case '==':
      return 'EQ';
    case 'IN':
      return 'IN';
    case 'IS':
    case 'IS NOT':
      return 'IS';
    case '!=':
    case '<>':
    case '>':
    case '<':
    case '>=':
    case '<=':
    case 'BETWEEN':
    case 'NOT BETWEEN':
    case 'LIKE':
    case 'NOT LIKE':
    case 'ILIKE':
    case 'NOT ILIKE':
    case 'NOT IN':
      return 'RANGE';
    default:
      return null;
  }
}

const FLIPPED: Record<string, string> = { '<': '>', '>': '<', '<=': '>=', '>=': '<=' };

interface WalkState {
  predicates: Predicate[];
  hasExists: boolean;
}

function makePredicate(op: string, cls: PredicateOperator, left: unknown, right: unknown, source: PredicateSource): Predicate {
  let l = describeOperand(left);
  let r = describeOperand(right);
  let comparison = op;
  // keep the column side on the left: 5 < col reads as col > 5
  if (l.column === null && r.column !== null && (cls === 'EQ' || cls === 'RANGE')) {
    [l, r] = [r, l];
    comparison = FLIPPED[op] ?? op;
  }
  return {
    left: l.text,
    right: r.text,
    operator: cls,
    comparison,
    source,
    column: l.column,
    qualifier: l.qualifier,
    wrappedBy: l.wrappedBy,
    rightKind: r.kind,
    rightColumn: r.kind === 'column' && r.column !== null ? { column: r.column, qualifier: r.qualifier } : null,
  };
}

function walkSubqueries(value: unknown, source: PredicateSource, state: WalkState): void {
  for (const sub of collect(value, isSelect)) {
    if (sub.where) walkCondition(sub.where, source, state, false);
  }
}

function walkCondition(expr: unknown, source: PredicateSource, state: WalkState, equalityOnly: boolean): void {
  if (!isNode(expr)) return;
  const type = nodeType(expr);

  if (type === 'binary_expr') {
    const op = (str(expr, 'operator') ?? '').toUpperCase();
    if (op === 'AND' || op === 'OR' || op === '&&') {
      walkCondition(expr.left, source, state, equalityOnly);
      walkCondition(expr.right, source, state, equalityOnly);
      return;
    }
    const cls = operatorClass(op);
    if (cls !== null && (!equalityOnly || cls === 'EQ')) {
      state.predicates.push(makePredicate(op, cls, expr.left, expr.right, source));
    }
    if (!equalityOnly) walkSubqueries([expr.left, expr.right], source, state);
    return;
  }

  const op = (str(expr, 'operator') ?? identifier(expr.name) ?? '').toUpperCase();
  if ((type === 'unary_expr' || type === 'function') && (op === 'EXISTS' || op === 'NOT EXISTS')) {
    state.hasExists = true;
    if (!equalityOnly) {
      state.predicates.push({
        left: 'EXISTS',
        right: '(subquery)',
        operator: 'EXISTS',
        comparison: 'EXISTS',
        source,
        column: null,
        qualifier: null,
        wrappedBy: null,
        rightKind: 'subquery',
        rightColumn: null,
      });
      walkSubqueries(expr, source, state);
    }
    return;
  }
  if (type === 'unary_expr') walkCondition(expr.expr, source, state, equalityOnly);
}

// ---------------------------------------------------------------------------
// Tables, joins, ordering
// ---------------------------------------------------------------------------

function tableRef(node: Node, name: string): TableRef {
  const db = identifier(node.db);
  const schemaName = identifier(node.schema);
  const catalog = schemaName !== null ? db : null;
  const schema = schemaName ?? db;
  const qualifiedName = [catalog, schema, name].filter((p): p is string => !!p).join('.');
  return { catalog, schema, name, alias: identifier(node.as), qualifiedName };
}

/** Ordered, deduplicated by short name; the longest qualified name wins. */
function dedupeTables(refs: TableRef[]): { tables: TableRef[]; aliases: Record<string, string> } {
  const byKey = new Map<string, TableRef>();
  const aliases: Record<string, string> = {};
  for (const ref of refs) {
    const key = identKey(ref.name);
    if (ref.alias) aliases[ref.alias.toUpperCase()] = key;
    const seen = byKey.get(key);
    if (!seen) {
      byKey.set(key, ref);
    } else if (ref.qualifiedName.length > seen.qualifiedName.length) {
      byKey.set(key, { ...ref, alias: seen.alias ?? ref.alias });
    } else if (!seen.alias && ref.alias) {
      byKey.set(key, { ...seen, alias: ref.alias });
    }
  }
  return { tables: [...byKey.values()], aliases };
}

function collectTables(stmt: Node): TableRef[] {
  const refs: TableRef[] = [];
  walk(stmt, (node) => {
    const name = str(node, 'table');
    if (name && !('column' in node) && nodeType(node) !== 'column_ref') {
      refs.push(tableRef(node, name));
    }
  });
  return refs;
}

function collectJoins(stmt: Node, state: WalkState): JoinClause[] {
  const joins: JoinClause[] = [];
  walk(stmt, (node) => {
    const from = node.from;
    if (!Array.isArray(from)) return;
    for (const item of from.filter(isNode)) {
      const join = str(item, 'join');
      if (!join) continue;
      const name = str(item, 'table');
      const using = Array.isArray(item.using) ? item.using.map(identifier).filter((u): u is string => u !== null) : [];
      let onCondition: string | null = null;
      if (isNode(item.on)) {
        onCondition = describeOperand(item.on).text;
        walkCondition(item.on, 'join_on', state, true);
      } else if (using.length > 0) {
        onCondition = `USING (${using.join(', ')})`;
      }
      joins.push({
        kind: join.replace(/\s*JOIN$/i, '').trim().toUpperCase() || 'INNER',
        table: name ? tableRef(item, name).qualifiedName : '(subquery)',
        onCondition,
      });
    }
  });
  return joins;
}

function collectOrderBy(stmt: Node): OrderByItem[] {
  return children(stmt, 'orderby').map((item) => {
    const expr = describeOperand(item.expr);
    const direction = (str(item, 'type') ?? 'ASC').toUpperCase() === 'DESC' ? 'DESC' : 'ASC';
    return { column: expr.kind === 'column' && expr.column !== null ? expr.column : expr.text, direction };
  });
}

function collectProjection(stmt: Node): string[] {
  const columns = stmt.columns;
  if (columns === '*') return ['*'];
  if (!Array.isArray(columns)) return [];
  return columns.filter(isNode).map((col) => {
    const alias = identifier(col.as);
    if (alias) return alias;
    const expr = col.expr;
    if (nodeType(expr) === 'star') return '*';
    const d = describeOperand(expr);
    if (d.kind === 'column' && d.column !== null) {
      if (d.column === '*') return d.qualifier ? `${d.qualifier}.*` : '*';
      return d.column;
    }
    return d.text;
  });
}

function readLimit(stmt: Node): { limit: number | null; hasLimit: boolean } {
  const limit = child(stmt, 'limit');
  if (!limit) return { limit: null, hasLimit: false };
  const values = children(limit, 'value');
  if (values.length === 0) return { limit: null, hasLimit: false };
  // MySQL's "LIMIT offset, count" puts the count second
  const countNode = str(limit, 'seperator') === ',' && values.length > 1 ? values[1] : values[0];
  const n = countNode && nodeType(countNode) === 'number' ? Number(countNode.value) : NaN;
  return { limit: Number.isFinite(n) ? n : null, hasLimit: true };
}

function mainWhere(stmt: Node): unknown {
  if (stmt.where) return stmt.where;
  // UPDATE/DELETE and INSERT ... SELECT can hang the WHERE off a nested node
  for (const key of Object.keys(stmt)) {
    if (key === 'with') continue;
    const owner = collect(stmt[key], (n) => isNode(n.where))[0];
    if (owner) return owner.where;
  }
  return null;
}

function readInsert(stmt: Node, tables: TableRef[]): InsertShape | null {
  const type = nodeType(stmt);
  if (type !== 'insert' && type !== 'replace') return null;
  const target = children(stmt, 'table')
    .map((t) => {
      const name = str(t, 'table');
      return name ? tableRef(t, name).qualifiedName : null;
    })
    .find((t) => t !== null);
  const columns = Array.isArray(stmt.columns)
    ? stmt.columns.map(identifier).filter((c): c is string => c !== null)
    : [];
  const values = stmt.values;
  let valuesRowCount = 0;
  let fromSelect = isSelect(stmt.select);
  if (Array.isArray(values)) {
    valuesRowCount = values.length;
  } else if (isNode(values)) {
    if (isSelect(values)) fromSelect = true;
    else valuesRowCount = children(values, 'values').length;
  }
  return {
    target: target ?? tables[0]?.qualifiedName ?? null,
    columns,
    valuesRowCount,
    fromSelect,
    dynamicTarget: false,
  };
}

const CTAS_BODY = /\bAS\s*\(?\s*(?:SELECT|WITH)\b/i;
const CTAS_TARGET_RE = new RegExp(
  String.raw`\bCREATE\s+(?:OR\s+REPLACE\s+)?(?:\w+\s+)*?TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?([^\s(]+)`,
  'i',
);

function readCtasTarget(stmt: Node, masked: string): string | null {
  if (nodeType(stmt) !== 'create' || !CTAS_BODY.test(masked)) return null;
  return (
    children(stmt, 'table')
      .map((t) => {
        const name = str(t, 'table');
        return name ? tableRef(t, name).qualifiedName : null;
      })
      .find((t) => t !== null) ?? null
  );
}

// ---------------------------------------------------------------------------
// Model construction
// ---------------------------------------------------------------------------

const PLACEHOLDER_TRIGGER = /(=|<|>|\bIN\b|\bLIKE\b|\bBETWEEN\b|\bIS\b)/i;

interface LexicalFlags {
  hasWhere: boolean;
  hasDistinct: boolean;
  hasExists: boolean;
  hasIn: boolean;
  hasHaving: boolean;
  hasQualify: boolean;
  hasGroupBy: boolean;
  hasFetch: boolean;
}

function lexicalFlags(masked: string): LexicalFlags {
  return {
    hasWhere: /\bWHERE\b/i.test(masked),
    hasDistinct: /\bSELECT\s+DISTINCT\b/i.test(masked),
    hasExists: /\bEXISTS\s*\(/i.test(masked),
    hasIn: /\bIN\s*\(/i.test(masked),
    hasHaving: /\bHAVING\b/i.test(masked),
    hasQualify: /\bQUALIFY\b/i.test(masked),
    hasGroupBy: /\bGROUP\s+BY\b/i.test(masked),
    hasFetch: /\bFETCH\s+(?:FIRST|NEXT)\b|\bTOP\s+\d+/i.test(masked),
  };
}

function placeholderPredicate(): Predicate {
  return {
    left: 'WHERE_CLAUSE',
    right: 'HAS_CONDITIONS',
    operator: 'EXISTS',
    comparison: 'EXISTS',
    source: 'where',
    column: null,
    qualifier: null,
    wrappedBy: null,
    rightKind: 'expression',
    rightColumn: null,
  };
}

/** WHERE text of the outermost clause, masked. */
function whereText(masked: string): string {
  const m = /\bWHERE\b([\s\S]*?)(?:\bGROUP\s+BY\b|\bORDER\s+BY\b|\bHAVING\b|\bQUALIFY\b|\bLIMIT\b|$)/i.exec(masked);
  return m?.[1] ?? '';
}

function buildModel(sql: string, masked: string, kind: StatementKind, stmt: Node, dialect: string): ParsedQuery {
  const flags = lexicalFlags(masked);
  const state: WalkState = { predicates: [], hasExists: false };

  const cteNames = new Set<string>();
  const cteBodies: Node[] = [];
  for (const cte of children(stmt, 'with')) {
    const name = identifier(cte.name);
    if (name) cteNames.add(identKey(name));
    const body = unwrapStatement(cte.stmt);
    if (body) cteBodies.push(body);
  }

  const where = mainWhere(stmt);
  walkCondition(where, 'where', state, false);
  for (const body of cteBodies) walkCondition(body.where, 'cte', state, false);
  const joins = collectJoins(stmt, state);

  const astHasWhere = where !== null || collect(stmt, (n) => isNode(n.where)).length > 0;
  const hasWhere = astHasWhere || flags.hasWhere;
  if (state.predicates.length === 0 && hasWhere && PLACEHOLDER_TRIGGER.test(whereText(masked))) {
    state.predicates.push(placeholderPredicate());
  }

  const { tables, aliases } = dedupeTables(collectTables(stmt));
  const { limit, hasLimit } = readLimit(stmt);
  const hasDistinct = collect(stmt, (n) => isSelect(n) && !!n.distinct).length > 0 || flags.hasDistinct;

  return Object.freeze({
    sql,
    statementKind: kind,
    dialect,
    tables,
    aliases,
    predicates: state.predicates,
    joins,
    orderBy: collectOrderBy(stmt),
    limit,
    hasLimit: hasLimit || flags.hasFetch,
    projection: collectProjection(stmt),
    hasWhere,
    hasDistinct,
    hasExists: state.hasExists || flags.hasExists,
    hasIn: state.predicates.some((p) => p.operator === 'IN') || flags.hasIn,
    hasHaving: !!stmt.having || flags.hasHaving,
    hasQualify: flags.hasQualify,
    hasGroupBy: flags.hasGroupBy,
    usesBindVariables: hasBindVariables(sql),
    cteNames,
    insert: readInsert(stmt, tables),
    createIndex: null,
    ctasTarget: kind === 'CREATE_TABLE' ? readCtasTarget(stmt, masked) : null,
    copy: null,
    procedureName: null,
    largestLiteralLength: largestLiteralLength(sql),
  });
}

// ---------------------------------------------------------------------------
// Lexical model for statements outside the grammars (CALL, CREATE INDEX,
// COPY, and MERGE / CTAS / IDENTIFIER() targets when no grammar accepts them)
// ---------------------------------------------------------------------------

const NAME = String.raw`[A-Za-z_@"$][\w$."@/]*`;
const CREATE_INDEX_RE = new RegExp(
  String.raw`CREATE\s+(UNIQUE\s+)?INDEX\s+(?:IF\s+NOT\s+EXISTS\s+)?([^\s(]+)\s+ON\s+([^\s(]+)\s*\(([^)]+)\)`,
  'i',
);
const TABLE_POSITION_RE = new RegExp(String.raw`\b(?:FROM|JOIN|INTO|UPDATE|USING|TABLE)\s+(${NAME})`, 'gi');
const LEXICAL_PREDICATE_RE =
  /([A-Za-z_][\w$."]*)\s*(<=|>=|<>|!=|=|<|>)\s*('(?:[^']|'')*'|[^\s()]+)/g;
const NOT_A_TABLE = new Set(['SELECT', 'SET', 'TABLE', 'IDENTIFIER', 'VALUES', 'LATERAL', 'IF']);

function lexicalTableRef(name: string): TableRef {
  const parts = name.replace(/"/g, '').split('.');
  const table = parts[parts.length - 1] ?? name;
  const schema = parts.length > 1 ? (parts[parts.length - 2] ?? null) : null;
  const catalog = parts.length > 2 ? (parts[parts.length - 3] ?? null) : null;
  return { catalog, schema, name: table, alias: null, qualifiedName: parts.join('.') };
}

function lexicalTables(masked: string): TableRef[] {
  const refs: TableRef[] = [];
  for (const m of masked.matchAll(TABLE_POSITION_RE)) {
    const name = m[1] ?? '';
    if (name.startsWith('@') || NOT_A_TABLE.has(name.toUpperCase())) continue;
    refs.push(lexicalTableRef(name));
  }
  return refs;
}

function lexicalOperandKind(value: string): OperandKind {
  if (value.startsWith("'") || /^-?\d/.test(value)) return 'literal';
  if (value === '?' || /^[:$]\w+/.test(value)) return 'parameter';
  return 'column';
}

function lexicalPredicates(sql: string, source: PredicateSource): Predicate[] {
  const clause = /\b(?:WHERE|ON)\b([\s\S]*?)(?:\bWHEN\b|\bGROUP\s+BY\b|\bORDER\s+BY\b|\bLIMIT\b|$)/i.exec(sql)?.[1] ?? '';
  const out: Predicate[] = [];
  for (const m of clause.matchAll(LEXICAL_PREDICATE_RE)) {
    const [, left = '', op = '', right = ''] = m;
    const cls = operatorClass(op);
    if (cls === null) continue;
    const dot = left.lastIndexOf('.');
    const rightKind = lexicalOperandKind(right);
    out.push({
      left,
      right,
      operator: cls,
      comparison: op,
      source,
      column: bareName(left),
      qualifier: dot > 0 ? left.slice(0, dot).replace(/"/g, '') : null,
      wrappedBy: null,
      rightKind,
      rightColumn: rightKind === 'column' ? { column: bareName(right), qualifier: null } : null,
    });
  }
  return out;
}

function lexicalModel(sql: string, masked: string, kind: StatementKind): ParsedQuery {
  const flags = lexicalFlags(masked);
  let tables: TableRef[] = [];
  let predicates: Predicate[] = [];
  let createIndex: CreateIndexShape | null = null;
  let copy: CopyShape | null = null;
  let insert: InsertShape | null = null;
  let procedureName: string | null = null;
  let ctasTarget: string | null = null;

  switch (kind) {
    case 'CALL':
      procedureName = /\bCALL\s+([A-Za-z0-9_."$]+)\s*\(/i.exec(masked)?.[1] ?? null;
      break;
    case 'CREATE_INDEX': {
      const m = CREATE_INDEX_RE.exec(masked);
      if (m) {
        const table = (m[3] ?? '').replace(/"/g, '');
        createIndex = {
          unique: !!m[1],
          name: (m[2] ?? '').replace(/"/g, ''),
          table,
          columns: (m[4] ?? '')
            .split(',')
            .map((c) => bareName(c.trim().replace(/\s+(ASC|DESC)$/i, '')))
            .filter((c) => c.length > 0),
        };
        tables = [lexicalTableRef(table)];
      }
      break;
    }
    case 'COPY': {
      const target = /\bCOPY\s+INTO\s+(\S+)/i.exec(masked)?.[1] ?? '';
      const targetIsStage = target.startsWith('@') || /^''$/.test(target);
      const fromIdx = masked.search(/\bFROM\b/i);
      const source = fromIdx >= 0 ? masked.slice(fromIdx) : '';
      const sourceTables = lexicalTables(source).map((t) => t.qualifiedName);
      copy = { target, targetIsStage, sourceTables };
      tables = lexicalTables(masked);
      break;
    }
    default: {
      tables = lexicalTables(masked);
      predicates = lexicalPredicates(sql, 'where');
      if (kind === 'CREATE_TABLE' && CTAS_BODY.test(masked)) {
        const target = CTAS_TARGET_RE.exec(masked)?.[1];
        ctasTarget = target ? lexicalTableRef(target).qualifiedName : null;
      }
      if (kind === 'INSERT') {
        const rows = /\bVALUES\b([\s\S]*)$/i.exec(masked)?.[1];
        insert = {
          target: tables[0]?.qualifiedName ?? null,
          columns: [],
          valuesRowCount: rows ? rows.split(/\)\s*,\s*\(/).length : 0,
          fromSelect: /\bSELECT\b/i.test(masked),
          dynamicTarget: /\bINTO\s+IDENTIFIER\s*\(/i.test(masked),
        };
        if (insert.dynamicTarget) insert = { ...insert, target: null };
      }
    }
  }

  const { tables: deduped, aliases } = dedupeTables(tables);
  return Object.freeze({
    sql,
    statementKind: kind,
    dialect: null,
    tables: deduped,
    aliases,
    predicates,
    joins: [],
    orderBy: [],
    limit: null,
    hasLimit: /\bLIMIT\b/i.test(masked) || flags.hasFetch,
    projection: [],
    hasWhere: flags.hasWhere,
    hasDistinct: flags.hasDistinct,
    hasExists: flags.hasExists,
    hasIn: flags.hasIn,
    hasHaving: flags.hasHaving,
    hasQualify: flags.hasQualify,
    hasGroupBy: flags.hasGroupBy,
    usesBindVariables: hasBindVariables(sql),
    cteNames: new Set<string>(),
    insert,
    createIndex,
    ctasTarget,
    copy,
    procedureName,
    largestLiteralLength: largestLiteralLength(sql),
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

const ALWAYS_LEXICAL = new Set<StatementKind>(['CALL', 'CREATE_INDEX', 'COPY']);
const LEXICAL_FALLBACK = new Set<StatementKind>(['MERGE', 'CREATE_TABLE']);

type Attempt = { dialect: string; message: string };

function astify(sql: string, dialects: readonly string[], attempts: Attempt[]): { stmt: Node; dialect: string } | null {
  for (const dialect of dialects) {
    try {
      const result: unknown = sqlParser.astify(sql, { database: dialect });
      const stmt = (Array.isArray(result) ? result : [result]).find(isNode);
      if (stmt) return { stmt, dialect };
    } catch (e) {
      attempts.push({ dialect, message: e instanceof Error ? e.message : String(e) });
    }
  }
  return null;
}

/**
 * Parse one statement into a query model.
 *
 * @throws ParseError when no grammar accepts the statement and it has no
 * lexical model.
 */
export function parse(sqlText: string, options: ParseOptions = {}): ParsedQuery {
  const sql = sqlText.trim();
  if (!sql) throw new ParseError('Empty statement', sqlText);

  const masked = maskSql(sql);
  const kind = detectStatementKind(masked);
  if (ALWAYS_LEXICAL.has(kind)) return lexicalModel(sql, masked, kind);

  const dialects = options.dialects ?? config.SQL_DIALECTS;
  const attempts: Attempt[] = [];

  const direct = astify(sql, dialects, attempts);
  if (direct) return buildModel(sql, masked, kind, direct.stmt, direct.dialect);

  const preprocessed = preprocessForParser(sql);
  const retried = astify(preprocessed, dialects, attempts);
  if (retried) {
    log.debug({ dialect: retried.dialect }, 'parsed after preprocessing');
    return buildModel(sql, masked, kind, retried.stmt, retried.dialect);
  }

  if (LEXICAL_FALLBACK.has(kind) || /\bIDENTIFIER\s*\(/i.test(masked)) {
    log.debug({ kind }, 'no grammar accepted statement, using lexical model');
    return lexicalModel(sql, masked, kind);
  }

  const last = attempts[attempts.length - 1];
  throw new ParseError(`Unable to parse SQL: ${last?.message ?? 'no grammar accepted the statement'}`, sql, attempts, [
    'Check the statement for syntax errors',
    'Split multi-statement scripts and analyze one statement at a time',
  ]);
}
