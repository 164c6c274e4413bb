import type { ParsedQuery, Predicate, TableMetadata, TableRef } from './types';

// Builders for hand-made query models, shared by the rule tests.

export function tableRef(name: string, alias: string | null = null): TableRef {
  return { catalog: null, schema: null, name, alias, qualifiedName: name };
}

export function predicate(column: string, operator: Predicate['operator'], right: string, extra: Partial<Predicate> = {}): Predicate {
  const comparison = operator === 'EQ' ? '=' : operator === 'RANGE' ? '>' : operator;
  return {
    left: column,
    right,
    operator,
    comparison,
    source: 'where',
    column,
    qualifier: null,
    wrappedBy: null,
    rightKind: /^[:$?]/.test(right) ? 'parameter' : 'literal',
    rightColumn: null,
    ...extra,
  };
}

export function makeQuery(overrides: Partial<ParsedQuery> = {}): ParsedQuery {
  const tables = overrides.tables ?? [tableRef('orders')];
  return {
    sql: 'SELECT 1',
    statementKind: 'SELECT',
    dialect: 'mysql',
    aliases: {},
    predicates: [],
    joins: [],
    orderBy: [],
    limit: null,
    hasLimit: false,
    projection: [],
    hasWhere: false,
    hasDistinct: false,
    hasExists: false,
    hasIn: false,
    hasHaving: false,
    hasQualify: false,
    hasGroupBy: false,
    usesBindVariables: false,
    cteNames: new Set<string>(),
    insert: null,
    createIndex: null,
    ctasTarget: null,
    copy: null,
    procedureName: null,
    largestLiteralLength: 0,
    ...overrides,
    tables,
  };
}

export function hybridTable(primaryKey: string[], secondaryIndexes: string[][] = [], columns: Record<string, string> = {}): TableMetadata {
  return { isHybrid: true, primaryKey, secondaryIndexes, columns };
}

export function standardTable(): TableMetadata {
  return { isHybrid: false, primaryKey: [], secondaryIndexes: [], columns: {} };
}
