import { config } from '../config';
import { predicateColumns, tableRefFor } from './coverage';
import { RuleEvaluationSkipped } from './errors';
import { countFunctionCalls, identKey, maskSql } from './sql-text';
import type {
  Coverage,
  FindingEvidenceMap,
  FindingOf,
  Finding,
  ParsedQuery,
  RuleCategory,
  RuleId,
  RuntimeMetadata,
  Severity,
  StatementKind,
} from './types';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export interface RuleSettings {
  /** Runtime row count under which a covering INCLUDE list is suggested */
  includeMaxRows: number;
  /** ORDER BY without LIMIT is not reported at or below this many rows */
  smallSortRows: number;
}

export function defaultRuleSettings(): RuleSettings {
  return { includeMaxRows: config.INCLUDE_MAX_ROWS, smallSortRows: config.SMALL_SORT_ROWS };
}

export type Rule = (
  query: ParsedQuery,
  coverage: readonly Coverage[],
  runtime: RuntimeMetadata,
  settings: RuleSettings,
) => Finding[];

/** Every rule id must be categorized; the ranking bonuses key off the category. */
export const RULE_CATEGORY: Record<RuleId, RuleCategory> = {
  NO_FILTERING_CLAUSES: 'filter',
  NO_WHERE_FILTER: 'filter',
  JOIN_WITHOUT_ON: 'join',
  DISTINCT_UNNECESSARY: 'sort',
  ORDER_BY_NO_LIMIT: 'sort',
  NON_SARGABLE_PREDICATES: 'filter',
  FUNCTION_IN_JOIN_PREDICATE: 'join',
  CASE_TRANSFORM_HEAVY: 'filter',
  WIDE_SELECT: 'projection',
  BIND_PARAMETERS: 'workload',
  TYPE_MISMATCH: 'filter',
  JOIN_PATTERN: 'join',
  MIXED_HT_AND_STANDARD_TABLES: 'architecture',
  INDEX_METADATA_UNKNOWN: 'metadata',
  HT_WITHOUT_INDEXES: 'index',
  MULTIPLE_HT_TABLES_NO_INDEXES: 'index',
  INDEX_MISALIGNED: 'index',
  PRIMARY_KEY_NOT_USED: 'index',
  ORDER_MISALIGNED: 'sort',
  COMPOSITE_INDEX_MISALIGNED: 'index',
  COMPOSITE_INDEX_PARTIAL_PREFIX: 'index',
  HT_PURGE_PATTERN_DETECTED: 'write',
  STORED_PROCEDURE_DETECTED: 'architecture',
  STORED_PROC_BOTTLENECK: 'architecture',
  SINGLE_ROW_VALUES_INSERT: 'write',
  HT_PK_NOT_IN_INSERT: 'write',
  HT_WRITE_AMPLIFICATION: 'write',
  DYNAMIC_IDENTIFIER_TARGET: 'workload',
  LARGE_LITERAL_PAYLOAD: 'write',
  COPY_INTO_STAGE_FROM_HT: 'architecture',
  HT_PRIMARY_KEY_ALREADY_EXISTS_CTAS: 'write',
  CREATE_INDEX_REDUNDANT: 'index',
  CREATE_INDEX_REDUNDANT_PREFIX: 'index',
  CREATE_INDEX_ON_STANDARD_TABLE: 'index',
  CREATE_INDEX_HT_WRITE_COST: 'write',
  CREATE_INDEX_LOOKS_GOOD: 'index',
  HT_REQUEST_THROTTLING: 'workload',
  ANALYTIC_WORKLOAD_ON_HT: 'architecture',
};

export function finding<R extends RuleId>(
  rule: R,
  severity: Severity,
  message: string,
  suggestion: string,
  evidence: FindingEvidenceMap[R],
): FindingOf<R> {
  return Object.freeze({ rule, severity, category: RULE_CATEGORY[rule], message, suggestion, evidence });
}

export function hybridCoverage(coverage: readonly Coverage[]): Coverage[] {
  return coverage.filter((c) => c.isHybrid);
}

/** SELECT/UPDATE/DELETE are filterable; bulk loads and DDL are not. */
const FILTERABLE = new Set<StatementKind>(['SELECT', 'UPDATE', 'DELETE']);

const NON_SARGABLE_FUNCTIONS = [
  'UPPER',
  'LOWER',
  'DATE',
  'CAST',
  'TRY_CAST',
  'CONVERT',
  'COALESCE',
  'NVL',
  'IFNULL',
  'SUBSTR',
  'SUBSTRING',
  'TO_CHAR',
  'TO_VARCHAR',
  'TO_DATE',
  'TO_TIMESTAMP',
  'TRIM',
  'LTRIM',
  'RTRIM',
  'DATE_TRUNC',
] as const;
const NON_SARGABLE_SET = new Set<string>(NON_SARGABLE_FUNCTIONS);

const STANDARD_TABLE_HINTS = /INFORMATION_SCHEMA|ACCOUNT_USAGE|_STANDARD\b|_STD\b/i;

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

export function checkNoFilteringClauses(query: ParsedQuery): Finding[] {
  if (!FILTERABLE.has(query.statementKind) || query.tables.length === 0) return [];
  if (query.hasWhere || query.hasIn || query.hasExists || query.hasHaving || query.hasQualify) return [];
  return [
    finding(
      'NO_FILTERING_CLAUSES',
      'HIGH',
      'The statement has no WHERE, IN, EXISTS, HAVING or QUALIFY clause, so it reads every row of every table it touches.',
      'Add a selective WHERE predicate, ideally an equality on the leading primary key or index columns.',
      { statementKind: query.statementKind, tables: query.tables.map((t) => t.qualifiedName) },
    ),
  ];
}

export function checkNoWhereFilter(query: ParsedQuery): Finding[] {
  if (!FILTERABLE.has(query.statementKind) || query.tables.length === 0 || query.hasWhere) return [];
  const narrowedBy = [
    ...(query.hasIn ? ['IN'] : []),
    ...(query.hasExists ? ['EXISTS'] : []),
    ...(query.hasHaving ? ['HAVING'] : []),
    ...(query.hasQualify ? ['QUALIFY'] : []),
  ];
  // no narrowing at all is NO_FILTERING_CLAUSES
  if (narrowedBy.length === 0) return [];
  return [
    finding(
      'NO_WHERE_FILTER',
      'MEDIUM',
      `No WHERE clause; rows are only narrowed by ${narrowedBy.join(', ')} after they have been read.`,
      'Push the narrowing condition into a WHERE predicate so the scan itself is bounded.',
      { statementKind: query.statementKind, narrowedBy },
    ),
  ];
}

export function checkNonSargablePredicates(query: ParsedQuery): Finding[] {
  const masked = maskSql(query.sql);
  const mayWrap = countFunctionCalls(masked, NON_SARGABLE_FUNCTIONS) > 0 || masked.includes('::');

  const hits: { column: string; wrappedBy: string; expression: string }[] = [];
  for (const p of query.predicates) {
    if (p.column === null || p.source === 'join_on') continue;
    if (p.wrappedBy !== null) {
      const known = (mayWrap && NON_SARGABLE_SET.has(p.wrappedBy)) || p.wrappedBy === 'ARITHMETIC';
      if (known) hits.push({ column: p.column, wrappedBy: p.wrappedBy, expression: `${p.left} ${p.comparison} ${p.right}` });
    } else if (/LIKE$/i.test(p.comparison) && p.right.startsWith("'%")) {
      hits.push({ column: p.column, wrappedBy: 'LEADING_WILDCARD', expression: `${p.left} ${p.comparison} ${p.right}` });
    }
  }
  if (hits.length === 0) return [];

  const cols = [...new Set(hits.map((h) => h.column))];
  return [
    finding(
      'NON_SARGABLE_PREDICATES',
      'HIGH',
      `Predicates on ${cols.join(', ')} wrap the column side in a function or expression, which prevents index seeks.`,
      'Compare the bare column against a transformed literal instead (e.g. col = UPPER(:v)), store a normalized column, or avoid leading wildcards.',
      { predicates: hits },
    ),
  ];
}

export function checkFunctionInJoinPredicate(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  if (hybridCoverage(coverage).length === 0) return [];
  // pre-filter: a function call somewhere after ON
  if (!/\bON\b[\s\S]*?\b[A-Za-z_]\w*\s*\(/i.test(maskSql(query.sql))) return [];

  const hits = query.predicates
    .filter((p) => p.source === 'join_on' && p.column !== null && p.wrappedBy !== null)
    .map((p) => ({ column: p.column ?? '', wrappedBy: p.wrappedBy ?? '', expression: `${p.left} ${p.comparison} ${p.right}` }));
  if (hits.length === 0) return [];
  return [
    finding(
      'FUNCTION_IN_JOIN_PREDICATE',
      'HIGH',
      `Join condition applies ${[...new Set(hits.map((h) => h.wrappedBy))].join(', ')} to a join key, so the hybrid table cannot be probed by index.`,
      'Join on the raw key columns; normalize values at write time if the keys need transforming.',
      { predicates: hits },
    ),
  ];
}

export function checkCaseTransformHeavy(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  if (hybridCoverage(coverage).length === 0) return [];
  const count = countFunctionCalls(maskSql(query.sql), ['UPPER', 'LOWER']);
  if (count < 3) return [];
  return [
    finding(
      'CASE_TRANSFORM_HEAVY',
      count >= 10 ? 'HIGH' : 'MEDIUM',
      `${count} UPPER/LOWER calls suggest case-inconsistent data being normalized at query time.`,
      'Normalize case once on write (or in a generated column) and compare raw values in queries.',
      { count },
    ),
  ];
}

export function checkTypeMismatch(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  if (coverage.every((c) => Object.keys(c.columnTypes).length === 0)) {
    throw new RuleEvaluationSkipped('TYPE_MISMATCH', 'column types');
  }

  const mismatches: FindingEvidenceMap['TYPE_MISMATCH']['mismatches'] = [];
  for (const cov of coverage) {
    const table = tableRefFor(query, cov);
    if (!table) continue;
    const types = new Map(Object.entries(cov.columnTypes).map(([name, type]) => [identKey(name), type]));
    for (const p of query.predicates) {
      if (p.rightKind !== 'literal' || p.wrappedBy !== null) continue;
      for (const column of predicateColumns(query, p, table)) {
        const declaredType = types.get(identKey(column));
        if (!declaredType) continue;
        const numericColumn = /^(NUMBER|INT|INTEGER|BIGINT|SMALLINT|TINYINT|DECIMAL|NUMERIC|FLOAT|DOUBLE|REAL)\b/i.test(declaredType);
        const textColumn = /^(VARCHAR|CHAR|CHARACTER|STRING|TEXT)\b/i.test(declaredType);
        const stringLiteral = p.right.startsWith("'");
        const numberLiteral = /^-?\d+(\.\d+)?$/.test(p.right);
        if ((numericColumn && stringLiteral) || (textColumn && numberLiteral)) {
          mismatches.push({ table: cov.table, column, declaredType, literal: p.right });
        }
      }
    }
  }
  if (mismatches.length === 0) return [];
  return [
    finding(
      'TYPE_MISMATCH',
      'MEDIUM',
      `Literal types do not match declared column types (${mismatches.map((m) => `${m.column} ${m.declaredType}`).join(', ')}); the implicit cast can disable index use.`,
      'Pass literals or bind values of the column\'s declared type.',
      { mismatches },
    ),
  ];
}

// ---------------------------------------------------------------------------
// Joins, ordering, projection
// ---------------------------------------------------------------------------

const CONDITIONAL_JOINS = /^(INNER|LEFT|RIGHT|FULL)( OUTER)?$/;

export function checkJoinWithoutOn(query: ParsedQuery): Finding[] {
  const bare = query.joins.filter((j) => CONDITIONAL_JOINS.test(j.kind) && j.onCondition === null);
  if (bare.length === 0) return [];
  return [
    finding(
      'JOIN_WITHOUT_ON',
      'HIGH',
      'A JOIN has no ON or USING condition, which degenerates into a Cartesian product.',
      'Add the join condition, or write CROSS JOIN explicitly if the product is intended.',
      { joins: bare.map((j) => `${j.kind} JOIN ${j.table ?? '?'}`) },
    ),
  ];
}

export function checkJoinPattern(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  const findings: Finding[] = [];
  for (const cov of hybridCoverage(coverage)) {
    const table = tableRefFor(query, cov);
    if (!table || cov.indexes.length === 0) continue;
    const joinColumns = [
      ...new Set(
        query.predicates.filter((p) => p.source === 'join_on').flatMap((p) => predicateColumns(query, p, table)),
      ),
    ];
    if (joinColumns.length === 0) continue;
    const keys = new Set(joinColumns.map(identKey));
    const leads = cov.indexes.some((idx) => idx[0] !== undefined && keys.has(identKey(idx[0])));
    if (leads) continue;
    findings.push(
      finding(
        'JOIN_PATTERN',
        'MEDIUM',
        `Join columns ${joinColumns.join(', ')} on hybrid table ${cov.table} do not lead any index, so each probe scans.`,
        `Add an index on ${cov.table} leading with the join key, or join on the primary key.`,
        { table: cov.table, joinColumns, indexes: cov.indexes.map((i) => [...i]) },
      ),
    );
  }
  return findings;
}

export function checkDistinctUnnecessary(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  if (!query.hasDistinct || query.tables.length !== 1 || query.joins.length > 0) return [];
  const cov = coverage[0];
  if (!cov || cov.primaryKey.length === 0) return [];
  const projected = new Set(query.projection.map(identKey));
  if (!cov.primaryKey.every((c) => projected.has(identKey(c)))) return [];
  return [
    finding(
      'DISTINCT_UNNECESSARY',
      'HIGH',
      `DISTINCT over ${cov.table} projects the full primary key, so rows are already unique and the de-duplication sort is wasted.`,
      'Remove DISTINCT.',
      { table: cov.table, primaryKey: [...cov.primaryKey] },
    ),
  ];
}

export function checkOrderByNoLimit(
  query: ParsedQuery,
  coverage: readonly Coverage[],
  runtime: RuntimeMetadata,
  settings: RuleSettings,
): Finding[] {
  if (query.statementKind !== 'SELECT' || query.orderBy.length === 0 || query.hasLimit) return [];
  const rowsProduced = runtime.rowsProduced ?? null;
  if (rowsProduced !== null && rowsProduced <= settings.smallSortRows) return [];

  const orderByColumns = query.orderBy.map((o) => o.column);
  const indexAligned = hybridCoverage(coverage).some((c) => c.orderByPrefix > 0);
  const size = rowsProduced !== null ? ` of ${rowsProduced.toLocaleString('en-US')} rows` : '';
  return [
    finding(
      'ORDER_BY_NO_LIMIT',
      'HIGH',
      `ORDER BY ${orderByColumns.join(', ')} without LIMIT sorts the full result${size} before returning anything.`,
      'Add a LIMIT (or FETCH FIRST n ROWS ONLY) for top-N access, or drop the ORDER BY if order is not needed.',
      { orderByColumns, rowsProduced, indexAligned },
    ),
  ];
}

export function checkWideSelect(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  if (query.statementKind !== 'SELECT') return [];
  if (!query.projection.some((c) => c === '*' || c.endsWith('.*'))) return [];
  const hybrid = hybridCoverage(coverage).length > 0;
  return [
    finding(
      'WIDE_SELECT',
      hybrid ? 'MEDIUM' : 'LOW',
      hybrid
        ? 'SELECT * on a hybrid table fetches whole rows from the row store and prevents covering-index reads.'
        : 'SELECT * reads every column.',
      'List only the columns the caller needs.',
      { projection: [...query.projection] },
    ),
  ];
}

// ---------------------------------------------------------------------------
// Workload shape
// ---------------------------------------------------------------------------

export function checkBindParameters(query: ParsedQuery): Finding[] {
  if (query.usesBindVariables) return [];
  const literal = query.predicates.filter(
    (p) => p.rightKind === 'literal' && p.column !== null && (p.operator === 'EQ' || p.operator === 'IN' || p.operator === 'RANGE'),
  );
  if (literal.length < 2) return [];
  const columns = [...new Set(literal.map((p) => p.column ?? ''))];
  return [
    finding(
      'BIND_PARAMETERS',
      'MEDIUM',
      `${literal.length} predicates compare against inline literals; every distinct value compiles a new plan.`,
      'Use bind variables (?, :name) so the plan is compiled once and reused.',
      { literalPredicates: literal.length, columns },
    ),
  ];
}

export function checkMixedTables(_query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  const hybridTables = hybridCoverage(coverage).map((c) => c.table);
  if (hybridTables.length === 0) return [];
  const standardTables = coverage
    .filter((c) => !c.isHybrid && (c.metadataSource !== 'none' || STANDARD_TABLE_HINTS.test(c.table)))
    .map((c) => c.table);
  if (standardTables.length === 0) return [];
  return [
    finding(
      'MIXED_HT_AND_STANDARD_TABLES',
      'MEDIUM',
      `The statement mixes hybrid tables (${hybridTables.join(', ')}) with standard tables (${standardTables.join(', ')}); data moves between engines and the hybrid side loses point-lookup behavior.`,
      'Keep operational lookups on hybrid tables and analytic joins on standard tables, or replicate the small side.',
      { hybridTables, standardTables },
    ),
  ];
}
