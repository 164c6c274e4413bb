import { UnknownActionError } from './errors';
import { suggestIndex } from './index-rules';
import { hasBindVariables, maskSql } from './sql-text';
import type { Action, ActionKind, Coverage, Finding, IndexSuggestion, RiskLevel, RuleId } from './types';

/**
 * The closed remediation vocabulary. A narrator may pick from the actions
 * built here by id; it never authors SQL of its own.
 */

interface ActionDraft {
  base: string;
  kind: ActionKind;
  table: string | null;
  columns: readonly string[];
  generatedSql: string;
  preconditions: Record<string, boolean | number | string>;
  evidenceRules: RuleId[];
  riskLevel: RiskLevel;
}

function actionId(base: string, table: string | null, ordinal: number): string {
  const tablePart = table ? `_${table.replace(/"/g, '').replace(/[^A-Za-z0-9]+/g, '_').toUpperCase()}` : '';
  return `${base}${tablePart}_${ordinal}`;
}

/** Rule ids present in the findings, in first-seen order. */
function rulesPresent(findings: readonly Finding[], ...rules: RuleId[]): RuleId[] {
  const fired = new Set(findings.map((f) => f.rule));
  return rules.filter((r) => fired.has(r));
}

/** The index suggestion some finding already computed for this table. */
function findingSuggestion(findings: readonly Finding[], table: string): IndexSuggestion | null {
  for (const f of findings) {
    switch (f.rule) {
      case 'HT_WITHOUT_INDEXES':
      case 'INDEX_MISALIGNED':
      case 'COMPOSITE_INDEX_MISALIGNED':
        if (f.evidence.table === table && f.evidence.suggestion) return f.evidence.suggestion;
        break;
      default:
        break;
    }
  }
  return null;
}

/** Rules that corroborate an index on `table`. */
function indexEvidence(findings: readonly Finding[], table: string): RuleId[] {
  const rules = new Set<RuleId>();
  for (const f of findings) {
    switch (f.rule) {
      case 'HT_WITHOUT_INDEXES':
      case 'INDEX_MISALIGNED':
      case 'INDEX_METADATA_UNKNOWN':
      case 'PRIMARY_KEY_NOT_USED':
      case 'COMPOSITE_INDEX_MISALIGNED':
        if (f.evidence.table === table) rules.add(f.rule);
        break;
      case 'MULTIPLE_HT_TABLES_NO_INDEXES':
        if (f.evidence.tables.some((t) => t.table === table)) rules.add(f.rule);
        break;
      default:
        break;
    }
  }
  return [...rules];
}

function indexDrafts(findings: readonly Finding[], coverage: readonly Coverage[]): ActionDraft[] {
  const drafts: ActionDraft[] = [];
  for (const cov of coverage) {
    if (!cov.isHybrid || cov.equalityPredicateColumns.length === 0 || cov.bestEqPrefix !== 0) continue;
    const evidenceRules = indexEvidence(findings, cov.table);
    if (evidenceRules.length === 0) continue;

    const suggestion =
      findingSuggestion(findings, cov.table) ??
      suggestIndex(cov.table, cov.equalityPredicateColumns, cov.rangePredicateColumns[0] ?? null, [], null, 0);
    const confirmed = cov.indexProvenance === 'confirmed';
    const generatedSql = confirmed
      ? suggestion.ddl
      : [
          `-- Cannot confirm the existing indexes on ${cov.table}.`,
          `-- Check manually first: SHOW INDEXES IN TABLE ${cov.table};`,
          `-- ${suggestion.ddl}`,
        ].join('\n');

    drafts.push({
      base: 'ADD_INDEX',
      kind: 'CREATE_INDEX',
      table: cov.table,
      columns: suggestion.columns,
      generatedSql,
      preconditions: {
        isHybrid: true,
        bestEqPrefix: cov.bestEqPrefix,
        indexesExist: cov.indexes.length > 0,
        indexProvenance: cov.indexProvenance,
      },
      evidenceRules,
      riskLevel: 'MEDIUM',
    });
  }
  return drafts;
}

const ORDER_BY = /\bORDER\s+BY\b/i;
const ROW_LIMIT = /\b(?:LIMIT|FETCH|TOP)\b/i;
const WHERE = /\bWHERE\b/i;

function rewriteDrafts(findings: readonly Finding[], queryText: string): ActionDraft[] {
  const drafts: ActionDraft[] = [];
  const masked = maskSql(queryText);
  const hasOrderBy = ORDER_BY.test(masked);
  const hasLimit = ROW_LIMIT.test(masked);
  const hasWhere = WHERE.test(masked);
  const boundVariables = hasBindVariables(queryText);

  const orderRules = rulesPresent(findings, 'ORDER_BY_NO_LIMIT');
  if (orderRules.length > 0 || (hasOrderBy && !hasLimit)) {
    drafts.push({
      base: 'ADD_LIMIT_ON_ORDER_BY',
      kind: 'QUERY_REWRITE',
      table: null,
      columns: [],
      generatedSql: '-- Bound the sort, e.g.\n-- LIMIT 1000\n-- or FETCH FIRST 1000 ROWS ONLY',
      preconditions: { hasOrderBy, hasLimit },
      evidenceRules: orderRules,
      riskLevel: 'LOW',
    });
  }

  const bindRules = rulesPresent(findings, 'BIND_PARAMETERS');
  if (!boundVariables && (bindRules.length > 0 || hasWhere)) {
    drafts.push({
      base: 'USE_BOUND_VARIABLES',
      kind: 'QUERY_REWRITE',
      table: null,
      columns: [],
      generatedSql: '-- Replace literal values with bind parameters:\n-- WHERE col = ?\n-- WHERE col = :1',
      preconditions: { hasBoundVariables: false, hasWhere },
      evidenceRules: bindRules,
      riskLevel: 'LOW',
    });
  }

  const sargable: { column: string; expression: string }[] = [];
  for (const f of findings) {
    if (f.rule === 'NON_SARGABLE_PREDICATES' || f.rule === 'FUNCTION_IN_JOIN_PREDICATE') {
      sargable.push(...f.evidence.predicates);
    }
  }
  if (sargable.length > 0) {
    drafts.push({
      base: 'MAKE_PREDICATES_SARGABLE',
      kind: 'QUERY_REWRITE',
      table: null,
      columns: [...new Set(sargable.map((p) => p.column))],
      generatedSql: [
        '-- Compare the bare column; move functions to the literal side or store a normalized column:',
        ...sargable.map((p) => `-- ${p.expression}`),
      ].join('\n'),
      preconditions: { wrappedPredicates: sargable.length },
      evidenceRules: rulesPresent(findings, 'NON_SARGABLE_PREDICATES', 'FUNCTION_IN_JOIN_PREDICATE'),
      riskLevel: 'LOW',
    });
  }

  const wide = findings.find((f) => f.rule === 'WIDE_SELECT');
  if (wide) {
    drafts.push({
      base: 'NARROW_PROJECTION',
      kind: 'QUERY_REWRITE',
      table: null,
      columns: [],
      generatedSql: '-- Replace SELECT * with the columns the caller reads:\n-- SELECT col_a, col_b FROM ...',
      preconditions: { selectStar: true },
      evidenceRules: ['WIDE_SELECT'],
      riskLevel: 'LOW',
    });
  }

  const filterRules = rulesPresent(findings, 'NO_WHERE_FILTER', 'NO_FILTERING_CLAUSES');
  if (filterRules.length > 0 && !hasWhere) {
    drafts.push({
      base: 'ADD_WHERE_FILTER',
      kind: 'QUERY_REWRITE',
      table: null,
      columns: [],
      generatedSql:
        '-- Add a selective filter on key or indexed columns:\n-- WHERE pk_column = ?\n-- WHERE indexed_column IN (?, ?)',
      preconditions: { hasWhere: false },
      evidenceRules: filterRules,
      riskLevel: 'LOW',
    });
  }
  return drafts;
}

function architectureDrafts(findings: readonly Finding[]): ActionDraft[] {
  const drafts: ActionDraft[] = [];

  for (const f of findings) {
    if (f.rule !== 'ANALYTIC_WORKLOAD_ON_HT') continue;
    drafts.push({
      base: 'ROUTE_ANALYTIC_TO_STANDARD_TABLE',
      kind: 'ENGINE_CHOICE',
      table: f.evidence.tables[0] ?? null,
      columns: [],
      generatedSql:
        '-- Serve scans from a columnar copy:\n-- CREATE TABLE analytics_replica AS SELECT * FROM hybrid_table;',
      preconditions: { rowsProduced: f.evidence.rowsProduced, bytesScanned: f.evidence.bytesScanned },
      evidenceRules: ['ANALYTIC_WORKLOAD_ON_HT'],
      riskLevel: 'MEDIUM',
    });
  }

  const procRules = rulesPresent(findings, 'STORED_PROCEDURE_DETECTED', 'STORED_PROC_BOTTLENECK');
  if (procRules.length > 0) {
    drafts.push({
      base: 'REFACTOR_STORED_PROCEDURE',
      kind: 'ARCHITECTURE_CHANGE',
      table: null,
      columns: [],
      generatedSql: [
        '-- Rewrite the procedure body as set-based SQL:',
        '-- replace row-by-row loops with INSERT ... SELECT or MERGE',
        '-- and run the equivalent statements directly first',
      ].join('\n'),
      preconditions: { isStoredProcedure: true },
      evidenceRules: procRules,
      riskLevel: 'HIGH',
    });
  }

  for (const f of findings) {
    if (f.rule === 'HT_PURGE_PATTERN_DETECTED') {
      drafts.push({
        base: 'BATCH_PURGE_OPERATIONS',
        kind: 'ARCHITECTURE_CHANGE',
        table: f.evidence.table,
        columns: [...f.evidence.equalityColumns, ...f.evidence.timeColumns],
        generatedSql: [
          '-- Delete in bounded batches and pause between them:',
          `-- DELETE FROM ${f.evidence.table ?? 'hybrid_table'} WHERE ... LIMIT 1000;`,
        ].join('\n'),
        preconditions: { isPurgePattern: true },
        evidenceRules: ['HT_PURGE_PATTERN_DETECTED'],
        riskLevel: 'MEDIUM',
      });
    } else if (f.rule === 'SINGLE_ROW_VALUES_INSERT') {
      drafts.push({
        base: 'BATCH_SINGLE_ROW_INSERTS',
        kind: 'ARCHITECTURE_CHANGE',
        table: f.evidence.table,
        columns: [],
        generatedSql: [
          '-- Send many rows per statement:',
          `-- INSERT INTO ${f.evidence.table ?? 'hybrid_table'} VALUES (...), (...), (...);`,
        ].join('\n'),
        preconditions: { valuesRows: f.evidence.rows },
        evidenceRules: ['SINGLE_ROW_VALUES_INSERT'],
        riskLevel: 'MEDIUM',
      });
    }
  }

  const throttled = findings.find((f) => f.rule === 'HT_REQUEST_THROTTLING');
  if (throttled) {
    drafts.push({
      base: 'MITIGATE_HT_THROTTLING',
      kind: 'WORKLOAD_MANAGEMENT',
      table: null,
      columns: [],
      generatedSql: '-- Rate-limit requests against the hybrid tables and batch them with pauses between batches',
      preconditions: { isThrottled: true },
      evidenceRules: ['HT_REQUEST_THROTTLING'],
      riskLevel: 'MEDIUM',
    });
  }
  return drafts;
}

/**
 * Build the candidate actions for one analyzed statement. Every action is
 * backed by at least one finding or a textual signal in `preconditions`.
 */
export function buildActions(findings: readonly Finding[], coverage: readonly Coverage[], queryText: string): Action[] {
  const drafts = [
    ...indexDrafts(findings, coverage),
    ...rewriteDrafts(findings, queryText),
    ...architectureDrafts(findings),
  ];

  const ordinals = new Map<string, number>();
  return drafts.map(({ base, ...draft }) => {
    const key = `${base}|${draft.table ?? ''}`;
    const ordinal = (ordinals.get(key) ?? 0) + 1;
    ordinals.set(key, ordinal);
    return Object.freeze({ id: actionId(base, draft.table, ordinal), ...draft });
  });
}

/** Look up actions by id; referencing an id that was never built is an error. */
export function resolveActions(actions: readonly Action[], ids: readonly string[]): Action[] {
  const byId = new Map(actions.map((a) => [a.id, a]));
  return ids.map((id) => {
    const action = byId.get(id);
    if (!action) throw new UnknownActionError(id);
    return action;
  });
}
