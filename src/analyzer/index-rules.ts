import { eqPrefix, normalizePredicates, tableRefFor } from './coverage';
import { finding, hybridCoverage, type RuleSettings } from './rules';
import { bareName, identKey } from './sql-text';
import type { Coverage, Finding, IndexSuggestion, ParsedQuery, RuntimeMetadata } from './types';

const MAX_IDENTIFIER_LENGTH = 63;
const MAX_INCLUDE_COLUMNS = 10;

// ---------------------------------------------------------------------------
// DDL generation
// ---------------------------------------------------------------------------

/**
 * Equality columns first, in query order, then the first range column.
 * Projected columns become an INCLUDE list only when the result is small.
 */
export function suggestIndex(
  table: string,
  equalityColumns: readonly string[],
  rangeColumn: string | null,
  projection: readonly string[],
  rowsProduced: number | null,
  includeMaxRows: number,
): IndexSuggestion {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const col of [...equalityColumns, ...(rangeColumn ? [rangeColumn] : [])]) {
    const key = identKey(col);
    if (seen.has(key)) continue;
    seen.add(key);
    columns.push(col);
  }

  let include: string[] = [];
  if (rowsProduced !== null && rowsProduced < includeMaxRows) {
    include = [...new Set(projection)].filter(
      (c) => /^[A-Za-z_][\w$]*$/.test(c) && !seen.has(identKey(c)),
    );
    if (include.length > MAX_INCLUDE_COLUMNS) include = [];
  }

  const name = `idx_${bareName(table)}_${columns.map(bareName).join('_')}`
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_')
    .slice(0, MAX_IDENTIFIER_LENGTH);
  const includeClause = include.length > 0 ? ` INCLUDE (${include.join(', ')})` : '';
  return {
    table,
    columns,
    include,
    ddl: `CREATE INDEX ${name} ON ${table} (${columns.join(', ')})${includeClause};`,
  };
}

function suggestionFor(cov: Coverage, query: ParsedQuery, runtime: RuntimeMetadata, settings: RuleSettings): IndexSuggestion | null {
  if (cov.equalityPredicateColumns.length === 0) return null;
  return suggestIndex(
    cov.table,
    cov.equalityPredicateColumns,
    cov.rangePredicateColumns[0] ?? null,
    query.projection,
    runtime.rowsProduced ?? null,
    settings.includeMaxRows,
  );
}

/** Remediation text; hedged when the index list was not confirmed. */
function remediation(cov: Coverage, advice: string, ddl: string | null): string {
  if (cov.indexProvenance === 'unknown') {
    const candidate = ddl ? ` Candidate if no matching index exists: ${ddl}` : '';
    return `Cannot confirm the existing indexes on ${cov.table}; check manually with SHOW INDEXES IN TABLE ${cov.table} first.${candidate}`;
  }
  return ddl ? `${advice}: ${ddl}` : `${advice}.`;
}

const LOOKUP_STATEMENTS = new Set(['SELECT', 'UPDATE', 'DELETE', 'MERGE']);

// ---------------------------------------------------------------------------
// Index existence and alignment
// ---------------------------------------------------------------------------

export function checkIndexMetadataUnknown(_query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  return hybridCoverage(coverage)
    .filter((c) => c.indexProvenance === 'unknown' && c.indexes.length === 0)
    .map((c) =>
      finding(
        'INDEX_METADATA_UNKNOWN',
        'INFO',
        `Cannot confirm whether hybrid table ${c.table} has indexes: the metadata source did not report index definitions.`,
        `Check manually with SHOW INDEXES IN TABLE ${c.table} before acting on index recommendations.`,
        { table: c.table, equalityColumns: [...c.equalityPredicateColumns] },
      ),
    );
}

export function checkHtWithoutIndexes(
  query: ParsedQuery,
  coverage: readonly Coverage[],
  runtime: RuntimeMetadata,
  settings: RuleSettings,
): Finding[] {
  return hybridCoverage(coverage)
    .filter((c) => c.indexProvenance === 'confirmed' && c.indexes.length === 0)
    .map((c) => {
      const suggestion = suggestionFor(c, query, runtime, settings);
      return finding(
        'HT_WITHOUT_INDEXES',
        'CRITICAL',
        `Hybrid table ${c.table} has no primary key or secondary index; every access is a full scan of the row store.`,
        suggestion ? `Create an index matching the predicates: ${suggestion.ddl}` : `Define a primary key on ${c.table}.`,
        { table: c.table, equalityColumns: [...c.equalityPredicateColumns], suggestion },
      );
    });
}

export function checkIndexMisaligned(
  query: ParsedQuery,
  coverage: readonly Coverage[],
  runtime: RuntimeMetadata,
  settings: RuleSettings,
): Finding[] {
  return hybridCoverage(coverage)
    .filter((c) => c.indexes.length > 0 && c.equalityPredicateColumns.length > 0 && c.bestEqPrefix === 0)
    .map((c) => {
      const suggestion = suggestionFor(c, query, runtime, settings);
      const hedge = c.indexProvenance === 'unknown' ? ' (index list may be incomplete)' : '';
      return finding(
        'INDEX_MISALIGNED',
        'HIGH',
        `Equality predicates on ${c.equalityPredicateColumns.join(', ')} do not match the leading column of any index on ${c.table}${hedge}.`,
        suggestion
          ? remediation(c, 'Reorder an existing index or add one leading with the equality columns', suggestion.ddl)
          : remediation(c, 'Reorder an existing index so the equality columns lead', null),
        {
          table: c.table,
          equalityColumns: [...c.equalityPredicateColumns],
          indexes: c.indexes.map((i) => [...i]),
          suggestion,
        },
      );
    });
}

export function checkPrimaryKeyNotUsed(
  query: ParsedQuery,
  coverage: readonly Coverage[],
  runtime: RuntimeMetadata,
): Finding[] {
  if (!LOOKUP_STATEMENTS.has(query.statementKind)) return [];
  const rows = runtime.rowsProduced ?? 0;
  return hybridCoverage(coverage)
    .filter((c) => c.primaryKey.length > 0 && c.pkEqPrefix === 0)
    .map((c) => {
      const noEquality = c.equalityPredicateColumns.length === 0;
      return finding(
        'PRIMARY_KEY_NOT_USED',
        noEquality || rows > 10_000 ? 'MEDIUM' : 'INFO',
        noEquality
          ? `No equality predicate on ${c.table}; its primary key (${c.primaryKey.join(', ')}) cannot be used for a point lookup.`
          : `Predicates on ${c.table} do not constrain the leading primary key column ${c.primaryKey[0] ?? ''}.`,
        `Filter on ${c.primaryKey.join(', ')} with equality where the access pattern allows it.`,
        { table: c.table, primaryKey: [...c.primaryKey], equalityColumns: [...c.equalityPredicateColumns] },
      );
    });
}

export function checkOrderMisaligned(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  if (query.orderBy.length === 0) return [];
  return hybridCoverage(coverage)
    .filter((c) => c.bestIndex !== null && c.orderByPrefix === 0)
    .map((c) =>
      finding(
        'ORDER_MISALIGNED',
        'MEDIUM',
        `ORDER BY ${query.orderBy.map((o) => o.column).join(', ')} does not follow the best index on ${c.table} (${(c.bestIndex ?? []).join(', ')}), so rows are sorted after the lookup.`,
        'Order by the index columns, or extend the index with the ORDER BY columns after the equality columns.',
        {
          table: c.table,
          orderByColumns: query.orderBy.map((o) => o.column),
          bestIndex: [...(c.bestIndex ?? [])],
        },
      ),
    );
}

// ---------------------------------------------------------------------------
// Composite indexes
// ---------------------------------------------------------------------------

export function checkCompositeIndexes(
  query: ParsedQuery,
  coverage: readonly Coverage[],
  runtime: RuntimeMetadata,
  settings: RuleSettings,
): Finding[] {
  const findings: Finding[] = [];
  for (const cov of hybridCoverage(coverage)) {
    const table = tableRefFor(query, cov);
    const equalityColumns = [...cov.equalityPredicateColumns];
    if (!table || equalityColumns.length === 0) continue;

    const classes = normalizePredicates(query, table, cov.columnTypes);
    const suggestion = suggestIndex(
      cov.table,
      equalityColumns,
      cov.rangePredicateColumns[0] ?? null,
      query.projection,
      runtime.rowsProduced ?? null,
      settings.includeMaxRows,
    );

    // another index may already serve the predicates; each composite index is still judged on its own
    const served = cov.bestIndex !== null && cov.bestEqPrefix >= equalityColumns.length;
    for (const index of cov.indexes.filter((i) => i.length > 1)) {
      const prefix = eqPrefix(index, classes).eqPrefix;
      const evidence = { table: cov.table, index: [...index], eqPrefix: prefix, equalityColumns, suggestion };
      const advice = (fallback: string): string =>
        served
          ? remediation(
              cov,
              `Index (${(cov.bestIndex ?? []).join(', ')}) already serves these predicates; reorder (${index.join(', ')}) so equality columns lead, or drop it if no other query needs its current order`,
              null,
            )
          : remediation(cov, fallback, suggestion.ddl);
      if (prefix === 0) {
        findings.push(
          finding(
            'COMPOSITE_INDEX_MISALIGNED',
            'HIGH',
            `Composite index (${index.join(', ')}) on ${cov.table} is not usable: its leading column ${index[0] ?? ''} has no equality predicate.`,
            advice('Reorder so equality columns lead'),
            evidence,
          ),
        );
      } else if (prefix < index.length && prefix < equalityColumns.length) {
        findings.push(
          finding(
            'COMPOSITE_INDEX_PARTIAL_PREFIX',
            'MEDIUM',
            `Only ${prefix} of ${index.length} columns of index (${index.join(', ')}) on ${cov.table} are matched by equality; remaining predicates are filtered after the seek.`,
            advice('Consider'),
            evidence,
          ),
        );
      }
    }
  }
  return findings;
}
