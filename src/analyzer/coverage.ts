import { identKey } from './sql-text';
import type {
  Coverage,
  IndexProvenance,
  MetadataSource,
  ParsedQuery,
  PlanIndexMetadata,
  Predicate,
  TableMetadata,
  TableRef,
} from './types';

export type PredicateClass = 'EQ' | 'RANGE';

export interface ScoreOptions {
  /**
   * The execution touched a hybrid table. Tables without metadata are then
   * scored as hybrid with unknown index provenance.
   */
  assumeHybrid?: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Look a table up by qualified name first, then by short name. */
export function lookupTable<T>(byTable: Readonly<Record<string, T>>, table: TableRef | string): T | undefined {
  const qualified = typeof table === 'string' ? table : table.qualifiedName;
  const want = qualified.replace(/"/g, '').toUpperCase();
  const short = identKey(qualified);
  let byShort: T | undefined;
  for (const [name, value] of Object.entries(byTable)) {
    const key = name.replace(/"/g, '').toUpperCase();
    if (key === want) return value;
    if (byShort === undefined && identKey(name) === short) byShort = value;
  }
  return byShort;
}

function qualifierMatches(query: ParsedQuery, qualifier: string | null, table: TableRef): boolean {
  if (qualifier === null) return true;
  const key = identKey(qualifier);
  const resolved = query.aliases[key] ?? key;
  return resolved === identKey(table.name);
}

/** Columns a predicate constrains on `table`: the left column, plus the right side of a join key. */
export function predicateColumns(query: ParsedQuery, p: Predicate, table: TableRef): string[] {
  const cols: string[] = [];
  if (p.column !== null && p.wrappedBy === null && qualifierMatches(query, p.qualifier, table)) {
    cols.push(p.column);
  }
  if (p.source === 'join_on' && p.rightColumn && qualifierMatches(query, p.rightColumn.qualifier, table)) {
    cols.push(p.rightColumn.column);
  }
  return cols;
}

function hasColumn(columnTypes: Readonly<Record<string, string>>, column: string): boolean {
  const names = Object.keys(columnTypes);
  if (names.length === 0) return true;
  const key = identKey(column);
  return names.some((n) => identKey(n) === key);
}

/**
 * Column -> EQ | RANGE for one table. IN counts as equality; RANGE wins when
 * a column carries both.
 */
export function normalizePredicates(
  query: ParsedQuery,
  table: TableRef,
  columnTypes: Readonly<Record<string, string>> = {},
): Map<string, PredicateClass> {
  const classes = new Map<string, PredicateClass>();
  for (const p of query.predicates) {
    let cls: PredicateClass;
    if (p.operator === 'EQ' || p.operator === 'IN') cls = 'EQ';
    else if (p.operator === 'RANGE') cls = 'RANGE';
    else continue;
    for (const column of predicateColumns(query, p, table)) {
      if (!hasColumn(columnTypes, column)) continue;
      const key = identKey(column);
      if (classes.get(key) !== 'RANGE') classes.set(key, cls);
    }
  }
  return classes;
}

/**
 * Leftmost-prefix matching: count leading index columns constrained by
 * equality. The walk stops at the first column that is RANGE or absent;
 * that position is reported as firstRangePosition.
 */
export function eqPrefix(
  index: readonly string[],
  classes: ReadonlyMap<string, PredicateClass>,
): { eqPrefix: number; firstRangePosition: number | null } {
  let eq = 0;
  for (const [i, col] of index.entries()) {
    if (classes.get(identKey(col)) !== 'EQ') return { eqPrefix: eq, firstRangePosition: i };
    eq++;
  }
  return { eqPrefix: eq, firstRangePosition: null };
}

function orderByPrefix(query: ParsedQuery, index: readonly string[]): number {
  let n = 0;
  for (const [i, item] of query.orderBy.entries()) {
    const col = index[i];
    if (col === undefined || identKey(col) !== identKey(item.column)) break;
    n++;
  }
  return n;
}

function columnsInOrder(query: ParsedQuery, table: TableRef, classes: ReadonlyMap<string, PredicateClass>, want: PredicateClass): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const p of query.predicates) {
    for (const column of predicateColumns(query, p, table)) {
      const key = identKey(column);
      if (classes.get(key) === want && !seen.has(key)) {
        seen.add(key);
        out.push(column);
      }
    }
  }
  return out;
}

interface IndexSource {
  isHybrid: boolean;
  primaryKey: readonly string[];
  secondaryIndexes: readonly (readonly string[])[];
  columns: Readonly<Record<string, string>>;
  indexProvenance: IndexProvenance;
  metadataSource: MetadataSource;
}

function buildCoverage(query: ParsedQuery, table: TableRef, source: IndexSource, derivedFrom: Coverage | null): Coverage {
  const classes = normalizePredicates(query, table, source.columns);
  const indexes = [...(source.primaryKey.length > 0 ? [source.primaryKey] : []), ...source.secondaryIndexes].filter(
    (idx) => idx.length > 0,
  );

  let bestIndex: readonly string[] | null = null;
  let bestEqPrefix = 0;
  let firstRangePosition: number | null = null;
  for (const idx of indexes) {
    const scored = eqPrefix(idx, classes);
    // strictly greater: the first index reaching a count keeps it
    if (bestIndex === null || scored.eqPrefix > bestEqPrefix) {
      bestIndex = idx;
      bestEqPrefix = scored.eqPrefix;
      firstRangePosition = scored.firstRangePosition;
    }
  }

  return Object.freeze({
    table: table.qualifiedName,
    isHybrid: source.isHybrid,
    primaryKey: source.primaryKey,
    indexes,
    bestIndex,
    bestEqPrefix,
    firstRangePosition,
    orderByPrefix: bestIndex ? orderByPrefix(query, bestIndex) : 0,
    pkEqPrefix: eqPrefix(source.primaryKey, classes).eqPrefix,
    equalityPredicateColumns: columnsInOrder(query, table, classes, 'EQ'),
    rangePredicateColumns: columnsInOrder(query, table, classes, 'RANGE'),
    columnTypes: source.columns,
    indexProvenance: source.indexProvenance,
    metadataSource: source.metadataSource,
    derivedFrom,
  });
}

function scoredTables(query: ParsedQuery): TableRef[] {
  return query.tables.filter((t) => !query.cteNames.has(identKey(t.name)));
}

/** The query's reference for a coverage record's table. */
export function tableRefFor(query: ParsedQuery, coverage: Coverage): TableRef | undefined {
  return query.tables.find((t) => t.qualifiedName === coverage.table);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * One Coverage per referenced table (CTE names excluded). Tables missing
 * from `metadataByTable` get empty coverage with unknown provenance.
 */
export function score(
  query: ParsedQuery,
  metadataByTable: Readonly<Record<string, TableMetadata>>,
  options: ScoreOptions = {},
): Coverage[] {
  return scoredTables(query).map((table) => {
    const meta = lookupTable(metadataByTable, table);
    if (!meta) {
      return buildCoverage(
        query,
        table,
        {
          isHybrid: options.assumeHybrid ?? false,
          primaryKey: [],
          secondaryIndexes: [],
          columns: {},
          indexProvenance: 'unknown',
          metadataSource: 'none',
        },
        null,
      );
    }
    return buildCoverage(
      query,
      table,
      {
        isHybrid: meta.isHybrid,
        primaryKey: meta.primaryKey,
        secondaryIndexes: meta.secondaryIndexes,
        columns: meta.columns,
        indexProvenance: meta.indexProvenance ?? 'confirmed',
        metadataSource: 'schema',
      },
      null,
    );
  });
}

/**
 * Derive new coverage from execution-plan index metadata. Entries whose plan
 * export carried index metadata become confirmed; the replaced record is kept
 * as `derivedFrom`. The input array is not touched.
 */
export function enrichCoverage(
  query: ParsedQuery,
  coverage: readonly Coverage[],
  planIndexes: Readonly<Record<string, PlanIndexMetadata>>,
): Coverage[] {
  return coverage.map((cov) => {
    const plan = lookupTable(planIndexes, cov.table);
    if (!plan || !plan.hasIndexMetadata) return cov;
    const table = tableRefFor(query, cov);
    if (!table) return cov;
    return buildCoverage(
      query,
      table,
      {
        isHybrid: cov.isHybrid || plan.primaryKey.length > 0 || plan.secondaryIndexes.length > 0,
        primaryKey: plan.primaryKey.length > 0 ? plan.primaryKey : cov.primaryKey,
        secondaryIndexes: plan.secondaryIndexes,
        columns: cov.columnTypes,
        indexProvenance: 'confirmed',
        metadataSource: 'plan',
      },
      cov,
    );
  });
}
