import { lookupTable } from './coverage';
import { RuleEvaluationSkipped } from './errors';
import { finding, hybridCoverage } from './rules';
import { identKey, maskSql } from './sql-text';
import type { ChildExecution, Coverage, Finding, ParsedQuery, ProcBottleneck, RuntimeMetadata } from './types';

const TIME_COLUMN = /(created|updated|modified|deleted|timestamp|date|time|_at$|_dt$|_ts$)/i;
const TIME_VALUE = /^'\d{4}-\d{2}-\d{2}|^(DATE|TIMESTAMP|TIME)\b|\b(CURRENT_DATE|CURRENT_TIMESTAMP|SYSDATE|GETDATE|DATEADD|DATEDIFF|TO_DATE|TO_TIMESTAMP)\b/i;

const LARGE_LITERAL_CHARS = 8192;
const WRITE_AMPLIFICATION_INDEXES = 3;
const MB = 1024 * 1024;

function coverageFor(coverage: readonly Coverage[], table: string | null): Coverage | undefined {
  if (table === null) return undefined;
  const byTable = Object.fromEntries(coverage.map((c) => [c.table, c]));
  return lookupTable(byTable, table);
}

function secondaryIndexCount(cov: Coverage): number {
  return cov.indexes.length - (cov.primaryKey.length > 0 ? 1 : 0);
}

/** Table a DML statement writes to */
function writeTarget(query: ParsedQuery): string | null {
  if (query.insert) return query.insert.target;
  return query.tables[0]?.qualifiedName ?? null;
}

// ---------------------------------------------------------------------------
// DML shape
// ---------------------------------------------------------------------------

export function checkPurgePattern(query: ParsedQuery): Finding[] {
  const kind = query.statementKind;
  if (kind !== 'DELETE' && kind !== 'UPDATE' && kind !== 'MERGE') return [];

  const equality = query.predicates.filter((p) => (p.operator === 'EQ' || p.operator === 'IN') && p.column !== null);
  const time = query.predicates.filter(
    (p) => p.column !== null && (TIME_COLUMN.test(p.column) || TIME_VALUE.test(p.right)) && !equality.includes(p),
  );
  if (equality.length === 0 || time.length === 0) return [];

  return [
    finding(
      'HT_PURGE_PATTERN_DETECTED',
      'INFO',
      `${kind} combines an equality filter (${equality.map((p) => p.column).join(', ')}) with a time boundary (${time.map((p) => p.column).join(', ')}), a retention purge pattern.`,
      'Purge in bounded batches keyed by the primary key, off-peak, and make sure the time column is indexed behind the equality columns.',
      {
        table: query.tables[0]?.qualifiedName ?? null,
        equalityColumns: equality.map((p) => p.column ?? ''),
        timeColumns: time.map((p) => p.column ?? ''),
      },
    ),
  ];
}

export function checkSingleRowInsert(query: ParsedQuery): Finding[] {
  const insert = query.insert;
  if (!insert || insert.fromSelect || insert.valuesRowCount !== 1) return [];
  return [
    finding(
      'SINGLE_ROW_VALUES_INSERT',
      'MEDIUM',
      'INSERT ... VALUES with a single row; issued in a loop this pays per-statement overhead for every row.',
      'Batch rows into multi-row VALUES lists or INSERT ... SELECT from a staged set.',
      { table: insert.target, rows: insert.valuesRowCount },
    ),
  ];
}

export function checkHtPkNotInInsert(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  const insert = query.insert;
  if (!insert || insert.columns.length === 0) return [];
  const cov = coverageFor(coverage, insert.target);
  if (!cov || !cov.isHybrid || cov.primaryKey.length === 0) return [];
  const given = new Set(insert.columns.map(identKey));
  const missing = cov.primaryKey.filter((c) => !given.has(identKey(c)));
  if (missing.length === 0) return [];
  return [
    finding(
      'HT_PK_NOT_IN_INSERT',
      'HIGH',
      `INSERT into hybrid table ${cov.table} omits primary key column(s) ${missing.join(', ')}.`,
      'Supply the primary key explicitly; hybrid tables enforce it on every write.',
      { table: cov.table, primaryKey: [...cov.primaryKey], missing },
    ),
  ];
}

export function checkWriteAmplification(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  const kind = query.statementKind;
  if (kind !== 'INSERT' && kind !== 'UPDATE' && kind !== 'DELETE' && kind !== 'MERGE') return [];
  const cov = coverageFor(coverage, writeTarget(query));
  if (!cov || !cov.isHybrid) return [];
  const count = secondaryIndexCount(cov);
  if (count < WRITE_AMPLIFICATION_INDEXES) return [];
  return [
    finding(
      'HT_WRITE_AMPLIFICATION',
      'MEDIUM',
      `Every ${kind} on ${cov.table} also maintains ${count} secondary indexes.`,
      'Drop secondary indexes no read path uses.',
      { table: cov.table, secondaryIndexCount: count },
    ),
  ];
}

export function checkDynamicIdentifier(query: ParsedQuery): Finding[] {
  if (!/\bIDENTIFIER\s*\(/i.test(maskSql(query.sql))) return [];
  return [
    finding(
      'DYNAMIC_IDENTIFIER_TARGET',
      'MEDIUM',
      'The statement resolves its table through IDENTIFIER(), so the target cannot be analyzed statically and plans are not shared across targets.',
      'Use a fixed table name where possible.',
      { statementKind: query.statementKind },
    ),
  ];
}

export function checkLargeLiteralPayload(query: ParsedQuery): Finding[] {
  if (query.largestLiteralLength < LARGE_LITERAL_CHARS) return [];
  return [
    finding(
      'LARGE_LITERAL_PAYLOAD',
      'MEDIUM',
      `A string literal of ${query.largestLiteralLength} characters is embedded in the statement text.`,
      'Pass large payloads as bind values or stage them instead of inlining them.',
      { largestLiteralLength: query.largestLiteralLength },
    ),
  ];
}

export function checkCopyIntoStageFromHt(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  const copy = query.copy;
  if (!copy || !copy.targetIsStage) return [];
  const hybridSources = copy.sourceTables.filter((t) => coverageFor(coverage, t)?.isHybrid === true);
  if (hybridSources.length === 0) return [];
  return [
    finding(
      'COPY_INTO_STAGE_FROM_HT',
      'MEDIUM',
      `Unloading hybrid table(s) ${hybridSources.join(', ')} to a stage scans the row store in full.`,
      'Unload from a standard-table copy or a bounded range of the primary key.',
      { target: copy.target, sourceTables: hybridSources },
    ),
  ];
}

export function checkCtasPrimaryKeyError(query: ParsedQuery, _coverage: readonly Coverage[], runtime: RuntimeMetadata): Finding[] {
  if (query.statementKind !== 'CREATE_TABLE') return [];
  if (runtime.errorCode === undefined || runtime.errorCode === null) {
    throw new RuleEvaluationSkipped('HT_PRIMARY_KEY_ALREADY_EXISTS_CTAS', 'error code');
  }
  if (runtime.errorCode !== '200001') return [];
  return [
    finding(
      'HT_PRIMARY_KEY_ALREADY_EXISTS_CTAS',
      'HIGH',
      'CREATE TABLE ... AS SELECT into a hybrid table failed with a duplicate primary key (error 200001): the source rows are not unique on the key.',
      'De-duplicate the SELECT on the primary key (e.g. QUALIFY ROW_NUMBER() OVER (PARTITION BY pk ORDER BY ...) = 1) before loading.',
      { errorCode: runtime.errorCode, target: query.ctasTarget },
    ),
  ];
}

// ---------------------------------------------------------------------------
// CREATE INDEX
// ---------------------------------------------------------------------------

export function checkCreateIndex(query: ParsedQuery, coverage: readonly Coverage[]): Finding[] {
  const create = query.createIndex;
  if (!create) return [];
  const cov = coverageFor(coverage, create.table);
  if (!cov || cov.metadataSource === 'none') {
    throw new RuleEvaluationSkipped('CREATE_INDEX', `metadata for ${create.table}`);
  }
  const base = { index: create.name, table: cov.table };

  if (!cov.isHybrid) {
    return [
      finding(
        'CREATE_INDEX_ON_STANDARD_TABLE',
        'HIGH',
        `${cov.table} is not a hybrid table; secondary indexes are only supported on hybrid tables.`,
        'Use clustering or search optimization for standard tables instead.',
        base,
      ),
    ];
  }

  const findings: Finding[] = [];
  const wanted = create.columns.map(identKey);
  const columns = [...create.columns];
  const exact = cov.indexes.find((idx) => idx.length === wanted.length && idx.every((c, i) => identKey(c) === wanted[i]));
  const covering = cov.indexes.find(
    (idx) => idx.length > wanted.length && wanted.every((c, i) => identKey(idx[i] ?? '') === c),
  );

  if (exact) {
    findings.push(
      finding(
        'CREATE_INDEX_REDUNDANT',
        'MEDIUM',
        `An index on (${exact.join(', ')}) already exists on ${cov.table}.`,
        'Do not create the duplicate index; it only adds write cost.',
        { ...base, columns, existing: [...exact] },
      ),
    );
  } else if (covering) {
    findings.push(
      finding(
        'CREATE_INDEX_REDUNDANT_PREFIX',
        'MEDIUM',
        `Existing index (${covering.join(', ')}) on ${cov.table} already starts with (${columns.join(', ')}) and serves the same lookups.`,
        'Reuse the existing index unless a narrower index is needed for covering reads.',
        { ...base, columns, existing: [...covering] },
      ),
    );
  }

  const secondary = secondaryIndexCount(cov);
  if (secondary >= WRITE_AMPLIFICATION_INDEXES) {
    findings.push(
      finding(
        'CREATE_INDEX_HT_WRITE_COST',
        'LOW',
        `${cov.table} already has ${secondary} secondary indexes; another one adds to every write.`,
        'Confirm the new index serves a hot read path.',
        { ...base, secondaryIndexCount: secondary },
      ),
    );
  }

  if (!exact && !covering) {
    findings.push(
      finding(
        'CREATE_INDEX_LOOKS_GOOD',
        'INFO',
        `Index on ${cov.table} (${columns.join(', ')}) does not duplicate an existing index.`,
        'Verify the leading columns match the equality predicates of the queries it targets.',
        { ...base, columns },
      ),
    );
  }
  return findings;
}

// ---------------------------------------------------------------------------
// Stored procedures
// ---------------------------------------------------------------------------

export function checkStoredProcedure(query: ParsedQuery, _coverage: readonly Coverage[], runtime: RuntimeMetadata): Finding[] {
  if (query.statementKind !== 'CALL') return [];
  const procedure = query.procedureName ?? 'unknown';
  const durationMs = runtime.totalMs ?? null;
  return [
    finding(
      'STORED_PROCEDURE_DETECTED',
      'HIGH',
      `CALL ${procedure}: procedural row-by-row logic runs as many small statements, each paying its own compile and round trip.`,
      'Move the hot path into set-based SQL, or issue the lookups directly against the hybrid tables from the application.',
      { procedure, durationMs },
    ),
  ];
}

function childBuckets(parentMs: number, children: readonly ChildExecution[]): Record<ProcBottleneck, number> {
  const share = (ms: number): number => (parentMs > 0 ? ms / parentMs : 0);
  const sum = (pick: (c: ChildExecution) => number): number => children.reduce((acc, c) => acc + pick(c), 0);
  return {
    COPY: share(sum((c) => (/COPY|UNLOAD/i.test(c.queryType) ? c.totalMs : 0))),
    HT_DML: share(sum((c) => (c.touchedHybridTable && /INSERT|UPDATE|DELETE|MERGE/i.test(c.queryType) ? c.totalMs : 0))),
    QUEUING: share(sum((c) => c.queuedMs)),
    STORAGE_THROTTLING: children.reduce(
      (max, c) => Math.max(max, c.totalMs > 0 ? c.storageThrottlingMs / c.totalMs : 0),
      0,
    ),
    // bytes, worst single child
    SPILL: children.reduce((max, c) => Math.max(max, c.bytesSpilledLocal, c.bytesSpilledRemote), 0),
  };
}

const BOTTLENECK_THRESHOLDS: Record<ProcBottleneck, number> = {
  COPY: 0.6,
  HT_DML: 0.6,
  QUEUING: 0.1,
  STORAGE_THROTTLING: 0.15,
  SPILL: 128 * MB,
};

const BOTTLENECK_ADVICE: Record<ProcBottleneck, string> = {
  COPY: 'Load and unload steps dominate; run them outside the procedure or in parallel.',
  HT_DML: 'Row-at-a-time hybrid table writes dominate; batch them into set-based DML.',
  QUEUING: 'Child statements wait in the warehouse queue; size the warehouse or spread the schedule.',
  STORAGE_THROTTLING: 'Child statements are throttled by hybrid storage; reduce request rate or scan volume.',
  SPILL: 'Child statements spill to disk; reduce intermediate result size or use a larger warehouse.',
};

export function checkStoredProcBottleneck(query: ParsedQuery, _coverage: readonly Coverage[], runtime: RuntimeMetadata): Finding[] {
  if (query.statementKind !== 'CALL') return [];
  const children = runtime.childExecutions ?? [];
  if (children.length === 0) throw new RuleEvaluationSkipped('STORED_PROC_BOTTLENECK', 'child executions');

  const durationMs = runtime.totalMs ?? children.reduce((acc, c) => acc + c.totalMs, 0);
  const breakdown = childBuckets(durationMs, children);
  const order: ProcBottleneck[] = ['COPY', 'HT_DML', 'QUEUING', 'STORAGE_THROTTLING', 'SPILL'];
  const bottlenecks = order.filter((b) => breakdown[b] >= BOTTLENECK_THRESHOLDS[b]);
  // buckets mix time shares and bytes, so rank each by how far it exceeds its own threshold
  const excess = (b: ProcBottleneck): number => breakdown[b] / BOTTLENECK_THRESHOLDS[b];
  const dominant = bottlenecks.reduce<ProcBottleneck | null>(
    (best, b) => (best === null || excess(b) > excess(best) ? b : best),
    null,
  );
  if (dominant === null) return [];

  const procedure = query.procedureName ?? 'unknown';
  const severity = durationMs >= 3_600_000 ? 'CRITICAL' : durationMs >= 1_800_000 ? 'HIGH' : 'MEDIUM';
  return [
    finding(
      'STORED_PROC_BOTTLENECK',
      severity,
      `CALL ${procedure} spends most of its ${Math.round(durationMs / 1000)}s in ${dominant} (${bottlenecks.join(', ')}).`,
      BOTTLENECK_ADVICE[dominant],
      { procedure, durationMs, bottlenecks, dominant, breakdown },
    ),
  ];
}


// ---------------------------------------------------------------------------
// Runtime signals
// ---------------------------------------------------------------------------

export function checkThrottling(_query: ParsedQuery, _coverage: readonly Coverage[], runtime: RuntimeMetadata): Finding[] {
  const throttlingMs = runtime.storageThrottlingMs ?? 0;
  const totalMs = runtime.totalMs ?? 0;
  if (throttlingMs <= 0 || totalMs <= 0) return [];
  const ratio = throttlingMs / totalMs;
  if (ratio < 0.1) return [];
  return [
    finding(
      'HT_REQUEST_THROTTLING',
      ratio >= 0.3 ? 'HIGH' : 'MEDIUM',
      `${Math.round(ratio * 100)}% of execution time was spent throttled by hybrid table storage.`,
      'Lower the request rate against the hybrid tables or narrow the rows each statement touches.',
      { throttlingMs, totalMs, ratio },
    ),
  ];
}

export function checkAnalyticWorkload(_query: ParsedQuery, coverage: readonly Coverage[], runtime: RuntimeMetadata): Finding[] {
  const tables = hybridCoverage(coverage).map((c) => c.table);
  if (tables.length === 0) return [];
  const rowsProduced = runtime.rowsProduced ?? 0;
  const bytesScanned = runtime.bytesScanned ?? 0;
  if (rowsProduced <= 100_000 && bytesScanned <= 1e9) return [];
  return [
    finding(
      'ANALYTIC_WORKLOAD_ON_HT',
      'MEDIUM',
      'The execution moved analytic volumes through hybrid tables, which are built for point lookups.',
      'Serve this query from a standard (columnar) copy of the data.',
      { tables, rowsProduced, bytesScanned },
    ),
  ];
}
