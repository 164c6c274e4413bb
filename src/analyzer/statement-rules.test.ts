import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { score } from './coverage';
import { RuleEvaluationSkipped } from './errors';
import {
  checkAnalyticWorkload,
  checkCopyIntoStageFromHt,
  checkCreateIndex,
  checkCtasPrimaryKeyError,
  checkDynamicIdentifier,
  checkHtPkNotInInsert,
  checkLargeLiteralPayload,
  checkPurgePattern,
  checkSingleRowInsert,
  checkStoredProcBottleneck,
  checkStoredProcedure,
  checkThrottling,
  checkWriteAmplification,
} from './statement-rules';
import { hybridTable, makeQuery, predicate, standardTable } from './testing';
import type { ChildExecution, InsertShape } from './types';

function insertOf(columns: string[], valuesRowCount: number): InsertShape {
  return { target: 'orders', columns, valuesRowCount, fromSelect: false, dynamicTarget: false };
}

describe('DML rules', () => {
  it('detects a purge by key and time boundary', () => {
    const query = makeQuery({
      statementKind: 'DELETE',
      predicates: [predicate('tenant_id', 'EQ', '1'), predicate('created_at', 'RANGE', "'2024-01-01'")],
    });
    const [f] = checkPurgePattern(query);
    assert.equal(f?.severity, 'INFO');
    assert.deepEqual(f?.evidence, { table: 'orders', equalityColumns: ['tenant_id'], timeColumns: ['created_at'] });
    assert.deepEqual(checkPurgePattern(makeQuery({ ...query, statementKind: 'SELECT' })), []);
  });

  it('flags single-row VALUES inserts', () => {
    const [f] = checkSingleRowInsert(makeQuery({ statementKind: 'INSERT', insert: insertOf(['id'], 1) }));
    assert.deepEqual(f?.evidence, { table: 'orders', rows: 1 });
    assert.deepEqual(checkSingleRowInsert(makeQuery({ statementKind: 'INSERT', insert: insertOf(['id'], 50) })), []);
  });

  it('flags inserts that omit primary key columns', () => {
    const query = makeQuery({ statementKind: 'INSERT', insert: insertOf(['tenant_id', 'status'], 1) });
    const [f] = checkHtPkNotInInsert(query, score(query, { orders: hybridTable(['tenant_id', 'id']) }));
    assert.deepEqual(f?.evidence, { table: 'orders', primaryKey: ['tenant_id', 'id'], missing: ['id'] });
  });

  it('counts secondary indexes maintained by writes', () => {
    const query = makeQuery({ statementKind: 'UPDATE' });
    const coverage = score(query, { orders: hybridTable(['id'], [['a'], ['b'], ['c']]) });
    const [f] = checkWriteAmplification(query, coverage);
    assert.equal(f?.message, 'Every UPDATE on orders also maintains 3 secondary indexes.');
    assert.deepEqual(checkWriteAmplification(makeQuery(), coverage), []);
  });

  it('flags IDENTIFIER() targets and large literals', () => {
    assert.equal(checkDynamicIdentifier(makeQuery({ sql: 'INSERT INTO IDENTIFIER($t) VALUES (1)' }))[0]?.rule, 'DYNAMIC_IDENTIFIER_TARGET');
    assert.deepEqual(checkDynamicIdentifier(makeQuery({ sql: "SELECT 'IDENTIFIER(x)'" })), []);
    assert.deepEqual(checkLargeLiteralPayload(makeQuery({ largestLiteralLength: 9000 }))[0]?.evidence, { largestLiteralLength: 9000 });
    assert.deepEqual(checkLargeLiteralPayload(makeQuery({ largestLiteralLength: 100 })), []);
  });

  it('flags unloading a hybrid table to a stage', () => {
    const query = makeQuery({
      statementKind: 'COPY',
      copy: { target: '@exports', targetIsStage: true, sourceTables: ['orders'] },
    });
    const [f] = checkCopyIntoStageFromHt(query, score(query, { orders: hybridTable(['id']) }));
    assert.deepEqual(f?.evidence, { target: '@exports', sourceTables: ['orders'] });
  });

  it('explains duplicate-key CTAS failures', () => {
    const query = makeQuery({ statementKind: 'CREATE_TABLE', ctasTarget: 'orders_copy' });
    const [f] = checkCtasPrimaryKeyError(query, [], { errorCode: '200001' });
    assert.deepEqual(f?.evidence, { errorCode: '200001', target: 'orders_copy' });
    assert.deepEqual(checkCtasPrimaryKeyError(query, [], { errorCode: '100038' }), []);
    assert.throws(() => checkCtasPrimaryKeyError(query, [], {}), RuleEvaluationSkipped);
  });
});

describe('checkCreateIndex', () => {
  const create = (columns: string[]) =>
    makeQuery({ statementKind: 'CREATE_INDEX', createIndex: { name: 'idx_new', table: 'orders', columns, unique: false } });

  it('reports an existing index that starts with the new columns', () => {
    const query = create(['a']);
    const findings = checkCreateIndex(query, score(query, { orders: hybridTable(['id'], [['a', 'b']]) }));
    assert.deepEqual(
      findings.map((f) => [f.rule, f.severity]),
      [['CREATE_INDEX_REDUNDANT_PREFIX', 'MEDIUM']],
    );
    assert.deepEqual(findings[0]?.evidence, { index: 'idx_new', table: 'orders', columns: ['a'], existing: ['a', 'b'] });
  });

  it('reports an exact duplicate', () => {
    const query = create(['A', 'b']);
    const [f] = checkCreateIndex(query, score(query, { orders: hybridTable(['id'], [['a', 'b']]) }));
    assert.equal(f?.rule, 'CREATE_INDEX_REDUNDANT');
  });

  it('warns about write cost and accepts a new index', () => {
    const query = create(['c']);
    const findings = checkCreateIndex(query, score(query, { orders: hybridTable(['id'], [['a'], ['b'], ['d']]) }));
    assert.deepEqual(
      findings.map((f) => f.rule),
      ['CREATE_INDEX_HT_WRITE_COST', 'CREATE_INDEX_LOOKS_GOOD'],
    );
  });

  it('rejects indexes on standard tables and skips without metadata', () => {
    const query = create(['a']);
    assert.equal(checkCreateIndex(query, score(query, { orders: standardTable() }))[0]?.rule, 'CREATE_INDEX_ON_STANDARD_TABLE');
    assert.throws(() => checkCreateIndex(query, score(query, {})), RuleEvaluationSkipped);
  });
});

describe('stored procedures', () => {
  const call = makeQuery({ statementKind: 'CALL', procedureName: 'refresh_orders', tables: [] });
  const child = (overrides: Partial<ChildExecution>): ChildExecution => ({
    queryType: 'SELECT',
    totalMs: 0,
    queuedMs: 0,
    storageThrottlingMs: 0,
    bytesSpilledLocal: 0,
    bytesSpilledRemote: 0,
    touchedHybridTable: false,
    ...overrides,
  });

  it('reports every CALL', () => {
    const [f] = checkStoredProcedure(call, [], { totalMs: 5000 });
    assert.equal(f?.severity, 'HIGH');
    assert.deepEqual(f?.evidence, { procedure: 'refresh_orders', durationMs: 5000 });
  });

  it('names the dominant child bottleneck', () => {
    const [f] = checkStoredProcBottleneck(call, [], {
      totalMs: 1_000_000,
      childExecutions: [child({ queryType: 'INSERT', totalMs: 700_000, touchedHybridTable: true })],
    });
    assert.equal(f?.severity, 'MEDIUM');
    assert.equal(f?.message, 'CALL refresh_orders spends most of its 1000s in HT_DML (HT_DML).');
    assert.deepEqual(f?.rule === 'STORED_PROC_BOTTLENECK' && f.evidence.breakdown, {
      COPY: 0,
      HT_DML: 0.7,
      QUEUING: 0,
      STORAGE_THROTTLING: 0,
      SPILL: 0,
    });
  });

  it('measures spill per child and ranks buckets against their own thresholds', () => {
    const MB = 1024 * 1024;
    const moderate = [child({ bytesSpilledLocal: 100 * MB }), child({ bytesSpilledLocal: 100 * MB })];
    assert.deepEqual(checkStoredProcBottleneck(call, [], { totalMs: 1_000_000, childExecutions: moderate }), []);

    const [f] = checkStoredProcBottleneck(call, [], {
      totalMs: 1_000_000,
      childExecutions: [
        child({ queryType: 'INSERT', totalMs: 700_000, touchedHybridTable: true }),
        child({ bytesSpilledLocal: 64 * MB, bytesSpilledRemote: 512 * MB }),
      ],
    });
    assert.equal(f?.message, 'CALL refresh_orders spends most of its 1000s in SPILL (HT_DML, SPILL).');
    assert.equal(f?.rule === 'STORED_PROC_BOTTLENECK' && f.evidence.breakdown.SPILL, 512 * MB);
  });

  it('skips without child executions', () => {
    assert.throws(() => checkStoredProcBottleneck(call, [], { totalMs: 1000 }), RuleEvaluationSkipped);
  });
});

describe('runtime rules', () => {
  it('grades storage throttling by its share of the run', () => {
    const query = makeQuery();
    assert.equal(checkThrottling(query, [], { storageThrottlingMs: 400, totalMs: 1000 })[0]?.severity, 'HIGH');
    assert.equal(checkThrottling(query, [], { storageThrottlingMs: 150, totalMs: 1000 })[0]?.severity, 'MEDIUM');
    assert.deepEqual(checkThrottling(query, [], { storageThrottlingMs: 50, totalMs: 1000 }), []);
  });

  it('flags analytic volumes on hybrid tables', () => {
    const query = makeQuery();
    const coverage = score(query, { orders: hybridTable(['id']) });
    const [f] = checkAnalyticWorkload(query, coverage, { rowsProduced: 200_000 });
    assert.deepEqual(f?.evidence, { tables: ['orders'], rowsProduced: 200_000, bytesScanned: 0 });
    assert.deepEqual(checkAnalyticWorkload(query, coverage, { rowsProduced: 10 }), []);
  });
});
