import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { score } from './coverage';
import {
  checkCompositeIndexes,
  checkHtWithoutIndexes,
  checkIndexMetadataUnknown,
  checkIndexMisaligned,
  checkOrderMisaligned,
  checkPrimaryKeyNotUsed,
  suggestIndex,
} from './index-rules';
import type { RuleSettings } from './rules';
import { hybridTable, makeQuery, predicate } from './testing';

const settings: RuleSettings = { includeMaxRows: 5000, smallSortRows: 10000 };

describe('suggestIndex', () => {
  it('puts equality columns first, then the range column', () => {
    const s = suggestIndex('orders', ['customer_id', 'status'], 'created_at', ['id', 'total'], 100, 5000);
    assert.deepEqual(s.columns, ['customer_id', 'status', 'created_at']);
    assert.deepEqual(s.include, ['id', 'total']);
    assert.equal(
      s.ddl,
      'CREATE INDEX idx_orders_customer_id_status_created_at ON orders (customer_id, status, created_at) INCLUDE (id, total);',
    );
  });

  it('skips INCLUDE without a small known result and dedupes columns', () => {
    const s = suggestIndex('orders', ['customer_id', 'CUSTOMER_ID'], null, ['id'], null, 5000);
    assert.deepEqual(s.include, []);
    assert.equal(s.ddl, 'CREATE INDEX idx_orders_customer_id ON orders (customer_id);');
  });
});

describe('index existence rules', () => {
  it('hedges when a hybrid table has no reported index metadata', () => {
    const query = makeQuery({ predicates: [predicate('id', 'EQ', '1')] });
    const coverage = score(query, {}, { assumeHybrid: true });
    const [f] = checkIndexMetadataUnknown(query, coverage);
    assert.equal(f?.severity, 'INFO');
    assert.deepEqual(f?.evidence, { table: 'orders', equalityColumns: ['id'] });
    assert.deepEqual(checkHtWithoutIndexes(query, coverage, {}, settings), []);
  });

  it('reports a confirmed zero-index hybrid table with a suggested index', () => {
    const query = makeQuery({ predicates: [predicate('customer_id', 'EQ', '7')] });
    const [f] = checkHtWithoutIndexes(query, score(query, { orders: hybridTable([]) }), {}, settings);
    assert.equal(f?.severity, 'CRITICAL');
    assert.equal(f?.suggestion, 'Create an index matching the predicates: CREATE INDEX idx_orders_customer_id ON orders (customer_id);');
  });

  it('suggests a primary key when nothing is filtered by equality', () => {
    const query = makeQuery();
    const [f] = checkHtWithoutIndexes(query, score(query, { orders: hybridTable([]) }), {}, settings);
    assert.equal(f?.suggestion, 'Define a primary key on orders.');
  });
});

describe('alignment rules', () => {
  it('flags equality predicates that lead no index', () => {
    const query = makeQuery({ predicates: [predicate('status', 'EQ', "'open'")] });
    const [f] = checkIndexMisaligned(query, score(query, { orders: hybridTable(['id']) }), {}, settings);
    assert.equal(f?.rule, 'INDEX_MISALIGNED');
    assert.equal(f?.severity, 'HIGH');
    assert.deepEqual(f?.rule === 'INDEX_MISALIGNED' && f.evidence.suggestion?.columns, ['status']);
    assert.equal(
      f?.suggestion,
      'Reorder an existing index or add one leading with the equality columns: CREATE INDEX idx_orders_status ON orders (status);',
    );
  });

  it('hedges the remediation when the index list is unconfirmed', () => {
    const query = makeQuery({ predicates: [predicate('status', 'EQ', "'open'")] });
    const metadata = { orders: { ...hybridTable(['id']), indexProvenance: 'unknown' as const } };
    const [f] = checkIndexMisaligned(query, score(query, metadata), {}, settings);
    assert.equal(f?.message, 'Equality predicates on status do not match the leading column of any index on orders (index list may be incomplete).');
    assert.equal(
      f?.suggestion,
      'Cannot confirm the existing indexes on orders; check manually with SHOW INDEXES IN TABLE orders first. Candidate if no matching index exists: CREATE INDEX idx_orders_status ON orders (status);',
    );
  });

  it('grades an unused primary key by whether any equality exists', () => {
    const byStatus = makeQuery({ predicates: [predicate('status', 'EQ', "'open'")] });
    assert.equal(checkPrimaryKeyNotUsed(byStatus, score(byStatus, { orders: hybridTable(['id']) }), {})[0]?.severity, 'INFO');
    assert.equal(
      checkPrimaryKeyNotUsed(byStatus, score(byStatus, { orders: hybridTable(['id']) }), { rowsProduced: 20000 })[0]?.severity,
      'MEDIUM',
    );

    const unfiltered = makeQuery();
    const [f] = checkPrimaryKeyNotUsed(unfiltered, score(unfiltered, { orders: hybridTable(['id']) }), {});
    assert.equal(f?.severity, 'MEDIUM');
    assert.equal(f?.message, 'No equality predicate on orders; its primary key (id) cannot be used for a point lookup.');
  });

  it('accepts a composite key matched on every column', () => {
    const query = makeQuery({ predicates: [predicate('tenant_id', 'EQ', '1'), predicate('id', 'EQ', '2')] });
    const coverage = score(query, { orders: hybridTable(['tenant_id', 'id']) });
    assert.deepEqual(checkPrimaryKeyNotUsed(query, coverage, {}), []);
    assert.deepEqual(checkIndexMisaligned(query, coverage, {}, settings), []);
    assert.deepEqual(checkCompositeIndexes(query, coverage, {}, settings), []);
  });

  it('flags ORDER BY that does not follow the best index', () => {
    const query = makeQuery({ orderBy: [{ column: 'created_at', direction: 'DESC' }] });
    const [f] = checkOrderMisaligned(query, score(query, { orders: hybridTable(['id']) }));
    assert.deepEqual(f?.evidence, { table: 'orders', orderByColumns: ['created_at'], bestIndex: ['id'] });
  });
});

describe('checkCompositeIndexes', () => {
  const query = makeQuery({ predicates: [predicate('status', 'EQ', "'open'"), predicate('customer_id', 'EQ', '7')] });

  it('flags a composite index whose leading column is unconstrained', () => {
    const [f] = checkCompositeIndexes(query, score(query, { orders: hybridTable(['id'], [['region', 'status']]) }), {}, settings);
    assert.equal(f?.rule, 'COMPOSITE_INDEX_MISALIGNED');
    assert.equal(f?.suggestion, 'Reorder so equality columns lead: CREATE INDEX idx_orders_status_customer_id ON orders (status, customer_id);');
  });

  it('flags a partially matched prefix', () => {
    const [f] = checkCompositeIndexes(query, score(query, { orders: hybridTable(['id'], [['status', 'region']]) }), {}, settings);
    assert.equal(f?.rule, 'COMPOSITE_INDEX_PARTIAL_PREFIX');
    assert.equal(f?.severity, 'MEDIUM');
    assert.equal(f?.rule === 'COMPOSITE_INDEX_PARTIAL_PREFIX' && f.evidence.eqPrefix, 1);
  });

  it('judges each composite index even when the primary key serves the predicates', () => {
    const byId = makeQuery({ predicates: [predicate('id', 'EQ', '1')] });
    const findings = checkCompositeIndexes(byId, score(byId, { orders: hybridTable(['id'], [['region', 'status']]) }), {}, settings);
    assert.equal(findings.length, 1);
    const [f] = findings;
    assert.equal(f?.rule, 'COMPOSITE_INDEX_MISALIGNED');
    assert.equal(f?.severity, 'HIGH');
    assert.deepEqual(f?.rule === 'COMPOSITE_INDEX_MISALIGNED' && f.evidence.index, ['region', 'status']);
    assert.equal(
      f?.suggestion,
      'Index (id) already serves these predicates; reorder (region, status) so equality columns lead, or drop it if no other query needs its current order.',
    );
  });

  it('hedges composite advice when the index list is unconfirmed', () => {
    const metadata = { orders: { ...hybridTable(['id'], [['region', 'status']]), indexProvenance: 'unknown' as const } };
    const [f] = checkCompositeIndexes(query, score(query, metadata), {}, settings);
    assert.equal(f?.rule, 'COMPOSITE_INDEX_MISALIGNED');
    assert.equal(
      f?.suggestion,
      'Cannot confirm the existing indexes on orders; check manually with SHOW INDEXES IN TABLE orders first. Candidate if no matching index exists: CREATE INDEX idx_orders_status_customer_id ON orders (status, customer_id);',
    );
  });
});
