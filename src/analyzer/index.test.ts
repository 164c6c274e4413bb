import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { analyze, analyzeBatch, ParseError, type RuleSettings } from './index';
import { hybridTable } from './testing';

const dialects = ['mysql'];
const settings: RuleSettings = { includeMaxRows: 5000, smallSortRows: 10000 };

describe('analyze', () => {
  it('ranks an unbounded sort on a hybrid table as the primary cause', () => {
    const result = analyze('SELECT * FROM ht WHERE order_by_col > 5 ORDER BY order_by_col', {
      metadata: { ht: hybridTable(['order_by_col']) },
      dialects,
      settings,
    });
    assert.equal(result.coverage[0]?.bestEqPrefix, 0);
    assert.deepEqual(
      result.findings.map((f) => [f.rule, f.severity]),
      [
        ['PRIMARY_KEY_NOT_USED', 'MEDIUM'],
        ['ORDER_BY_NO_LIMIT', 'HIGH'],
        ['WIDE_SELECT', 'MEDIUM'],
      ],
    );
    assert.equal(result.primaryCause?.finding.rule, 'ORDER_BY_NO_LIMIT');
    assert.deepEqual(
      result.actions.map((a) => a.id),
      ['ADD_LIMIT_ON_ORDER_BY_1', 'USE_BOUND_VARIABLES_1', 'NARROW_PROJECTION_1'],
    );
  });

  it('summarizes several hybrid tables without indexes', () => {
    const result = analyze(
      "SELECT o.id FROM orders o JOIN items i ON o.id = i.order_id WHERE o.tenant_id = 1 AND i.sku = 'x'",
      { metadata: { orders: hybridTable([]), items: hybridTable([]) }, dialects, settings },
    );
    assert.equal(result.findings[0]?.rule, 'MULTIPLE_HT_TABLES_NO_INDEXES');
    assert.equal(result.findings.some((f) => f.rule === 'HT_WITHOUT_INDEXES'), false);
    assert.equal(result.primaryCause?.finding.rule, 'MULTIPLE_HT_TABLES_NO_INDEXES');
    assert.equal(result.primaryCause?.score, 145);

    const indexActions = result.actions.filter((a) => a.kind === 'CREATE_INDEX');
    assert.deepEqual(
      indexActions.map((a) => [a.id, a.generatedSql]),
      [
        ['ADD_INDEX_ORDERS_1', 'CREATE INDEX idx_orders_tenant_id_id ON orders (tenant_id, id);'],
        ['ADD_INDEX_ITEMS_1', 'CREATE INDEX idx_items_sku_order_id ON items (sku, order_id);'],
      ],
    );
  });

  it('hedges when a hybrid table was touched but no metadata is known', () => {
    const result = analyze('SELECT id FROM orders WHERE id = 7', {
      runtime: { touchedHybridTable: true },
      dialects,
      settings,
    });
    assert.deepEqual(
      result.findings.map((f) => f.rule),
      ['INDEX_METADATA_UNKNOWN'],
    );
    assert.equal(result.actions[0]?.id, 'ADD_INDEX_ORDERS_1');
    assert.equal(result.actions[0]?.generatedSql.startsWith('-- Cannot confirm the existing indexes on orders.'), true);
  });

  it('confirms coverage from plan index metadata', () => {
    const result = analyze('SELECT id FROM orders WHERE id = 7', {
      runtime: { touchedHybridTable: true },
      planIndexes: { orders: { hasIndexMetadata: true, primaryKey: ['id'], secondaryIndexes: [] } },
      dialects,
      settings,
    });
    assert.equal(result.baseCoverage[0]?.indexProvenance, 'unknown');
    assert.equal(result.coverage[0]?.indexProvenance, 'confirmed');
    assert.equal(result.coverage[0]?.bestEqPrefix, 1);
    assert.deepEqual(result.findings, []);
    assert.equal(result.primaryCause, null);
  });

  it('throws ParseError for statements no grammar accepts', () => {
    assert.throws(() => analyze('SELEC * FRM t', { dialects }), ParseError);
  });
});

describe('analyzeBatch', () => {
  it('reports parse failures in place', () => {
    const entries = analyzeBatch(
      ['SELECT id FROM orders WHERE id = 1', 'SELEC * FRM t', { sql: 'CALL refresh_orders()', runtime: { totalMs: 5000 } }],
      { dialects, settings },
    );
    assert.deepEqual(
      entries.map((e) => e.ok),
      [true, false, true],
    );
    const [, failed, call] = entries;
    assert.equal(failed?.ok === false && failed.error.sql, 'SELEC * FRM t');
    assert.equal(call?.ok === true && call.result.primaryCause?.finding.rule, 'STORED_PROCEDURE_DETECTED');
    assert.deepEqual(
      call?.ok === true && call.result.actions.map((a) => a.id),
      ['REFACTOR_STORED_PROCEDURE_1'],
    );
  });
});
