import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { score } from './coverage';
import { RuleEvaluationSkipped } from './errors';
import { runRules, summarizeFindings, type NamedRule } from './pipeline';
import { checkWideSelect, finding, type RuleSettings } from './rules';
import { hybridTable, makeQuery, predicate, tableRef } from './testing';

const settings: RuleSettings = { includeMaxRows: 5000, smallSortRows: 10000 };

describe('runRules', () => {
  it('reports a range scan sorted without LIMIT on a hybrid table', () => {
    const query = makeQuery({
      sql: 'SELECT * FROM ht WHERE order_by_col > 5 ORDER BY order_by_col',
      tables: [tableRef('ht')],
      predicates: [predicate('order_by_col', 'RANGE', '5')],
      orderBy: [{ column: 'order_by_col', direction: 'ASC' }],
      projection: ['*'],
      hasWhere: true,
    });
    const coverage = score(query, { ht: hybridTable(['order_by_col']) });
    assert.equal(coverage[0]?.bestEqPrefix, 0);

    const findings = runRules(query, coverage, {}, settings);
    assert.deepEqual(
      findings.map((f) => [f.rule, f.severity]),
      [
        ['PRIMARY_KEY_NOT_USED', 'MEDIUM'],
        ['ORDER_BY_NO_LIMIT', 'HIGH'],
        ['WIDE_SELECT', 'MEDIUM'],
      ],
    );
  });

  it('keeps going when a rule is skipped or fails', () => {
    const query = makeQuery({ projection: ['*'] });
    const rules: NamedRule[] = [
      {
        name: 'needs-input',
        run: () => {
          throw new RuleEvaluationSkipped('NEEDS_INPUT', 'runtime');
        },
      },
      {
        name: 'broken',
        run: () => {
          throw new Error('boom');
        },
      },
      { name: 'wide-select', run: checkWideSelect },
    ];
    const findings = runRules(query, score(query, {}), {}, settings, rules);
    assert.deepEqual(
      findings.map((f) => f.rule),
      ['WIDE_SELECT'],
    );
  });
});

describe('summarizeFindings', () => {
  const zeroIndex = (table: string, ddl: string | null) =>
    finding('HT_WITHOUT_INDEXES', 'CRITICAL', `${table} has no indexes.`, 'Add one.', {
      table,
      equalityColumns: ['id'],
      suggestion: ddl === null ? null : { table, columns: ['id'], include: [], ddl },
    });
  const wide = finding('WIDE_SELECT', 'LOW', 'SELECT *.', 'List columns.', { projection: ['*'] });

  it('collapses several zero-index tables into one summary placed first', () => {
    const summarized = summarizeFindings([
      wide,
      zeroIndex('orders', 'CREATE INDEX idx_orders_id ON orders (id);'),
      zeroIndex('items', null),
    ]);
    assert.equal(summarized.length, 2);
    const [summary, rest] = summarized;
    assert.equal(summary?.rule, 'MULTIPLE_HT_TABLES_NO_INDEXES');
    assert.equal(summary?.severity, 'CRITICAL');
    assert.equal(summary?.message, '2 hybrid tables have no indexes: orders, items. Every access to them is a full scan.');
    assert.equal(summary?.suggestion, 'Create indexes matching the predicates:\nCREATE INDEX idx_orders_id ON orders (id);');
    assert.equal(rest, wide);
  });

  it('leaves a single zero-index finding alone', () => {
    const input = [zeroIndex('orders', null), wide];
    const out = summarizeFindings(input);
    assert.deepEqual(out, input);
    assert.notEqual(out, input);
  });
});
