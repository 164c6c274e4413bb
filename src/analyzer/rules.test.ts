import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { score } from './coverage';
import { RuleEvaluationSkipped } from './errors';
import {
  checkBindParameters,
  checkCaseTransformHeavy,
  checkDistinctUnnecessary,
  checkFunctionInJoinPredicate,
  checkJoinPattern,
  checkJoinWithoutOn,
  checkMixedTables,
  checkNoFilteringClauses,
  checkNonSargablePredicates,
  checkNoWhereFilter,
  checkOrderByNoLimit,
  checkTypeMismatch,
  checkWideSelect,
  RULE_CATEGORY,
  type RuleSettings,
} from './rules';
import { hybridTable, makeQuery, predicate, standardTable, tableRef } from './testing';

const settings: RuleSettings = { includeMaxRows: 5000, smallSortRows: 10000 };

describe('filter rules', () => {
  it('flags a select with no narrowing clause at all', () => {
    const [f] = checkNoFilteringClauses(makeQuery());
    assert.equal(f?.rule, 'NO_FILTERING_CLAUSES');
    assert.equal(f?.severity, 'HIGH');
    assert.deepEqual(f?.evidence, { statementKind: 'SELECT', tables: ['orders'] });
    assert.deepEqual(checkNoFilteringClauses(makeQuery({ hasWhere: true })), []);
    assert.deepEqual(checkNoFilteringClauses(makeQuery({ statementKind: 'INSERT' })), []);
  });

  it('reports narrowing that happens outside WHERE', () => {
    const [f] = checkNoWhereFilter(makeQuery({ hasIn: true, hasHaving: true }));
    assert.equal(f?.rule, 'NO_WHERE_FILTER');
    assert.equal(f?.severity, 'MEDIUM');
    assert.deepEqual(f?.evidence, { statementKind: 'SELECT', narrowedBy: ['IN', 'HAVING'] });
    assert.deepEqual(checkNoWhereFilter(makeQuery()), []);
  });

  it('flags a function wrapping the column side only', () => {
    const wrapped = makeQuery({
      sql: "SELECT * FROM users WHERE UPPER(email) = 'X'",
      predicates: [predicate('email', 'EQ', "'X'", { left: 'UPPER(email)', wrappedBy: 'UPPER' })],
    });
    const [f] = checkNonSargablePredicates(wrapped);
    assert.equal(f?.rule, 'NON_SARGABLE_PREDICATES');
    assert.deepEqual(f?.evidence, {
      predicates: [{ column: 'email', wrappedBy: 'UPPER', expression: "UPPER(email) = 'X'" }],
    });

    const literalSide = makeQuery({
      sql: "SELECT * FROM users WHERE email = UPPER('x')",
      predicates: [predicate('email', 'EQ', "UPPER('x')", { rightKind: 'expression' })],
    });
    assert.deepEqual(checkNonSargablePredicates(literalSide), []);
  });

  it('flags leading wildcards', () => {
    const query = makeQuery({
      sql: "SELECT * FROM users WHERE name LIKE '%son'",
      predicates: [predicate('name', 'RANGE', "'%son'", { comparison: 'LIKE' })],
    });
    const [f] = checkNonSargablePredicates(query);
    assert.equal(f?.rule === 'NON_SARGABLE_PREDICATES' && f.evidence.predicates[0]?.wrappedBy, 'LEADING_WILDCARD');
  });

  it('counts case transforms only on hybrid tables', () => {
    const query = makeQuery({ sql: 'SELECT UPPER(a), UPPER(b) FROM orders WHERE LOWER(c) = 1' });
    const [f] = checkCaseTransformHeavy(query, score(query, { orders: hybridTable(['id']) }));
    assert.equal(f?.severity, 'MEDIUM');
    assert.deepEqual(f?.evidence, { count: 3 });
    assert.deepEqual(checkCaseTransformHeavy(query, score(query, {})), []);
  });

  it('compares literal types with declared column types', () => {
    const query = makeQuery({ predicates: [predicate('id', 'EQ', "'42'"), predicate('code', 'EQ', "'x'")] });
    const [f] = checkTypeMismatch(query, score(query, { orders: hybridTable(['id'], [], { id: 'NUMBER(38,0)', code: 'VARCHAR' }) }));
    assert.deepEqual(f?.evidence, {
      mismatches: [{ table: 'orders', column: 'id', declaredType: 'NUMBER(38,0)', literal: "'42'" }],
    });
    assert.throws(() => checkTypeMismatch(query, score(query, {})), RuleEvaluationSkipped);
  });
});

describe('join rules', () => {
  const joined = makeQuery({
    sql: 'SELECT * FROM orders o JOIN customers c ON UPPER(o.code) = c.code',
    tables: [tableRef('orders', 'o'), tableRef('customers', 'c')],
    aliases: { O: 'ORDERS', C: 'CUSTOMERS' },
    predicates: [
      predicate('customer_id', 'EQ', 'c.id', {
        source: 'join_on',
        qualifier: 'o',
        rightKind: 'column',
        rightColumn: { column: 'id', qualifier: 'c' },
      }),
    ],
  });

  it('flags a conditional join without a condition', () => {
    const query = makeQuery({
      joins: [
        { kind: 'INNER', table: 'customers', onCondition: null },
        { kind: 'CROSS', table: 'regions', onCondition: null },
      ],
    });
    const [f] = checkJoinWithoutOn(query);
    assert.deepEqual(f?.evidence, { joins: ['INNER JOIN customers'] });
  });

  it('flags join keys that lead no index on a hybrid table', () => {
    const findings = checkJoinPattern(joined, score(joined, { orders: hybridTable(['id']) }));
    assert.equal(findings.length, 1);
    assert.deepEqual(findings[0]?.evidence, { table: 'orders', joinColumns: ['customer_id'], indexes: [['id']] });
    assert.deepEqual(checkJoinPattern(joined, score(joined, { orders: hybridTable(['customer_id']) })), []);
  });

  it('flags a function applied to a join key', () => {
    const query = makeQuery({
      ...joined,
      predicates: [
        predicate('code', 'EQ', 'c.code', {
          source: 'join_on',
          qualifier: 'o',
          left: 'UPPER(o.code)',
          wrappedBy: 'UPPER',
          rightKind: 'column',
          rightColumn: { column: 'code', qualifier: 'c' },
        }),
      ],
    });
    const [f] = checkFunctionInJoinPredicate(query, score(query, { orders: hybridTable(['id']) }));
    assert.equal(f?.rule, 'FUNCTION_IN_JOIN_PREDICATE');
    assert.equal(f?.message, 'Join condition applies UPPER to a join key, so the hybrid table cannot be probed by index.');
  });
});

describe('shape rules', () => {
  it('flags DISTINCT over the full primary key', () => {
    const query = makeQuery({ hasDistinct: true, projection: ['id', 'status'] });
    const [f] = checkDistinctUnnecessary(query, score(query, { orders: hybridTable(['id']) }));
    assert.deepEqual(f?.evidence, { table: 'orders', primaryKey: ['id'] });
    assert.deepEqual(checkDistinctUnnecessary(makeQuery({ hasDistinct: true, projection: ['status'] }), score(query, { orders: hybridTable(['id']) })), []);
  });

  it('flags ORDER BY without LIMIT unless the result is small', () => {
    const query = makeQuery({ orderBy: [{ column: 'created_at', direction: 'ASC' }] });
    const coverage = score(query, { orders: hybridTable(['id']) });

    const [unknownSize] = checkOrderByNoLimit(query, coverage, {}, settings);
    assert.equal(unknownSize?.severity, 'HIGH');
    assert.deepEqual(unknownSize?.evidence, { orderByColumns: ['created_at'], rowsProduced: null, indexAligned: false });

    const [large] = checkOrderByNoLimit(query, coverage, { rowsProduced: 250000 }, settings);
    assert.equal(
      large?.message,
      'ORDER BY created_at without LIMIT sorts the full result of 250,000 rows before returning anything.',
    );

    assert.deepEqual(checkOrderByNoLimit(query, coverage, { rowsProduced: 500 }, settings), []);
    assert.deepEqual(checkOrderByNoLimit(makeQuery({ ...query, hasLimit: true }), coverage, {}, settings), []);
  });

  it('grades SELECT * by table engine', () => {
    const query = makeQuery({ projection: ['*'] });
    assert.equal(checkWideSelect(query, score(query, { orders: hybridTable(['id']) }))[0]?.severity, 'MEDIUM');
    assert.equal(checkWideSelect(query, score(query, {}))[0]?.severity, 'LOW');
    assert.deepEqual(checkWideSelect(makeQuery({ projection: ['id'] }), []), []);
  });

  it('asks for bind variables when several predicates inline literals', () => {
    const query = makeQuery({ predicates: [predicate('id', 'EQ', '1'), predicate('status', 'IN', "('a')")] });
    const [f] = checkBindParameters(query);
    assert.deepEqual(f?.evidence, { literalPredicates: 2, columns: ['id', 'status'] });
    assert.deepEqual(checkBindParameters(makeQuery({ ...query, usesBindVariables: true })), []);
  });

  it('flags statements mixing hybrid and standard tables', () => {
    const query = makeQuery({ tables: [tableRef('orders'), tableRef('dim_dates')] });
    const [f] = checkMixedTables(query, score(query, { orders: hybridTable(['id']), dim_dates: standardTable() }));
    assert.deepEqual(f?.evidence, { hybridTables: ['orders'], standardTables: ['dim_dates'] });
  });
});

describe('RULE_CATEGORY', () => {
  it('categorizes the ranking-relevant rules', () => {
    assert.equal(RULE_CATEGORY.ORDER_BY_NO_LIMIT, 'sort');
    assert.equal(RULE_CATEGORY.HT_WITHOUT_INDEXES, 'index');
    assert.equal(RULE_CATEGORY.INDEX_METADATA_UNKNOWN, 'metadata');
  });
});
