import test from 'node:test';
import assert from 'node:assert/strict';
import {
  bareName,
  countFunctionCalls,
  detectStatementKind,
  hasBindVariables,
  identKey,
  largestLiteralLength,
  maskSql,
  preprocessForParser,
  replaceBalancedCall,
  stringLiterals,
} from './sql-text';

test('maskSql blanks literal bodies and comments', () => {
  assert.equal(maskSql("SELECT 'a--b' FROM t -- c"), "SELECT '' FROM t  ");
  assert.equal(maskSql('SELECT /* hint */ 1'), 'SELECT   1');
});

test('stringLiterals unescapes doubled quotes', () => {
  assert.deepEqual(stringLiterals("SELECT 'it''s', 'x' FROM t"), ["it's", 'x']);
});

test('hasBindVariables ignores markers inside literals and casts', () => {
  assert.equal(hasBindVariables('SELECT * FROM t WHERE id = ?'), true);
  assert.equal(hasBindVariables('SELECT * FROM t WHERE id = :id'), true);
  assert.equal(hasBindVariables('SELECT * FROM t WHERE id = $1'), true);
  assert.equal(hasBindVariables("SELECT * FROM t WHERE s = ':id'"), false);
  assert.equal(hasBindVariables('SELECT x::text FROM t'), false);
});

test('countFunctionCalls is case-insensitive and allows a space before the paren', () => {
  assert.equal(countFunctionCalls('SELECT UPPER(a), lower (b), upper_x(c) FROM t', ['UPPER', 'LOWER']), 2);
  assert.equal(countFunctionCalls('SELECT UPPER(a)', []), 0);
});

test('detectStatementKind reads the leading keyword', () => {
  assert.equal(detectStatementKind('  (SELECT 1)'), 'SELECT');
  assert.equal(detectStatementKind('WITH x AS (SELECT 1) INSERT INTO t SELECT * FROM x'), 'INSERT');
  assert.equal(detectStatementKind('WITH x AS (SELECT 1) SELECT * FROM x'), 'SELECT');
  assert.equal(detectStatementKind('CREATE UNIQUE INDEX i ON t (a)'), 'CREATE_INDEX');
  assert.equal(detectStatementKind('CREATE OR REPLACE HYBRID TABLE t (id INT PRIMARY KEY)'), 'CREATE_TABLE');
  assert.equal(detectStatementKind('call proc()'), 'CALL');
  assert.equal(detectStatementKind('GRANT SELECT ON t TO r'), 'OTHER');
});

test('replaceBalancedCall swaps a call with nested parentheses', () => {
  assert.equal(
    replaceBalancedCall('SELECT * FROM t, LATERAL FLATTEN(input => f(x)) v', 'LATERAL\\s+FLATTEN', '(SELECT 1 AS value)'),
    'SELECT * FROM t, (SELECT 1 AS value) v',
  );
});

test('preprocessForParser rewrites casts, positional binds and FETCH FIRST', () => {
  assert.equal(
    preprocessForParser('SELECT a::NUMBER(10,2) FROM t WHERE id = ? FETCH FIRST 5 ROWS ONLY;'),
    'SELECT a FROM t WHERE id = :bind1 LIMIT 5',
  );
  assert.equal(preprocessForParser("SELECT '?' FROM t"), "SELECT '?' FROM t");
  assert.equal(preprocessForParser('SELECT a FROM t QUALIFY rn = 1 ORDER BY a'), 'SELECT a FROM t  ORDER BY a');
});

test('largestLiteralLength measures literal bodies', () => {
  assert.equal(largestLiteralLength("SELECT 'ab', 'abcd'"), 4);
  assert.equal(largestLiteralLength('SELECT 1'), 0);
});

test('bareName and identKey strip qualifiers and quoting', () => {
  assert.equal(bareName('"DB"."S"."Orders"'), 'Orders');
  assert.equal(identKey('s.orders'), 'ORDERS');
  assert.equal(identKey('`Orders`'), 'ORDERS');
});
