import { logger } from '../utils/logger';
import { RuleEvaluationSkipped } from './errors';
import {
  checkCompositeIndexes,
  checkHtWithoutIndexes,
  checkIndexMetadataUnknown,
  checkIndexMisaligned,
  checkOrderMisaligned,
  checkPrimaryKeyNotUsed,
} from './index-rules';
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
  defaultRuleSettings,
  finding,
  type Rule,
  type RuleSettings,
} from './rules';
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
import type { Coverage, Finding, FindingOf, ParsedQuery, RuntimeMetadata } from './types';

const log = logger.child({ module: 'rules' });

export interface NamedRule {
  name: string;
  run: Rule;
}

/** Fixed evaluation order. Finding order follows it. */
export const RULES: readonly NamedRule[] = [
  // index coverage
  { name: 'index-metadata-unknown', run: checkIndexMetadataUnknown },
  { name: 'ht-without-indexes', run: checkHtWithoutIndexes },
  { name: 'index-misaligned', run: checkIndexMisaligned },
  { name: 'primary-key-not-used', run: checkPrimaryKeyNotUsed },
  { name: 'composite-indexes', run: checkCompositeIndexes },
  { name: 'order-misaligned', run: checkOrderMisaligned },
  // query shape
  { name: 'no-filtering-clauses', run: checkNoFilteringClauses },
  { name: 'no-where-filter', run: checkNoWhereFilter },
  { name: 'non-sargable-predicates', run: checkNonSargablePredicates },
  { name: 'function-in-join-predicate', run: checkFunctionInJoinPredicate },
  { name: 'case-transform-heavy', run: checkCaseTransformHeavy },
  { name: 'type-mismatch', run: checkTypeMismatch },
  { name: 'join-without-on', run: checkJoinWithoutOn },
  { name: 'join-pattern', run: checkJoinPattern },
  { name: 'distinct-unnecessary', run: checkDistinctUnnecessary },
  { name: 'order-by-no-limit', run: checkOrderByNoLimit },
  { name: 'wide-select', run: checkWideSelect },
  { name: 'bind-parameters', run: checkBindParameters },
  { name: 'mixed-tables', run: checkMixedTables },
  // statements
  { name: 'purge-pattern', run: checkPurgePattern },
  { name: 'single-row-insert', run: checkSingleRowInsert },
  { name: 'ht-pk-not-in-insert', run: checkHtPkNotInInsert },
  { name: 'write-amplification', run: checkWriteAmplification },
  { name: 'dynamic-identifier', run: checkDynamicIdentifier },
  { name: 'large-literal-payload', run: checkLargeLiteralPayload },
  { name: 'copy-into-stage', run: checkCopyIntoStageFromHt },
  { name: 'ctas-primary-key', run: checkCtasPrimaryKeyError },
  { name: 'create-index', run: checkCreateIndex },
  { name: 'stored-procedure', run: checkStoredProcedure },
  { name: 'stored-proc-bottleneck', run: checkStoredProcBottleneck },
  // runtime
  { name: 'throttling', run: checkThrottling },
  { name: 'analytic-workload', run: checkAnalyticWorkload },
];

/**
 * Run every rule in order. A rule that lacks inputs or throws contributes
 * nothing; the others still run.
 */
export function runRules(
  query: ParsedQuery,
  coverage: readonly Coverage[],
  runtime: RuntimeMetadata = {},
  settings: RuleSettings = defaultRuleSettings(),
  rules: readonly NamedRule[] = RULES,
): Finding[] {
  const findings: Finding[] = [];
  for (const rule of rules) {
    try {
      findings.push(...rule.run(query, coverage, runtime, settings));
    } catch (err) {
      if (err instanceof RuleEvaluationSkipped) {
        log.debug({ rule: rule.name, missing: err.missing }, 'rule skipped');
      } else {
        log.warn({ rule: rule.name, err }, 'rule failed');
      }
    }
  }
  return findings;
}

function isZeroIndexFinding(f: Finding): f is FindingOf<'HT_WITHOUT_INDEXES'> {
  return f.rule === 'HT_WITHOUT_INDEXES';
}

/**
 * Two or more zero-index tables collapse into one summary finding placed
 * first. Everything else keeps its order.
 */
export function summarizeFindings(findings: readonly Finding[]): Finding[] {
  const zeroIndex = findings.filter(isZeroIndexFinding);
  if (zeroIndex.length < 2) return [...findings];

  const tables = zeroIndex.map((f) => ({ table: f.evidence.table, equalityColumns: [...f.evidence.equalityColumns] }));
  const ddl = zeroIndex.flatMap((f) => (f.evidence.suggestion ? [f.evidence.suggestion.ddl] : []));
  const summary = finding(
    'MULTIPLE_HT_TABLES_NO_INDEXES',
    'CRITICAL',
    `${tables.length} hybrid tables have no indexes: ${tables.map((t) => t.table).join(', ')}. Every access to them is a full scan.`,
    ddl.length > 0 ? `Create indexes matching the predicates:\n${ddl.join('\n')}` : 'Define primary keys on these tables.',
    { tables },
  );
  return [summary, ...findings.filter((f) => !isZeroIndexFinding(f))];
}
