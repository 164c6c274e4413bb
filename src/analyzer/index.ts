import { logger } from '../utils/logger';
import { buildActions } from './actions';
import { enrichCoverage, score } from './coverage';
import { ParseError } from './errors';
import { parse } from './parser';
import { runRules, summarizeFindings } from './pipeline';
import { DEFAULT_RUBRIC, type RankingRubric, rankPrimaryCause } from './ranking';
import { defaultRuleSettings, type RuleSettings } from './rules';
import type { AnalysisResult, PlanIndexMetadata, RuntimeMetadata, TableMetadata } from './types';

const log = logger.child({ module: 'analyzer' });

export interface AnalyzeOptions {
  /** Schema metadata keyed by table name (qualified or short) */
  metadata?: Readonly<Record<string, TableMetadata>>;
  runtime?: RuntimeMetadata;
  /** Index metadata recovered from an execution-plan export */
  planIndexes?: Readonly<Record<string, PlanIndexMetadata>>;
  rubric?: RankingRubric;
  dialects?: readonly string[];
  settings?: RuleSettings;
}

/**
 * Analyze one statement: parse, score index coverage, run the rules, rank
 * a primary cause and build candidate actions.
 *
 * @throws ParseError when the statement cannot be modelled
 */
export function analyze(sql: string, options: AnalyzeOptions = {}): AnalysisResult {
  const runtime = options.runtime ?? {};
  const query = parse(sql, { dialects: options.dialects });

  const baseCoverage = score(query, options.metadata ?? {}, { assumeHybrid: runtime.touchedHybridTable ?? false });
  const coverage = options.planIndexes ? enrichCoverage(query, baseCoverage, options.planIndexes) : baseCoverage;

  const findings = summarizeFindings(runRules(query, coverage, runtime, options.settings ?? defaultRuleSettings()));
  const primaryCause = rankPrimaryCause(findings, runtime, options.rubric ?? DEFAULT_RUBRIC);
  const actions = buildActions(findings, coverage, query.sql);

  log.debug(
    { statementKind: query.statementKind, findings: findings.length, primary: primaryCause?.finding.rule ?? null },
    'analyzed statement',
  );
  return { query, coverage, baseCoverage, findings, primaryCause, actions };
}

export type BatchEntry = { ok: true; result: AnalysisResult } | { ok: false; error: ParseError };

export interface BatchStatement {
  sql: string;
  runtime?: RuntimeMetadata;
}

/**
 * Analyze statements independently. A statement that fails to parse is
 * reported in place; the rest still run.
 */
export function analyzeBatch(
  statements: readonly (string | BatchStatement)[],
  options: Omit<AnalyzeOptions, 'runtime'> = {},
): BatchEntry[] {
  return statements.map((entry): BatchEntry => {
    const { sql, runtime } = typeof entry === 'string' ? { sql: entry, runtime: undefined } : entry;
    try {
      return { ok: true, result: analyze(sql, { ...options, runtime }) };
    } catch (err) {
      if (err instanceof ParseError) {
        log.debug({ err: err.message }, 'statement skipped');
        return { ok: false, error: err };
      }
      throw err;
    }
  });
}

export { parse } from './parser';
export type { ParseOptions } from './parser';
export { score, enrichCoverage, eqPrefix, normalizePredicates } from './coverage';
export { runRules, summarizeFindings, RULES } from './pipeline';
export { defaultRuleSettings, RULE_CATEGORY } from './rules';
export type { RuleSettings } from './rules';
export { suggestIndex } from './index-rules';
export { DEFAULT_RUBRIC, resolveRubric, priorityScore, rankPrimaryCause } from './ranking';
export type { RankingRubric, RubricOverrides } from './ranking';
export { extractFeatures, averageFeatures, deriveFeatures, ExecutionTelemetrySchema, JOIN_EXPLOSION_DETECT_RATIO } from './features';
export type { ExecutionTelemetry } from './features';
export {
  classifyRunPair,
  classifySingleExecution,
  classifyBatch,
  classifyCohorts,
  classifyExecutionDetail,
  deltaReport,
  formatDeltaReport,
} from './classifier';
export type {
  PairLabel,
  PairClassification,
  SingleLabel,
  BatchClassification,
  CohortLabel,
  CohortClassification,
  JoinExplosionSummary,
  ExecutionDetail,
  ExecutionDetailLabel,
  DeltaReport,
  MetricDelta,
} from './classifier';
export { buildActions, resolveActions } from './actions';
export { AnalyzerError, ParseError, RuleEvaluationSkipped, ConfigError, UnknownActionError } from './errors';
export type * from './types';
