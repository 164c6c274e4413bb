import { config } from '../config';
import { averageFeatures } from './features';
import type { FeatureVector } from './types';

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

export type PairLabel =
  | 'QUERY_CHANGE'
  | 'NO_REGRESSION'
  | 'COMPILATION'
  | 'DATA_VOLUME'
  | 'FDB_LATENCY'
  | 'EXECUTION_ENVIRONMENT'
  | 'JOIN_SKEW_OR_EXPLOSION'
  | 'EXECUTION_GENERIC'
  | 'UNKNOWN';

export type SingleLabel =
  | 'OLTP_OPTIMAL'
  | 'COMPILATION_HEAVY'
  | 'HYBRID_ANALYTIC'
  | 'FDB_BOTTLENECK'
  | 'MISSING_INDEX'
  | 'JOIN_HEAVY'
  | 'OLTP_SLOW'
  | 'UNKNOWN';

export type ExecutionDetailLabel =
  | 'HYBRID_PROBE_BOUND'
  | 'JOIN_BOUND'
  | 'EXECUTION_SKEW'
  | 'FILTER_BOUND'
  | 'HYBRID_PROBE_DOMINANT'
  | 'HASH_JOIN_DOMINANT'
  | 'FILTER_DOMINANT'
  | 'PROFILING_UNAVAILABLE';

export type CohortLabel =
  | 'QUERY_CHANGE'
  | 'INSUFFICIENT_DATA'
  | 'COMPILATION'
  | 'DATA_VOLUME'
  | 'JOIN_SKEW_OR_EXPLOSION'
  | 'FDB_BOUND'
  | 'EXECUTION_ENVIRONMENT'
  | `EXECUTION:${Exclude<ExecutionDetailLabel, 'PROFILING_UNAVAILABLE'>}`
  | 'MIXED';

export const PAIR_LABEL_DESCRIPTIONS: Record<PairLabel, string> = {
  QUERY_CHANGE: 'Different query (query hash changed)',
  NO_REGRESSION: 'No significant performance change',
  COMPILATION: 'Compilation time increased significantly',
  DATA_VOLUME: 'Data volume increased (more KV rows scanned)',
  FDB_LATENCY: 'Storage layer latency spike',
  EXECUTION_ENVIRONMENT: 'Execution environment (warehouse load, concurrency)',
  JOIN_SKEW_OR_EXPLOSION: 'Join explosion or data skew',
  EXECUTION_GENERIC: 'Execution phase slower for no single identifiable reason',
  UNKNOWN: 'Unable to classify',
};

export const SINGLE_LABEL_DESCRIPTIONS: Record<SingleLabel, string> = {
  OLTP_OPTIMAL: 'Well-optimized point lookup (under 100 ms, low KV work)',
  COMPILATION_HEAVY: 'Compilation dominates (plan cache miss)',
  HYBRID_ANALYTIC: 'Analytic workload on a hybrid table (large scans)',
  FDB_BOTTLENECK: 'Storage layer dominates execution',
  MISSING_INDEX: 'Likely missing index (many KV rows, little index usage)',
  JOIN_HEAVY: 'Join-dominated execution',
  OLTP_SLOW: 'Lookup that should be fast but is not',
  UNKNOWN: 'Unable to classify',
};

// ---------------------------------------------------------------------------
// Metric deltas
// ---------------------------------------------------------------------------

export const TRACKED_METRICS = [
  'totalMs',
  'executeMs',
  'compileMs',
  'transferMs',
  'kvRowsScanned',
  'kvTransactions',
  'storageMs',
  'storageTransactions',
  'rowsProduced',
  'bytesScanned',
] as const;

export type TrackedMetric = (typeof TRACKED_METRICS)[number];

export interface MetricDelta {
  a: number;
  b: number;
  delta: number;
  pct: number;
  increased: boolean;
}

export type DeltaReport = Record<TrackedMetric, MetricDelta>;

export function metricDelta(a: number, b: number): MetricDelta {
  const pct = a > 0 ? ((b - a) / a) * 100 : b > 0 ? 100 : 0;
  return { a, b, delta: b - a, pct, increased: b > a };
}

export function deltaReport(a: FeatureVector, b: FeatureVector): DeltaReport {
  const d = (k: TrackedMetric): MetricDelta => metricDelta(a[k], b[k]);
  return {
    totalMs: d('totalMs'),
    executeMs: d('executeMs'),
    compileMs: d('compileMs'),
    transferMs: d('transferMs'),
    kvRowsScanned: d('kvRowsScanned'),
    kvTransactions: d('kvTransactions'),
    storageMs: d('storageMs'),
    storageTransactions: d('storageTransactions'),
    rowsProduced: d('rowsProduced'),
    bytesScanned: d('bytesScanned'),
  };
}

/** One line per metric that is non-zero in either run. */
export function formatDeltaReport(report: DeltaReport): string {
  const lines = TRACKED_METRICS.flatMap((k) => {
    const d = report[k];
    if (d.a === 0 && d.b === 0) return [];
    const arrow = d.delta > 0 ? 'up' : d.delta < 0 ? 'down' : 'flat';
    return [`${k}: ${d.a.toFixed(0)} -> ${d.b.toFixed(0)} (${arrow} ${Math.abs(d.pct).toFixed(1)}%)`];
  });
  return lines.length > 0 ? lines.join('\n') : 'No differences detected.';
}

// ---------------------------------------------------------------------------
// Two-run comparison
// ---------------------------------------------------------------------------

export interface PairClassification {
  primaryCause: PairLabel;
  secondaryCause: 'PLAN_CACHE' | null;
  deltas: DeltaReport;
  description: string;
}

function growthRatio(a: number, b: number): number {
  if (a > 0 && b > 0) return b / a;
  if (b > 0) return Number.POSITIVE_INFINITY;
  return 1;
}

const HASH_JOIN = /hash\s*join/i;

/**
 * Explain why run `b` differs from baseline `a`. Ordered decision list:
 * the first matching branch wins. The delta report is always returned.
 */
export function classifyRunPair(a: FeatureVector, b: FeatureVector): PairClassification {
  const deltas = deltaReport(a, b);
  const secondaryCause = a.planCacheReused && !b.planCacheReused ? 'PLAN_CACHE' : null;
  const result = (primaryCause: PairLabel, secondary: 'PLAN_CACHE' | null = secondaryCause): PairClassification => ({
    primaryCause,
    secondaryCause: secondary,
    deltas,
    description:
      PAIR_LABEL_DESCRIPTIONS[primaryCause] + (secondary ? ' (plan cache miss in the slower run)' : ''),
  });

  if (a.queryHash !== null && b.queryHash !== null && a.queryHash !== b.queryHash) {
    return result('QUERY_CHANGE', null);
  }
  if (a.totalMs > 0 && Math.abs(deltas.totalMs.delta) <= 0.2 * a.totalMs) {
    return result('NO_REGRESSION', null);
  }
  if (deltas.compileMs.delta > 0.5 * Math.max(a.totalMs, 1)) {
    return result('COMPILATION', null);
  }

  if (a.executeShare > 0.5 || b.executeShare > 0.5) {
    const kvRatio = growthRatio(a.kvRowsScanned, b.kvRowsScanned);
    const txnRatio = growthRatio(a.kvTransactions, b.kvTransactions);

    if (kvRatio > 2) return result('DATA_VOLUME');

    if (kvRatio >= 0.5 && kvRatio <= 2 && txnRatio >= 0.5 && txnRatio <= 2) {
      if (b.storageMs > 3 * Math.max(a.storageMs, 1) && b.storageMs > 0.3 * Math.max(b.executeMs, 1)) {
        return result('FDB_LATENCY');
      }
      if (b.executeMs > 2 * Math.max(a.executeMs, 1)) {
        return result('EXECUTION_ENVIRONMENT');
      }
    }

    if (b.hotOperators.some((op) => HASH_JOIN.test(op.name) && op.timeMs > 0.5 * b.executeMs)) {
      return result('JOIN_SKEW_OR_EXPLOSION');
    }
  }

  if (deltas.executeMs.delta > 0.5 * Math.max(a.totalMs, 1)) {
    return result('EXECUTION_GENERIC');
  }
  return result('UNKNOWN');
}

// ---------------------------------------------------------------------------
// Single execution and batch
// ---------------------------------------------------------------------------

export function classifySingleExecution(
  f: FeatureVector,
  thresholdMs: number = config.SLOW_QUERY_THRESHOLD_MS,
): SingleLabel {
  if (f.totalMs < 100 && f.kvRowsScanned < 1000) return 'OLTP_OPTIMAL';
  if (f.compileShare > 0.5) return 'COMPILATION_HEAVY';
  if (f.kvRowsScanned > 100_000 || f.rowsProduced > 10_000) return 'HYBRID_ANALYTIC';
  if (f.storageShareOfExecute > 0.5 && f.storageMs > 100) return 'FDB_BOTTLENECK';
  if (f.kvRowsScanned > 1000 && f.kvIndexRowsScanned < f.kvRowsScanned * 0.1) return 'MISSING_INDEX';
  if (f.hotOperators.some((op) => HASH_JOIN.test(op.name))) return 'JOIN_HEAVY';
  if (f.totalMs >= thresholdMs && f.kvRowsScanned < 10_000 && f.rowsProduced < 1000) return 'OLTP_SLOW';
  return 'UNKNOWN';
}

export interface LabelledExecution {
  features: FeatureVector;
  label: SingleLabel;
}

export interface BatchClassification {
  fast: LabelledExecution[];
  slow: LabelledExecution[];
  /** Slow executions grouped by label, in first-seen order */
  slowBuckets: Map<SingleLabel, FeatureVector[]>;
  dominantSlowCause: SingleLabel;
  summary: string;
}

export function classifyBatch(
  vectors: readonly FeatureVector[],
  thresholdMs: number = config.SLOW_QUERY_THRESHOLD_MS,
): BatchClassification {
  const fast: LabelledExecution[] = [];
  const slow: LabelledExecution[] = [];
  const slowBuckets = new Map<SingleLabel, FeatureVector[]>();

  for (const features of vectors) {
    const label = classifySingleExecution(features, thresholdMs);
    if (features.totalMs < thresholdMs) {
      fast.push({ features, label });
      continue;
    }
    slow.push({ features, label });
    const bucket = slowBuckets.get(label);
    if (bucket) bucket.push(features);
    else slowBuckets.set(label, [features]);
  }

  let dominantSlowCause: SingleLabel = 'UNKNOWN';
  let maxCount = 0;
  for (const [label, members] of slowBuckets) {
    if (members.length > maxCount) {
      maxCount = members.length;
      dominantSlowCause = label;
    }
  }

  const parts = [
    `Analyzed ${vectors.length} executions: ${fast.length} fast (<${thresholdMs}ms), ${slow.length} slow (>=${thresholdMs}ms).`,
  ];
  if (slow.length > 0) {
    const breakdown = [...slowBuckets.entries()]
      .sort((x, y) => y[1].length - x[1].length)
      .map(([label, members]) => `${label}: ${members.length}`)
      .join(', ');
    parts.push(`Slow breakdown: ${breakdown}.`);
    parts.push(`Primary root cause: ${SINGLE_LABEL_DESCRIPTIONS[dominantSlowCause]}.`);
  }

  return { fast, slow, slowBuckets, dominantSlowCause, summary: parts.join(' ') };
}

// ---------------------------------------------------------------------------
// Execution detail
// ---------------------------------------------------------------------------

export interface ExecutionDetail {
  label: ExecutionDetailLabel;
  explanation: string;
  recommendation: string;
}

const pct = (share: number): string => `${(share * 100).toFixed(0)}%`;

/** Drill into profiled operator time when execution is the problem. */
export function classifyExecutionDetail(f: FeatureVector): ExecutionDetail {
  const { cpuMs, idleMs, hybridProbeMs, joinMs, filterMs } = f.profile;
  const hasProfiling = cpuMs > 0 || idleMs > 0 || hybridProbeMs > 0 || joinMs > 0;

  if (hasProfiling) {
    const profiled = cpuMs + idleMs > 0 ? cpuMs + idleMs : f.executeMs || 1;
    const probeShare = hybridProbeMs / profiled;
    const joinShare = joinMs / profiled;
    const idleShare = idleMs / profiled;
    const filterShare = filterMs / profiled;

    if (probeShare > 0.5) {
      return {
        label: 'HYBRID_PROBE_BOUND',
        explanation: `Hybrid table probes take ${pct(probeShare)} of profiled time (${hybridProbeMs.toFixed(0)}ms).`,
        recommendation: 'Index the WHERE predicate columns and keep the key order aligned with the predicates.',
      };
    }
    if (joinShare > 0.3) {
      return {
        label: 'JOIN_BOUND',
        explanation: `Hash joins take ${pct(joinShare)} of profiled time (${joinMs.toFixed(0)}ms).`,
        recommendation: 'Filter before joining to shrink intermediate results, and check the join keys are indexed.',
      };
    }
    if (idleShare > 0.3) {
      return {
        label: 'EXECUTION_SKEW',
        explanation: `Idle time is ${pct(idleShare)} of profiled time, pointing at data skew or resource waits.`,
        recommendation: 'Look for hot keys and concurrent load; isolate the workload on a dedicated warehouse.',
      };
    }
    if (filterShare > 0.3) {
      return {
        label: 'FILTER_BOUND',
        explanation: `Filters take ${pct(filterShare)} of profiled time; predicates are applied late.`,
        recommendation: 'Push predicates down onto indexed columns so rows are discarded during the lookup.',
      };
    }
  }

  const top = f.hotOperators[0];
  if (top) {
    const share = top.timeMs / (f.executeMs || 1);
    if (share > 0.4) {
      const explanation = `'${top.name}' takes ${pct(share)} of execution time (${top.timeMs.toFixed(0)}ms).`;
      if (/HybridTableProbe/i.test(top.name)) {
        return {
          label: 'HYBRID_PROBE_DOMINANT',
          explanation,
          recommendation: 'Give the probed predicates a covering index whose key order matches them.',
        };
      }
      if (HASH_JOIN.test(top.name)) {
        return {
          label: 'HASH_JOIN_DOMINANT',
          explanation,
          recommendation: 'Review join order and look for missing join conditions.',
        };
      }
      if (/Filter/i.test(top.name)) {
        return {
          label: 'FILTER_DOMINANT',
          explanation,
          recommendation: 'Index the filter columns or restructure the query to filter earlier.',
        };
      }
    }
  }

  return {
    label: 'PROFILING_UNAVAILABLE',
    explanation: 'No operator profiling was available for this execution.',
    recommendation: 'Collect a profiled export and check warehouse concurrency during the run.',
  };
}

// ---------------------------------------------------------------------------
// Cohorts
// ---------------------------------------------------------------------------

export interface CohortOptions {
  /** Every slow execution already binds its parameters */
  slowUseBoundVariables?: boolean;
}

export interface JoinExplosionSummary {
  detected: boolean;
  count: number;
  worstOperator: string | null;
  maxRatio: number;
}

export interface CohortClassification {
  rootCause: CohortLabel;
  deltas: DeltaReport;
  executionDetail: ExecutionDetail | null;
  /** Largest join output/input ratio among slow executions, when it drove the label */
  joinExplosionRatio: number | null;
  /** Join fan-out seen in the slow cohort, whether or not it drove the label */
  joinExplosion: JoinExplosionSummary;
  /** Remediation boundaries a narrator must respect */
  constraints: string[];
}

const JOIN_EXPLOSION_CAUSE_RATIO = 20;

const similar = (x: number, y: number): boolean => Math.abs(y - x) / Math.max(x, y, 1) < 0.2;

function cohortConstraints(
  rootCause: CohortLabel,
  fast: FeatureVector,
  slow: FeatureVector,
  joinRatio: number | null,
  options: CohortOptions,
): string[] {
  const constraints: string[] = [];
  if (options.slowUseBoundVariables) {
    constraints.push('All slow executions already use bound variables. Do not recommend parameterization.');
  }

  if (rootCause === 'EXECUTION_ENVIRONMENT' || rootCause.startsWith('EXECUTION:')) {
    constraints.push(
      'KV and storage work are similar between cohorts. Focus on warehouse sizing, concurrency limits and workload isolation; do not recommend storage tuning or query rewrites.',
    );
    if (fast.storageMs > 0 && Math.abs(slow.storageMs - fast.storageMs) / fast.storageMs < 0.5) {
      constraints.push(
        `Storage time is similar (fast ${fast.storageMs.toFixed(0)}ms, slow ${slow.storageMs.toFixed(0)}ms). Storage is not the bottleneck.`,
      );
    }
  } else if (rootCause === 'FDB_BOUND') {
    constraints.push(
      'Storage dominates execution. Focus on batching hybrid DML, fewer per-row operations, bulk-load patterns and throttling quotas.',
    );
  } else if (rootCause === 'DATA_VOLUME') {
    constraints.push('Slow executions scan far more KV rows. Focus on predicates, indexes and table type choice.');
  } else if (rootCause === 'JOIN_SKEW_OR_EXPLOSION') {
    constraints.push(
      `A join produces ${(joinRatio ?? 0).toFixed(0)}x more rows than it reads. Focus on join keys, extra predicates or pre-aggregation; index changes and warehouse sizing are not the primary fix.`,
    );
  } else if (rootCause === 'COMPILATION') {
    constraints.push('Slow executions spend longer compiling. Focus on bound variables and plan cache reuse.');
    if (options.slowUseBoundVariables) {
      constraints.push('Bound variables are already used; consider query simplification or recent schema changes.');
    }
  } else if (rootCause === 'MIXED') {
    constraints.push('Several factors contribute. Prioritize by the largest metric deltas.');
  }

  if (slow.hasJoinExplosion && rootCause !== 'JOIN_SKEW_OR_EXPLOSION') {
    const where = slow.worstJoinOperator ? ` (${slow.worstJoinOperator})` : '';
    constraints.push(
      `A join produces ${slow.maxJoinRatio.toFixed(0)}x more rows than it reads${where}. It is not the primary cause, but check its join keys.`,
    );
  }

  if (fast.kvRowsScanned > 0 && similar(fast.kvRowsScanned, slow.kvRowsScanned)) {
    constraints.push('KV rows scanned are similar between cohorts; the query shape is not the primary issue.');
  }
  return constraints;
}

interface CohortDecision {
  rootCause: CohortLabel;
  executionDetail?: ExecutionDetail;
  joinExplosionRatio?: number;
}

function decideCohort(
  fastVectors: readonly FeatureVector[],
  slowVectors: readonly FeatureVector[],
  fast: FeatureVector,
  slow: FeatureVector,
): CohortDecision {
  if (fastVectors.length === 0 || slowVectors.length === 0) return { rootCause: 'INSUFFICIENT_DATA' };

  const fastHashes = new Set(fastVectors.flatMap((v) => (v.queryHash ? [v.queryHash] : [])));
  const slowHashes = slowVectors.flatMap((v) => (v.queryHash ? [v.queryHash] : []));
  if (fastHashes.size > 0 && slowHashes.length > 0 && !slowHashes.some((h) => fastHashes.has(h))) {
    return { rootCause: 'QUERY_CHANGE' };
  }

  if (fast.totalMs === 0 || slow.totalMs === 0) return { rootCause: 'INSUFFICIENT_DATA' };
  if (slow.compileMs - fast.compileMs > 0.5 * fast.totalMs) return { rootCause: 'COMPILATION' };
  if (fast.kvRowsScanned > 0 && slow.kvRowsScanned / fast.kvRowsScanned > 2) return { rootCause: 'DATA_VOLUME' };

  if (slow.maxJoinRatio > JOIN_EXPLOSION_CAUSE_RATIO) {
    return { rootCause: 'JOIN_SKEW_OR_EXPLOSION', joinExplosionRatio: slow.maxJoinRatio };
  }

  if (
    slow.executeMs > 0 &&
    slow.storageMs > 0 &&
    slow.storageShareOfExecute > 0.5 &&
    slow.storageMs / Math.max(fast.storageMs, 1) > 3
  ) {
    return { rootCause: 'FDB_BOUND' };
  }

  const sameWork =
    similar(fast.kvRowsScanned, slow.kvRowsScanned) && similar(fast.storageTransactions, slow.storageTransactions);
  if (sameWork && slow.executeMs - fast.executeMs > 0.5 * Math.max(fast.executeMs, 1)) {
    const sample = slowVectors.reduce((worst, v) => (v.totalMs > worst.totalMs ? v : worst));
    const executionDetail = classifyExecutionDetail(sample);
    const label = executionDetail.label;
    return {
      rootCause: label === 'PROFILING_UNAVAILABLE' ? 'EXECUTION_ENVIRONMENT' : `EXECUTION:${label}`,
      executionDetail,
    };
  }
  return { rootCause: 'MIXED' };
}

/**
 * Explain why the slow cohort is slower than the fast one from averaged
 * features. Profiling detail comes from the slowest member.
 */
export function classifyCohorts(
  fastVectors: readonly FeatureVector[],
  slowVectors: readonly FeatureVector[],
  options: CohortOptions = {},
): CohortClassification {
  const fast = averageFeatures(fastVectors);
  const slow = averageFeatures(slowVectors);
  const decision = decideCohort(fastVectors, slowVectors, fast, slow);
  const joinExplosionRatio = decision.joinExplosionRatio ?? null;
  return {
    rootCause: decision.rootCause,
    deltas: deltaReport(fast, slow),
    executionDetail: decision.executionDetail ?? null,
    joinExplosionRatio,
    joinExplosion: {
      detected: slow.hasJoinExplosion,
      count: slow.joinExplosionCount,
      worstOperator: slow.worstJoinOperator,
      maxRatio: slow.maxJoinRatio,
    },
    constraints: cohortConstraints(decision.rootCause, fast, slow, joinExplosionRatio, options),
  };
}
