import { z } from 'zod';
import { ConfigError } from './errors';
import type { Finding, PrimaryCause, RuleCategory, RuntimeMetadata, Severity } from './types';

/**
 * Additive priority rubric. Architecture-level problems (a hybrid table with
 * no usable index) must outrank single-query tuning issues; the exact points
 * are tunable.
 */
export interface RankingRubric {
  severityPoints: Record<Severity, number>;
  zeroIndexBonus: number;
  misalignedIndexBonus: number;
  remoteSpillBonus: number;
  localSpillBonus: number;
  throttledTinyResultBonus: number;
  scanHeavyTinyResultBonus: number;
  largeUnboundedSortBonus: number;
}

const points = z.number().finite();

const RubricSchema = z
  .object({
    severityPoints: z
      .object({
        CRITICAL: points.default(45),
        HIGH: points.default(30),
        MEDIUM: points.default(15),
        LOW: points.default(5),
        INFO: points.default(0),
      })
      .strict()
      .default({}),
    zeroIndexBonus: points.default(100),
    misalignedIndexBonus: points.default(50),
    remoteSpillBonus: points.default(40),
    localSpillBonus: points.default(20),
    throttledTinyResultBonus: points.default(30),
    scanHeavyTinyResultBonus: points.default(20),
    largeUnboundedSortBonus: points.default(15),
  })
  .strict();

export type RubricOverrides = z.input<typeof RubricSchema>;

/** Fill unspecified rubric entries with their defaults. */
export function resolveRubric(overrides: unknown = {}): RankingRubric {
  const result = RubricSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigError('Invalid ranking rubric override', result.error.issues);
  }
  return result.data;
}

export const DEFAULT_RUBRIC: RankingRubric = resolveRubric();

const SPILL_CATEGORIES = new Set<RuleCategory>(['sort', 'join']);

/** Sort, join, and memory-bound findings; spill bonuses apply only to these. */
const spillSensitive = (f: Finding): boolean =>
  SPILL_CATEGORIES.has(f.category) || (f.rule === 'STORED_PROC_BOTTLENECK' && f.evidence.dominant === 'SPILL');
const ACCESS_CATEGORIES = new Set<RuleCategory>(['index', 'filter', 'workload']);
const SCAN_CATEGORIES = new Set<RuleCategory>(['index', 'filter']);

/** Score one finding; `reasons` names each bonus that applied. */
export function priorityScore(
  f: Finding,
  runtime: RuntimeMetadata = {},
  rubric: RankingRubric = DEFAULT_RUBRIC,
): { score: number; reasons: string[] } {
  let score = rubric.severityPoints[f.severity];
  const reasons: string[] = [f.severity];
  const bonus = (points: number, reason: string): void => {
    score += points;
    reasons.push(reason);
  };

  const rows = runtime.rowsProduced ?? 0;
  const bytes = runtime.bytesScanned ?? 0;

  if (f.rule === 'HT_WITHOUT_INDEXES' || f.rule === 'MULTIPLE_HT_TABLES_NO_INDEXES') {
    bonus(rubric.zeroIndexBonus, 'hybrid table without indexes');
  }
  if (f.rule === 'INDEX_MISALIGNED' || f.rule === 'COMPOSITE_INDEX_MISALIGNED') {
    bonus(rubric.misalignedIndexBonus, 'no index covers the predicates');
  }
  if (spillSensitive(f)) {
    if ((runtime.bytesSpilledRemote ?? 0) > 0) bonus(rubric.remoteSpillBonus, 'remote spill');
    else if ((runtime.bytesSpilledLocal ?? 0) > 0) bonus(rubric.localSpillBonus, 'local spill');
  }
  if (ACCESS_CATEGORIES.has(f.category) && (runtime.storageThrottlingMs ?? 0) > 5000 && rows < 100) {
    bonus(rubric.throttledTinyResultBonus, 'long storage wait for a tiny result');
  }
  if (SCAN_CATEGORIES.has(f.category) && bytes > 1e9 && rows < 1000 && bytes / Math.max(rows, 1) > 1e6) {
    bonus(rubric.scanHeavyTinyResultBonus, 'large scan for few rows');
  }
  if (f.rule === 'ORDER_BY_NO_LIMIT' && rows > 100_000) {
    bonus(rubric.largeUnboundedSortBonus, 'large unbounded sort');
  }
  return { score, reasons };
}

/**
 * The single highest-scoring finding. Ties keep the original finding order.
 */
export function rankPrimaryCause(
  findings: readonly Finding[],
  runtime: RuntimeMetadata = {},
  rubric: RankingRubric = DEFAULT_RUBRIC,
): PrimaryCause | null {
  const ranked = findings
    .map((f, i) => ({ f, i, ...priorityScore(f, runtime, rubric) }))
    .sort((a, b) => b.score - a.score || a.i - b.i);
  const top = ranked[0];
  if (!top) return null;
  return {
    finding: top.f,
    score: top.score,
    explanation: `${top.f.rule} is the primary cause (${top.reasons.join(', ')}): ${top.f.message}`,
  };
}
