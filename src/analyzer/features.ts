import { z } from 'zod';
import type { FeatureVector, HotOperator, ProfileBreakdown } from './types';

const MAX_HOT_OPERATORS = 5;
/** Output/input row ratio at which a join operator counts as exploding */
export const JOIN_EXPLOSION_DETECT_RATIO = 10;

// Unparseable or missing counters read as zero.
const counter = z.coerce.number().finite().nonnegative().catch(0);
const optionalId = z.string().min(1).nullable().catch(null);

const HotOperatorSchema = z.object({
  name: z.string().catch(''),
  timeMs: counter,
});

const JoinOperatorSchema = z.object({
  name: z.string().catch(''),
  rowsIn: counter,
  rowsOut: counter,
});

const EMPTY_PROFILE: ProfileBreakdown = { cpuMs: 0, idleMs: 0, hybridProbeMs: 0, joinMs: 0, filterMs: 0 };

const ProfileSchema = z
  .object({
    cpuMs: counter,
    idleMs: counter,
    hybridProbeMs: counter,
    joinMs: counter,
    filterMs: counter,
  })
  .catch(EMPTY_PROFILE);

/**
 * One execution's telemetry as exported by the metadata collector. Every
 * field is optional.
 */
export const ExecutionTelemetrySchema = z.object({
  queryId: optionalId,
  queryHash: optionalId,
  /** Set when the plan came from the plan cache */
  planCacheOriginalJobId: optionalId,
  totalMs: counter,
  compileMs: counter,
  executeMs: counter,
  transferMs: counter,
  rowsProduced: counter,
  bytesScanned: counter,
  kvRowsScanned: counter,
  kvIndexRowsScanned: counter,
  kvProbes: counter,
  kvTransactions: counter,
  storageMs: counter,
  storageTransactions: counter,
  storageBytes: counter,
  hotOperators: z.array(HotOperatorSchema).catch([]),
  joinOperators: z.array(JoinOperatorSchema).catch([]),
  profile: ProfileSchema,
});

export type ExecutionTelemetry = z.input<typeof ExecutionTelemetrySchema>;

type DerivedKey =
  | 'executeShare'
  | 'compileShare'
  | 'transferShare'
  | 'storageShareOfExecute'
  | 'kvRowsPerProbe'
  | 'isOltpLike'
  | 'isAnalyticLike'
  | 'hasJoinExplosion';

export type RawFeatures = Omit<FeatureVector, DerivedKey>;

const ratio = (part: number, whole: number): number => (whole > 0 ? part / whole : 0);

/** Compute the derived shares and workload flags. */
export function deriveFeatures(raw: RawFeatures): FeatureVector {
  return {
    ...raw,
    executeShare: ratio(raw.executeMs, raw.totalMs),
    compileShare: ratio(raw.compileMs, raw.totalMs),
    transferShare: ratio(raw.transferMs, raw.totalMs),
    storageShareOfExecute: ratio(raw.storageMs, raw.executeMs),
    kvRowsPerProbe: raw.kvProbes > 0 ? raw.kvRowsScanned / raw.kvProbes : raw.kvRowsScanned,
    isOltpLike: raw.totalMs < 500 && raw.rowsProduced < 1000 && raw.kvRowsScanned < 10_000,
    isAnalyticLike: raw.totalMs > 5000 || raw.rowsProduced > 100_000 || raw.kvRowsScanned > 1_000_000,
    hasJoinExplosion: raw.maxJoinRatio >= JOIN_EXPLOSION_DETECT_RATIO,
  };
}

/**
 * Build a FeatureVector from untrusted telemetry. Never throws: anything
 * that does not validate falls back to zero, empty or null.
 */
export function extractFeatures(telemetry: unknown): FeatureVector {
  const parsed = ExecutionTelemetrySchema.safeParse(telemetry);
  const t = parsed.success ? parsed.data : ExecutionTelemetrySchema.parse({});

  const joinRatios = t.joinOperators
    .filter((op) => op.rowsIn > 0)
    .map((op) => ({ name: op.name, ratio: op.rowsOut / op.rowsIn }))
    .sort((x, y) => y.ratio - x.ratio);
  const exploding = joinRatios.filter((j) => j.ratio >= JOIN_EXPLOSION_DETECT_RATIO);
  const hotOperators: HotOperator[] = t.hotOperators.slice(0, MAX_HOT_OPERATORS);

  return deriveFeatures({
    queryId: t.queryId,
    queryHash: t.queryHash,
    planCacheReused: t.planCacheOriginalJobId !== null,
    totalMs: t.totalMs,
    compileMs: t.compileMs,
    executeMs: t.executeMs,
    transferMs: t.transferMs,
    rowsProduced: t.rowsProduced,
    bytesScanned: t.bytesScanned,
    kvRowsScanned: t.kvRowsScanned,
    kvIndexRowsScanned: t.kvIndexRowsScanned,
    kvProbes: t.kvProbes,
    kvTransactions: t.kvTransactions,
    storageMs: t.storageMs,
    storageTransactions: t.storageTransactions,
    storageBytes: t.storageBytes,
    maxJoinRatio: joinRatios[0]?.ratio ?? 0,
    joinExplosionCount: exploding.length,
    worstJoinOperator: exploding[0]?.name ?? null,
    hotOperators,
    profile: t.profile,
  });
}

const AVERAGED = [
  'totalMs',
  'compileMs',
  'executeMs',
  'transferMs',
  'rowsProduced',
  'bytesScanned',
  'kvRowsScanned',
  'kvIndexRowsScanned',
  'kvProbes',
  'kvTransactions',
  'storageMs',
  'storageTransactions',
  'storageBytes',
] as const;

const PROFILE_KEYS = ['cpuMs', 'idleMs', 'hybridProbeMs', 'joinMs', 'filterMs'] as const;

const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;

/**
 * Average a cohort of executions into one vector. Join explosion fields come
 * from the worst member; the hash survives only when every member shares it.
 */
export function averageFeatures(vectors: readonly FeatureVector[]): FeatureVector {
  const hashes = new Set(vectors.map((v) => v.queryHash));
  const [onlyHash] = hashes;

  const avg = (key: (typeof AVERAGED)[number]): number => mean(vectors.map((v) => v[key]));
  const worst = vectors.reduce<FeatureVector | undefined>(
    (max, v) => (max === undefined || v.maxJoinRatio > max.maxJoinRatio ? v : max),
    undefined,
  );
  const profile = { ...EMPTY_PROFILE };
  for (const key of PROFILE_KEYS) profile[key] = mean(vectors.map((v) => v.profile[key]));

  return deriveFeatures({
    queryId: null,
    queryHash: hashes.size === 1 && onlyHash !== undefined ? onlyHash : null,
    planCacheReused: vectors.length > 0 && vectors.every((v) => v.planCacheReused),
    totalMs: avg('totalMs'),
    compileMs: avg('compileMs'),
    executeMs: avg('executeMs'),
    transferMs: avg('transferMs'),
    rowsProduced: avg('rowsProduced'),
    bytesScanned: avg('bytesScanned'),
    kvRowsScanned: avg('kvRowsScanned'),
    kvIndexRowsScanned: avg('kvIndexRowsScanned'),
    kvProbes: avg('kvProbes'),
    kvTransactions: avg('kvTransactions'),
    storageMs: avg('storageMs'),
    storageTransactions: avg('storageTransactions'),
    storageBytes: avg('storageBytes'),
    maxJoinRatio: worst?.maxJoinRatio ?? 0,
    joinExplosionCount: vectors.reduce((max, v) => Math.max(max, v.joinExplosionCount), 0),
    worstJoinOperator: worst?.worstJoinOperator ?? null,
    hotOperators: [],
    profile,
  });
}
