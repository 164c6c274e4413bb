// ---------------------------------------------------------------------------
// Query model
// ---------------------------------------------------------------------------

export type StatementKind =
  | 'SELECT'
  | 'INSERT'
  | 'UPDATE'
  | 'DELETE'
  | 'MERGE'
  | 'CALL'
  | 'CREATE_INDEX'
  | 'CREATE_TABLE'
  | 'COPY'
  | 'OTHER';

export interface TableRef {
  catalog: string | null;
  schema: string | null;
  name: string;
  alias: string | null;
  /** Dotted name as written, longest form seen in the statement */
  qualifiedName: string;
}

export type PredicateOperator = 'EQ' | 'RANGE' | 'IN' | 'IS' | 'EXISTS';
export type PredicateSource = 'where' | 'join_on' | 'cte';
export type OperandKind = 'column' | 'literal' | 'parameter' | 'expression' | 'list' | 'subquery';

export interface Predicate {
  left: string;
  right: string;
  operator: PredicateOperator;
  /** The comparison as written, e.g. '>=' or 'NOT IN' */
  comparison: string;
  source: PredicateSource;
  /** Bare column name on the left side, also set when a function wraps it */
  column: string | null;
  /** Table alias or name qualifying the left column */
  qualifier: string | null;
  /** Function wrapping the column side, or 'ARITHMETIC' */
  wrappedBy: string | null;
  rightKind: OperandKind;
  /** Right-hand column of a join equality */
  rightColumn: { column: string; qualifier: string | null } | null;
}

export interface JoinClause {
  kind: string;
  table: string | null;
  onCondition: string | null;
}

export interface OrderByItem {
  column: string;
  direction: 'ASC' | 'DESC';
}

export interface InsertShape {
  target: string | null;
  columns: readonly string[];
  valuesRowCount: number;
  fromSelect: boolean;
  dynamicTarget: boolean;
}

export interface CreateIndexShape {
  name: string;
  table: string;
  columns: readonly string[];
  unique: boolean;
}

export interface CopyShape {
  target: string;
  targetIsStage: boolean;
  sourceTables: readonly string[];
}

export interface ParsedQuery {
  sql: string;
  statementKind: StatementKind;
  /** node-sql-parser grammar that produced the model, null when modelled lexically */
  dialect: string | null;
  tables: readonly TableRef[];
  /** Upper-cased alias -> upper-cased table name */
  aliases: Readonly<Record<string, string>>;
  predicates: readonly Predicate[];
  joins: readonly JoinClause[];
  orderBy: readonly OrderByItem[];
  limit: number | null;
  hasLimit: boolean;
  projection: readonly string[];
  hasWhere: boolean;
  hasDistinct: boolean;
  hasExists: boolean;
  hasIn: boolean;
  hasHaving: boolean;
  hasQualify: boolean;
  hasGroupBy: boolean;
  usesBindVariables: boolean;
  /** Upper-cased CTE names */
  cteNames: ReadonlySet<string>;
  insert: InsertShape | null;
  createIndex: CreateIndexShape | null;
  /** Table created by CREATE TABLE ... AS SELECT */
  ctasTarget: string | null;
  copy: CopyShape | null;
  procedureName: string | null;
  /** Longest string literal in the statement */
  largestLiteralLength: number;
}

// ---------------------------------------------------------------------------
// Schema metadata and coverage
// ---------------------------------------------------------------------------

export type IndexProvenance = 'confirmed' | 'unknown';
export type MetadataSource = 'schema' | 'plan' | 'none';

export interface TableMetadata {
  isHybrid: boolean;
  primaryKey: readonly string[];
  secondaryIndexes: readonly (readonly string[])[];
  /** Column name -> declared type */
  columns: Readonly<Record<string, string>>;
  /**
   * Whether the source actually reported index metadata. A schema lookup
   * that returned nothing about indexes is 'unknown', not "no indexes".
   */
  indexProvenance?: IndexProvenance;
}

/** Index metadata recovered from an execution-plan export */
export interface PlanIndexMetadata {
  hasIndexMetadata: boolean;
  primaryKey: readonly string[];
  secondaryIndexes: readonly (readonly string[])[];
}

export interface Coverage {
  table: string;
  isHybrid: boolean;
  primaryKey: readonly string[];
  /** Primary key first, then secondary indexes in declaration order */
  indexes: readonly (readonly string[])[];
  bestIndex: readonly string[] | null;
  bestEqPrefix: number;
  firstRangePosition: number | null;
  orderByPrefix: number;
  pkEqPrefix: number;
  /** In query-appearance order */
  equalityPredicateColumns: readonly string[];
  rangePredicateColumns: readonly string[];
  columnTypes: Readonly<Record<string, string>>;
  indexProvenance: IndexProvenance;
  metadataSource: MetadataSource;
  derivedFrom: Coverage | null;
}

// ---------------------------------------------------------------------------
// Runtime metadata
// ---------------------------------------------------------------------------

export interface ChildExecution {
  queryType: string;
  totalMs: number;
  queuedMs: number;
  storageThrottlingMs: number;
  bytesSpilledLocal: number;
  bytesSpilledRemote: number;
  touchedHybridTable: boolean;
}

/** Per-execution facts supplied with the statement. Missing fields read as zero/false. */
export interface RuntimeMetadata {
  queryHash?: string | null;
  totalMs?: number;
  compileMs?: number;
  executeMs?: number;
  queuedMs?: number;
  rowsProduced?: number;
  bytesScanned?: number;
  bytesSpilledLocal?: number;
  bytesSpilledRemote?: number;
  storageThrottlingMs?: number;
  touchedHybridTable?: boolean;
  errorCode?: string | null;
  errorMessage?: string | null;
  childExecutions?: readonly ChildExecution[];
}

// ---------------------------------------------------------------------------
// Findings
// ---------------------------------------------------------------------------

export type Severity = 'INFO' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export type RuleCategory =
  | 'filter'
  | 'index'
  | 'sort'
  | 'join'
  | 'projection'
  | 'write'
  | 'architecture'
  | 'workload'
  | 'metadata';

export type ProcBottleneck = 'COPY' | 'HT_DML' | 'QUEUING' | 'STORAGE_THROTTLING' | 'SPILL';

export interface IndexSuggestion {
  table: string;
  columns: readonly string[];
  include: readonly string[];
  ddl: string;
}

/** Evidence carried by each rule; the key set is the closed rule vocabulary. */
export interface FindingEvidenceMap {
  NO_FILTERING_CLAUSES: { statementKind: StatementKind; tables: string[] };
  NO_WHERE_FILTER: { statementKind: StatementKind; narrowedBy: string[] };
  JOIN_WITHOUT_ON: { joins: string[] };
  DISTINCT_UNNECESSARY: { table: string; primaryKey: string[] };
  ORDER_BY_NO_LIMIT: { orderByColumns: string[]; rowsProduced: number | null; indexAligned: boolean };
  NON_SARGABLE_PREDICATES: { predicates: { column: string; wrappedBy: string; expression: string }[] };
  FUNCTION_IN_JOIN_PREDICATE: { predicates: { column: string; wrappedBy: string; expression: string }[] };
  CASE_TRANSFORM_HEAVY: { count: number };
  WIDE_SELECT: { projection: string[] };
  BIND_PARAMETERS: { literalPredicates: number; columns: string[] };
  TYPE_MISMATCH: { mismatches: { table: string; column: string; declaredType: string; literal: string }[] };
  JOIN_PATTERN: { table: string; joinColumns: string[]; indexes: string[][] };
  MIXED_HT_AND_STANDARD_TABLES: { hybridTables: string[]; standardTables: string[] };
  INDEX_METADATA_UNKNOWN: { table: string; equalityColumns: string[] };
  HT_WITHOUT_INDEXES: { table: string; equalityColumns: string[]; suggestion: IndexSuggestion | null };
  MULTIPLE_HT_TABLES_NO_INDEXES: { tables: { table: string; equalityColumns: string[] }[] };
  INDEX_MISALIGNED: {
    table: string;
    equalityColumns: string[];
    indexes: string[][];
    suggestion: IndexSuggestion | null;
  };
  PRIMARY_KEY_NOT_USED: { table: string; primaryKey: string[]; equalityColumns: string[] };
  ORDER_MISALIGNED: { table: string; orderByColumns: string[]; bestIndex: string[] };
  COMPOSITE_INDEX_MISALIGNED: {
    table: string;
    index: string[];
    eqPrefix: number;
    equalityColumns: string[];
    suggestion: IndexSuggestion;
  };
  COMPOSITE_INDEX_PARTIAL_PREFIX: {
    table: string;
    index: string[];
    eqPrefix: number;
    equalityColumns: string[];
    suggestion: IndexSuggestion;
  };
  HT_PURGE_PATTERN_DETECTED: { table: string | null; equalityColumns: string[]; timeColumns: string[] };
  STORED_PROCEDURE_DETECTED: { procedure: string; durationMs: number | null };
  STORED_PROC_BOTTLENECK: {
    procedure: string;
    durationMs: number;
    bottlenecks: ProcBottleneck[];
    dominant: ProcBottleneck;
    breakdown: Record<ProcBottleneck, number>;
  };
  SINGLE_ROW_VALUES_INSERT: { table: string | null; rows: number };
  HT_PK_NOT_IN_INSERT: { table: string; primaryKey: string[]; missing: string[] };
  HT_WRITE_AMPLIFICATION: { table: string; secondaryIndexCount: number };
  DYNAMIC_IDENTIFIER_TARGET: { statementKind: StatementKind };
  LARGE_LITERAL_PAYLOAD: { largestLiteralLength: number };
  COPY_INTO_STAGE_FROM_HT: { target: string; sourceTables: string[] };
  HT_PRIMARY_KEY_ALREADY_EXISTS_CTAS: { errorCode: string; target: string | null };
  CREATE_INDEX_REDUNDANT: { index: string; table: string; columns: string[]; existing: string[] };
  CREATE_INDEX_REDUNDANT_PREFIX: { index: string; table: string; columns: string[]; existing: string[] };
  CREATE_INDEX_ON_STANDARD_TABLE: { index: string; table: string };
  CREATE_INDEX_HT_WRITE_COST: { index: string; table: string; secondaryIndexCount: number };
  CREATE_INDEX_LOOKS_GOOD: { index: string; table: string; columns: string[] };
  HT_REQUEST_THROTTLING: { throttlingMs: number; totalMs: number; ratio: number };
  ANALYTIC_WORKLOAD_ON_HT: { tables: string[]; rowsProduced: number; bytesScanned: number };
}

export type RuleId = keyof FindingEvidenceMap;

export interface FindingOf<R extends RuleId> {
  rule: R;
  severity: Severity;
  category: RuleCategory;
  message: string;
  suggestion: string;
  evidence: FindingEvidenceMap[R];
}

export type Finding = { [R in RuleId]: FindingOf<R> }[RuleId];

export interface PrimaryCause {
  finding: Finding;
  score: number;
  explanation: string;
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export type ActionKind =
  | 'CREATE_INDEX'
  | 'QUERY_REWRITE'
  | 'ENGINE_CHOICE'
  | 'ARCHITECTURE_CHANGE'
  | 'WORKLOAD_MANAGEMENT';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface Action {
  id: string;
  kind: ActionKind;
  table: string | null;
  columns: readonly string[];
  generatedSql: string;
  preconditions: Readonly<Record<string, boolean | number | string>>;
  evidenceRules: readonly RuleId[];
  riskLevel: RiskLevel;
}

// ---------------------------------------------------------------------------
// Telemetry and classification
// ---------------------------------------------------------------------------

export interface HotOperator {
  name: string;
  timeMs: number;
}

export interface ProfileBreakdown {
  cpuMs: number;
  idleMs: number;
  hybridProbeMs: number;
  joinMs: number;
  filterMs: number;
}

export interface FeatureVector {
  queryId: string | null;
  queryHash: string | null;
  planCacheReused: boolean;
  totalMs: number;
  compileMs: number;
  executeMs: number;
  transferMs: number;
  rowsProduced: number;
  bytesScanned: number;
  kvRowsScanned: number;
  kvIndexRowsScanned: number;
  kvProbes: number;
  kvTransactions: number;
  storageMs: number;
  storageTransactions: number;
  storageBytes: number;
  /** Largest join output/input row ratio in the plan */
  maxJoinRatio: number;
  /** Join operators at or above the explosion ratio */
  joinExplosionCount: number;
  worstJoinOperator: string | null;
  hotOperators: readonly HotOperator[];
  profile: ProfileBreakdown;
  // derived
  executeShare: number;
  compileShare: number;
  transferShare: number;
  storageShareOfExecute: number;
  kvRowsPerProbe: number;
  isOltpLike: boolean;
  isAnalyticLike: boolean;
  hasJoinExplosion: boolean;
}

export interface AnalysisResult {
  query: ParsedQuery;
  coverage: Coverage[];
  /** Coverage before plan enrichment, kept for audit */
  baseCoverage: Coverage[];
  findings: Finding[];
  primaryCause: PrimaryCause | null;
  actions: Action[];
}
