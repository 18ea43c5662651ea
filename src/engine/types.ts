/**
 * @fileoverview Engine data model
 *
 * Shapes exchanged with the R netmeta engine. Request types describe the
 * parameters document a script reads; result types describe the single JSON
 * document a script prints. Numeric fields are nullable because the engine
 * encodes NA/NaN/Inf as null.
 */

import { VALIDATION_MESSAGE_PREFIX } from '../core/errors.js';

// ============================================================================
// INPUT RECORDS
// ============================================================================

/** Summary measures accepted by netmeta */
export type SummaryMeasure = 'OR' | 'RR' | 'RD' | 'MD' | 'SMD';

export const SUMMARY_MEASURES: readonly SummaryMeasure[] = ['OR', 'RR', 'RD', 'MD', 'SMD'];

/** One study's direct comparison of two treatments */
export interface PairwiseContrast {
  study: string;
  treat1: string;
  treat2: string;
  /** Treatment effect (log scale for ratio measures) */
  TE: number;
  /** Standard error of TE */
  seTE: number;
}

export interface BinaryArm {
  study: string;
  treatment: string;
  events: number;
  n: number;
}

export interface ContinuousArm {
  study: string;
  treatment: string;
  mean: number;
  sd: number;
  n: number;
}

export type ArmRecord = BinaryArm | ContinuousArm;

export type OutcomeType = 'binary' | 'continuous';

/** Measures the arm-to-pairwise conversion supports per outcome type */
export const CONVERSION_MEASURES: Record<OutcomeType, readonly SummaryMeasure[]> = {
  binary: ['OR', 'RR', 'RD'],
  continuous: ['MD', 'SMD'],
};

export const DEFAULT_CONVERSION_MEASURE: Record<OutcomeType, SummaryMeasure> = {
  binary: 'OR',
  continuous: 'MD',
};

// ============================================================================
// RESULT DOCUMENTS
// ============================================================================

export interface PairEstimate {
  treat1: string;
  treat2: string;
  effect: number | null;
  ci_lower: number | null;
  ci_upper: number | null;
}

export interface Heterogeneity {
  tau_squared: number | null;
  tau: number | null;
  I_squared: number | null;
  Q: number | null;
  df_Q: number | null;
  pval_Q: number | null;
}

export interface AnalysisSummary {
  /** Treatments in engine order (not re-sorted) */
  treatments: string[];
  n_studies: number;
  n_comparisons: number;
  sm: string;
  reference: string;
  heterogeneity?: Heterogeneity;
  common_effects?: PairEstimate[];
  random_effects?: PairEstimate[];
}

export interface GraphNode {
  /** 1-based position in the session's treatment list */
  id: number;
  label: string;
}

export interface GraphEdge {
  from: string;
  to: string;
  n_studies: number;
}

export interface NetworkGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface LeagueTable {
  treatments: string[];
  effects: Array<Array<number | null>>;
  ci_lower: Array<Array<number | null>>;
  ci_upper: Array<Array<number | null>>;
  sm: string;
}

export interface Ranking {
  treatments: string[];
  p_scores: Array<number | null>;
  ranks: number[];
}

export interface ForestComparison {
  treatment: string;
  effect: number | null;
  ci_lower: number | null;
  ci_upper: number | null;
}

export interface ForestData {
  reference: string;
  sm: string;
  comparisons: ForestComparison[];
}

// ============================================================================
// OPERATIONS
// ============================================================================

export type EngineOperation =
  | 'run_analysis'
  | 'network_graph'
  | 'league_table'
  | 'ranking'
  | 'forest_data'
  | 'arm_to_pairwise';

/** Parameters document written for each operation */
export interface OperationParams {
  run_analysis: {
    data: PairwiseContrast[];
    sm: SummaryMeasure;
    reference: string | null;
    comb_fixed: boolean;
    comb_random: boolean;
  };
  network_graph: Record<string, never>;
  league_table: { random: boolean };
  ranking: { random: boolean };
  forest_data: { reference: string | null; random: boolean };
  arm_to_pairwise: {
    data: ArmRecord[];
    outcome_type: OutcomeType;
    sm: SummaryMeasure;
  };
}

export interface OperationResults {
  run_analysis: AnalysisSummary;
  network_graph: NetworkGraph;
  league_table: LeagueTable;
  ranking: Ranking;
  forest_data: ForestData;
  arm_to_pairwise: PairwiseContrast[];
}

/** Operations that load the persisted session before running */
export const SESSION_READ_OPERATIONS: ReadonlySet<EngineOperation> = new Set<EngineOperation>([
  'network_graph',
  'league_table',
  'ranking',
  'forest_data',
]);

// ============================================================================
// STRUCTURED ERRORS
// ============================================================================

export interface EngineErrorResult {
  error: string;
  raw_output?: string;
}

/** What every engine call resolves to: the document, or a structured error */
export type EngineOutcome<T> = T | EngineErrorResult;

export type EngineFailureKind =
  | 'engine_invocation'
  | 'empty_output'
  | 'malformed_output'
  | 'no_session_state'
  | 'session_lock'
  | 'validation'
  | 'computation';

export const NO_SESSION_MESSAGE = 'No netmeta result available. Run runnetmeta first.';
export const ENGINE_ERROR_PREFIX = 'Engine error: ';
export const EMPTY_OUTPUT_MESSAGE = 'No output from engine';
export const MALFORMED_OUTPUT_PREFIX = 'Failed to parse engine output: ';
export const SESSION_LOCK_PREFIX = 'Session state unavailable: ';
export const INVALID_INPUT_PREFIX = 'Invalid input: ';
export const UNSUPPORTED_MEASURE_PREFIX = 'Summary measure ';

/** Argument checks that fail before any engine run */
const VALIDATION_PREFIXES = [INVALID_INPUT_PREFIX, VALIDATION_MESSAGE_PREFIX, UNSUPPORTED_MEASURE_PREFIX];

export function isEngineError(value: unknown): value is EngineErrorResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'error' in value &&
    typeof value.error === 'string'
  );
}

/**
 * Map a structured error back to its failure kind. Anything not produced by
 * the bridge itself came from the script's own error trap.
 */
export function classifyEngineError(result: EngineErrorResult): EngineFailureKind {
  if (result.error.startsWith(ENGINE_ERROR_PREFIX)) return 'engine_invocation';
  if (result.error === EMPTY_OUTPUT_MESSAGE) return 'empty_output';
  if (result.error.startsWith(MALFORMED_OUTPUT_PREFIX)) return 'malformed_output';
  if (result.error === NO_SESSION_MESSAGE) return 'no_session_state';
  if (result.error.startsWith(SESSION_LOCK_PREFIX)) return 'session_lock';
  if (VALIDATION_PREFIXES.some((prefix) => result.error.startsWith(prefix))) return 'validation';
  return 'computation';
}
