/**
 * AMS Domain Types
 *
 * Batch layouts shared by the estimator and its collaborators, the
 * estimator configuration and the result records.
 */

import type { Logger } from './logger'

// ---------------------------------------------------------------------------
// Batches
// ---------------------------------------------------------------------------

/**
 * Padded batch of trajectories.
 * Row-major: data[(b * length + t) * dimension + d]. Steps past a
 * trajectory's natural end hold NaN in every component.
 */
export interface TrajectoryBatch {
  data: Float64Array
  batchSize: number
  /** Allocated number of time steps per trajectory */
  length: number
  /** State dimension (last component is elapsed time by convention) */
  dimension: number
}

/** Row-major per-step values: values[b * length + t] */
export type ScoreSeries = Float64Array

/** Row-major per-step membership flags (1 = inside the region) */
export type RegionMask = Uint8Array

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/**
 * Produces `batchSize` paths starting from the row-major initial states
 * (`batchSize × dimension`). Each path's first state is its initial state.
 */
export type TrajectoryGenerator = (batchSize: number, initStates: Float64Array) => TrajectoryBatch

/** Maps a batch to `batchSize × length` scores, propagating NaN on undefined steps. */
export type ScoreFunction = (trajectories: TrajectoryBatch) => ScoreSeries

/** Start (A) and target (B) region membership. Never both set on one step. */
export interface RegionClassifier {
  isStart(trajectories: TrajectoryBatch): RegionMask
  isTarget(trajectories: TrajectoryBatch): RegionMask
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Scalar estimator parameters */
export interface AmsParams {
  /** Number of trajectories N */
  ensembleSize: number
  /** Number of distinct survivor levels nc, 1 ≤ nc < N */
  survivors: number
  /** State dimension D */
  dimension: number
  /** Optional RNG seed for reproducibility */
  seed?: number
}

export interface AmsConfig extends AmsParams {
  generator: TrajectoryGenerator
  score: ScoreFunction
  regions: RegionClassifier
  logger?: Logger
  /** Called after every merge with the state of the ensemble */
  onIteration?: (event: IterationEvent) => void
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

/** Read-only access to the ensemble while a run is in progress */
export interface EnsembleView {
  readonly size: number
  /** Allocated number of time steps */
  readonly capacity: number
  readonly dimension: number
  /** Natural length of slot i */
  length(i: number): number
  /** Copy of slot i's padded trajectory (capacity × dimension) */
  trajectory(i: number): Float64Array
  /** Copy of slot i's padded score series (capacity) */
  scores(i: number): Float64Array
  /** Copy of the current levels Q */
  levels(): Float64Array
}

export interface IterationEvent {
  /** 1-based index of the iteration that just completed */
  iteration: number
  /** nc-th smallest distinct level before the cut */
  threshold: number
  /** Ensemble weight after this iteration's update */
  weight: number
  /** Slots that were regenerated */
  discarded: Int32Array
  /** Clone source of each discarded slot */
  sources: Int32Array
  /** Restart step of each discarded slot */
  restarts: Int32Array
  ensemble: EnsembleView
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface AmsResult {
  /** Estimated transition probability: weight × transitions / N */
  probability: number
  /** Number of selection/cloning rounds executed */
  iterations: number
  /** Slots whose level reached the collapse threshold */
  transitions: number
  /** Final ensemble weight */
  weight: number
  /** Padded trajectory ensemble */
  trajectories: TrajectoryBatch
  /** Padded score ensemble: scores[i * trajectories.length + t] */
  scores: Float64Array
  /** Natural length per slot */
  lengths: Int32Array
  /** Final level Q per slot */
  levels: Float64Array
  /** Wall-clock time in seconds */
  runtime: number
}

/** One row of a repeated-run table */
export interface RunSummary {
  /** 0-based index of the call within the batch */
  run: number
  probability: number
  iterations: number
  transitions: number
  runtime: number
}

export type RunErrorPolicy = 'abort' | 'skip'

export interface RunMultipleOptions {
  collapseThreshold?: number
  /** What to do when one run throws. Default 'abort'. */
  onError?: RunErrorPolicy
}
