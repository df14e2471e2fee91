/**
 * @raresplit/ams
 *
 * Adaptive Multilevel Splitting estimator for rare transition probabilities
 * between a start region A and a target region B.
 */

// Types
export type {
  TrajectoryBatch,
  ScoreSeries,
  RegionMask,
  TrajectoryGenerator,
  ScoreFunction,
  RegionClassifier,
  AmsParams,
  AmsConfig,
  EnsembleView,
  IterationEvent,
  AmsResult,
  RunSummary,
  RunErrorPolicy,
  RunMultipleOptions,
} from './types'

// Estimator
export { AmsEstimator } from './estimator'
export { amsParamsSchema, validateConfig } from './config'

// Errors
export { AmsError, ConfigurationError, ContractViolation, DegenerateTrajectoryError } from './errors'

// Trajectory helpers
export {
  packTrajectories,
  statesFromRows,
  naturalLengths,
  assertTrajectoryBatch,
} from './trajectory'

// Random utilities
export { Rng } from './random'
export type { RngState } from './random'

// Logging
export { createLogger, LOG_LEVELS } from './logger'
export type { Logger, LogLevel, LogFields, LoggerOptions } from './logger'
