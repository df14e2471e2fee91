import type { Rng, RegionClassifier, ScoreFunction, TrajectoryGenerator } from '@raresplit/ams'

export interface DoubleWellParams {
  /** Noise amplitude μ */
  mu: number
  /** Integration step */
  dt: number
  /** Maximum number of steps per generated path */
  maxSteps: number
  /** Half-width of the regions around the wells: A = x ≤ −1 + w, B = x ≥ 1 − w */
  regionWidth: number
}

/** Collaborators wired for an AMS estimator */
export interface DoubleWellSetup {
  params: DoubleWellParams
  dimension: number
  generator: TrajectoryGenerator
  score: ScoreFunction
  regions: RegionClassifier
  /** Stream driving the model noise */
  rng: Rng
}
