/**
 * @raresplit/double-well
 *
 * Reference collaborators for the AMS estimator: a 1-D double-well
 * Langevin model, its position score and its A/B region classifier.
 */

import { Rng, statesFromRows } from '@raresplit/ams'
import { DOUBLE_WELL_DIMENSION, simulateDoubleWell } from './model'
import { doubleWellRegions, positionScore } from './score'
import type { DoubleWellParams, DoubleWellSetup } from './types'

export type { DoubleWellParams, DoubleWellSetup } from './types'
export {
  DOUBLE_WELL_DIMENSION,
  doubleWellPotential,
  doubleWellDrift,
  inStartRegion,
  inTargetRegion,
  simulateDoubleWell,
} from './model'
export { positionScore, doubleWellRegions } from './score'

export const DEFAULT_DOUBLE_WELL: DoubleWellParams = {
  mu: 0.03,
  dt: 0.01,
  maxSteps: 2000,
  regionWidth: 0.1,
}

/**
 * Wire the double-well generator, score and regions around one noise stream.
 * @param seed - Seed for the model noise (independent of the estimator's stream)
 */
export function createDoubleWell(params: Partial<DoubleWellParams> = {}, seed?: number): DoubleWellSetup {
  const resolved: DoubleWellParams = { ...DEFAULT_DOUBLE_WELL, ...params }
  if (!(resolved.mu > 0) || !(resolved.dt > 0)) {
    throw new RangeError('mu and dt must be positive')
  }
  if (!Number.isInteger(resolved.maxSteps) || resolved.maxSteps < 1) {
    throw new RangeError(`maxSteps must be a positive integer, got ${resolved.maxSteps}`)
  }
  const rng = new Rng(seed)
  return {
    params: resolved,
    dimension: DOUBLE_WELL_DIMENSION,
    generator: (batchSize, initStates) => simulateDoubleWell(resolved, rng, batchSize, initStates),
    score: positionScore,
    regions: doubleWellRegions(resolved.regionWidth),
    rng,
  }
}

/** N copies of the state [x0, 0] laid out row-major */
export function wellStartStates(n: number, x0: number = -1): Float64Array {
  return statesFromRows(Array.from({ length: n }, () => [x0, 0]))
}
