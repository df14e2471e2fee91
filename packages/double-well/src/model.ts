/**
 * Overdamped Langevin dynamics in the symmetric double-well potential
 *
 *   V(x) = x⁴/4 − x²/2,   dX = −V'(X)dt + √(2μ) dW
 *
 * Minima at x = ±1, barrier V(0) − V(±1) = 1/4. Transitions from the left
 * well to the right one become exponentially rare as μ → 0, which makes
 * this the standard test bed for splitting estimators.
 *
 * Euler–Maruyama discretisation:
 *   X(t+dt) = X(t) + (X(t) − X(t)³)dt + √(2μ·dt) · Z
 */

import type { Rng, TrajectoryBatch } from '@raresplit/ams'
import type { DoubleWellParams } from './types'

/** State layout: [position, elapsed time] */
export const DOUBLE_WELL_DIMENSION = 2

export function doubleWellPotential(x: number): number {
  const x2 = x * x
  return x2 * x2 / 4 - x2 / 2
}

/** −V'(x) */
export function doubleWellDrift(x: number): number {
  return x - x * x * x
}

export function inStartRegion(x: number, width: number): boolean {
  return x <= -1 + width
}

export function inTargetRegion(x: number, width: number): boolean {
  return x >= 1 - width
}

/**
 * Simulate `batchSize` paths from the row-major `[x, t]` initial states.
 *
 * A path stops at the first step that reaches the target region, or that
 * re-enters the start region after having been outside it, or after
 * `maxSteps` steps. A path that starts inside the start region must leave
 * it before a return counts; one that starts inside the target region is
 * the single initial step. Every path is allocated `maxSteps + 1` rows;
 * rows past the stop are NaN.
 */
export function simulateDoubleWell(
  params: DoubleWellParams,
  rng: Rng,
  batchSize: number,
  initStates: Float64Array,
): TrajectoryBatch {
  const { mu, dt, maxSteps, regionWidth } = params
  const D = DOUBLE_WELL_DIMENSION
  const length = maxSteps + 1
  const data = new Float64Array(batchSize * length * D).fill(NaN)
  const noise = Math.sqrt(2 * mu * dt)

  for (let b = 0; b < batchSize; b++) {
    const offset = b * length * D
    let x = initStates[b * D]!
    let t = initStates[b * D + 1]!
    data[offset] = x
    data[offset + 1] = t
    if (inTargetRegion(x, regionWidth)) continue

    let left = !inStartRegion(x, regionWidth)
    for (let k = 1; k <= maxSteps; k++) {
      x = x + doubleWellDrift(x) * dt + noise * rng.normal()
      t = t + dt
      data[offset + k * D] = x
      data[offset + k * D + 1] = t

      if (inTargetRegion(x, regionWidth)) break
      const inA = inStartRegion(x, regionWidth)
      if (inA && left) break
      if (!inA) left = true
    }
  }

  return { data, batchSize, length, dimension: D }
}
