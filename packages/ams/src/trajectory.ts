/**
 * Helpers for padded trajectory batches: building them from ragged paths,
 * measuring natural lengths and checking what collaborators hand back.
 */

import { ContractViolation } from './errors'
import type { TrajectoryBatch } from './types'

/**
 * Pack ragged per-trajectory state lists into one NaN-padded batch.
 * The allocated length is the longest path unless `length` asks for more.
 */
export function packTrajectories(
  paths: ReadonlyArray<ReadonlyArray<ArrayLike<number>>>,
  dimension: number,
  length: number = 0,
): TrajectoryBatch {
  let maxLength = length
  for (const path of paths) maxLength = Math.max(maxLength, path.length)

  const data = new Float64Array(paths.length * maxLength * dimension).fill(NaN)
  paths.forEach((path, b) => {
    path.forEach((state, t) => {
      const offset = (b * maxLength + t) * dimension
      for (let d = 0; d < dimension; d++) data[offset + d] = state[d] ?? NaN
    })
  })

  return { data, batchSize: paths.length, length: maxLength, dimension }
}

/** Flatten rows of equal dimension into a row-major state buffer. */
export function statesFromRows(rows: ReadonlyArray<ArrayLike<number>>): Float64Array {
  const dimension = rows[0]?.length ?? 0
  const out = new Float64Array(rows.length * dimension)
  rows.forEach((row, i) => {
    if (row.length !== dimension) {
      throw new RangeError(`Row ${i} has ${row.length} components, expected ${dimension}`)
    }
    for (let d = 0; d < dimension; d++) out[i * dimension + d] = row[d]!
  })
  return out
}

/**
 * Natural length of each trajectory: the first step at which any state
 * component is NaN, or the allocated length when there is none.
 */
export function naturalLengths(batch: TrajectoryBatch): Int32Array {
  const { data, batchSize, length, dimension } = batch
  const out = new Int32Array(batchSize)
  for (let b = 0; b < batchSize; b++) {
    let n = length
    scan: for (let t = 0; t < length; t++) {
      const offset = (b * length + t) * dimension
      for (let d = 0; d < dimension; d++) {
        if (Number.isNaN(data[offset + d]!)) {
          n = t
          break scan
        }
      }
    }
    out[b] = n
  }
  return out
}

/** @throws ContractViolation when the generator's batch has the wrong shape */
export function assertTrajectoryBatch(
  batch: TrajectoryBatch,
  batchSize: number,
  dimension: number,
): void {
  if (batch.batchSize !== batchSize) {
    throw new ContractViolation('generator', `expected ${batchSize} trajectories, got ${batch.batchSize}`)
  }
  if (batch.dimension !== dimension) {
    throw new ContractViolation('generator', `expected state dimension ${dimension}, got ${batch.dimension}`)
  }
  if (!Number.isInteger(batch.length) || batch.length < 0) {
    throw new ContractViolation('generator', `invalid trajectory length ${batch.length}`)
  }
  const expected = batch.batchSize * batch.length * batch.dimension
  if (batch.data.length !== expected) {
    throw new ContractViolation('generator', `buffer holds ${batch.data.length} values, expected ${expected}`)
  }
}

/** @throws ContractViolation when a per-step series does not match the batch */
export function assertSeries(
  series: ArrayLike<number>,
  batch: TrajectoryBatch,
  collaborator: 'score' | 'regions',
): void {
  const expected = batch.batchSize * batch.length
  if (series.length !== expected) {
    throw new ContractViolation(collaborator, `returned ${series.length} values, expected ${expected}`)
  }
}
