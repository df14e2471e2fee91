/**
 * Ragged ensemble storage.
 *
 * N trajectory slots share one row-major buffer of `capacity` steps,
 * padded with NaN past each slot's natural length. The buffer only ever
 * grows: a longer clone appends padding to every slot, never moving
 * existing entries.
 */

import { DegenerateTrajectoryError } from './errors'
import { naturalLengths } from './trajectory'
import type { EnsembleView, RegionMask, TrajectoryBatch } from './types'

export class Ensemble implements EnsembleView {
  readonly size: number
  readonly dimension: number
  private cap: number
  private traj: Float64Array
  private score: Float64Array
  private readonly lengths: Int32Array
  private readonly q: Float64Array

  private constructor(batch: TrajectoryBatch, scores: Float64Array) {
    this.size = batch.batchSize
    this.dimension = batch.dimension
    this.cap = batch.length
    this.traj = Float64Array.from(batch.data)
    this.score = Float64Array.from(scores)
    this.lengths = naturalLengths(batch)
    this.q = new Float64Array(this.size)

    // Scores are only defined on the defined prefix
    for (let i = 0; i < this.size; i++) {
      this.score.fill(NaN, i * this.cap + this.lengths[i]!, (i + 1) * this.cap)
    }
  }

  /** Build an ensemble from a generator batch and its raw scores. */
  static fromBatch(batch: TrajectoryBatch, scores: Float64Array): Ensemble {
    return new Ensemble(batch, scores)
  }

  get capacity(): number {
    return this.cap
  }

  length(i: number): number {
    return this.lengths[i]!
  }

  trajectory(i: number): Float64Array {
    const row = this.cap * this.dimension
    return this.traj.slice(i * row, (i + 1) * row)
  }

  scores(i: number): Float64Array {
    return this.score.slice(i * this.cap, (i + 1) * this.cap)
  }

  levels(): Float64Array {
    return Float64Array.from(this.q)
  }

  /** Level of slot i as of the last `updateLevels` */
  level(i: number): number {
    return this.q[i]!
  }

  /** View the whole ensemble as a batch (shares storage). */
  asBatch(): TrajectoryBatch {
    return { data: this.traj, batchSize: this.size, length: this.cap, dimension: this.dimension }
  }

  /** Copy the given slots into a standalone batch. */
  select(slots: ArrayLike<number>): TrajectoryBatch {
    const row = this.cap * this.dimension
    const data = new Float64Array(slots.length * row)
    for (let b = 0; b < slots.length; b++) {
      const slot = slots[b]!
      data.set(this.traj.subarray(slot * row, (slot + 1) * row), b * row)
    }
    return { data, batchSize: slots.length, length: this.cap, dimension: this.dimension }
  }

  /**
   * Force score 0 on start-region steps and 1 on target-region steps.
   * `slots[b]` names the ensemble slot of mask row b; masks are laid out
   * over the current capacity. Steps past a slot's natural length are left alone.
   */
  applyRegions(slots: ArrayLike<number>, start: RegionMask, target: RegionMask): void {
    for (let b = 0; b < slots.length; b++) {
      const slot = slots[b]!
      const n = this.lengths[slot]!
      for (let t = 0; t < n; t++) {
        const m = b * this.cap + t
        if (start[m]) this.score[slot * this.cap + t] = 0
        else if (target[m]) this.score[slot * this.cap + t] = 1
      }
    }
  }

  /**
   * Recompute Q as the maximum over defined, non-NaN score entries.
   * @throws DegenerateTrajectoryError for a slot with nothing to take a maximum of
   */
  updateLevels(): Float64Array {
    for (let i = 0; i < this.size; i++) {
      let best = -Infinity
      let seen = false
      const base = i * this.cap
      for (let t = 0; t < this.lengths[i]!; t++) {
        const s = this.score[base + t]!
        if (Number.isNaN(s)) continue
        seen = true
        if (s > best) best = s
      }
      if (!seen) throw new DegenerateTrajectoryError(i)
      this.q[i] = best
    }
    return this.q
  }

  /** Ascending distinct levels */
  distinctLevels(): Float64Array {
    const sorted = Float64Array.from(this.q).sort()
    let n = 0
    for (let i = 0; i < sorted.length; i++) {
      if (i === 0 || sorted[i] !== sorted[n - 1]) sorted[n++] = sorted[i]!
    }
    return sorted.slice(0, n)
  }

  /** First step at which `source`'s score reaches `level`, or -1. */
  restartIndex(source: number, level: number): number {
    const base = source * this.cap
    for (let t = 0; t < this.lengths[source]!; t++) {
      if (this.score[base + t]! >= level) return t
    }
    return -1
  }

  /** Copy the state of `slot` at step `t` into `out` at `offset`. */
  readState(slot: number, t: number, out: Float64Array, offset: number): void {
    const start = (slot * this.cap + t) * this.dimension
    out.set(this.traj.subarray(start, start + this.dimension), offset)
  }

  /** Pad every slot with NaN up to `capacity` steps. No-op when already large enough. */
  grow(capacity: number): void {
    if (capacity <= this.cap) return
    const D = this.dimension
    const traj = new Float64Array(this.size * capacity * D).fill(NaN)
    const score = new Float64Array(this.size * capacity).fill(NaN)
    for (let i = 0; i < this.size; i++) {
      traj.set(this.traj.subarray(i * this.cap * D, (i + 1) * this.cap * D), i * capacity * D)
      score.set(this.score.subarray(i * this.cap, (i + 1) * this.cap), i * capacity)
    }
    this.traj = traj
    this.score = score
    this.cap = capacity
  }

  /**
   * Overwrite `target` with `source`'s steps [0, restart] followed by
   * steps [1, contLength) of row `row` of the continuation batch.
   * Capacity must already hold restart + contLength steps.
   */
  splice(
    target: number,
    source: number,
    restart: number,
    continuation: TrajectoryBatch,
    contScores: Float64Array,
    row: number,
    contLength: number,
  ): void {
    const D = this.dimension
    const cap = this.cap
    const newLength = restart + contLength
    const prefix = restart + 1

    this.traj.copyWithin(target * cap * D, source * cap * D, (source * cap + prefix) * D)
    this.score.copyWithin(target * cap, source * cap, source * cap + prefix)

    const contBase = row * continuation.length
    this.traj.set(
      continuation.data.subarray((contBase + 1) * D, (contBase + contLength) * D),
      (target * cap + prefix) * D,
    )
    this.score.set(contScores.subarray(contBase + 1, contBase + contLength), target * cap + prefix)

    this.traj.fill(NaN, (target * cap + newLength) * D, (target + 1) * cap * D)
    this.score.fill(NaN, target * cap + newLength, (target + 1) * cap)
    this.lengths[target] = newLength
  }

  /** Hand the storage over as a result. The ensemble must not be used afterwards. */
  release(): { trajectories: TrajectoryBatch; scores: Float64Array; lengths: Int32Array; levels: Float64Array } {
    return {
      trajectories: this.asBatch(),
      scores: this.score,
      lengths: this.lengths,
      levels: this.q,
    }
  }
}
