/**
 * Synthetic collaborators with hand-traceable behaviour.
 */

import { Rng } from '../random'
import { packTrajectories } from '../trajectory'
import type { RegionClassifier, ScoreFunction, TrajectoryBatch, TrajectoryGenerator } from '../types'

/** Score = first state component, NaN propagated */
export const firstComponentScore: ScoreFunction = (batch) => {
  const out = new Float64Array(batch.batchSize * batch.length)
  for (let m = 0; m < out.length; m++) out[m] = batch.data[m * batch.dimension]!
  return out
}

/** Start region x ≤ low, target region x ≥ high, on the first component */
export function intervalRegions(low: number, high: number): RegionClassifier {
  const mask = (batch: TrajectoryBatch, test: (x: number) => boolean): Uint8Array => {
    const out = new Uint8Array(batch.batchSize * batch.length)
    for (let m = 0; m < out.length; m++) {
      if (test(batch.data[m * batch.dimension]!)) out[m] = 1
    }
    return out
  }
  return {
    isStart: (batch) => mask(batch, x => x <= low),
    isTarget: (batch) => mask(batch, x => x >= high),
  }
}

/** Wraps a generator and records every call's batch size */
export function recording(generator: TrajectoryGenerator): TrajectoryGenerator & { calls: number[] } {
  const calls: number[] = []
  const wrapped = (batchSize: number, initStates: Float64Array): TrajectoryBatch => {
    calls.push(batchSize)
    return generator(batchSize, initStates)
  }
  return Object.assign(wrapped, { calls })
}

/** 1-D counter: x, x+1, … up to the first value ≥ stop */
export function counterGenerator(stop: number): TrajectoryGenerator {
  return (batchSize, initStates) => {
    const paths: number[][][] = []
    for (let b = 0; b < batchSize; b++) {
      const path: number[][] = []
      let x = initStates[b]!
      path.push([x])
      while (x < stop) {
        x += 1
        path.push([x])
      }
      paths.push(path)
    }
    return packTrajectories(paths, 1)
  }
}

/** 1-D path that holds its initial value for one more step */
export const plateauGenerator: TrajectoryGenerator = (batchSize, initStates) => {
  const paths: number[][][] = []
  for (let b = 0; b < batchSize; b++) paths.push([[initStates[b]!], [initStates[b]!]])
  return packTrajectories(paths, 1)
}

/**
 * States [x, mode, t].
 * mode 0 falls back to x = 0 after one step.
 * mode 1 climbs to x = 1 in steps of 0.25 when launched at t = 0, and of
 * 0.125 when launched later.
 */
export const modeGenerator: TrajectoryGenerator = (batchSize, initStates) => {
  const paths: number[][][] = []
  for (let b = 0; b < batchSize; b++) {
    let x = initStates[b * 3]!
    const mode = initStates[b * 3 + 1]!
    let t = initStates[b * 3 + 2]!
    const path: number[][] = [[x, mode, t]]
    if (mode === 0) {
      path.push([0, mode, t + 1])
    } else {
      const step = t === 0 ? 0.25 : 0.125
      while (x < 1) {
        x += step
        t += 1
        path.push([x, mode, t])
      }
    }
    paths.push(path)
  }
  return packTrajectories(paths, 3)
}

/**
 * States [x, t] on the lattice x = k/10. Each step moves ±0.1, up with
 * probability `pUp`. Stops on x ≤ 0, x ≥ 1 or after `maxSteps` steps.
 */
export function latticeWalk(rng: Rng, pUp: number, maxSteps: number): TrajectoryGenerator {
  return (batchSize, initStates) => {
    const paths: number[][][] = []
    for (let b = 0; b < batchSize; b++) {
      let k = Math.round(initStates[b * 2]! * 10)
      let t = initStates[b * 2 + 1]!
      const path: number[][] = [[k / 10, t]]
      for (let s = 0; s < maxSteps; s++) {
        k += rng.next() < pUp ? 1 : -1
        t += 1
        path.push([k / 10, t])
        if (k <= 0 || k >= 10) break
      }
      paths.push(path)
    }
    return packTrajectories(paths, 2)
  }
}

/** Row-major copies of one state */
export function repeatState(n: number, state: number[]): Float64Array {
  const out = new Float64Array(n * state.length)
  for (let i = 0; i < n; i++) out.set(state, i * state.length)
  return out
}

export function distinctCount(values: Float64Array): number {
  return new Set(values).size
}
