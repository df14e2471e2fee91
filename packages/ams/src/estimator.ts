/**
 * Adaptive Multilevel Splitting estimator
 *
 * Estimates the probability that a path started in region A reaches
 * region B before returning to A. The ensemble of N paths is repeatedly
 * cut at the nc-th smallest distinct level: every slot at or below that
 * level is discarded and regrown from a branch point of a surviving slot.
 *
 *   w ← w · (1 − |discarded| / N)          at every cut
 *   p̂ = w · #{i : Q_i ≥ z_max} / N         at termination
 *
 * The cut is a quantile on distinct levels, not a fixed count. When several
 * slots share the threshold level they are all discarded together, so the
 * number of slots regrown per iteration varies even for a fixed nc. The loop
 * stops once no more than nc distinct levels remain, which includes the case
 * where the whole ensemble is tied from the start.
 *
 * The loop has no iteration bound. An ensemble that never collapses to
 * nc distinct levels keeps running; bounding it is up to the caller.
 *
 * References:
 * - Cérou & Guyader (2007). "Adaptive multilevel splitting for rare event analysis"
 * - Bréhier, Gazeau, Goudenège, Lelièvre & Rousset (2016). "Unbiasedness of some
 *   generalized adaptive multilevel splitting algorithms"
 */

import { validateConfig } from './config'
import { Ensemble } from './ensemble'
import { AmsError, ConfigurationError, ContractViolation, DegenerateTrajectoryError } from './errors'
import { createLogger, type Logger } from './logger'
import { Rng, type RngState } from './random'
import { assertSeries, assertTrajectoryBatch, naturalLengths } from './trajectory'
import type {
  AmsConfig,
  AmsResult,
  RunMultipleOptions,
  RunSummary,
  TrajectoryBatch,
} from './types'

export class AmsEstimator {
  private readonly config: AmsConfig
  private readonly rng: Rng
  private readonly logger: Logger

  /** @throws ConfigurationError before any simulation when the config is invalid */
  constructor(config: AmsConfig) {
    this.config = validateConfig(config)
    this.rng = new Rng(this.config.seed)
    this.logger = this.config.logger ?? createLogger({ level: 'warn' })
  }

  get ensembleSize(): number {
    return this.config.ensembleSize
  }

  get survivors(): number {
    return this.config.survivors
  }

  get dimension(): number {
    return this.config.dimension
  }

  /** Restart the clone-sampling stream from `seed`. */
  resetSeed(seed: number): void {
    this.rng.reseed(seed)
  }

  rngState(): RngState {
    return this.rng.getState()
  }

  restoreRngState(state: RngState): void {
    this.rng.setState(state)
  }

  /**
   * Run the splitting loop once.
   *
   * @param initialStates - Row-major N × D starting states, one per slot
   * @param collapseThreshold - Level counted as a completed transition
   */
  run(initialStates: Float64Array, collapseThreshold: number = 1): AmsResult {
    const { ensembleSize: N, survivors: nc, dimension: D } = this.config
    if (initialStates.length !== N * D) {
      throw new ConfigurationError(
        `Expected ${N} × ${D} initial state values, got ${initialStates.length}`,
        { initialStates: ['Wrong number of values'] },
      )
    }

    const tStart = performance.now()

    const initial = this.generate(N, initialStates)
    const ensemble = Ensemble.fromBatch(initial, this.scoreBatch(initial))
    this.classify(ensemble, identity(N), ensemble.asBatch())
    ensemble.updateLevels()

    let iterations = 0
    let weight = 1
    let levels = ensemble.distinctLevels()

    while (levels.length > nc) {
      const threshold = levels[nc - 1]!

      const cut: number[] = []
      const kept: number[] = []
      for (let i = 0; i < N; i++) {
        if (ensemble.level(i) <= threshold) cut.push(i)
        else kept.push(i)
      }
      const discarded = Int32Array.from(cut)
      const m = discarded.length

      weight *= 1 - m / N

      // Branch points: first step where the source reaches the discarded level
      const sources = this.rng.choice(kept, m)
      const restarts = new Int32Array(m)
      const restartStates = new Float64Array(m * D)
      for (let j = 0; j < m; j++) {
        const source = sources[j]!
        const level = ensemble.level(discarded[j]!)
        const r = ensemble.restartIndex(source, level)
        if (r < 0) {
          throw new DegenerateTrajectoryError(
            source,
            `Trajectory ${source} never reaches level ${level} within its defined steps`,
          )
        }
        restarts[j] = r
        ensemble.readState(source, r, restartStates, j * D)
      }

      const continuation = this.generate(m, restartStates)
      const contScores = this.scoreBatch(continuation)
      const contLengths = naturalLengths(continuation)

      let required = 0
      for (let j = 0; j < m; j++) {
        const slot = discarded[j]!
        if (contLengths[j] === 0) {
          throw new DegenerateTrajectoryError(slot, `Continuation for trajectory ${slot} is undefined from time 0`)
        }
        required = Math.max(required, restarts[j]! + contLengths[j]!)
      }
      ensemble.grow(required)

      for (let j = 0; j < m; j++) {
        ensemble.splice(discarded[j]!, sources[j]!, restarts[j]!, continuation, contScores, j, contLengths[j]!)
      }
      this.classify(ensemble, discarded, ensemble.select(discarded))
      ensemble.updateLevels()
      iterations++

      this.logger.debug('ams iteration', {
        iteration: iterations,
        threshold,
        discarded: m,
        weight,
        capacity: ensemble.capacity,
      })
      this.config.onIteration?.({
        iteration: iterations,
        threshold,
        weight,
        discarded,
        sources,
        restarts,
        ensemble,
      })

      levels = ensemble.distinctLevels()
    }

    let transitions = 0
    for (let i = 0; i < N; i++) {
      if (ensemble.level(i) >= collapseThreshold) transitions++
    }
    const probability = (weight * transitions) / N
    const runtime = (performance.now() - tStart) / 1000

    this.logger.info('ams run complete', { iterations, probability, transitions, runtime })

    return {
      probability,
      iterations,
      transitions,
      weight,
      runtime,
      ...ensemble.release(),
    }
  }

  /**
   * Repeat `run` `count` times with the same initial states. The random
   * stream carries on between runs rather than being reseeded.
   *
   * With `onError: 'skip'` a failing run is logged and left out of the
   * table; its `run` index is simply absent. The default aborts the batch.
   */
  runMultiple(count: number, initialStates: Float64Array, options: RunMultipleOptions = {}): RunSummary[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new ConfigurationError(`Run count must be a non-negative integer, got ${count}`, {
        count: ['Expected a non-negative integer'],
      })
    }
    const policy = options.onError ?? 'abort'
    const rows: RunSummary[] = []

    for (let run = 0; run < count; run++) {
      try {
        const result = this.run(initialStates, options.collapseThreshold)
        rows.push({
          run,
          probability: result.probability,
          iterations: result.iterations,
          transitions: result.transitions,
          runtime: result.runtime,
        })
      } catch (err) {
        if (policy === 'abort' || !(err instanceof Error)) throw err
        this.logger.warn('ams run failed, skipping', {
          run,
          error: err instanceof AmsError ? err.name : 'Error',
          message: err.message,
        })
      }
    }

    return rows
  }

  // -------------------------------------------------------------------------
  // Collaborator calls
  // -------------------------------------------------------------------------

  private generate(batchSize: number, initStates: Float64Array): TrajectoryBatch {
    const batch = this.config.generator(batchSize, initStates)
    assertTrajectoryBatch(batch, batchSize, this.config.dimension)
    return batch
  }

  private scoreBatch(batch: TrajectoryBatch): Float64Array {
    const scores = this.config.score(batch)
    assertSeries(scores, batch, 'score')
    return scores
  }

  /** Classify `batch` (whose rows are ensemble `slots`) and apply the score override. */
  private classify(ensemble: Ensemble, slots: Int32Array, batch: TrajectoryBatch): void {
    const start = this.config.regions.isStart(batch)
    const target = this.config.regions.isTarget(batch)
    assertSeries(start, batch, 'regions')
    assertSeries(target, batch, 'regions')
    for (let m = 0; m < start.length; m++) {
      if (start[m] && target[m]) {
        const row = Math.floor(m / batch.length)
        throw new ContractViolation(
          'regions',
          `step ${m % batch.length} of trajectory ${slots[row]} is in both the start and target region`,
        )
      }
    }
    ensemble.applyRegions(slots, start, target)
  }
}

function identity(n: number): Int32Array {
  const out = new Int32Array(n)
  for (let i = 0; i < n; i++) out[i] = i
  return out
}
