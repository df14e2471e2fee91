import { AmsEstimator, createLogger, type RunSummary } from '@raresplit/ams'
import { createDoubleWell, wellStartStates } from '@raresplit/double-well'
import type { Env } from './env'

export interface CliSummary {
  runs: number
  meanProbability: number
  meanIterations: number
  totalRuntime: number
}

/**
 * Estimate the double-well transition probability `RARESPLIT_RUNS` times.
 * Writes one JSON line per run and a final summary line through `write`.
 */
export function runCli(env: Env, write: (line: string) => void): CliSummary {
  const logger = createLogger({
    level: env.RARESPLIT_LOG_LEVEL,
    bindings: { app: 'raresplit-cli' },
  })

  // Model noise and clone sampling draw from separate streams
  const seed = env.RARESPLIT_SEED ?? Date.now()
  const well = createDoubleWell(
    { mu: env.RARESPLIT_MU, dt: env.RARESPLIT_DT, maxSteps: env.RARESPLIT_MAX_STEPS },
    seed + 1,
  )
  const estimator = new AmsEstimator({
    ensembleSize: env.RARESPLIT_ENSEMBLE_SIZE,
    survivors: env.RARESPLIT_SURVIVORS,
    dimension: well.dimension,
    generator: well.generator,
    score: well.score,
    regions: well.regions,
    seed,
    logger,
  })

  logger.info('starting double-well estimate', {
    ensembleSize: estimator.ensembleSize,
    survivors: estimator.survivors,
    runs: env.RARESPLIT_RUNS,
    mu: well.params.mu,
    seed,
  })

  const rows = estimator.runMultiple(env.RARESPLIT_RUNS, wellStartStates(estimator.ensembleSize))
  for (const row of rows) write(JSON.stringify(row) + '\n')

  const summary = summarize(rows)
  write(JSON.stringify({ summary }) + '\n')
  return summary
}

function summarize(rows: RunSummary[]): CliSummary {
  let probability = 0
  let iterations = 0
  let runtime = 0
  for (const row of rows) {
    probability += row.probability
    iterations += row.iterations
    runtime += row.runtime
  }
  const n = Math.max(rows.length, 1)
  return {
    runs: rows.length,
    meanProbability: probability / n,
    meanIterations: iterations / n,
    totalRuntime: runtime,
  }
}
