import { z } from 'zod'
import { ConfigurationError } from './errors'
import type { AmsConfig } from './types'

export const amsParamsSchema = z.object({
  ensembleSize: z.number().int().min(2, 'Ensemble needs at least two trajectories'),
  survivors: z.number().int().min(1, 'At least one survivor level is required'),
  dimension: z.number().int().min(1),
  seed: z.number().int().optional(),
}).refine(p => p.survivors < p.ensembleSize, {
  message: 'survivors must be smaller than ensembleSize',
  path: ['survivors'],
})

/**
 * Validate an estimator configuration before any simulation runs.
 * Accepts a partial object so callers assembling a config piecewise
 * get one error naming everything that is missing.
 *
 * @throws ConfigurationError with per-field messages
 */
export function validateConfig(config: Partial<AmsConfig>): AmsConfig {
  const result = amsParamsSchema.safeParse({
    ensembleSize: config.ensembleSize,
    survivors: config.survivors,
    dimension: config.dimension,
    seed: config.seed,
  })
  if (!result.success) {
    const fields = compactFields(result.error.flatten().fieldErrors)
    const detail = Object.entries(fields)
      .map(([key, messages]) => `${key}: ${messages.join(', ')}`)
      .join('; ')
    throw new ConfigurationError(`Invalid AMS configuration (${detail})`, fields)
  }

  const { generator, score, regions } = config
  const missing: string[] = []
  if (typeof generator !== 'function') missing.push('generator')
  if (typeof score !== 'function') missing.push('score')
  if (!regions || typeof regions.isStart !== 'function' || typeof regions.isTarget !== 'function') {
    missing.push('regions')
  }
  if (!generator || !score || !regions || missing.length > 0) {
    const fields: Record<string, string[]> = {}
    for (const key of missing) fields[key] = ['Collaborator is required']
    throw new ConfigurationError(`Missing collaborator: ${missing.join(', ')}`, fields)
  }

  return {
    ...result.data,
    generator,
    score,
    regions,
    logger: config.logger,
    onIteration: config.onIteration,
  }
}

function compactFields(fieldErrors: Record<string, string[] | undefined>): Record<string, string[]> {
  const out: Record<string, string[]> = {}
  for (const [key, messages] of Object.entries(fieldErrors)) {
    if (messages && messages.length > 0) out[key] = messages
  }
  return out
}
