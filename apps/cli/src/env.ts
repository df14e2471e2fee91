/**
 * Environment configuration, validated up front.
 *
 * Every variable has a default; a value that is present but malformed
 * throws before any simulation starts.
 */

import { z } from 'zod'
import { LOG_LEVELS } from '@raresplit/ams'

export const envSchema = z.object({
  RARESPLIT_ENSEMBLE_SIZE: z.coerce.number().int().min(2).default(100),
  RARESPLIT_SURVIVORS: z.coerce.number().int().min(1).default(1),
  RARESPLIT_RUNS: z.coerce.number().int().min(1).default(10),
  RARESPLIT_SEED: z.coerce.number().int().optional(),
  RARESPLIT_MU: z.coerce.number().positive().default(0.03),
  RARESPLIT_DT: z.coerce.number().positive().default(0.01),
  RARESPLIT_MAX_STEPS: z.coerce.number().int().min(1).default(2000),
  RARESPLIT_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type Env = z.infer<typeof envSchema>

export function loadEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source)
  if (!result.success) {
    const problems = Object.entries(result.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ')
    throw new Error(
      `Invalid environment configuration (${problems}). ` +
      `Set the variables in your shell or deployment configuration.`,
    )
  }
  return result.data
}
