import type { RegionClassifier, RegionMask, ScoreFunction, TrajectoryBatch } from '@raresplit/ams'
import { inStartRegion, inTargetRegion } from './model'

/**
 * Normalised position score: (x + 1) / 2 clipped to [0, 1], so the left
 * minimum scores 0 and the right minimum scores 1. NaN positions stay NaN.
 */
export const positionScore: ScoreFunction = (batch) => {
  const { data, batchSize, length, dimension } = batch
  const out = new Float64Array(batchSize * length)
  for (let m = 0; m < out.length; m++) {
    const x = data[m * dimension]!
    out[m] = Number.isNaN(x) ? NaN : Math.min(1, Math.max(0, (x + 1) / 2))
  }
  return out
}

function mask(batch: TrajectoryBatch, test: (x: number) => boolean): RegionMask {
  const { data, batchSize, length, dimension } = batch
  const out = new Uint8Array(batchSize * length)
  for (let m = 0; m < out.length; m++) {
    const x = data[m * dimension]!
    if (!Number.isNaN(x) && test(x)) out[m] = 1
  }
  return out
}

export function doubleWellRegions(width: number): RegionClassifier {
  if (!(width > 0 && width < 1)) {
    throw new RangeError(`Region width must lie in (0, 1), got ${width}`)
  }
  return {
    isStart: (batch) => mask(batch, x => inStartRegion(x, width)),
    isTarget: (batch) => mask(batch, x => inTargetRegion(x, width)),
  }
}
