/**
 * Reseedable random stream for clone-source sampling and model noise.
 *
 * Implements:
 * - xoshiro256** (period 2^256-1) seeded through SplitMix64
 * - Box-Muller transform for normal variates
 * - Uniform integer draws and sampling with replacement
 * - State save/restore so a run can be replayed exactly
 */

const MASK_64 = 0xFFFFFFFFFFFFFFFFn

/** Snapshot of an Rng, restorable with `setState`. */
export interface RngState {
  s: [bigint, bigint, bigint, bigint]
  spareNormal: number | null
}

export class Rng {
  private s = new BigUint64Array(4)
  private spareNormal: number | null = null

  constructor(seed: number = Date.now()) {
    this.reseed(seed)
  }

  /** Reset the stream as if freshly constructed with `seed`. */
  reseed(seed: number): void {
    // SplitMix64 expansion of the seed into the four state words
    let s = BigInt(Math.trunc(seed)) & MASK_64
    for (let i = 0; i < 4; i++) {
      s = (s + 0x9E3779B97F4A7C15n) & MASK_64
      let z = s
      z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & MASK_64
      z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & MASK_64
      z = z ^ (z >> 31n)
      this.s[i] = z
    }
    this.spareNormal = null
  }

  getState(): RngState {
    return {
      s: [this.s[0]!, this.s[1]!, this.s[2]!, this.s[3]!],
      spareNormal: this.spareNormal,
    }
  }

  setState(state: RngState): void {
    this.s.set(state.s)
    this.spareNormal = state.spareNormal
  }

  /** Returns a uniform random number in [0, 1) */
  next(): number {
    const s = this.s
    const result = (rotl((s[1]! * 5n) & MASK_64, 7n) * 9n) & MASK_64

    const t = (s[1]! << 17n) & MASK_64

    s[2] = s[2]! ^ s[0]!
    s[3] = s[3]! ^ s[1]!
    s[1] = s[1]! ^ s[2]!
    s[0] = s[0]! ^ s[3]!

    s[2] = s[2]! ^ t
    s[3] = rotl(s[3]!, 45n)

    // Upper 53 bits → double in [0, 1)
    return Number(result >> 11n) / 9007199254740992
  }

  /**
   * Normal variate via the polar Box-Muller transform.
   * Generates two independent values per draw and caches the spare.
   */
  normal(mean: number = 0, stddev: number = 1): number {
    if (this.spareNormal !== null) {
      const val = this.spareNormal
      this.spareNormal = null
      return mean + stddev * val
    }

    let u: number, v: number, s: number
    do {
      u = 2 * this.next() - 1
      v = 2 * this.next() - 1
      s = u * u + v * v
    } while (s >= 1 || s === 0)

    const factor = Math.sqrt(-2 * Math.log(s) / s)
    this.spareNormal = v * factor
    return mean + stddev * u * factor
  }

  /** Uniform integer in [0, n) */
  integer(n: number): number {
    return Math.floor(this.next() * n)
  }

  /** Draw `size` elements of `pool` uniformly, with replacement. */
  choice(pool: ArrayLike<number>, size: number): Int32Array {
    if (pool.length === 0) {
      throw new RangeError('Cannot sample from an empty pool')
    }
    const out = new Int32Array(size)
    for (let i = 0; i < size; i++) {
      out[i] = pool[this.integer(pool.length)]!
    }
    return out
  }
}

function rotl(x: bigint, k: bigint): bigint {
  return ((x << k) | (x >> (64n - k))) & MASK_64
}
