/**
 * Random number generation for path simulation.
 *
 * Implements:
 * - Seedable PRNG (xoshiro256** — period 2^256-1, passes all BigCrush tests)
 * - Polar Box-Muller transform for the normal distribution
 */

import { InvalidParameterError } from './errors'

const MASK_64 = 0xFFFFFFFFFFFFFFFFn

// ---------------------------------------------------------------------------
// xoshiro256** — State-of-the-art PRNG
// ---------------------------------------------------------------------------

/**
 * Seedable, high-quality PRNG using xoshiro256** algorithm.
 * Period: 2^256-1. Passes BigCrush and PractRand test suites.
 *
 * The seed must be a safe integer; two generators built from the same
 * seed produce identical streams.
 *
 * @throws InvalidParameterError when the seed is not a safe integer
 */
export class Rng {
  private s: BigUint64Array
  private spareNormal: number | null = null

  constructor(seed: number = Date.now()) {
    if (!Number.isSafeInteger(seed)) {
      throw new InvalidParameterError('seed', `seed must be an integer, got ${seed}`)
    }

    // Initialize state via SplitMix64 (recommended seeding for xoshiro)
    this.s = new BigUint64Array(4)
    let s = BigInt(seed) & MASK_64
    for (let i = 0; i < 4; i++) {
      s = (s + 0x9E3779B97F4A7C15n) & MASK_64
      let z = s
      z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & MASK_64
      z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & MASK_64
      z = z ^ (z >> 31n)
      this.s[i] = z
    }
  }

  /** Returns a uniform random number in [0, 1) */
  next(): number {
    const s = this.s
    const result = (rotl((s[1]! * 5n) & MASK_64, 7n) * 9n) & MASK_64

    const t = (s[1]! << 17n) & MASK_64

    s[2] = (s[2]! ^ s[0]!) & MASK_64
    s[3] = (s[3]! ^ s[1]!) & MASK_64
    s[1] = (s[1]! ^ s[2]!) & MASK_64
    s[0] = (s[0]! ^ s[3]!) & MASK_64

    s[2] = (s[2]! ^ t) & MASK_64
    s[3] = rotl(s[3]!, 45n)

    // Upper 53 bits → double in [0, 1)
    return Number(result >> 11n) / 9007199254740992 // 2^53
  }

  /**
   * Normal variate via the polar Box-Muller transform.
   * Generates two independent N(0,1) values; caches the spare.
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
}

function rotl(x: bigint, k: bigint): bigint {
  return ((x << k) | (x >> (64n - k))) & MASK_64
}
