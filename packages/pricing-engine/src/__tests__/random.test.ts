import { describe, it, expect } from 'vitest'
import { Rng } from '../random'
import { InvalidParameterError } from '../errors'

describe('Rng', () => {
  it('produces values in [0, 1)', () => {
    const rng = new Rng(42)
    for (let i = 0; i < 1000; i++) {
      const v = rng.next()
      expect(v).toBeGreaterThanOrEqual(0)
      expect(v).toBeLessThan(1)
    }
  })

  it('produces repeatable sequences with same seed', () => {
    const rng1 = new Rng(12345)
    const rng2 = new Rng(12345)
    for (let i = 0; i < 100; i++) {
      expect(rng1.normal()).toBe(rng2.normal())
    }
  })

  it.each([1.5, Number.NaN, Number.POSITIVE_INFINITY, 2 ** 60])('rejects seed %s', (seed) => {
    expect(() => new Rng(seed)).toThrow(InvalidParameterError)
  })

  it('accepts negative integer seeds', () => {
    expect(new Rng(-7).next()).toBe(new Rng(-7).next())
  })

  it('different seeds produce different sequences', () => {
    const rng1 = new Rng(1)
    const rng2 = new Rng(2)
    const a = Array.from({ length: 10 }, () => rng1.next())
    const b = Array.from({ length: 10 }, () => rng2.next())
    expect(a).not.toEqual(b)
  })

  it('normal distribution has approximately zero mean and unit variance', () => {
    const rng = new Rng(42)
    const n = 20000
    let sum = 0
    let sumSq = 0
    for (let i = 0; i < n; i++) {
      const z = rng.normal()
      sum += z
      sumSq += z * z
    }
    const mean = sum / n
    const variance = sumSq / n - mean * mean
    expect(mean).toBeCloseTo(0, 1)
    expect(variance).toBeCloseTo(1, 1)
  })

  it('normal honours mean and standard deviation', () => {
    const rng = new Rng(7)
    const n = 20000
    let sum = 0
    for (let i = 0; i < n; i++) sum += rng.normal(100, 10)
    expect(sum / n).toBeCloseTo(100, 0)
  })
})
