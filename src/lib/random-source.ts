// Random sources for baseline generation
// Only the baseline generator draws randomness; callers inject a source to make runs reproducible

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number
}

/** xorshift32 generator; the same seed always yields the same sequence */
export class SeededRandom implements RandomSource {
  private state: number

  constructor(seed: number) {
    if (!Number.isFinite(seed)) seed = 0
    this.state = seed >>> 0 || 1
  }

  next(): number {
    let x = this.state >>> 0
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    this.state = x >>> 0
    return this.state / 0x100000000
  }
}

export function createSeededRandom(seed: number): RandomSource {
  return new SeededRandom(seed)
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
}

// ─── Draw Helpers ───────────────────────────────────────────────────────────

/** Integer in [min, max], both inclusive */
export function randomInt(source: RandomSource, min: number, max: number): number {
  return min + Math.floor(source.next() * (max - min + 1))
}

export function randomUniform(source: RandomSource, min: number, max: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round((min + source.next() * (max - min)) * factor) / factor
}

export function randomChoice<T>(source: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('randomChoice needs at least one item')
  return items[Math.min(items.length - 1, Math.floor(source.next() * items.length))]
}
