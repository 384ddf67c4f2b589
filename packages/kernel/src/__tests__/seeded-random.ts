/**
 * Seeded pseudo-random number generator (Mulberry32) for randomized edit
 * sequences. Deterministic per seed so failures reproduce.
 */
export class SeededRandom {
  private state: number

  constructor(seed: number) {
    this.state = seed >>> 0
  }

  /**
   * Get next random float in [0, 1).
   */
  next(): number {
    let t = (this.state += 0x6d2b79f5)
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  /**
   * Get random integer in [min, max].
   */
  int(min: number, max: number): number {
    return Math.floor(min + this.next() * (max - min + 1))
  }

  /**
   * Random int16 sample values.
   */
  samples(count: number): number[] {
    const out: number[] = []
    for (let i = 0; i < count; i++) {
      out.push(this.int(-32768, 32767))
    }
    return out
  }
}
