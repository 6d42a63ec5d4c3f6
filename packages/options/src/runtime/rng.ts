/**
 * Source of randomness for "random" player settings
 */
export interface IRNG {
  /** Value in [0, 1) */
  next(): number;
  /** Integer in [min, max], both inclusive */
  nextInt(min: number, max: number): number;
}

/**
 * Seeded mulberry32 generator: one seed, one sequence
 */
export class RNG implements IRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }
}
