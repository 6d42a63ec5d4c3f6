import type { IRNG } from "../runtime/rng";

/**
 * FakeRng - Test helper that returns predefined values in [0, 1)
 * Implements the same interface as RNG for testing purposes
 */
export class FakeRng implements IRNG {
  private values: number[];
  private index: number = 0;

  constructor(values: number[]) {
    this.values = [...values];
  }

  /**
   * Returns the next predefined value
   * Throws if values are exhausted
   */
  next(): number {
    if (this.index >= this.values.length) {
      throw new Error(`FakeRng: No more values available. Requested value ${this.index + 1}, but only ${this.values.length} values provided.`);
    }
    const value = this.values[this.index];
    this.index++;
    return value;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }
}
