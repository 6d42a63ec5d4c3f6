import { describe, it, expect } from "vitest";
import { RNG } from "./rng";

function take(rng: RNG, count: number): number[] {
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(rng.next());
  }
  return values;
}

describe("RNG", () => {
  it("produces the same sequence for the same seed", () => {
    expect(take(new RNG(123456), 10)).toEqual(take(new RNG(123456), 10));
  });

  it("produces a different sequence for another seed", () => {
    expect(take(new RNG(1), 5)).not.toEqual(take(new RNG(2), 5));
  });

  it("keeps next within [0, 1)", () => {
    for (const value of take(new RNG(7), 200)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("nextInt stays within inclusive bounds", () => {
    const rng = new RNG(42);

    for (let i = 0; i < 200; i++) {
      const n = rng.nextInt(10, 50);
      expect(n).toBeGreaterThanOrEqual(10);
      expect(n).toBeLessThanOrEqual(50);
      expect(Number.isInteger(n)).toBe(true);
    }
  });
});
