/**
 * packages/testkit/src/rng.ts — Seeded pseudo-random source for property tests.
 *
 * Why: Property-style tests must replay the exact same inputs on every run, so
 * a failing seed can be reported and reproduced.
 */

export type Rng = Readonly<{
  /** Next unsigned 32-bit integer. */
  u32: () => number;
  /** Next float in [0, 1). */
  float: () => number;
  /** Next integer in [min, max] (inclusive). */
  int: (min: number, max: number) => number;
  /** Pick one element of a non-empty array. */
  pick: <T>(values: readonly T[]) => T;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  const u32 = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state;
  };
  const float = (): number => u32() / 4294967296;
  const int = (min: number, max: number): number => min + Math.floor(float() * (max - min + 1));

  return Object.freeze({
    u32,
    float,
    int,
    pick: <T>(values: readonly T[]): T => {
      const value = values[u32() % values.length];
      if (value === undefined) throw new Error("createRng.pick: empty array");
      return value;
    },
  });
}
