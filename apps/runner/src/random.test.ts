import { describe, it, expect } from "vitest";
import { flowSeed, normalVariate, perFlowRandom, seededRandom, shuffled } from "./random";

describe("seededRandom", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
    for (const v of seqA) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("differs across seeds", () => {
    expect(seededRandom(1)()).not.toBe(seededRandom(2)());
  });
});

describe("normalVariate", () => {
  it("returns the mean when the angle term vanishes", () => {
    // u2 = 0.25 puts cos(2*pi*u2) at zero
    expect(normalVariate(35, 5, () => 0.25)).toBeCloseTo(35, 9);
  });

  it("scales by sigma", () => {
    // u1 = e^-0.5 makes the radius 1; u2 = 0 makes the angle term 1
    const values = [1 - Math.exp(-0.5), 0];
    let i = 0;
    const v = normalVariate(10, 2, () => values[i++] ?? 0);
    expect(v).toBeCloseTo(12, 9);
  });

  it("centres on the mean over many draws", () => {
    const random = seededRandom(3);
    const n = 4000;
    let sum = 0;
    for (let i = 0; i < n; i++) sum += normalVariate(35, 5, random);
    expect(sum / n).toBeGreaterThan(34.5);
    expect(sum / n).toBeLessThan(35.5);
  });
});

describe("shuffled", () => {
  it("returns a new permutation and leaves the input alone", () => {
    const input = [1, 2, 3, 4, 5];
    const out = shuffled(input, seededRandom(9));
    expect(input).toEqual([1, 2, 3, 4, 5]);
    expect(out).not.toBe(input);
    expect([...out].sort((a, b) => a - b)).toEqual(input);
  });

  it("is deterministic for a fixed draw", () => {
    // j = 0 each time: [1,2,3] -> swap(2,0) [3,2,1] -> swap(1,0) [2,3,1]
    expect(shuffled([1, 2, 3], () => 0)).toEqual([2, 3, 1]);
  });
});

describe("perFlowRandom", () => {
  it("shares the run source when unseeded", () => {
    const shared = () => 0.5;
    const forFlow = perFlowRandom(null, shared);
    expect(forFlow(0)).toBe(shared);
    expect(forFlow(9)).toBe(shared);
  });

  it("gives each seeded flow its own reproducible stream", () => {
    const forFlow = perFlowRandom(7, () => 0.5);
    const a = forFlow(3);
    const b = forFlow(3);
    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
    expect(forFlow(0)()).toBe(seededRandom(flowSeed(7, 0))());
    expect(flowSeed(7, 0)).not.toBe(flowSeed(7, 1));
  });
});
