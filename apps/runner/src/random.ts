// apps/runner/src/random.ts
//
// Random sources for scheduling, shuffling and poll base waits.

/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/** mulberry32; same seed, same sequence. */
export function seededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Independent stream for one flow under a run seed. */
export function flowSeed(seed: number, flowId: number): number {
  return (seed ^ Math.imul(flowId + 1, 0x9e3779b9)) >>> 0;
}

/** One source per flow. Seeded runs give every flow its own stream. */
export function perFlowRandom(seed: number | null, shared: RandomSource): (flowId: number) => RandomSource {
  if (seed === null) return () => shared;
  const runSeed = seed;
  return (flowId) => seededRandom(flowSeed(runSeed, flowId));
}

/** Box-Muller draw from N(mu, sigma). */
export function normalVariate(mu: number, sigma: number, random: RandomSource): number {
  const u1 = 1 - random(); // (0, 1], keeps log finite
  const u2 = random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mu + sigma * z;
}

/** Fisher-Yates; returns a new array. */
export function shuffled<T>(items: readonly T[], random: RandomSource): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const a = out[i];
    const b = out[j];
    if (a === undefined || b === undefined) continue;
    out[i] = b;
    out[j] = a;
  }
  return out;
}
