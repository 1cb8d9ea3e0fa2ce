// apps/runner/src/pollPlan.ts
//
// Decaying poll schedule: one random base wait per flow, then a fixed
// geometric decay so later attempts come quicker.

import { normalVariate, type RandomSource } from "./random";

export const POLL_ATTEMPTS = 12;
export const POLL_DECAY = 0.75;
export const POLL_BASE_WAIT_MEAN_S = 35;
export const POLL_BASE_WAIT_STDDEV_S = 5;

export type PollStep = {
  attempt: number;
  wait_s: number;
  cumulative_wait_s: number;
};

export function drawBaseWait(random: RandomSource): number {
  return Math.max(0, normalVariate(POLL_BASE_WAIT_MEAN_S, POLL_BASE_WAIT_STDDEV_S, random));
}

/** Steps in chronological order; attempt j waits base * decay^j. */
export function planPollSteps(baseWait: number, attempts = POLL_ATTEMPTS, decay = POLL_DECAY): PollStep[] {
  const waits = Array.from({ length: attempts }, (_, j) => baseWait * Math.pow(decay, j));

  const steps: PollStep[] = new Array(attempts);
  let remaining = 0;
  for (let j = attempts - 1; j >= 0; j--) {
    const wait_s = waits[j] ?? 0;
    remaining += wait_s;
    steps[j] = { attempt: j, wait_s, cumulative_wait_s: remaining };
  }
  return steps;
}
