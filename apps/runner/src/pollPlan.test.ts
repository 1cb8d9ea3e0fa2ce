import { describe, it, expect } from "vitest";
import { POLL_ATTEMPTS, drawBaseWait, planPollSteps } from "./pollPlan";

describe("planPollSteps", () => {
  it("plans twelve attempts by default", () => {
    expect(planPollSteps(35)).toHaveLength(POLL_ATTEMPTS);
  });

  it("decays each wait by 0.75 and carries the remaining budget", () => {
    const steps = planPollSteps(16, 3);
    expect(steps).toEqual([
      { attempt: 0, wait_s: 16, cumulative_wait_s: 37 },
      { attempt: 1, wait_s: 12, cumulative_wait_s: 21 },
      { attempt: 2, wait_s: 9, cumulative_wait_s: 9 },
    ]);
  });

  it("starts with the full decayed sum", () => {
    const steps = planPollSteps(10);
    const total = steps.reduce((s, x) => s + x.wait_s, 0);
    expect(steps[0]?.cumulative_wait_s).toBeCloseTo(total, 9);
    expect(steps[POLL_ATTEMPTS - 1]?.wait_s).toBeCloseTo(10 * Math.pow(0.75, 11), 12);
  });

  it("is all zeros for a zero base", () => {
    expect(planPollSteps(0, 2)).toEqual([
      { attempt: 0, wait_s: 0, cumulative_wait_s: 0 },
      { attempt: 1, wait_s: 0, cumulative_wait_s: 0 },
    ]);
  });
});

describe("drawBaseWait", () => {
  it("draws around 35 seconds", () => {
    expect(drawBaseWait(() => 0.25)).toBeCloseTo(35, 9);
  });

  it("never goes negative", () => {
    // u1 ≈ 1e-12 pushes z below -7
    const values = [0.999999999999, 0.5];
    let i = 0;
    expect(drawBaseWait(() => values[i++] ?? 0)).toBe(0);
  });
});
