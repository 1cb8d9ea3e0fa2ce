// apps/runner/src/schedule.ts
//
// Start-offset scheduling and address selection. Pure apart from the random draws.

import type { FlowRequest, ScheduleEntry } from "shared-types";
import { normalVariate, shuffled, type RandomSource } from "./random";

export type StaggerOptions = {
  /** Base delay between successive starts, seconds. */
  stagger_s: number;
  /** Standard deviation of the delay; null or 0 keeps it fixed. */
  deviation_s: number | null;
};

export type SelectionOptions = {
  shuffle: boolean;
  /** Keep at most this many addresses; 0 keeps all. */
  limit: number;
};

export type PlanInput = StaggerOptions &
  SelectionOptions & {
    domain: string;
    apiKey: string;
    addresses: readonly string[];
  };

export type ScheduleDescription = {
  count: number;
  first_s: number;
  last_s: number;
  /** Combined request rate, only reported for schedules long enough to mean something. */
  rate_per_s: number | null;
};

function assertNonNegative(name: string, v: number): void {
  if (!Number.isFinite(v) || v < 0) {
    throw new RangeError(`${name} must be a finite number >= 0, got ${v}`);
  }
}

export function computeOffsets(count: number, opts: StaggerOptions, random: RandomSource): number[] {
  assertNonNegative("stagger", opts.stagger_s);
  const deviation = opts.deviation_s ?? 0;
  assertNonNegative("deviation", deviation);
  if (count <= 0) return [];

  const offsets = [0];
  let prev = 0;
  for (let i = 1; i < count; i++) {
    const step = deviation > 0 ? Math.max(0, normalVariate(opts.stagger_s, deviation, random)) : opts.stagger_s;
    prev += step;
    offsets.push(prev);
  }
  return offsets;
}

export function toScheduleEntries(offsets: readonly number[]): ScheduleEntry[] {
  return offsets.map((offset_s, index) => ({ index, offset_s }));
}

export function selectAddresses(addresses: readonly string[], opts: SelectionOptions, random: RandomSource): string[] {
  if (!Number.isInteger(opts.limit) || opts.limit < 0) {
    throw new RangeError(`limit must be a non-negative integer, got ${opts.limit}`);
  }
  const ordered = opts.shuffle ? shuffled(addresses, random) : [...addresses];
  if (opts.limit > 0 && opts.limit < ordered.length) return ordered.slice(0, opts.limit);
  return ordered;
}

export function planFlows(input: PlanInput, random: RandomSource): FlowRequest[] {
  const selected = selectAddresses(input.addresses, input, random);
  const entries = toScheduleEntries(computeOffsets(selected.length, input, random));

  return entries.map((entry) => ({
    id: entry.index,
    domain: input.domain,
    offset_s: entry.offset_s,
    payload: { address: selected[entry.index] ?? "", api_key: input.apiKey },
  }));
}

export function describeSchedule(offsets: readonly number[]): ScheduleDescription {
  const count = offsets.length;
  const first_s = offsets[0] ?? 0;
  const last_s = offsets[count - 1] ?? 0;
  const rate_per_s = count > 10 && last_s > 1e-6 ? count / last_s : null;
  return { count, first_s, last_s, rate_per_s };
}
