// apps/runner/src/orchestrator.ts
//
// Launches every flow, waits for all of them and aggregates in flow-index order.

import type { AggregateResult, FlowRequest, FlowResult } from "shared-types";
import { runFlow, type FlowContext } from "./flowRunner";

export type OrchestratorOptions = {
  /** Worker-pool ceiling on flows in flight; 0 launches everything at once. */
  maxConcurrency?: number;
};

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, idx: number) => Promise<R>
): Promise<R[]> {
  const n = Math.max(1, Math.floor(concurrency));
  const results: R[] = new Array(items.length);
  let nextIdx = 0;

  async function worker(): Promise<void> {
    for (;;) {
      const idx = nextIdx;
      nextIdx += 1;
      if (idx >= items.length) return;

      const item = items[idx];
      if (item === undefined) return;

      results[idx] = await fn(item, idx);
    }
  }

  const workers = Array.from({ length: Math.min(n, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

export function aggregate(flows: readonly FlowResult[]): AggregateResult {
  const ordered = [...flows].sort((a, b) => a.request.id - b.request.id);
  const outcomes = ordered.map((f) => f.ok);
  return Object.freeze({
    total: ordered.length,
    succeeded: outcomes.filter(Boolean).length,
    outcomes: Object.freeze(outcomes),
    flows: Object.freeze(ordered),
  });
}

export async function runFlows(
  requests: readonly FlowRequest[],
  ctx: FlowContext,
  opts: OrchestratorOptions = {}
): Promise<AggregateResult> {
  const runCtx: FlowContext = { ...ctx, runStartedAt: ctx.runStartedAt ?? ctx.now() };
  const cap = opts.maxConcurrency ?? 0;

  // A flow that throws is a bug; let it reject the whole run.
  const results =
    cap > 0
      ? await runWithConcurrency(requests, cap, (req) => runFlow(req, runCtx))
      : await Promise.all(requests.map((req) => runFlow(req, runCtx)));

  return aggregate(results);
}
