// apps/runner/src/summary.ts
//
// Run statistics for the console and the report.

import type { AggregateResult, FlowResult, LatencyStats, RunSummary, TerminalFlowState } from "shared-types";

export function percentile(arr: readonly number[], p: number): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const idx = Math.floor((p / 100) * (sorted.length - 1));
  return sorted[idx] ?? 0;
}

export function latencyStats(values: readonly number[]): LatencyStats {
  return {
    avg: values.length ? Math.round(values.reduce((a, b) => a + b, 0) / values.length) : 0,
    p95: percentile(values, 95),
    p99: percentile(values, 99),
  };
}

function submitLatency(f: FlowResult): number | null {
  const s = f.trace.submission;
  if (!s || s.outcome !== "accepted" || s.end_ms === undefined) return null;
  return s.end_ms - s.start_ms;
}

function timeToResult(f: FlowResult): number | null {
  const s = f.trace.submission;
  const last = f.trace.polls[f.trace.polls.length - 1];
  if (!f.ok || !s || !last || last.end_ms === undefined) return null;
  return last.end_ms - s.start_ms;
}

function notNull(v: number | null): v is number {
  return v !== null;
}

export function summarizeRun(result: AggregateResult): RunSummary {
  const by_state: Record<TerminalFlowState, number> = {
    SUBMITTED_FAIL: 0,
    POLL_SUCCESS: 0,
    POLL_EXHAUSTED: 0,
    POLL_ABORTED: 0,
  };
  for (const f of result.flows) by_state[f.state] += 1;

  const polled = result.flows.filter((f) => f.state !== "SUBMITTED_FAIL");
  const pollCount = polled.reduce((s, f) => s + f.trace.polls.length, 0);

  return {
    total: result.total,
    succeeded: result.succeeded,
    failed: result.total - result.succeeded,
    by_state,
    submit_ms: latencyStats(result.flows.map(submitLatency).filter(notNull)),
    time_to_result_ms: latencyStats(result.flows.map(timeToResult).filter(notNull)),
    polls_avg: polled.length ? Math.round((pollCount / polled.length) * 100) / 100 : 0,
  };
}
