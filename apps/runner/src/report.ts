// apps/runner/src/report.ts
//
// Run report: one JSON document with every scheduled flow and its full trace.

import { writeFile } from "node:fs/promises";
import type { AggregateResult, ReportFlowEntry, RunReport } from "shared-types";
import { redactSecret } from "./sanitize";
import { summarizeRun } from "./summary";

export type ReportMeta = {
  started_at: number;
  ended_at: number;
  domain: string;
  options: Record<string, unknown>;
};

export function defaultReportPath(at: Date): string {
  return `pollstorm-report-${at.toISOString().replace(/:/g, "-")}.json`;
}

export function buildReport(
  result: AggregateResult,
  meta: ReportMeta,
  opts: { redactApiKey?: boolean } = {}
): RunReport {
  const flows: ReportFlowEntry[] = result.flows.map((f) => ({
    id: f.request.id,
    domain: f.request.domain,
    offset_s: f.request.offset_s,
    json: { ...f.request.payload },
    ok: f.ok,
    state: f.state,
    trace: f.trace,
  }));

  const report: RunReport = { ...meta, summary: summarizeRun(result), flows };
  if (!opts.redactApiKey) return report;

  const keys = new Set(result.flows.map((f) => f.request.payload.api_key));
  let out = report;
  for (const k of keys) out = redactSecret(out, k);
  return out;
}

/** JSON replacer: anything JSON cannot represent is written as its string form. */
export function stringFallback(_key: string, value: unknown): unknown {
  if (typeof value === "bigint" || typeof value === "symbol" || typeof value === "function") {
    return String(value);
  }
  if (value instanceof Error) return String(value);
  if (typeof value === "number" && !Number.isFinite(value)) return String(value);
  return value;
}

export function serializeReport(report: RunReport): string {
  return JSON.stringify(report, stringFallback, 2);
}

export async function writeReport(filePath: string, report: RunReport): Promise<void> {
  await writeFile(filePath, serializeReport(report), "utf-8");
}

/** Creates (truncates) the report file up front so a bad path shows before the run. */
export async function probeReportPath(filePath: string): Promise<boolean> {
  try {
    await writeFile(filePath, "", "utf-8");
    return true;
  } catch {
    return false;
  }
}
