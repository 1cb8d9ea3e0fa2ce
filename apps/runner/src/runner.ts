// apps/runner/src/runner.ts
//
// CLI pipeline: load addresses, confirm, schedule, run every flow, report.

import type { AggregateResult, RunReport } from "shared-types";
import { loadAddresses } from "./addresses";
import type { RunnerConfig } from "./config";
import { confirm, type Ask } from "./confirm";
import { RunAbortedError } from "./errors";
import { monotonicNow, sleep as realSleep } from "./flowRunner";
import { createFetchClient, type HttpClient } from "./httpClient";
import { createFlowLogger, type LogSink } from "./logger";
import { runFlows } from "./orchestrator";
import { defaultRandom, perFlowRandom, seededRandom, type RandomSource } from "./random";
import { buildReport, probeReportPath, writeReport } from "./report";
import { describeSchedule, planFlows } from "./schedule";

export const EXIT_FLOWS_FAILED = 3;
export const EXIT_ABORTED_SCHEDULE = 123;
export const EXIT_ABORTED_REPORT = 124;

export type RunnerIO = {
  ask: Ask;
  print: (line: string) => void;
  loadAddresses: (filePath: string) => Promise<string[]>;
  probeReportPath: (filePath: string) => Promise<boolean>;
  writeReport: (filePath: string, report: RunReport) => Promise<void>;
  client?: HttpClient;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  /** Shuffle and stagger draws. */
  random?: RandomSource;
  /** Poll base-wait draws, one source per flow. */
  createRandom?: (flowId: number) => RandomSource;
  logSink?: LogSink;
};

export type RunOutcome = {
  result: AggregateResult;
  report: RunReport;
  exitCode: number;
};

export function defaultIO(ask: Ask): RunnerIO {
  return {
    ask,
    print: (line) => console.log(line),
    loadAddresses,
    probeReportPath,
    writeReport,
  };
}

function formatRate(rate: number | null): string | null {
  return rate === null ? null : `This leads to a combined rate of ${rate} requests per second.`;
}

export async function runPollstorm(cfg: RunnerConfig, io: RunnerIO): Promise<RunOutcome> {
  const now = io.now ?? monotonicNow;
  const random = io.random ?? (cfg.seed === null ? defaultRandom : seededRandom(cfg.seed));
  const createRandom = io.createRandom ?? perFlowRandom(cfg.seed, random);

  const reportWritable = await io.probeReportPath(cfg.reportPath);
  if (!reportWritable) {
    const go = cfg.assumeYes || (await confirm(io.ask, `Unable to create report file ${cfg.reportPath}, continue? [y/n] `));
    if (!go) throw new RunAbortedError("Aborting.", EXIT_ABORTED_REPORT);
  }

  const addresses = await io.loadAddresses(cfg.addressesPath);
  io.print(`Got ${addresses.length} urls`);

  const requests = planFlows(
    {
      domain: cfg.domain,
      apiKey: cfg.apiKey,
      addresses,
      shuffle: cfg.shuffle,
      limit: cfg.limit,
      stagger_s: cfg.stagger_s,
      deviation_s: cfg.deviation_s,
    },
    random
  );
  io.print(`Keeping ${requests.length} urls`);

  const schedule = describeSchedule(requests.map((r) => r.offset_s));
  io.print(`About to schedule ${schedule.count} tasks.`);
  io.print(`The first starts at ${schedule.first_s}, the last at ${schedule.last_s}.`);
  const rateLine = formatRate(schedule.rate_per_s);
  if (rateLine) io.print(rateLine);

  if (!cfg.assumeYes && !(await confirm(io.ask, "Does this look ok? [y/n] "))) {
    throw new RunAbortedError("Aborting.", EXIT_ABORTED_SCHEDULE);
  }

  const started_at = now();
  io.print(`Starting at ${new Date(started_at).toISOString()}`);

  const result = await runFlows(
    requests,
    {
      client: io.client ?? createFetchClient({ timeoutMs: cfg.timeoutMs }),
      sleep: io.sleep ?? realSleep,
      now,
      createRandom,
      createLogger: (id) => createFlowLogger(id, { minLevel: cfg.logLevel, sink: io.logSink }),
    },
    { maxConcurrency: cfg.maxConcurrency }
  );

  const ended_at = now();
  io.print(`Done at ${new Date(ended_at).toISOString()}`);
  io.print(`${result.succeeded}/${result.total} OK`);

  const report = buildReport(
    result,
    {
      started_at,
      ended_at,
      domain: cfg.domain,
      options: {
        shuffle: cfg.shuffle,
        limit: cfg.limit,
        stagger_s: cfg.stagger_s,
        deviation_s: cfg.deviation_s,
        seed: cfg.seed,
        timeout_ms: cfg.timeoutMs,
        max_concurrency: cfg.maxConcurrency,
      },
    },
    { redactApiKey: cfg.redactApiKey }
  );

  const s = report.summary;
  io.print(
    `submit_ms avg=${s.submit_ms.avg} p95=${s.submit_ms.p95} p99=${s.submit_ms.p99}; ` +
      `time_to_result_ms avg=${s.time_to_result_ms.avg} p95=${s.time_to_result_ms.p95}; polls_avg=${s.polls_avg}`
  );

  if (reportWritable) {
    await io.writeReport(cfg.reportPath, report);
    io.print(`Saved data to ${cfg.reportPath}`);
  } else {
    io.print(`Report not saved: ${cfg.reportPath} is not writable`);
  }

  return { result, report, exitCode: result.succeeded === result.total ? 0 : EXIT_FLOWS_FAILED };
}
