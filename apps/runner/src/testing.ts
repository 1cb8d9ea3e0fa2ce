// apps/runner/src/testing.ts
//
// In-process stand-ins shared by the runner tests: a scripted HTTP client,
// a virtual clock and a recording logger.

import type { FlowContext } from "./flowRunner";
import type { HttpClient, HttpReply } from "./httpClient";
import type { FlowLogger, LogLevel } from "./logger";

export type Route = (body: unknown, call: number) => HttpReply | Promise<HttpReply>;

export type RecordedCall = { url: string; body: unknown };

export type ScriptedClient = HttpClient & { calls: RecordedCall[] };

export function json(status: number, body: unknown): HttpReply {
  return { status, text: JSON.stringify(body) };
}

export function scriptedClient(routes: { submit: Route; poll?: Route }, opts: { clock?: VirtualClock } = {}): ScriptedClient {
  const calls: RecordedCall[] = [];
  let submits = 0;
  let polls = 0;

  return {
    calls,
    async postJson(url, body) {
      calls.push({ url, body });
      opts.clock?.advance(5);
      if (url.endsWith("/api/request_processing_location")) return routes.submit(body, submits++);
      if (url.endsWith("/api/get_features")) {
        if (!routes.poll) throw new Error(`unexpected poll: ${url}`);
        return routes.poll(body, polls++);
      }
      throw new Error(`unexpected url: ${url}`);
    },
  };
}

export type VirtualClock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
  advance: (ms: number) => void;
  sleeps: number[];
};

export function virtualClock(start = 1_000): VirtualClock {
  let t = start;
  const sleeps: number[] = [];
  return {
    now: () => t,
    sleep: async (ms) => {
      sleeps.push(ms);
      t += ms;
    },
    advance: (ms) => {
      t += ms;
    },
    sleeps,
  };
}

export type LogEntry = { flowId: number; level: LogLevel; message: string };

export function recordingLoggers(): { entries: LogEntry[]; createLogger: (flowId: number) => FlowLogger } {
  const entries: LogEntry[] = [];
  const createLogger = (flowId: number): FlowLogger => {
    const at = (level: LogLevel) => (message: string) => {
      entries.push({ flowId, level, message });
    };
    return { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
  };
  return { entries, createLogger };
}

/** Random source whose first Box-Muller pair lands on the mean. */
export const meanRandom = () => 0.75;

export function testContext(client: HttpClient, clock = virtualClock()): FlowContext & { entries: LogEntry[] } {
  const logs = recordingLoggers();
  return {
    client,
    sleep: clock.sleep,
    now: clock.now,
    createRandom: () => meanRandom,
    createLogger: logs.createLogger,
    entries: logs.entries,
  };
}
