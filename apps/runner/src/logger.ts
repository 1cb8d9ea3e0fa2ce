// apps/runner/src/logger.ts
//
// Per-flow loggers. Each flow gets its own named instance; nothing here is global.

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type FlowLogger = Record<LogLevel, (message: string) => void>;

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "warn" || level === "error") console.error(line);
  else console.log(line);
};

export function isLogLevel(v: string): v is LogLevel {
  return LOG_LEVELS.some((l) => l === v);
}

export function workerName(flowId: number): string {
  return `worker_${String(flowId).padStart(5, "0")}`;
}

export function formatLogLine(level: LogLevel, name: string, at: Date, message: string): string {
  return `[${level.toUpperCase()}] ${name} ${at.toISOString()}:\t${message}`;
}

export function createFlowLogger(
  flowId: number,
  opts: { minLevel?: LogLevel; sink?: LogSink; clock?: () => Date } = {}
): FlowLogger {
  const min = LOG_LEVELS.indexOf(opts.minLevel ?? "info");
  const sink = opts.sink ?? consoleSink;
  const clock = opts.clock ?? (() => new Date());
  const name = workerName(flowId);

  const emit = (level: LogLevel) => (message: string) => {
    if (LOG_LEVELS.indexOf(level) < min) return;
    sink(level, formatLogLine(level, name, clock(), message));
  };

  return { debug: emit("debug"), info: emit("info"), warn: emit("warn"), error: emit("error") };
}
