// apps/runner/src/config.ts

import path from "node:path";
import { CliUsageError, makeArgvHelpers } from "cli-utils";
import { DEFAULT_TIMEOUT_MS, normalizeDomain } from "./httpClient";
import { isLogLevel, type LogLevel } from "./logger";
import { defaultReportPath } from "./report";

export type RunnerConfig = {
  domain: string;
  apiKey: string;
  addressesPath: string;

  shuffle: boolean;
  limit: number;
  stagger_s: number;
  deviation_s: number | null;
  seed: number | null;

  timeoutMs: number;
  maxConcurrency: number;

  reportPath: string;
  redactApiKey: boolean;
  assumeYes: boolean;
  logLevel: LogLevel;
};

export const HELP_TEXT = `
Usage:
  pollstorm <domain> <api_key> <addresses-file>
            [--shuffle] [--limit <n>] [--stagger <s>] [--deviation <s>] [--seed <n>]
            [--timeoutMs <ms>] [--maxConcurrency <n>] [--report <path>] [--redactApiKey]
            [--yes] [--logLevel <level>]

Submits one request per address to <domain>/api/request_processing_location,
then polls <domain>/api/get_features until each result is ready.

Options:
  --shuffle, -s             Shuffle addresses before applying --limit
  --limit, -l               Keep at most this many addresses (default: 0 = all)
  --stagger, --sleep, -S    Seconds between successive starts (default: 0)
  --deviation, -d           When set, the stagger is normally distributed with this stddev
  --seed                    Seed the random source (shuffle, stagger, poll waits)

Reliability:
  --timeoutMs               Per-request timeout in ms (default: ${DEFAULT_TIMEOUT_MS})
  --maxConcurrency          Max flows in flight (default: 0 = all at once)

Output:
  --report                  Report path (default: pollstorm-report-<timestamp>.json)
  --redactApiKey            Replace the API key in the report
  --logLevel                debug | info | warn | error (default: info)

  --yes, -y                 Do not ask for confirmation
  --help, -h                Show this help

Exit codes:
  0    all flows succeeded
  1    runtime error
  2    bad arguments / usage
  3    some flows failed
  123  aborted at schedule confirmation
  124  aborted, report file not writable

Examples:
  pollstorm https://api.example.test test-key addresses.txt
  pollstorm --limit 100 --stagger 0.01 --shuffle https://api.example.test test-key addresses.txt
  pollstorm --limit 100 --stagger 0.015 --deviation 0.04 --shuffle https://api.example.test test-key addresses.txt
`.trim();

const FLAG = {
  shuffle: ["--shuffle", "-s"],
  limit: ["--limit", "-l"],
  stagger: ["--stagger", "--sleep", "-S"],
  deviation: ["--deviation", "-d"],
  seed: ["--seed"],
  timeoutMs: ["--timeoutMs"],
  maxConcurrency: ["--maxConcurrency"],
  report: ["--report"],
  redactApiKey: ["--redactApiKey"],
  yes: ["--yes", "-y"],
  logLevel: ["--logLevel"],
  help: ["--help", "-h"],
} as const;

const VALUE_FLAGS = new Set<string>([
  ...FLAG.limit,
  ...FLAG.stagger,
  ...FLAG.deviation,
  ...FLAG.seed,
  ...FLAG.timeoutMs,
  ...FLAG.maxConcurrency,
  ...FLAG.report,
  ...FLAG.logLevel,
]);

const ALLOWED = new Set<string>(Object.values(FLAG).flat());

export function wantsHelp(argv: string[]): boolean {
  return makeArgvHelpers(argv).hasFlag(...FLAG.help);
}

export function parseRunnerConfig(argv: string[], opts: { cwd: string; now: Date }): RunnerConfig {
  const h = makeArgvHelpers(argv);

  h.assertNoUnknownOptions(ALLOWED, HELP_TEXT);
  for (const names of [
    FLAG.limit,
    FLAG.stagger,
    FLAG.deviation,
    FLAG.seed,
    FLAG.timeoutMs,
    FLAG.maxConcurrency,
    FLAG.report,
    FLAG.logLevel,
  ]) {
    h.assertHasValue([...names], HELP_TEXT);
  }

  const pos = h.positionals(VALUE_FLAGS);
  if (pos.length !== 3) {
    throw new CliUsageError(`Expected <domain> <api_key> <addresses-file>, got ${pos.length} argument(s)\n\n${HELP_TEXT}`);
  }
  const [domain = "", apiKey = "", addressesFile = ""] = pos;

  const limit = h.parseIntFlag([...FLAG.limit], 0, HELP_TEXT);
  if (limit < 0) throw new CliUsageError(`--limit must be >= 0\n\n${HELP_TEXT}`);

  const stagger_s = h.parseFloatFlag([...FLAG.stagger], 0, HELP_TEXT) ?? 0;
  if (stagger_s < 0) throw new CliUsageError(`--stagger must be >= 0\n\n${HELP_TEXT}`);

  const deviation_s = h.parseFloatFlag([...FLAG.deviation], null, HELP_TEXT);
  if (deviation_s !== null && deviation_s < 0) throw new CliUsageError(`--deviation must be >= 0\n\n${HELP_TEXT}`);

  const seedRaw = h.getArg(...FLAG.seed);
  const seed = seedRaw === null ? null : h.parseIntFlag([...FLAG.seed], 0, HELP_TEXT);

  const maxConcurrency = h.parseIntFlag([...FLAG.maxConcurrency], 0, HELP_TEXT);
  if (maxConcurrency < 0) throw new CliUsageError(`--maxConcurrency must be >= 0\n\n${HELP_TEXT}`);

  const logLevel = h.getArg(...FLAG.logLevel) ?? "info";
  if (!isLogLevel(logLevel)) throw new CliUsageError(`Invalid --logLevel: ${logLevel}\n\n${HELP_TEXT}`);

  const reportArg = h.getArg(...FLAG.report);

  return {
    domain: normalizeDomain(domain),
    apiKey,
    addressesPath: path.resolve(opts.cwd, addressesFile),

    shuffle: h.hasFlag(...FLAG.shuffle),
    limit,
    stagger_s,
    deviation_s,
    seed,

    timeoutMs: h.parseIntFlag([...FLAG.timeoutMs], DEFAULT_TIMEOUT_MS, HELP_TEXT),
    maxConcurrency,

    reportPath: path.resolve(opts.cwd, reportArg ?? defaultReportPath(opts.now)),
    redactApiKey: h.hasFlag(...FLAG.redactApiKey),
    assumeYes: h.hasFlag(...FLAG.yes),
    logLevel,
  };
}
