import { describe, it, expect } from "vitest";
import { CliUsageError } from "cli-utils";
import { parseRunnerConfig, wantsHelp } from "./config";

const opts = { cwd: "/work", now: new Date("2024-05-01T10:20:30.000Z") };
const argv = (...args: string[]) => ["node", "pollstorm", ...args];

describe("parseRunnerConfig", () => {
  it("applies defaults for the bare positional form", () => {
    expect(parseRunnerConfig(argv("https://svc.test/", "test-key", "addr.txt"), opts)).toEqual({
      domain: "https://svc.test",
      apiKey: "test-key",
      addressesPath: "/work/addr.txt",
      shuffle: false,
      limit: 0,
      stagger_s: 0,
      deviation_s: null,
      seed: null,
      timeoutMs: 300000,
      maxConcurrency: 0,
      reportPath: "/work/pollstorm-report-2024-05-01T10-20-30.000Z.json",
      redactApiKey: false,
      assumeYes: false,
      logLevel: "info",
    });
  });

  it("reads short, long and --flag=value options around positionals", () => {
    const cfg = parseRunnerConfig(
      argv(
        "--limit",
        "100",
        "https://svc.test",
        "-s",
        "test-key",
        "-S",
        "0.015",
        "addr.txt",
        "-d",
        "0.04",
        "--seed=7",
        "-y",
        "--report",
        "out.json",
        "--logLevel",
        "debug",
        "--maxConcurrency",
        "8",
        "--redactApiKey"
      ),
      opts
    );

    expect(cfg).toMatchObject({
      domain: "https://svc.test",
      apiKey: "test-key",
      addressesPath: "/work/addr.txt",
      shuffle: true,
      limit: 100,
      stagger_s: 0.015,
      deviation_s: 0.04,
      seed: 7,
      assumeYes: true,
      reportPath: "/work/out.json",
      logLevel: "debug",
      maxConcurrency: 8,
      redactApiKey: true,
    });
  });

  it("accepts --sleep as a stagger alias", () => {
    expect(parseRunnerConfig(argv("--sleep", "0.5", "d", "k", "f"), opts).stagger_s).toBe(0.5);
  });

  it("rejects unknown options", () => {
    expect(() => parseRunnerConfig(argv("--bogus", "d", "k", "f"), opts)).toThrow("Unknown option: --bogus");
  });

  it("requires exactly three positionals", () => {
    expect(() => parseRunnerConfig(argv("d", "k"), opts)).toThrow(CliUsageError);
    expect(() => parseRunnerConfig(argv("d", "k", "f", "extra"), opts)).toThrow(
      "Expected <domain> <api_key> <addresses-file>, got 4 argument(s)"
    );
  });

  it("validates values", () => {
    expect(() => parseRunnerConfig(argv("d", "k", "f", "--limit", "abc"), opts)).toThrow("Invalid integer for --limit: abc");
    expect(() => parseRunnerConfig(argv("d", "k", "f", "--stagger", "-1"), opts)).toThrow("--stagger must be >= 0");
    expect(() => parseRunnerConfig(argv("d", "k", "f", "--deviation", "x"), opts)).toThrow("Invalid number for --deviation: x");
    expect(() => parseRunnerConfig(argv("d", "k", "f", "--logLevel", "loud"), opts)).toThrow("Invalid --logLevel: loud");
    expect(() => parseRunnerConfig(argv("d", "k", "f", "--limit"), opts)).toThrow("Missing value for --limit");
  });

  it("usage errors exit with code 2", () => {
    try {
      parseRunnerConfig(argv(), opts);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CliUsageError);
      expect(e instanceof CliUsageError ? e.exitCode : null).toBe(2);
    }
  });
});

describe("wantsHelp", () => {
  it("detects -h and --help", () => {
    expect(wantsHelp(argv("-h"))).toBe(true);
    expect(wantsHelp(argv("--help"))).toBe(true);
    expect(wantsHelp(argv("d", "k", "f"))).toBe(false);
  });
});
