export class CliUsageError extends Error {
  public readonly exitCode = 2;
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function normalizeArgv(argv: string[]): string[] {
  const out: string[] = [];
  for (const a of argv) {
    if (a.startsWith("--") && a.includes("=")) {
      const idx = a.indexOf("=");
      const key = a.slice(0, idx);
      const val = a.slice(idx + 1);
      out.push(key);
      if (val.length) out.push(val);
    } else {
      out.push(a);
    }
  }
  return out;
}

function isOptionToken(v: string): boolean {
  // "-1.5" is a value, "-s" is a flag
  return v.startsWith("-") && !/^-\d/.test(v);
}

export function makeArgvHelpers(argv: string[]) {
  const ARGV = normalizeArgv(argv);

  function indexOfAny(names: string[]): { name: string; idx: number } | null {
    for (const name of names) {
      const idx = ARGV.indexOf(name, 2);
      if (idx !== -1) return { name, idx };
    }
    return null;
  }

  function hasFlag(...names: string[]): boolean {
    return indexOfAny(names) !== null;
  }

  /** Value following the first of `names` present in argv. */
  function getArg(...names: string[]): string | null {
    const hit = indexOfAny(names);
    if (!hit) return null;
    const v = ARGV[hit.idx + 1];
    if (!v || isOptionToken(v)) return null;
    return v;
  }

  function assertNoUnknownOptions(allowed: Set<string>, helpText: string): void {
    const args = ARGV.slice(2);
    for (const a of args) {
      if (isOptionToken(a) && !allowed.has(a)) {
        throw new CliUsageError(`Unknown option: ${a}\n\n${helpText}`);
      }
    }
  }

  function assertHasValue(names: string[], helpText: string): void {
    const hit = indexOfAny(names);
    if (!hit) return;
    const next = ARGV[hit.idx + 1];
    if (!next || isOptionToken(next)) {
      throw new CliUsageError(`Missing value for ${hit.name}\n\n${helpText}`);
    }
  }

  function parseIntFlag(names: string[], fallback: number, helpText: string): number {
    const raw = getArg(...names);
    if (!raw) return fallback;
    const n = Number.parseInt(raw, 10);
    if (!Number.isFinite(n) || String(n) !== raw.trim()) {
      throw new CliUsageError(`Invalid integer for ${names[0] ?? "option"}: ${raw}\n\n${helpText}`);
    }
    return n;
  }

  function parseFloatFlag(names: string[], fallback: number | null, helpText: string): number | null {
    const raw = getArg(...names);
    if (!raw) return fallback;
    const n = Number(raw);
    if (!Number.isFinite(n)) {
      throw new CliUsageError(`Invalid number for ${names[0] ?? "option"}: ${raw}\n\n${helpText}`);
    }
    return n;
  }

  /** Bare arguments after the script path, skipping the values of `valueFlags`. */
  function positionals(valueFlags: Set<string>): string[] {
    const out: string[] = [];
    const args = ARGV.slice(2);
    for (let i = 0; i < args.length; i++) {
      const a = args[i];
      if (a === undefined) continue;
      if (isOptionToken(a)) {
        if (valueFlags.has(a)) i += 1;
        continue;
      }
      out.push(a);
    }
    return out;
  }

  return {
    ARGV,
    hasFlag,
    getArg,
    assertNoUnknownOptions,
    assertHasValue,
    parseIntFlag,
    parseFloatFlag,
    positionals,
  };
}
