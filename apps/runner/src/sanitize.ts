// apps/runner/src/sanitize.ts
//
// Secret redaction for report artifacts.

export const REDACTED_API_KEY = "[redacted_api_key]";

function maskString(input: string, secret: string, marker: string): string {
  if (!secret) return input;
  return input.split(secret).join(marker);
}

/** Replaces every occurrence of `secret` inside strings, recursively. */
export function redactSecret<T>(value: T, secret: string, marker?: string): T;
export function redactSecret(value: unknown, secret: string, marker = REDACTED_API_KEY): unknown {
  if (!secret) return value;
  if (typeof value === "string") return maskString(value, secret, marker);
  if (Array.isArray(value)) return value.map((v) => redactSecret(v, secret, marker));
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = redactSecret(v, secret, marker);
    }
    return out;
  }
  return value;
}
