// apps/runner/src/addresses.ts

import { readFile } from "node:fs/promises";

/** One address per line; surrounding quotes and line terminators are stripped, blank lines skipped. */
export function parseAddresses(raw: string): string[] {
  return raw
    .split("\n")
    .map((line) => line.replace(/^["\r\n]+|["\r\n]+$/g, ""))
    .filter((line) => line.length > 0);
}

export async function loadAddresses(filePath: string): Promise<string[]> {
  return parseAddresses(await readFile(filePath, "utf-8"));
}
