// apps/runner/src/confirm.ts
//
// y/n gates before the run starts.

import { createInterface } from "node:readline/promises";

export type Ask = (question: string) => Promise<string>;

export function terminalAsk(): { ask: Ask; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return { ask: (q) => rl.question(q), close: () => rl.close() };
}

/** Repeats the question until the answer starts with y or n. */
export async function confirm(ask: Ask, question: string): Promise<boolean> {
  for (;;) {
    const answer = (await ask(question)).trim().toLowerCase();
    if (answer.startsWith("y")) return true;
    if (answer.startsWith("n")) return false;
  }
}
