// apps/runner/src/index.ts
import { HELP_TEXT, parseRunnerConfig, wantsHelp } from "./config";
import { terminalAsk } from "./confirm";
import { defaultIO, runPollstorm } from "./runner";

async function main(): Promise<number> {
  if (wantsHelp(process.argv)) {
    console.log(HELP_TEXT);
    return 0;
  }

  const cfg = parseRunnerConfig(process.argv, { cwd: process.env.INIT_CWD ?? process.cwd(), now: new Date() });

  const term = terminalAsk();
  try {
    const { exitCode } = await runPollstorm(cfg, defaultIO(term.ask));
    return exitCode;
  } finally {
    term.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    if (err && typeof err === "object" && "exitCode" in err && typeof err.exitCode === "number") {
      const note = err instanceof Error ? err.message : String(err);
      console.error(note);
      process.exit(err.exitCode);
    }

    console.error(String(err instanceof Error ? err.stack : err));
    process.exit(1);
  });
