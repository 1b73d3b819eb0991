import { parseArgs } from "node:util";

import type { NavigationLogger } from "@corridor-guide/nav-core";

import { loadConfigFile } from "./configFile";
import { formatTranscriptLine } from "./recordingSpeechSink";
import { runReplay } from "./replay";
import { loadTrace } from "./trace";

const USAGE = "Usage: corridor-replay <trace.json> [--config <file>] [--json] [--verbose]";

// Diagnostics go to stderr so the transcript on stdout stays clean.
function createLogger(verbose: boolean): NavigationLogger {
  return {
    debug: (...args: unknown[]) => {
      if (verbose) console.error(...args);
    },
    info: (...args: unknown[]) => {
      if (verbose) console.error(...args);
    },
    warn: (...args: unknown[]) => console.error(...args),
    error: (...args: unknown[]) => console.error(...args)
  };
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: "string" },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false }
    }
  });

  const [tracePath] = positionals;
  if (values.help || !tracePath) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  const logger = createLogger(values.verbose === true);
  const trace = await loadTrace(tracePath);
  const config = values.config ? await loadConfigFile(values.config) : undefined;
  const result = runReplay(trace, config ? { config, logger } : { logger });

  if (values.json) {
    console.log(JSON.stringify(result, null, 2));
    return 0;
  }

  for (const line of result.transcript) {
    console.log(formatTranscriptLine(line));
  }
  console.log(`Final state: ${result.final.navigationState}`);
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[Replay] Failed:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
