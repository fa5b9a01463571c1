/*
  Sample data harness
  - Runs the bundled sample exports (or another directory) through every stage
  - Verbose console logging for inspection; prints the reshaped table
  Usage:
    npm run harness:sample
    npm run harness:sample -- --dir exports/2024-spring --granularity week
*/

import path from "path";
import { createLogger, parseLogLevel } from "../../src/config/logger";
import { defaultSourceFiles } from "../../src/domain/mapping";
import { isTimeGranularity } from "../../src/domain/time";
import { TimeGranularity } from "../../src/domain/types";
import { runEngagementPipeline } from "../../src/workflows/engagement/orchestrator";

interface Args {
  dir?: string;
  granularity?: TimeGranularity;
}

function parseArgs(): Args {
  const out: Args = {};
  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--dir") out.dir = argv[++i];
    else if (a === "--granularity") {
      const g = argv[++i] ?? "";
      if (isTimeGranularity(g)) out.granularity = g;
      else console.log(`[harness] ignoring unknown granularity "${g}"`);
    }
  }
  return out;
}

function run() {
  const args = parseArgs();
  // Default to very verbose logging for harness runs unless user overrides
  const logger = createLogger(parseLogLevel(process.env.LOG_LEVEL, "debug"));
  const dir = path.resolve(args.dir ?? "data/sample");
  console.log(`[harness] reading exports from: ${dir}`);

  const { run: result } = runEngagementPipeline({
    sources: {
      activity: path.join(dir, defaultSourceFiles.activity),
      userLog: path.join(dir, defaultSourceFiles.userLog),
      componentCodes: path.join(dir, defaultSourceFiles.componentCodes),
    },
    settings: args.granularity ? { granularity: args.granularity } : undefined,
    logger,
  });

  const { components, rows } = result.reshaped;
  console.log(["user_id", "bucket", ...components, "total"].join("\t"));
  for (const row of rows) {
    console.log([row.userId, row.bucket, ...components.map((c) => row.counts[c]), row.total].join("\t"));
  }
  console.log(`[harness] done. diagnostics=${JSON.stringify(result.merged.diagnostics)}`);
}

try {
  run();
} catch (e) {
  console.error("[harness] fatal:", e);
  process.exitCode = 1;
}
