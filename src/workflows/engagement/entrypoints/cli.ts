#!/usr/bin/env node
/*
  Runs the engagement pipeline over the three platform exports and writes
  the workbook (and optionally a JSON snapshot).
  Configuration (.env): DATA_DIR, OUTPUT_DIR, PIPELINE_CONFIG, TIME_BUCKET, LOG_LEVEL, LOG_DIR
  Usage:
    npm run pipeline -- --granularity week --snapshot
    npm run pipeline -- --activity exports/ACTIVITY_LOG.csv --out output/run.xlsx
*/

import path from "path";
import { loadConfig } from "../../../config/config";
import { createLogger, Logger } from "../../../config/logger";
import { errorMessage } from "../../../domain/errors";
import { defaultSourceFiles } from "../../../domain/mapping";
import { isTimeGranularity } from "../../../domain/time";
import { TimeGranularity } from "../../../domain/types";
import { runEngagementPipeline } from "../orchestrator";

export interface CliArgs {
  activity?: string;
  users?: string;
  components?: string;
  granularity?: TimeGranularity;
  out?: string;
  snapshot?: string | true;
  help?: boolean;
}

const USAGE = `Usage: engagement-etl [--activity FILE] [--users FILE] [--components FILE]
                      [--granularity day|week|month|year] [--out FILE.xlsx] [--snapshot [FILE.json]]`;

export function parseArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    const next = (): string => {
      const value = argv[++i];
      if (value === undefined || value.startsWith("--")) throw new Error(`${a} needs a value`);
      return value;
    };
    if (a === "--activity") out.activity = next();
    else if (a === "--users") out.users = next();
    else if (a === "--components") out.components = next();
    else if (a === "--out") out.out = next();
    else if (a === "--granularity") {
      const value = next();
      if (!isTimeGranularity(value)) throw new Error(`unknown granularity "${value}"`);
      out.granularity = value;
    } else if (a === "--snapshot") {
      const value = argv[i + 1];
      if (value !== undefined && !value.startsWith("--")) {
        out.snapshot = value;
        i++;
      } else {
        out.snapshot = true;
      }
    } else if (a === "--help" || a === "-h") out.help = true;
    else throw new Error(`unknown argument "${a}"`);
  }
  return out;
}

export function main(argv: readonly string[] = process.argv.slice(2), log?: Logger): void {
  const args = parseArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const cfg = loadConfig();
  const logger = log ?? createLogger(cfg.logLevel, { logDir: cfg.logDir });
  const stamp = new Date().toISOString().replace(/[:.]/g, "-");
  const inData = (file: string) => path.join(cfg.paths.dataDir, file);

  const snapshotPath =
    args.snapshot === true
      ? path.join(cfg.paths.outputDir, `processed_data_${stamp}.json`)
      : args.snapshot;

  const { run, workbookPath } = runEngagementPipeline({
    sources: {
      activity: args.activity ?? inData(defaultSourceFiles.activity),
      userLog: args.users ?? inData(defaultSourceFiles.userLog),
      componentCodes: args.components ?? inData(defaultSourceFiles.componentCodes),
    },
    settings: { ...cfg.pipeline, ...(args.granularity ? { granularity: args.granularity } : {}) },
    workbookPath: args.out ?? path.join(cfg.paths.outputDir, `engagement_${stamp}.xlsx`),
    snapshotPath,
    logger,
  });

  const d = run.merged.diagnostics;
  console.log(
    `Merged ${d.merged}/${d.activityRows} activity rows ` +
      `(unmatched user=${d.unmatchedUser} component=${d.unmatchedComponent} excluded=${d.excludedComponent}); ` +
      `${run.reshaped.rows.length} user/${run.reshaped.granularity} rows, ${run.summary.grandTotal} interactions.`
  );
  console.log(`Workbook: ${workbookPath}`);
  if (snapshotPath) console.log(`Snapshot: ${snapshotPath}`);
}

if (require.main === module) {
  try {
    main();
  } catch (err) {
    console.error("[engagement:cli] error:", errorMessage(err));
    process.exitCode = 1;
  }
}
