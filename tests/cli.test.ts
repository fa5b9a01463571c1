import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { test } from "node:test";
import { main, parseArgs } from "../src/workflows/engagement/entrypoints/cli";
import { makeTmpDir, noopLogger, repoRoot } from "./helpers/fixtures";

test("parseArgs reads paths, granularity and a bare --snapshot", () => {
  assert.deepEqual(parseArgs(["--activity", "a.csv", "--granularity", "week", "--snapshot"]), {
    activity: "a.csv",
    granularity: "week",
    snapshot: true,
  });
  assert.deepEqual(parseArgs(["--snapshot", "run.json", "--out", "run.xlsx"]), {
    snapshot: "run.json",
    out: "run.xlsx",
  });
});

test("parseArgs rejects unknown flags, granularities and missing values", () => {
  assert.throws(() => parseArgs(["--bogus"]), /unknown argument "--bogus"/);
  assert.throws(() => parseArgs(["--granularity", "hour"]), /unknown granularity "hour"/);
  assert.throws(() => parseArgs(["--out", "--snapshot"]), /--out needs a value/);
});

test("main writes the workbook for the given sources", (t) => {
  const dir = makeTmpDir(t);
  const sample = path.join(repoRoot, "data", "sample");
  const out = path.join(dir, "engagement.xlsx");
  process.env.PIPELINE_CONFIG = path.join(repoRoot, "config", "pipeline.json");

  main(
    [
      "--activity", path.join(sample, "ACTIVITY_LOG.csv"),
      "--users", path.join(sample, "USER_LOG.csv"),
      "--components", path.join(sample, "COMPONENT_CODES.csv"),
      "--out", out,
    ],
    noopLogger
  );

  assert.equal(fs.existsSync(out), true);
});
