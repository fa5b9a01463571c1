import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { test } from "node:test";
import * as XLSX from "xlsx";
import { LoadError, SchemaError } from "../src/domain/errors";
import {
  buildSheets,
  buildSnapshot,
  exportWorkbook,
  readSnapshot,
  writeSnapshot,
} from "../src/services/export.service";
import { runEngagementPipeline } from "../src/workflows/engagement/orchestrator";
import { makeTmpDir, noopLogger, writeCsv } from "./helpers/fixtures";

function sampleRun(dir: string) {
  return runEngagementPipeline({
    sources: {
      activity: writeCsv(dir, "ACTIVITY_LOG.csv", [
        "user_id,component_code,action,timestamp,page",
        "1,Quiz,attempt,2024-01-05 09:10:00,quiz-1",
        "1,Forum,post,2024-02-01 10:00:00,forum-1",
        "2,Quiz,attempt,2024-01-06 11:00:00,quiz-1",
        "3,Wiki,view,2024-01-07 12:00:00,wiki-1",
      ]),
      userLog: writeCsv(dir, "USER_LOG.csv", ["user_id,timestamp", "1,2024-01-05 09:00:00", "2,2024-01-06"]),
      componentCodes: writeCsv(dir, "COMPONENT_CODES.csv", ["component_code,component_name", "Quiz,Quizzes", "Forum,Forums"]),
    },
    settings: { granularity: "month", columnMappings: {}, excludedComponents: [] },
    logger: noopLogger,
  }).run;
}

test("buildSheets lays out one sheet per stage plus counts and diagnostics", (t) => {
  const sheets = buildSheets(sampleRun(makeTmpDir(t)));

  assert.deepEqual(
    sheets.map((s) => s.name),
    ["Processed", "Merged", "Reshaped", "Summary", "Interactions", "Diagnostics"]
  );
  const [processed, mergedSheet, reshaped, summary, , diagnostics] = sheets;
  assert.deepEqual(processed.header, ["user_id", "component_code", "action", "timestamp", "page"]);
  assert.equal(processed.rows.length, 4);
  assert.equal(mergedSheet.rows.length, 3);
  assert.deepEqual(reshaped.header, ["user_id", "bucket", "Forums", "Quizzes", "total"]);
  assert.deepEqual(reshaped.rows[0], { user_id: "1", bucket: "2024-01", Forums: 0, Quizzes: 1, total: 1 });
  assert.deepEqual(summary.rows[0], { user_id: "1", total: 2, active_buckets: 2, Forums: 1, Quizzes: 1 });
  assert.deepEqual(
    diagnostics.rows.find((r) => r.metric === "merge.unmatchedComponent"),
    { metric: "merge.unmatchedComponent", value: 1 }
  );
});

test("exportWorkbook writes a readable xlsx file", (t) => {
  const dir = makeTmpDir(t);
  const run = sampleRun(dir);
  const file = path.join(dir, "out", "engagement.xlsx");

  assert.equal(exportWorkbook(run, file, { logger: noopLogger }), file);

  const workbook = XLSX.readFile(file);
  assert.deepEqual(workbook.SheetNames, ["Processed", "Merged", "Reshaped", "Summary", "Interactions", "Diagnostics"]);
  const reshaped = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets["Reshaped"]);
  assert.deepEqual(reshaped, [
    { user_id: "1", bucket: "2024-01", Forums: 0, Quizzes: 1, total: 1 },
    { user_id: "1", bucket: "2024-02", Forums: 1, Quizzes: 0, total: 1 },
    { user_id: "2", bucket: "2024-01", Forums: 0, Quizzes: 1, total: 1 },
  ]);
});

test("writeSnapshot stores settings, statistics and stage tables as JSON", (t) => {
  const dir = makeTmpDir(t);
  const run = sampleRun(dir);
  const file = path.join(dir, "processed_data.json");

  writeSnapshot(run, file, { logger: noopLogger, now: () => new Date("2024-03-01T00:00:00.000Z") });

  const snapshot = JSON.parse(fs.readFileSync(file, "utf8"));
  assert.equal(snapshot.metadata.processedAt, "2024-03-01T00:00:00.000Z");
  assert.equal(snapshot.metadata.granularity, "month");
  assert.deepEqual(snapshot.metadata.mergeDiagnostics, {
    activityRows: 4,
    unmatchedUser: 1,
    unmatchedComponent: 1,
    excludedComponent: 0,
    merged: 3,
  });
  assert.equal(snapshot.data.processed.length, 4);
  assert.equal(snapshot.data.reshaped.rows.length, 3);
  assert.equal(snapshot.data.summary.grandTotal, 3);
});

test("a component named like a fixed sheet column fails with SchemaError", (t) => {
  const dir = makeTmpDir(t);
  const { run } = runEngagementPipeline({
    sources: {
      activity: writeCsv(dir, "ACTIVITY_LOG.csv", [
        "user_id,component_code,action,timestamp",
        "1,Quiz,attempt,2024-01-05",
        "1,Quiz,attempt,2024-01-06",
        "1,Forum,post,2024-01-07",
      ]),
      userLog: writeCsv(dir, "USER_LOG.csv", ["user_id,timestamp", "1,2024-01-05"]),
      componentCodes: writeCsv(dir, "COMPONENT_CODES.csv", ["component_code,component_name", "Quiz,total", "Forum,user_id"]),
    },
    settings: { granularity: "month", columnMappings: {}, excludedComponents: [] },
    logger: noopLogger,
  });
  assert.deepEqual(run.reshaped.rows, [{ userId: "1", bucket: "2024-01", counts: { total: 2, user_id: 1 }, total: 3 }]);

  assert.throws(
    () => buildSheets(run),
    (err: unknown) => err instanceof SchemaError && err.column === "total" && err.stage === "export"
  );
  const file = path.join(dir, "engagement.xlsx");
  assert.throws(() => exportWorkbook(run, file, { logger: noopLogger }), SchemaError);
  assert.equal(fs.existsSync(file), false);
});

test("readSnapshot returns every dataset writeSnapshot stored", (t) => {
  const dir = makeTmpDir(t);
  const run = sampleRun(dir);
  const file = path.join(dir, "processed_data.json");
  const processedAt = new Date("2024-03-01T00:00:00.000Z");

  writeSnapshot(run, file, { logger: noopLogger, now: () => processedAt });
  const snapshot = readSnapshot(file, { logger: noopLogger });

  assert.deepEqual(snapshot, buildSnapshot(run, processedAt));
  assert.deepEqual(snapshot.data.userLog, [
    { userId: "1", sessionStart: "2024-01-05T09:00:00.000Z" },
    { userId: "2", sessionStart: "2024-01-06T00:00:00.000Z" },
  ]);
  assert.deepEqual(
    snapshot.data.componentCodes.map((c) => c.componentName),
    ["Quizzes", "Forums"]
  );
});

test("readSnapshot rejects missing, unparseable and malformed files with LoadError", (t) => {
  const dir = makeTmpDir(t);

  const absent = path.join(dir, "absent.json");
  assert.throws(() => readSnapshot(absent, { logger: noopLogger }), /Cannot load .*absent\.json: file not found/);

  const broken = path.join(dir, "broken.json");
  fs.writeFileSync(broken, "{ metadata: ", "utf8");
  assert.throws(() => readSnapshot(broken, { logger: noopLogger }), LoadError);

  const partial = path.join(dir, "partial.json");
  fs.writeFileSync(partial, JSON.stringify({ metadata: {} }), "utf8");
  assert.throws(
    () => readSnapshot(partial, { logger: noopLogger }),
    (err: unknown) =>
      err instanceof LoadError &&
      err.path === partial &&
      /snapshot field "metadata\.processedAt" is invalid/.test(err.message)
  );
});
