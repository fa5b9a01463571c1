import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { TestContext } from "node:test";
import type { Logger } from "../../src/config/logger";
import type { ActivityRecord, ComponentCode, MergedRecord, Table, TableName, UserLogEntry } from "../../src/domain/types";

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export const repoRoot = path.join(__dirname, "..", "..");

/** Fresh temp directory, removed when the calling test finishes. */
export function makeTmpDir(t: TestContext): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "engagement-etl-"));
  t.after(() => fs.rmSync(dir, { recursive: true, force: true }));
  return dir;
}

export function writeCsv(dir: string, name: string, lines: string[]): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, lines.join("\n") + "\n", "utf8");
  return filePath;
}

export function table(name: TableName, columns: string[], rows: string[][]): Table {
  return {
    name,
    source: `${name}.csv`,
    columns,
    rows: rows.map((cells) => Object.fromEntries(columns.map((c, i) => [c, cells[i] ?? ""]))),
  };
}

export function activity(userId: string, componentCode: string, timestamp: string, action = "viewed"): ActivityRecord {
  return { userId, componentCode, action, timestamp, context: {} };
}

export function session(userId: string, sessionStart: string, sessionEnd?: string): UserLogEntry {
  return sessionEnd === undefined ? { userId, sessionStart } : { userId, sessionStart, sessionEnd };
}

export function componentCode(code: string, isExcluded = false, category = "Course"): ComponentCode {
  return { code, componentName: code, category, isExcluded };
}

export function merged(userId: string, componentName: string, timestamp: string): MergedRecord {
  return {
    ...activity(userId, componentName, timestamp),
    componentName,
    category: "Course",
    sessionStart: timestamp,
  };
}
