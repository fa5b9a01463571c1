import fs from "fs";
import path from "path";
import { logger as defaultLogger, Logger } from "../config/logger";
import { SnapshotSchema } from "../adapters/snapshot.adapter";
import { LoadError, PipelineError, SchemaError, errorMessage } from "../domain/errors";
import { CanonicalColumn, PivotColumn, tableNames } from "../domain/mapping";
import { ActivityRecord, EngagementSnapshot, MergeDiagnostics, MergedRecord, PipelineRun } from "../domain/types";
import { CellValue, SheetSpec, writeWorkbook } from "../integrations/workbook/workbook.writer";

export const SheetName = {
  processed: "Processed",
  merged: "Merged",
  reshaped: "Reshaped",
  summary: "Summary",
  interactions: "Interactions",
  diagnostics: "Diagnostics",
} as const;

export interface ExportOptions {
  logger?: Logger;
  now?: () => Date;
}

type SheetRow = Record<string, CellValue>;

const mergeMetrics = [
  "activityRows",
  "unmatchedUser",
  "unmatchedComponent",
  "excludedComponent",
  "merged",
] as const satisfies readonly (keyof MergeDiagnostics)[];

const pivotColumns = new Set<string>(Object.values(PivotColumn));

function assertComponentColumns(components: readonly string[]): void {
  for (const name of components) {
    if (pivotColumns.has(name)) {
      throw new SchemaError(name, "component name collides with a fixed Reshaped/Summary column", "export");
    }
  }
}

function contextColumns(records: readonly ActivityRecord[]): string[] {
  const seen = new Set<string>();
  for (const r of records) for (const key of Object.keys(r.context)) seen.add(key);
  return [...seen];
}

function activityRow(r: ActivityRecord): SheetRow {
  return {
    [CanonicalColumn.userId]: r.userId,
    [CanonicalColumn.componentCode]: r.componentCode,
    [CanonicalColumn.action]: r.action,
    [CanonicalColumn.timestamp]: r.timestamp,
    ...r.context,
  };
}

function mergedRow(r: MergedRecord): SheetRow {
  return {
    ...activityRow(r),
    [CanonicalColumn.componentName]: r.componentName,
    [CanonicalColumn.category]: r.category,
    session_start: r.sessionStart,
    [CanonicalColumn.sessionEnd]: r.sessionEnd ?? "",
  };
}

/** One sheet per stage output, plus long-form counts and diagnostics. */
export function buildSheets(run: PipelineRun): SheetSpec[] {
  const { cleaned, merged, reshaped, interactions, summary } = run;
  assertComponentColumns(reshaped.components);
  const base = [CanonicalColumn.userId, CanonicalColumn.componentCode, CanonicalColumn.action, CanonicalColumn.timestamp];
  const context = contextColumns(cleaned.activity);

  const diagnostics: SheetRow[] = [];
  for (const table of tableNames) {
    diagnostics.push({ metric: `${table}.originalRows`, value: cleaned.stats[table].originalRows });
    diagnostics.push({ metric: `${table}.removedRows`, value: cleaned.stats[table].removedRows });
  }
  for (const metric of mergeMetrics) {
    diagnostics.push({ metric: `merge.${metric}`, value: merged.diagnostics[metric] });
  }

  return [
    {
      name: SheetName.processed,
      header: [...base, ...context],
      rows: cleaned.activity.map(activityRow),
    },
    {
      name: SheetName.merged,
      header: [
        ...base,
        ...context,
        CanonicalColumn.componentName,
        CanonicalColumn.category,
        "session_start",
        CanonicalColumn.sessionEnd,
      ],
      rows: merged.records.map(mergedRow),
    },
    {
      name: SheetName.reshaped,
      header: [PivotColumn.userId, PivotColumn.bucket, ...reshaped.components, PivotColumn.total],
      rows: reshaped.rows.map((r) => ({
        [PivotColumn.userId]: r.userId,
        [PivotColumn.bucket]: r.bucket,
        ...r.counts,
        [PivotColumn.total]: r.total,
      })),
    },
    {
      name: SheetName.summary,
      header: [PivotColumn.userId, PivotColumn.total, PivotColumn.activeBuckets, ...reshaped.components],
      rows: summary.users.map((u) => ({
        [PivotColumn.userId]: u.userId,
        [PivotColumn.total]: u.total,
        [PivotColumn.activeBuckets]: u.activeBuckets,
        ...u.byComponent,
      })),
    },
    {
      name: SheetName.interactions,
      header: ["user_id", "component_name", "bucket", "count"],
      rows: interactions.map((i) => ({
        user_id: i.userId,
        component_name: i.componentName,
        bucket: i.bucket,
        count: i.count,
      })),
    },
    { name: SheetName.diagnostics, header: ["metric", "value"], rows: diagnostics },
  ];
}

export function exportWorkbook(run: PipelineRun, filePath: string, options: ExportOptions = {}): string {
  const { logger = defaultLogger } = options;
  const sheets = buildSheets(run);
  try {
    writeWorkbook(filePath, sheets);
  } catch (err) {
    throw new PipelineError("export", `Cannot write workbook ${filePath}: ${errorMessage(err)}`);
  }
  logger.info("export:workbook", { path: filePath, sheets: sheets.map((s) => s.name) });
  return filePath;
}

/** JSON backup of a run: settings and stats as metadata, stage tables as data. */
export function buildSnapshot(run: PipelineRun, processedAt: Date): EngagementSnapshot {
  return {
    metadata: {
      processedAt: processedAt.toISOString(),
      sources: run.sources,
      granularity: run.settings.granularity,
      columnMappings: run.settings.columnMappings,
      excludedComponents: run.cleaned.excludedCodes,
      fileStatistics: run.cleaned.stats,
      mergeDiagnostics: run.merged.diagnostics,
    },
    data: {
      processed: run.cleaned.activity,
      userLog: run.cleaned.userLog,
      componentCodes: run.cleaned.componentCodes,
      merged: run.merged.records,
      reshaped: run.reshaped,
      summary: run.summary,
    },
  };
}

export function writeSnapshot(run: PipelineRun, filePath: string, options: ExportOptions = {}): string {
  const { logger = defaultLogger, now = () => new Date() } = options;
  const snapshot = buildSnapshot(run, now());
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(snapshot, null, 2) + "\n", "utf8");
  } catch (err) {
    throw new PipelineError("export", `Cannot write snapshot ${filePath}: ${errorMessage(err)}`);
  }
  logger.info("export:snapshot", { path: filePath });
  return filePath;
}

/** Reads a snapshot written by writeSnapshot; anything that does not validate is a LoadError. */
export function readSnapshot(filePath: string, options: Pick<ExportOptions, "logger"> = {}): EngagementSnapshot {
  const { logger = defaultLogger } = options;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") throw new LoadError(filePath, "file not found");
    throw new LoadError(filePath, `snapshot is not readable JSON (${errorMessage(err)})`);
  }

  const parsed = SnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new LoadError(filePath, `snapshot field "${issue.path.join(".")}" is invalid: ${issue.message}`);
  }
  logger.info("export:snapshot-read", { path: filePath, processedAt: parsed.data.metadata.processedAt });
  return parsed.data;
}
