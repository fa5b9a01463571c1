import { loadConfig } from "../../config/config";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { PipelineRun, PipelineSettings, SourcePaths } from "../../domain/types";
import { aggregate } from "../../services/aggregate.service";
import { clean } from "../../services/clean.service";
import { exportWorkbook, writeSnapshot } from "../../services/export.service";
import { load } from "../../services/load.service";
import { merge } from "../../services/merge.service";
import { countInteractions, reshape } from "../../services/reshape.service";

export interface EngagementPipelineOptions {
  sources: SourcePaths;
  // Falls back to the pipeline config file for anything not given
  settings?: Partial<PipelineSettings>;
  workbookPath?: string;
  snapshotPath?: string;
  logger?: Logger;
}

export interface EngagementPipelineResult {
  run: PipelineRun;
  workbookPath?: string;
  snapshotPath?: string;
}

function resolveSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  const needsFile =
    overrides.granularity === undefined ||
    overrides.columnMappings === undefined ||
    overrides.excludedComponents === undefined;
  const base = needsFile ? loadConfig().pipeline : undefined;
  return {
    granularity: overrides.granularity ?? base?.granularity ?? "month",
    columnMappings: overrides.columnMappings ?? base?.columnMappings ?? {},
    excludedComponents: overrides.excludedComponents ?? base?.excludedComponents ?? [],
  };
}

/** Runs load -> clean -> merge -> reshape -> aggregate, then the optional exports. */
export function runEngagementPipeline(options: EngagementPipelineOptions): EngagementPipelineResult {
  const { sources, logger = defaultLogger } = options;
  const settings = resolveSettings(options.settings);
  logger.debug("pipeline:start", { sources, granularity: settings.granularity });

  const tables = load(sources, { columnMappings: settings.columnMappings, logger });
  const cleaned = clean(tables, {
    columnMappings: settings.columnMappings,
    excludedComponents: settings.excludedComponents,
    logger,
  });
  const merged = merge(cleaned, { logger });
  const reshaped = reshape(merged.records, { granularity: settings.granularity, logger });
  const interactions = countInteractions(merged.records, { granularity: settings.granularity });
  const summary = aggregate(reshaped, { logger });

  const run: PipelineRun = { sources, settings, cleaned, merged, reshaped, interactions, summary };
  const result: EngagementPipelineResult = { run };
  if (options.workbookPath) result.workbookPath = exportWorkbook(run, options.workbookPath, { logger });
  if (options.snapshotPath) result.snapshotPath = writeSnapshot(run, options.snapshotPath, { logger });

  logger.info("pipeline:done", {
    merged: merged.diagnostics.merged,
    rows: reshaped.rows.length,
    users: summary.users.length,
    grandTotal: summary.grandTotal,
  });
  return result;
}

export default runEngagementPipeline;
