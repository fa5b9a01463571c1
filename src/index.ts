export { load, loadTable } from "./services/load.service";
export { clean, renameColumns, removeExcluded } from "./services/clean.service";
export { merge, joinUserLog, joinComponentCodes } from "./services/merge.service";
export { reshape, countInteractions } from "./services/reshape.service";
export { aggregate, describe } from "./services/aggregate.service";
export { exportWorkbook, writeSnapshot, readSnapshot, buildSheets, SheetName } from "./services/export.service";
export { runEngagementPipeline } from "./workflows/engagement/orchestrator";
export { loadConfig, loadPipelineSettings } from "./config/config";
export { createLogger, logger } from "./config/logger";
export type { Logger, LogLevel } from "./config/logger";
export * from "./domain/errors";
export * from "./domain/types";
export { CanonicalColumn, PivotColumn, defaultSourceFiles, requiredColumns } from "./domain/mapping";
