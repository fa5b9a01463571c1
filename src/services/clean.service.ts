import { logger as defaultLogger, Logger } from "../config/logger";
import { toActivityRecords, toComponentCodes, toUserLogEntries } from "../adapters/records.adapter";
import { SchemaError } from "../domain/errors";
import { normalizeKey } from "../domain/keys";
import { CanonicalColumn, ColumnMapping, resolveColumn } from "../domain/mapping";
import { CleanedDataset, CleanStats, LoadedTables, Table } from "../domain/types";

export interface CleanOptions {
  columnMappings?: ColumnMapping;
  excludedComponents?: readonly string[];
  logger?: Logger;
}

export interface FilterResult {
  table: Table;
  stats: CleanStats;
}

/**
 * Renames columns per the source -> canonical mapping. Two columns landing
 * on one name is a SchemaError, including a target that already exists and
 * is not itself renamed away.
 */
export function renameColumns(table: Table, mapping: ColumnMapping): Table {
  const origin = new Map<string, string>();
  const columns = table.columns.map((column) => {
    const target = resolveColumn(mapping, column);
    const clash = origin.get(target);
    if (clash !== undefined) {
      throw new SchemaError(target, `"${clash}" and "${column}" both map to this column in ${table.name}`);
    }
    origin.set(target, column);
    return target;
  });

  const rows = table.rows.map((row) =>
    Object.fromEntries(table.columns.map((column, i) => [columns[i], row[column] ?? ""]))
  );
  return { ...table, columns, rows };
}

/** Stable filter dropping rows whose component code is excluded. */
export function removeExcluded(table: Table, excludedCodes: ReadonlySet<string>): FilterResult {
  const originalRows = table.rows.length;
  if (!table.columns.includes(CanonicalColumn.componentCode)) {
    return { table, stats: { originalRows, filteredRows: originalRows, removedRows: 0 } };
  }
  const rows = table.rows.filter((row) => !excludedCodes.has(normalizeKey(row[CanonicalColumn.componentCode] ?? "")));
  return {
    table: { ...table, rows },
    stats: { originalRows, filteredRows: rows.length, removedRows: originalRows - rows.length },
  };
}

export function clean(tables: LoadedTables, options: CleanOptions = {}): CleanedDataset {
  const { columnMappings = {}, excludedComponents = [], logger = defaultLogger } = options;

  const renamed = {
    activity: renameColumns(tables.activity, columnMappings),
    userLog: renameColumns(tables.userLog, columnMappings),
    componentCodes: renameColumns(tables.componentCodes, columnMappings),
  };
  logger.debug("clean:renamed", {
    activity: renamed.activity.columns,
    userLog: renamed.userLog.columns,
    componentCodes: renamed.componentCodes.columns,
  });

  const configured = new Set(excludedComponents.map(normalizeKey));
  const componentCodes = toComponentCodes(renamed.componentCodes, configured);
  const excluded = new Set(configured);
  for (const code of componentCodes) {
    if (code.isExcluded) excluded.add(code.code);
  }

  const activity = removeExcluded(renamed.activity, excluded);
  const userLog = removeExcluded(renamed.userLog, excluded);
  const codeRows = renamed.componentCodes.rows.length;

  const stats = {
    activity: activity.stats,
    userLog: userLog.stats,
    componentCodes: { originalRows: codeRows, filteredRows: codeRows, removedRows: 0 },
  };
  logger.info("clean:done", { excluded: [...excluded], ...stats });

  return {
    activity: toActivityRecords(activity.table),
    userLog: toUserLogEntries(userLog.table),
    componentCodes,
    excludedCodes: [...excluded].sort(),
    stats,
  };
}

export default clean;
