import { logger as defaultLogger, Logger } from "../config/logger";
import { LoadError } from "../domain/errors";
import { ColumnMapping, requiredColumns, resolveColumn, tableNames } from "../domain/mapping";
import { LoadedTables, Row, SourcePaths, Table, TableName } from "../domain/types";
import { parseCsv, readCsvFile } from "../integrations/csv/csv.reader";

// Null markers the platform export (and spreadsheet round-trips) leave behind
const NULL_MARKERS = new Set(["NA", "N/A", "null", "NULL", "NaN"]);

export interface LoadOptions {
  columnMappings?: ColumnMapping;
  logger?: Logger;
}

function normalizeHeader(raw: string): string {
  return raw.trim().replace(/ +/g, " ");
}

function normalizeCell(raw: string | undefined): string {
  const value = (raw ?? "").trim();
  return NULL_MARKERS.has(value) ? "" : value;
}

export function loadTable(name: TableName, filePath: string, options: LoadOptions = {}): Table {
  const { columnMappings = {}, logger = defaultLogger } = options;
  const doc = parseCsv(readCsvFile(filePath), filePath);

  const header = doc.header.map(normalizeHeader);
  const cells = doc.records.map((record, i) => {
    if (record.length > header.length) {
      throw new LoadError(filePath, `record ${i + 1} has ${record.length} fields, header has ${header.length}`);
    }
    return header.map((_, c) => normalizeCell(record[c]));
  });

  // Unnamed columns (trailing delimiters) are kept only if they carry data
  const keep: number[] = [];
  const seen = new Set<string>();
  header.forEach((column, c) => {
    if (!column) {
      if (cells.some((row) => row[c] !== "")) {
        throw new LoadError(filePath, `column ${c + 1} has data but no header`);
      }
      return;
    }
    if (seen.has(column)) throw new LoadError(filePath, `duplicate column "${column}"`);
    seen.add(column);
    keep.push(c);
  });
  const columns = keep.map((c) => header[c]);

  const provided = new Set(columns.map((column) => resolveColumn(columnMappings, column)));
  const missing = requiredColumns[name].filter((column) => !provided.has(column));
  if (missing.length > 0) {
    throw new LoadError(filePath, `missing required column(s): ${missing.join(", ")}`);
  }

  const rows: Row[] = [];
  for (const row of cells) {
    if (keep.every((c) => row[c] === "")) continue;
    rows.push(Object.fromEntries(keep.map((c) => [header[c], row[c]])));
  }

  logger.debug("load:table", { table: name, path: filePath, columns: columns.length, rows: rows.length });
  return { name, source: filePath, columns, rows };
}

/** Loads the three sources; any failing file aborts the whole load. */
export function load(paths: SourcePaths, options: LoadOptions = {}): LoadedTables {
  const { logger = defaultLogger } = options;
  const tables = {
    activity: loadTable("activity", paths.activity, options),
    userLog: loadTable("userLog", paths.userLog, options),
    componentCodes: loadTable("componentCodes", paths.componentCodes, options),
  };
  logger.info(
    "load:done",
    Object.fromEntries(tableNames.map((name) => [name, tables[name].rows.length]))
  );
  return tables;
}

export default load;
