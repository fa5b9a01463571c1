import fs from "fs";
import Papa from "papaparse";
import { LoadError, errorMessage } from "../../domain/errors";

export interface CsvDocument {
  header: string[];
  records: string[][];
}

export function readCsvFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") throw new LoadError(filePath, "file not found");
    throw new LoadError(filePath, `file is unreadable (${errorMessage(err)})`);
  }
}

/** Parses comma-separated UTF-8 text; the first non-blank line is the header. */
export function parseCsv(raw: string, source: string): CsvDocument {
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  const result = Papa.parse<string[]>(text, {
    delimiter: ",",
    skipEmptyLines: "greedy",
  });

  const quoteError = result.errors.find((e) => e.type === "Quotes");
  if (quoteError) {
    const at = quoteError.row === undefined ? "" : ` (record ${quoteError.row + 1})`;
    throw new LoadError(source, `malformed CSV${at}: ${quoteError.message}`);
  }

  const [header, ...records] = result.data;
  if (!header) throw new LoadError(source, "missing header row");
  return { header, records };
}
