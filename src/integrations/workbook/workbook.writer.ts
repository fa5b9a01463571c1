import fs from "fs";
import path from "path";
import * as XLSX from "xlsx";

export type CellValue = string | number | boolean;

export interface SheetSpec {
  name: string;
  header: readonly string[];
  rows: readonly Readonly<Record<string, CellValue>>[];
}

export function buildWorkbook(sheets: readonly SheetSpec[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  for (const sheet of sheets) {
    const ws = XLSX.utils.json_to_sheet([...sheet.rows], { header: [...sheet.header] });
    XLSX.utils.book_append_sheet(workbook, ws, sheet.name);
  }
  return workbook;
}

export function writeWorkbook(filePath: string, sheets: readonly SheetSpec[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  XLSX.writeFile(buildWorkbook(sheets), filePath);
}
