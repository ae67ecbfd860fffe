import { csvParse } from "d3";

export type DataRow = Record<string, string>;

export type DataTable = {
  columns: readonly string[];
  rows: readonly DataRow[];
};

export const EMPTY_TABLE: DataTable = Object.freeze({ columns: [], rows: [] });

/**
 * Parse CSV text with a header row. Cells stay strings; typing happens in the
 * record schemas.
 */
export function parseCsvTable(text: string): DataTable {
  const parsed = csvParse(text);
  const columns = parsed.columns.map((column) => column.trim());
  const rows = parsed
    .map((raw) => {
      const row: DataRow = {};
      parsed.columns.forEach((column, index) => {
        row[columns[index]] = (raw[column] ?? "").trim();
      });
      return row;
    })
    .filter((row) => Object.values(row).some((cell) => cell.length > 0));
  return { columns, rows };
}
