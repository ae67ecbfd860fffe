import { reportError } from "../health.js";
import type { DataTable } from "./table.js";

export function missingColumns(table: DataTable, required: readonly string[]): string[] {
  const present = new Set(table.columns);
  return required.filter((column) => !present.has(column));
}

/**
 * Check that `table` carries every required column. Reports the missing set
 * to the page when it doesn't.
 */
export function validateColumns(
  table: DataTable,
  required: readonly string[],
  where: string,
): boolean {
  const missing = missingColumns(table, required);
  if (missing.length === 0) {
    return true;
  }
  const message = `DataFrame is missing required columns: ${missing.join(", ")}`;
  console.warn(`[data] ${where}: ${message}`);
  reportError(where, message);
  return false;
}
