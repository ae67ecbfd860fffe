/**
 * CSV table loader with a page-lifetime memo.
 * @module data/load
 */

import { RequestError, reportError, requireOk } from "../health.js";
import { EMPTY_TABLE, parseCsvTable, type DataTable } from "./table.js";

const tableCache = new Map<string, Promise<DataTable>>();

async function fetchTable(path: string, where: string): Promise<DataTable> {
  try {
    const response = await requireOk(path, where, {
      headers: { Accept: "text/csv, text/plain" },
    });
    const text = await response.text();
    return parseCsvTable(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[data] failed to load ${where} table from ${path}: ${reason}`);
    // requireOk has already put request failures on the page.
    if (!(error instanceof RequestError)) {
      reportError(where, `Error loading ${where.toLowerCase()} data: ${reason}`, "load");
    }
    return EMPTY_TABLE;
  }
}

/**
 * Load a CSV file into a {@link DataTable}. The first call per path does the
 * fetch; every later call shares its result, including the empty fallback
 * after a failure.
 */
export function loadTable(path: string, where: string): Promise<DataTable> {
  const cached = tableCache.get(path);
  if (cached) {
    return cached;
  }
  const pending = fetchTable(path, where);
  tableCache.set(path, pending);
  return pending;
}

export function clearTableCache(): void {
  tableCache.clear();
}
