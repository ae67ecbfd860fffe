import { parseMovies, parseSpecies } from "../../src/lib/data/schemas.js";
import { parseCsvTable, type DataTable } from "../../src/lib/data/table.js";
import { missingColumns } from "../../src/lib/data/validate.js";
import { MOVIE_COLUMNS } from "../../src/lib/movies/types.js";
import { SPECIES_COLUMNS } from "../../src/lib/species/types.js";

export interface DatasetCheck {
  label: string;
  file: string;
  required: readonly string[];
  parse: (table: DataTable) => { records: unknown[]; rejected: number };
}

export interface DatasetReport {
  label: string;
  file: string;
  rows: number;
  problems: string[];
}

export type ReadText = (file: string) => Promise<string>;

export function datasetChecks(paths: { moviesPath: string; speciesPath: string }): DatasetCheck[] {
  return [
    { label: "Movies", file: paths.moviesPath, required: MOVIE_COLUMNS, parse: parseMovies },
    { label: "Species", file: paths.speciesPath, required: SPECIES_COLUMNS, parse: parseSpecies },
  ];
}

export async function checkDataset(check: DatasetCheck, readText: ReadText): Promise<DatasetReport> {
  const table = parseCsvTable(await readText(check.file));
  const report: DatasetReport = { label: check.label, file: check.file, rows: 0, problems: [] };

  const missing = missingColumns(table, check.required);
  if (missing.length > 0) {
    report.problems.push(`${check.label}: missing required columns ${missing.join(", ")}`);
    return report;
  }

  const { records, rejected } = check.parse(table);
  report.rows = records.length;
  if (rejected > 0) {
    report.problems.push(`${check.label}: ${rejected} row(s) failed validation`);
  }
  if (records.length === 0) {
    report.problems.push(`${check.label}: no usable rows`);
  }
  return report;
}
