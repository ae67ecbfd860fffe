/**
 * Year × genre reshaping of box-office gross.
 * @module movies/pivot
 */

import { ascending, descending, rollup, sum } from "d3";

import type { Genre, GrossCell, MovieRecord } from "./types.js";

export type GrossPivot = {
  /** Row keys, newest first. */
  years: number[];
  /** Column keys, alphabetical. */
  genres: Genre[];
  /** `cells[i][j]` is the total gross for `years[i]` × `genres[j]`. */
  cells: number[][];
};

export function sumGrossByYearGenre(records: readonly MovieRecord[]): Map<number, Map<Genre, number>> {
  return rollup(
    records,
    (group) => sum(group, (record) => record.gross),
    (record) => record.year,
    (record) => record.genre,
  );
}

/**
 * Pivot movie records into a year × genre matrix of summed gross. Combinations
 * with no records are filled with 0.
 */
export function pivotGross(records: readonly MovieRecord[]): GrossPivot {
  const totals = sumGrossByYearGenre(records);
  const years = [...totals.keys()].sort(descending);
  const genres = [...new Set(records.map((record) => record.genre))].sort(ascending);
  const cells = years.map((year) => {
    const row = totals.get(year);
    return genres.map((genre) => row?.get(genre) ?? 0);
  });
  return { years, genres, cells };
}

/** Flatten a pivot back to long rows, one genre column at a time. */
export function meltPivot(pivot: GrossPivot): GrossCell[] {
  const out: GrossCell[] = [];
  pivot.genres.forEach((genre, column) => {
    pivot.years.forEach((year, row) => {
      out.push({ year, genre, gross: pivot.cells[row]?.[column] ?? 0 });
    });
  });
  return out;
}
