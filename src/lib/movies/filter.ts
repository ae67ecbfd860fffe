import type { Genre, MovieRecord, MovieTableRow } from "./types.js";

export type MovieFilter = {
  genres: readonly Genre[];
  years: readonly [number, number];
};

export function normalizeYearRange([a, b]: readonly [number, number]): [number, number] {
  return a <= b ? [a, b] : [b, a];
}

export function filterMovies(records: readonly MovieRecord[], filter: MovieFilter): MovieRecord[] {
  const selected = new Set<Genre>(filter.genres);
  const [lo, hi] = normalizeYearRange(filter.years);
  return records.filter(
    (record) => selected.has(record.genre) && record.year >= lo && record.year <= hi,
  );
}

export function movieTableRows(records: readonly MovieRecord[]): MovieTableRow[] {
  return records.map(({ year, title, genre, gross }) => ({ year, title, genre, gross }));
}
