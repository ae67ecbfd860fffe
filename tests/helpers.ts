import { parseCsvTable, type DataTable } from "../src/lib/data/table.js";
import type { Genre, MovieRecord } from "../src/lib/movies/types.js";
import type { SpeciesRecord } from "../src/lib/species/types.js";

export function csv(lines: readonly string[]): DataTable {
  return parseCsvTable(lines.join("\n"));
}

export function movie(year: number, genre: Genre, gross: number, title = `${genre} ${year}`): MovieRecord {
  return {
    year,
    actorId: `a-${year}`,
    name: "Test Actor",
    movieId: `m-${title}`,
    title,
    genre,
    country: "USA",
    gross,
  };
}

export function species(name: string, scores: Partial<Omit<SpeciesRecord, "species">> = {}): SpeciesRecord {
  return {
    species: name,
    protection: 0,
    defense: 0,
    attack: 0,
    feeding: 0,
    satisfaction: 0,
    sexual_reproduction: 0,
    ...scores,
  };
}
