import { z } from "zod";

import { GENRES, type MovieRecord } from "../movies/types.js";
import type { SpeciesRecord } from "../species/types.js";
import type { DataTable } from "./table.js";

const numericCell = z
  .string()
  .trim()
  .min(1)
  .pipe(z.coerce.number().finite());

export const movieRowSchema = z
  .object({
    year: numericCell.pipe(z.number().int()),
    ActorId: z.string(),
    Name: z.string(),
    MovieId: z.string(),
    Title: z.string(),
    genre: z.enum(GENRES),
    Country: z.string(),
    gross: numericCell,
  })
  .transform(
    (row): MovieRecord => ({
      year: row.year,
      actorId: row.ActorId,
      name: row.Name,
      movieId: row.MovieId,
      title: row.Title,
      genre: row.genre,
      country: row.Country,
      gross: row.gross,
    }),
  );

export const speciesRowSchema = z.object({
  species: z.string().trim().min(1),
  protection: numericCell,
  defense: numericCell,
  attack: numericCell,
  feeding: numericCell,
  satisfaction: numericCell,
  sexual_reproduction: numericCell,
});

export type ParsedRecords<T> = {
  records: T[];
  rejected: number;
};

function parseRows<T>(
  table: DataTable,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  where: string,
): ParsedRecords<T> {
  const records: T[] = [];
  let rejected = 0;
  for (const row of table.rows) {
    const result = schema.safeParse(row);
    if (result.success) {
      records.push(result.data);
    } else {
      rejected += 1;
    }
  }
  if (rejected > 0) {
    console.warn(`[data] ${where}: dropped ${rejected} malformed row(s)`);
  }
  return { records, rejected };
}

export function parseMovies(table: DataTable): ParsedRecords<MovieRecord> {
  return parseRows(table, movieRowSchema, "Movies");
}

export function parseSpecies(table: DataTable): ParsedRecords<SpeciesRecord> {
  return parseRows(table, speciesRowSchema, "Species");
}
