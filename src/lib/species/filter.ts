import type { FoldedScore, SpeciesRecord, SpeciesVariable } from "./types.js";

/** An empty or missing selection leaves the records as they are. */
export function filterSpecies(
  records: readonly SpeciesRecord[],
  names?: readonly string[] | null,
): SpeciesRecord[] {
  if (!names || names.length === 0) {
    return [...records];
  }
  const selected = new Set(names);
  return records.filter((record) => selected.has(record.species));
}

export function speciesNames(records: readonly SpeciesRecord[]): string[] {
  return [...new Set(records.map((record) => record.species))];
}

export function foldVariables(
  records: readonly SpeciesRecord[],
  variables: readonly SpeciesVariable[],
): FoldedScore[] {
  return records.flatMap((record) =>
    variables.map((variable) => ({
      species: record.species,
      variable,
      value: record[variable],
    })),
  );
}
