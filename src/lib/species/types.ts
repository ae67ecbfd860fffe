export const SPECIES_VARIABLES = [
  "protection",
  "defense",
  "attack",
  "feeding",
  "satisfaction",
  "sexual_reproduction",
] as const;

export type SpeciesVariable = (typeof SPECIES_VARIABLES)[number];

export const DEFAULT_SPECIES_VARIABLES: readonly SpeciesVariable[] = ["protection", "defense"];

export type RegressionVariable = Exclude<SpeciesVariable, "sexual_reproduction">;

// Order matters: the first entry is the initial selection.
export const REGRESSION_X_OPTIONS: readonly RegressionVariable[] = [
  "feeding",
  "protection",
  "defense",
  "attack",
  "satisfaction",
];

export const REGRESSION_Y_OPTIONS: readonly RegressionVariable[] = [
  "satisfaction",
  "feeding",
  "protection",
  "defense",
  "attack",
];

export const SPECIES_COLUMNS = ["species", ...SPECIES_VARIABLES] as const;

export type SpeciesRecord = { species: string } & Record<SpeciesVariable, number>;

export type FoldedScore = {
  species: string;
  variable: SpeciesVariable;
  value: number;
};

export function isSpeciesVariable(value: string): value is SpeciesVariable {
  return SPECIES_VARIABLES.some((variable) => variable === value);
}

export function isRegressionVariable(value: string): value is RegressionVariable {
  return isSpeciesVariable(value) && value !== "sexual_reproduction";
}
