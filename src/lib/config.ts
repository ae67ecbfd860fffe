import { z } from "zod";

import { DEFAULT_GENRES, GENRES, type Genre } from "./movies/types.js";
import {
  DEFAULT_SPECIES_VARIABLES,
  REGRESSION_X_OPTIONS,
  REGRESSION_Y_OPTIONS,
  SPECIES_VARIABLES,
  type RegressionVariable,
  type SpeciesVariable,
} from "./species/types.js";

const DEFAULT_MOVIES_PATH = "data/movies_genres_summary.csv";
const DEFAULT_SPECIES_PATH = "data/species_strategies.csv";
const DEFAULT_YEAR_BOUNDS: [number, number] = [1986, 2016];
const DEFAULT_YEAR_RANGE: [number, number] = [2000, 2016];

export type DashboardConfig = {
  moviesPath: string;
  speciesPath: string;
  genres: readonly Genre[];
  defaultGenres: readonly Genre[];
  yearBounds: [number, number];
  defaultYears: [number, number];
  speciesVariables: readonly SpeciesVariable[];
  defaultVariables: readonly SpeciesVariable[];
  regressionX: readonly RegressionVariable[];
  regressionY: readonly RegressionVariable[];
};

const pathSchema = z.string().trim().min(1);

const overrideSchema = z
  .object({
    moviesPath: pathSchema.optional(),
    speciesPath: pathSchema.optional(),
    yearBounds: z
      .tuple([z.number().int(), z.number().int()])
      .refine(([lo, hi]) => lo <= hi, { message: "yearBounds must be ascending" })
      .optional(),
  })
  .strict();

export type DashboardConfigOverride = z.infer<typeof overrideSchema>;

function clampRange([lo, hi]: [number, number], [min, max]: [number, number]): [number, number] {
  const start = Math.min(Math.max(lo, min), max);
  const end = Math.min(Math.max(hi, min), max);
  return [Math.min(start, end), Math.max(start, end)];
}

/**
 * Merge a page-supplied override into the built-in defaults. Anything that
 * fails validation is dropped as a whole.
 */
export function resolveConfig(raw: unknown): DashboardConfig {
  let override: DashboardConfigOverride = {};
  if (raw !== undefined && raw !== null) {
    const parsed = overrideSchema.safeParse(raw);
    if (parsed.success) {
      override = parsed.data;
    } else {
      console.warn("[config] ignoring invalid DASHBOARD_CONFIG", parsed.error.issues);
    }
  }

  const yearBounds = override.yearBounds ?? DEFAULT_YEAR_BOUNDS;
  return {
    moviesPath: override.moviesPath ?? DEFAULT_MOVIES_PATH,
    speciesPath: override.speciesPath ?? DEFAULT_SPECIES_PATH,
    genres: GENRES,
    defaultGenres: DEFAULT_GENRES,
    yearBounds: [yearBounds[0], yearBounds[1]],
    defaultYears: clampRange(DEFAULT_YEAR_RANGE, yearBounds),
    speciesVariables: SPECIES_VARIABLES,
    defaultVariables: DEFAULT_SPECIES_VARIABLES,
    regressionX: REGRESSION_X_OPTIONS,
    regressionY: REGRESSION_Y_OPTIONS,
  };
}

function readGlobalOverride(): unknown {
  if (typeof globalThis === "undefined" || !globalThis) {
    return undefined;
  }
  try {
    return Reflect.get(globalThis, "DASHBOARD_CONFIG");
  } catch {
    return undefined;
  }
}

export const CONFIG = resolveConfig(readGlobalOverride());
