/**
 * Widget selections and their query-string form.
 * @module dashboard/state
 */

import { z } from "zod";

import type { DashboardConfig } from "../config.js";
import { normalizeYearRange } from "../movies/filter.js";
import { isGenre, type Genre } from "../movies/types.js";
import {
  isRegressionVariable,
  isSpeciesVariable,
  type RegressionVariable,
  type SpeciesVariable,
} from "../species/types.js";

export type MovieSelection = {
  genres: Genre[];
  years: [number, number];
};

export type SpeciesSelection = {
  /** Empty means every species. */
  species: string[];
  variables: SpeciesVariable[];
  xVar: RegressionVariable;
  yVar: RegressionVariable;
};

export type DashboardState = {
  movies: MovieSelection;
  species: SpeciesSelection;
};

export function defaultState(config: DashboardConfig): DashboardState {
  return {
    movies: {
      genres: [...config.defaultGenres],
      years: [config.defaultYears[0], config.defaultYears[1]],
    },
    species: {
      species: [],
      variables: [...config.defaultVariables],
      xVar: config.regressionX[0],
      yVar: config.regressionY[0],
    },
  };
}

const listParam = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const yearsParam = z
  .string()
  .regex(/^\d{4}-\d{4}$/)
  .transform((raw): [number, number] => {
    const [lo, hi] = raw.split("-").map(Number);
    return normalizeYearRange([lo, hi]);
  });

/**
 * Read selections from a query string. Each parameter that is missing or
 * doesn't validate keeps its default.
 */
export function readState(search: string | URLSearchParams, config: DashboardConfig): DashboardState {
  const params = typeof search === "string" ? new URLSearchParams(search) : search;
  const state = defaultState(config);

  const genres = params.get("genres");
  if (genres !== null) {
    const parsed = listParam.parse(genres).filter(isGenre);
    state.movies.genres = config.genres.filter((genre) => parsed.includes(genre));
  }

  const years = yearsParam.safeParse(params.get("years"));
  if (years.success) {
    const [minYear, maxYear] = config.yearBounds;
    const [lo, hi] = years.data;
    if (lo >= minYear && hi <= maxYear) {
      state.movies.years = [lo, hi];
    }
  }

  const species = params.get("species");
  if (species !== null) {
    state.species.species = listParam.parse(species);
  }

  const vars = params.get("vars");
  if (vars !== null) {
    const parsed = listParam.parse(vars).filter(isSpeciesVariable);
    state.species.variables = config.speciesVariables.filter((variable) => parsed.includes(variable));
  }

  const x = params.get("x");
  if (x !== null && isRegressionVariable(x) && config.regressionX.includes(x)) {
    state.species.xVar = x;
  }
  const y = params.get("y");
  if (y !== null && isRegressionVariable(y) && config.regressionY.includes(y)) {
    state.species.yVar = y;
  }

  return state;
}

export function writeState(state: DashboardState): URLSearchParams {
  const params = new URLSearchParams();
  params.set("genres", state.movies.genres.join(","));
  params.set("years", `${state.movies.years[0]}-${state.movies.years[1]}`);
  if (state.species.species.length > 0) {
    params.set("species", state.species.species.join(","));
  }
  params.set("vars", state.species.variables.join(","));
  params.set("x", state.species.xVar);
  params.set("y", state.species.yVar);
  return params;
}
