import { describe, expect, it } from "vitest";

import { resolveConfig } from "../../src/lib/config.js";
import { defaultState, readState, writeState } from "../../src/lib/dashboard/state.js";

const config = resolveConfig(undefined);

describe("dashboard query state", () => {
  it("starts from the configured defaults", () => {
    expect(readState("", config)).toEqual(defaultState(config));
    expect(defaultState(config).species).toEqual({
      species: [],
      variables: ["protection", "defense"],
      xVar: "feeding",
      yVar: "satisfaction",
    });
  });

  it("keeps valid parameters and drops the rest", () => {
    const state = readState(
      "?genres=Drama,Bogus,Action&years=2010-1995&x=attack&y=sexual_reproduction&vars=feeding,protection&species=Red+fox",
      config,
    );
    expect(state.movies).toEqual({ genres: ["Drama", "Action"], years: [1995, 2010] });
    expect(state.species).toEqual({
      species: ["Red fox"],
      variables: ["protection", "feeding"],
      xVar: "attack",
      yVar: "satisfaction",
    });
  });

  it("ignores year ranges outside the bounds or in the wrong shape", () => {
    expect(readState("?years=1970-2000", config).movies.years).toEqual([2000, 2016]);
    expect(readState("?years=2001", config).movies.years).toEqual([2000, 2016]);
  });

  it("accepts empty lists", () => {
    const state = readState("?genres=&vars=", config);
    expect(state.movies.genres).toEqual([]);
    expect(state.species.variables).toEqual([]);
  });

  it("round-trips through the query string", () => {
    const state = defaultState(config);
    state.movies = { genres: ["Comedy", "Horror"], years: [1999, 2004] };
    state.species = { species: ["Barn owl", "Meerkat"], variables: ["attack"], xVar: "defense", yVar: "feeding" };

    const params = writeState(state);
    expect(params.get("years")).toBe("1999-2004");
    expect(readState(params, config)).toEqual(state);
  });

  it("leaves out an unfiltered species list", () => {
    expect(writeState(defaultState(config)).has("species")).toBe(false);
  });
});
