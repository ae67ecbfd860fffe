import { afterEach, describe, expect, it, vi } from "vitest";

import { parseMovies, parseSpecies } from "../../src/lib/data/schemas.js";
import { csv } from "../helpers.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("record schemas", () => {
  it("maps movie columns onto typed records", () => {
    const { records, rejected } = parseMovies(
      csv([
        "year,ActorId,Name,MovieId,Title,genre,Country,gross",
        "2004,a1,Jordan Hayes,m1,Paper Lantern,Sci-Fi,UK,1250000.5",
      ]),
    );
    expect(rejected).toBe(0);
    expect(records).toEqual([
      {
        year: 2004,
        actorId: "a1",
        name: "Jordan Hayes",
        movieId: "m1",
        title: "Paper Lantern",
        genre: "Sci-Fi",
        country: "UK",
        gross: 1250000.5,
      },
    ]);
  });

  it("drops rows with unknown genres or non-numeric cells", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { records, rejected } = parseMovies(
      csv([
        "year,ActorId,Name,MovieId,Title,genre,Country,gross",
        "2004,a1,Jordan Hayes,m1,Paper Lantern,Drama,UK,100",
        "2004,a2,Casey Lowe,m2,Iron Echo,Documentary,UK,100",
        "2005,a3,Quinn Grant,m3,Wild Tide,Drama,UK,n/a",
        "2005.5,a4,Riley Keller,m4,Last Orchard,Drama,UK,10",
        "2006,a5,Avery Brooks,m5,Golden Circuit,Drama,UK,",
      ]),
    );
    expect(records.map((record) => record.title)).toEqual(["Paper Lantern"]);
    expect(rejected).toBe(4);
    expect(warn).toHaveBeenCalledWith("[data] Movies: dropped 4 malformed row(s)");
  });

  it("coerces species scores", () => {
    const { records, rejected } = parseSpecies(
      csv([
        "species,protection,defense,attack,feeding,satisfaction,sexual_reproduction",
        "Porcupine,9.5,8,2,4,6.25,3",
      ]),
    );
    expect(rejected).toBe(0);
    expect(records).toEqual([
      {
        species: "Porcupine",
        protection: 9.5,
        defense: 8,
        attack: 2,
        feeding: 4,
        satisfaction: 6.25,
        sexual_reproduction: 3,
      },
    ]);
  });
});
