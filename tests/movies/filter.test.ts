import { describe, expect, it } from "vitest";

import { filterMovies, movieTableRows, normalizeYearRange } from "../../src/lib/movies/filter.js";
import { movie } from "../helpers.js";

const records = [
  movie(1998, "Action", 40),
  movie(2000, "Action", 10),
  movie(2003, "Drama", 25),
  movie(2005, "Comedy", 7),
  movie(2005, "Drama", 12),
  movie(2012, "Horror", 3),
];

describe("filterMovies", () => {
  it("keeps selected genres within an inclusive year range", () => {
    const filtered = filterMovies(records, { genres: ["Action", "Drama"], years: [2000, 2005] });
    expect(filtered.map((record) => `${record.year}:${record.genre}`)).toEqual([
      "2000:Action",
      "2003:Drama",
      "2005:Drama",
    ]);
  });

  it("keeps every row inside [lo, hi] for any valid range", () => {
    const genres = ["Action", "Drama", "Comedy", "Horror"] as const;
    for (let lo = 1995; lo <= 2015; lo += 1) {
      for (let hi = lo; hi <= 2015; hi += 3) {
        const filtered = filterMovies(records, { genres, years: [lo, hi] });
        for (const record of filtered) {
          expect(record.year).toBeGreaterThanOrEqual(lo);
          expect(record.year).toBeLessThanOrEqual(hi);
        }
        const expected = records.filter((record) => record.year >= lo && record.year <= hi).length;
        expect(filtered).toHaveLength(expected);
      }
    }
  });

  it("treats a reversed range as the same interval", () => {
    const forward = filterMovies(records, { genres: ["Drama", "Comedy"], years: [2003, 2005] });
    const reversed = filterMovies(records, { genres: ["Drama", "Comedy"], years: [2005, 2003] });
    expect(reversed).toEqual(forward);
    expect(normalizeYearRange([2005, 2003])).toEqual([2003, 2005]);
  });

  it("returns nothing when no genre is selected", () => {
    expect(filterMovies(records, { genres: [], years: [1900, 2100] })).toEqual([]);
  });
});

describe("movieTableRows", () => {
  it("projects the table columns", () => {
    expect(movieTableRows([movie(2003, "Drama", 25, "Quiet Harbor")])).toEqual([
      { year: 2003, title: "Quiet Harbor", genre: "Drama", gross: 25 },
    ]);
  });
});
