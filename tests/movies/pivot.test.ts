import { describe, expect, it } from "vitest";

import { filterMovies } from "../../src/lib/movies/filter.js";
import { meltPivot, pivotGross, sumGrossByYearGenre } from "../../src/lib/movies/pivot.js";
import { movie } from "../helpers.js";

describe("pivotGross", () => {
  const records = [
    movie(2001, "Drama", 7),
    movie(2001, "Action", 10),
    movie(2003, "Comedy", 4),
    movie(2001, "Action", 5),
  ];

  it("sums gross into a zero-filled year × genre matrix, newest year first", () => {
    const pivot = pivotGross(records);
    expect(pivot.years).toEqual([2003, 2001]);
    expect(pivot.genres).toEqual(["Action", "Comedy", "Drama"]);
    expect(pivot.cells).toEqual([
      [0, 4, 0],
      [15, 0, 7],
    ]);
  });

  it("melts back to long rows one genre at a time", () => {
    expect(meltPivot(pivotGross(records))).toEqual([
      { year: 2003, genre: "Action", gross: 0 },
      { year: 2001, genre: "Action", gross: 15 },
      { year: 2003, genre: "Comedy", gross: 4 },
      { year: 2001, genre: "Comedy", gross: 0 },
      { year: 2003, genre: "Drama", gross: 0 },
      { year: 2001, genre: "Drama", gross: 7 },
    ]);
  });

  it("handles an empty selection", () => {
    const pivot = pivotGross([]);
    expect(pivot).toEqual({ years: [], genres: [], cells: [] });
    expect(meltPivot(pivot)).toEqual([]);
  });

  it("agrees with the grouped sum of the filtered rows", () => {
    const many = [
      movie(1999, "Action", 3),
      movie(2000, "Action", 11),
      movie(2000, "Drama", 2),
      movie(2000, "Drama", 9),
      movie(2002, "Horror", 6),
      movie(2004, "Action", 1),
      movie(2004, "Horror", 8),
      movie(2004, "Horror", 8),
      movie(2010, "Comedy", 20),
    ];
    const filtered = filterMovies(many, { genres: ["Action", "Drama", "Horror"], years: [2000, 2004] });
    const grouped = sumGrossByYearGenre(filtered);
    const melted = meltPivot(pivotGross(filtered));

    for (const cell of melted) {
      expect(cell.gross).toBe(grouped.get(cell.year)?.get(cell.genre) ?? 0);
    }
    const meltedTotal = melted.reduce((total, cell) => total + cell.gross, 0);
    const filteredTotal = filtered.reduce((total, record) => total + record.gross, 0);
    expect(meltedTotal).toBe(filteredTotal);
    expect(melted).toHaveLength(3 * 3);
  });
});
