import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { clearTableCache, loadTable } from "../../src/lib/data/load.js";
import { EMPTY_TABLE, parseCsvTable } from "../../src/lib/data/table.js";

beforeEach(() => {
  clearTableCache();
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("parseCsvTable", () => {
  it("trims headers and cells and skips blank rows", () => {
    const table = parseCsvTable(" year , gross \n2001, 10\n,\n2002,20\n");
    expect(table.columns).toEqual(["year", "gross"]);
    expect(table.rows).toEqual([
      { year: "2001", gross: "10" },
      { year: "2002", gross: "20" },
    ]);
  });
});

describe("loadTable", () => {
  it("parses the CSV and fetches each path once", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockImplementation(async () => new Response("species,attack\nMeerkat,4\n", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const first = await loadTable("data/species.csv", "Species");
    const second = await loadTable("data/species.csv", "Species");

    expect(first).toEqual({ columns: ["species", "attack"], rows: [{ species: "Meerkat", attack: "4" }] });
    expect(second).toBe(first);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("data/species.csv");
  });

  it("falls back to an empty table on a bad status and keeps that result", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockImplementation(async () => new Response("missing", { status: 404, statusText: "Not Found" }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(loadTable("data/movies.csv", "Movies")).resolves.toBe(EMPTY_TABLE);
    await expect(loadTable("data/movies.csv", "Movies")).resolves.toBe(EMPTY_TABLE);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      "[data] failed to load Movies table from data/movies.csv: requireOk(Movies) expected 200 for data/movies.csv but received 404 Not Found",
    );
  });

  it("falls back to an empty table when the request throws", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.stubGlobal("fetch", vi.fn<typeof fetch>().mockRejectedValue(new Error("offline")));

    const table = await loadTable("data/movies.csv", "Movies");
    expect(table.columns).toEqual([]);
    expect(table.rows).toEqual([]);
  });
});
