/**
 * Movie box-office section: genre/year widgets, data table and line chart.
 * @module dashboard/movies-section
 */

import type { DashboardConfig } from "../config.js";
import type { ChartTheme } from "../charts/theme.js";
import { formatCurrency } from "../charts/theme.js";
import { parseMovies } from "../data/schemas.js";
import type { DataTable } from "../data/table.js";
import { validateColumns } from "../data/validate.js";
import { filterMovies, movieTableRows } from "../movies/filter.js";
import { meltPivot, pivotGross } from "../movies/pivot.js";
import { MOVIE_COLUMNS, type MovieRecord } from "../movies/types.js";
import { clear, el, section, table } from "../ui/dom.js";
import { emptyState, errorCard } from "../ui/feedback.js";
import { multiSelect, rangeSlider } from "../ui/widgets.js";
import { grossLineChart } from "./charts.js";
import type { MovieSelection } from "./state.js";

export const MOVIES_UNAVAILABLE = "Movie data not loaded correctly or missing necessary columns.";

export interface SectionHandle<T> {
  element: HTMLElement;
  /** Re-run the pipeline, optionally with a new chart theme. */
  refresh(theme?: ChartTheme): void;
  /** Current selection, after values unknown to the data are dropped. */
  selection(): T;
}

function copyMovieSelection(selection: MovieSelection): MovieSelection {
  return { genres: [...selection.genres], years: [selection.years[0], selection.years[1]] };
}

export interface MovieSectionOptions {
  config: DashboardConfig;
  theme: ChartTheme;
  onChange?: (selection: MovieSelection) => void;
}

function renderOutputs(
  output: HTMLElement,
  records: readonly MovieRecord[],
  selection: MovieSelection,
  theme: ChartTheme,
): void {
  clear(output);
  const filtered = filterMovies(records, selection);
  const rows = movieTableRows(filtered);
  output.appendChild(
    rows.length === 0
      ? emptyState("No movies match the selected genres and years.")
      : table(
          ["year", "Title", "genre", "gross"],
          rows.map((row) => [row.year, row.title, row.genre, formatCurrency(row.gross)]),
          { caption: `${rows.length} movie record(s)` },
        ),
  );
  output.appendChild(grossLineChart(meltPivot(pivotGross(filtered)), theme));
}

export function movieSection(
  data: DataTable,
  initial: MovieSelection,
  options: MovieSectionOptions,
): SectionHandle<MovieSelection> {
  if (!validateColumns(data, MOVIE_COLUMNS, "Movies")) {
    const element = section("Box office by genre", errorCard(MOVIES_UNAVAILABLE));
    return { element, refresh: () => undefined, selection: () => copyMovieSelection(initial) };
  }

  const { records } = parseMovies(data);
  const { config } = options;
  let theme = options.theme;
  const selection = copyMovieSelection(initial);
  const output = el("div", { class: "section-output" });

  const rerun = () => {
    renderOutputs(output, records, selection, theme);
    options.onChange?.(copyMovieSelection(selection));
  };

  const controls = el(
    "div",
    { class: "controls" },
    multiSelect({
      label: "Genres",
      options: config.genres,
      selected: selection.genres,
      onChange: (genres) => {
        selection.genres = genres;
        rerun();
      },
    }),
    rangeSlider({
      label: "Years",
      min: config.yearBounds[0],
      max: config.yearBounds[1],
      value: selection.years,
      onChange: (years) => {
        selection.years = years;
        rerun();
      },
    }),
  );

  renderOutputs(output, records, selection, theme);
  return {
    element: section("Box office by genre", controls, output),
    refresh(next) {
      theme = next ?? theme;
      renderOutputs(output, records, selection, theme);
    },
    selection: () => copyMovieSelection(selection),
  };
}
