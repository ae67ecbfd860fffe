/**
 * Species section: score bars for chosen variables and a regression overlay.
 * @module dashboard/species-section
 */

import type { DashboardConfig } from "../config.js";
import type { ChartTheme } from "../charts/theme.js";
import { parseSpecies } from "../data/schemas.js";
import type { DataTable } from "../data/table.js";
import { validateColumns } from "../data/validate.js";
import { filterSpecies, foldVariables, speciesNames } from "../species/filter.js";
import { SPECIES_COLUMNS, type SpeciesRecord } from "../species/types.js";
import { describeFit, regressionRows } from "../stats/regression.js";
import { clear, el, section } from "../ui/dom.js";
import { errorCard } from "../ui/feedback.js";
import { multiSelect, selectBox } from "../ui/widgets.js";
import { regressionChart, speciesBarChart } from "./charts.js";
import type { SectionHandle } from "./movies-section.js";
import type { SpeciesSelection } from "./state.js";

export const SPECIES_UNAVAILABLE = "Species data not loaded correctly or missing necessary columns.";

export interface SpeciesSectionOptions {
  config: DashboardConfig;
  theme: ChartTheme;
  onChange?: (selection: SpeciesSelection) => void;
}

function copySelection(selection: SpeciesSelection): SpeciesSelection {
  return { ...selection, species: [...selection.species], variables: [...selection.variables] };
}

function renderBars(output: HTMLElement, records: readonly SpeciesRecord[], selection: SpeciesSelection, theme: ChartTheme): void {
  clear(output);
  // Nothing is drawn at all without variables, matching an empty fold.
  if (selection.variables.length === 0) {
    return;
  }
  output.appendChild(speciesBarChart(foldVariables(records, selection.variables), theme));
}

function renderRegression(
  output: HTMLElement,
  records: readonly SpeciesRecord[],
  selection: SpeciesSelection,
  theme: ChartTheme,
): void {
  clear(output);
  const result = regressionRows(records, selection.xVar, selection.yVar);
  output.appendChild(regressionChart(result, { x: selection.xVar, y: selection.yVar }, theme));
  if (result) {
    output.appendChild(el("p", { class: "fit-equation" }, describeFit(result.fit)));
  }
}

export function speciesSection(
  data: DataTable,
  initial: SpeciesSelection,
  options: SpeciesSectionOptions,
): SectionHandle<SpeciesSelection> {
  if (!validateColumns(data, SPECIES_COLUMNS, "Species")) {
    const element = section("Survival strategies", errorCard(SPECIES_UNAVAILABLE));
    return { element, refresh: () => undefined, selection: () => copySelection(initial) };
  }

  const { records } = parseSpecies(data);
  const { config } = options;
  const names = speciesNames(records);
  let theme = options.theme;
  const selection = copySelection(initial);
  selection.species = selection.species.filter((name) => names.includes(name));

  const barsOutput = el("div", { class: "section-output section-output--bars" });
  const regressionOutput = el("div", { class: "section-output section-output--regression" });

  const renderAll = () => {
    const visible = filterSpecies(records, selection.species);
    renderBars(barsOutput, visible, selection, theme);
    renderRegression(regressionOutput, visible, selection, theme);
  };

  const rerun = () => {
    renderAll();
    options.onChange?.(copySelection(selection));
  };

  const controls = el(
    "div",
    { class: "controls" },
    multiSelect({
      label: "Species",
      options: names,
      selected: selection.species.length > 0 ? selection.species : names,
      onChange: (species) => {
        // Everything ticked and nothing ticked both mean "no filter".
        selection.species = species.length === names.length ? [] : species;
        rerun();
      },
    }),
    multiSelect({
      label: "Variables",
      options: config.speciesVariables,
      selected: selection.variables,
      onChange: (variables) => {
        selection.variables = variables;
        rerun();
      },
    }),
  );

  const regressionControls = el(
    "div",
    { class: "controls controls--inline" },
    selectBox({
      label: "Choose X variable for regression",
      options: config.regressionX,
      value: selection.xVar,
      onChange: (xVar) => {
        selection.xVar = xVar;
        rerun();
      },
    }),
    selectBox({
      label: "Choose Y variable for regression",
      options: config.regressionY,
      value: selection.yVar,
      onChange: (yVar) => {
        selection.yVar = yVar;
        rerun();
      },
    }),
  );

  renderAll();
  return {
    element: section("Survival strategies", controls, barsOutput, regressionControls, regressionOutput),
    refresh(next) {
      theme = next ?? theme;
      renderAll();
    },
    selection: () => copySelection(selection),
  };
}
