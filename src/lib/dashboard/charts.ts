/**
 * The three dashboard charts, composed from the chart primitives.
 * @module dashboard/charts
 */

import { ascending, groups } from "d3";

import { buildScales, drawAxes, drawGrid, drawLegend } from "../charts/axes.js";
import { renderGroupedBars } from "../charts/bar.js";
import { createPlot, type Margin } from "../charts/frame.js";
import { renderLine } from "../charts/line.js";
import { renderScatter } from "../charts/scatter.js";
import { defaultTheme, formatNumber, resolveColor, type ChartTheme } from "../charts/theme.js";
import { createTooltip } from "../charts/tooltip.js";
import type { GrossCell } from "../movies/types.js";
import type { FoldedScore } from "../species/types.js";
import type { RegressionResult } from "../stats/regression.js";
import { el } from "../ui/dom.js";
import { emptyState } from "../ui/feedback.js";

const WIDTH = 720;
const HEIGHT = 320;
const MARGIN: Margin = { top: 48, right: 24, bottom: 56, left: 72 };

function figure(className: string, caption: string): HTMLElement {
  return el("figure", { class: `chart-figure ${className}` }, el("figcaption", {}, caption));
}

/** Gross per genre over the selected years, one line per genre. */
export function grossLineChart(cells: readonly GrossCell[], theme: ChartTheme = defaultTheme): HTMLElement {
  const host = figure("chart-figure--gross", "Gross earnings by genre");
  if (cells.length === 0) {
    host.appendChild(emptyState("No movies match the selected genres and years."));
    return host;
  }

  const years = [...new Set(cells.map((cell) => cell.year))].sort(ascending).map(String);
  const series = groups(cells, (cell) => cell.genre).sort(([a], [b]) => ascending(a, b));

  const { plot, iw, ih, layer } = createPlot(host, WIDTH, HEIGHT, MARGIN, {
    title: "Gross earnings by genre",
    description: `Summed box-office gross for ${series.length} genre(s) across ${years.length} year(s)`,
    theme,
  });
  const scales = buildScales({
    x: { type: "point", domain: years, range: [0, iw] },
    y: { type: "linear", domain: [0, ...cells.map((cell) => cell.gross)], range: [ih, 0] },
  });

  drawGrid(layer("grid"), scales, { innerWidth: iw, innerHeight: ih, theme });
  drawAxes(plot, scales, {
    innerWidth: iw,
    innerHeight: ih,
    theme,
    xLabel: "Year",
    yLabel: "Gross earnings ($)",
  });

  series.forEach(([genre, rows], index) => {
    const data = [...rows]
      .sort((a, b) => a.year - b.year)
      .map((row) => ({ x: String(row.year), y: row.gross }));
    renderLine(layer(`series series--${genre.toLowerCase()}`), data, scales, {
      theme,
      stroke: resolveColor(index, theme),
      ariaLabel: `${genre} gross`,
    });
  });

  const legend = layer("legend");
  legend.setAttribute("transform", `translate(0, ${-MARGIN.top + 12})`);
  drawLegend(
    legend,
    series.map(([genre], index) => ({ label: genre, color: resolveColor(index, theme) })),
    { width: iw, theme },
  );
  return host;
}

/** Selected score variables per species, grouped side by side. */
export function speciesBarChart(
  scores: readonly FoldedScore[],
  theme: ChartTheme = defaultTheme,
): HTMLElement {
  const host = figure("chart-figure--species", "Survival strategy scores");
  if (scores.length === 0) {
    host.appendChild(emptyState("No species scores to show."));
    return host;
  }

  const species = [...new Set(scores.map((score) => score.species))];
  const variables = [...new Set(scores.map((score) => score.variable))];

  const { plot, iw, ih, layer } = createPlot(host, WIDTH, HEIGHT, MARGIN, {
    title: "Survival strategy scores",
    description: `${variables.join(", ")} for ${species.length} species`,
    theme,
  });
  const scales = buildScales({
    x: { type: "band", domain: species, range: [0, iw] },
    y: { type: "linear", domain: [0, ...scores.map((score) => score.value)], range: [ih, 0] },
  });

  drawGrid(layer("grid"), scales, { innerWidth: iw, innerHeight: ih, theme });
  drawAxes(plot, scales, { innerWidth: iw, innerHeight: ih, theme, xLabel: "Species", yLabel: "Value" });

  const tooltip = createTooltip(host);
  renderGroupedBars(
    layer("series series--bars"),
    scores.map((score) => ({ group: score.species, key: score.variable, value: score.value })),
    scales,
    {
      keys: variables,
      innerHeight: ih,
      theme,
      onHover: (datum, rect) => {
        const x = Number(rect.getAttribute("x") ?? 0) + MARGIN.left;
        const y = Number(rect.getAttribute("y") ?? 0) + MARGIN.top;
        tooltip.show(x, y, [datum.group, `${datum.key}: ${formatNumber(datum.value, 2)}`]);
      },
      onLeave: () => tooltip.hide(),
    },
  );

  const legend = layer("legend");
  legend.setAttribute("transform", `translate(0, ${-MARGIN.top + 12})`);
  drawLegend(
    legend,
    variables.map((variable, index) => ({ label: variable, color: resolveColor(index, theme) })),
    { width: iw, theme },
  );
  return host;
}

/** Observed points with the fitted line drawn over them. */
export function regressionChart(
  result: RegressionResult | null,
  labels: { x: string; y: string },
  theme: ChartTheme = defaultTheme,
): HTMLElement {
  const host = figure("chart-figure--regression", `${labels.y} against ${labels.x}`);
  if (!result || result.rows.length === 0) {
    host.appendChild(emptyState("Not enough data to fit a line."));
    return host;
  }

  const { rows } = result;
  const { plot, iw, ih, layer } = createPlot(host, WIDTH, HEIGHT, MARGIN, {
    title: `${labels.y} against ${labels.x}`,
    description: `Scatter of ${rows.length} species with a least-squares line`,
    theme,
  });
  const scales = buildScales({
    x: { type: "linear", domain: rows.map((row) => row.x), range: [0, iw] },
    y: {
      type: "linear",
      domain: rows.flatMap((row) => [row.y, row.predicted]),
      range: [ih, 0],
    },
  });

  drawGrid(layer("grid"), scales, { innerWidth: iw, innerHeight: ih, theme });
  drawAxes(plot, scales, { innerWidth: iw, innerHeight: ih, theme, xLabel: labels.x, yLabel: labels.y });

  renderScatter(
    layer("series series--points"),
    rows.map((row) => ({ x: row.x, y: row.y })),
    scales,
    { theme },
  );
  renderLine(
    layer("series series--fit"),
    [...rows].sort((a, b) => a.x - b.x).map((row) => ({ x: row.x, y: row.predicted })),
    scales,
    { theme, stroke: theme.highlight, ariaLabel: `Fitted ${labels.y}` },
  );
  return host;
}
