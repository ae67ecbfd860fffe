/**
 * Line series renderer.
 * @module charts/line
 */

import { curveLinear, curveMonotoneX, line as d3Line, select } from "d3";
import { positionX, type BuiltScales } from "./axes.js";
import { defaultTheme, type ChartTheme } from "./theme.js";

export interface LineDatum {
  x: string | number;
  y: number;
}

export interface LineOptions {
  theme?: ChartTheme;
  smoothing?: boolean;
  stroke?: string;
  strokeWidth?: number;
  dash?: string;
  ariaLabel?: string;
  defined?: (datum: LineDatum) => boolean;
}

const prefersReducedMotion = (): boolean => {
  if (typeof window === "undefined" || typeof window.matchMedia !== "function") {
    return false;
  }
  return window.matchMedia("(prefers-reduced-motion: reduce)").matches;
};

/**
 * Render one line path into `g`, replacing any previous path there.
 */
export function renderLine(
  g: SVGGElement,
  data: readonly LineDatum[],
  scales: BuiltScales,
  options: LineOptions = {}
): SVGPathElement {
  const theme = options.theme ?? defaultTheme;
  const lineGenerator = d3Line<LineDatum>()
    .defined(options.defined ?? ((datum) => Number.isFinite(datum.y)))
    .x((datum) => positionX(scales.x, datum.x))
    .y((datum) => scales.y(datum.y))
    .curve(options.smoothing ? curveMonotoneX : curveLinear);

  const selection = select(g);
  selection.selectAll("path.series--line").remove();
  const path = selection
    .append("path")
    .attr("class", "series series--line")
    .attr("fill", "none")
    .attr("stroke-linecap", "round")
    .attr("stroke-linejoin", "round")
    .attr("stroke", options.stroke ?? theme.accent)
    .attr("stroke-width", options.strokeWidth ?? theme.lineWidth)
    .attr("aria-label", options.ariaLabel ?? "Line series")
    .attr("d", lineGenerator(data) ?? "");

  if (options.dash) {
    path.attr("stroke-dasharray", options.dash);
  }

  const node = path.node();
  if (!node) {
    throw new Error("Unable to create line path");
  }

  // jsdom and older engines have no path geometry.
  if (!options.dash && !prefersReducedMotion() && typeof node.getTotalLength === "function") {
    const totalLength = node.getTotalLength();
    node.style.transition = "none";
    node.style.strokeDasharray = `${totalLength} ${totalLength}`;
    node.style.strokeDashoffset = `${totalLength}`;
    void node.getBoundingClientRect();
    node.style.transition = "stroke-dashoffset 320ms ease";
    node.style.strokeDashoffset = "0";
  }

  return node;
}
