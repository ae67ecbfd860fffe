/**
 * Scatter series renderer.
 * @module charts/scatter
 */

import { select } from "d3";
import { positionX, type BuiltScales } from "./axes.js";
import { defaultTheme, type ChartTheme } from "./theme.js";

export interface ScatterDatum {
  x: number;
  y: number;
  color?: string;
}

export interface ScatterOptions {
  theme?: ChartTheme;
  radius?: number;
  stroke?: string;
}

/**
 * Render scatter plot points.
 */
export function renderScatter(
  g: SVGGElement,
  data: readonly ScatterDatum[],
  scales: BuiltScales,
  options: ScatterOptions = {}
): SVGCircleElement[] {
  const theme = options.theme ?? defaultTheme;
  const radius = Math.max(1, options.radius ?? theme.legendDotSize / 2);
  const selection = select(g);
  selection.selectAll("circle.series--scatter").remove();

  const circles: SVGCircleElement[] = [];
  for (const datum of data) {
    if (!Number.isFinite(datum.x) || !Number.isFinite(datum.y)) {
      continue;
    }
    const circle = selection
      .append("circle")
      .attr("class", "series series--scatter")
      .attr("cx", positionX(scales.x, datum.x))
      .attr("cy", scales.y(datum.y))
      .attr("r", radius)
      .attr("fill", "none")
      .attr("stroke", datum.color ?? options.stroke ?? theme.accent)
      .attr("stroke-width", theme.lineWidth)
      .attr("opacity", 0.9)
      .node();
    if (circle) {
      circles.push(circle);
    }
  }
  return circles;
}
