/**
 * Grouped bar series renderer.
 * @module charts/bar
 */

import { scaleBand, select } from "d3";
import type { BuiltScales } from "./axes.js";
import { defaultTheme, resolveColor, type ChartTheme } from "./theme.js";

export interface GroupedBarDatum {
  /** Outer category on the x band scale. */
  group: string;
  /** Series key inside the group. */
  key: string;
  value: number;
}

export interface GroupedBarOptions {
  /** Series order; sets the sub-band order and colors. */
  keys: readonly string[];
  innerHeight: number;
  theme?: ChartTheme;
  baseline?: number;
  colors?: (key: string, index: number) => string;
  onHover?: (datum: GroupedBarDatum, rect: SVGRectElement) => void;
  onLeave?: () => void;
}

/**
 * Render side-by-side bars, one sub-band per key within each x band. The x
 * scale must be a band scale.
 */
export function renderGroupedBars(
  g: SVGGElement,
  data: readonly GroupedBarDatum[],
  scales: BuiltScales,
  options: GroupedBarOptions
): SVGRectElement[] {
  if (scales.x.type !== "band") {
    throw new Error("Grouped bars need a band x scale");
  }
  const outer = scales.x.scale;
  const theme = options.theme ?? defaultTheme;
  const colorFor = options.colors ?? ((_key: string, index: number) => resolveColor(index, theme));
  const inner = scaleBand<string>()
    .domain(options.keys)
    .range([0, outer.bandwidth()])
    .padding(0.08);
  const baseline = scales.y(options.baseline ?? 0);

  const selection = select(g);
  selection.selectAll("rect.series--bar").remove();

  const rects: SVGRectElement[] = [];
  for (const datum of data) {
    const groupStart = outer(datum.group);
    const keyIndex = options.keys.indexOf(datum.key);
    const offset = inner(datum.key);
    if (groupStart === undefined || offset === undefined || keyIndex < 0) {
      continue;
    }
    const valueY = scales.y(datum.value);
    const positive = valueY <= baseline;
    const height = Math.abs(baseline - valueY);
    const y = positive ? valueY : baseline;
    const rect = selection
      .append("rect")
      .attr("class", "series series--bar")
      .attr("data-group", datum.group)
      .attr("data-key", datum.key)
      .attr("x", groupStart + offset)
      .attr("y", Math.min(options.innerHeight, y))
      .attr("width", Math.max(1, inner.bandwidth()))
      .attr("height", height)
      .attr("rx", theme.barRadius)
      .attr("fill", colorFor(datum.key, keyIndex))
      .node();
    if (!rect) {
      continue;
    }
    const { onHover, onLeave } = options;
    if (onHover) {
      rect.addEventListener("mouseenter", () => onHover(datum, rect));
      rect.addEventListener("focus", () => onHover(datum, rect));
      rect.setAttribute("tabindex", "0");
    }
    if (onLeave) {
      rect.addEventListener("mouseleave", onLeave);
      rect.addEventListener("blur", onLeave);
    }
    rects.push(rect);
  }
  return rects;
}
