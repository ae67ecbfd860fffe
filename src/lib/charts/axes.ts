/**
 * Axes and scale helpers.
 * @module charts/axes
 */

import { axisBottom, axisLeft, extent, scaleBand, scaleLinear, scalePoint, select } from "d3";
import type { Axis, AxisDomain, ScaleBand, ScaleLinear, ScalePoint, Selection } from "d3";
import { pixelAlign } from "./frame.js";
import { defaultTheme, formatNumber, type ChartTheme } from "./theme.js";

export type LinearScale = ScaleLinear<number, number>;
export type BandScale = ScaleBand<string>;
export type PointScale = ScalePoint<string>;

export type LinearScaleDefinition = {
  type: "linear";
  domain: readonly number[];
  range: readonly [number, number];
  clamp?: boolean;
  nice?: boolean;
};

export type ScaleDefinition =
  | LinearScaleDefinition
  | {
      type: "band";
      domain: readonly string[];
      range: readonly [number, number];
      paddingInner?: number;
      paddingOuter?: number;
    }
  | {
      type: "point";
      domain: readonly string[];
      range: readonly [number, number];
      padding?: number;
    };

export type BuiltScale =
  | { type: "linear"; scale: LinearScale }
  | { type: "band"; scale: BandScale }
  | { type: "point"; scale: PointScale };

export interface BuildScalesOptions {
  x: ScaleDefinition;
  y: LinearScaleDefinition;
}

/** Charts here always plot a quantity on y. */
export interface BuiltScales {
  x: BuiltScale;
  y: LinearScale;
}

export function buildScales(options: BuildScalesOptions): BuiltScales {
  return {
    x: buildScale(options.x),
    y: buildLinear(options.y),
  };
}

function buildLinear(definition: LinearScaleDefinition): LinearScale {
  const scale = scaleLinear()
    .domain(normalizeNumericDomain(definition.domain))
    .range(definition.range)
    .clamp(Boolean(definition.clamp));
  if (definition.nice !== false) {
    scale.nice();
  }
  return scale;
}

function buildScale(definition: ScaleDefinition): BuiltScale {
  switch (definition.type) {
    case "linear":
      return { type: "linear", scale: buildLinear(definition) };
    case "band":
      return {
        type: "band",
        scale: scaleBand<string>()
          .domain(definition.domain)
          .range(definition.range)
          .paddingInner(definition.paddingInner ?? 0.2)
          .paddingOuter(definition.paddingOuter ?? 0.1),
      };
    case "point":
      return {
        type: "point",
        scale: scalePoint<string>()
          .domain(definition.domain)
          .range(definition.range)
          .padding(definition.padding ?? 0.5),
      };
  }
}

/** Finite extent, widened by one unit either side when it collapses. */
export function normalizeNumericDomain(domain: readonly number[]): [number, number] {
  const [min, max] = extent(domain.filter((d) => Number.isFinite(d)));
  if (min === undefined || max === undefined) {
    return [0, 1];
  }
  if (min === max) {
    return [min - 1, max + 1];
  }
  return [min, max];
}

/**
 * Pixel position of an x value: band centre, point, or linear.
 */
export function positionX(built: BuiltScale, value: string | number): number {
  switch (built.type) {
    case "linear":
      return built.scale(Number(value));
    case "band": {
      const start = built.scale(String(value));
      if (start === undefined) {
        throw new Error(`Unable to position ${String(value)} on band scale`);
      }
      return start + built.scale.bandwidth() / 2;
    }
    case "point": {
      const point = built.scale(String(value));
      if (point === undefined) {
        throw new Error(`Unable to position ${String(value)} on point scale`);
      }
      return point;
    }
  }
}

export type AxisFormatter = (value: string | number, index: number) => string;

export interface AxisOptions {
  innerWidth: number;
  innerHeight: number;
  theme?: ChartTheme;
  xLabel?: string;
  yLabel?: string;
  tickSize?: number;
  tickPadding?: number;
  tickCount?: { x?: number; y?: number };
  format?: { x?: AxisFormatter; y?: AxisFormatter };
}

type GroupSelection = Selection<SVGGElement, unknown, null, undefined>;

const numericFormatter: AxisFormatter = (value) => formatNumber(Number(value));
const categoricalFormatter: AxisFormatter = (value) => String(value);

function styleAxis<Domain extends AxisDomain>(axis: Axis<Domain>, size: number, padding: number): Axis<Domain> {
  return axis.tickSize(size).tickPadding(padding);
}

function callBottomAxis(
  group: GroupSelection,
  built: BuiltScale,
  ticks: number,
  options: { size: number; padding: number; format?: AxisFormatter }
): void {
  switch (built.type) {
    case "linear": {
      const format = options.format ?? numericFormatter;
      const axis = styleAxis(axisBottom(built.scale), options.size, options.padding)
        .ticks(ticks)
        .tickFormat((value, index) => format(value.valueOf(), index));
      group.call(axis);
      return;
    }
    case "band": {
      const format = options.format ?? categoricalFormatter;
      group.call(
        styleAxis(axisBottom(built.scale), options.size, options.padding).tickFormat(format)
      );
      return;
    }
    case "point": {
      const format = options.format ?? categoricalFormatter;
      const domain = built.scale.domain();
      // Thin dense categorical ticks (years) down to roughly `ticks` labels.
      const step = Math.max(1, Math.ceil(domain.length / Math.max(1, ticks)));
      group.call(
        styleAxis(axisBottom(built.scale), options.size, options.padding)
          .tickValues(domain.filter((_, index) => index % step === 0))
          .tickFormat(format)
      );
      return;
    }
  }
}

/**
 * Draw bottom and left axes with consistent styling.
 */
export function drawAxes(g: SVGGElement, scales: BuiltScales, options: AxisOptions): void {
  const theme = options.theme ?? defaultTheme;
  const selection = select(g);
  const tickSize = options.tickSize ?? 6;
  const tickPadding = options.tickPadding ?? 8;
  const xTickCount = Math.max(2, options.tickCount?.x ?? Math.round(options.innerWidth / 80));
  const yTickCount = Math.max(2, options.tickCount?.y ?? Math.round(options.innerHeight / 60));

  const xGroup = ensureAxisGroup(selection, "x");
  xGroup.attr("transform", `translate(0, ${pixelAlign(options.innerHeight)})`);
  callBottomAxis(xGroup, scales.x, xTickCount, {
    size: tickSize,
    padding: tickPadding,
    format: options.format?.x,
  });

  const yFormat = options.format?.y ?? numericFormatter;
  const yAxis = styleAxis(axisLeft(scales.y), tickSize, tickPadding)
    .ticks(yTickCount)
    .tickFormat((value, index) => yFormat(value.valueOf(), index));
  const yGroup = ensureAxisGroup(selection, "y");
  yGroup.attr("transform", `translate(${pixelAlign(0)}, 0)`).call(yAxis);

  applyAxisStyles(xGroup, theme);
  applyAxisStyles(yGroup, theme);

  updateAxisLabel(xGroup, options.xLabel, options.innerWidth, theme, "x");
  updateAxisLabel(yGroup, options.yLabel, options.innerHeight, theme, "y");
}

function ensureAxisGroup(selection: GroupSelection, axis: "x" | "y"): GroupSelection {
  const existing = selection.select<SVGGElement>(`g.axis--${axis}`).node();
  const node = existing ?? selection.append("g").attr("class", `axis axis--${axis}`).node();
  if (!node) {
    throw new Error(`Unable to create ${axis} axis group`);
  }
  return select(node);
}

function applyAxisStyles(selection: GroupSelection, theme: ChartTheme): void {
  selection
    .attr("shape-rendering", "crispEdges")
    .style("font-family", theme.fontFamily)
    .style("font-size", `${theme.fontSize}px`)
    .style("color", theme.fgMuted);

  selection
    .selectAll("path, line")
    .attr("stroke-width", theme.gridWidth)
    .attr("stroke", theme.grid);

  selection.selectAll("text").attr("fill", theme.fgMuted);
}

function updateAxisLabel(
  group: GroupSelection,
  label: string | undefined,
  size: number,
  theme: ChartTheme,
  axis: "x" | "y"
): void {
  group.selectAll(`text.axis-label--${axis}`).remove();
  if (!label) {
    return;
  }
  const text = group
    .append("text")
    .attr("class", `axis-label axis-label--${axis}`)
    .attr("fill", theme.fg)
    .attr("font-weight", 600)
    .attr("text-anchor", "middle")
    .style("font-family", theme.fontFamily)
    .style("font-size", `${theme.fontSize}px`)
    .text(label);

  if (axis === "y") {
    text.attr("transform", `rotate(-90) translate(${-size / 2}, ${-52})`);
  } else {
    text.attr("x", size / 2).attr("y", 40);
  }
}

export interface GridOptions {
  innerWidth: number;
  innerHeight: number;
  theme?: ChartTheme;
  tickCount?: number;
}

/**
 * Render horizontal gridlines using the y-scale.
 */
export function drawGrid(g: SVGGElement, scales: BuiltScales, options: GridOptions): void {
  const theme = options.theme ?? defaultTheme;
  const tickCount = Math.max(2, options.tickCount ?? Math.round(options.innerHeight / 60));
  const axis = axisLeft(scales.y)
    .tickFormat(() => "")
    .tickSize(-options.innerWidth)
    .ticks(tickCount);
  const gridGroup = select(g).attr("class", "grid").attr("transform", `translate(${pixelAlign(0)}, 0)`);
  gridGroup.call(axis);

  gridGroup
    .selectAll("line")
    .attr("stroke", theme.grid)
    .attr("stroke-width", theme.gridWidth)
    .attr("stroke-opacity", theme.gridAlpha)
    .attr("shape-rendering", "crispEdges");

  gridGroup.selectAll("path").remove();
}

export interface LegendItem {
  label: string;
  color?: string;
}

export interface LegendOptions {
  width: number;
  theme?: ChartTheme;
  swatchSize?: number;
  gap?: number;
}

/**
 * Draw a horizontal legend that wraps at the provided width.
 */
export function drawLegend(g: SVGGElement, items: readonly LegendItem[], options: LegendOptions): void {
  const theme = options.theme ?? defaultTheme;
  const swatchSize = options.swatchSize ?? theme.legendDotSize;
  const gap = options.gap ?? 12;
  const width = Math.max(0, options.width);
  const selection = select(g).attr("class", "legend").attr("role", "list");

  selection.selectAll("g.legend-item").remove();

  const lineHeight = theme.fontSize * 1.6;
  let cursorX = 0;
  let cursorY = 0;

  for (const item of items) {
    const approxWidth = swatchSize + gap / 2 + item.label.length * (theme.fontSize * 0.6);
    if (cursorX + approxWidth > width && cursorX > 0) {
      cursorX = 0;
      cursorY += lineHeight;
    }
    const group = selection
      .append("g")
      .attr("class", "legend-item")
      .attr("role", "listitem")
      .attr("aria-label", item.label)
      .attr("transform", `translate(${cursorX}, ${cursorY})`);

    group
      .append("rect")
      .attr("class", "legend-swatch")
      .attr("width", swatchSize)
      .attr("height", swatchSize)
      .attr("rx", Math.min(theme.barRadius, swatchSize / 2))
      .attr("fill", item.color ?? theme.accent);

    group
      .append("text")
      .attr("class", "legend-label")
      .attr("x", swatchSize + gap / 2)
      .attr("y", swatchSize / 2)
      .attr("dy", "0.35em")
      .style("font-family", theme.fontFamily)
      .style("font-size", `${theme.fontSize}px`)
      .style("fill", theme.fg)
      .text(item.label);

    cursorX += approxWidth + gap;
  }
}
