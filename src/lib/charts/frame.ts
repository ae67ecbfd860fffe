/**
 * Chart framing utilities.
 * @module charts/frame
 */

import { applyTheme, defaultTheme } from "./theme.js";
import type { ChartTheme } from "./theme.js";

export interface Margin {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface CreateSVGOptions {
  title?: string;
  description?: string;
  id?: string;
  theme?: ChartTheme;
}

const SVG_NS = "http://www.w3.org/2000/svg";

/**
 * Create an accessible, responsive SVG element within a container.
 *
 * @param width - Initial width in pixels.
 * @param height - Initial height in pixels.
 */
export function createSVG(
  container: HTMLElement,
  width: number,
  height: number,
  options: CreateSVGOptions = {}
): SVGSVGElement {
  const doc = container.ownerDocument ?? document;
  const theme = options.theme ?? defaultTheme;
  container.classList.add("chart-surface");
  applyTheme(container, theme);
  const svg = doc.createElementNS(SVG_NS, "svg");
  const existingCount = container.querySelectorAll("svg.chart").length;
  const baseId =
    options.id ??
    `${container.id || container.getAttribute("data-chart-id") || "chart"}-${existingCount + 1}`;
  const titleId = `${baseId}-title`;
  const descId = `${baseId}-desc`;

  svg.setAttribute("class", "chart");
  svg.setAttribute("role", "img");
  svg.setAttribute("focusable", "false");
  svg.setAttribute("viewBox", `0 0 ${Math.max(1, width)} ${Math.max(1, height)}`);
  svg.setAttribute("preserveAspectRatio", "xMidYMid meet");
  svg.setAttribute("data-chart-id", baseId);

  const title = doc.createElementNS(SVG_NS, "title");
  title.textContent = options.title ?? "Data visualization";
  title.id = titleId;
  const desc = doc.createElementNS(SVG_NS, "desc");
  desc.textContent = options.description ?? "An interactive chart";
  desc.id = descId;
  svg.append(title, desc);
  svg.setAttribute("aria-labelledby", `${titleId} ${descId}`);

  container.appendChild(svg);
  return svg;
}

/**
 * Compute inner chart dimensions based on margin convention.
 */
export function computeInnerSize(
  width: number,
  height: number,
  margin: Margin
): { iw: number; ih: number } {
  const iw = Math.max(0, width - margin.left - margin.right);
  const ih = Math.max(0, height - margin.top - margin.bottom);
  return { iw, ih };
}

export interface Plot {
  svg: SVGSVGElement;
  /** Group translated by the margins; draw series here. */
  plot: SVGGElement;
  iw: number;
  ih: number;
  /** Add a fresh child group to the plot area. */
  layer(className: string): SVGGElement;
}

/** SVG plus a margin-translated plot group. */
export function createPlot(
  container: HTMLElement,
  width: number,
  height: number,
  margin: Margin,
  options: CreateSVGOptions = {}
): Plot {
  const svg = createSVG(container, width, height, options);
  const doc = svg.ownerDocument;
  const plot = doc.createElementNS(SVG_NS, "g");
  plot.setAttribute("class", "plot");
  plot.setAttribute("transform", `translate(${margin.left}, ${margin.top})`);
  svg.appendChild(plot);
  const { iw, ih } = computeInnerSize(width, height, margin);
  return {
    svg,
    plot,
    iw,
    ih,
    layer(className: string) {
      const group = doc.createElementNS(SVG_NS, "g");
      group.setAttribute("class", className);
      plot.appendChild(group);
      return group;
    },
  };
}

/**
 * Align 1px strokes to device pixels for crisp rendering.
 */
export function pixelAlign(value: number): number {
  return Math.round(value) + 0.5;
}
