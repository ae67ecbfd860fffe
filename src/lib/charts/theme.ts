/**
 * Chart theme tokens and helpers.
 * @module charts/theme
 */

import { format as d3Format, schemeSet3, schemeTableau10 } from "d3";

/**
 * Genre/variable series colors. Long enough that every genre in one chart
 * gets its own color.
 */
const LIGHT_CATEGORICAL: readonly string[] = [...schemeTableau10, ...schemeSet3];

const DARK_CATEGORICAL: readonly string[] = [...schemeSet3, ...schemeTableau10];

/** Theme token contract. */
export interface ChartTheme {
  fontFamily: string;
  fontSize: number;
  lineWidth: number;
  gridWidth: number;
  gridAlpha: number;
  barRadius: number;
  legendDotSize: number;
  fg: string;
  fgMuted: string;
  bg: string;
  grid: string;
  accent: string;
  /** Overlay color for fitted lines drawn over points. */
  highlight: string;
  categorical: readonly string[];
}

export const defaultTheme: ChartTheme = {
  fontFamily: "var(--chart-font-family, 'Inter', 'Segoe UI', 'Helvetica Neue', sans-serif)",
  fontSize: 12,
  lineWidth: 2,
  gridWidth: 1,
  gridAlpha: 0.8,
  barRadius: 2,
  legendDotSize: 10,
  fg: "var(--chart-fg, #1d2733)",
  fgMuted: "var(--chart-fg-muted, #5b6b7c)",
  bg: "var(--chart-bg, #ffffff)",
  grid: "var(--chart-grid, #dde3ea)",
  accent: "var(--chart-accent, #1f4e79)",
  highlight: "var(--chart-highlight, #d62828)",
  categorical: LIGHT_CATEGORICAL,
};

export const darkTheme: ChartTheme = {
  ...defaultTheme,
  gridAlpha: 0.5,
  fg: "var(--chart-fg-dark, #eef2f6)",
  fgMuted: "var(--chart-fg-muted-dark, #9aa8b6)",
  bg: "var(--chart-bg-dark, #111a22)",
  grid: "var(--chart-grid-dark, #2b3a47)",
  accent: "var(--chart-accent-dark, #8ecae6)",
  highlight: "var(--chart-highlight-dark, #ff6b6b)",
  categorical: DARK_CATEGORICAL,
};

const THEME_VARIABLES: Record<string, (theme: ChartTheme) => string> = {
  "--chart-font-family": (theme) => theme.fontFamily,
  "--chart-font-size": (theme) => String(theme.fontSize),
  "--chart-fg": (theme) => theme.fg,
  "--chart-fg-muted": (theme) => theme.fgMuted,
  "--chart-bg": (theme) => theme.bg,
  "--chart-grid": (theme) => theme.grid,
  "--chart-accent": (theme) => theme.accent,
  "--chart-highlight": (theme) => theme.highlight,
};

/**
 * Apply CSS custom properties for the provided theme to a DOM element.
 */
export function applyTheme(root: HTMLElement, theme: ChartTheme = defaultTheme): void {
  const style = root.style;
  Object.entries(THEME_VARIABLES).forEach(([name, accessor]) => {
    style.setProperty(name, accessor(theme));
  });
  theme.categorical.forEach((value, index) => {
    style.setProperty(`--chart-categorical-${index}`, value);
  });
}

/**
 * Resolve a series color. Indexes wrap around the palette.
 */
export function resolveColor(index: number, theme: ChartTheme = defaultTheme): string {
  const values = theme.categorical;
  if (!values.length) {
    return theme.accent;
  }
  const normalized = ((index % values.length) + values.length) % values.length;
  return values[normalized];
}

/**
 * Compact tick labels: `950`, `1.2k`, `3.4M`, `1.1B`.
 */
export function formatNumber(value: number, digits = 1): string {
  if (!Number.isFinite(value)) return "";
  const abs = Math.abs(value);
  if (abs >= 1000) {
    const precision = Math.max(1, digits + 1);
    return d3Format(`.${precision}s`)(value).replace("G", "B");
  }
  return d3Format(`.${Math.max(0, digits)}~f`)(value);
}

/** Dollar amounts for tables and tooltips, e.g. `$1,234,567`. */
export function formatCurrency(value: number): string {
  if (!Number.isFinite(value)) return "";
  return d3Format("$,.0f")(value);
}
