/** @vitest-environment jsdom */
import { describe, expect, it } from "vitest";
import { buildScales, drawAxes, normalizeNumericDomain, positionX } from "../src/lib/charts/axes.js";
import { computeInnerSize } from "../src/lib/charts/frame.js";
import {
  type ChartTheme,
  darkTheme,
  defaultTheme,
  formatCurrency,
  formatNumber,
  resolveColor
} from "../src/lib/charts/theme.js";
import { GENRES } from "../src/lib/movies/types.js";

const SVG_NS = "http://www.w3.org/2000/svg";

describe("chart theme", () => {
  it("provides complete token sets", () => {
    const themes: ChartTheme[] = [defaultTheme, darkTheme];
    for (const theme of themes) {
      expect(typeof theme.fontFamily).toBe("string");
      expect(typeof theme.fontSize).toBe("number");
      expect(typeof theme.highlight).toBe("string");
      expect(theme.categorical.length).toBeGreaterThanOrEqual(GENRES.length);
    }
  });

  it("gives every genre its own series color", () => {
    for (const theme of [defaultTheme, darkTheme]) {
      const colors = GENRES.map((_, index) => resolveColor(index, theme));
      expect(new Set(colors).size).toBe(GENRES.length);
    }
  });

  it("formats compact numbers", () => {
    expect(formatNumber(1234)).toBe("1.2k");
    expect(formatNumber(950)).toBe("950");
    expect(formatNumber(2.5e9)).toBe("2.5B");
    expect(formatNumber(Number.NaN)).toBe("");
    expect(formatCurrency(1234567)).toBe("$1,234,567");
  });

  it("wraps series colors around the palette", () => {
    const size = defaultTheme.categorical.length;
    expect(resolveColor(size, defaultTheme)).toBe(defaultTheme.categorical[0]);
    expect(resolveColor(-1, defaultTheme)).toBe(defaultTheme.categorical[size - 1]);
    expect(resolveColor(3, { ...defaultTheme, categorical: [] })).toBe(defaultTheme.accent);
  });

  it("keeps tick density within bounds", () => {
    const container = document.createElementNS(SVG_NS, "svg");
    const group = document.createElementNS(SVG_NS, "g");
    container.appendChild(group);

    const { iw, ih } = computeInnerSize(320, 240, { top: 0, right: 0, bottom: 0, left: 0 });

    const scales = buildScales({
      x: { type: "linear", domain: [0, 100], range: [0, iw] },
      y: { type: "linear", domain: [0, 100], range: [ih, 0] }
    });

    drawAxes(group, scales, {
      innerWidth: iw,
      innerHeight: ih,
      theme: defaultTheme
    });

    const xTicks = group.querySelectorAll(".axis--x .tick").length;
    const yTicks = group.querySelectorAll(".axis--y .tick").length;
    const maxXTicks = Math.max(2, Math.round(iw / 80)) + 2;
    const maxYTicks = Math.max(2, Math.round(ih / 60)) + 2;
    expect(xTicks).toBeLessThanOrEqual(maxXTicks);
    expect(yTicks).toBeLessThanOrEqual(maxYTicks);
  });

  it("thins dense year axes", () => {
    const group = document.createElementNS(SVG_NS, "g");
    const years = Array.from({ length: 20 }, (_, index) => String(1990 + index));
    const scales = buildScales({
      x: { type: "point", domain: years, range: [0, 400] },
      y: { type: "linear", domain: [0, 1], range: [200, 0] }
    });

    drawAxes(group, scales, { innerWidth: 400, innerHeight: 200, tickCount: { x: 5 } });

    const labels = [...group.querySelectorAll(".axis--x .tick text")].map((node) => node.textContent);
    expect(labels).toEqual(["1990", "1994", "1998", "2002", "2006"]);
  });

  it("positions band values at their centre", () => {
    const { x } = buildScales({
      x: { type: "band", domain: ["a", "b"], range: [0, 100], paddingInner: 0, paddingOuter: 0 },
      y: { type: "linear", domain: [0, 1], range: [1, 0] }
    });
    expect(positionX(x, "b")).toBe(75);
    expect(() => positionX(x, "c")).toThrow("Unable to position c on band scale");
  });

  it("widens degenerate numeric domains", () => {
    expect(normalizeNumericDomain([])).toEqual([0, 1]);
    expect(normalizeNumericDomain([4, 4])).toEqual([3, 5]);
    expect(normalizeNumericDomain([7, Number.NaN, -2])).toEqual([-2, 7]);
  });
});
