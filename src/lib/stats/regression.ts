/**
 * Ordinary least-squares line fit.
 * @module stats/regression
 */

import { mean } from "d3";

import type { RegressionVariable, SpeciesRecord } from "../species/types.js";

export type LinearFit = {
  slope: number;
  intercept: number;
};

export type RegressionRow = {
  x: number;
  y: number;
  predicted: number;
};

/**
 * Fit `y = slope * x + intercept`. Returns null without data. When every x is
 * equal the slope is 0 and the line sits at mean(y).
 */
export function fitOls(xs: readonly number[], ys: readonly number[]): LinearFit | null {
  if (xs.length !== ys.length) {
    throw new RangeError(`fitOls expects equal lengths, got ${xs.length} and ${ys.length}`);
  }
  const meanX = mean(xs);
  const meanY = mean(ys);
  if (meanX === undefined || meanY === undefined) {
    return null;
  }

  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < xs.length; i += 1) {
    const dx = xs[i] - meanX;
    sxy += dx * (ys[i] - meanY);
    sxx += dx * dx;
  }

  if (sxx === 0) {
    return { slope: 0, intercept: meanY };
  }
  const slope = sxy / sxx;
  return { slope, intercept: meanY - slope * meanX };
}

export function predict(fit: LinearFit, x: number): number {
  return fit.slope * x + fit.intercept;
}

export type RegressionResult = {
  fit: LinearFit;
  rows: RegressionRow[];
};

export function regressionRows(
  records: readonly SpeciesRecord[],
  xVar: RegressionVariable,
  yVar: RegressionVariable,
): RegressionResult | null {
  const xs = records.map((record) => record[xVar]);
  const ys = records.map((record) => record[yVar]);
  const fit = fitOls(xs, ys);
  if (!fit) {
    return null;
  }
  return {
    fit,
    rows: xs.map((x, index) => ({ x, y: ys[index], predicted: predict(fit, x) })),
  };
}

export function describeFit(fit: LinearFit, digits = 3): string {
  const slope = fit.slope.toFixed(digits);
  const sign = fit.intercept < 0 ? "-" : "+";
  return `y = ${slope}·x ${sign} ${Math.abs(fit.intercept).toFixed(digits)}`;
}
