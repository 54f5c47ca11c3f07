export const mean = (vals: readonly number[]): number =>
  vals.reduce((a, b) => a + b, 0) / Math.max(vals.length, 1);

/** Sample standard deviation (n - 1); NaN when fewer than two values. */
export function sampleStdDev(vals: readonly number[]): number {
  if (vals.length < 2) return NaN;
  const m = mean(vals);
  const ss = vals.reduce((a, v) => a + (v - m) ** 2, 0);
  return Math.sqrt(ss / (vals.length - 1));
}

/**
 * Pearson's r. Returns NaN when either side has zero variance or the
 * lengths differ.
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
  if (xs.length !== ys.length || xs.length < 2) return NaN;
  const mx = mean(xs);
  const my = mean(ys);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return NaN;
  const r = sxy / Math.sqrt(sxx * syy);
  return Math.min(1, Math.max(-1, r));
}

export type LinearFit = { slope: number; intercept: number };

/** Ordinary least squares of ys on xs, xs left in their own units. */
export function ols(xs: readonly number[], ys: readonly number[]): LinearFit {
  const mx = mean(xs);
  const my = mean(ys);
  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < xs.length; i++) {
    sxy += (xs[i] - mx) * (ys[i] - my);
    sxx += (xs[i] - mx) ** 2;
  }
  const slope = sxx > 0 ? sxy / sxx : NaN;
  return { slope, intercept: my - slope * mx };
}
