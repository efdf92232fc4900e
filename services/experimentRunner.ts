import type { ComparisonDataset, ConvergenceResult, ErrorSummary, ExactCurve, SolverResult } from '../types';
import { FINE_MESH_INTERVALS } from '../constants';
import { InvalidParameterError } from '../errors';
import { errorNorm, exact, schemeName, solve } from './decaySolver';

const summarize = (run: SolverResult, I: number, a: number): ErrorSummary => ({
  theta: run.theta,
  methodName: run.methodName,
  Nt: run.Nt,
  dt: run.dt,
  T: run.T,
  error: errorNorm(run.u, run.t, I, a, run.dt),
});

// Overlay curve on its own mesh; it never takes part in error computation.
const sampleExactCurve = (I: number, a: number, T: number): ExactCurve => {
  const t = Array.from({ length: FINE_MESH_INTERVALS + 1 }, (_, i) => (i * T) / FINE_MESH_INTERVALS);
  return { t, u: exact(t, I, a) };
};

/**
 * Runs the solver once per theta with the same I, a, T and dt.
 * Every run is the unmodified result of `solve`, and the first invalid
 * configuration aborts the sweep.
 */
export const compare = (I: number, a: number, T: number, dt: number, thetas: readonly number[]): ComparisonDataset => {
  if (thetas.length === 0) {
    throw new InvalidParameterError('at least one theta is required', 'thetas', thetas);
  }

  const runs = new Map<number, SolverResult>();
  for (const theta of thetas) {
    if (!runs.has(theta)) {
      runs.set(theta, solve(I, a, T, dt, theta));
    }
  }

  // All runs share dt and T, so they share the realized horizon.
  const [firstRun] = runs.values();
  return {
    params: { I, a, T, dt },
    runs,
    exact: sampleExactCurve(I, a, firstRun.T),
  };
};

export const errorTable = (dataset: ComparisonDataset): ErrorSummary[] => {
  const { I, a } = dataset.params;
  return [...dataset.runs.values()].map(run => summarize(run, I, a));
};

/**
 * Observed order of accuracy for one scheme over a sequence of time steps:
 * r_i = ln(E_{i-1}/E_i) / ln(dt_{i-1}/dt_i).
 */
export const convergenceRates = (
  I: number,
  a: number,
  T: number,
  theta: number,
  dts: readonly number[],
): ConvergenceResult => {
  if (dts.length < 2) {
    throw new InvalidParameterError('at least two time steps are needed to estimate a rate', 'dts', dts);
  }
  if (new Set(dts).size !== dts.length) {
    throw new InvalidParameterError('time steps must be distinct', 'dts', dts);
  }

  const runs = dts.map(dt => summarize(solve(I, a, T, dt, theta), I, a));
  const rates: number[] = [];
  for (let i = 1; i < runs.length; i++) {
    const prev = runs[i - 1];
    const curr = runs[i];
    rates.push(Math.log(prev.error / curr.error) / Math.log(prev.dt / curr.dt));
  }

  return { theta, methodName: schemeName(theta), runs, rates };
};
