export { amplificationFactor, errorNorm, exact, schemeName, solve } from './services/decaySolver';
export { compare, convergenceRates, errorTable } from './services/experimentRunner';
export { legendLabels, toComparisonPlotData } from './services/plotData';
export { InputShapeMismatchError, InvalidParameterError } from './errors';
export { DEFAULT_SWEEP_PARAMS, DEFAULT_THETAS, FINE_MESH_INTERVALS, MAX_MESH_STEPS, NAMED_SCHEMES } from './constants';
export { LINE_COLORS } from './types';
export type {
  ComparisonDataset,
  ConvergenceResult,
  DecayParams,
  ErrorSummary,
  ExactCurve,
  PlotDataItem,
  SolverResult,
  SweepParams,
} from './types';
