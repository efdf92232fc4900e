export interface DecayParams {
  I: number; // initial value u(0)
  a: number; // decay rate
  T: number; // requested horizon
  dt: number; // time step
  theta: number; // scheme weight, 0 = explicit, 1 = implicit
}

export type SweepParams = Omit<DecayParams, 'theta'>;

export interface SolverResult {
  u: number[]; // solution values aligned with t
  t: number[]; // mesh points
  Nt: number; // number of time steps
  dt: number;
  T: number; // realized horizon Nt * dt
  requestedT: number;
  theta: number;
  methodName: string;
  amplificationFactor: number;
}

export interface ExactCurve {
  t: number[];
  u: number[];
}

export interface ComparisonDataset {
  params: SweepParams;
  runs: Map<number, SolverResult>; // keyed by theta, in request order
  exact: ExactCurve; // fine mesh, plotting only
}

export interface ErrorSummary {
  theta: number;
  methodName: string;
  Nt: number;
  dt: number;
  T: number;
  error: number;
}

export interface ConvergenceResult {
  theta: number;
  methodName: string;
  runs: ErrorSummary[];
  rates: number[]; // observed order between consecutive runs
}

export interface PlotDataItem {
  t: number;
  [key: string]: number | null; // null where a series has no point at this t
}

export const LINE_COLORS = ['#e74c3c', '#e67e22', '#f1c40f', '#2ecc71', '#1abc9c', '#3498db', '#9b59b6', '#38598b', '#d35400'];

export interface NumberFieldConfig {
  label: string;
  min?: number;
  max?: number;
  exclusiveMin?: boolean; // min itself is rejected
}

export interface ParameterConfig extends NumberFieldConfig {
  id: keyof SweepParams;
  defaultValue: number;
}
