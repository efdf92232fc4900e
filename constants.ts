import type { NumberFieldConfig, ParameterConfig, SweepParams } from './types';

export const DEFAULT_SWEEP_PARAMS: SweepParams = {
  I: 1,
  a: 2,
  T: 4,
  dt: 0.4,
};

export const DEFAULT_THETAS: readonly number[] = [0, 1, 0.5];

export const NAMED_SCHEMES: ReadonlyMap<number, string> = new Map([
  [0, 'Forward Euler'],
  [1, 'Backward Euler'],
  [0.5, 'Crank-Nicolson'],
]);

export const EXACT_LABEL = 'Exact';

export const FINE_MESH_INTERVALS = 1001; // subintervals of the exact overlay curve

export const MAX_MESH_STEPS = 10_000_000;

export const PARAMETER_CONFIGS: ParameterConfig[] = [
  { id: 'I', label: 'Initial Value', defaultValue: DEFAULT_SWEEP_PARAMS.I },
  { id: 'a', label: 'Decay Rate', defaultValue: DEFAULT_SWEEP_PARAMS.a },
  { id: 'T', label: 'Time Horizon', defaultValue: DEFAULT_SWEEP_PARAMS.T, min: 0, exclusiveMin: true },
  { id: 'dt', label: 'Time Step', defaultValue: DEFAULT_SWEEP_PARAMS.dt, min: 0, exclusiveMin: true },
];

export const THETA_LIST_CONFIG: NumberFieldConfig = { label: 'Theta', min: 0, max: 1 };

export const DT_LIST_CONFIG: NumberFieldConfig = { label: 'Time Step', min: 0, exclusiveMin: true };
