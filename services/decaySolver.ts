import type { SolverResult } from '../types';
import { MAX_MESH_STEPS, NAMED_SCHEMES } from '../constants';
import { InputShapeMismatchError, InvalidParameterError } from '../errors';

export const schemeName = (theta: number): string => NAMED_SCHEMES.get(theta) ?? `theta=${theta}`;

/**
 * Per-step ratio u[n+1]/u[n] of the theta-method for u' = -a*u.
 * theta = 0, 1 and 0.5 give Forward Euler, Backward Euler and Crank-Nicolson.
 */
export const amplificationFactor = (a: number, dt: number, theta: number): number =>
  (1 - (1 - theta) * a * dt) / (1 + theta * a * dt);

const requireFinite = (name: string, value: number): void => {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(`${name} must be a finite number, got ${value}`, name, value);
  }
};

/** Closed-form solution I*exp(-a*t), pointwise over a mesh or for a single time. */
export function exact(t: number, I: number, a: number): number;
export function exact(t: readonly number[], I: number, a: number): number[];
export function exact(t: number | readonly number[], I: number, a: number): number | number[] {
  if (typeof t === 'number') {
    return I * Math.exp(-a * t);
  }
  return t.map(t_n => I * Math.exp(-a * t_n));
}

/**
 * Solves u' = -a*u, u(0) = I on [0, T] with the theta-method and constant step dt.
 *
 * The number of steps is Nt = round(T/dt), so the realized horizon Nt*dt can
 * differ from T; it is returned as `T` next to the caller's `requestedT`.
 * Throws InvalidParameterError before computing anything when a precondition fails.
 */
export const solve = (I: number, a: number, T: number, dt: number, theta: number): SolverResult => {
  requireFinite('I', I);
  requireFinite('a', a);
  requireFinite('T', T);
  requireFinite('dt', dt);
  requireFinite('theta', theta);
  if (dt <= 0) {
    throw new InvalidParameterError(`dt must be positive, got ${dt}`, 'dt', dt);
  }
  if (T <= 0) {
    throw new InvalidParameterError(`T must be positive, got ${T}`, 'T', T);
  }
  if (theta < 0 || theta > 1) {
    throw new InvalidParameterError(`theta must lie in [0, 1], got ${theta}`, 'theta', theta);
  }
  const denominator = 1 + theta * a * dt;
  if (denominator <= 0) {
    throw new InvalidParameterError(
      `1 + theta*a*dt must be positive, got ${denominator} (theta=${theta}, a=${a}, dt=${dt})`,
      'theta',
      theta,
    );
  }

  // Nt may be 0 when dt > 2T: the mesh is then the single point t = 0.
  const Nt = Math.round(T / dt);
  if (Nt > MAX_MESH_STEPS) {
    throw new InvalidParameterError(
      `dt=${dt} needs ${Nt} steps to cover T=${T}, more than the ${MAX_MESH_STEPS} a mesh may hold`,
      'dt',
      dt,
    );
  }

  const factor = amplificationFactor(a, dt, theta);
  const t = Array.from({ length: Nt + 1 }, (_, n) => n * dt);
  const u = new Array<number>(Nt + 1);
  u[0] = I;
  for (let n = 0; n < Nt; n++) {
    u[n + 1] = factor * u[n];
  }

  return {
    u,
    t,
    Nt,
    dt,
    T: Nt * dt,
    requestedT: T,
    theta,
    methodName: schemeName(theta),
    amplificationFactor: factor,
  };
};

/**
 * Discrete L2 norm sqrt(dt * sum((exact(t[n]) - u[n])^2)).
 * `dt` must be the step the mesh was built with (SolverResult.dt).
 */
export const errorNorm = (u: readonly number[], t: readonly number[], I: number, a: number, dt: number): number => {
  if (u.length !== t.length) {
    throw new InputShapeMismatchError(u.length, t.length);
  }
  let diffSqSum = 0;
  for (let n = 0; n < u.length; n++) {
    const diff = exact(t[n], I, a) - u[n];
    diffSqSum += diff * diff;
  }
  return Math.sqrt(dt * diffSqSum);
};
