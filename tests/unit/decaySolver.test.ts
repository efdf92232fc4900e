import { describe, it, expect } from 'vitest';
import { amplificationFactor, errorNorm, exact, schemeName, solve } from '../../services/decaySolver';
import { InputShapeMismatchError, InvalidParameterError } from '../../errors';
import { MAX_MESH_STEPS } from '../../constants';

describe('solve', () => {
  it('builds a mesh of Nt+1 points with u[0] = I', () => {
    const { u, t, Nt } = solve(1, 2, 4, 0.2, 1);
    expect(Nt).toBe(20);
    expect(u).toHaveLength(21);
    expect(t).toHaveLength(21);
    expect(u[0]).toBe(1);
    expect(t[0]).toBe(0);
    expect(t[20]).toBeCloseTo(4, 12);
  });

  it('applies the Backward Euler factor 1/(1 + a*dt)', () => {
    const { u, amplificationFactor: factor, methodName } = solve(1, 2, 4, 0.2, 1);
    expect(methodName).toBe('Backward Euler');
    expect(factor).toBe(1 / 1.4);
    expect(u[1]).toBeCloseTo(0.7142857143, 10);
  });

  it('keeps the update real-valued for integral theta, a and dt', () => {
    const { u } = solve(1, 1, 4, 1, 1);
    expect(u[1]).toBe(0.5);
    expect(u[4]).toBe(0.0625);
  });

  it('lets Forward Euler grow or oscillate when a*dt > 1 while Backward Euler decays', () => {
    const forward = solve(1, 2, 4, 0.6, 0).u;
    const backward = solve(1, 2, 4, 0.6, 1).u;

    expect(forward.some((value, n) => n > 0 && value > forward[n - 1])).toBe(true);
    for (let n = 1; n < backward.length; n++) {
      expect(backward[n]).toBeLessThan(backward[n - 1]);
    }
  });

  it('amplifies in magnitude with Forward Euler when a*dt > 2', () => {
    const { u } = solve(1, 2, 5, 1.25, 0);
    expect(u).toHaveLength(5);
    for (let n = 1; n < u.length; n++) {
      expect(Math.abs(u[n])).toBeGreaterThan(Math.abs(u[n - 1]));
    }
  });

  it('reports the realized horizon when T is not a multiple of dt', () => {
    const result = solve(1, 2, 1, 0.3, 0.5);
    expect(result.Nt).toBe(3);
    expect(result.requestedT).toBe(1);
    expect(result.T).toBeCloseTo(0.9, 12);
    expect(result.t[3]).toBe(result.T);
  });

  it('accepts unnamed theta values', () => {
    const result = solve(1, 2, 1, 0.25, 0.25);
    expect(result.methodName).toBe('theta=0.25');
    expect(result.u[1]).toBe(amplificationFactor(2, 0.25, 0.25));
  });

  it('returns fresh arrays on every call', () => {
    const first = solve(1, 2, 4, 0.4, 0.5);
    const second = solve(1, 2, 4, 0.4, 0.5);
    expect(second).toEqual(first);
    expect(second.u).not.toBe(first.u);
  });

  const invalidCases: [string, [number, number, number, number, number]][] = [
    ['dt', [1, 2, 4, 0, 1]],
    ['dt', [1, 2, 4, -0.1, 1]],
    ['T', [1, 2, 0, 0.1, 1]],
    ['T', [1, 2, -4, 0.1, 1]],
    ['theta', [1, 2, 4, 0.1, 1.5]],
    ['theta', [1, 2, 4, 0.1, -0.1]],
    ['I', [Number.NaN, 2, 4, 0.1, 1]],
    ['a', [1, Infinity, 4, 0.1, 1]],
  ];

  it.each(invalidCases)('rejects an invalid %s', (parameter, [I, a, T, dt, theta]) => {
    let thrown: unknown;
    try {
      solve(I, a, T, dt, theta);
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(InvalidParameterError);
    expect(thrown).toHaveProperty('parameter', parameter);
  });

  it('rejects a non-positive denominator 1 + theta*a*dt', () => {
    expect(() => solve(1, -10, 4, 0.2, 1)).toThrow(/1 \+ theta\*a\*dt must be positive/);
    expect(() => solve(1, -5, 4, 0.2, 1)).toThrow(InvalidParameterError);
  });

  it('collapses the mesh to t = 0 when dt exceeds twice T', () => {
    const result = solve(1, 2, 1, 3, 1);
    expect(result.Nt).toBe(0);
    expect(result.u).toEqual([1]);
    expect(result.t).toEqual([0]);
    expect(result.T).toBe(0);
    expect(result.requestedT).toBe(1);
  });

  it('rejects a step that would need more than MAX_MESH_STEPS steps', () => {
    let thrown: unknown;
    try {
      solve(1, 2, 1e10, 1e-3, 1);
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(InvalidParameterError);
    expect(thrown).toHaveProperty('parameter', 'dt');
    expect(String(thrown)).toContain(`more than the ${MAX_MESH_STEPS} a mesh may hold`);
  });
});

describe('exact', () => {
  it('returns I at t = 0 for any decay rate', () => {
    expect(exact(0, 3.7, 5)).toBe(3.7);
    expect(exact(0, -2, -1)).toBe(-2);
  });

  it('evaluates pointwise over a mesh', () => {
    expect(exact([0, 1, 2], 2, 1)).toEqual([2, 2 * Math.exp(-1), 2 * Math.exp(-2)]);
  });
});

describe('errorNorm', () => {
  it('is zero when u is the sampled exact solution', () => {
    const { t, dt } = solve(1, 2, 4, 0.2, 0.5);
    expect(errorNorm(exact(t, 1, 2), t, 1, 2, dt)).toBe(0);
  });

  it('weights the squared differences by dt', () => {
    expect(errorNorm([3, 4], [0, 1], 0, 0, 1)).toBe(5);
    expect(errorNorm([3, 4], [0, 1], 0, 0, 0.25)).toBe(2.5);
  });

  it('is smaller for Crank-Nicolson than for the Euler schemes', () => {
    const errors = [0, 1, 0.5].map(theta => {
      const { u, t, dt } = solve(1, 2, 4, 0.4, theta);
      return errorNorm(u, t, 1, 2, dt);
    });
    expect(errors[2]).toBeLessThan(errors[0]);
    expect(errors[2]).toBeLessThan(errors[1]);
  });

  it('rejects arrays of different lengths', () => {
    expect(() => errorNorm([1, 2], [0, 1, 2], 1, 2, 1)).toThrow(InputShapeMismatchError);
    expect(() => errorNorm([1, 2], [0, 1, 2], 1, 2, 1)).toThrow('u has 2 values but t has 3 points');
  });
});

describe('schemeName', () => {
  it('names the three classic schemes', () => {
    expect(schemeName(0)).toBe('Forward Euler');
    expect(schemeName(1)).toBe('Backward Euler');
    expect(schemeName(0.5)).toBe('Crank-Nicolson');
    expect(schemeName(0.75)).toBe('theta=0.75');
  });
});
