/**
 * aeropose — Nelder–Mead simplex minimisation
 *
 * Derivative-free search over ℝⁿ with the standard coefficients
 * (reflection 1, expansion 2, contraction ½, shrink ½). Terminates when
 * the simplex is small in both x and f, or after `maxIterations`.
 * Convergence to the global minimum is not guaranteed; callers inspect
 * `fun` and `converged`.
 */

import { DEFAULT_NELDER_MEAD } from './types.js';
import type { NelderMeadSettings } from './types.js';

export interface MinimizeResult {
  x: number[];
  /** Objective value at `x`. */
  fun: number;
  iterations: number;
  evaluations: number;
  /** True when the tolerance test ended the search. */
  converged: boolean;
}

const REFLECT = 1;
const EXPAND = 2;
const CONTRACT = 0.5;
const SHRINK = 0.5;
const NONZERO_STEP = 0.05;

/** Σ weight_k · point_k */
function combine(terms: Array<[number, readonly number[]]>): number[] {
  const out = new Array<number>(terms[0][1].length).fill(0);
  for (const [weight, point] of terms) {
    for (let i = 0; i < out.length; i++) out[i] += weight * point[i];
  }
  return out;
}

export function minimizeNelderMead(
  fn: (x: readonly number[]) => number,
  x0: readonly number[],
  settings: Partial<NelderMeadSettings> = {},
): MinimizeResult {
  const { maxIterations, xTolerance, fTolerance, initialStep } = { ...DEFAULT_NELDER_MEAD, ...settings };
  const n = x0.length;
  let evaluations = 0;
  const evaluate = (x: readonly number[]): number => {
    evaluations++;
    return fn(x);
  };

  // Initial simplex: x0 plus one vertex per axis.
  let simplex: number[][] = [x0.slice()];
  for (let k = 0; k < n; k++) {
    const vertex = x0.slice();
    vertex[k] = vertex[k] !== 0 ? (1 + NONZERO_STEP) * vertex[k] : initialStep;
    simplex.push(vertex);
  }
  let values = simplex.map(evaluate);

  const sortSimplex = (): void => {
    const order = values.map((_, i) => i).sort((a, b) => values[a] - values[b]);
    simplex = order.map((i) => simplex[i]);
    values = order.map((i) => values[i]);
  };
  sortSimplex();

  let iterations = 0;
  let converged = false;

  while (iterations < maxIterations) {
    let xSpread = 0;
    let fSpread = 0;
    for (let i = 1; i <= n; i++) {
      fSpread = Math.max(fSpread, Math.abs(values[i] - values[0]));
      for (let k = 0; k < n; k++) {
        xSpread = Math.max(xSpread, Math.abs(simplex[i][k] - simplex[0][k]));
      }
    }
    if (xSpread <= xTolerance && fSpread <= fTolerance) {
      converged = true;
      break;
    }

    const worst = simplex[n];
    const centroid = combine(simplex.slice(0, n).map((p): [number, number[]] => [1 / n, p]));
    const reflected = combine([[1 + REFLECT, centroid], [-REFLECT, worst]]);
    const fReflected = evaluate(reflected);
    let shrink = false;

    if (fReflected < values[0]) {
      const expanded = combine([[1 + REFLECT * EXPAND, centroid], [-REFLECT * EXPAND, worst]]);
      const fExpanded = evaluate(expanded);
      if (fExpanded < fReflected) {
        simplex[n] = expanded;
        values[n] = fExpanded;
      } else {
        simplex[n] = reflected;
        values[n] = fReflected;
      }
    } else if (fReflected < values[n - 1]) {
      simplex[n] = reflected;
      values[n] = fReflected;
    } else if (fReflected < values[n]) {
      const outside = combine([[1 + CONTRACT * REFLECT, centroid], [-CONTRACT * REFLECT, worst]]);
      const fOutside = evaluate(outside);
      if (fOutside <= fReflected) {
        simplex[n] = outside;
        values[n] = fOutside;
      } else {
        shrink = true;
      }
    } else {
      const inside = combine([[1 - CONTRACT, centroid], [CONTRACT, worst]]);
      const fInside = evaluate(inside);
      if (fInside < values[n]) {
        simplex[n] = inside;
        values[n] = fInside;
      } else {
        shrink = true;
      }
    }

    if (shrink) {
      for (let i = 1; i <= n; i++) {
        simplex[i] = combine([[1 - SHRINK, simplex[0]], [SHRINK, simplex[i]]]);
        values[i] = evaluate(simplex[i]);
      }
    }

    sortSimplex();
    iterations++;
  }

  return { x: simplex[0], fun: values[0], iterations, evaluations, converged };
}
