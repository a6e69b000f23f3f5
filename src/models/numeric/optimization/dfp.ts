/**
 * @module optimization/dfp
 * @description Davidon-Fletcher-Powell quasi-Newton method
 *
 * Keeps an inverse-Hessian approximation B (initially I) and steps along
 * d = -B g. After each accepted step:
 *
 *   B <- B + s s^T / (s^T y) - (B y)(B y)^T / (y^T B y)
 *
 * The update is skipped when either denominator is within the curvature
 * tolerance of zero. A non-descent d resets B to I.
 */

import {
    addScaledMatrix,
    dot,
    identity,
    isFiniteVector,
    mulMatVec,
    negate,
    outer,
    symmetrize,
} from '../math/linear-algebra';
import type { DescentStrategy } from './types';

export interface DfpState {
    inverseHessian: number[][];
}

/**
 * One DFP inverse-Hessian update. Returns `B` itself when the update is skipped.
 */
export function dfpUpdate(
    B: number[][],
    s: number[],
    y: number[],
    curvatureTolerance: number
): number[][] {
    const sy = dot(s, y);
    const By = mulMatVec(B, y);
    const yBy = dot(y, By);

    if (Math.abs(sy) <= curvatureTolerance || Math.abs(yBy) <= curvatureTolerance) {
        return B;
    }

    const next = symmetrize(
        addScaledMatrix(
            addScaledMatrix(B, 1 / sy, outer(s, s)),
            -1 / yBy,
            outer(By, By)
        )
    );

    return next.every(isFiniteVector) ? next : B;
}

export const dfp: DescentStrategy<DfpState> = {
    method: 'DFP',

    init(dimension: number): DfpState {
        return { inverseHessian: identity(dimension) };
    },

    direction(context, state) {
        const { gradient } = context;
        const d = negate(mulMatVec(state.inverseHessian, gradient));

        if (!isFiniteVector(d) || dot(gradient, d) >= 0) {
            return {
                direction: negate(gradient),
                fallback: true,
                reason: 'quasi-Newton direction is not a descent direction; B reset to I',
                state: { inverseHessian: identity(gradient.length) },
            };
        }

        return { direction: d, fallback: false, state };
    },

    update(state, step, settings) {
        return {
            inverseHessian: dfpUpdate(state.inverseHessian, step.s, step.y, settings.dfp.curvatureTolerance),
        };
    },
};
