/**
 * @module optimization/newton
 * @description Newton's method on a finite-difference Hessian
 *
 * Solves H p = -g each iteration. The step falls back to -g for that iteration
 * when H is singular, p is not finite, p is longer than `newton.maxStepNorm`,
 * or p does not point downhill. No state survives between iterations.
 */

import { dot, isFiniteVector, negate, norm, solveLinearSystem } from '../math/linear-algebra';
import { finiteDifferenceHessian } from './evaluation-counter';
import type { DescentStrategy, DirectionProposal } from './types';

export type NewtonState = Readonly<Record<string, never>>;

function fallbackTo(gradient: number[], reason: string, state: NewtonState): DirectionProposal<NewtonState> {
    return { direction: negate(gradient), fallback: true, reason, state };
}

export const newton: DescentStrategy<NewtonState> = {
    method: 'Newton',

    init(): NewtonState {
        return {};
    },

    direction(context, state) {
        const { point, gradient, counter, settings } = context;
        const H = finiteDifferenceHessian(counter, point, settings.finiteDifference.hessianStep);

        if (!H.every(isFiniteVector)) {
            return fallbackTo(gradient, 'Hessian is not finite', state);
        }

        const p = solveLinearSystem(H, negate(gradient));
        if (p === null) {
            return fallbackTo(gradient, 'Hessian is singular', state);
        }
        if (!isFiniteVector(p)) {
            return fallbackTo(gradient, 'Newton step is not finite', state);
        }
        if (norm(p) > settings.newton.maxStepNorm) {
            return fallbackTo(gradient, `Newton step norm exceeds ${settings.newton.maxStepNorm}`, state);
        }
        if (dot(gradient, p) >= 0) {
            return fallbackTo(gradient, 'Newton step is not a descent direction', state);
        }

        return { direction: p, fallback: false, state };
    },

    update(state) {
        return state;
    },
};
