/**
 * @module optimization/line-search
 * @description Backtracking line search under the Armijo sufficient-decrease condition
 */

import { axpy, dot } from '../math/linear-algebra';
import type { EvaluationCounter } from './evaluation-counter';
import type { LineSearchSettings } from './types';

export type LineSearchResult =
    | {
        accepted: true;
        step: number;
        point: number[];
        value: number;
        /** Objective calls spent by this search */
        trials: number;
    }
    | {
        accepted: false;
        step: number;
        trials: number;
        reason: string;
    };

/**
 * Shrink the step from `initialStep` by `shrinkFactor` until
 * f(x + a d) <= f(x) + c a (g . d).
 *
 * `value` is f(x), already known to the caller, so it is not re-evaluated.
 * Non-finite trial values count as rejections.
 */
export function backtrackingLineSearch(
    counter: EvaluationCounter,
    point: number[],
    value: number,
    gradient: number[],
    direction: number[],
    settings: LineSearchSettings
): LineSearchResult {
    const slope = dot(gradient, direction);
    let step = settings.initialStep;
    let shrinks = 0;
    let trials = 0;

    for (;;) {
        const candidate = axpy(point, step, direction);
        const candidateValue = counter.evaluate(candidate);
        trials++;

        if (Number.isFinite(candidateValue) && candidateValue <= value + settings.armijo * step * slope) {
            return { accepted: true, step, point: candidate, value: candidateValue, trials };
        }

        shrinks++;
        step *= settings.shrinkFactor;

        if (shrinks > settings.maxShrinks) {
            return {
                accepted: false,
                step,
                trials,
                reason: `line search exceeded ${settings.maxShrinks} step reductions`,
            };
        }
        if (step < settings.minStep) {
            return {
                accepted: false,
                step,
                trials,
                reason: `line search step fell below ${settings.minStep}`,
            };
        }
    }
}
