/**
 * @module optimization/descent
 * @description Generic iterate-and-line-search loop shared by every direction strategy
 *
 * Per iteration:
 * 1. stop if |g| <= tolerance (converged) or the iteration cap is reached;
 * 2. ask the strategy for a direction, enforcing g.d < 0 by falling back to -g;
 * 3. backtrack along d until the Armijo condition holds; if that fails along a
 *    direction other than -g, reset the strategy state and search once more along -g;
 * 4. accept the step, re-estimate g, let the strategy update its state.
 *
 * With `lineSearch.warmStart`, each search after the first starts one expansion
 * above the previous accepted step, capped at `lineSearch.initialStep`.
 *
 * Each call owns its counter, History and strategy state.
 */

import type { Logger } from '../../../core/logging';
import { dot, isFiniteVector, negate, norm, subtract } from '../math/linear-algebra';
import { EvaluationCounter, finiteDifferenceGradient } from './evaluation-counter';
import { backtrackingLineSearch, type LineSearchResult } from './line-search';
import { steepestDescent } from './steepest-descent';
import { newton } from './newton';
import { dfp } from './dfp';
import type {
    DescentResult,
    DescentSettings,
    DescentStrategy,
    IterationRecord,
    MethodTag,
    ObjectiveFunction,
    Termination,
} from './types';

const LINE_SEARCH_RETRY_REASON = 'line search failed along the proposed direction; retried along -gradient';

function isSteepestDirection(direction: number[], gradient: number[]): boolean {
    return direction.every((d, i) => d === -gradient[i]);
}

/**
 * Run one descent from `x0` with the given strategy
 */
export function optimize<S>(
    objective: ObjectiveFunction,
    x0: number[],
    strategy: DescentStrategy<S>,
    settings: DescentSettings,
    logger?: Logger
): DescentResult {
    const counter = new EvaluationCounter(objective);
    const gradientAt = (x: number[], value: number): number[] =>
        finiteDifferenceGradient(counter, x, settings.finiteDifference.gradientStep, {
            value,
            jumpTolerance: settings.finiteDifference.jumpTolerance,
        });

    let point = x0.slice();
    let value = counter.evaluate(point);
    let gradient = gradientAt(point, value);
    let gradientNorm = norm(gradient);
    let state = strategy.init(point.length);
    let fallbacks = 0;
    let initialStep = settings.lineSearch.initialStep;

    const history: IterationRecord[] = [];
    const record = (entry: IterationRecord): void => {
        history.push(entry);
        logger?.logIteration({ method: strategy.method, ...entry });
    };
    record({ iteration: 0, point, value, gradientNorm, stepSize: 0, fallback: false });

    let termination: Termination;

    if (!Number.isFinite(value) || !isFiniteVector(gradient)) {
        termination = {
            status: 'failed',
            reason: 'objective or gradient is not finite at the starting point',
        };
    } else {
        for (;;) {
            if (gradientNorm <= settings.tolerance) {
                termination = {
                    status: 'converged',
                    reason: `gradient norm ${gradientNorm.toExponential(3)} <= tolerance ${settings.tolerance}`,
                };
                break;
            }
            if (history.length - 1 >= settings.maxIterations) {
                termination = {
                    status: 'max_iterations',
                    reason: `reached ${settings.maxIterations} iterations`,
                };
                break;
            }

            const proposal = strategy.direction({ point, value, gradient, counter, settings }, state);
            state = proposal.state;

            let direction = proposal.direction;
            let fallback = proposal.fallback;
            let fallbackReason = proposal.reason;
            if (!isFiniteVector(direction) || dot(gradient, direction) >= 0) {
                direction = negate(gradient);
                fallback = true;
                fallbackReason = 'direction is not a descent direction';
            }

            let search: LineSearchResult = backtrackingLineSearch(
                counter, point, value, gradient, direction, { ...settings.lineSearch, initialStep }
            );
            if (!search.accepted && !isSteepestDirection(direction, gradient)) {
                direction = negate(gradient);
                state = strategy.init(point.length);
                fallback = true;
                fallbackReason = LINE_SEARCH_RETRY_REASON;
                search = backtrackingLineSearch(
                    counter, point, value, gradient, direction, { ...settings.lineSearch, initialStep }
                );
            }
            if (fallback) fallbacks++;
            if (!search.accepted) {
                termination = { status: 'failed', reason: search.reason };
                break;
            }

            const nextGradient = gradientAt(search.point, search.value);
            if (!isFiniteVector(nextGradient)) {
                termination = { status: 'failed', reason: 'gradient is not finite at the accepted point' };
                break;
            }

            state = strategy.update(
                state,
                { s: subtract(search.point, point), y: subtract(nextGradient, gradient) },
                settings
            );

            if (settings.lineSearch.warmStart) {
                initialStep = Math.min(
                    settings.lineSearch.initialStep,
                    search.step / settings.lineSearch.shrinkFactor
                );
            }
            point = search.point;
            value = search.value;
            gradient = nextGradient;
            gradientNorm = norm(gradient);

            record({
                iteration: history.length,
                point,
                value,
                gradientNorm,
                stepSize: search.step,
                fallback,
                ...(fallback && fallbackReason !== undefined ? { fallbackReason } : {}),
            });
        }
    }

    const result: DescentResult = {
        method: strategy.method,
        point,
        value,
        gradient,
        gradientNorm,
        iterations: history.length - 1,
        evaluations: counter.count,
        history,
        errors: history.map(r => r.gradientNorm),
        termination,
        fallbacks,
    };

    logger?.logRun({
        method: result.method,
        status: termination.status,
        reason: termination.reason,
        iterations: result.iterations,
        evaluations: result.evaluations,
        finalValue: value,
        finalPoint: point,
        fallbacks,
    });

    return result;
}

/**
 * Run the strategy named by `method`
 */
export function runDescent(
    method: MethodTag,
    objective: ObjectiveFunction,
    x0: number[],
    settings: DescentSettings,
    logger?: Logger
): DescentResult {
    switch (method) {
        case 'SD':
            return optimize(objective, x0, steepestDescent, settings, logger);
        case 'Newton':
            return optimize(objective, x0, newton, settings, logger);
        case 'DFP':
            return optimize(objective, x0, dfp, settings, logger);
    }
}
