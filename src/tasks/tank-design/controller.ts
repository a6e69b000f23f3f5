/**
 * @module tasks/tank-design/controller
 * @description Entry points for running one method or comparing all three
 *
 * Both entry points validate the request, build the model from the task
 * configuration and return plain payloads (trajectory, gradient-norm history,
 * contour grid) ready for plotting or JSON export.
 */

import type { Logger } from '../../core/logging';
import {
    METHOD_TAGS,
    mergeDescentSettings,
    runDescent,
    type DescentResult,
    type DescentSettings,
    type MethodTag,
} from '../../models/numeric/optimization';
import { mergeTankTaskConfig, type TankTaskConfigOverrides } from './config';
import { sampleContour } from './contour';
import { createTankModel, type TankModel } from './objective';
import {
    parseComparisonRequest,
    parseRunRequest,
    type ComparisonRequest,
    type ComparisonRequestInput,
    type RunRequestInput,
} from './schema';
import type {
    ComparisonPayload,
    DesignPoint,
    MethodRunSummary,
    OptimizationPayload,
} from './types';

export interface RunOptions {
    /** Task configuration overrides (problem constants, defaults, contour) */
    config?: TankTaskConfigOverrides;
    logger?: Logger;
}

// ==================== Helpers ====================

/**
 * Request-level settings layered over the configured defaults
 */
function resolveSettings(base: DescentSettings, request: ComparisonRequest): DescentSettings {
    return mergeDescentSettings(base, {
        ...request.descent,
        tolerance: request.tolerance,
        maxIterations: request.maxIterations,
    });
}

function toDesignPoint(x: number[]): DesignPoint {
    return { D: x[0], L: x[1] };
}

/**
 * Payload for one finished run
 */
export function summarizeResult(model: TankModel, result: DescentResult): MethodRunSummary {
    const finalPoint = toDesignPoint(result.point);
    return {
        method: result.method,
        finalPoint,
        finalCost: model.cost(finalPoint),
        finalPenalizedCost: result.value,
        finalVolume: model.volume(finalPoint),
        feasible: model.report(finalPoint).feasible,
        iterations: result.iterations,
        evaluationCount: result.evaluations,
        history: result.history.map(r => ({
            D: r.point[0],
            L: r.point[1],
            cost: r.value,
            gradientNorm: r.gradientNorm,
        })),
        errors: result.errors,
        termination: result.termination,
        fallbacks: result.fallbacks,
    };
}

function runMethod(
    model: TankModel,
    method: MethodTag,
    start: DesignPoint,
    settings: DescentSettings,
    logger?: Logger
): MethodRunSummary {
    const result = runDescent(method, model.objective, [start.D, start.L], settings, logger);
    logger?.flush();
    return summarizeResult(model, result);
}

// ==================== Entry Points ====================

/**
 * Run one method from a starting point
 * @throws ValidationError when the request is malformed
 */
export function runOptimization(request: RunRequestInput, options: RunOptions = {}): OptimizationPayload {
    const parsed = parseRunRequest(request);
    const cfg = mergeTankTaskConfig(options.config);
    const model = createTankModel(cfg.problem);
    const settings = resolveSettings(cfg.descent, parsed);

    const summary = runMethod(model, parsed.method, parsed.initialPoint, settings, options.logger);
    return { ...summary, contour: sampleContour(model, cfg.contour) };
}

/**
 * Run every method from the same start, each with its own counter and History,
 * against one shared contour grid
 * @throws ValidationError when the request is malformed
 */
export function runComparison(request: ComparisonRequestInput, options: RunOptions = {}): ComparisonPayload {
    const parsed = parseComparisonRequest(request);
    const cfg = mergeTankTaskConfig(options.config);
    const model = createTankModel(cfg.problem);
    const settings = resolveSettings(cfg.descent, parsed);
    const start = parsed.initialPoint;

    const run = (method: MethodTag): MethodRunSummary =>
        runMethod(model, method, start, settings, options.logger);
    const results: Record<MethodTag, MethodRunSummary> = {
        SD: run('SD'),
        Newton: run('Newton'),
        DFP: run('DFP'),
    };

    options.logger?.logComparison({
        start: [start.D, start.L],
        runs: METHOD_TAGS.map(method => ({
            method,
            status: results[method].termination.status,
            iterations: results[method].iterations,
            evaluations: results[method].evaluationCount,
            finalValue: results[method].finalPenalizedCost,
        })),
    });

    return { start, results, contour: sampleContour(model, cfg.contour) };
}
