/**
 * Tank Design Task Tests
 * Entry points, scenarios and end-to-end behavior of the three methods
 */

import { describe, it, expect } from 'vitest';
import { ScenarioNotFoundError, ValidationError } from '../src/core/errors';
import { MemoryLogger } from '../src/core/logging';
import {
    DEFAULT_PROBLEM_PARAMETERS,
    SCENARIOS,
    countDirectionReversals,
    getScenario,
    runComparison,
    runOptimization,
    tankCost,
    type MethodRunSummary,
} from '../src/tasks/tank-design';
import { isNonIncreasing } from './test-utils';

function expectFeasibleBand(run: MethodRunSummary): void {
    expect(run.feasible).toBe(true);
    expect(run.finalVolume).toBeGreaterThanOrEqual(0.72);
    expect(run.finalVolume).toBeLessThanOrEqual(0.88);
}

// ==================== runOptimization ====================

describe('runOptimization', () => {
    it('should recover a feasible tank from a small start with DFP', () => {
        const run = runOptimization({ initialPoint: { D: 0.45, L: 0.55 }, method: 'DFP' });

        expect(run.method).toBe('DFP');
        expect(run.termination.status).not.toBe('failed');
        expectFeasibleBand(run);
    });

    it('should recover from an oversized start with DFP', () => {
        const run = runOptimization({ initialPoint: { D: 1.1, L: 1.5 }, method: 'DFP' });

        expect(run.termination.status).not.toBe('failed');
        expectFeasibleBand(run);
    });

    it('should zig-zag with steepest descent in the narrow valley', () => {
        const run = runOptimization({ initialPoint: { D: 0.98, L: 0.95 }, method: 'SD' });

        expect(countDirectionReversals(run.history)).toBeGreaterThanOrEqual(2);
        expectFeasibleBand(run);
    });

    it('should keep a feasible DFP run alive when its stale direction stalls near a bound', () => {
        const run = runOptimization({ initialPoint: { D: 0.7, L: 1.9 }, method: 'DFP' });

        expect(run.termination.status).toBe('max_iterations');
        expect(run.iterations).toBe(200);
        expectFeasibleBand(run);
    });

    it('should return a non-increasing History that starts at the initial point', () => {
        const run = runOptimization({ initialPoint: { D: 0.8, L: 1.2 }, method: 'Newton', maxIterations: 30 });

        expect(run.history[0].D).toBe(0.8);
        expect(run.history[0].L).toBe(1.2);
        expect(run.history).toHaveLength(run.iterations + 1);
        expect(run.errors).toEqual(run.history.map(p => p.gradientNorm));
        expect(isNonIncreasing(run.history.map(p => p.cost))).toBe(true);
    });

    it('should report the raw cost and the penalized value separately', () => {
        const run = runOptimization({ initialPoint: { D: 0.95, L: 1.05 }, method: 'SD', maxIterations: 10 });

        expect(run.finalPenalizedCost).toBe(run.history[run.history.length - 1].cost);
        expect(run.finalCost).toBe(tankCost(run.finalPoint.D, run.finalPoint.L, DEFAULT_PROBLEM_PARAMETERS));
        expect(run.finalCost).not.toBe(run.finalPenalizedCost);
    });

    it('should default to steepest descent', () => {
        const run = runOptimization({ initialPoint: { D: 0.95, L: 1.05 }, maxIterations: 1 });
        expect(run.method).toBe('SD');
    });

    it('should stop at zero iterations with a 5-evaluation start', () => {
        const run = runOptimization({ initialPoint: { D: 0.95, L: 1.05 }, method: 'DFP', maxIterations: 0 });

        expect(run.termination.status).toBe('max_iterations');
        expect(run.iterations).toBe(0);
        expect(run.evaluationCount).toBe(5);
    });

    it('should attach the contour grid', () => {
        const run = runOptimization({ initialPoint: { D: 0.95, L: 1.05 }, maxIterations: 1 });

        expect(run.contour.field).toBe('penalized');
        expect(run.contour.values).toHaveLength(50);
        expect(run.contour.values[0]).toHaveLength(50);
    });

    it('should take defaults from the task configuration', () => {
        const run = runOptimization(
            { initialPoint: { D: 0.95, L: 1.05 } },
            { config: { descent: { maxIterations: 4 }, contour: { diameterSamples: 3, lengthSamples: 2 } } }
        );

        expect(run.iterations).toBe(4);
        expect(run.contour.d).toHaveLength(3);
        expect(run.contour.l).toHaveLength(2);
    });

    it('should let the request override the configured defaults', () => {
        const run = runOptimization(
            { initialPoint: { D: 0.95, L: 1.05 }, maxIterations: 2 },
            { config: { descent: { maxIterations: 4 } } }
        );
        expect(run.iterations).toBe(2);
    });

    it('should apply request-level line-search overrides', () => {
        const request = { initialPoint: { D: 0.95, L: 1.05 }, method: 'SD' as const, maxIterations: 3 };
        const warm = runOptimization(request);
        const cold = runOptimization({ ...request, descent: { lineSearch: { warmStart: false } } });

        expect(cold.iterations).toBe(3);
        expect(cold.evaluationCount).toBeGreaterThan(warm.evaluationCount);
    });

    it('should log iterations and the run', () => {
        const logger = new MemoryLogger({ task: 'tank-design' });
        const run = runOptimization({ initialPoint: { D: 0.95, L: 1.05 }, maxIterations: 3 }, { logger });

        expect(logger.iterations).toHaveLength(run.history.length);
        expect(logger.runs).toHaveLength(1);
        expect(logger.runs[0].evaluations).toBe(run.evaluationCount);
    });

    it('should reject a non-positive start', () => {
        expect(() => runOptimization({ initialPoint: { D: -1, L: 1 } })).toThrow(ValidationError);
    });
});

// ==================== runComparison ====================

describe('runComparison', () => {
    it('should never fail from a feasible start', () => {
        const comparison = runComparison({ initialPoint: { D: 0.95, L: 1.05 } });

        for (const run of Object.values(comparison.results)) {
            expect(run.termination.status).not.toBe('failed');
            expect(run.feasible).toBe(true);
            expect(isNonIncreasing(run.history.map(p => p.cost))).toBe(true);
        }
    });

    describe.each([
        { D: 0.7, L: 1.9 },
        { D: 0.95, L: 1.05 },
        { D: 0.98, L: 0.95 },
        { D: 0.8, L: 1.2 },
        { D: 0.6, L: 1.99 },
        { D: 0.9, L: 1.4 },
    ])('from feasible start ($D, $L)', (start) => {
        const comparison = runComparison(
            { initialPoint: start },
            { config: { contour: { diameterSamples: 2, lengthSamples: 2 } } }
        );
        const perIteration = (run: MethodRunSummary): number => run.evaluationCount / run.iterations;

        it('should end every method feasible without failing', () => {
            for (const run of Object.values(comparison.results)) {
                expect(run.termination.status).not.toBe('failed');
                expectFeasibleBand(run);
                expect(isNonIncreasing(run.history.map(p => p.cost))).toBe(true);
            }
        });

        it('should spend more evaluations per iteration on Newton than on steepest descent', () => {
            const { SD, Newton } = comparison.results;
            expect(perIteration(Newton)).toBeGreaterThan(perIteration(SD));
        });
    });

    it('should zig-zag with steepest descent far more than with Newton or DFP', () => {
        const { SD, Newton, DFP } = runComparison(
            { initialPoint: { D: 0.98, L: 0.95 } },
            { config: { contour: { diameterSamples: 2, lengthSamples: 2 } } }
        ).results;
        const sdReversals = countDirectionReversals(SD.history);

        expect(sdReversals).toBeGreaterThan(countDirectionReversals(Newton.history));
        expect(sdReversals).toBeGreaterThan(countDirectionReversals(DFP.history));
    });

    it('should run every method from the same start with its own counter', () => {
        const comparison = runComparison({ initialPoint: { D: 0.95, L: 1.05 }, maxIterations: 5 });
        const { SD, Newton, DFP } = comparison.results;

        expect(comparison.start).toEqual({ D: 0.95, L: 1.05 });
        expect([SD.method, Newton.method, DFP.method]).toEqual(['SD', 'Newton', 'DFP']);
        for (const run of [SD, Newton, DFP]) {
            expect(run.history[0]).toMatchObject({ D: 0.95, L: 1.05 });
        }
        expect(Newton.evaluationCount).toBeGreaterThanOrEqual(21 * Newton.iterations);
    });

    it('should log one comparison entry in method order', () => {
        const logger = new MemoryLogger({ task: 'tank-design', logIterations: false });
        runComparison({ initialPoint: { D: 0.95, L: 1.05 }, maxIterations: 2 }, { logger });

        expect(logger.iterations).toHaveLength(0);
        expect(logger.runs.map(r => r.method)).toEqual(['SD', 'Newton', 'DFP']);
        expect(logger.comparisons).toHaveLength(1);
        expect(logger.comparisons[0].start).toEqual([0.95, 1.05]);
        expect(logger.comparisons[0].runs.map(r => r.iterations)).toEqual([2, 2, 2]);
    });

    it('should reject a non-finite start', () => {
        expect(() => runComparison({ initialPoint: { D: 1, L: Number.NaN } })).toThrow(/Invalid comparison request/);
    });
});

// ==================== Scenarios ====================

describe('scenarios', () => {
    it('should look up presets by index and id', () => {
        expect(getScenario(0).id).toBe('small-tank');
        expect(getScenario(0).initialPoint).toEqual({ D: 0.45, L: 0.55 });
        expect(getScenario('narrow-valley').method).toBe('SD');
        expect(getScenario(2).maxIterations).toBe(20);
    });

    it('should have unique ids', () => {
        const ids = SCENARIOS.map(s => s.id);
        expect(new Set(ids).size).toBe(ids.length);
    });

    it('should throw for an unknown preset', () => {
        expect(() => getScenario(99)).toThrow(ScenarioNotFoundError);
        expect(() => getScenario('missing')).toThrow('Scenario missing not found (available: 0..7)');
    });

    it('should end every full-length preset at a feasible point without failing', () => {
        for (const scenario of SCENARIOS.filter(s => s.maxIterations >= 200)) {
            const run = runOptimization({
                initialPoint: scenario.initialPoint,
                method: scenario.method,
                tolerance: scenario.tolerance,
                maxIterations: scenario.maxIterations,
            }, { config: { contour: { diameterSamples: 2, lengthSamples: 2 } } });

            expect(run.termination.status).not.toBe('failed');
            expect(run.feasible).toBe(true);
        }
    });

    it('should stop the short preset at its iteration cap', () => {
        const scenario = getScenario('small-tank-short');
        const run = runOptimization({
            initialPoint: scenario.initialPoint,
            method: scenario.method,
            maxIterations: scenario.maxIterations,
        }, { config: { contour: { diameterSamples: 2, lengthSamples: 2 } } });

        expect(run.termination.status).toBe('max_iterations');
        expect(run.iterations).toBe(20);
    });
});
