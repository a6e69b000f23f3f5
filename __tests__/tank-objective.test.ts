/**
 * Tank Model Tests
 * Cost terms, constraint margins, the penalized objective and the contour grid
 */

import { describe, it, expect } from 'vitest';
import {
    CONSTRAINT_IDS,
    DEFAULT_PROBLEM_PARAMETERS,
    computeConfigHash,
    createProblemParameters,
    createTankModel,
    linspace,
    mergeTankTaskConfig,
    penalizedTerms,
    sampleContour,
    shellMass,
    tankCost,
    tankVolume,
    volumeBounds,
    weldLength,
} from '../src/tasks/tank-design';

const params = DEFAULT_PROBLEM_PARAMETERS;
const model = createTankModel(params);

// ==================== Cost ====================

describe('tank cost', () => {
    it('should compute shell mass and weld length', () => {
        expect(shellMass(1, 1, params)).toBeCloseTo(1200.1889246362168, 6);
        expect(weldLength(1, params)).toBeCloseTo(12.943361732789947, 9);
    });

    it('should price material plus welds', () => {
        expect(tankCost(1, 1, params)).toBeCloseTo(5659.717395518774, 6);
        expect(tankCost(0.9, 1.2, params)).toBeCloseTo(5583.690853301894, 6);
    });

    it('should compute the cylinder volume', () => {
        expect(tankVolume(0.9, 1.2)).toBeCloseTo(0.7634070148223198, 12);
        expect(model.volume({ D: 0.9, L: 1.2 })).toBe(tankVolume(0.9, 1.2));
    });
});

// ==================== Constraints ====================

describe('tank constraints', () => {
    it('should keep the fixed constraint order', () => {
        expect(model.constraints.map(c => c.metadata.id)).toEqual([...CONSTRAINT_IDS]);
        expect(CONSTRAINT_IDS).toEqual(['minVolume', 'maxVolume', 'maxDiameter', 'maxLength']);
    });

    it('should return signed margins', () => {
        const g = model.margins({ D: 0.9, L: 1.2 });

        expect(g).toHaveLength(4);
        expect(g[0]).toBeCloseTo(-0.04340701482231968, 12);
        expect(g[1]).toBeCloseTo(-0.11659298517768035, 12);
        expect(g[2]).toBeCloseTo(-0.1, 12);
        expect(g[3]).toBeCloseTo(-0.8, 12);
    });

    it('should report violations by id', () => {
        const report = model.report({ D: 1.1, L: 1.5 });

        expect(report.feasible).toBe(false);
        expect(report.violations.map(v => v.constraintId)).toEqual(['maxVolume', 'maxDiameter']);
    });

    it('should derive the volume band from the nominal volume', () => {
        const bounds = volumeBounds(params);
        expect(bounds.min).toBeCloseTo(0.72, 12);
        expect(bounds.max).toBeCloseTo(0.88, 12);
    });
});

// ==================== Penalized Objective ====================

describe('penalized objective', () => {
    it('should add only barrier terms inside the feasible region', () => {
        const b = model.breakdown({ D: 0.9, L: 1.2 });

        expect(b.feasible).toBe(true);
        expect(b.barrier).toBeCloseTo(0.007811929031696296, 12);
        expect(b.penalty).toBe(0);
        expect(b.wall).toBe(0);
        expect(b.total).toBeCloseTo(5583.698665230926, 6);
    });

    it('should add penalty and wall outside the feasible region', () => {
        const b = model.breakdown({ D: 1.1, L: 1.5 });

        expect(b.feasible).toBe(false);
        expect(b.barrier).toBeCloseTo(0.0010419989957438846, 12);
        expect(b.penalty).toBeCloseTo(307567.7042293529, 4);
        expect(b.wall).toBeCloseTo(1645497.6665663684, 4);
        expect(b.total).toBeCloseTo(1961383.127945589, 4);
    });

    it('should treat a zero margin as violated', () => {
        const b = model.breakdown({ D: 1, L: 1 });

        expect(b.feasible).toBe(false);
        expect(b.penalty).toBe(0);
        expect(b.wall).toBe(1e6);
        expect(b.total).toBeCloseTo(1005659.7224808582, 4);
    });

    it('should price any infeasible point above any feasible one', () => {
        const infeasible = model.penalized({ D: 0.5, L: 0.5 });
        const feasible = model.penalized({ D: 0.9, L: 1.2 });
        expect(infeasible).toBeGreaterThan(feasible);
    });

    it('should be infinite outside the domain', () => {
        expect(model.penalized({ D: 0, L: 1 })).toBe(Infinity);
        expect(model.penalized({ D: 1, L: -0.5 })).toBe(Infinity);
        expect(model.objective([NaN, 1])).toBe(Infinity);
        expect(model.breakdown({ D: -1, L: 1 }).feasible).toBe(false);
    });

    it('should agree between the vector and point forms', () => {
        expect(model.objective([0.9, 1.2])).toBe(model.penalized({ D: 0.9, L: 1.2 }));
    });

    it('should accumulate terms from raw margins', () => {
        const b = penalizedTerms(100, [-1, 0.5], params);

        expect(b.barrier).toBe(0);
        expect(b.penalty).toBe(250000);
        expect(b.wall).toBe(1500000);
        expect(b.total).toBe(1750100);
    });
});

// ==================== Contour ====================

describe('linspace', () => {
    it('should include both ends', () => {
        expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
        expect(linspace(0.1, 1.2, 50)[49]).toBe(1.2);
    });

    it('should return the start for a single sample', () => {
        expect(linspace(2, 3, 1)).toEqual([2]);
    });
});

describe('sampleContour', () => {
    it('should sample rows along L and columns along D', () => {
        const grid = sampleContour(model, {
            diameterRange: [0.5, 1],
            lengthRange: [1, 2],
            diameterSamples: 3,
            lengthSamples: 2,
        });

        expect(grid.field).toBe('penalized');
        expect(grid.d).toEqual([0.5, 0.75, 1]);
        expect(grid.l).toEqual([1, 2]);
        expect(grid.values).toHaveLength(2);
        expect(grid.values[0]).toHaveLength(3);
        expect(grid.values[1][0]).toBe(model.penalized({ D: 0.5, L: 2 }));
        expect(grid.values[0][2]).toBe(model.penalized({ D: 1, L: 1 }));
    });

    it('should sample the raw cost on request', () => {
        const grid = sampleContour(model, { diameterSamples: 2, lengthSamples: 2, field: 'cost' });

        expect(grid.field).toBe('cost');
        expect(grid.values[0][0]).toBe(tankCost(0.1, 0.1, params));
    });

    it('should default to a 50 x 50 grid', () => {
        const grid = sampleContour(model);
        expect(grid.d).toHaveLength(50);
        expect(grid.l).toHaveLength(50);
        expect(grid.d[0]).toBe(0.1);
        expect(grid.l[49]).toBe(2.2);
    });
});

// ==================== Configuration ====================

describe('configuration', () => {
    it('should freeze the problem parameters', () => {
        expect(Object.isFrozen(DEFAULT_PROBLEM_PARAMETERS)).toBe(true);
        expect(Object.isFrozen(createProblemParameters())).toBe(true);
    });

    it('should merge nested overrides', () => {
        const cfg = mergeTankTaskConfig({
            problem: { maxLength: 3, volumeBand: { upper: 1.2 } },
            descent: { maxIterations: 50 },
            contour: { field: 'cost' },
        });

        expect(cfg.taskName).toBe('tank-design');
        expect(cfg.problem.maxLength).toBe(3);
        expect(cfg.problem.volumeBand).toEqual({ lower: 0.9, upper: 1.2 });
        expect(cfg.descent.maxIterations).toBe(50);
        expect(cfg.descent.tolerance).toBe(1e-6);
        expect(cfg.contour.field).toBe('cost');
        expect(cfg.contour.diameterSamples).toBe(50);
    });

    it('should hash identical configurations identically', () => {
        const a = computeConfigHash(mergeTankTaskConfig());
        const b = computeConfigHash(mergeTankTaskConfig());
        const c = computeConfigHash(mergeTankTaskConfig({ problem: { weldCost: 25 } }));

        expect(a).toMatch(/^[0-9a-f]{1,8}$/);
        expect(a).toBe(b);
        expect(a).not.toBe(c);
    });
});
