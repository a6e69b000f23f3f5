/**
 * @module tasks/tank-design/types
 * @description Shared types for the tank design task
 */

import type { MethodTag, Termination } from '../../models/numeric/optimization';
import type { ContourField } from './config';

/**
 * Tank geometry: diameter D and length L (m)
 */
export interface DesignPoint {
    D: number;
    L: number;
}

/**
 * Terms of the penalized objective at one point
 */
export interface CostBreakdown {
    /** Raw fabrication cost */
    cost: number;
    /** Sum of log-barrier terms over satisfied constraints */
    barrier: number;
    /** Sum of quadratic penalties over violated constraints */
    penalty: number;
    /** Infeasibility wall (0 when feasible) */
    wall: number;
    total: number;
    feasible: boolean;
}

/**
 * Sampled objective surface; values[i][j] = f(d[j], l[i])
 */
export interface ContourGrid {
    field: ContourField;
    d: number[];
    l: number[];
    values: number[][];
}

/**
 * One History entry as returned to callers
 */
export interface TrajectoryPoint {
    D: number;
    L: number;
    /** Penalized objective value */
    cost: number;
    gradientNorm: number;
}

/**
 * Result of one method run, without the contour
 */
export interface MethodRunSummary {
    method: MethodTag;
    finalPoint: DesignPoint;
    /** Raw fabrication cost at the final point */
    finalCost: number;
    finalPenalizedCost: number;
    finalVolume: number;
    feasible: boolean;
    iterations: number;
    evaluationCount: number;
    history: TrajectoryPoint[];
    /** Gradient norm per History entry */
    errors: number[];
    termination: Termination;
    fallbacks: number;
}

export interface OptimizationPayload extends MethodRunSummary {
    contour: ContourGrid;
}

export interface ComparisonPayload {
    start: DesignPoint;
    results: Record<MethodTag, MethodRunSummary>;
    contour: ContourGrid;
}
