/**
 * @module optimization/types
 * @description Type definitions for the descent-method engine
 */

import type { EvaluationCounter } from './evaluation-counter';

/**
 * Scalar objective f(x). May return +Infinity outside its domain.
 */
export type ObjectiveFunction = (x: number[]) => number;

// ==================== Methods ====================

/**
 * Supported direction strategies
 */
export const METHOD_TAGS = ['SD', 'Newton', 'DFP'] as const;

export type MethodTag = (typeof METHOD_TAGS)[number];

// ==================== Settings ====================

/**
 * Backtracking (Armijo) line search settings
 */
export interface LineSearchSettings {
    /** First trial step length, and the cap on every later one */
    initialStep: number;
    /**
     * Start each later search at min(initialStep, previous accepted step / shrinkFactor)
     * instead of at initialStep
     */
    warmStart: boolean;
    /** Step multiplier applied after each rejected trial, in (0, 1) */
    shrinkFactor: number;
    /** Sufficient-decrease coefficient c in f(x + a d) <= f(x) + c a g.d */
    armijo: number;
    /** Maximum number of step reductions before the search gives up */
    maxShrinks: number;
    /** Smallest step length still considered a step */
    minStep: number;
}

/**
 * Central finite-difference step sizes
 */
export interface FiniteDifferenceSettings {
    gradientStep: number;
    hessianStep: number;
    /** See finiteDifferenceGradient; Infinity gives plain central differences */
    jumpTolerance: number;
}

/**
 * Full run configuration
 */
export interface DescentSettings {
    /** Convergence threshold on the gradient norm */
    tolerance: number;
    /** Iteration cap */
    maxIterations: number;
    lineSearch: LineSearchSettings;
    finiteDifference: FiniteDifferenceSettings;
    newton: {
        /** Newton steps longer than this fall back to steepest descent */
        maxStepNorm: number;
    };
    dfp: {
        /** |s.y| and |y.By| at or below this skip the inverse-Hessian update */
        curvatureTolerance: number;
    };
}

/**
 * Partial overrides, merged over the defaults one level deep
 */
export interface DescentSettingsOverrides {
    tolerance?: number;
    maxIterations?: number;
    lineSearch?: Partial<LineSearchSettings>;
    finiteDifference?: Partial<FiniteDifferenceSettings>;
    newton?: Partial<DescentSettings['newton']>;
    dfp?: Partial<DescentSettings['dfp']>;
}

// ==================== Strategy Contract ====================

/**
 * What a strategy sees when asked for a direction
 */
export interface DirectionContext {
    point: number[];
    value: number;
    gradient: number[];
    /** Shared run counter; strategies that evaluate f (Newton) go through it */
    counter: EvaluationCounter;
    settings: DescentSettings;
}

/**
 * Direction proposal plus the strategy state to carry forward
 */
export interface DirectionProposal<S> {
    direction: number[];
    /** True when the strategy replaced its own direction by -gradient */
    fallback: boolean;
    /** Why the fallback was taken */
    reason?: string;
    state: S;
}

/**
 * Accepted step, passed to the strategy after each iteration
 */
export interface StepPair {
    /** x_{k+1} - x_k */
    s: number[];
    /** grad_{k+1} - grad_k */
    y: number[];
}

/**
 * A direction strategy with explicit, run-local state S
 */
export interface DescentStrategy<S> {
    readonly method: MethodTag;
    init(dimension: number): S;
    direction(context: DirectionContext, state: S): DirectionProposal<S>;
    update(state: S, step: StepPair, settings: DescentSettings): S;
}

// ==================== Results ====================

/**
 * One accepted iterate (record 0 is the starting point)
 */
export interface IterationRecord {
    iteration: number;
    point: number[];
    value: number;
    gradientNorm: number;
    /** Accepted step length (0 for the starting point) */
    stepSize: number;
    /** Whether this step used the steepest-descent fallback */
    fallback: boolean;
    fallbackReason?: string;
}

export type TerminationStatus = 'converged' | 'max_iterations' | 'failed';

export interface Termination {
    status: TerminationStatus;
    reason: string;
}

/**
 * Result of a single descent run
 */
export interface DescentResult {
    method: MethodTag;
    point: number[];
    value: number;
    gradient: number[];
    gradientNorm: number;
    /** Number of accepted steps (history.length - 1) */
    iterations: number;
    /** Raw objective calls made during the run */
    evaluations: number;
    history: IterationRecord[];
    /** Gradient norm per History record */
    errors: number[];
    termination: Termination;
    /** Iterations whose direction fell back to -gradient */
    fallbacks: number;
}
