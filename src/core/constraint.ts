/**
 * @module core/constraint
 * @description Inequality constraint abstraction
 *
 * Every constraint reduces to a signed margin g(state): g <= 0 means satisfied,
 * g > 0 is the amount of violation. Objectives consume the margins directly;
 * reports add ids, thresholds and units for display.
 */

// ==================== Types ====================

/**
 * Constraint evaluation direction
 * - 'le': value <= threshold (e.g., max length)
 * - 'ge': value >= threshold (e.g., min volume)
 */
export type ConstraintOperator = 'le' | 'ge';

/**
 * Metadata for a constraint specification
 */
export interface ConstraintMetadata {
    /** Unique identifier for the constraint */
    id: string;
    /** Human-readable description */
    description: string;
    /** Threshold value */
    threshold: number;
    /** Comparison operator */
    operator: ConstraintOperator;
    /** Unit of measurement */
    unit?: string;
}

/**
 * Constraint evaluation function
 * @param state - Current state to evaluate
 * @returns The constraint value to be compared against threshold
 */
export type ConstraintEvaluator<S = unknown> = (state: S) => number;

/**
 * ConstraintSpec: Constraint with metadata for evaluation and reporting
 */
export interface ConstraintSpec<S = unknown> {
    metadata: ConstraintMetadata;
    evaluate: ConstraintEvaluator<S>;
}

/**
 * Result of evaluating a single constraint
 */
export interface ConstraintResult {
    id: string;
    value: number;
    threshold: number;
    operator: ConstraintOperator;
    /** Signed margin, <= 0 when satisfied */
    margin: number;
    satisfied: boolean;
    /** How much the constraint is violated (0 if satisfied) */
    violation: number;
}

/**
 * Detail of a single constraint violation
 */
export interface ConstraintViolationDetail {
    constraintId: string;
    value: number;
    threshold: number;
}

/**
 * Report of all constraint evaluations
 */
export interface ConstraintReport {
    results: ConstraintResult[];
    /** Whether every constraint is satisfied */
    feasible: boolean;
    /** Largest margin (most binding or most violated constraint) */
    maxMargin: number;
    violations: ConstraintViolationDetail[];
}

// ==================== Factory Functions ====================

/**
 * Create a "less than or equal" constraint (value <= threshold)
 */
export function leConstraint<S>(
    id: string,
    evaluate: ConstraintEvaluator<S>,
    threshold: number,
    options: Partial<Pick<ConstraintMetadata, 'description' | 'unit'>> = {}
): ConstraintSpec<S> {
    return {
        metadata: {
            id,
            description: options.description ?? `${id} <= ${threshold}`,
            threshold,
            operator: 'le',
            unit: options.unit,
        },
        evaluate,
    };
}

/**
 * Create a "greater than or equal" constraint (value >= threshold)
 */
export function geConstraint<S>(
    id: string,
    evaluate: ConstraintEvaluator<S>,
    threshold: number,
    options: Partial<Pick<ConstraintMetadata, 'description' | 'unit'>> = {}
): ConstraintSpec<S> {
    return {
        metadata: {
            id,
            description: options.description ?? `${id} >= ${threshold}`,
            threshold,
            operator: 'ge',
            unit: options.unit,
        },
        evaluate,
    };
}

// ==================== Constraint Evaluation ====================

/**
 * Signed margin of a constraint at a state
 */
export function constraintMargin<S>(constraint: ConstraintSpec<S>, state: S): number {
    const value = constraint.evaluate(state);
    const { threshold, operator } = constraint.metadata;
    return operator === 'le' ? value - threshold : threshold - value;
}

/**
 * Margins of all constraints, in declaration order
 */
export function constraintMargins<S>(constraints: readonly ConstraintSpec<S>[], state: S): number[] {
    return constraints.map(c => constraintMargin(c, state));
}

/**
 * Evaluate a single constraint
 */
export function evaluateConstraint<S>(
    constraint: ConstraintSpec<S>,
    state: S
): ConstraintResult {
    const { metadata } = constraint;
    const value = constraint.evaluate(state);
    const margin = metadata.operator === 'le'
        ? value - metadata.threshold
        : metadata.threshold - value;
    const satisfied = margin <= 0;

    return {
        id: metadata.id,
        value,
        threshold: metadata.threshold,
        operator: metadata.operator,
        margin,
        satisfied,
        violation: satisfied ? 0 : margin,
    };
}

/**
 * Evaluate multiple constraints and generate a report
 */
export function evaluateConstraints<S>(
    constraints: readonly ConstraintSpec<S>[],
    state: S
): ConstraintReport {
    const results = constraints.map(c => evaluateConstraint(c, state));

    const violations: ConstraintViolationDetail[] = results
        .filter(r => !r.satisfied)
        .map(r => ({
            constraintId: r.id,
            value: r.value,
            threshold: r.threshold,
        }));

    return {
        results,
        feasible: violations.length === 0,
        maxMargin: results.reduce((m, r) => Math.max(m, r.margin), -Infinity),
        violations,
    };
}
