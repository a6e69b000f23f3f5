/**
 * @module tasks/tank-design/objective
 * @description Fabrication cost of a cylindrical tank and its penalized objective
 *
 * Cost = material (lateral shell + two end plates) + circumferential welds.
 *
 * The penalized objective adds, per constraint margin g:
 * - g < 0: log barrier  -mu * ln(-g)
 * - g >= 0: quadratic penalty  rho * g^2
 * and, if any g >= 0, the infeasibility wall  W * (1 + sum max(0, g)).
 * The regime switch at g = 0 is not smoothed.
 */

import { constraintMargins, evaluateConstraints, type ConstraintReport, type ConstraintSpec } from '../../core/constraint';
import type { ObjectiveFunction } from '../../models/numeric/optimization';
import type { ProblemParameters } from './config';
import { createTankConstraints, tankVolume } from './constraints';
import type { CostBreakdown, DesignPoint } from './types';

// ==================== Cost ====================

/**
 * Steel mass (kg): lateral shell plus two end plates of radius D/2 + t
 */
export function shellMass(D: number, L: number, params: Readonly<ProblemParameters>): number {
    const t = params.wallThickness;
    const inner = D / 2;
    const outer = inner + t;
    const lateral = L * Math.PI * (outer * outer - inner * inner);
    const ends = 2 * Math.PI * outer * outer * t;
    return params.density * (lateral + ends);
}

/**
 * Weld length (m): two end seams on the outer circumference
 */
export function weldLength(D: number, params: Readonly<ProblemParameters>): number {
    return 4 * Math.PI * (D + params.wallThickness);
}

/**
 * Raw fabrication cost ($), defined for D, L > 0
 */
export function tankCost(D: number, L: number, params: Readonly<ProblemParameters>): number {
    return params.materialCost * shellMass(D, L, params) + params.weldCost * weldLength(D, params);
}

// ==================== Penalized Objective ====================

/**
 * Penalized objective terms from precomputed constraint margins
 */
export function penalizedTerms(
    cost: number,
    margins: number[],
    params: Readonly<ProblemParameters>
): CostBreakdown {
    let barrier = 0;
    let penalty = 0;
    let violation = 0;
    let feasible = true;

    for (const g of margins) {
        if (g < 0) {
            barrier -= params.barrierWeight * Math.log(-g);
        } else {
            penalty += params.penaltyWeight * g * g;
            violation += g;
            feasible = false;
        }
    }

    const wall = feasible ? 0 : params.infeasibilityWall * (1 + violation);
    return { cost, barrier, penalty, wall, total: cost + barrier + penalty + wall, feasible };
}

const OUT_OF_DOMAIN: CostBreakdown = Object.freeze({
    cost: Infinity,
    barrier: 0,
    penalty: 0,
    wall: 0,
    total: Infinity,
    feasible: false,
});

/**
 * Cost, constraints and penalized objective for one parameter set
 */
export interface TankModel {
    readonly params: Readonly<ProblemParameters>;
    readonly constraints: readonly ConstraintSpec<DesignPoint>[];
    cost(point: DesignPoint): number;
    volume(point: DesignPoint): number;
    /** Signed margins [minVolume, maxVolume, maxDiameter, maxLength] */
    margins(point: DesignPoint): number[];
    report(point: DesignPoint): ConstraintReport;
    breakdown(point: DesignPoint): CostBreakdown;
    /** Penalized objective; +Infinity when D <= 0 or L <= 0 */
    penalized(point: DesignPoint): number;
    /** Penalized objective over the vector [D, L] */
    objective: ObjectiveFunction;
}

export function createTankModel(params: Readonly<ProblemParameters>): TankModel {
    const constraints = createTankConstraints(params);

    const breakdown = (point: DesignPoint): CostBreakdown => {
        if (!(point.D > 0) || !(point.L > 0)) {
            return OUT_OF_DOMAIN;
        }
        return penalizedTerms(
            tankCost(point.D, point.L, params),
            constraintMargins(constraints, point),
            params
        );
    };

    return {
        params,
        constraints,
        cost: (point) => tankCost(point.D, point.L, params),
        volume: (point) => tankVolume(point.D, point.L),
        margins: (point) => constraintMargins(constraints, point),
        report: (point) => evaluateConstraints(constraints, point),
        breakdown,
        penalized: (point) => breakdown(point).total,
        objective: (x) => breakdown({ D: x[0], L: x[1] }).total,
    };
}
