/**
 * @module tasks/tank-design/constraints
 * @description The four design constraints, in fixed order:
 * minVolume, maxVolume, maxDiameter, maxLength.
 */

import { geConstraint, leConstraint, type ConstraintSpec } from '../../core/constraint';
import type { ProblemParameters } from './config';
import { volumeBounds } from './config';
import type { DesignPoint } from './types';

/**
 * Cylinder volume pi D^2 L / 4
 */
export function tankVolume(D: number, L: number): number {
    return Math.PI * D * D * L / 4;
}

export const CONSTRAINT_IDS = ['minVolume', 'maxVolume', 'maxDiameter', 'maxLength'] as const;

export type ConstraintId = (typeof CONSTRAINT_IDS)[number];

export function createTankConstraints(params: Readonly<ProblemParameters>): ConstraintSpec<DesignPoint>[] {
    const bounds = volumeBounds(params);
    const volume = (p: DesignPoint): number => tankVolume(p.D, p.L);

    return [
        geConstraint('minVolume', volume, bounds.min, { unit: 'm^3', description: 'volume >= V_min' }),
        leConstraint('maxVolume', volume, bounds.max, { unit: 'm^3', description: 'volume <= V_max' }),
        leConstraint('maxDiameter', (p: DesignPoint) => p.D, params.maxDiameter, { unit: 'm' }),
        leConstraint('maxLength', (p: DesignPoint) => p.L, params.maxLength, { unit: 'm' }),
    ];
}
