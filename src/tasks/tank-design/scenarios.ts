/**
 * @module tasks/tank-design/scenarios
 * @description Preset starting points for demonstrations and regression runs
 */

import { ScenarioNotFoundError } from '../../core/errors';
import type { MethodTag } from '../../models/numeric/optimization';
import type { DesignPoint } from './types';

export interface Scenario {
    id: string;
    description: string;
    initialPoint: DesignPoint;
    method: MethodTag;
    tolerance: number;
    maxIterations: number;
}

export const SCENARIOS: readonly Scenario[] = [
    {
        id: 'small-tank',
        description: 'Far below the minimum volume; quasi-Newton recovery',
        initialPoint: { D: 0.45, L: 0.55 },
        method: 'DFP',
        tolerance: 1e-6,
        maxIterations: 200,
    },
    {
        id: 'slender-corner',
        description: 'Thin and long, far from the optimum; Newton recovery',
        initialPoint: { D: 0.22, L: 1.82 },
        method: 'Newton',
        tolerance: 1e-6,
        maxIterations: 200,
    },
    {
        id: 'small-tank-short',
        description: 'Same start as small-tank, capped at 20 iterations',
        initialPoint: { D: 0.45, L: 0.55 },
        method: 'DFP',
        tolerance: 1e-6,
        maxIterations: 20,
    },
    {
        id: 'narrow-valley',
        description: 'Just under the minimum volume near the diameter bound; steepest descent zig-zags',
        initialPoint: { D: 0.98, L: 0.95 },
        method: 'SD',
        tolerance: 1e-6,
        maxIterations: 200,
    },
    {
        id: 'mild-undervolume',
        description: 'Moderate minimum-volume violation',
        initialPoint: { D: 0.8, L: 1.2 },
        method: 'Newton',
        tolerance: 1e-6,
        maxIterations: 200,
    },
    {
        id: 'oversized',
        description: 'Above the maximum volume and the diameter bound',
        initialPoint: { D: 1.1, L: 1.5 },
        method: 'DFP',
        tolerance: 1e-6,
        maxIterations: 200,
    },
    {
        id: 'length-corner',
        description: 'Length close to its bound with too little volume',
        initialPoint: { D: 0.32, L: 1.98 },
        method: 'SD',
        tolerance: 1e-6,
        maxIterations: 200,
    },
    {
        id: 'diameter-corner',
        description: 'Diameter over its bound and too little volume',
        initialPoint: { D: 1.1, L: 0.6 },
        method: 'Newton',
        tolerance: 1e-6,
        maxIterations: 200,
    },
];

/**
 * Look up a preset by index or id
 * @throws ScenarioNotFoundError
 */
export function getScenario(key: number | string): Scenario {
    const found = typeof key === 'number'
        ? SCENARIOS[key]
        : SCENARIOS.find(s => s.id === key);
    if (found === undefined) {
        throw new ScenarioNotFoundError(key, SCENARIOS.length);
    }
    return found;
}
