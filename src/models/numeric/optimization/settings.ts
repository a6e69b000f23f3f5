/**
 * @module optimization/settings
 * @description Default run configuration and override merging
 */

import type { DescentSettings, DescentSettingsOverrides } from './types';

/**
 * Default descent settings
 */
export function defaultDescentSettings(): DescentSettings {
    return {
        tolerance: 1e-6,
        maxIterations: 200,
        lineSearch: {
            initialStep: 1,
            warmStart: true,
            shrinkFactor: 0.5,
            armijo: 1e-4,
            maxShrinks: 60,
            minStep: 1e-16,
        },
        finiteDifference: {
            gradientStep: 1e-8,
            hessianStep: 1e-5,
            jumpTolerance: 1e-3,
        },
        newton: {
            maxStepNorm: 100,
        },
        dfp: {
            curvatureTolerance: 1e-10,
        },
    };
}

/**
 * Merge overrides over a base configuration (nested groups merge key by key)
 */
export function mergeDescentSettings(
    base: DescentSettings,
    overrides: DescentSettingsOverrides = {}
): DescentSettings {
    return {
        tolerance: overrides.tolerance ?? base.tolerance,
        maxIterations: overrides.maxIterations ?? base.maxIterations,
        lineSearch: {
            ...base.lineSearch,
            ...(overrides.lineSearch || {}),
        },
        finiteDifference: {
            ...base.finiteDifference,
            ...(overrides.finiteDifference || {}),
        },
        newton: {
            ...base.newton,
            ...(overrides.newton || {}),
        },
        dfp: {
            ...base.dfp,
            ...(overrides.dfp || {}),
        },
    };
}

/**
 * Default settings with overrides applied
 */
export function createDescentSettings(overrides: DescentSettingsOverrides = {}): DescentSettings {
    return mergeDescentSettings(defaultDescentSettings(), overrides);
}
