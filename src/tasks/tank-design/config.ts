/**
 * @module tasks/tank-design/config
 * @description Tank design problem parameters and task configuration
 */

import {
    createDescentSettings,
    type DescentSettings,
    type DescentSettingsOverrides,
} from '../../models/numeric/optimization';

// ==================== Types ====================

/**
 * Admissible volume band as fractions of the nominal volume
 */
export interface VolumeBand {
    lower: number;
    upper: number;
}

/**
 * Physical and economic constants of the tank plus the constraint-handling weights
 */
export interface ProblemParameters {
    /** Nominal volume V0 (m^3) */
    nominalVolume: number;
    volumeBand: VolumeBand;
    /** Maximum diameter (m) */
    maxDiameter: number;
    /** Maximum length (m) */
    maxLength: number;
    /** Wall thickness t (m) */
    wallThickness: number;
    /** Steel density (kg/m^3) */
    density: number;
    /** Material cost ($/kg) */
    materialCost: number;
    /** Weld cost ($/m) */
    weldCost: number;
    /** Log-barrier weight on satisfied constraints */
    barrierWeight: number;
    /** Quadratic penalty weight on violated constraints */
    penaltyWeight: number;
    /** Constant-plus-slope term added whenever any constraint is violated */
    infeasibilityWall: number;
}

export interface ProblemParameterOverrides extends Partial<Omit<ProblemParameters, 'volumeBand'>> {
    volumeBand?: Partial<VolumeBand>;
}

/**
 * Which surface the contour grid samples
 */
export type ContourField = 'penalized' | 'cost';

export interface ContourOptions {
    /** Diameter range [min, max] (m) */
    diameterRange: [number, number];
    /** Length range [min, max] (m) */
    lengthRange: [number, number];
    /** Samples along D */
    diameterSamples: number;
    /** Samples along L */
    lengthSamples: number;
    field: ContourField;
}

/**
 * Full task configuration
 */
export interface TankTaskConfig {
    taskName: string;
    problem: Readonly<ProblemParameters>;
    descent: DescentSettings;
    contour: ContourOptions;
}

export interface TankTaskConfigOverrides {
    taskName?: string;
    problem?: ProblemParameterOverrides;
    descent?: DescentSettingsOverrides;
    contour?: Partial<ContourOptions>;
}

// ==================== Default Configuration ====================

export const DEFAULT_PROBLEM_PARAMETERS: Readonly<ProblemParameters> = Object.freeze({
    nominalVolume: 0.8,
    volumeBand: Object.freeze({ lower: 0.9, upper: 1.1 }),
    maxDiameter: 1.0,
    maxLength: 2.0,
    wallThickness: 0.03,
    density: 8000,
    materialCost: 4.5,
    weldCost: 20,
    barrierWeight: 1e-3,
    penaltyWeight: 1e6,
    infeasibilityWall: 1e6,
});

export const DEFAULT_CONTOUR_OPTIONS: Readonly<ContourOptions> = {
    diameterRange: [0.1, 1.2],
    lengthRange: [0.1, 2.2],
    diameterSamples: 50,
    lengthSamples: 50,
    field: 'penalized',
};

// ==================== Factory Functions ====================

/**
 * Frozen problem parameters with overrides applied
 */
export function createProblemParameters(overrides: ProblemParameterOverrides = {}): Readonly<ProblemParameters> {
    return Object.freeze({
        ...DEFAULT_PROBLEM_PARAMETERS,
        ...overrides,
        volumeBand: Object.freeze({
            ...DEFAULT_PROBLEM_PARAMETERS.volumeBand,
            ...(overrides.volumeBand || {}),
        }),
    });
}

/**
 * Volume bounds [V_min, V_max] implied by the parameters
 */
export function volumeBounds(params: Readonly<ProblemParameters>): { min: number; max: number } {
    return {
        min: params.volumeBand.lower * params.nominalVolume,
        max: params.volumeBand.upper * params.nominalVolume,
    };
}

/**
 * Deep merge user config with defaults
 */
export function mergeTankTaskConfig(userCfg: TankTaskConfigOverrides = {}): TankTaskConfig {
    return {
        taskName: userCfg.taskName ?? 'tank-design',
        problem: createProblemParameters(userCfg.problem),
        descent: createDescentSettings(userCfg.descent),
        contour: {
            ...DEFAULT_CONTOUR_OPTIONS,
            ...(userCfg.contour || {}),
        },
    };
}

/**
 * Compute configuration hash for reproducibility
 */
export function computeConfigHash(cfg: TankTaskConfig): string {
    const str = JSON.stringify({
        problem: cfg.problem,
        descent: cfg.descent,
        contour: cfg.contour,
    });
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
        const char = str.charCodeAt(i);
        hash = ((hash << 5) - hash) + char;
        hash = hash & hash;
    }
    return Math.abs(hash).toString(16).slice(0, 8);
}
