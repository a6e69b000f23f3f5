/**
 * @module tasks/tank-design/contour
 * @description Objective surface sampled on a regular (D, L) grid for plotting
 */

import type { ContourOptions } from './config';
import { DEFAULT_CONTOUR_OPTIONS } from './config';
import type { TankModel } from './objective';
import type { ContourGrid } from './types';

/**
 * n evenly spaced values from start to stop, both included
 */
export function linspace(start: number, stop: number, n: number): number[] {
    if (n === 1) return [start];
    const step = (stop - start) / (n - 1);
    return Array.from({ length: n }, (_, i) => (i === n - 1 ? stop : start + i * step));
}

/**
 * Sample the model on a grid. Rows follow L, columns follow D.
 */
export function sampleContour(model: TankModel, options: Partial<ContourOptions> = {}): ContourGrid {
    const opts: ContourOptions = { ...DEFAULT_CONTOUR_OPTIONS, ...options };
    const d = linspace(opts.diameterRange[0], opts.diameterRange[1], opts.diameterSamples);
    const l = linspace(opts.lengthRange[0], opts.lengthRange[1], opts.lengthSamples);

    const evaluate = opts.field === 'cost'
        ? (D: number, L: number) => model.cost({ D, L })
        : (D: number, L: number) => model.penalized({ D, L });

    const values = l.map(L => d.map(D => evaluate(D, L)));
    return { field: opts.field, d, l, values };
}
