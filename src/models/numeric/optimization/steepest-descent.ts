/**
 * @module optimization/steepest-descent
 * @description Steepest descent: d = -grad f. Stateless.
 */

import { negate } from '../math/linear-algebra';
import type { DescentStrategy } from './types';

export type SteepestDescentState = Readonly<Record<string, never>>;

export const steepestDescent: DescentStrategy<SteepestDescentState> = {
    method: 'SD',

    init(): SteepestDescentState {
        return {};
    },

    direction(context, state) {
        return { direction: negate(context.gradient), fallback: false, state };
    },

    update(state) {
        return state;
    },
};
