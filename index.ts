/**
 * @packageDocumentation
 * @module tank-descent
 *
 * Line-search descent methods (steepest descent, Newton, DFP) on a
 * barrier/penalty objective, applied to sizing a cylindrical tank.
 *
 * ## Modules
 * - `core` - constraints as signed margins, structured logging, errors
 * - `numeric` - linear algebra, finite differences, line search, descent strategies
 * - `tasks` - the tank design task (model, controller, scenarios, reports)
 *
 * ## Usage Example
 * ```typescript
 * import { tasks } from 'tank-descent';
 *
 * const payload = tasks.tankDesign.runOptimization({
 *     initialPoint: { D: 1.1, L: 1.5 },
 *     method: 'DFP',
 * });
 * console.log(payload.finalPoint, payload.finalCost);
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as numeric from './src/models/numeric';
export * as tasks from './src/tasks';

// ==================== Version ====================
export const VERSION = '1.0.0';
