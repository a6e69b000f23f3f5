/**
 * @module optimization
 * @description Line-search descent methods on finite-difference derivatives
 *
 * Provides:
 * - Steepest descent, Newton and DFP direction strategies
 * - Backtracking (Armijo) line search
 * - Counted objective wrapper with central-difference gradient and Hessian
 */

export * from './types';
export * from './settings';
export * from './evaluation-counter';
export * from './line-search';
export * from './steepest-descent';
export * from './newton';
export * from './dfp';
export * from './descent';
