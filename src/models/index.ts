/**
 * @module src/models
 * @description Numerical models
 *
 * - numeric/: Numerical methods (math + optimization)
 */

export * as numeric from './numeric';
