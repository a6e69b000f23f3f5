/**
 * @module tasks
 * @description Optimization tasks
 *
 * - tank-design: cylindrical tank cost with volume and dimension bounds
 */

export * as tankDesign from './tank-design';
