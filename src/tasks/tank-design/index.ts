/**
 * @module tasks/tank-design
 * @description Cylindrical tank cost minimization under volume and size bounds
 *
 * ## Usage
 * ```typescript
 * import { runOptimization, runComparison } from './tasks/tank-design';
 *
 * const run = runOptimization({ initialPoint: { D: 0.45, L: 0.55 }, method: 'DFP' });
 * const all = runComparison({ initialPoint: { D: 0.98, L: 0.95 }, maxIterations: 100 });
 * ```
 */

// Types
export * from './types';

// Configuration
export * from './config';

// Model
export * from './constraints';
export * from './objective';
export * from './contour';

// Requests and entry points
export * from './schema';
export * from './controller';
export * from './scenarios';

// Reporting
export * from './report';
