/**
 * @module src/models/numeric
 * @description Numerical Methods and Optimization
 *
 * Contains:
 * - Linear algebra: vector and small dense matrix operations
 * - Optimization: steepest descent, Newton, DFP with backtracking line search
 */

import * as math from './math';
import * as optimization from './optimization';

// Re-export as namespaces
export { math, optimization };

// Direct exports for common functions
export * from './optimization';
