/**
 * @module core
 * @description Cross-cutting building blocks shared by the numeric engine and the tasks
 *
 * ## Modules
 * - `constraint`: Inequality constraints as signed margins, with reports
 * - `logging`: Structured iteration/run/comparison logging
 * - `errors`: Unified error types and codes
 */

// ==================== Constraint ====================

export type {
    ConstraintOperator,
    ConstraintMetadata,
    ConstraintEvaluator,
    ConstraintSpec,
    ConstraintResult,
    ConstraintViolationDetail,
    ConstraintReport,
} from './constraint';

export {
    leConstraint,
    geConstraint,
    constraintMargin,
    constraintMargins,
    evaluateConstraint,
    evaluateConstraints,
} from './constraint';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    IterationLogEntry,
    RunLogEntry,
    ComparisonLogEntry,
    LogEntry,
    IterationLogInput,
    RunLogInput,
    ComparisonLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Errors ====================

export type { ErrorCode } from './errors';

export {
    ErrorCodes,
    DescentError,
    ValidationError,
    ScenarioNotFoundError,
    isDescentError,
    hasErrorCode,
    wrapError,
} from './errors';
