/**
 * @module core/logging
 * @description Structured logging for optimization runs
 *
 * Entries follow a fixed, versioned field schema at three levels: one entry per
 * accepted iterate, one per finished run, one per method comparison.
 * ConsoleLogger prints a compact line per entry; MemoryLogger keeps entries for
 * tests and JSON/JSONL export.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Task identifier */
    task: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Iteration-level log entry (one per History record)
 */
export interface IterationLogEntry extends BaseLogEntry {
    logType: 'iteration';
    method: string;
    iteration: number;
    point: number[];
    value: number;
    gradientNorm: number;
    /** Accepted step length (absent for the starting point) */
    stepSize?: number;
    /** Whether the direction fell back to steepest descent */
    fallback?: boolean;
    fallbackReason?: string;
}

/**
 * Run-level summary log entry
 */
export interface RunLogEntry extends BaseLogEntry {
    logType: 'run';
    method: string;
    status: string;
    reason: string;
    iterations: number;
    evaluations: number;
    finalValue: number;
    finalPoint: number[];
    fallbacks: number;
}

/**
 * Comparison-level log entry (several methods from one start)
 */
export interface ComparisonLogEntry extends BaseLogEntry {
    logType: 'comparison';
    start: number[];
    runs: Array<{
        method: string;
        status: string;
        iterations: number;
        evaluations: number;
        finalValue: number;
    }>;
}

/**
 * Union of all log entry types
 */
export type LogEntry = IterationLogEntry | RunLogEntry | ComparisonLogEntry;

type EntryInput<E extends LogEntry> = Omit<E, 'logType' | 'schemaVersion' | 'timestamp' | 'task'>;

export type IterationLogInput = EntryInput<IterationLogEntry>;
export type RunLogInput = EntryInput<RunLogEntry>;
export type ComparisonLogInput = EntryInput<ComparisonLogEntry>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log an accepted iterate */
    logIteration(entry: IterationLogInput): void;
    /** Log a finished run */
    logRun(entry: RunLogInput): void;
    /** Log a method comparison */
    logComparison(entry: ComparisonLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Task name stamped on every entry */
    task: string;
    /** Schema version */
    schemaVersion?: string;
    /** Console verbosity */
    level?: LogLevel;
    /** Whether to keep iteration-level entries (can be verbose) */
    logIterations?: boolean;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

// ==================== Console Logger ====================

/**
 * Console Logger: print one line per entry
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;
    private task: string;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
            this.task = 'unknown';
        } else {
            this.level = levelOrConfig.level ?? 'info';
            this.task = levelOrConfig.task;
        }
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    logIteration(entry: IterationLogInput): void {
        if (this.enabled('debug')) {
            console.log(
                `[ITER] ${entry.method} k=${entry.iteration}: x=(${entry.point.map(v => v.toFixed(6)).join(', ')}) ` +
                `f=${entry.value.toFixed(6)} |g|=${entry.gradientNorm.toExponential(3)}` +
                (entry.fallback ? ` (fallback${entry.fallbackReason ? `: ${entry.fallbackReason}` : ''})` : '')
            );
        }
    }

    logRun(entry: RunLogInput): void {
        if (this.enabled('info')) {
            console.log(
                `[RUN] ${this.task}/${entry.method}: status=${entry.status}, ` +
                `iterations=${entry.iterations}, evaluations=${entry.evaluations}, ` +
                `f=${entry.finalValue.toFixed(6)}`
            );
        }
    }

    logComparison(entry: ComparisonLogInput): void {
        if (this.enabled('info')) {
            const parts = entry.runs.map(r => `${r.method}=${r.iterations}it/${r.evaluations}ev`);
            console.log(`[COMPARE] start=(${entry.start.join(', ')}) ${parts.join(' ')}`);
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: store entries in memory
 * Useful for testing and for exporting a run after the fact.
 */
export class MemoryLogger implements Logger {
    private config: { task: string; schemaVersion: string; logIterations: boolean };
    public iterations: IterationLogEntry[] = [];
    public runs: RunLogEntry[] = [];
    public comparisons: ComparisonLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = {
            task: config.task,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
            logIterations: config.logIterations ?? true,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            task: this.config.task,
            timestamp: Date.now(),
        };
    }

    logIteration(entry: IterationLogInput): void {
        if (!this.config.logIterations) return;
        this.iterations.push({
            ...this.createBaseEntry(),
            logType: 'iteration',
            ...entry,
        });
    }

    logRun(entry: RunLogInput): void {
        this.runs.push({
            ...this.createBaseEntry(),
            logType: 'run',
            ...entry,
        });
    }

    logComparison(entry: ComparisonLogInput): void {
        this.comparisons.push({
            ...this.createBaseEntry(),
            logType: 'comparison',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.iterations, ...this.runs, ...this.comparisons];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            iterations: this.iterations,
            runs: this.runs,
            comparisons: this.comparisons,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.iterations = [];
        this.runs = [];
        this.comparisons = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logIteration(entry: IterationLogInput): void {
        for (const logger of this.loggers) {
            logger.logIteration(entry);
        }
    }

    logRun(entry: RunLogInput): void {
        for (const logger of this.loggers) {
            logger.logRun(entry);
        }
    }

    logComparison(entry: ComparisonLogInput): void {
        for (const logger of this.loggers) {
            logger.logComparison(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger by format
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
