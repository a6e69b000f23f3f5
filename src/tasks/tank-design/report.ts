/**
 * @module tasks/tank-design/report
 * @description Run summaries, zig-zag diagnostics and export formats
 */

import type { MethodTag } from '../../models/numeric/optimization';
import { METHOD_TAGS } from '../../models/numeric/optimization';
import type { ComparisonPayload, MethodRunSummary, TrajectoryPoint } from './types';

// ==================== Types ====================

/**
 * One table row per method run
 */
export interface RunSummaryRow {
    method: MethodTag;
    status: string;
    iterations: number;
    evaluations: number;
    /** Evaluations per accepted step (evaluations when no step was taken) */
    evaluationsPerIteration: number;
    finalD: number;
    finalL: number;
    finalCost: number;
    finalVolume: number;
    feasible: boolean;
    reversals: number;
    fallbacks: number;
}

// ==================== Diagnostics ====================

/**
 * Number of consecutive step pairs that point in opposing directions
 * (negative dot product), a measure of zig-zag
 */
export function countDirectionReversals(history: readonly Pick<TrajectoryPoint, 'D' | 'L'>[]): number {
    let reversals = 0;
    for (let k = 2; k < history.length; k++) {
        const s1D = history[k - 1].D - history[k - 2].D;
        const s1L = history[k - 1].L - history[k - 2].L;
        const s2D = history[k].D - history[k - 1].D;
        const s2L = history[k].L - history[k - 1].L;
        if (s1D * s2D + s1L * s2L < 0) reversals++;
    }
    return reversals;
}

// ==================== Summaries ====================

export function summarizeRun(run: MethodRunSummary): RunSummaryRow {
    return {
        method: run.method,
        status: run.termination.status,
        iterations: run.iterations,
        evaluations: run.evaluationCount,
        evaluationsPerIteration: run.evaluationCount / Math.max(1, run.iterations),
        finalD: run.finalPoint.D,
        finalL: run.finalPoint.L,
        finalCost: run.finalCost,
        finalVolume: run.finalVolume,
        feasible: run.feasible,
        reversals: countDirectionReversals(run.history),
        fallbacks: run.fallbacks,
    };
}

export function summarizeComparison(comparison: ComparisonPayload): RunSummaryRow[] {
    return METHOD_TAGS.map(method => summarizeRun(comparison.results[method]));
}

/**
 * Fixed-width text table for terminal output
 */
export function formatSummaryTable(rows: readonly RunSummaryRow[]): string {
    const header = ['method', 'status', 'iter', 'evals', 'D', 'L', 'cost', 'volume', 'feasible', 'zigzag'];
    const lines = rows.map(r => [
        r.method,
        r.status,
        String(r.iterations),
        String(r.evaluations),
        r.finalD.toFixed(4),
        r.finalL.toFixed(4),
        r.finalCost.toFixed(2),
        r.finalVolume.toFixed(4),
        r.feasible ? 'yes' : 'no',
        String(r.reversals),
    ]);
    const widths = header.map((h, i) => Math.max(h.length, ...lines.map(l => l[i].length)));
    const fmt = (cells: string[]): string => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
    return [fmt(header), ...lines.map(fmt)].join('\n');
}

// ==================== Export Formats ====================

/**
 * Export any report value to a JSON string
 */
export function reportToJson(report: unknown): string {
    return JSON.stringify(report, null, 2);
}

/**
 * Export a trajectory to CSV
 */
export function historyToCSV(history: readonly TrajectoryPoint[]): string {
    const headers = ['iteration', 'D', 'L', 'cost', 'gradientNorm'];
    const rows = history.map((p, i) => [i, p.D, p.L, p.cost, p.gradientNorm].join(','));
    return [headers.join(','), ...rows].join('\n');
}
