#!/usr/bin/env npx tsx
/**
 * @module tasks/tank-design/cli
 * @description Command-line interface for the tank design optimizer
 *
 * Usage:
 *   npx tsx src/tasks/tank-design/cli.ts --scenario 0
 *   npx tsx src/tasks/tank-design/cli.ts --d0 0.8 --l0 1.2 --method Newton
 *   npx tsx src/tasks/tank-design/cli.ts --scenario narrow-valley --compare
 *   npm run task:tank -- --scenario 5
 */

import { ConsoleLogger } from '../../core/logging';
import { ValidationError, wrapError } from '../../core/errors';
import { computeConfigHash, mergeTankTaskConfig } from './config';
import { runComparison, runOptimization } from './controller';
import { buildRequest, parseArgs } from './cli-args';
import { formatSummaryTable, reportToJson, summarizeComparison, summarizeRun } from './report';
import { SCENARIOS } from './scenarios';
import { parseComparisonRequest, parseRunRequest } from './schema';

function printHelp(): void {
    console.log(`
Tank design - steepest descent / Newton / DFP on a penalized cost

Usage:
  npx tsx src/tasks/tank-design/cli.ts [options]

Options:
  -h, --help            Show this help message
  -s, --scenario N|ID   Run a preset (index or id)
      --d0 X            Initial diameter (m)
      --l0 Y            Initial length (m)
  -m, --method M        SD | Newton | DFP (default: SD)
      --tol T           Gradient-norm tolerance (default: 1e-6)
      --max-iter N      Iteration cap (default: 200)
  -c, --compare         Run all three methods from the same start
  -v, --verbose         Log every iteration
      --json            Print the full payload as JSON

Scenarios:
${SCENARIOS.map((s, i) => `  ${i}  ${s.id.padEnd(18)} ${s.description}`).join('\n')}
`);
}

function main(): void {
    const args = parseArgs(process.argv.slice(2));
    if (args.help) {
        printHelp();
        return;
    }

    console.log('');
    console.log('============================================================');
    console.log('     TANK DESIGN - descent method comparison               ');
    console.log('============================================================');
    console.log('');

    try {
        const cfg = mergeTankTaskConfig();
        const logger = new ConsoleLogger({ task: cfg.taskName, level: args.verbose ? 'debug' : 'info' });
        const request = buildRequest(args);
        console.log(`Config hash: ${computeConfigHash(cfg)}`);
        console.log('');

        if (args.compare) {
            const comparison = runComparison(parseComparisonRequest(request), { logger });
            console.log('');
            console.log(formatSummaryTable(summarizeComparison(comparison)));
            if (args.json) console.log(reportToJson(comparison));
        } else {
            const payload = runOptimization(parseRunRequest(request), { logger });
            console.log('');
            console.log(formatSummaryTable([summarizeRun(payload)]));
            console.log(`Termination: ${payload.termination.reason}`);
            if (args.json) console.log(reportToJson(payload));
        }
        logger.close();

        console.log('');
        console.log('[OK] Run completed');
        console.log('');
    } catch (error) {
        console.error('');
        console.error('[FAILED] Run failed:');
        if (error instanceof ValidationError) {
            for (const issue of error.issues) console.error(`  ${issue}`);
        } else {
            const wrapped = wrapError(error);
            console.error(`  [${wrapped.code}] ${wrapped.message}`);
        }
        console.error('');
        process.exit(1);
    }
}

main();
