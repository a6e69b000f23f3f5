/**
 * @module tasks/tank-design/cli-args
 * @description Command-line flag parsing for the tank design CLI
 *
 * Values are kept as given; the request schema does the type checking.
 */

import { getScenario } from './scenarios';

export interface CliArgs {
    scenario?: string;
    d0?: string;
    l0?: string;
    method?: string;
    tol?: string;
    maxIter?: string;
    compare: boolean;
    verbose: boolean;
    json: boolean;
    help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = {
        compare: false,
        verbose: false,
        json: false,
        help: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--compare' || arg === '-c') {
            args.compare = true;
        } else if (arg === '--verbose' || arg === '-v') {
            args.verbose = true;
        } else if (arg === '--json') {
            args.json = true;
        } else if (arg === '--scenario' || arg === '-s') {
            args.scenario = argv[++i];
        } else if (arg === '--d0') {
            args.d0 = argv[++i];
        } else if (arg === '--l0') {
            args.l0 = argv[++i];
        } else if (arg === '--method' || arg === '-m') {
            args.method = argv[++i];
        } else if (arg === '--tol') {
            args.tol = argv[++i];
        } else if (arg === '--max-iter') {
            args.maxIter = argv[++i];
        }
    }

    return args;
}

/**
 * Scenario flags accept an index ("3") or an id ("narrow-valley")
 */
export function scenarioKey(value: string): number | string {
    return /^\d+$/.test(value) ? Number(value) : value;
}

/**
 * Raw request from the flags; a scenario supplies the defaults for any flag left out
 */
export function buildRequest(args: CliArgs): Record<string, unknown> {
    if (args.scenario !== undefined) {
        const scenario = getScenario(scenarioKey(args.scenario));
        return {
            initialPoint: scenario.initialPoint,
            method: args.method ?? scenario.method,
            tolerance: args.tol ?? scenario.tolerance,
            maxIterations: args.maxIter ?? scenario.maxIterations,
        };
    }
    return {
        initialPoint: { D: args.d0, L: args.l0 },
        method: args.method,
        tolerance: args.tol,
        maxIterations: args.maxIter,
    };
}
