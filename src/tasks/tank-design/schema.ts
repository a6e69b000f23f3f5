/**
 * @module tasks/tank-design/schema
 * @description Request validation for runs and comparisons
 *
 * Numbers are coerced so that CLI flags and loosely typed JSON bodies are
 * accepted; everything else about the request must be well formed before the
 * engine starts.
 */

import { z } from 'zod';
import { ValidationError } from '../../core/errors';
import { METHOD_TAGS } from '../../models/numeric/optimization';

// ==================== Schemas ====================

export const MethodTagSchema = z.enum(METHOD_TAGS);

export const DesignPointSchema = z.object({
    D: z.coerce.number().finite().positive(),
    L: z.coerce.number().finite().positive(),
});

export const LineSearchOverridesSchema = z.object({
    initialStep: z.number().finite().positive().optional(),
    warmStart: z.boolean().optional(),
    shrinkFactor: z.number().gt(0).lt(1).optional(),
    armijo: z.number().gt(0).lt(1).optional(),
    maxShrinks: z.number().int().min(1).optional(),
    minStep: z.number().positive().optional(),
});

export const DescentOverridesSchema = z.object({
    lineSearch: LineSearchOverridesSchema.optional(),
    finiteDifference: z.object({
        gradientStep: z.number().positive().optional(),
        hessianStep: z.number().positive().optional(),
        jumpTolerance: z.number().positive().optional(),
    }).optional(),
    newton: z.object({
        maxStepNorm: z.number().positive().optional(),
    }).optional(),
    dfp: z.object({
        curvatureTolerance: z.number().positive().optional(),
    }).optional(),
});

const runFields = {
    initialPoint: DesignPointSchema,
    /** Falls back to the configured default when absent */
    tolerance: z.coerce.number().finite().positive().optional(),
    maxIterations: z.coerce.number().int().min(0).optional(),
    descent: DescentOverridesSchema.optional(),
};

export const RunRequestSchema = z.object({
    ...runFields,
    method: MethodTagSchema.default('SD'),
});

export const ComparisonRequestSchema = z.object(runFields);

export type RunRequestInput = z.input<typeof RunRequestSchema>;
export type RunRequest = z.output<typeof RunRequestSchema>;
export type ComparisonRequestInput = z.input<typeof ComparisonRequestSchema>;
export type ComparisonRequest = z.output<typeof ComparisonRequestSchema>;

// ==================== Parsing ====================

export function formatZodErrors(error: z.ZodError): string[] {
    return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        const issues = formatZodErrors(parsed.error);
        throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
}

/**
 * Validate a single-method run request
 * @throws ValidationError
 */
export function parseRunRequest(input: unknown): RunRequest {
    return parseWith(RunRequestSchema, input, 'run request');
}

/**
 * Validate a comparison request
 * @throws ValidationError
 */
export function parseComparisonRequest(input: unknown): ComparisonRequest {
    return parseWith(ComparisonRequestSchema, input, 'comparison request');
}
