/**
 * Error Tests
 */

import { describe, it, expect } from 'vitest';
import {
    DescentError,
    ErrorCodes,
    ScenarioNotFoundError,
    ValidationError,
    hasErrorCode,
    isDescentError,
    wrapError,
} from '../src/core/errors';

describe('DescentError', () => {
    it('should carry a code, details and timestamp', () => {
        const error = new DescentError(ErrorCodes.INTERNAL_ERROR, 'no progress', { step: 0 });
        const json = error.toJSON();

        expect(error).toBeInstanceOf(Error);
        expect(json.name).toBe('DescentError');
        expect(json.code).toBe('INTERNAL_ERROR');
        expect(json.message).toBe('no progress');
        expect(json.details).toEqual({ step: 0 });
        expect(json.timestamp).toBe(error.timestamp);
    });
});

describe('ValidationError', () => {
    it('should keep its issues', () => {
        const error = new ValidationError('Invalid run request', ['method: bad']);

        expect(error.name).toBe('ValidationError');
        expect(error.code).toBe(ErrorCodes.VALIDATION_ERROR);
        expect(error.issues).toEqual(['method: bad']);
        expect(isDescentError(error)).toBe(true);
    });

    it('should match its code only', () => {
        const error = new ValidationError('Invalid run request');
        expect(hasErrorCode(error, ErrorCodes.VALIDATION_ERROR)).toBe(true);
        expect(hasErrorCode(error, ErrorCodes.SCENARIO_NOT_FOUND)).toBe(false);
        expect(error.issues).toEqual([]);
    });
});

describe('ScenarioNotFoundError', () => {
    it('should name the available range', () => {
        const error = new ScenarioNotFoundError(9, 8);

        expect(error.message).toBe('Scenario 9 not found (available: 0..7)');
        expect(error.code).toBe(ErrorCodes.SCENARIO_NOT_FOUND);
        expect(error.details).toEqual({ id: 9, available: 8 });
    });
});

describe('wrapError', () => {
    it('should pass DescentErrors through', () => {
        const error = new ScenarioNotFoundError('x', 8);
        expect(wrapError(error)).toBe(error);
    });

    it('should wrap plain errors and values', () => {
        const wrapped = wrapError(new TypeError('boom'));
        expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);
        expect(wrapped.message).toBe('boom');
        expect(wrapped.details).toMatchObject({ originalName: 'TypeError' });

        const fromString = wrapError('oops', ErrorCodes.VALIDATION_ERROR);
        expect(fromString.code).toBe(ErrorCodes.VALIDATION_ERROR);
        expect(fromString.message).toBe('oops');
    });

    it('should reject non-errors in type guards', () => {
        expect(isDescentError(new Error('plain'))).toBe(false);
        expect(hasErrorCode('text', ErrorCodes.INTERNAL_ERROR)).toBe(false);
    });
});
