import test from 'node:test';
import assert from 'node:assert/strict';

import { createSpecification, validateSpecificationInput, type SpecificationInput } from '../src/specification';
import { SpecificationValidationError } from '../src/structured_error';

const VALID: SpecificationInput = {
    intent: 'Add a slug helper',
    success_criteria: ['Slugs are lowercase'],
    budgets: {
        max_loc_delta: 40,
        max_new_files: 1,
        max_new_dependencies: 0,
        max_new_abstractions: 1,
        max_cyclomatic_complexity: 10,
    },
    risk_level: 'low',
};

test('a valid specification is created frozen', () => {
    const spec = createSpecification(VALID);
    assert.equal(spec.variant, 'base');
    assert.ok(Object.isFrozen(spec));
    assert.ok(Object.isFrozen(spec.success_criteria));
    assert.ok(Object.isFrozen(spec.budgets));
    assert.deepEqual(spec.acceptance_tests, []);
});

test('forbidden patterns behave as a set', () => {
    const spec = createSpecification({ ...VALID, forbidden_patterns: ['eval', 'eval', 'globals'] });
    assert.deepEqual(spec.forbidden_patterns, ['eval', 'globals']);
});

test('input arrays are copied', () => {
    const criteria = ['Slugs are lowercase'];
    const spec = createSpecification({ ...VALID, success_criteria: criteria });
    criteria.push('Added later');
    assert.equal(spec.success_criteria.length, 1);
});

test('every problem is reported at once', () => {
    const issues = validateSpecificationInput({
        ...VALID,
        intent: '   ',
        success_criteria: [],
        risk_level: 'extreme',
        budgets: { ...VALID.budgets, max_loc_delta: 0 },
    });
    assert.deepEqual(issues, [
        'intent must not be empty',
        'success_criteria must not be empty',
        'risk_level must be one of low, medium, high, critical (got "extreme")',
        'budgets.max_loc_delta must be positive',
    ]);
});

test('budget fields must be non-negative integers', () => {
    const issues = validateSpecificationInput({
        ...VALID,
        budgets: { ...VALID.budgets, max_new_files: -1, max_new_abstractions: 1.5 },
    });
    assert.deepEqual(issues, [
        'budgets.max_new_files must be a non-negative integer (got -1)',
        'budgets.max_new_abstractions must be a non-negative integer (got 1.5)',
    ]);
});

test('blank criteria are rejected', () => {
    assert.deepEqual(validateSpecificationInput({ ...VALID, success_criteria: ['ok', ' '] }), [
        'success_criteria must not contain blank entries',
    ]);
});

test('invalid input throws SpecificationValidationError', () => {
    assert.throws(
        () => createSpecification({ ...VALID, intent: '' }),
        (err: unknown) =>
            err instanceof SpecificationValidationError &&
            err.code === 'INVALID_SPEC' &&
            err.message === 'Invalid specification: intent must not be empty' &&
            err.issues.length === 1
    );
});
