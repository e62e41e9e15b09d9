import test from 'node:test';
import assert from 'node:assert/strict';

import { IntentGoalExtractor } from '../src/goal_extractor';
import { createDefaultPolicy, type Policy } from '../src/policy';
import { allocateBudget, assessRisk, estimateComplexity, SpecificationBuilder } from '../src/spec_builder';

const policy = createDefaultPolicy('demo', '/workspace/demo');
const builder = new SpecificationBuilder();

function policyWithMaxLoc(maxLoc: number): Policy {
    return { ...policy, budgets: { ...policy.budgets, max_loc: maxLoc } };
}

test('complexity from keywords', () => {
    assert.equal(estimateComplexity('Add payment processing'), 'high');
    assert.equal(estimateComplexity('Create a new API endpoint'), 'medium');
    assert.equal(estimateComplexity('format dates'), 'low');
});

test('complexity from word count when no keyword matches', () => {
    assert.equal(estimateComplexity('make the colours nicer'), 'low');
    assert.equal(estimateComplexity('make the page look nicer for people who visit on phones'), 'medium');
    assert.equal(estimateComplexity(Array(30).fill('word').join(' ')), 'high');
});

test('risk from domain keywords', () => {
    assert.equal(assessRisk('admin panel'), 'critical');
    assert.equal(assessRisk('add encryption at rest'), 'high');
    assert.equal(assessRisk('add a cache layer'), 'medium');
    assert.equal(assessRisk('rename a variable'), 'low');
});

test('budget allocation by complexity class', () => {
    assert.deepEqual(allocateBudget(policy, 'low'), {
        max_loc_delta: 150,
        max_new_files: 3,
        max_new_dependencies: 0,
        max_new_abstractions: 5,
        max_cyclomatic_complexity: 10,
    });
    assert.equal(allocateBudget(policy, 'medium').max_loc_delta, 300);
    assert.equal(allocateBudget(policy, 'medium').max_new_dependencies, 1);
    assert.equal(allocateBudget(policy, 'high').max_loc_delta, 500);
    assert.equal(allocateBudget(policy, 'high').max_new_files, 10);
});

test('allocation never drops below one line', () => {
    assert.equal(allocateBudget(policyWithMaxLoc(3), 'low').max_loc_delta, 1);
});

test('hard constraints shape the allocation', () => {
    const goals = new IntentGoalExtractor().extract('functional parser with no dependencies');
    const budget = allocateBudget(policy, 'high', goals);
    assert.equal(budget.max_new_dependencies, 0);
    assert.equal(budget.max_new_abstractions, 1);
});

test('base specification for an endpoint intent', () => {
    const spec = builder.generate('Add a login endpoint', policy);
    assert.equal(spec.variant, 'base');
    assert.equal(spec.risk_level, 'medium');
    assert.equal(spec.budgets.max_loc_delta, 300);
    assert.deepEqual(spec.success_criteria, [
        'Implement: Add a login endpoint',
        'User can authenticate with valid credentials',
        'Invalid credentials are rejected',
        'Password is securely hashed',
        'Endpoint returns correct status codes',
        'Response format matches specification',
        'Error cases are handled properly',
    ]);
    assert.deepEqual(spec.security_considerations, ['Validate all input parameters', 'Apply rate limiting']);
    assert.deepEqual(spec.acceptance_tests.map(t => t.name), ['test_add_a_login_endpoint']);
    assert.deepEqual(spec.forbidden_patterns, []);
});

test('extracted goals add criteria and forbidden patterns', () => {
    const goals = new IntentGoalExtractor().extract('Build a simple functional formatter');
    const spec = builder.generate('Build a simple functional formatter', policy, goals);
    assert.equal(spec.budgets.max_loc_delta, 150);
    assert.equal(spec.budgets.max_new_abstractions, 1);
    assert.deepEqual(spec.forbidden_patterns, ['class_definitions']);
    assert.deepEqual(spec.success_criteria, [
        'Implement: Build a simple functional formatter',
        'Implementation is complete and functional',
        'Code follows project conventions',
        'Uses the fewest abstractions that satisfy the intent',
    ]);
});

test('policy forbidden patterns carry over by name', () => {
    const strict: Policy = {
        ...policy,
        forbidden_patterns: [{ name: 'eval', description: 'No eval', rule: 'eval\\(', severity: 'error' }],
    };
    assert.deepEqual(builder.generate('format dates', strict).forbidden_patterns, ['eval']);
});

test('variants are simplified then robust above 100 lines', () => {
    const base = builder.generate('Add a login endpoint', policy);
    const [simplified, robust] = builder.deriveVariants(base);

    assert.equal(simplified.variant, 'simplified');
    assert.equal(simplified.intent, 'Add a login endpoint (simplified)');
    assert.equal(simplified.budgets.max_loc_delta, 210);
    assert.equal(simplified.budgets.max_new_abstractions, 4);
    assert.equal(simplified.risk_level, 'low');
    assert.equal(simplified.success_criteria.length, 3);

    assert.equal(robust.variant, 'robust');
    assert.equal(robust.intent, 'Add a login endpoint (production-ready)');
    assert.equal(robust.budgets.max_loc_delta, 360);
    assert.equal(robust.budgets.max_new_abstractions, 6);
    assert.equal(robust.risk_level, 'medium');
    assert.deepEqual(robust.success_criteria.slice(-3), [
        'Has comprehensive error handling',
        'Includes type annotations',
        'Has documentation comments',
    ]);
    assert.deepEqual(robust.acceptance_tests.map(t => t.name), ['test_add_a_login_endpoint', 'error_handling_test']);

    // the base is untouched
    assert.equal(base.intent, 'Add a login endpoint');
    assert.equal(base.budgets.max_loc_delta, 300);
});

test('no simplified variant at or below 100 lines', () => {
    const base = builder.generate('format dates', policyWithMaxLoc(600));
    assert.equal(base.budgets.max_loc_delta, 90);
    assert.deepEqual(builder.deriveVariants(base).map(s => s.variant), ['robust']);
});

test('robust criteria are not duplicated', () => {
    const goals = new IntentGoalExtractor().extract('robust date formatter');
    const base = builder.generate('robust date formatter', policy, goals);
    const robust = builder.robust(base);
    const occurrences = robust.success_criteria.filter(c => c === 'Has comprehensive error handling').length;
    assert.equal(occurrences, 1);
});
