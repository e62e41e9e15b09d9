import test from 'node:test';
import assert from 'node:assert/strict';

import { AlternativeGenerator } from '../src/alternative_generator';
import { createSpecification } from '../src/specification';

const spec = createSpecification({
    intent: 'Add a payment export job',
    success_criteria: ['Exports run nightly', 'Totals match ledger', 'Failures are retried', 'Output is CSV'],
    budgets: {
        max_loc_delta: 300,
        max_new_files: 3,
        max_new_dependencies: 2,
        max_new_abstractions: 5,
        max_cyclomatic_complexity: 10,
    },
    risk_level: 'high',
});

const generator = new AlternativeGenerator();

test('six strategies in fixed order', () => {
    const alternatives = generator.generateAlternatives(spec, 250);
    assert.deepEqual(alternatives.map(a => a.strategy), [
        'reduce_scope',
        'simplify_architecture',
        'reuse_existing',
        'defer_dependencies',
        'split_phases',
        'optimize_implementation',
    ]);
});

test('savings are a floored share of the exceeded amount', () => {
    const alternatives = generator.generateAlternatives(spec, 250);
    assert.deepEqual(alternatives.map(a => a.estimated_savings), [100, 75, 125, 62, 150, 50]);
    for (const alt of alternatives) {
        assert.ok(alt.estimated_savings <= 250);
    }
});

test('order is not re-ranked by savings', () => {
    const savings = generator.generateAlternatives(spec, 1000).map(a => a.estimated_savings);
    assert.notDeepEqual(savings, [...savings].sort((a, b) => b - a));
});

test('implementation notes are written from the specification', () => {
    const [reduce, simplify, reuse, defer, split, optimize] = generator.generateAlternatives(spec, 250);
    assert.equal(reduce.implementation, 'Review the 4 success criteria and keep the 2 essential to the intent');
    assert.equal(simplify.implementation, 'Cut the planned 5 abstractions to 4 by replacing layered patterns with direct code');
    assert.equal(reuse.implementation, 'Search the codebase for components covering part of the 300 planned lines and extend them');
    assert.equal(defer.implementation, 'Defer 2 new dependencies; use built-in facilities until the core is proven');
    assert.equal(split.implementation, 'Ship phase 1 with about 150 lines covering the core criteria; defer the rest');
    assert.equal(optimize.implementation, 'Tighten critical paths; at high risk keep every security-relevant check');
});

test('descriptions are stable', () => {
    const alternatives = generator.generateAlternatives(spec, 10);
    assert.equal(alternatives[0].description, 'Remove non-essential features from specification');
    assert.equal(alternatives[3].description, 'Implement core functionality without external libraries');
});

test('nothing exceeded means nothing saved', () => {
    assert.ok(generator.generateAlternatives(spec, 0).every(a => a.estimated_savings === 0));
    assert.ok(generator.generateAlternatives(spec, -40).every(a => a.estimated_savings === 0));
});

test('small overruns floor to whole units', () => {
    assert.deepEqual(generator.generateAlternatives(spec, 3).map(a => a.estimated_savings), [1, 0, 1, 0, 1, 0]);
});
