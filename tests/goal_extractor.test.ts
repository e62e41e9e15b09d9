import test from 'node:test';
import assert from 'node:assert/strict';

import { IntentGoalExtractor } from '../src/goal_extractor';

const extractor = new IntentGoalExtractor();

test('quality wins the optimisation target over simplicity', () => {
    const goals = extractor.extract('Build a robust, simple exporter');
    assert.deepEqual(goals.explicit_goals, ['high_quality', 'simplicity']);
    assert.equal(goals.optimization_target, 'maximize_quality');
    // simplicity runs second and overwrites the code_quality weight
    assert.deepEqual(goals.implied_goals, { code_quality: 0.2, testability: 0.15, simplicity: 0.3 });
});

test('simplicity alone targets speed', () => {
    const goals = extractor.extract('quick helper for slugs');
    assert.deepEqual(goals.explicit_goals, ['simplicity']);
    assert.equal(goals.optimization_target, 'maximize_speed');
    assert.deepEqual(goals.implied_goals, { simplicity: 0.3, code_quality: 0.2 });
});

test('maintainability and performance leave the target alone', () => {
    const goals = extractor.extract('fast, clean parser with no dependencies');
    assert.deepEqual(goals.explicit_goals, ['maintainability', 'performance']);
    assert.equal(goals.optimization_target, 'balance');
    assert.deepEqual(goals.implied_goals, { maintainability: 0.3 });
    assert.deepEqual(goals.constraints, ['optimize_for_performance', 'no_external_dependencies']);
});

test('testability and the no_classes constraint', () => {
    const goals = extractor.extract('functional utilities, TDD');
    assert.deepEqual(goals.explicit_goals, ['testability']);
    assert.deepEqual(goals.implied_goals, { testability: 0.15 });
    assert.deepEqual(goals.constraints, ['no_classes']);
});

test('matching is case-insensitive', () => {
    assert.deepEqual(extractor.extract('PRODUCTION grade importer').explicit_goals, ['high_quality']);
});

test('an intent with no keywords yields the balanced default', () => {
    assert.deepEqual(extractor.extract(''), {
        explicit_goals: [],
        implied_goals: {},
        optimization_target: 'balance',
        constraints: [],
    });
});
