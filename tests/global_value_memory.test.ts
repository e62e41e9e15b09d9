import test from 'node:test';
import assert from 'node:assert/strict';

import { GlobalValueMemory } from '../src/global_value_memory';
import type { ActionPayload } from '../src/governance_types';
import { decodeValueState, type PersistedValueState, type ValueStateStore } from '../src/value_store';

const GOOD_CODE = [
    '/** Adds two numbers. */',
    'export function add(a: number, b: number): number {',
    '    try {',
    '        return a + b;',
    '    } catch (e) {',
    '        throw e;',
    '    }',
    '}',
].join('\n');

const GOOD_ACTION: ActionPayload = { type: 'task_execution', code: GOOD_CODE };
const EMPTY_ACTION: ActionPayload = { type: 'task_execution', code: '' };

/** In-process store that keeps the last saved record as JSON text. */
class MemoryStore implements ValueStateStore {
    readonly location = 'memory://value-state';
    saved: string | null = null;
    saves = 0;
    failLoad = false;
    failSave = false;

    load(): PersistedValueState | null {
        if (this.failLoad) throw new Error('disk unreadable');
        return this.saved === null ? null : decodeValueState(JSON.parse(this.saved), this.location);
    }

    save(state: PersistedValueState): void {
        if (this.failSave) throw new Error('disk full');
        this.saved = JSON.stringify(state);
        this.saves += 1;
    }
}

function clock(): () => string {
    let tick = 0;
    return () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++)).toISOString();
}

test('unregistered agents are approved with a warning and nothing is recorded', () => {
    const store = new MemoryStore();
    const memory = new GlobalValueMemory(store, { now: clock() });

    assert.deepEqual(memory.validateAgentAction('ghost', GOOD_ACTION), {
        approved: true,
        warnings: ['Agent not registered'],
        alignment_score: null,
        drift_detected: false,
    });
    assert.equal(memory.getAlignmentHistory().length, 0);
    assert.equal(store.saves, 0);
});

test('an aligned action is recorded and persisted', () => {
    const store = new MemoryStore();
    const memory = new GlobalValueMemory(store, { now: clock() });
    memory.registerAgent('gen-1', 'code_generator', ['completeness']);

    const outcome = memory.validateAgentAction('gen-1', GOOD_ACTION);
    assert.equal(outcome.approved, true);
    assert.equal(outcome.drift_detected, false);
    assert.deepEqual(outcome.warnings, []);

    const history = memory.getAlignmentHistory();
    assert.equal(history.length, 1);
    assert.equal(history[0].agent_id, 'gen-1');
    assert.equal(history[0].action_type, 'task_execution');
    assert.equal(store.saves, 1);
});

test('a low alignment score is a drift event with a leading warning', () => {
    const memory = new GlobalValueMemory(new MemoryStore(), { now: clock() });
    memory.registerAgent('tests-1', 'test_writer');

    const outcome = memory.validateAgentAction('tests-1', EMPTY_ACTION);
    assert.equal(outcome.approved, false);
    assert.equal(outcome.drift_detected, true);
    assert.equal(outcome.warnings[0], 'DRIFT DETECTED: Alignment score 0.20 < 0.5');
    assert.equal(outcome.warnings[1], 'Local/Global score mismatch: 0.00 vs 0.80');
    assert.equal(memory.getDriftEvents().length, 1);
    assert.equal(memory.getDriftEvents()[0].agent_id, 'tests-1');
});

test('history and drift buffers are bounded', () => {
    const memory = new GlobalValueMemory(new MemoryStore(), { now: clock() });
    memory.registerAgent('tests-1', 'test_writer');

    for (let i = 0; i < 105; i++) {
        memory.validateAgentAction('tests-1', { ...EMPTY_ACTION, type: `step_${i}` });
    }
    const history = memory.getAlignmentHistory();
    assert.equal(history.length, 100);
    assert.equal(history[0].action_type, 'step_5');
    assert.equal(history[99].action_type, 'step_104');

    const drift = memory.getDriftEvents();
    assert.equal(drift.length, 50);
    assert.equal(drift[0].action_type, 'step_55');
});

test('goal weights are updated in place', () => {
    const now = clock();
    const memory = new GlobalValueMemory(new MemoryStore(), { now });
    const before = memory.getGlobalValueFunction().updated_at;

    assert.equal(memory.updateGlobalGoal('code_quality', 0.35), true);
    const vf = memory.getGlobalValueFunction();
    assert.equal(vf.getGoal('code_quality')?.weight, 0.35);
    assert.notEqual(vf.updated_at, before);
    assert.equal(vf.goals.length, 5);
});

test('updating an absent goal is a no-op', () => {
    const store = new MemoryStore();
    const memory = new GlobalValueMemory(store, { now: clock() });
    assert.equal(memory.updateGlobalGoal('performance', 0.4), false);
    assert.equal(memory.getGlobalValueFunction().getGoal('performance'), undefined);
    assert.equal(store.saves, 0);
});

test('weights outside [0, 1] are refused', () => {
    const memory = new GlobalValueMemory(new MemoryStore(), { now: clock() });
    assert.throws(() => memory.updateGlobalGoal('simplicity', 1.5), RangeError);
});

test('optimisation target is persisted', () => {
    const store = new MemoryStore();
    const memory = new GlobalValueMemory(store, { now: clock() });
    memory.setOptimizationTarget('maximize_speed');

    const reloaded = new GlobalValueMemory(store, { now: clock() });
    assert.equal(reloaded.getGlobalValueFunction().optimization_target, 'maximize_speed');
});

test('state survives a restart', () => {
    const store = new MemoryStore();
    const first = new GlobalValueMemory(store, { now: clock() });
    first.registerAgent('gen-1', 'code_generator');
    first.updateGlobalGoal('maintainability', 0.4);
    first.validateAgentAction('gen-1', GOOD_ACTION);

    const second = new GlobalValueMemory(store, { now: clock() });
    assert.equal(second.getGlobalValueFunction().getGoal('maintainability')?.weight, 0.4);
    assert.equal(second.getAlignmentHistory().length, 1);
    // registrations are per process
    assert.equal(second.isRegistered('gen-1'), false);
});

test('a load failure falls back to defaults', () => {
    const store = new MemoryStore();
    store.failLoad = true;
    const memory = new GlobalValueMemory(store, { now: clock() });

    assert.equal(memory.getGlobalValueFunction().goals.length, 5);
    assert.equal(memory.getLastPersistenceError()?.code, 'STATE_LOAD_FAILED');
    assert.equal(memory.getLastPersistenceError()?.severity, 'WARNING');
});

test('a save failure is reported but does not throw', () => {
    const store = new MemoryStore();
    const memory = new GlobalValueMemory(store, { now: clock() });
    memory.registerAgent('gen-1', 'code_generator');
    store.failSave = true;

    const outcome = memory.validateAgentAction('gen-1', GOOD_ACTION);
    assert.equal(outcome.approved, true);
    assert.equal(memory.getLastPersistenceError()?.code, 'STATE_SAVE_FAILED');
    assert.equal(memory.getAlignmentHistory().length, 1);

    store.failSave = false;
    memory.setOptimizationTarget('balance');
    assert.equal(memory.getLastPersistenceError(), null);
});

test('alignment statistics', () => {
    const memory = new GlobalValueMemory(new MemoryStore(), { now: clock() });
    assert.equal(memory.getAlignmentStatistics().alignment_rate, 0);

    memory.registerAgent('gen-1', 'code_generator');
    memory.registerAgent('tests-1', 'test_writer');
    memory.validateAgentAction('gen-1', GOOD_ACTION);
    memory.validateAgentAction('tests-1', EMPTY_ACTION);

    const stats = memory.getAlignmentStatistics();
    assert.equal(stats.total_validations, 2);
    assert.equal(stats.aligned_count, 1);
    assert.equal(stats.alignment_rate, 0.5);
    assert.equal(stats.drift_event_count, 1);
    assert.equal(stats.last_drift?.agent_id, 'tests-1');
    assert.equal(stats.registered_agents, 2);
    assert.ok(Math.abs(stats.average_alignment_score - (0.95 + 0.2) / 2) < 1e-9);
});

test('reset restores defaults and clears history', () => {
    const memory = new GlobalValueMemory(new MemoryStore(), { now: clock() });
    memory.registerAgent('tests-1', 'test_writer');
    memory.updateGlobalGoal('code_quality', 0.9);
    memory.validateAgentAction('tests-1', EMPTY_ACTION);

    memory.resetToDefaults();
    assert.equal(memory.getGlobalValueFunction().getGoal('code_quality')?.weight, 0.3);
    assert.equal(memory.getAlignmentHistory().length, 0);
    assert.equal(memory.getDriftEvents().length, 0);
    assert.equal(memory.isRegistered('tests-1'), true);
});

test('an agent role named like an object member keeps stored state loadable', () => {
    const store = new MemoryStore();
    const memory = new GlobalValueMemory(store, { now: clock() });
    memory.registerAgent('odd-1', 'toString');
    memory.updateGlobalGoal('code_quality', 0.9);

    const outcome = memory.validateAgentAction('odd-1', GOOD_ACTION);
    assert.equal(typeof outcome.alignment_score, 'number');
    assert.ok(Number.isFinite(outcome.alignment_score));

    const reloaded = new GlobalValueMemory(store, { now: clock() });
    assert.equal(reloaded.getLastPersistenceError(), null);
    assert.equal(reloaded.getGlobalValueFunction().getGoal('code_quality')?.weight, 0.9);
    assert.deepEqual(reloaded.getAlignmentHistory(), memory.getAlignmentHistory());
});

test('non-finite coverage is scored as zero and still persists', () => {
    const store = new MemoryStore();
    const memory = new GlobalValueMemory(store, { now: clock() });
    memory.registerAgent('tests-2', 'test_writer');

    const outcome = memory.validateAgentAction('tests-2', { ...EMPTY_ACTION, coverage: Number.NaN });
    assert.equal(outcome.drift_detected, true);
    assert.equal(outcome.warnings[1], 'Local/Global score mismatch: 0.00 vs 0.80');

    const reloaded = new GlobalValueMemory(store, { now: clock() });
    assert.equal(reloaded.getLastPersistenceError(), null);
    assert.equal(reloaded.getAlignmentHistory().length, 1);
    assert.equal(reloaded.getDriftEvents().length, 1);
});

test('the value function handed out is a detached copy', () => {
    const store = new MemoryStore();
    const memory = new GlobalValueMemory(store, { now: clock() });

    const copy = memory.getGlobalValueFunction();
    const goal = copy.getGoal('simplicity');
    assert.ok(goal !== undefined);
    goal.weight = 0.9;
    copy.optimization_target = 'maximize_speed';

    assert.equal(memory.getGlobalValueFunction().getGoal('simplicity')?.weight, 0.2);
    assert.equal(memory.getGlobalValueFunction().optimization_target, 'balance');
    assert.equal(store.saves, 0);
});
