import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {
    createDefaultPolicy,
    isPermitted,
    loadPolicy,
    normalizePermissions,
    parsePolicy,
    PERMISSION_KEYS,
} from '../src/policy';
import { PolicyLoadError } from '../src/structured_error';

const DOCUMENT = {
    version: '1.0',
    project: { name: 'demo', root: '/workspace/demo' },
    budgets: { max_loc: 800, max_modules: 6, max_files: 12, max_dependencies: 3 },
    permissions: { read_files: true, run_commands: true },
    forbidden_patterns: [{ name: 'eval', description: 'No dynamic evaluation', rule: 'eval\\(' }],
};

test('default policy grants file access only', () => {
    const policy = createDefaultPolicy('demo', '/workspace/demo');
    assert.deepEqual(policy.budgets, { max_loc: 1000, max_modules: 10, max_files: 20, max_dependencies: 5 });
    assert.equal(isPermitted(policy.permissions, 'read_files'), true);
    assert.equal(isPermitted(policy.permissions, 'write_files'), true);
    assert.equal(isPermitted(policy.permissions, 'delete_files'), false);
    assert.equal(isPermitted(policy.permissions, 'network_access'), false);
});

test('permissions are closed and default-deny', () => {
    const permissions = normalizePermissions({ read_files: true, teleport: true, run_commands: 'yes' });
    assert.deepEqual(Object.keys(permissions).sort(), [...PERMISSION_KEYS].sort());
    assert.equal(permissions.read_files, true);
    assert.equal(permissions.run_commands, false);
    assert.equal(isPermitted(permissions, 'teleport'), false);
    assert.ok(Object.isFrozen(permissions));
});

test('a valid document becomes a policy', () => {
    const policy = parsePolicy(DOCUMENT);
    assert.equal(policy.project.name, 'demo');
    assert.equal(policy.budgets.max_loc, 800);
    assert.equal(policy.permissions.run_commands, true);
    assert.equal(policy.permissions.write_files, false);
    assert.deepEqual(policy.cost_thresholds, { warning: 100, rejection: 500, session_limit: 2000 });
    assert.deepEqual(policy.forbidden_patterns, [
        { name: 'eval', description: 'No dynamic evaluation', rule: 'eval\\(', severity: 'error' },
    ]);
});

test('invalid documents list every issue', () => {
    assert.throws(
        () => parsePolicy({ ...DOCUMENT, budgets: { ...DOCUMENT.budgets, max_loc: 0 }, version: 2 }),
        (err: unknown) =>
            err instanceof PolicyLoadError &&
            err.code === 'INVALID_POLICY' &&
            err.issues.length === 2 &&
            err.issues.includes('.version: Expected type string, got integer') &&
            err.issues.includes('.budgets.max_loc: Value 0 < minimum 1')
    );
});

test('missing sections are reported', () => {
    const { budgets: _omitted, ...rest } = DOCUMENT;
    assert.throws(
        () => parsePolicy(rest),
        (err: unknown) => err instanceof PolicyLoadError && err.issues[0] === '.budgets: Required field missing'
    );
});

test('loading from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'policy-'));
    try {
        const file = path.join(dir, 'policy.json');
        fs.writeFileSync(file, JSON.stringify(DOCUMENT));
        assert.equal(loadPolicy(file).budgets.max_files, 12);

        const broken = path.join(dir, 'broken.json');
        fs.writeFileSync(broken, '{');
        assert.throws(
            () => loadPolicy(broken),
            (err: unknown) => err instanceof PolicyLoadError && err.message.startsWith(`Invalid policy JSON in ${broken}`)
        );

        const missing = path.join(dir, 'missing.json');
        assert.throws(
            () => loadPolicy(missing),
            (err: unknown) => err instanceof PolicyLoadError && err.message === `Policy file not found: ${missing}`
        );
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});
