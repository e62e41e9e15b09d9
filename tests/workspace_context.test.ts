import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createDefaultPolicy } from '../src/policy';
import { SpecificationBuilder } from '../src/spec_builder';
import {
    detectPatterns,
    DryRunExecutionAgent,
    extractKeywords,
    WorkspaceContextGatherer,
} from '../src/workspace_context';

const DATE_UTILS = 'export function formatDate(d: Date): string {\n    return d.toISOString();\n}\n';

const SPEC = new SpecificationBuilder().generate('Add a date formatting helper', createDefaultPolicy('demo', '/workspace/demo'));

function withWorkspace(fn: (root: string) => void): void {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'workspace-'));
    const write = (rel: string, content: string): void => {
        const full = path.join(root, rel);
        fs.mkdirSync(path.dirname(full), { recursive: true });
        fs.writeFileSync(full, content);
    };
    write('date_utils.ts', DATE_UTILS);
    write('other.ts', 'export const answer = 42;\n');
    write(path.join('lib', 'format.ts'), 'const x = 1;\n');
    write(path.join('node_modules', 'date.js'), 'module.exports = {};\n');
    write(path.join('.hidden', 'date.ts'), 'export {};\n');
    write('notes_date.md', '# notes\n');
    try {
        fn(root);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
}

test('keywords are lowercase, four letters or more, deduplicated', () => {
    assert.deepEqual(extractKeywords('Add a date formatting helper'), ['date', 'formatting', 'helper']);
    assert.deepEqual(extractKeywords('Date date DATE'), ['date']);
    assert.deepEqual(extractKeywords('do it'), []);
});

test('pattern detection', () => {
    assert.deepEqual(detectPatterns([DATE_UTILS]), ['functions', 'type_annotations']);
    assert.deepEqual(
        detectPatterns(['/** Box. */\nexport class Box {}\n', 'async function load() {\n    try {} catch (e) {}\n}\n']),
        ['async', 'classes', 'doc_comments', 'error_handling', 'functions']
    );
    assert.deepEqual(detectPatterns([]), []);
});

test('gatherer matches file names against intent keywords', () => {
    withWorkspace(root => {
        const bundle = new WorkspaceContextGatherer(root).gather('format the date', SPEC);
        assert.deepEqual(bundle.files, [
            { path: 'date_utils.ts', preview: DATE_UTILS },
            { path: path.join('lib', 'format.ts'), preview: 'const x = 1;\n' },
        ]);
        assert.deepEqual(bundle.patterns, ['functions', 'type_annotations']);
    });
});

test('gatherer respects the file cap', () => {
    withWorkspace(root => {
        const bundle = new WorkspaceContextGatherer(root, 1).gather('format the date', SPEC);
        assert.deepEqual(bundle.files.map(f => f.path), ['date_utils.ts']);
    });
});

test('gatherer returns nothing without keywords or workspace', () => {
    withWorkspace(root => {
        assert.deepEqual(new WorkspaceContextGatherer(root).gather('do it', SPEC), { files: [], patterns: [] });
    });
    const missing = path.join(os.tmpdir(), 'no-such-workspace-for-tests');
    assert.deepEqual(new WorkspaceContextGatherer(missing).gather('format the date', SPEC), { files: [], patterns: [] });
});

test('dry-run agent writes an outline', async () => {
    const agent = new DryRunExecutionAgent();
    assert.equal(agent.agent_id, 'dry-run-executor');
    assert.equal(agent.agent_role, 'code_generator');

    const context = { files: [{ path: 'date_utils.ts', preview: '' }], patterns: ['functions'] };
    const output = await agent.execute({ intent: SPEC.intent, specification: SPEC }, context);

    assert.equal(
        output.code,
        [
            '/**',
            ' * Outline: Add a date formatting helper',
            ' * Budget: 150 LOC, 3 file(s), risk low',
            ' */',
            '// [ ] Implement: Add a date formatting helper',
            '// [ ] Implementation is complete and functional',
            '// [ ] Code follows project conventions',
            '// see date_utils.ts',
        ].join('\n')
    );
    assert.deepEqual(output.patterns, ['functions']);
    assert.notEqual(output.patterns, context.patterns);
});
