/**
 * Workspace context - the collaborator seams the coordinator calls after a
 * specification is selected, plus the read-only / dry-run implementations the
 * CLI uses.
 */

import * as fs from 'fs';
import * as path from 'path';
import { measureCode } from './code_metrics';
import { CONTEXT_LIMITS } from './config';
import type { Specification } from './governance_types';
import type { AgentRole } from './local_value_function';
import { createLogger } from './logger';
import { errorMessage } from './structured_error';

const log = createLogger('workspace');

/* -------------------------------------------------------------------------- */
/* Collaborator contracts                                                     */
/* -------------------------------------------------------------------------- */

export interface ContextFile {
    path: string;
    preview: string;
}

export interface ContextBundle {
    files: ContextFile[];
    patterns: string[];
}

export interface ContextGatherer {
    gather(intent: string, spec: Specification): ContextBundle | Promise<ContextBundle>;
}

export interface ExecutionTask {
    intent: string;
    specification: Specification;
}

export interface ExecutionOutput {
    code: string;
    patterns: string[];
    criteria_met?: number;
    coverage?: number;
}

export interface ExecutionAgent {
    readonly agent_id: string;
    readonly agent_role: AgentRole;
    readonly local_goals: string[];
    execute(task: ExecutionTask, context: ContextBundle): Promise<ExecutionOutput>;
}

/** A fresh bundle per call; callers own what they are given. */
export function emptyContext(): ContextBundle {
    return { files: [], patterns: [] };
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

const SOURCE_EXTENSIONS = new Set(['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.py']);
const SKIP_DIRS = new Set(['node_modules', 'dist', 'build', 'coverage', '__pycache__']);

export function extractKeywords(intent: string): string[] {
    const words = intent.toLowerCase().match(/[a-z0-9_]+/g) ?? [];
    return [...new Set(words.filter(w => w.length >= CONTEXT_LIMITS.MIN_KEYWORD_LENGTH))];
}

/** Coarse style markers shared by the files, used for consistency scoring. */
export function detectPatterns(sources: string[]): string[] {
    const found = new Set<string>();
    for (const source of sources) {
        const metrics = measureCode(source);
        if (metrics.class_count > 0) found.add('classes');
        if (/\bfunction\b|=>|^\s*(async\s+)?def\s/m.test(source)) found.add('functions');
        if (metrics.has_type_annotations) found.add('type_annotations');
        if (metrics.has_doc_comments) found.add('doc_comments');
        if (metrics.has_error_handling) found.add('error_handling');
        if (/\basync\b/.test(source)) found.add('async');
    }
    return [...found].sort();
}

/* -------------------------------------------------------------------------- */
/* Read-only gatherer                                                         */
/* -------------------------------------------------------------------------- */

export class WorkspaceContextGatherer implements ContextGatherer {
    constructor(private readonly root: string, private readonly maxFiles: number = CONTEXT_LIMITS.MAX_FILES) {}

    gather(intent: string, _spec: Specification): ContextBundle {
        const keywords = extractKeywords(intent);
        if (keywords.length === 0 || !fs.existsSync(this.root)) {
            return emptyContext();
        }

        const files: ContextFile[] = [];
        const sources: string[] = [];

        for (const file of this.walk(this.root)) {
            if (files.length >= this.maxFiles) break;

            const name = path.basename(file).toLowerCase();
            if (!keywords.some(kw => name.includes(kw))) continue;

            let content: string;
            try {
                content = fs.readFileSync(file, 'utf8');
            } catch (e) {
                log.debug('Skipping unreadable file', { path: file, error: errorMessage(e) });
                continue;
            }
            files.push({ path: path.relative(this.root, file), preview: content.slice(0, CONTEXT_LIMITS.PREVIEW_CHARS) });
            sources.push(content);
        }

        const patterns = detectPatterns(sources);
        log.info(`Context gathered: ${files.length} file(s)`, { keywords, patterns });
        return { files, patterns };
    }

    private *walk(dir: string): Generator<string> {
        let entries: fs.Dirent[];
        try {
            entries = fs.readdirSync(dir, { withFileTypes: true });
        } catch (e) {
            log.debug('Skipping unreadable directory', { path: dir, error: errorMessage(e) });
            return;
        }

        entries.sort((a, b) => a.name.localeCompare(b.name));
        for (const entry of entries) {
            if (entry.name.startsWith('.')) continue;
            const full = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                if (!SKIP_DIRS.has(entry.name)) yield* this.walk(full);
            } else if (entry.isFile() && SOURCE_EXTENSIONS.has(path.extname(entry.name))) {
                yield full;
            }
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Dry-run executor                                                           */
/* -------------------------------------------------------------------------- */

/**
 * Produces an implementation outline instead of code. Nothing is written to
 * the workspace.
 */
export class DryRunExecutionAgent implements ExecutionAgent {
    readonly agent_role: AgentRole = 'code_generator';
    readonly local_goals = ['completeness'];

    constructor(readonly agent_id: string = 'dry-run-executor') {}

    async execute(task: ExecutionTask, context: ContextBundle): Promise<ExecutionOutput> {
        const spec = task.specification;
        const lines = [
            '/**',
            ` * Outline: ${spec.intent}`,
            ` * Budget: ${spec.budgets.max_loc_delta} LOC, ${spec.budgets.max_new_files} file(s), risk ${spec.risk_level}`,
            ' */',
            ...spec.success_criteria.map(c => `// [ ] ${c}`),
            ...context.files.map(f => `// see ${f.path}`),
        ];

        return {
            code: lines.join('\n'),
            patterns: [...context.patterns],
        };
    }
}
