/**
 * Code Metrics
 *
 * Cheap, deterministic, regex-based counters over a code payload (no parser,
 * no LLM). Used by the goal scorers. Patterns cover TypeScript / JavaScript sources
 * and `def`-style languages, since the governed project may be either.
 */

import { CODE_LIMITS } from './config';

export interface CodeMetrics {
    line_count: number;
    class_count: number;
    max_indent_columns: number;
    max_function_lines: number;
    has_type_annotations: boolean;
    has_doc_comments: boolean;
    has_error_handling: boolean;
}

const PATTERNS = {
    // `def f(x) -> int`, `function f(x: number)`, `): string`, `const x: Foo =`
    type_annotation: /->|\)\s*:\s*[A-Za-z_]|\b\w+\??\s*:\s*(string|number|boolean|int|str|float|bool|void|any|unknown|Promise|Record|Array|List|Dict|Optional)\b/,
    doc_comment: /"""|'''|\/\*\*/,
    error_handling: /\btry\b|\braise\b|\bthrow\b/,
    class_def: /^\s*(export\s+)?(default\s+)?(abstract\s+)?class\s+\w/gm,
    function_start: /^\s*((export\s+)?(default\s+)?(async\s+)?function\b|(async\s+)?def\s)/,
};

function indentColumns(line: string): number {
    let columns = 0;
    for (const ch of line) {
        if (ch === ' ') columns += 1;
        else if (ch === '\t') columns += CODE_LIMITS.TAB_WIDTH;
        else break;
    }
    return columns;
}

/**
 * Longest run of lines between two function starts (the segment after the
 * last start counts too). Lines before the first start are not a function.
 */
function longestFunction(lines: string[]): number {
    let longest = 0;
    let current = -1; // -1: not inside a function yet

    for (const line of lines) {
        if (PATTERNS.function_start.test(line)) {
            if (current > longest) longest = current;
            current = 0;
        } else if (current >= 0) {
            current += 1;
        }
    }
    return Math.max(longest, current);
}

export function measureCode(code: string): CodeMetrics {
    const lines = code.split('\n');
    // blank lines carry no structure
    const indents = lines.filter(l => l.trim().length > 0).map(indentColumns);

    return {
        line_count: lines.length,
        class_count: (code.match(PATTERNS.class_def) ?? []).length,
        max_indent_columns: indents.length > 0 ? Math.max(...indents) : 0,
        max_function_lines: longestFunction(lines),
        has_type_annotations: PATTERNS.type_annotation.test(code),
        has_doc_comments: PATTERNS.doc_comment.test(code),
        has_error_handling: PATTERNS.error_handling.test(code),
    };
}
