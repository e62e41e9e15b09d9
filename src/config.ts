/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the value kernel.
 * Values can be overridden via environment variables.
 */

import * as path from 'path';

function envNumber(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = parseFloat(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

// Persistence of the global value state
export type StoreKind = 'json' | 'sqlite';

export const STATE_PATH = process.env.VALUE_KERNEL_STATE_PATH
    || path.join('.value-kernel', 'global_value_memory.json');
export const SQLITE_PATH = process.env.VALUE_KERNEL_SQLITE_PATH
    || path.join('.value-kernel', 'value_state.db');
export const STORE_KIND: StoreKind = process.env.VALUE_KERNEL_STORE === 'sqlite' ? 'sqlite' : 'json';

// Linear cost model weights
export const COST_WEIGHTS = {
    LOC: envNumber('VALUE_KERNEL_WEIGHT_LOC', 1.0),
    DEPENDENCY: envNumber('VALUE_KERNEL_WEIGHT_DEP', 50.0),
    ABSTRACTION: envNumber('VALUE_KERNEL_WEIGHT_ABS', 20.0),
};

// Budget thresholds (usage ratios, strict greater-than)
export const BUDGET_THRESHOLDS = {
    ADVISORY: 0.70,
    WARNING: 0.85,
    REJECTION: 1.00,
};

export const RISK_MULTIPLIERS = {
    low: 1.0,
    medium: 1.2,
    high: 1.5,
    critical: 2.0,
} as const;

// Share of the exceeded amount each fallback strategy is expected to recover
export const ALTERNATIVE_SAVINGS = {
    reduce_scope: 0.40,
    simplify_architecture: 0.30,
    reuse_existing: 0.50,
    defer_dependencies: 0.25,
    split_phases: 0.60,
    optimize_implementation: 0.20,
} as const;

// Fraction of policy max_loc allocated per complexity class
export const COMPLEXITY_FRACTIONS = {
    low: 0.15,
    medium: 0.30,
    high: 0.50,
} as const;

export const SPEC_DEFAULTS = {
    MAX_NEW_ABSTRACTIONS: 5,
    MAX_CYCLOMATIC_COMPLEXITY: 10,
    SIMPLIFY_ABOVE_LOC: 100,
    SIMPLIFIED_LOC_FACTOR: 0.7,
    ROBUST_LOC_FACTOR: 1.2,
};

// Alignment engine
export const ALIGNMENT = {
    AGREEMENT_TOLERANCE: 0.3,
    DRIFT_THRESHOLD: 0.5,
    DEFAULT_LOCAL_SCORE: 0.8,
    NEUTRAL_GOAL_SCORE: 0.5,
    HISTORY_CAP: 100,
    DRIFT_CAP: 50,
};

// Code heuristics used by the goal scorers
export const CODE_LIMITS = {
    MAX_FILE_LINES: 300,
    MAX_FUNCTION_LINES: 50,
    MAX_CLASSES: 3,
    MAX_INDENT_COLUMNS: 16, // four levels of four spaces
    TAB_WIDTH: 4,
};

// Workspace context gathering
export const CONTEXT_LIMITS = {
    MAX_FILES: 25,
    PREVIEW_CHARS: 500,
    MIN_KEYWORD_LENGTH: 4,
};

export const VALUE_FUNCTION_VERSION = '1.0';
