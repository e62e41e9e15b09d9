/**
 * Goal scorers - closed registry mapping each goal type to one pure scoring
 * function returning a value in [0, 1].
 *
 * Adding a goal means adding an entry here; nothing else branches on goal type.
 */

import { ALIGNMENT, CODE_LIMITS } from './config';
import { measureCode } from './code_metrics';
import type { ActionPayload, EvaluationState, GoalType } from './governance_types';

export type GoalScorer = (state: EvaluationState, action: ActionPayload) => number;

/** Non-finite scores count as 0. */
function clamp01(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.min(1, Math.max(0, value));
}

export function scoreCodeQuality(_state: EvaluationState, action: ActionPayload): number {
    const metrics = measureCode(action.code ?? '');
    let score = 1.0;
    if (!metrics.has_type_annotations) score -= 0.2;
    if (!metrics.has_doc_comments) score -= 0.2;
    if (!metrics.has_error_handling) score -= 0.1;
    return clamp01(score);
}

export function scoreMaintainability(_state: EvaluationState, action: ActionPayload): number {
    const metrics = measureCode(action.code ?? '');
    let score = 1.0;
    if (metrics.line_count > CODE_LIMITS.MAX_FILE_LINES) score -= 0.3;
    if (metrics.max_function_lines > CODE_LIMITS.MAX_FUNCTION_LINES) score -= 0.2;
    return clamp01(score);
}

export function scoreSimplicity(_state: EvaluationState, action: ActionPayload): number {
    const metrics = measureCode(action.code ?? '');
    let score = 1.0;
    if (metrics.class_count > CODE_LIMITS.MAX_CLASSES) score -= 0.2;
    if (metrics.max_indent_columns > CODE_LIMITS.MAX_INDENT_COLUMNS) score -= 0.2;
    return clamp01(score);
}

/** Jaccard overlap of detected patterns; no existing patterns means nothing to conflict with. */
export function scoreConsistency(state: EvaluationState, action: ActionPayload): number {
    const existing = new Set(state.patterns ?? []);
    if (existing.size === 0) return 1.0;

    const proposed = new Set(action.patterns ?? []);
    let overlap = 0;
    for (const p of proposed) {
        if (existing.has(p)) overlap += 1;
    }
    const union = new Set([...existing, ...proposed]).size;
    return union > 0 ? overlap / union : ALIGNMENT.NEUTRAL_GOAL_SCORE;
}

export function neutralScore(): number {
    return ALIGNMENT.NEUTRAL_GOAL_SCORE;
}

export const GOAL_SCORERS: Readonly<Record<GoalType, GoalScorer>> = Object.freeze({
    code_quality: scoreCodeQuality,
    maintainability: scoreMaintainability,
    simplicity: scoreSimplicity,
    consistency: scoreConsistency,
    performance: neutralScore,
    security: neutralScore,
    testability: neutralScore,
});

export function scoreGoal(goalType: GoalType, state: EvaluationState, action: ActionPayload): number {
    return GOAL_SCORERS[goalType](state, action);
}
