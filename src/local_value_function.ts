/**
 * LocalValueFunction - one agent's own view of an action, checked against
 * the global value function.
 *
 *   agreement       = |global - local| < 0.3
 *   alignment_score = 1 - |global - local|
 *   aligned         = agreement && no threshold violations
 */

import { ALIGNMENT } from './config';
import { scoreSimplicity } from './goal_scorers';
import type { ActionPayload, EvaluationState } from './governance_types';
import { describeViolation, GlobalValueFunction } from './value_function';

export type AgentRole = 'code_generator' | 'test_writer' | 'refactor' | 'coordination' | (string & {});

export type LocalScorer = (action: ActionPayload) => number;

export interface AlignmentCheck {
    aligned: boolean;
    alignment_score: number;
    global_score: number;
    local_score: number;
    warnings: string[];
}

/** Non-finite scores count as 0. */
function clamp01(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.min(1, Math.max(0, value));
}

function criteriaRatio(action: ActionPayload): number | null {
    if (action.criteria_met === undefined || action.criteria_total === undefined || action.criteria_total <= 0) {
        return null;
    }
    return clamp01(action.criteria_met / action.criteria_total);
}

const INCOMPLETE_MARKERS = /\bTODO\b|\bFIXME\b|NotImplemented|not implemented/;
const TEST_CASE = /^\s*(it|test)\s*\(|^\s*def\s+test_|^\s*async\s+def\s+test_/gm;

/** Generator agents care about completeness of what they produced. */
export function scoreCompleteness(action: ActionPayload): number {
    const ratio = criteriaRatio(action);
    if (ratio !== null) return ratio;

    const code = action.code ?? '';
    if (code.trim().length === 0) return 0;
    return INCOMPLETE_MARKERS.test(code) ? 0.5 : 0.9;
}

/** Test writers care about coverage: reported, else test cases found (5 counts as full). */
export function scoreCoverage(action: ActionPayload): number {
    if (typeof action.coverage === 'number') return clamp01(action.coverage);
    const cases = (action.code ?? '').match(TEST_CASE) ?? [];
    return clamp01(cases.length / 5);
}

export function scoreRefactor(action: ActionPayload): number {
    return scoreSimplicity({}, action);
}

/** Coordinators care about how many of the spec's criteria the result reports as met. */
export function scoreCoordination(action: ActionPayload): number {
    return criteriaRatio(action) ?? ALIGNMENT.DEFAULT_LOCAL_SCORE;
}

const ROLE_SCORERS: ReadonlyMap<string, LocalScorer> = new Map<string, LocalScorer>([
    ['code_generator', scoreCompleteness],
    ['test_writer', scoreCoverage],
    ['refactor', scoreRefactor],
    ['coordination', scoreCoordination],
]);

export function localScorerFor(role: AgentRole): LocalScorer {
    return ROLE_SCORERS.get(role) ?? (() => ALIGNMENT.DEFAULT_LOCAL_SCORE);
}

export class LocalValueFunction {
    alignment_score = 1.0;
    last_validated: string;
    private readonly scorer: LocalScorer;

    constructor(
        readonly agent_id: string,
        readonly agent_role: AgentRole,
        readonly local_goals: string[]
    ) {
        this.scorer = localScorerFor(agent_role);
        this.last_validated = new Date().toISOString();
    }

    evaluateLocal(action: ActionPayload): number {
        return clamp01(this.scorer(action));
    }

    checkAlignment(globalVf: GlobalValueFunction, state: EvaluationState, action: ActionPayload): AlignmentCheck {
        const globalScore = globalVf.evaluate(state, action);
        const localScore = this.evaluateLocal(action);
        const gap = Math.abs(globalScore - localScore);

        const agreement = gap < ALIGNMENT.AGREEMENT_TOLERANCE;
        const violations = globalVf.checkThresholdViolations(state, action);
        const alignment = 1.0 - gap;

        this.alignment_score = alignment;
        this.last_validated = new Date().toISOString();

        const warnings: string[] = [];
        if (!agreement) {
            warnings.push(`Local/Global score mismatch: ${localScore.toFixed(2)} vs ${globalScore.toFixed(2)}`);
        }
        warnings.push(...violations.map(describeViolation));

        return {
            aligned: agreement && violations.length === 0,
            alignment_score: alignment,
            global_score: globalScore,
            local_score: localScore,
            warnings,
        };
    }
}
