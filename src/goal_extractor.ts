/**
 * IntentGoalExtractor - maps free-text intent to formal goals.
 *
 * Keyword groups are checked in a fixed order so overlapping matches are
 * deterministic: a quality-driven optimisation target is never overridden by
 * a later simplicity match.
 */

import type { ExplicitGoal, GoalType, IntentConstraint, IntentGoals, OptimizationTarget } from './governance_types';

export const QUALITY_KEYWORDS = ['production', 'robust', 'reliable', 'enterprise', 'quality'];
export const SIMPLICITY_KEYWORDS = ['simple', 'minimal', 'basic', 'straightforward', 'quick'];
export const MAINTAINABILITY_KEYWORDS = ['maintainable', 'clean', 'readable', 'documented'];
export const PERFORMANCE_KEYWORDS = ['fast', 'efficient', 'optimized', 'high-performance'];
export const TESTABILITY_KEYWORDS = ['tested', 'test coverage', 'tdd', 'testable'];

function mentionsAny(text: string, keywords: readonly string[]): boolean {
    return keywords.some(kw => text.includes(kw));
}

export class IntentGoalExtractor {
    extract(intent: string): IntentGoals {
        const text = intent.toLowerCase();

        const explicit: ExplicitGoal[] = [];
        const implied: Partial<Record<GoalType, number>> = {};
        const constraints: IntentConstraint[] = [];
        let target: OptimizationTarget = 'balance';

        if (mentionsAny(text, QUALITY_KEYWORDS)) {
            explicit.push('high_quality');
            implied.code_quality = 0.35;
            implied.testability = 0.15;
            target = 'maximize_quality';
        }

        if (mentionsAny(text, SIMPLICITY_KEYWORDS)) {
            explicit.push('simplicity');
            implied.simplicity = 0.30;
            implied.code_quality = 0.20;
            if (target === 'balance') {
                target = 'maximize_speed';
            }
        }

        if (mentionsAny(text, MAINTAINABILITY_KEYWORDS)) {
            explicit.push('maintainability');
            implied.maintainability = 0.30;
        }

        if (mentionsAny(text, PERFORMANCE_KEYWORDS)) {
            explicit.push('performance');
            constraints.push('optimize_for_performance');
        }

        if (mentionsAny(text, TESTABILITY_KEYWORDS)) {
            explicit.push('testability');
            implied.testability = 0.15;
        }

        // hard constraints
        if (text.includes('no dependencies') || text.includes('zero dependencies')) {
            constraints.push('no_external_dependencies');
        }
        if (text.includes('no classes') || text.includes('functional')) {
            constraints.push('no_classes');
        }

        return {
            explicit_goals: explicit,
            implied_goals: implied,
            optimization_target: target,
            constraints,
        };
    }
}
