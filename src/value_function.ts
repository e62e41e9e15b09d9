/**
 * GlobalValueFunction - the shared multi-criteria objective.
 *
 *   V(s, a) = Σ w_i · v_i(s, a) / Σ w_i
 *
 * Weights need not sum to 1; they are normalised here. With no positive weight
 * the value is 0.
 */

import { VALUE_FUNCTION_VERSION } from './config';
import { scoreGoal } from './goal_scorers';
import type { ActionPayload, EvaluationState, GoalType, OptimizationTarget } from './governance_types';
import { ValueStateError } from './structured_error';

export interface GlobalGoal {
    goal_type: GoalType;
    weight: number;
    threshold: number;
    description: string;
    metrics: string[];
}

export type ValueConstraints = Record<string, number | string | boolean>;

export interface GlobalValueFunctionRecord {
    version: string;
    goals: GlobalGoal[];
    constraints: ValueConstraints;
    optimization_target: OptimizationTarget;
    created_at: string;
    updated_at: string;
}

export interface ThresholdViolation {
    goal: GlobalGoal;
    value: number;
}

export function describeViolation(v: ThresholdViolation): string {
    return `${v.goal.goal_type}: ${v.value.toFixed(2)} < ${v.goal.threshold.toFixed(2)} (${v.goal.description})`;
}

export class GlobalValueFunction {
    readonly version: string;
    readonly goals: GlobalGoal[];
    readonly constraints: ValueConstraints;
    optimization_target: OptimizationTarget;
    readonly created_at: string;
    updated_at: string;

    constructor(record: GlobalValueFunctionRecord) {
        const seen = new Set<GoalType>();
        for (const goal of record.goals) {
            if (seen.has(goal.goal_type)) {
                throw new ValueStateError(`Duplicate goal type: ${goal.goal_type}`, 'global_value_function');
            }
            seen.add(goal.goal_type);
        }

        this.version = record.version;
        this.goals = record.goals.map(g => ({ ...g, metrics: [...g.metrics] }));
        this.constraints = { ...record.constraints };
        this.optimization_target = record.optimization_target;
        this.created_at = record.created_at;
        this.updated_at = record.updated_at;
    }

    evaluate(state: EvaluationState, action: ActionPayload): number {
        let totalValue = 0;
        let totalWeight = 0;

        for (const goal of this.goals) {
            totalValue += goal.weight * scoreGoal(goal.goal_type, state, action);
            totalWeight += goal.weight;
        }
        return totalWeight > 0 ? totalValue / totalWeight : 0;
    }

    /** Per-goal values, in goal order. */
    evaluateGoals(state: EvaluationState, action: ActionPayload): Array<{ goal_type: GoalType; value: number }> {
        return this.goals.map(goal => ({ goal_type: goal.goal_type, value: scoreGoal(goal.goal_type, state, action) }));
    }

    checkThresholdViolations(state: EvaluationState, action: ActionPayload): ThresholdViolation[] {
        const violations: ThresholdViolation[] = [];
        for (const goal of this.goals) {
            const value = scoreGoal(goal.goal_type, state, action);
            if (value < goal.threshold) {
                violations.push({ goal, value });
            }
        }
        return violations;
    }

    getGoal(goalType: GoalType): GlobalGoal | undefined {
        return this.goals.find(g => g.goal_type === goalType);
    }

    toRecord(): GlobalValueFunctionRecord {
        return {
            version: this.version,
            goals: this.goals.map(g => ({ ...g, metrics: [...g.metrics] })),
            constraints: { ...this.constraints },
            optimization_target: this.optimization_target,
            created_at: this.created_at,
            updated_at: this.updated_at,
        };
    }
}

/** The five-goal function used on first run and whenever stored state cannot be loaded. */
export function createDefaultGlobalValueFunction(now: string = new Date().toISOString()): GlobalValueFunction {
    return new GlobalValueFunction({
        version: VALUE_FUNCTION_VERSION,
        goals: [
            {
                goal_type: 'code_quality',
                weight: 0.3,
                threshold: 0.7,
                description: 'Code must have type annotations, doc comments, and error handling',
                metrics: ['type_annotation_coverage', 'doc_comment_coverage'],
            },
            {
                goal_type: 'maintainability',
                weight: 0.25,
                threshold: 0.6,
                description: 'Code must be maintainable with reasonable complexity',
                metrics: ['cyclomatic_complexity', 'lines_per_function'],
            },
            {
                goal_type: 'simplicity',
                weight: 0.2,
                threshold: 0.5,
                description: 'Prefer simple solutions over complex ones',
                metrics: ['abstraction_count', 'nesting_depth'],
            },
            {
                goal_type: 'consistency',
                weight: 0.15,
                threshold: 0.6,
                description: 'Follow existing codebase patterns',
                metrics: ['pattern_similarity'],
            },
            {
                goal_type: 'testability',
                weight: 0.1,
                threshold: 0.5,
                description: 'Code must be testable',
                metrics: ['test_coverage'],
            },
        ],
        constraints: {
            max_loc: 500,
            max_complexity: 10,
            min_test_coverage: 0.8,
        },
        optimization_target: 'balance',
        created_at: now,
        updated_at: now,
    });
}
