/**
 * Governance Types
 *
 * Shared records exchanged between the goal extractor, the specification
 * builder, the pricing kernel, the value functions and the coordinator.
 */

/* -------------------------------------------------------------------------- */
/* Enumerations                                                               */
/* -------------------------------------------------------------------------- */

export const RISK_LEVELS = ['low', 'medium', 'high', 'critical'] as const;
export type RiskLevel = typeof RISK_LEVELS[number];

export const GOAL_TYPES = [
    'code_quality',
    'maintainability',
    'performance',
    'security',
    'testability',
    'simplicity',
    'consistency',
] as const;
export type GoalType = typeof GOAL_TYPES[number];

export const OPTIMIZATION_TARGETS = ['maximize_quality', 'maximize_speed', 'balance'] as const;
export type OptimizationTarget = typeof OPTIMIZATION_TARGETS[number];

export type BudgetStatusKind = 'approved' | 'advisory' | 'warning' | 'rejected';

export type ComplexityClass = 'low' | 'medium' | 'high';

export type SpecVariant = 'base' | 'simplified' | 'robust';

export type AlternativeStrategy =
    | 'reduce_scope'
    | 'simplify_architecture'
    | 'reuse_existing'
    | 'defer_dependencies'
    | 'split_phases'
    | 'optimize_implementation';

const RISK_LEVELS_SET: ReadonlySet<string> = new Set<string>(RISK_LEVELS);
const GOAL_TYPES_SET: ReadonlySet<string> = new Set<string>(GOAL_TYPES);
const OPTIMIZATION_TARGETS_SET: ReadonlySet<string> = new Set<string>(OPTIMIZATION_TARGETS);

export function isRiskLevel(value: unknown): value is RiskLevel {
    return typeof value === 'string' && RISK_LEVELS_SET.has(value);
}

export function isGoalType(value: unknown): value is GoalType {
    return typeof value === 'string' && GOAL_TYPES_SET.has(value);
}

export function isOptimizationTarget(value: unknown): value is OptimizationTarget {
    return typeof value === 'string' && OPTIMIZATION_TARGETS_SET.has(value);
}

/* -------------------------------------------------------------------------- */
/* Specification                                                              */
/* -------------------------------------------------------------------------- */

export interface SpecificationBudget {
    max_loc_delta: number;
    max_new_files: number;
    max_new_dependencies: number;
    max_new_abstractions: number;
    max_cyclomatic_complexity: number;
}

export interface AcceptanceTest {
    name: string;
    description: string;
    test_type: 'unit' | 'integration';
    priority: 'low' | 'medium' | 'high';
}

export interface Specification {
    readonly intent: string;
    readonly success_criteria: readonly string[];
    readonly budgets: Readonly<SpecificationBudget>;
    readonly risk_level: RiskLevel;
    readonly forbidden_patterns: readonly string[];
    readonly acceptance_tests: readonly Readonly<AcceptanceTest>[];
    readonly dependencies_needed: readonly string[];
    readonly security_considerations: readonly string[];
    readonly variant: SpecVariant;
}

/* -------------------------------------------------------------------------- */
/* Pricing                                                                    */
/* -------------------------------------------------------------------------- */

export interface BudgetStatus {
    status: BudgetStatusKind;
    usage_percentage: number;
    can_proceed: boolean;
    message: string;
}

export interface Alternative {
    strategy: AlternativeStrategy;
    description: string;
    estimated_savings: number;
    implementation: string;
}

export interface Cost {
    loc: number;
    dependencies: number;
    abstractions: number;
    total: number;
    security: number;
    within_budget: boolean;
    budget_status: BudgetStatusKind;
    usage_percentage: number;
    alternatives: Alternative[];
}

/* -------------------------------------------------------------------------- */
/* Goals                                                                      */
/* -------------------------------------------------------------------------- */

export type ExplicitGoal = 'high_quality' | 'simplicity' | 'maintainability' | 'performance' | 'testability';

export type IntentConstraint = 'optimize_for_performance' | 'no_external_dependencies' | 'no_classes';

export interface IntentGoals {
    explicit_goals: ExplicitGoal[];
    implied_goals: Partial<Record<GoalType, number>>;
    optimization_target: OptimizationTarget;
    constraints: IntentConstraint[];
}

/* -------------------------------------------------------------------------- */
/* State / action evaluated by the value functions                            */
/* -------------------------------------------------------------------------- */

/** Project-side view an action is judged against. */
export interface EvaluationState {
    patterns?: string[];
    project_loc?: number;
    workspace_size?: number;
}

/** A proposed or executed action. Only `type` is required. */
export interface ActionPayload {
    type: string;
    agent_id?: string;
    task_type?: string;
    code?: string;
    patterns?: string[];
    estimated_loc?: number;
    dependencies?: number;
    abstractions?: number;
    risk_level?: RiskLevel;
    has_tests?: boolean;
    criteria_met?: number;
    criteria_total?: number;
    coverage?: number;
}
