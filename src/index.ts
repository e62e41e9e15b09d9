/**
 * Main entry point - exports all public APIs
 */

export { LinearCostModel, riskMultiplier, DEFAULT_COST_WEIGHTS } from './cost_model';
export type { CostWeights, CostBreakdown } from './cost_model';
export { BudgetEnforcer } from './budget_authority';
export { AlternativeGenerator } from './alternative_generator';
export { PricingKernel } from './pricing_kernel';
export { IntentGoalExtractor } from './goal_extractor';
export { SpecificationBuilder, estimateComplexity, assessRisk, allocateBudget } from './spec_builder';
export { createSpecification, validateSpecificationInput } from './specification';
export type { SpecificationInput } from './specification';
export { measureCode } from './code_metrics';
export type { CodeMetrics } from './code_metrics';
export { GOAL_SCORERS, scoreGoal } from './goal_scorers';
export type { GoalScorer } from './goal_scorers';
export { GlobalValueFunction, createDefaultGlobalValueFunction, describeViolation } from './value_function';
export type { GlobalGoal, GlobalValueFunctionRecord, ThresholdViolation, ValueConstraints } from './value_function';
export { LocalValueFunction, localScorerFor } from './local_value_function';
export type { AgentRole, AlignmentCheck, LocalScorer } from './local_value_function';
export { GlobalValueMemory } from './global_value_memory';
export type { AlignmentOutcome, AlignmentStatistics, GlobalValueMemoryOptions } from './global_value_memory';
export { JsonFileValueStore, SqliteValueStore, createValueStore, decodeValueState } from './value_store';
export type { AlignmentRecord, DriftEvent, PersistedValueState, ValueStateStore } from './value_store';
export { ThreeTierCoordinator, PhaseTracker, VALID_TRANSITIONS, specificationAction, buildRefinementInstruction } from './coordinator';
export type {
    CoordinationPhase,
    CoordinationResult,
    CoordinationSuccess,
    CoordinationFailure,
    CoordinatorOptions,
    PricedCandidate,
} from './coordinator';
export { createDefaultPolicy, loadPolicy, parsePolicy, isPermitted, normalizePermissions, PERMISSION_KEYS } from './policy';
export type { Policy, PolicyBudgets, PermissionKey, PermissionSet, ForbiddenPattern } from './policy';
export { WorkspaceContextGatherer, DryRunExecutionAgent, emptyContext, detectPatterns, extractKeywords } from './workspace_context';
export type { ContextBundle, ContextFile, ContextGatherer, ExecutionAgent, ExecutionOutput, ExecutionTask } from './workspace_context';
export { SchemaValidator, formatValidationErrors } from './schema_validator';
export type { ValidationResult, JsonSchema } from './schema_validator';
export {
    GovernanceError,
    SpecificationValidationError,
    PolicyLoadError,
    ValueStateError,
    IllegalPhaseTransitionError,
    ErrorFactory,
} from './structured_error';
export type { StructuredError, RecoveryOption, ErrorCode } from './structured_error';
export { createLogger } from './logger';
export type { Logger } from './logger';
export * from './governance_types';
