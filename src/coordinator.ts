/**
 * Coordinator - one end-to-end governance decision per intent.
 *
 *   EXTRACT_GOALS → GENERATE_CANDIDATES → PRICE_AND_SELECT → GATHER_CONTEXT
 *     → EXECUTE → CHECK_ALIGNMENT → REFINE | DONE
 *
 * ERROR is reachable only from PRICE_AND_SELECT (every candidate over budget).
 * Each call owns its phase and log; the only shared state is the
 * GlobalValueMemory passed in by the application.
 */

import * as crypto from 'crypto';
import { IntentGoalExtractor } from './goal_extractor';
import type { GlobalValueMemory, AlignmentOutcome } from './global_value_memory';
import type { ActionPayload, Cost, EvaluationState, GoalType, IntentGoals, Specification } from './governance_types';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import { isPermitted, type Policy } from './policy';
import { PricingKernel } from './pricing_kernel';
import { SpecificationBuilder } from './spec_builder';
import { ErrorFactory, IllegalPhaseTransitionError, type StructuredError } from './structured_error';
import { emptyContext, type ContextBundle, type ContextGatherer, type ExecutionAgent, type ExecutionOutput } from './workspace_context';

const log = createLogger('coordinator');

/* -------------------------------------------------------------------------- */
/* Phases                                                                     */
/* -------------------------------------------------------------------------- */

export type CoordinationPhase =
    | 'EXTRACT_GOALS'
    | 'GENERATE_CANDIDATES'
    | 'PRICE_AND_SELECT'
    | 'GATHER_CONTEXT'
    | 'EXECUTE'
    | 'CHECK_ALIGNMENT'
    | 'REFINE'
    | 'DONE'
    | 'ERROR';

export const VALID_TRANSITIONS: Readonly<Record<CoordinationPhase, readonly CoordinationPhase[]>> = {
    EXTRACT_GOALS: ['GENERATE_CANDIDATES'],
    GENERATE_CANDIDATES: ['PRICE_AND_SELECT'],
    PRICE_AND_SELECT: ['GATHER_CONTEXT', 'ERROR'],
    GATHER_CONTEXT: ['EXECUTE'],
    EXECUTE: ['CHECK_ALIGNMENT'],
    CHECK_ALIGNMENT: ['REFINE', 'DONE'],
    REFINE: [],
    DONE: [],
    ERROR: [],
};

/** Per-call phase machine; illegal moves throw. */
export class PhaseTracker {
    private current: CoordinationPhase = 'EXTRACT_GOALS';
    private readonly visited: CoordinationPhase[] = ['EXTRACT_GOALS'];

    get phase(): CoordinationPhase {
        return this.current;
    }

    get history(): readonly CoordinationPhase[] {
        return this.visited;
    }

    transition(to: CoordinationPhase): void {
        if (!VALID_TRANSITIONS[this.current].includes(to)) {
            throw new IllegalPhaseTransitionError(this.current, to);
        }
        this.current = to;
        this.visited.push(to);
        setCorrelation({ stage: to });
    }
}

/* -------------------------------------------------------------------------- */
/* Results                                                                    */
/* -------------------------------------------------------------------------- */

export interface PricedCandidate {
    specification: Specification;
    cost: Cost;
    /** Value score; null for candidates rejected on budget. */
    score: number | null;
}

interface CoordinationResultBase {
    correlation_id: string;
    intent: string;
    goals: IntentGoals;
    candidates: PricedCandidate[];
    phases: CoordinationPhase[];
    coordination_log: string[];
}

export interface CoordinationFailure extends CoordinationResultBase {
    status: 'error';
    phase: 'ERROR';
    message: string;
    error: StructuredError;
}

export interface CoordinationSuccess extends CoordinationResultBase {
    status: 'completed';
    phase: 'REFINE' | 'DONE';
    specification: Specification;
    cost: Cost;
    value_score: number;
    context: ContextBundle;
    output: ExecutionOutput;
    alignment: AlignmentOutcome;
    should_refine: boolean;
    refinement_instruction: string | null;
}

export type CoordinationResult = CoordinationFailure | CoordinationSuccess;

export interface CoordinatorOptions {
    /** Project-side state the candidates and the executed action are judged against. */
    state?: EvaluationState;
    goalExtractor?: IntentGoalExtractor;
    specBuilder?: SpecificationBuilder;
    pricing?: PricingKernel;
}

/** The action a specification represents when scored against the global value function. */
export function specificationAction(spec: Specification): ActionPayload {
    return {
        type: 'specification',
        estimated_loc: spec.budgets.max_loc_delta,
        dependencies: spec.dependencies_needed.length,
        abstractions: spec.budgets.max_new_abstractions,
        risk_level: spec.risk_level,
        has_tests: spec.acceptance_tests.length > 0,
    };
}

export function buildRefinementInstruction(warnings: readonly string[]): string {
    return `Please refine the result to address:\n${warnings.map(w => `- ${w}\n`).join('')}`;
}

/* -------------------------------------------------------------------------- */
/* Coordinator                                                                */
/* -------------------------------------------------------------------------- */

export class ThreeTierCoordinator {
    private readonly goalExtractor: IntentGoalExtractor;
    private readonly specBuilder: SpecificationBuilder;
    private readonly pricing: PricingKernel;
    private readonly state: EvaluationState;

    constructor(
        private readonly policy: Policy,
        private readonly memory: GlobalValueMemory,
        private readonly contextGatherer: ContextGatherer,
        private readonly executionAgent: ExecutionAgent,
        options: CoordinatorOptions = {}
    ) {
        this.goalExtractor = options.goalExtractor ?? new IntentGoalExtractor();
        this.specBuilder = options.specBuilder ?? new SpecificationBuilder();
        this.pricing = options.pricing ?? new PricingKernel();
        this.state = options.state ?? {};

        if (!memory.isRegistered(executionAgent.agent_id)) {
            memory.registerAgent(executionAgent.agent_id, executionAgent.agent_role, executionAgent.local_goals);
        }
    }

    async coordinate(intent: string): Promise<CoordinationResult> {
        const correlationId = crypto.randomUUID();
        setCorrelation({ correlationId, stage: 'EXTRACT_GOALS' });
        try {
            return await this.run(intent, correlationId);
        } finally {
            clearCorrelation();
        }
    }

    private async run(intent: string, correlationId: string): Promise<CoordinationResult> {
        const tracker = new PhaseTracker();
        const coordinationLog: string[] = [];
        const record = (line: string): void => {
            coordinationLog.push(`[${tracker.phase}] ${line}`);
            log.info(line);
        };

        // 1. goals → global weights
        const goals = this.goalExtractor.extract(intent);
        record(
            `Goals: ${goals.explicit_goals.join(', ') || 'none'}; ` +
            `target ${goals.optimization_target}; constraints ${goals.constraints.join(', ') || 'none'}`
        );
        for (const [goalType, weight] of this.impliedGoals(goals)) {
            const updated = this.memory.updateGlobalGoal(goalType, weight);
            record(updated ? `Weight ${goalType} = ${weight.toFixed(2)}` : `Weight ${goalType} skipped (goal not tracked)`);
        }
        this.memory.setOptimizationTarget(goals.optimization_target);

        // 2. candidates
        tracker.transition('GENERATE_CANDIDATES');
        const base = this.specBuilder.generate(intent, this.policy, goals);
        const specs = [base, ...this.specBuilder.deriveVariants(base)];
        record(`Candidates: ${specs.map(s => `${s.variant} (${s.budgets.max_loc_delta} LOC, ${s.risk_level})`).join(', ')}`);

        // 3. price, filter, select
        tracker.transition('PRICE_AND_SELECT');
        const candidates: PricedCandidate[] = specs.map(specification => ({
            specification,
            cost: this.pricing.price(specification, this.policy),
            score: null,
        }));
        for (const c of candidates) {
            record(
                `${c.specification.variant}: ${c.cost.loc} / ${this.policy.budgets.max_loc} LOC ` +
                `(${c.cost.usage_percentage.toFixed(1)}%, ${c.cost.budget_status}); cost ${c.cost.total.toFixed(1)}`
            );
        }

        const affordable = candidates.filter(c => c.cost.within_budget);
        if (affordable.length === 0) {
            tracker.transition('ERROR');
            return this.budgetFailure(intent, correlationId, goals, candidates, tracker, coordinationLog, record);
        }

        const globalVf = this.memory.getGlobalValueFunction();
        let best: PricedCandidate | null = null;
        for (const c of affordable) {
            c.score = globalVf.evaluate(this.state, specificationAction(c.specification));
            // strict: ties keep the earlier candidate
            if (best === null || best.score === null || c.score > best.score) {
                best = c;
            }
        }
        if (best === null || best.score === null) {
            throw new Error('No candidate selected from a non-empty affordable set');
        }
        const selected = best;
        const valueScore = best.score;
        record(`Selected ${selected.specification.variant} spec (value ${valueScore.toFixed(3)})`);

        // 4. context
        tracker.transition('GATHER_CONTEXT');
        let context: ContextBundle = emptyContext();
        if (isPermitted(this.policy.permissions, 'read_files')) {
            context = await this.contextGatherer.gather(intent, selected.specification);
            record(`Context: ${context.files.length} file(s); patterns ${context.patterns.join(', ') || 'none'}`);
        } else {
            record('Context gathering skipped: policy does not permit read_files');
        }

        // 5. execute
        tracker.transition('EXECUTE');
        const output = await this.executionAgent.execute({ intent, specification: selected.specification }, context);
        record(`Executed by ${this.executionAgent.agent_id} (${output.code.split('\n').length} line(s))`);

        // 6. alignment
        tracker.transition('CHECK_ALIGNMENT');
        const action: ActionPayload = {
            type: 'task_execution',
            agent_id: this.executionAgent.agent_id,
            task_type: selected.specification.variant,
            code: output.code,
            patterns: output.patterns,
            criteria_met: output.criteria_met,
            criteria_total: selected.specification.success_criteria.length,
            coverage: output.coverage,
        };
        const executionState: EvaluationState = {
            ...this.state,
            workspace_size: context.files.length,
            patterns: context.patterns,
        };
        const alignment = this.memory.validateAgentAction(this.executionAgent.agent_id, action, executionState);
        const scoreText = alignment.alignment_score === null ? 'n/a' : alignment.alignment_score.toFixed(3);
        record(`Alignment ${scoreText}; approved ${alignment.approved}; ${alignment.warnings.length} warning(s)`);

        // 7. reflect
        const shouldRefine = !alignment.approved || alignment.warnings.length > 0;
        const refinement = shouldRefine ? buildRefinementInstruction(alignment.warnings) : null;
        const finalPhase = shouldRefine ? 'REFINE' : 'DONE';
        tracker.transition(finalPhase);
        record(shouldRefine ? 'Refinement required' : 'Coordination complete');

        return {
            status: 'completed',
            phase: finalPhase,
            correlation_id: correlationId,
            intent,
            goals,
            candidates,
            phases: [...tracker.history],
            coordination_log: coordinationLog,
            specification: selected.specification,
            cost: selected.cost,
            value_score: valueScore,
            context,
            output,
            alignment,
            should_refine: shouldRefine,
            refinement_instruction: refinement,
        };
    }

    private impliedGoals(goals: IntentGoals): Array<[GoalType, number]> {
        const out: Array<[GoalType, number]> = [];
        for (const [goalType, weight] of Object.entries(goals.implied_goals)) {
            const known = this.memory.getGlobalValueFunction().goals.find(g => g.goal_type === goalType);
            if (known && weight !== undefined) {
                out.push([known.goal_type, weight]);
            } else {
                log.debug('Implied goal not tracked by the global value function', { goal_type: goalType });
            }
        }
        return out;
    }

    private budgetFailure(
        intent: string,
        correlationId: string,
        goals: IntentGoals,
        candidates: PricedCandidate[],
        tracker: PhaseTracker,
        coordinationLog: string[],
        record: (line: string) => void
    ): CoordinationFailure {
        const closest = candidates.reduce((a, b) => (b.cost.loc < a.cost.loc ? b : a));
        const error = ErrorFactory.budgetExceeded(closest.cost.alternatives, {
            closest_variant: closest.specification.variant,
            closest_loc: closest.cost.loc,
            budget_limit: this.policy.budgets.max_loc,
            candidates: candidates.length,
        });
        record(`${error.message}; closest is ${closest.specification.variant} at ${closest.cost.loc} LOC`);
        log.warn(error.message, { recovery_options: error.recovery_options.length });

        return {
            status: 'error',
            phase: 'ERROR',
            message: error.message,
            error,
            correlation_id: correlationId,
            intent,
            goals,
            candidates,
            phases: [...tracker.history],
            coordination_log: coordinationLog,
        };
    }
}
