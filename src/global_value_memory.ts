/**
 * GlobalValueMemory - shared value context for every agent in a run.
 *
 * Owns the GlobalValueFunction, the registry of LocalValueFunctions, and two
 * ring buffers (alignment history, drift events). Every mutation is written
 * through the ValueStateStore; persistence trouble is logged, never thrown,
 * so a broken disk does not stop a coordination.
 */

import { ALIGNMENT } from './config';
import type { ActionPayload, EvaluationState, GoalType, OptimizationTarget } from './governance_types';
import { type AgentRole, LocalValueFunction } from './local_value_function';
import { createLogger } from './logger';
import { ErrorFactory, errorMessage, type StructuredError } from './structured_error';
import { createDefaultGlobalValueFunction, GlobalValueFunction } from './value_function';
import type { AlignmentRecord, DriftEvent, PersistedValueState, ValueStateStore } from './value_store';

const log = createLogger('value-memory');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface AlignmentOutcome {
    approved: boolean;
    warnings: string[];
    /** null when the agent is not registered. */
    alignment_score: number | null;
    drift_detected: boolean;
}

export interface AlignmentStatistics {
    total_validations: number;
    aligned_count: number;
    alignment_rate: number;
    average_alignment_score: number;
    drift_event_count: number;
    last_drift: DriftEvent | null;
    registered_agents: number;
}

export interface GlobalValueMemoryOptions {
    /** Clock used for timestamps. */
    now?: () => string;
}

function pushBounded<T>(buffer: T[], item: T, cap: number): void {
    buffer.push(item);
    if (buffer.length > cap) {
        buffer.splice(0, buffer.length - cap);
    }
}

/* -------------------------------------------------------------------------- */
/* Memory                                                                     */
/* -------------------------------------------------------------------------- */

export class GlobalValueMemory {
    private globalVf: GlobalValueFunction;
    private readonly agents = new Map<string, LocalValueFunction>();
    private alignmentHistory: AlignmentRecord[] = [];
    private driftEvents: DriftEvent[] = [];
    private readonly now: () => string;
    private lastPersistenceError: StructuredError | null = null;

    constructor(private readonly store: ValueStateStore, options: GlobalValueMemoryOptions = {}) {
        this.now = options.now ?? (() => new Date().toISOString());
        this.globalVf = createDefaultGlobalValueFunction(this.now());
        this.load();
    }

    /* ---------------------------------------------------------------------- */
    /* Persistence                                                            */
    /* ---------------------------------------------------------------------- */

    private load(): void {
        try {
            const state = this.store.load();
            if (state === null) {
                log.info('No stored value state, using defaults', { location: this.store.location });
                return;
            }
            this.globalVf = new GlobalValueFunction(state.global_value_function);
            this.alignmentHistory = state.alignment_history.slice(-ALIGNMENT.HISTORY_CAP);
            this.driftEvents = state.drift_events.slice(-ALIGNMENT.DRIFT_CAP);
        } catch (e) {
            const structured = ErrorFactory.stateLoadFailed(this.store.location, errorMessage(e));
            this.lastPersistenceError = structured;
            log.warn(structured.message, { location: this.store.location, code: structured.code });
            return;
        }

        log.debug('Value state loaded', {
            location: this.store.location,
            history: this.alignmentHistory.length,
            drift_events: this.driftEvents.length,
        });
    }

    private persist(): void {
        try {
            this.store.save(this.snapshot());
            this.lastPersistenceError = null;
        } catch (e) {
            const structured = ErrorFactory.stateSaveFailed(this.store.location, errorMessage(e));
            this.lastPersistenceError = structured;
            log.error(structured.message, { location: this.store.location, code: structured.code });
        }
    }

    snapshot(): PersistedValueState {
        return {
            version: this.globalVf.version,
            last_updated: this.now(),
            global_value_function: this.globalVf.toRecord(),
            alignment_history: this.alignmentHistory.map(r => ({ ...r, warnings: [...r.warnings] })),
            drift_events: this.driftEvents.map(r => ({ ...r, warnings: [...r.warnings] })),
        };
    }

    /** Most recent load/save failure, cleared by the next successful save. */
    getLastPersistenceError(): StructuredError | null {
        return this.lastPersistenceError;
    }

    /* ---------------------------------------------------------------------- */
    /* Agents                                                                 */
    /* ---------------------------------------------------------------------- */

    registerAgent(agentId: string, agentRole: AgentRole, localGoals: string[] = []): LocalValueFunction {
        const local = new LocalValueFunction(agentId, agentRole, [...localGoals]);
        this.agents.set(agentId, local);
        log.info('Agent registered', { agent_id: agentId, role: agentRole });
        return local;
    }

    isRegistered(agentId: string): boolean {
        return this.agents.has(agentId);
    }

    getLocalValueFunction(agentId: string): LocalValueFunction | undefined {
        return this.agents.get(agentId);
    }

    validateAgentAction(agentId: string, action: ActionPayload, state: EvaluationState = {}): AlignmentOutcome {
        const local = this.agents.get(agentId);
        if (!local) {
            log.warn('Validation requested for unregistered agent', { agent_id: agentId });
            return {
                approved: true,
                warnings: ['Agent not registered'],
                alignment_score: null,
                drift_detected: false,
            };
        }

        const check = local.checkAlignment(this.globalVf, state, action);
        const record: AlignmentRecord = {
            timestamp: this.now(),
            agent_id: agentId,
            action_type: action.type,
            aligned: check.aligned,
            alignment_score: check.alignment_score,
            warnings: [...check.warnings],
        };
        pushBounded(this.alignmentHistory, record, ALIGNMENT.HISTORY_CAP);

        const warnings = [...check.warnings];
        const drift = check.alignment_score < ALIGNMENT.DRIFT_THRESHOLD;
        if (drift) {
            pushBounded(this.driftEvents, { ...record, warnings: [...record.warnings] }, ALIGNMENT.DRIFT_CAP);
            warnings.unshift(
                `DRIFT DETECTED: Alignment score ${check.alignment_score.toFixed(2)} < ${ALIGNMENT.DRIFT_THRESHOLD}`
            );
            const structured = ErrorFactory.alignmentDrift(agentId, check.alignment_score, check.warnings);
            log.warn(structured.message, { agent_id: agentId, action_type: action.type });
        }

        this.persist();

        return {
            approved: check.aligned,
            warnings,
            alignment_score: check.alignment_score,
            drift_detected: drift,
        };
    }

    /* ---------------------------------------------------------------------- */
    /* Global value function                                                  */
    /* ---------------------------------------------------------------------- */

    /** Detached copy; weights and target change only through this class. */
    getGlobalValueFunction(): GlobalValueFunction {
        return new GlobalValueFunction(this.globalVf.toRecord());
    }

    /** Replace the weight of an existing goal; false when the goal is not present. */
    updateGlobalGoal(goalType: GoalType, weight: number): boolean {
        if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
            throw new RangeError(`Goal weight must be within [0, 1], got ${weight}`);
        }

        const goal = this.globalVf.getGoal(goalType);
        if (!goal) {
            log.debug('Goal not present, weight update skipped', { goal_type: goalType });
            return false;
        }

        goal.weight = weight;
        this.globalVf.updated_at = this.now();
        this.persist();
        return true;
    }

    setOptimizationTarget(target: OptimizationTarget): void {
        this.globalVf.optimization_target = target;
        this.globalVf.updated_at = this.now();
        this.persist();
    }

    /** Back to the default function with empty history. Registered agents are kept. */
    resetToDefaults(): void {
        this.globalVf = createDefaultGlobalValueFunction(this.now());
        this.alignmentHistory = [];
        this.driftEvents = [];
        this.persist();
        log.info('Value state reset to defaults', { location: this.store.location });
    }

    /* ---------------------------------------------------------------------- */
    /* History                                                                */
    /* ---------------------------------------------------------------------- */

    getAlignmentHistory(): readonly AlignmentRecord[] {
        return this.alignmentHistory;
    }

    getDriftEvents(): readonly DriftEvent[] {
        return this.driftEvents;
    }

    getAlignmentStatistics(): AlignmentStatistics {
        const total = this.alignmentHistory.length;
        const alignedCount = this.alignmentHistory.filter(r => r.aligned).length;
        const scoreSum = this.alignmentHistory.reduce((sum, r) => sum + r.alignment_score, 0);

        return {
            total_validations: total,
            aligned_count: alignedCount,
            alignment_rate: total > 0 ? alignedCount / total : 0,
            average_alignment_score: total > 0 ? scoreSum / total : 0,
            drift_event_count: this.driftEvents.length,
            last_drift: this.driftEvents.length > 0 ? this.driftEvents[this.driftEvents.length - 1] : null,
            registered_agents: this.agents.size,
        };
    }
}
