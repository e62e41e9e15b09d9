/**
 * Structured Errors for governance outcomes
 *
 * Two families:
 * - thrown errors for true validation failures (malformed specification,
 *   unreadable policy, corrupt state record, illegal phase transition);
 * - machine-readable StructuredError records for ordinary outcomes the caller
 *   decides on (budget exhausted, alignment drift, persistence trouble).
 */

import type { Alternative, AlternativeStrategy, SpecVariant } from './governance_types';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Input errors
    | 'INVALID_SPEC'
    | 'INVALID_POLICY'

    // Decision outcomes
    | 'BUDGET_EXCEEDED'
    | 'ALIGNMENT_DRIFT'

    // Persistence
    | 'STATE_LOAD_FAILED'
    | 'STATE_SAVE_FAILED'
    | 'STATE_CORRUPT'

    // Orchestration
    | 'ILLEGAL_TRANSITION';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export type RecoveryAction =
    | AlternativeStrategy
    | 'revise_intent'
    | 'refine_output'
    | 'reinitialize_state'
    | 'escalate_to_human';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
    detail?: string;
    estimated_savings?: number;
}

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery_options: RecoveryOption[];
    human_intervention_required: boolean;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Thrown errors                                                              */
/* -------------------------------------------------------------------------- */

export class GovernanceError extends Error {
    constructor(message: string, public readonly code: ErrorCode) {
        super(message);
        this.name = 'GovernanceError';
    }
}

export class SpecificationValidationError extends GovernanceError {
    constructor(public readonly issues: string[]) {
        super(`Invalid specification: ${issues.join('; ')}`, 'INVALID_SPEC');
        this.name = 'SpecificationValidationError';
    }
}

export class PolicyLoadError extends GovernanceError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message, 'INVALID_POLICY');
        this.name = 'PolicyLoadError';
    }
}

export class ValueStateError extends GovernanceError {
    constructor(message: string, public readonly location: string, public readonly cause?: unknown) {
        super(message, 'STATE_CORRUPT');
        this.name = 'ValueStateError';
    }
}

export class IllegalPhaseTransitionError extends GovernanceError {
    constructor(public readonly from: string, public readonly to: string) {
        super(`Illegal coordination transition: ${from} -> ${to}`, 'ILLEGAL_TRANSITION');
        this.name = 'IllegalPhaseTransitionError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    recoveryOptions: RecoveryOption[] = []
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        // order is meaningful (fallback strategies are listed in a fixed order)
        recovery_options: [...recoveryOptions],
        human_intervention_required: recoveryOptions.length === 0 ||
            recoveryOptions.every(opt => opt.action === 'escalate_to_human'),
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = ['BUDGET_EXCEEDED', 'STATE_CORRUPT', 'ILLEGAL_TRANSITION'];
    const warningCodes: ErrorCode[] = ['ALIGNMENT_DRIFT', 'STATE_LOAD_FAILED'];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static budgetExceeded(
        alternatives: Alternative[],
        context: { closest_variant: SpecVariant; closest_loc: number; budget_limit: number; candidates: number }
    ): StructuredError {
        return createStructuredError(
            'BUDGET_EXCEEDED',
            'All spec candidates exceed budget',
            context,
            [
                ...alternatives.map((alt): RecoveryOption => ({
                    action: alt.strategy,
                    description: alt.description,
                    detail: alt.implementation,
                    estimated_savings: alt.estimated_savings,
                })),
                {
                    action: 'revise_intent',
                    description: 'Resubmit a narrower intent or raise the policy LOC budget',
                },
            ]
        );
    }

    static alignmentDrift(agentId: string, alignmentScore: number, warnings: string[]): StructuredError {
        return createStructuredError(
            'ALIGNMENT_DRIFT',
            `Alignment score ${alignmentScore.toFixed(2)} below drift threshold`,
            { agent_id: agentId, alignment_score: alignmentScore, warnings },
            [
                {
                    action: 'refine_output',
                    description: 'Refine the agent output against the global goals',
                },
            ]
        );
    }

    static stateLoadFailed(location: string, reason: string): StructuredError {
        return createStructuredError(
            'STATE_LOAD_FAILED',
            `Could not load global value state: ${reason}`,
            { location },
            [
                {
                    action: 'reinitialize_state',
                    description: 'Continue with the default global value function',
                },
            ]
        );
    }

    static stateSaveFailed(location: string, reason: string): StructuredError {
        return createStructuredError(
            'STATE_SAVE_FAILED',
            `Could not persist global value state: ${reason}`,
            { location },
            [
                {
                    action: 'escalate_to_human',
                    description: `Check that ${location} is writable`,
                },
            ]
        );
    }
}
