/**
 * Specification factory.
 *
 * Every Specification in the kernel is built here: fields are validated,
 * arrays are copied, and the result is frozen so variants can only be
 * derived as new instances.
 */

import {
    isRiskLevel,
    type AcceptanceTest,
    type RiskLevel,
    type Specification,
    type SpecificationBudget,
    type SpecVariant,
} from './governance_types';
import { SpecificationValidationError } from './structured_error';

export interface SpecificationInput {
    intent: string;
    success_criteria: readonly string[];
    budgets: SpecificationBudget;
    risk_level: RiskLevel | string;
    forbidden_patterns?: readonly string[];
    acceptance_tests?: readonly AcceptanceTest[];
    dependencies_needed?: readonly string[];
    security_considerations?: readonly string[];
    variant?: SpecVariant;
}

const BUDGET_FIELDS: (keyof SpecificationBudget)[] = [
    'max_loc_delta',
    'max_new_files',
    'max_new_dependencies',
    'max_new_abstractions',
    'max_cyclomatic_complexity',
];

export function validateSpecificationInput(input: SpecificationInput): string[] {
    const issues: string[] = [];

    if (input.intent.trim().length === 0) {
        issues.push('intent must not be empty');
    }
    if (input.success_criteria.length === 0) {
        issues.push('success_criteria must not be empty');
    } else if (input.success_criteria.some(c => c.trim().length === 0)) {
        issues.push('success_criteria must not contain blank entries');
    }
    if (!isRiskLevel(input.risk_level)) {
        issues.push(`risk_level must be one of low, medium, high, critical (got "${input.risk_level}")`);
    }

    for (const field of BUDGET_FIELDS) {
        const value = input.budgets[field];
        if (!Number.isInteger(value) || value < 0) {
            issues.push(`budgets.${field} must be a non-negative integer (got ${value})`);
        }
    }
    if (Number.isInteger(input.budgets.max_loc_delta) && input.budgets.max_loc_delta <= 0) {
        issues.push('budgets.max_loc_delta must be positive');
    }

    return issues;
}

/**
 * Build a validated, frozen Specification.
 * Throws SpecificationValidationError listing every problem found.
 */
export function createSpecification(input: SpecificationInput): Specification {
    const issues = validateSpecificationInput(input);
    if (issues.length > 0 || !isRiskLevel(input.risk_level)) {
        throw new SpecificationValidationError(issues);
    }

    const spec: Specification = {
        intent: input.intent,
        success_criteria: Object.freeze([...input.success_criteria]),
        budgets: Object.freeze({ ...input.budgets }),
        risk_level: input.risk_level,
        forbidden_patterns: Object.freeze(Array.from(new Set(input.forbidden_patterns ?? []))),
        acceptance_tests: Object.freeze((input.acceptance_tests ?? []).map(t => Object.freeze({ ...t }))),
        dependencies_needed: Object.freeze([...(input.dependencies_needed ?? [])]),
        security_considerations: Object.freeze([...(input.security_considerations ?? [])]),
        variant: input.variant ?? 'base',
    };
    return Object.freeze(spec);
}
