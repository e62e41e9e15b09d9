/**
 * SpecificationBuilder - intent + policy (+ extracted goals) -> bounded Specification.
 *
 * Rule-based: complexity class from keywords (word count when none match),
 * LOC allocated as a fraction of the policy budget, risk from domain-sensitive
 * keywords, success criteria from intent fragments and extracted goals.
 *
 * deriveVariants() produces the simplified (only above 100 LOC) and robust
 * candidates as new Specifications; the base is never touched.
 */

import { COMPLEXITY_FRACTIONS, SPEC_DEFAULTS } from './config';
import type {
    AcceptanceTest,
    ComplexityClass,
    ExplicitGoal,
    IntentGoals,
    RiskLevel,
    Specification,
    SpecificationBudget,
} from './governance_types';
import type { Policy } from './policy';
import { createSpecification } from './specification';

/* -------------------------------------------------------------------------- */
/* Keyword tables                                                             */
/* -------------------------------------------------------------------------- */

const HIGH_COMPLEXITY = ['authentication', 'payment', 'security', 'oauth', 'database migration', 'refactor system', 'redesign', 'architecture'];
const MEDIUM_COMPLEXITY = ['api', 'endpoint', 'feature', 'module', 'integration', 'service'];
const LOW_COMPLEXITY = ['function', 'helper', 'utility', 'format', 'parse', 'validate'];

const CRITICAL_RISK = ['payment', 'credit card', 'password reset', 'admin', 'sudo'];
const HIGH_RISK = ['authentication', 'authorization', 'security', 'encryption', 'database', 'migration', 'production'];
const MEDIUM_RISK = ['api', 'endpoint', 'user data', 'storage', 'cache'];

const GOAL_CRITERIA: Record<ExplicitGoal, string> = {
    high_quality: 'Has comprehensive error handling',
    testability: 'Has automated tests for core behaviour',
    maintainability: 'Code is documented and readable',
    performance: 'Critical paths avoid unnecessary work',
    simplicity: 'Uses the fewest abstractions that satisfy the intent',
};

export const ROBUST_CRITERIA = [
    'Has comprehensive error handling',
    'Includes type annotations',
    'Has documentation comments',
];

function mentionsAny(text: string, words: readonly string[]): boolean {
    return words.some(w => text.includes(w));
}

function wordCount(text: string): number {
    return text.trim().split(/\s+/).filter(Boolean).length;
}

/* -------------------------------------------------------------------------- */
/* Estimation helpers                                                         */
/* -------------------------------------------------------------------------- */

export function estimateComplexity(intent: string): ComplexityClass {
    const text = intent.toLowerCase();
    if (mentionsAny(text, HIGH_COMPLEXITY)) return 'high';
    if (mentionsAny(text, MEDIUM_COMPLEXITY)) return 'medium';
    if (mentionsAny(text, LOW_COMPLEXITY)) return 'low';

    const words = wordCount(text);
    if (words <= 6) return 'low';
    if (words <= 25) return 'medium';
    return 'high';
}

export function assessRisk(intent: string): RiskLevel {
    const text = intent.toLowerCase();
    if (mentionsAny(text, CRITICAL_RISK)) return 'critical';
    if (mentionsAny(text, HIGH_RISK)) return 'high';
    if (mentionsAny(text, MEDIUM_RISK)) return 'medium';
    return 'low';
}

export function allocateBudget(policy: Policy, complexity: ComplexityClass, goals?: IntentGoals): SpecificationBudget {
    const fraction = COMPLEXITY_FRACTIONS[complexity];
    const maxLoc = policy.budgets.max_loc;
    const constraints = goals?.constraints ?? [];

    return {
        max_loc_delta: Math.min(maxLoc, Math.max(1, Math.floor(maxLoc * fraction))),
        max_new_files: Math.max(1, Math.floor(policy.budgets.max_files * fraction)),
        max_new_dependencies: constraints.includes('no_external_dependencies')
            ? 0
            : Math.max(0, Math.floor(policy.budgets.max_dependencies * fraction)),
        max_new_abstractions: constraints.includes('no_classes') ? 1 : SPEC_DEFAULTS.MAX_NEW_ABSTRACTIONS,
        max_cyclomatic_complexity: SPEC_DEFAULTS.MAX_CYCLOMATIC_COMPLEXITY,
    };
}

export function generateSuccessCriteria(intent: string, goals?: IntentGoals): string[] {
    const text = intent.toLowerCase();
    const criteria = [`Implement: ${intent}`];

    if (text.includes('authentication') || text.includes('login')) {
        criteria.push(
            'User can authenticate with valid credentials',
            'Invalid credentials are rejected',
            'Password is securely hashed'
        );
    }
    if (text.includes('api') || text.includes('endpoint')) {
        criteria.push(
            'Endpoint returns correct status codes',
            'Response format matches specification',
            'Error cases are handled properly'
        );
    }
    if (text.includes('test')) {
        criteria.push('Tests cover happy path', 'Tests cover error cases', 'All tests pass');
    }
    if (criteria.length === 1) {
        criteria.push('Implementation is complete and functional', 'Code follows project conventions');
    }

    for (const goal of goals?.explicit_goals ?? []) {
        const extra = GOAL_CRITERIA[goal];
        if (!criteria.includes(extra)) criteria.push(extra);
    }
    return criteria;
}

export function generateSecurityConsiderations(intent: string): string[] {
    const text = intent.toLowerCase();
    const out: string[] = [];

    if (text.includes('password')) {
        out.push('Use a slow, salted hash (bcrypt or argon2) for passwords');
    }
    if (text.includes('payment') || text.includes('credit card')) {
        out.push('Use a PCI-DSS compliant payment processor', 'Never store raw card numbers', 'Tokenize payment data');
    }
    if (text.includes('api') || text.includes('endpoint')) {
        out.push('Validate all input parameters', 'Apply rate limiting');
    }
    if (text.includes('database') || text.includes('sql')) {
        out.push('Use parameterized queries');
    }
    if (text.includes('authentication')) {
        out.push('Use secure session management', 'Serve authentication over HTTPS');
    }
    return out;
}

export function baseAcceptanceTest(intent: string): AcceptanceTest {
    return {
        name: `test_${intent.slice(0, 30).replace(/ /g, '_').toLowerCase()}`,
        description: `Verify that ${intent} works correctly`,
        test_type: 'integration',
        priority: 'high',
    };
}

/* -------------------------------------------------------------------------- */
/* Builder                                                                    */
/* -------------------------------------------------------------------------- */

export class SpecificationBuilder {
    generate(intent: string, policy: Policy, goals?: IntentGoals): Specification {
        const complexity = estimateComplexity(intent);
        const constraints = goals?.constraints ?? [];

        const forbidden = policy.forbidden_patterns.map(p => p.name);
        if (constraints.includes('no_classes')) forbidden.push('class_definitions');
        if (constraints.includes('no_external_dependencies')) forbidden.push('external_dependencies');

        return createSpecification({
            intent,
            success_criteria: generateSuccessCriteria(intent, goals),
            budgets: allocateBudget(policy, complexity, goals),
            risk_level: assessRisk(intent),
            forbidden_patterns: forbidden,
            acceptance_tests: [baseAcceptanceTest(intent)],
            dependencies_needed: [],
            security_considerations: generateSecurityConsiderations(intent),
            variant: 'base',
        });
    }

    /** Simplified (when base LOC > 100) then robust. */
    deriveVariants(base: Specification): Specification[] {
        const variants: Specification[] = [];
        if (base.budgets.max_loc_delta > SPEC_DEFAULTS.SIMPLIFY_ABOVE_LOC) {
            variants.push(this.simplified(base));
        }
        variants.push(this.robust(base));
        return variants;
    }

    simplified(base: Specification): Specification {
        return createSpecification({
            intent: `${base.intent} (simplified)`,
            success_criteria: base.success_criteria.slice(0, 3),
            budgets: {
                max_loc_delta: Math.max(1, Math.floor(base.budgets.max_loc_delta * SPEC_DEFAULTS.SIMPLIFIED_LOC_FACTOR)),
                max_new_files: base.budgets.max_new_files,
                max_new_dependencies: Math.max(0, base.budgets.max_new_dependencies - 1),
                max_new_abstractions: Math.max(1, base.budgets.max_new_abstractions - 1),
                max_cyclomatic_complexity: base.budgets.max_cyclomatic_complexity,
            },
            risk_level: 'low',
            forbidden_patterns: base.forbidden_patterns,
            acceptance_tests: base.acceptance_tests.slice(0, 2),
            dependencies_needed: base.dependencies_needed.slice(0, 1),
            security_considerations: base.security_considerations,
            variant: 'simplified',
        });
    }

    robust(base: Specification): Specification {
        const criteria = [...base.success_criteria];
        for (const extra of ROBUST_CRITERIA) {
            if (!criteria.includes(extra)) criteria.push(extra);
        }

        return createSpecification({
            intent: `${base.intent} (production-ready)`,
            success_criteria: criteria,
            budgets: {
                max_loc_delta: Math.floor(base.budgets.max_loc_delta * SPEC_DEFAULTS.ROBUST_LOC_FACTOR),
                max_new_files: base.budgets.max_new_files,
                max_new_dependencies: base.budgets.max_new_dependencies,
                max_new_abstractions: base.budgets.max_new_abstractions + 1,
                max_cyclomatic_complexity: base.budgets.max_cyclomatic_complexity,
            },
            risk_level: 'medium',
            forbidden_patterns: base.forbidden_patterns,
            acceptance_tests: [
                ...base.acceptance_tests,
                {
                    name: 'error_handling_test',
                    description: 'Verify error handling for edge cases and invalid inputs',
                    test_type: 'integration',
                    priority: 'high',
                },
            ],
            dependencies_needed: base.dependencies_needed,
            security_considerations: base.security_considerations,
            variant: 'robust',
        });
    }
}
