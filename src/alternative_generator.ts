/**
 * AlternativeGenerator - fallback strategies for an over-budget specification.
 *
 * Always six strategies, always in this order (never re-ranked by savings):
 *   reduce_scope, simplify_architecture, reuse_existing,
 *   defer_dependencies, split_phases, optimize_implementation
 *
 * Savings are independent estimates (a share of the exceeded amount), not
 * cumulative. Each implementation note is written from the spec's own fields.
 */

import { ALTERNATIVE_SAVINGS } from './config';
import type { Alternative, AlternativeStrategy, Specification } from './governance_types';

function estimateSavings(strategy: AlternativeStrategy, exceededBy: number): number {
    const amount = Math.max(0, exceededBy);
    const savings = Math.floor(amount * ALTERNATIVE_SAVINGS[strategy]);
    return Math.min(Math.max(0, savings), amount);
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
    return `${count} ${count === 1 ? singular : pluralForm}`;
}

export class AlternativeGenerator {
    generateAlternatives(spec: Specification, exceededBy: number): Alternative[] {
        const criteria = spec.success_criteria.length;
        const abstractions = spec.budgets.max_new_abstractions;
        const dependencies = spec.budgets.max_new_dependencies;
        const loc = spec.budgets.max_loc_delta;
        const keptCriteria = Math.max(1, Math.ceil(criteria / 2));
        const phaseLoc = Math.max(1, Math.floor(loc / 2));

        return [
            {
                strategy: 'reduce_scope',
                description: 'Remove non-essential features from specification',
                estimated_savings: estimateSavings('reduce_scope', exceededBy),
                implementation: `Review the ${plural(criteria, 'success criterion', 'success criteria')} and keep the ${keptCriteria} essential to the intent`,
            },
            {
                strategy: 'simplify_architecture',
                description: 'Use simpler patterns with fewer abstractions',
                estimated_savings: estimateSavings('simplify_architecture', exceededBy),
                implementation: `Cut the planned ${plural(abstractions, 'abstraction')} to ${Math.max(1, abstractions - 1)} by replacing layered patterns with direct code`,
            },
            {
                strategy: 'reuse_existing',
                description: 'Leverage existing modules instead of creating new ones',
                estimated_savings: estimateSavings('reuse_existing', exceededBy),
                implementation: `Search the codebase for components covering part of the ${loc} planned lines and extend them`,
            },
            {
                strategy: 'defer_dependencies',
                description: 'Implement core functionality without external libraries',
                estimated_savings: estimateSavings('defer_dependencies', exceededBy),
                implementation: dependencies > 0
                    ? `Defer ${plural(dependencies, 'new dependency', 'new dependencies')}; use built-in facilities until the core is proven`
                    : 'No new dependencies planned; keep it that way and prefer built-in facilities',
            },
            {
                strategy: 'split_phases',
                description: 'Deliver functionality incrementally across multiple phases',
                estimated_savings: estimateSavings('split_phases', exceededBy),
                implementation: `Ship phase 1 with about ${phaseLoc} lines covering the core criteria; defer the rest`,
            },
            {
                strategy: 'optimize_implementation',
                description: 'Use more efficient algorithms and data structures',
                estimated_savings: estimateSavings('optimize_implementation', exceededBy),
                implementation: `Tighten critical paths; at ${spec.risk_level} risk keep every security-relevant check`,
            },
        ];
    }
}
