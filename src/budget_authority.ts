/**
 * BudgetEnforcer - graduated budget classification.
 *
 * INVARIANT: the returned status is a total function of usage_ratio = cost / limit.
 *
 *   ratio > rejection (1.00)  -> rejected   (can_proceed = false)
 *   ratio > warning   (0.85)  -> warning
 *   ratio > advisory  (0.70)  -> advisory
 *   otherwise                 -> approved
 *
 * Boundaries are strict greater-than, so exactly 100% usage is a warning.
 * A zero limit rejects immediately.
 */

import { BUDGET_THRESHOLDS } from './config';
import type { BudgetStatus } from './governance_types';

export interface BudgetThresholds {
    advisory: number;
    warning: number;
    rejection: number;
}

export class BudgetEnforcer {
    private readonly thresholds: BudgetThresholds;

    constructor(thresholds?: Partial<BudgetThresholds>) {
        this.thresholds = {
            advisory: thresholds?.advisory ?? BUDGET_THRESHOLDS.ADVISORY,
            warning: thresholds?.warning ?? BUDGET_THRESHOLDS.WARNING,
            rejection: thresholds?.rejection ?? BUDGET_THRESHOLDS.REJECTION,
        };
        if (!(this.thresholds.advisory <= this.thresholds.warning && this.thresholds.warning <= this.thresholds.rejection)) {
            throw new RangeError(
                `Budget thresholds must be ordered advisory <= warning <= rejection (got ${this.thresholds.advisory}, ${this.thresholds.warning}, ${this.thresholds.rejection})`
            );
        }
    }

    checkBudget(estimatedCost: number, budgetLimit: number): BudgetStatus {
        if (budgetLimit === 0) {
            return {
                status: 'rejected',
                usage_percentage: 100.0,
                can_proceed: false,
                message: 'Budget limit is zero',
            };
        }

        const usageRatio = estimatedCost / budgetLimit;
        const usagePercentage = usageRatio * 100.0;
        const pct = usagePercentage.toFixed(1);

        if (usageRatio > this.thresholds.rejection) {
            return {
                status: 'rejected',
                usage_percentage: usagePercentage,
                can_proceed: false,
                message: `Budget exceeded: ${pct}% of limit. Operation rejected.`,
            };
        }
        if (usageRatio > this.thresholds.warning) {
            return {
                status: 'warning',
                usage_percentage: usagePercentage,
                can_proceed: true,
                message: `Warning: ${pct}% of budget. Justification recommended.`,
            };
        }
        if (usageRatio > this.thresholds.advisory) {
            return {
                status: 'advisory',
                usage_percentage: usagePercentage,
                can_proceed: true,
                message: `Advisory: ${pct}% of budget. Consider alternatives.`,
            };
        }
        return {
            status: 'approved',
            usage_percentage: usagePercentage,
            can_proceed: true,
            message: `Within budget: ${pct}% used.`,
        };
    }
}
