/**
 * PricingKernel - prices a Specification against a Policy.
 *
 * The gated metric is the planned LOC delta against policy.budgets.max_loc.
 * The risk-adjusted complexity total is reported alongside it. Rejected
 * candidates carry the six fallback strategies sized on the LOC overrun.
 */

import { AlternativeGenerator } from './alternative_generator';
import { BudgetEnforcer } from './budget_authority';
import { LinearCostModel } from './cost_model';
import type { Cost, Specification } from './governance_types';
import { createLogger } from './logger';
import type { Policy } from './policy';

const log = createLogger('pricing');

export class PricingKernel {
    constructor(
        private readonly costModel: LinearCostModel = new LinearCostModel(),
        private readonly budgetEnforcer: BudgetEnforcer = new BudgetEnforcer(),
        private readonly alternativeGenerator: AlternativeGenerator = new AlternativeGenerator()
    ) {}

    price(spec: Specification, policy: Policy): Cost {
        const loc = spec.budgets.max_loc_delta;
        const dependencies = spec.budgets.max_new_dependencies;
        const abstractions = spec.budgets.max_new_abstractions;

        const breakdown = this.costModel.calculateTotalCost(loc, dependencies, abstractions, spec.risk_level);
        const limit = policy.budgets.max_loc;
        const status = this.budgetEnforcer.checkBudget(loc, limit);

        const alternatives = status.can_proceed
            ? []
            : this.alternativeGenerator.generateAlternatives(spec, Math.max(0, loc - limit));

        log.debug(`Priced ${spec.variant} spec`, {
            loc,
            total: breakdown.total,
            limit,
            status: status.status,
            usage_pct: Number(status.usage_percentage.toFixed(1)),
        });

        return {
            loc,
            dependencies,
            abstractions,
            total: breakdown.total,
            security: breakdown.security_cost,
            within_budget: status.can_proceed,
            budget_status: status.status,
            usage_percentage: status.usage_percentage,
            alternatives,
        };
    }
}
