/**
 * LinearCostModel - complexity cost of a specification.
 *
 *   base_cost     = loc * w_loc + deps * w_dep + abstractions * w_abs
 *   security_cost = base_cost * (risk_multiplier(risk) - 1)
 *   total         = base_cost + security_cost
 *
 * Pure: no logging, no state beyond the weights.
 */

import { COST_WEIGHTS, RISK_MULTIPLIERS } from './config';
import type { RiskLevel } from './governance_types';

export interface CostWeights {
    loc: number;
    dependency: number;
    abstraction: number;
}

export interface CostBreakdown {
    base_cost: number;
    security_cost: number;
    total: number;
}

export const DEFAULT_COST_WEIGHTS: CostWeights = {
    loc: COST_WEIGHTS.LOC,
    dependency: COST_WEIGHTS.DEPENDENCY,
    abstraction: COST_WEIGHTS.ABSTRACTION,
};

export function riskMultiplier(risk: RiskLevel): number {
    return RISK_MULTIPLIERS[risk];
}

export class LinearCostModel {
    private readonly weights: CostWeights;

    constructor(weights?: Partial<CostWeights>) {
        this.weights = { ...DEFAULT_COST_WEIGHTS, ...weights };
    }

    calculateLocCost(estimatedLoc: number): number {
        return estimatedLoc * this.weights.loc;
    }

    calculateDependencyCost(estimatedDependencies: number): number {
        return estimatedDependencies * this.weights.dependency;
    }

    calculateAbstractionCost(estimatedAbstractions: number): number {
        return estimatedAbstractions * this.weights.abstraction;
    }

    calculateBaseCost(loc: number, dependencies: number, abstractions: number): number {
        return this.calculateLocCost(loc)
            + this.calculateDependencyCost(dependencies)
            + this.calculateAbstractionCost(abstractions);
    }

    calculateTotalCost(loc: number, dependencies: number, abstractions: number, risk: RiskLevel): CostBreakdown {
        const base_cost = this.calculateBaseCost(loc, dependencies, abstractions);
        const security_cost = base_cost * (riskMultiplier(risk) - 1.0);
        return { base_cost, security_cost, total: base_cost + security_cost };
    }
}
