import { AnalyzerConfig, PriorityRule } from "../config";
import { DealRecord } from "../types";
import { computeUnitPrice } from "./unit-normalizer";

export interface PriorityMatch {
  rule: PriorityRule;
  pricePerLb: number;
}

/**
 * Staples such as cheap chicken breast or steak are auto-included. A deal
 * qualifies through the first priority rule whose category, per-pound ceiling
 * and keywords all fit.
 */
export class PriorityDetector {
  constructor(private readonly config: AnalyzerConfig) {}

  match(deal: DealRecord): PriorityMatch | null {
    const unitPrice = computeUnitPrice(deal);
    if (unitPrice.unit !== "lb") {
      return null;
    }

    const category = deal.category ?? "";
    const productName = (deal.product_name ?? "").toLowerCase();

    for (const rule of this.config.priorityRules) {
      if (!rule.categories.includes(category)) continue;
      if (unitPrice.amount > rule.maxPricePerLb) continue;
      if (!rule.keywords.some((keyword) => productName.includes(keyword))) continue;
      if (rule.excludeKeywords.some((keyword) => productName.includes(keyword))) continue;
      return { rule, pricePerLb: unitPrice.amount };
    }
    return null;
  }

  isPriority(deal: DealRecord): boolean {
    return this.match(deal) !== null;
  }

  bonusFor(deal: DealRecord): number {
    return this.match(deal)?.rule.bonusScore ?? 0;
  }
}
