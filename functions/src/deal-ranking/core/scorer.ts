import { AnalyzerConfig } from "../config";
import { DealRecord, ScoreBreakdown } from "../types";
import { applyMultibuyOverride } from "./multibuy";
import { PriorityDetector } from "./priority-detector";
import { computeUnitPrice } from "./unit-normalizer";
import { clamp, isNumber, roundHalfEven } from "../../util/numbers";

const VIRAL_PRICE_CAP = 30;
const DISCOUNT_DEPTH_CAP = 20;
const DEFAULT_CATEGORY_WEIGHT = 5;
const CHARM_PRICE_ENDINGS = ["0.99", "1.99", "2.49", "2.99", "4.99", "9.99"];

const containsAny = (text: string, needles: readonly string[]): boolean =>
  needles.some((needle) => text.includes(needle));

const lower = (value: string | null | undefined): string => (value ?? "").toLowerCase();

// 10% -> 2, 25% -> 7, 40% -> 13, 60% and up -> 20
const depthFromPercent = (percent: number): number =>
  clamp(roundHalfEven((percent - 5) * (20 / 55)), 0, DISCOUNT_DEPTH_CAP);

/**
 * Heuristic engagement scoring. Every component reads the deal as given; the
 * analyzer passes the multibuy-adjusted copy.
 */
export class DealScorer {
  constructor(
    private readonly config: AnalyzerConfig,
    private readonly priorityDetector: PriorityDetector,
  ) {}

  /**
   * Price used for the price bands: the comparable unit price when it
   * resolves ($4.99 for 3lb scores as $1.66), otherwise the raw amount.
   */
  effectivePrice(deal: DealRecord): number {
    const effective = applyMultibuyOverride(deal);
    const amount = effective.price?.amount;
    const unitPrice = computeUnitPrice(effective);
    if (unitPrice.amount === null) {
      return isNumber(amount) ? amount : 0;
    }
    return unitPrice.amount;
  }

  viralPricing(deal: DealRecord): number {
    let score = 0;
    const price = this.effectivePrice(deal);
    if (price < 1.0) {
      score += 30;
    } else if (price <= 2.99) {
      score += 20;
    } else if (price <= 4.99) {
      score += 10;
    }

    const rawAmount = deal.price?.amount;
    if (isNumber(rawAmount)) {
      const formatted = rawAmount.toFixed(2);
      if (CHARM_PRICE_ENDINGS.some((ending) => formatted.endsWith(ending))) {
        score += 8;
      }
    }

    if (deal.price?.is_multibuy) {
      score += 15;
    }

    const savingsPercent = deal.price?.savings_percent;
    if (isNumber(savingsPercent)) {
      if (savingsPercent >= 50) {
        score += 12;
      } else if (savingsPercent >= 30) {
        score += 8;
      }
    }

    return Math.min(score, VIRAL_PRICE_CAP);
  }

  discountDepth(deal: DealRecord): number {
    const price = deal.price ?? {};
    if (isNumber(price.savings_percent)) {
      return depthFromPercent(price.savings_percent);
    }

    const original = price.original_price;
    const amount = price.amount;
    if (isNumber(original) && isNumber(amount) && original > 0 && amount >= 0) {
      return depthFromPercent(((original - amount) / original) * 100);
    }
    return 0;
  }

  categoryWeight(deal: DealRecord): number {
    const category = deal.category ?? "";
    if (Object.prototype.hasOwnProperty.call(this.config.categoryWeights, category)) {
      return this.config.categoryWeights[category];
    }
    return DEFAULT_CATEGORY_WEIGHT;
  }

  premiumValue(deal: DealRecord): number {
    const text = `${lower(deal.product_name)} ${lower(deal.special_notes)} ${lower(deal.brand)}`;
    if (containsAny(text, this.config.premiumKeywords)) return 25;
    if (containsAny(text, this.config.popularSnackBrands)) return 20;
    if (text.includes("organic")) return 18;
    const savingsPercent = deal.price?.savings_percent;
    if (isNumber(savingsPercent) && savingsPercent >= 30) return 15;
    return 5;
  }

  /** First matching tier wins, even where a later tier scores higher. */
  socialAppeal(deal: DealRecord): number {
    const text = `${lower(deal.product_name)} ${lower(deal.special_notes)}`;
    if (containsAny(text, this.config.viralKeywords)) return 20;
    if (containsAny(text, this.config.interestingKeywords)) return 18;
    if (containsAny(text, this.config.kidKeywords)) return 12;
    if (containsAny(text, this.config.mealKeywords)) return 10;
    if (containsAny(text, this.config.partyKeywords)) return 15;
    return 5;
  }

  brandRecognition(deal: DealRecord): number {
    const text = `${lower(deal.product_name)} ${lower(deal.brand)}`;
    if (containsAny(text, this.config.majorBrands)) return 10;
    if (containsAny(text, this.config.regionalBrands)) return 8;
    return 5;
  }

  breakdown(deal: DealRecord): ScoreBreakdown {
    const components = {
      viral_pricing: this.viralPricing(deal),
      discount_depth: this.discountDepth(deal),
      category_weight: this.categoryWeight(deal),
      premium_value: this.premiumValue(deal),
      social_appeal: this.socialAppeal(deal),
      brand_recognition: this.brandRecognition(deal),
      priority_bonus: this.priorityDetector.bonusFor(deal),
    };
    const total = Object.values(components).reduce((sum, value) => sum + value, 0);
    return { ...components, total };
  }

  score(deal: DealRecord): number {
    return this.breakdown(deal).total;
  }
}
