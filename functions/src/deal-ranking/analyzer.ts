import { logger } from "firebase-functions/v2";
import { AnalyzerConfig, DEFAULT_ANALYZER_CONFIG } from "./config";
import { dedupeDeals } from "./core/deduplicator";
import { ExclusionFilter } from "./core/exclusion-filter";
import { applyMultibuyOverride } from "./core/multibuy";
import { PriorityDetector } from "./core/priority-detector";
import { DealScorer } from "./core/scorer";
import { categorizeDeal, selectTopDeals } from "./core/selector";
import { computeUnitPrice } from "./core/unit-normalizer";
import {
  AnalysisWithExclusions,
  DealRecord,
  ExcludedDeal,
  ExclusionReason,
  ScoreBreakdown,
  ScoredDeal,
  UnitPrice,
} from "./types";
import { assertDealList, assertTopN } from "./validation";

export const DEFAULT_TOP_N = 6;

export interface DealAnalyzerOptions {
  /** Only deals from this retailer survive the exclusion filter. */
  retailerFilter?: string;
  config?: AnalyzerConfig;
}

/**
 * Ranks one run of deals into a bounded, category-balanced list. An analyzer
 * holds only frozen configuration, so one instance can serve any number of
 * runs and several instances can rank the same input.
 */
export class DealAnalyzer {
  readonly config: AnalyzerConfig;
  readonly retailerFilter?: string;
  private readonly exclusionFilter: ExclusionFilter;
  private readonly priorityDetector: PriorityDetector;
  private readonly scorer: DealScorer;

  constructor({ retailerFilter, config = DEFAULT_ANALYZER_CONFIG }: DealAnalyzerOptions = {}) {
    this.config = config;
    this.retailerFilter = retailerFilter;
    this.exclusionFilter = new ExclusionFilter(config, retailerFilter);
    this.priorityDetector = new PriorityDetector(config);
    this.scorer = new DealScorer(config, this.priorityDetector);
  }

  computeUnitPrice(deal: DealRecord): UnitPrice {
    return computeUnitPrice(deal);
  }

  exclusionReason(deal: DealRecord): ExclusionReason | null {
    return this.exclusionFilter.reasonFor(deal);
  }

  isPriority(deal: DealRecord): boolean {
    return this.priorityDetector.isPriority(deal);
  }

  /** Per-component score of a deal as the analyzer would rank it. */
  scoreBreakdown(deal: DealRecord): ScoreBreakdown {
    return this.scorer.breakdown(applyMultibuyOverride(deal));
  }

  analyze(deals: readonly DealRecord[], topN = DEFAULT_TOP_N, balanceOverride?: boolean): ScoredDeal[] {
    assertDealList(deals);
    assertTopN(topN);

    const unique = dedupeDeals(deals, this.config.dedupe);
    if (unique.length === 0) {
      return [];
    }

    const balance = balanceOverride ?? this.config.balanceCategories;
    const priorityDeals: ScoredDeal[] = [];
    const otherDeals: ScoredDeal[] = [];
    let excludedCount = 0;

    for (const deal of unique) {
      const effective = applyMultibuyOverride(deal);
      if (this.exclusionFilter.reasonFor(effective) !== null) {
        excludedCount++;
        continue;
      }

      const unitPrice = computeUnitPrice(deal);
      const scored: ScoredDeal = {
        ...effective,
        price: { ...effective.price },
        engagement_score: this.scorer.score(effective),
        category_group: categorizeDeal(deal.category),
        is_priority: this.priorityDetector.isPriority(deal),
        unit_price_amount: unitPrice.amount,
        unit_price_unit: unitPrice.unit,
        unit_price_display: unitPrice.display,
      };

      if (scored.is_priority) {
        priorityDeals.push(scored);
      } else {
        otherDeals.push(scored);
      }
    }

    const selected = selectTopDeals({ priorityDeals, otherDeals, topN, balance });

    logger.debug("Ranked deals", {
      input: deals.length,
      unique: unique.length,
      excluded: excludedCount,
      priority: priorityDeals.length,
      selected: selected.length,
      topN,
      balance,
      retailerFilter: this.retailerFilter,
    });

    return selected;
  }

  /**
   * Same ranking as {@link analyze}, plus every dropped deal with the reason
   * it was dropped. Duplicates are not reported.
   */
  analyzeWithExclusions(
    deals: readonly DealRecord[],
    topN = DEFAULT_TOP_N,
    balanceOverride?: boolean,
  ): AnalysisWithExclusions {
    assertDealList(deals);
    assertTopN(topN);

    const excluded: ExcludedDeal[] = [];
    const kept: DealRecord[] = [];
    for (const deal of dedupeDeals(deals, this.config.dedupe)) {
      const reason = this.exclusionFilter.reasonFor(applyMultibuyOverride(deal));
      if (reason) {
        excluded.push({ deal, reason });
      } else {
        kept.push(deal);
      }
    }

    return { deals: this.analyze(kept, topN, balanceOverride), excluded };
  }
}
