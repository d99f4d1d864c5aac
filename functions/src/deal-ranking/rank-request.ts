import { DealAnalyzer } from "./analyzer";
import {
  buildStapleComparison,
  compareRetailers,
  groupByRetailer,
  rankByRetailer,
} from "./comparison";
import { AnalyzerConfig, DEFAULT_ANALYZER_CONFIG } from "./config";
import { DEFAULT_TOP_N_PER_RETAILER } from "./constants";
import {
  ExcludedDeal,
  ExcludedDealSummary,
  RankByRetailerRequest,
  RankByRetailerResponse,
  RankDealsRequest,
  RankDealsResponse,
} from "./types";

type WithoutTiming<T> = Omit<T, "processing_time_ms">;

const summarizeExcluded = ({ deal, reason }: ExcludedDeal): ExcludedDealSummary => ({
  deal_id: deal.deal_id ?? null,
  retailer: deal.retailer ?? null,
  product_name: deal.product_name ?? null,
  reason,
});

export const rankDealsForRequest = (
  request: RankDealsRequest,
  defaultTopN: number,
  config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG,
): WithoutTiming<RankDealsResponse> => {
  const analyzer = new DealAnalyzer({ retailerFilter: request.retailer, config });
  const topN = request.top_n ?? defaultTopN;

  const { deals, excluded } = analyzer.analyzeWithExclusions(
    request.deals,
    topN,
    request.balance_categories,
  );

  const topDeals = request.include_breakdown
    ? deals.map((deal) => ({ ...deal, score_breakdown: analyzer.scoreBreakdown(deal) }))
    : deals;

  return {
    top_deals: topDeals,
    ...(request.include_excluded ? { excluded: excluded.map(summarizeExcluded) } : {}),
  };
};

export const rankByRetailerForRequest = (
  request: RankByRetailerRequest,
  config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG,
): WithoutTiming<RankByRetailerResponse> => {
  const topN = request.top_n_per_retailer ?? DEFAULT_TOP_N_PER_RETAILER;
  const rankings = request.retailers
    ? compareRetailers(request.deals, request.retailers, topN, config)
    : rankByRetailer(request.deals, topN, config);
  const dealsByRetailer = groupByRetailer(request.deals);
  const retailers = request.retailers ?? [...dealsByRetailer.keys()];

  return {
    retailers: rankings.map(({ retailer, deals }) => ({ retailer, top_deals: deals })),
    staple_comparison: buildStapleComparison(dealsByRetailer, retailers),
    deals_picked: rankings.reduce((sum, { deals }) => sum + deals.length, 0),
  };
};
