import { AnalyzerConfig, DEFAULT_ANALYZER_CONFIG } from "./config";
import { DealAnalyzer } from "./analyzer";
import { computeUnitPrice } from "./core/unit-normalizer";
import {
  DealRecord,
  RetailerRanking,
  StapleComparisonRow,
  StapleItem,
} from "./types";
import { isNumber } from "../util/numbers";

export const UNKNOWN_RETAILER = "Unknown";

export const DEFAULT_STAPLES: readonly StapleItem[] = [
  {
    label: "Chicken (per lb)",
    keywords: ["chicken breast", "chicken thighs", "chicken thigh", "chicken"],
    perPound: true,
  },
  {
    label: "Beef (per lb)",
    keywords: ["ground beef", "steak", "sirloin", "ribeye", "beef"],
    perPound: true,
  },
  { label: "Apples", keywords: ["apple", "apples"], perPound: false },
];

export const groupByRetailer = (deals: readonly DealRecord[]): Map<string, DealRecord[]> => {
  const groups = new Map<string, DealRecord[]>();
  for (const deal of deals) {
    const retailer = deal.retailer || UNKNOWN_RETAILER;
    const group = groups.get(retailer);
    if (group) {
      group.push(deal);
    } else {
      groups.set(retailer, [deal]);
    }
  }
  return new Map([...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
};

/**
 * Ranks every retailer separately, each with an analyzer filtered to that
 * retailer. Deals without a retailer are grouped under "Unknown" and are
 * dropped by that group's retailer filter.
 */
export const rankByRetailer = (
  deals: readonly DealRecord[],
  topNPerRetailer: number,
  config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG,
): RetailerRanking[] =>
  [...groupByRetailer(deals).entries()].map(([retailer, retailerDeals]) => ({
    retailer,
    deals: new DealAnalyzer({ retailerFilter: retailer, config }).analyze(
      retailerDeals,
      topNPerRetailer,
    ),
  }));

/** Top deals for each listed retailer; retailers with nothing to show are left out. */
export const compareRetailers = (
  deals: readonly DealRecord[],
  retailers: readonly string[],
  topN = 3,
  config: AnalyzerConfig = DEFAULT_ANALYZER_CONFIG,
): RetailerRanking[] => {
  const rankings: RetailerRanking[] = [];
  for (const retailer of retailers) {
    const analyzer = new DealAnalyzer({ retailerFilter: retailer, config });
    const top = analyzer.analyze(
      deals.filter((deal) => deal.retailer === retailer),
      topN,
    );
    if (top.length > 0) {
      rankings.push({ retailer, deals: top });
    }
  }
  return rankings;
};

/**
 * Lowest comparable price among deals naming any of the keywords: the unit
 * price when it is per lb or per fl oz, the raw amount otherwise.
 */
export const bestPriceForKeywords = (
  deals: readonly DealRecord[],
  keywords: readonly string[],
): number | null => {
  let best: number | null = null;
  for (const deal of deals) {
    const name = (deal.product_name ?? "").toLowerCase();
    if (!keywords.some((keyword) => name.includes(keyword))) continue;

    const unitPrice = computeUnitPrice(deal);
    const rawAmount = deal.price?.amount;
    let price: number | null = null;
    if (unitPrice.unit === "lb" || unitPrice.unit === "fl oz") {
      price = unitPrice.amount;
    } else if (isNumber(rawAmount)) {
      price = rawAmount;
    }

    if (price !== null && (best === null || price < best)) {
      best = price;
    }
  }
  return best;
};

export const buildStapleComparison = (
  dealsByRetailer: ReadonlyMap<string, readonly DealRecord[]>,
  retailers: readonly string[],
  staples: readonly StapleItem[] = DEFAULT_STAPLES,
): StapleComparisonRow[] =>
  staples.map(({ label, keywords, perPound }) => ({
    label,
    perPound,
    prices: Object.fromEntries(
      retailers.map((retailer) => [
        retailer,
        bestPriceForKeywords(dealsByRetailer.get(retailer) ?? [], keywords),
      ]),
    ),
  }));
