export interface MultibuyDetails {
  per_unit_cost?: number | string | null;
  quantity_required?: number | string | null;
  total_cost?: number | string | null;
  format?: string | null;
}

export interface DealPrice {
  amount?: number | string | null;
  unit?: string | null;
  display?: string | null;
  is_multibuy?: boolean | null;
  multibuy_details?: MultibuyDetails | null;
  original_price?: number | null;
  savings_amount?: number | null;
  savings_percent?: number | null;
}

export interface DealRecord {
  deal_id?: string | number | null;
  page?: string | number | null;
  retailer?: string | null;
  product_name?: string | null;
  brand?: string | null;
  category?: string | null;
  price?: DealPrice | null;
  size_quantity?: string | null;
  container_type?: string | null;
  special_notes?: string | null;
  format?: string | null;
  // Extraction metadata some feeds carry; passed through untouched
  conditions?: Record<string, unknown>;
  promotion_type?: string | null;
  promotion_group_id?: string | null;
  extraction_confidence?: string | null;
  uncertainty_flags?: string[];
}

/**
 * A deal with the multibuy per-unit price applied. The multibuy fields are
 * only present when the override took effect.
 */
export interface EffectiveDeal extends DealRecord {
  quantity_required?: number;
  multibuy_total_cost?: number | null;
  multibuy_format?: string | null;
}

export const CATEGORY_GROUPS = ["MeatSeafood", "Produce", "SnacksOther"] as const;

export type CategoryGroup = (typeof CATEGORY_GROUPS)[number];

export type UnitKind = "lb" | "oz" | "floz" | "each" | "count" | "unknown";

export type CanonicalUnitKind = "lb" | "floz" | "each" | "count" | "unknown";

export interface NormalizedUnit {
  kind: UnitKind;
  quantity: number | null;
  canonicalKind: CanonicalUnitKind;
}

export type UnitPriceLabel = "lb" | "fl oz" | "each" | "count";

export type UnitPrice =
  | { amount: number; unit: UnitPriceLabel; display: string }
  | { amount: null; unit: null; display: null };

export type ExclusionReason =
  | "missing_price_amount"
  | "invalid_negative_price"
  | "excluded_category_alcohol"
  | "excluded_supplement"
  | "excluded_store_brand"
  | "excluded_product_keyword"
  | "filtered_out_by_retailer";

export interface ScoreBreakdown {
  viral_pricing: number;
  discount_depth: number;
  category_weight: number;
  premium_value: number;
  social_appeal: number;
  brand_recognition: number;
  priority_bonus: number;
  total: number;
}

export interface ScoredDeal extends EffectiveDeal {
  engagement_score: number;
  category_group: CategoryGroup;
  is_priority: boolean;
  unit_price_amount: number | null;
  unit_price_unit: UnitPriceLabel | null;
  unit_price_display: string | null;
  score_breakdown?: ScoreBreakdown;
}

export interface ExcludedDeal {
  deal: DealRecord;
  reason: ExclusionReason;
}

export interface AnalysisWithExclusions {
  deals: ScoredDeal[];
  excluded: ExcludedDeal[];
}

export interface RetailerRanking {
  retailer: string;
  deals: ScoredDeal[];
}

export interface StapleItem {
  label: string;
  keywords: string[];
  perPound: boolean;
}

export interface StapleComparisonRow {
  label: string;
  perPound: boolean;
  prices: Record<string, number | null>;
}

// HTTP request/response shapes
export interface RankDealsRequest {
  deals: DealRecord[];
  top_n?: number;
  balance_categories?: boolean;
  retailer?: string;
  include_excluded?: boolean;
  include_breakdown?: boolean;
}

export interface ExcludedDealSummary {
  deal_id: string | number | null;
  retailer: string | null;
  product_name: string | null;
  reason: ExclusionReason;
}

export interface RankDealsResponse {
  top_deals: ScoredDeal[];
  excluded?: ExcludedDealSummary[];
  processing_time_ms: number;
}

export interface RankByRetailerRequest {
  deals: DealRecord[];
  top_n_per_retailer?: number;
  /** Compare only these retailers, in this order; those with no ranked deals are left out. */
  retailers?: string[];
}

export interface RankByRetailerResponse {
  retailers: { retailer: string; top_deals: ScoredDeal[] }[];
  staple_comparison: StapleComparisonRow[];
  deals_picked: number;
  processing_time_ms: number;
}
