import { AnalyzerConfig } from "../config";
import { DealRecord, ExclusionReason } from "../types";
import { isNumber } from "../../util/numbers";

const ALCOHOL_TOKENS = ["ALCOHOL", "BEER", "WINE", "SPIRITS"];
const HEALTH_BEAUTY_TOKENS = ["HEALTH", "BEAUTY"];
const PROTEIN_CATEGORY_TOKENS = ["MEAT", "DELI", "SEAFOOD"];

// Letters and digits of any script, so "Sproutsé" is one word
const WORD_CHAR = "[\\p{L}\\p{N}_]";

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const containsAny = (text: string, needles: readonly string[]): boolean =>
  needles.some((needle) => text.includes(needle));

/**
 * Decides whether a deal is dropped before scoring, and why. Checks run in a
 * fixed order and the first failing check names the reason.
 */
export class ExclusionFilter {
  private readonly storeBrandPatterns: RegExp[];
  private readonly storeBrandNames: string[];

  constructor(
    private readonly config: AnalyzerConfig,
    private readonly retailerFilter?: string,
  ) {
    this.storeBrandNames = config.storeBrands.map((brand) => brand.toLowerCase());
    // Phrase matches must not sit inside a longer word ("Target" vs "Targeted")
    this.storeBrandPatterns = config.storeBrands
      .map((brand) => brand.trim())
      .filter(Boolean)
      .map(
        (brand) =>
          new RegExp(
            `(?<!${WORD_CHAR})${escapeRegExp(brand)}(?!${WORD_CHAR})`,
            "iu",
          ),
      );
  }

  reasonFor(deal: DealRecord): ExclusionReason | null {
    const amount = deal.price?.amount;
    if (!isNumber(amount)) {
      return "missing_price_amount";
    }
    if (amount < 0) {
      return "invalid_negative_price";
    }

    const category = deal.category ?? "";
    const categoryUpper = category.toUpperCase();
    if (
      this.config.excludedCategories.includes(category) ||
      containsAny(categoryUpper, ALCOHOL_TOKENS)
    ) {
      return "excluded_category_alcohol";
    }

    const productName = deal.product_name ?? "";
    const productLower = productName.toLowerCase();
    if (
      containsAny(categoryUpper, HEALTH_BEAUTY_TOKENS) &&
      containsAny(productLower, this.config.supplementKeywords)
    ) {
      return "excluded_supplement";
    }

    if (this.isStoreBrand(productName, deal.brand ?? "")) {
      return "excluded_store_brand";
    }

    if (
      containsAny(productLower, this.config.excludedProducts) &&
      containsAny(categoryUpper, PROTEIN_CATEGORY_TOKENS)
    ) {
      return "excluded_product_keyword";
    }

    if (this.retailerFilter && deal.retailer !== this.retailerFilter) {
      return "filtered_out_by_retailer";
    }

    return null;
  }

  private isStoreBrand(productName: string, brand: string): boolean {
    const brandLower = brand.toLowerCase().trim();
    if (brandLower && this.storeBrandNames.includes(brandLower)) {
      return true;
    }
    const combined = `${productName} ${brand}`.toLowerCase();
    return this.storeBrandPatterns.some((pattern) => pattern.test(combined));
  }
}
