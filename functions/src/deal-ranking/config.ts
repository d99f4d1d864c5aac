import defaultConfig from "./default-analyzer-config.json";

export interface PriorityRule {
  name: string;
  keywords: readonly string[];
  excludeKeywords: readonly string[];
  /** Exact category strings the rule applies to. */
  categories: readonly string[];
  maxPricePerLb: number;
  bonusScore: number;
}

export interface AnalyzerConfig {
  storeBrands: readonly string[];
  excludedCategories: readonly string[];
  supplementKeywords: readonly string[];
  excludedProducts: readonly string[];
  /** Scanned in order; the first matching rule decides the bonus. */
  priorityRules: readonly PriorityRule[];
  premiumKeywords: readonly string[];
  viralKeywords: readonly string[];
  majorBrands: readonly string[];
  popularSnackBrands: readonly string[];
  interestingKeywords: readonly string[];
  kidKeywords: readonly string[];
  mealKeywords: readonly string[];
  partyKeywords: readonly string[];
  regionalBrands: readonly string[];
  categoryWeights: Readonly<Record<string, number>>;
  dedupe: boolean;
  balanceCategories: boolean;
}

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach(deepFreeze);
  }
  return value;
};

/**
 * Builds a frozen analyzer configuration. Overrides replace whole top-level
 * entries of the defaults; they are copied, so later changes to the caller's
 * arrays do not leak into an analyzer.
 */
export const createAnalyzerConfig = (overrides: Partial<AnalyzerConfig> = {}): AnalyzerConfig => {
  const merged: AnalyzerConfig = { ...defaultConfig, ...overrides };
  return deepFreeze(structuredClone(merged));
};

export const DEFAULT_ANALYZER_CONFIG = createAnalyzerConfig();
