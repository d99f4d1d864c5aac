import { makeDeal } from "../../__tests__/fixtures";
import { createAnalyzerConfig, DEFAULT_ANALYZER_CONFIG, PriorityRule } from "../../config";
import { PriorityDetector } from "../priority-detector";

describe("PriorityDetector", () => {
  const detector = new PriorityDetector(DEFAULT_ANALYZER_CONFIG);
  const meat = (productName: string, amount: number, unit = "lb", category = "MEAT") =>
    makeDeal({ product_name: productName, category }, { amount, unit });

  it("flags cheap chicken breast", () => {
    const deal = meat("Boneless Chicken Breast", 2.49);
    expect(detector.match(deal)?.rule.name).toBe("chicken_breast");
    expect(detector.isPriority(deal)).toBe(true);
    expect(detector.bonusFor(deal)).toBe(30);
  });

  it("compares the per-lb price against the ceiling", () => {
    expect(detector.isPriority(meat("Boneless Chicken Breast", 3.49))).toBe(false);
    const familyPack = meat("Chicken Thighs Family Pack", 5.97, "3lb");
    expect(detector.match(familyPack)?.pricePerLb).toBeCloseTo(1.99, 6);
  });

  it("matches steak and ground beef rules", () => {
    const ribeye = meat("Ribeye Steak", 9.99, "lb", "Meat & Seafood");
    expect(detector.bonusFor(ribeye)).toBe(25);

    const groundBeef = meat("Ground Beef 80/20", 4.99, "16 oz");
    expect(detector.match(groundBeef)).toEqual({
      rule: DEFAULT_ANALYZER_CONFIG.priorityRules[2],
      pricePerLb: 4.99,
    });
    expect(detector.bonusFor(groundBeef)).toBe(20);
  });

  it("honours exclude keywords", () => {
    expect(detector.isPriority(meat("Salisbury Steak", 4.99))).toBe(false);
    expect(detector.isPriority(meat("Rotisserie Chicken Breast", 2.99))).toBe(false);
  });

  it("requires an exact category and a per-lb price", () => {
    expect(detector.isPriority(meat("Chicken Breast", 1.99, "lb", "Poultry"))).toBe(false);
    expect(detector.isPriority(meat("Chicken Breast", 1.99, "each"))).toBe(false);
    expect(detector.bonusFor(meat("Chicken Breast", 1.99, "each"))).toBe(0);
  });

  it("takes the bonus of the first rule that fully matches", () => {
    const rule = (name: string, bonusScore: number, maxPricePerLb: number): PriorityRule => ({
      name,
      keywords: ["steak"],
      excludeKeywords: [],
      categories: ["MEAT"],
      maxPricePerLb,
      bonusScore,
    });
    const custom = new PriorityDetector(
      createAnalyzerConfig({ priorityRules: [rule("cheap", 5, 4), rule("any", 50, 20), rule("late", 7, 20)] }),
    );
    expect(custom.bonusFor(meat("Flat Iron Steak", 3.5))).toBe(5);
    expect(custom.bonusFor(meat("Flat Iron Steak", 8.99))).toBe(50);
  });
});
