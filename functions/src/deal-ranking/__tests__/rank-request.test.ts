import { DealInputError } from "../errors";
import { parseRankByRetailerRequest, parseRankDealsRequest } from "../http";
import { rankByRetailerForRequest, rankDealsForRequest } from "../rank-request";
import { makeChickenThighs, makeDeal, makeGrapes } from "./fixtures";

describe("parseRankDealsRequest", () => {
  it("accepts a well-formed body", () => {
    const deals = [makeGrapes()];
    expect(
      parseRankDealsRequest({ deals, top_n: 3, retailer: "HEB", include_excluded: true }),
    ).toEqual({
      deals,
      top_n: 3,
      balance_categories: undefined,
      retailer: "HEB",
      include_excluded: true,
      include_breakdown: undefined,
    });
  });

  it("treats an empty retailer as no filter", () => {
    expect(parseRankDealsRequest({ deals: [], retailer: "" }).retailer).toBeUndefined();
  });

  const invalidBodies: Array<[unknown, string]> = [
    [null, "Request body must be a JSON object"],
    [{ deals: "nope" }, "deals must be an array of deal objects"],
    [{ deals: [{}, 5] }, "deal at index 1 is not an object"],
    [{ deals: [], top_n: "5" }, "top_n must be a number"],
    [{ deals: [], top_n: -1 }, "top_n must be a non-negative integer, got -1"],
    [{ deals: [], top_n: 101 }, "top_n must be at most 100"],
    [{ deals: [], balance_categories: "yes" }, "balance_categories must be a boolean"],
    [{ deals: [], retailer: 7 }, "retailer must be a string"],
    [{ deals: [{ category: 5 }] }, "deal at index 0 has a non-string category"],
    [{ deals: [{}, { product_name: 12 }] }, "deal at index 1 has a non-string product_name"],
    [{ deals: [{ brand: true }] }, "deal at index 0 has a non-string brand"],
    [{ deals: [{ retailer: 3 }] }, "deal at index 0 has a non-string retailer"],
    [{ deals: [{ special_notes: 7 }] }, "deal at index 0 has a non-string special_notes"],
    [{ deals: [{ price: "3.99" }] }, "deal at index 0 has a price that is not an object"],
    [{ deals: [{ price: [3.99] }] }, "deal at index 0 has a price that is not an object"],
    [{ deals: [{ price: { amount: 2, unit: 3 } }] }, "deal at index 0 has a non-string price.unit"],
    [{ deals: [{ price: { amount: 2, display: 4 } }] }, "deal at index 0 has a non-string price.display"],
  ];

  it.each(invalidBodies)("rejects %j", (body, message) => {
    expect(() => parseRankDealsRequest(body)).toThrow(new DealInputError(message));
  });

  it("accepts null text fields and a null price", () => {
    const deals = [{ product_name: null, brand: null, price: null }, { price: { unit: null, display: null } }];
    expect(parseRankDealsRequest({ deals }).deals).toBe(deals);
  });

  it("lets non-numeric amounts through to the exclusion filter", () => {
    const deal = makeDeal({ product_name: "Loose Leaf Tea" }, { amount: "3.99" });
    const request = parseRankDealsRequest({ deals: [deal], include_excluded: true });
    expect(rankDealsForRequest(request, 6).excluded).toEqual([
      { deal_id: deal.deal_id, retailer: "HEB", product_name: "Loose Leaf Tea", reason: "missing_price_amount" },
    ]);
  });

  it("records the index of a malformed deal", () => {
    try {
      parseRankDealsRequest({ deals: [{}, null] });
      throw new Error("expected a DealInputError");
    } catch (error) {
      expect(error).toBeInstanceOf(DealInputError);
      expect(error instanceof DealInputError ? error.index : undefined).toBe(1);
    }
  });
});

describe("parseRankByRetailerRequest", () => {
  it("validates the retailer list", () => {
    expect(parseRankByRetailerRequest({ deals: [], retailers: ["HEB", "VONS"] }).retailers).toEqual([
      "HEB",
      "VONS",
    ]);
    expect(() => parseRankByRetailerRequest({ deals: [], retailers: "HEB" })).toThrow(
      "retailers must be an array of strings",
    );
    expect(() => parseRankByRetailerRequest({ deals: [], retailers: ["HEB", 2] })).toThrow(
      "retailers must be an array of strings",
    );
  });

  it("validates the per-retailer topN", () => {
    expect(parseRankByRetailerRequest({ deals: [] })).toEqual({ deals: [], top_n_per_retailer: undefined });
    expect(() => parseRankByRetailerRequest({ deals: [], top_n_per_retailer: 1.5 })).toThrow(
      "top_n_per_retailer must be a non-negative integer, got 1.5",
    );
  });
});

describe("rankDealsForRequest", () => {
  const grapes = makeGrapes();
  const chicken = makeChickenThighs();
  const beer = makeDeal({ product_name: "IPA 6pk", category: "Beer & Wine" }, { amount: null });

  it("ranks with the default topN and omits optional sections", () => {
    const result = rankDealsForRequest({ deals: [grapes, chicken, beer] }, 6);
    expect(result.top_deals.map((deal) => deal.deal_id)).toEqual([grapes.deal_id, chicken.deal_id]);
    expect(result).not.toHaveProperty("excluded");
    expect(result.top_deals[0]).not.toHaveProperty("score_breakdown");
  });

  it("prefers the request topN", () => {
    const result = rankDealsForRequest({ deals: [grapes, chicken], top_n: 1 }, 6);
    expect(result.top_deals.map((deal) => deal.deal_id)).toEqual([chicken.deal_id]);
  });

  it("adds exclusions and score breakdowns on request", () => {
    const result = rankDealsForRequest(
      { deals: [grapes, chicken, beer], include_excluded: true, include_breakdown: true },
      6,
    );
    expect(result.excluded).toEqual([
      { deal_id: beer.deal_id, retailer: "HEB", product_name: "IPA 6pk", reason: "missing_price_amount" },
    ]);
    expect(result.top_deals[0].score_breakdown?.total).toBe(125);
    expect(result.top_deals[1].score_breakdown?.priority_bonus).toBe(30);
  });
});

describe("rankByRetailerForRequest", () => {
  it("ranks per retailer and compares staples", () => {
    const chicken = makeChickenThighs({ retailer: "HEB" });
    const grapes = makeGrapes({ retailer: "SPROUTS" });
    const result = rankByRetailerForRequest({ deals: [grapes, chicken] });

    expect(result.retailers.map((entry) => entry.retailer)).toEqual(["HEB", "SPROUTS"]);
    expect(result.deals_picked).toBe(2);
    expect(result.staple_comparison[0]).toEqual({
      label: "Chicken (per lb)",
      perPound: true,
      prices: { HEB: 2.99, SPROUTS: null },
    });
  });

  it("compares only the requested retailers, in request order", () => {
    const chicken = makeChickenThighs({ retailer: "HEB" });
    const grapes = makeGrapes({ retailer: "SPROUTS" });
    const result = rankByRetailerForRequest({ deals: [chicken, grapes], retailers: ["SPROUTS", "VONS", "HEB"] });

    expect(result.retailers.map((entry) => entry.retailer)).toEqual(["SPROUTS", "HEB"]);
    expect(result.deals_picked).toBe(2);
    expect(result.staple_comparison[0].prices).toEqual({ SPROUTS: null, VONS: null, HEB: 2.99 });
  });
});
