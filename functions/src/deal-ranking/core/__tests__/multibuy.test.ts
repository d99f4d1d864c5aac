import { makeDeal, multibuyPrice } from "../../__tests__/fixtures";
import { applyMultibuyOverride, extractMultibuyDetails } from "../multibuy";

describe("extractMultibuyDetails", () => {
  it("coerces each field on its own", () => {
    const deal = makeDeal({}, {
      is_multibuy: true,
      multibuy_details: { per_unit_cost: "1.25", quantity_required: 3.7, total_cost: "abc", format: "4 for $5" },
    });
    expect(extractMultibuyDetails(deal)).toEqual({
      perUnitCost: 1.25,
      quantityRequired: 3,
      totalCost: null,
      format: "4 for $5",
    });
  });

  it("ignores details on deals not flagged as multibuy", () => {
    const deal = makeDeal({}, { ...multibuyPrice, is_multibuy: false });
    expect(extractMultibuyDetails(deal)).toEqual({
      perUnitCost: null,
      quantityRequired: null,
      totalCost: null,
      format: null,
    });
  });
});

describe("applyMultibuyOverride", () => {
  it("reprices a copy of the deal per unit", () => {
    const deal = makeDeal({ product_name: "Sparkling Water" }, multibuyPrice);
    const effective = applyMultibuyOverride(deal);

    expect(effective).not.toBe(deal);
    expect(effective.price).toEqual({ ...multibuyPrice, amount: 2.5, display: "$2.50 ea" });
    expect(effective.quantity_required).toBe(2);
    expect(effective.multibuy_total_cost).toBe(5);
    expect(effective.multibuy_format).toBe("2 for $5");
    expect(effective.format).toBe("2 for $5");

    expect(deal.price).toEqual({ ...multibuyPrice });
    expect(deal).not.toHaveProperty("quantity_required");
  });

  it("keeps the unit of weight-based multibuys in the display", () => {
    const deal = makeDeal({}, {
      amount: 5,
      unit: "lb",
      is_multibuy: true,
      multibuy_details: { per_unit_cost: "1.25", quantity_required: "4" },
    });
    const effective = applyMultibuyOverride(deal);
    expect(effective.price?.amount).toBe(1.25);
    expect(effective.price?.display).toBe("$1.25 lb");
    expect(effective.quantity_required).toBe(4);
    expect(effective.multibuy_format).toBeNull();
  });

  it("defaults a missing unit to each", () => {
    const deal = makeDeal({}, { ...multibuyPrice, unit: null });
    expect(applyMultibuyOverride(deal).price?.display).toBe("$2.50 ea");
  });

  it("does not replace an existing format", () => {
    const deal = makeDeal({ format: "Digital coupon" }, multibuyPrice);
    const effective = applyMultibuyOverride(deal);
    expect(effective.format).toBe("Digital coupon");
    expect(effective.multibuy_format).toBe("2 for $5");
  });

  it("returns the deal itself when the details are unusable", () => {
    const unparseable = makeDeal({}, {
      ...multibuyPrice,
      multibuy_details: { per_unit_cost: 2.5, quantity_required: "two" },
    });
    expect(applyMultibuyOverride(unparseable)).toBe(unparseable);

    const plain = makeDeal();
    expect(applyMultibuyOverride(plain)).toBe(plain);
  });
});
