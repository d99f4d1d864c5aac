import { DealPrice, DealRecord } from "../types";

let nextId = 1;

export const makeDeal = (fields: Partial<DealRecord> = {}, price: DealPrice = {}): DealRecord => ({
  deal_id: `deal-${nextId++}`,
  page: 1,
  retailer: "HEB",
  product_name: "Test Product",
  brand: "",
  category: "Snacks",
  size_quantity: null,
  container_type: null,
  special_notes: null,
  ...fields,
  price: { amount: 3.49, unit: "each", display: "$3.49", ...price },
});

export const multibuyPrice: DealPrice = {
  amount: 5,
  unit: "each",
  display: "2 for $5",
  is_multibuy: true,
  multibuy_details: {
    per_unit_cost: 2.5,
    quantity_required: 2,
    total_cost: 5,
    format: "2 for $5",
  },
};

/** Scores 125: cheap, deeply discounted, premium and viral produce. */
export const makeGrapes = (fields: Partial<DealRecord> = {}): DealRecord =>
  makeDeal(
    { product_name: "Cotton Candy Grapes", category: "Produce", ...fields },
    { amount: 0.99, unit: "each", display: "$0.99 ea", savings_percent: 60 },
  );

/** Scores 98, priority through the chicken rule at $2.99/lb. */
export const makeChickenThighs = (fields: Partial<DealRecord> = {}): DealRecord =>
  makeDeal(
    { product_name: "Chicken Thighs", category: "MEAT", ...fields },
    { amount: 2.99, unit: "lb", display: "$2.99/lb" },
  );
