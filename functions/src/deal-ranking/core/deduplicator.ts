import { DealRecord } from "../types";

const text = (value: unknown): string =>
  value === undefined || value === null ? "" : String(value);

const raw = (value: unknown): string => (value === undefined ? "null" : String(value));

/** Identity of a listing for duplicate detection; ids and extraction metadata are not part of it. */
export const dedupeKey = (deal: DealRecord): string => {
  const price = deal.price ?? {};
  return JSON.stringify([
    text(deal.retailer).trim().toUpperCase(),
    text(deal.product_name).trim().toLowerCase(),
    text(deal.category).trim().toUpperCase(),
    text(price.display).trim(),
    raw(price.amount),
    raw(price.unit),
    text(deal.size_quantity).trim().toLowerCase(),
    raw(deal.page),
  ]);
};

/** Keeps the first deal of every key, in input order. */
export const dedupeDeals = <T extends DealRecord>(deals: readonly T[], enabled = true): T[] => {
  if (!enabled) {
    return [...deals];
  }

  const seen = new Set<string>();
  const unique: T[] = [];
  for (const deal of deals) {
    const key = dedupeKey(deal);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(deal);
  }
  return unique;
};
