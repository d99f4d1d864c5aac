import { DealInputError } from "./errors";
import { DealRecord } from "./types";

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const DEAL_TEXT_FIELDS = [
  "retailer",
  "product_name",
  "brand",
  "category",
  "size_quantity",
  "container_type",
  "special_notes",
  "format",
] as const;

const PRICE_TEXT_FIELDS = ["unit", "display"] as const;

const isOptionalText = (value: unknown): boolean =>
  value === undefined || value === null || typeof value === "string";

const assertTextFields = (
  record: Record<string, unknown>,
  fields: readonly string[],
  index: number,
  prefix = "",
): void => {
  for (const field of fields) {
    if (!isOptionalText(record[field])) {
      throw new DealInputError(
        `deal at index ${index} has a non-string ${prefix}${field}`,
        index,
      );
    }
  }
};

// Text fields must be strings when present; numbers and flags are left to the engine's fallbacks
const assertDealShape = (deal: unknown, index: number): void => {
  if (!isPlainObject(deal)) {
    throw new DealInputError(`deal at index ${index} is not an object`, index);
  }
  assertTextFields(deal, DEAL_TEXT_FIELDS, index);

  const price = deal.price;
  if (price === undefined || price === null) {
    return;
  }
  if (!isPlainObject(price)) {
    throw new DealInputError(`deal at index ${index} has a price that is not an object`, index);
  }
  assertTextFields(price, PRICE_TEXT_FIELDS, index, "price.");
};

export const assertDealList: (deals: unknown) => asserts deals is DealRecord[] = (deals) => {
  if (!Array.isArray(deals)) {
    throw new DealInputError("deals must be an array of deal objects");
  }
  deals.forEach(assertDealShape);
};

export const assertTopN = (topN: number, field = "topN"): void => {
  if (!Number.isInteger(topN) || topN < 0) {
    throw new DealInputError(`${field} must be a non-negative integer, got ${topN}`);
  }
};
