import { DealRecord, EffectiveDeal } from "../types";
import { formatDollars } from "../../util/numbers";

export interface ParsedMultibuy {
  perUnitCost: number | null;
  quantityRequired: number | null;
  totalCost: number | null;
  format: string | null;
}

const EMPTY_MULTIBUY: ParsedMultibuy = {
  perUnitCost: null,
  quantityRequired: null,
  totalCost: null,
  format: null,
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

const coerceFloat = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    const parsed = Number(trimmed);
    return trimmed !== "" && !Number.isNaN(parsed) ? parsed : null;
  }
  return null;
};

const coerceInt = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return INTEGER_PATTERN.test(trimmed) ? parseInt(trimmed, 10) : null;
  }
  return null;
};

/**
 * Reads the per-unit multibuy fields of a deal. Each field is coerced on its
 * own, so one malformed value does not discard the others.
 */
export const extractMultibuyDetails = (deal: DealRecord): ParsedMultibuy => {
  const price = deal.price ?? {};
  if (!price.is_multibuy) {
    return EMPTY_MULTIBUY;
  }

  const details = price.multibuy_details;
  if (details === null || typeof details !== "object" || Array.isArray(details)) {
    return EMPTY_MULTIBUY;
  }

  return {
    perUnitCost: coerceFloat(details.per_unit_cost),
    quantityRequired: coerceInt(details.quantity_required),
    totalCost: coerceFloat(details.total_cost),
    format:
      details.format === undefined || details.format === null ? null : String(details.format),
  };
};

/**
 * Returns a copy of the deal priced per unit ("4 for $5" becomes "$1.25 ea"),
 * or the deal itself when it has no usable multibuy details.
 */
export const applyMultibuyOverride = (deal: DealRecord): EffectiveDeal => {
  const { perUnitCost, quantityRequired, totalCost, format } = extractMultibuyDetails(deal);
  if (perUnitCost === null || quantityRequired === null) {
    return deal;
  }

  const unit = deal.price?.unit || "ea";
  const unitDisplay = ["ea", "each"].includes(unit.toLowerCase()) ? "ea" : unit;

  const effective: EffectiveDeal = {
    ...deal,
    price: {
      ...deal.price,
      amount: perUnitCost,
      display: `${formatDollars(perUnitCost)} ${unitDisplay}`,
    },
    quantity_required: quantityRequired,
    multibuy_total_cost: totalCost,
    multibuy_format: format,
  };
  if (format && !effective.format) {
    effective.format = format;
  }
  return effective;
};
