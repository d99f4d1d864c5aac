import { DealRecord, NormalizedUnit, UnitKind, UnitPrice } from "../types";
import { applyMultibuyOverride } from "./multibuy";
import { formatDollars, isNumber } from "../../util/numbers";

const LEADING_NUMBER = /^(\d+(?:\.\d+)?)/;
const ANY_NUMBER = /(\d+(?:\.\d+)?)/;

const POUND_TOKENS = ["lb", "lbs", "pound", "pounds"];
const FLUID_OUNCE_TOKENS = ["floz", "fl.oz", "fl-oz", "fl oz"];
const COUNT_TOKENS = ["count", "ct"];
const EACH_TOKENS = ["each", "ea"];
const PACKAGE_TOKENS = ["pack", "bag", "pkg"];

export const UNRESOLVED_UNIT_PRICE: UnitPrice = { amount: null, unit: null, display: null };

const UNKNOWN_UNIT: NormalizedUnit = { kind: "unknown", quantity: null, canonicalKind: "unknown" };

/** Guesses a unit from price text such as "$3.99 per lb" or "$0.25/oz". */
export const parseDisplayUnit = (display: string): UnitKind | null => {
  const text = display.toLowerCase();
  if (text.includes("per lb") || text.includes("/lb") || text.includes("per pound")) {
    return "lb";
  }
  if (text.includes("per oz") || text.includes("/oz")) {
    return "oz";
  }
  if (text.includes("per fl oz") || text.includes("per floz") || text.includes("/fl oz")) {
    return "floz";
  }
  if (text.includes("each") && text.includes("per")) {
    return "each";
  }
  return null;
};

const firstNumber = (text: string): number | null => {
  const match = ANY_NUMBER.exec(text);
  return match ? parseFloat(match[1]) : null;
};

/**
 * Maps a price unit ("3lb", "16 fl oz", "each") to the kind of quantity it
 * describes and the base used to compare prices. Ounces compare per pound.
 */
export const normalizeUnit = (
  unit: string | null | undefined,
  display?: string | null,
): NormalizedUnit => {
  let token = (unit ?? "").trim().toLowerCase();

  if (!token && display) {
    token = parseDisplayUnit(display) ?? "";
  }

  if (!token) {
    return UNKNOWN_UNIT;
  }

  if (POUND_TOKENS.includes(token)) {
    return { kind: "lb", quantity: 1, canonicalKind: "lb" };
  }

  const leading = LEADING_NUMBER.exec(token);
  if (leading) {
    const quantity = parseFloat(leading[1]);
    const tail = token.slice(leading[0].length).trim().replace(/ /g, "");

    if (POUND_TOKENS.includes(tail)) {
      return { kind: "lb", quantity, canonicalKind: "lb" };
    }
    if (tail === "oz") {
      return { kind: "oz", quantity, canonicalKind: "lb" };
    }
    if (FLUID_OUNCE_TOKENS.includes(tail)) {
      return { kind: "floz", quantity, canonicalKind: "floz" };
    }
    if (COUNT_TOKENS.includes(tail)) {
      return { kind: "count", quantity, canonicalKind: "count" };
    }
  }

  if (token.includes("floz") || token.includes("fl oz")) {
    return { kind: "floz", quantity: firstNumber(token), canonicalKind: "floz" };
  }
  if (token.includes("count") || token === "ct") {
    return { kind: "count", quantity: firstNumber(token), canonicalKind: "count" };
  }
  if (EACH_TOKENS.includes(token) || PACKAGE_TOKENS.includes(token)) {
    return { kind: "each", quantity: 1, canonicalKind: "each" };
  }

  return UNKNOWN_UNIT;
};

const hasQuantity = (quantity: number | null): quantity is number =>
  quantity !== null && quantity > 0;

/**
 * Computes a comparable unit price (per lb, per fl oz, per item) after the
 * multibuy override. Returns the unresolved triple when the amount is not a
 * number or the unit cannot be converted.
 */
export const computeUnitPrice = (deal: DealRecord): UnitPrice => {
  const effective = applyMultibuyOverride(deal);
  const price = effective.price ?? {};
  const amount = price.amount;
  if (!isNumber(amount)) {
    return UNRESOLVED_UNIT_PRICE;
  }

  const { kind, quantity, canonicalKind } = normalizeUnit(price.unit, price.display);

  switch (canonicalKind) {
    case "lb": {
      if (kind === "lb" && hasQuantity(quantity)) {
        const perPound = amount / quantity;
        return { amount: perPound, unit: "lb", display: `${formatDollars(perPound)}/lb` };
      }
      if (kind === "oz" && hasQuantity(quantity)) {
        const perPound = amount / (quantity / 16);
        return { amount: perPound, unit: "lb", display: `${formatDollars(perPound)}/lb` };
      }
      if (kind === "lb") {
        // A pound unit without a usable quantity means the amount is already per lb
        return { amount, unit: "lb", display: `${formatDollars(amount)}/lb` };
      }
      return UNRESOLVED_UNIT_PRICE;
    }
    case "floz": {
      if (hasQuantity(quantity)) {
        const perFluidOunce = amount / quantity;
        return {
          amount: perFluidOunce,
          unit: "fl oz",
          display: `${formatDollars(perFluidOunce)}/fl oz`,
        };
      }
      return UNRESOLVED_UNIT_PRICE;
    }
    case "each": {
      const perItem = hasQuantity(quantity) ? amount / quantity : amount;
      return { amount: perItem, unit: "each", display: `${formatDollars(perItem)} ea` };
    }
    case "count": {
      if (hasQuantity(quantity)) {
        const perCount = amount / quantity;
        return { amount: perCount, unit: "count", display: `${formatDollars(perCount)}/count` };
      }
      return UNRESOLVED_UNIT_PRICE;
    }
    default:
      return UNRESOLVED_UNIT_PRICE;
  }
};
