import { logger } from "firebase-functions/v2";
import { MAX_TOP_N } from "./constants";
import { DealInputError } from "./errors";
import { RankByRetailerRequest, RankDealsRequest } from "./types";
import { assertDealList, assertTopN, isPlainObject } from "./validation";
import { notifyError } from "../util/error-notification";

/** The part of an express response the handlers write to. */
export interface JsonResponder {
  status(code: number): { json(body: unknown): unknown };
}

export function isValidMethod(request: { method: string }, response: JsonResponder) {
  if (request.method !== "POST") {
    response.status(405).json({ error: "Method not allowed" });
    return false;
  }
  return true;
}

const optionalBoolean = (body: Record<string, unknown>, field: string): boolean | undefined => {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new DealInputError(`${field} must be a boolean`);
  }
  return value;
};

const optionalString = (body: Record<string, unknown>, field: string): string | undefined => {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new DealInputError(`${field} must be a string`);
  }
  return value;
};

const optionalStringList = (
  body: Record<string, unknown>,
  field: string,
): string[] | undefined => {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new DealInputError(`${field} must be an array of strings`);
  }
  return value;
};

const optionalTopN = (body: Record<string, unknown>, field: string): number | undefined => {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number") {
    throw new DealInputError(`${field} must be a number`);
  }
  assertTopN(value, field);
  if (value > MAX_TOP_N) {
    throw new DealInputError(`${field} must be at most ${MAX_TOP_N}`);
  }
  return value;
};

const requireBody = (body: unknown): Record<string, unknown> => {
  if (!isPlainObject(body)) {
    throw new DealInputError("Request body must be a JSON object");
  }
  return body;
};

export function parseRankDealsRequest(body: unknown): RankDealsRequest {
  const requestData = requireBody(body);
  const deals = requestData.deals;
  assertDealList(deals);

  return {
    deals,
    top_n: optionalTopN(requestData, "top_n"),
    balance_categories: optionalBoolean(requestData, "balance_categories"),
    retailer: optionalString(requestData, "retailer") || undefined,
    include_excluded: optionalBoolean(requestData, "include_excluded"),
    include_breakdown: optionalBoolean(requestData, "include_breakdown"),
  };
}

export function parseRankByRetailerRequest(body: unknown): RankByRetailerRequest {
  const requestData = requireBody(body);
  const deals = requestData.deals;
  assertDealList(deals);

  return {
    deals,
    top_n_per_retailer: optionalTopN(requestData, "top_n_per_retailer"),
    retailers: optionalStringList(requestData, "retailers"),
  };
}

/** Deal count and retailer of a raw body, for failure reports. */
export const describeRequestBody = (body: unknown): { dealCount?: number; retailer?: string } => {
  if (!isPlainObject(body)) {
    return {};
  }
  return {
    dealCount: Array.isArray(body.deals) ? body.deals.length : undefined,
    retailer: typeof body.retailer === "string" ? body.retailer : undefined,
  };
};

export const handleFailure = async (
  source: string,
  error: unknown,
  response: JsonResponder,
  body?: unknown,
): Promise<void> => {
  if (error instanceof DealInputError) {
    logger.warn("Rejected deal ranking request", { source, error: error.message, index: error.index });
    response.status(400).json({ error: error.message });
    return;
  }

  const errorMessage = error instanceof Error ? error.message : "Unknown error";
  logger.error("Error ranking deals", { source, error: errorMessage });
  await notifyError({ source, errorMessage, ...describeRequestBody(body) });
  response.status(500).json({
    error: "Internal server error",
    details: errorMessage,
  });
};
