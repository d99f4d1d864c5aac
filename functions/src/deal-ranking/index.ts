import { onRequest } from "firebase-functions/v2/https";
import { logger } from "firebase-functions/v2";
import { DEFAULT_TOP_N } from "./analyzer";
import { defaultTopNParam, FUNCTION_CONFIG } from "./constants";
import {
  handleFailure,
  isValidMethod,
  parseRankByRetailerRequest,
  parseRankDealsRequest,
} from "./http";
import { rankByRetailerForRequest, rankDealsForRequest } from "./rank-request";
import { RankByRetailerResponse, RankDealsResponse } from "./types";

const configuredDefaultTopN = (): number => {
  const configured = defaultTopNParam.value();
  return configured > 0 ? configured : DEFAULT_TOP_N;
};

export const rankDeals = onRequest(FUNCTION_CONFIG, async (request, response) => {
  const startTime = Date.now();
  try {
    if (!isValidMethod(request, response)) {
      return;
    }

    const requestData = parseRankDealsRequest(request.body);

    logger.info("Ranking deals", {
      dealCount: requestData.deals.length,
      topN: requestData.top_n,
      retailer: requestData.retailer,
      balanceCategories: requestData.balance_categories,
    });

    const result = rankDealsForRequest(requestData, configuredDefaultTopN());
    const responseData: RankDealsResponse = {
      ...result,
      processing_time_ms: Date.now() - startTime,
    };

    logger.info("Deal ranking completed", {
      topDeals: responseData.top_deals.length,
      excluded: responseData.excluded?.length,
      processingTimeMs: responseData.processing_time_ms,
    });

    response.json(responseData);
  } catch (error) {
    await handleFailure("rankDeals", error, response, request.body);
  }
});

export const rankDealsByRetailer = onRequest(FUNCTION_CONFIG, async (request, response) => {
  const startTime = Date.now();
  try {
    if (!isValidMethod(request, response)) {
      return;
    }

    const requestData = parseRankByRetailerRequest(request.body);

    logger.info("Ranking deals per retailer", {
      dealCount: requestData.deals.length,
      topNPerRetailer: requestData.top_n_per_retailer,
      retailers: requestData.retailers,
    });

    const responseData: RankByRetailerResponse = {
      ...rankByRetailerForRequest(requestData),
      processing_time_ms: Date.now() - startTime,
    };

    logger.info("Per-retailer ranking completed", {
      retailers: responseData.retailers.map((r) => r.retailer),
      dealsPicked: responseData.deals_picked,
      processingTimeMs: responseData.processing_time_ms,
    });

    response.json(responseData);
  } catch (error) {
    await handleFailure("rankDealsByRetailer", error, response, request.body);
  }
});
