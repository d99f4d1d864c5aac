import { rankDeals, rankDealsByRetailer } from "./deal-ranking";

exports.rankDeals = rankDeals;
exports.rankDealsByRetailer = rankDealsByRetailer;
