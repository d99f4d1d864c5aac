import { defineInt } from "firebase-functions/params";
import { HttpsOptions } from "firebase-functions/v2/https";

export const defaultTopNParam = defineInt("RANK_DEALS_DEFAULT_TOP_N", {
  default: 6,
  description: "Number of deals returned when a request does not set top_n",
});

export const DEFAULT_TOP_N_PER_RETAILER = 6;
export const MAX_TOP_N = 100;

export const FUNCTION_CONFIG: HttpsOptions = {
  memory: "512MiB",
  timeoutSeconds: 60,
  region: "europe-west1",
  cors: true,
};
