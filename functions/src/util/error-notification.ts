import { logger } from "firebase-functions/v2";
import { defineString } from "firebase-functions/params";

export const errorWebhookUrl = defineString("ERROR_WEBHOOK_URL", {
  default: "",
  description: "Webhook that receives a JSON post for every failed ranking request",
});

export interface RankingFailure {
  /** Name of the function that failed. */
  source: string;
  errorMessage: string;
  dealCount?: number;
  retailer?: string;
}

/** Posts a failed ranking run to the error webhook. Never throws. */
export const notifyError = async ({
  source,
  errorMessage,
  dealCount,
  retailer,
}: RankingFailure): Promise<void> => {
  const webhookUrl = errorWebhookUrl.value();
  if (!webhookUrl) {
    logger.debug("No error webhook configured, skipping notification", { source, errorMessage });
    return;
  }

  try {
    const response = await fetch(webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        text: `Deal ranking failed in ${source}: ${errorMessage}`,
        source,
        error: errorMessage,
        deal_count: dealCount ?? null,
        retailer: retailer ?? null,
        timestamp: new Date().toISOString(),
      }),
    });

    if (!response.ok) {
      logger.error("Error webhook rejected notification", {
        source,
        httpStatus: response.status,
      });
    }
  } catch (notificationError) {
    logger.error("Could not reach error webhook", {
      source,
      notificationError:
        notificationError instanceof Error ? notificationError.message : "Unknown error",
      errorMessage,
    });
  }
};
