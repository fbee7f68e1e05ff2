/**
 * 條碼支付（當面付）
 *
 * Submitted -> Polling -> Succeeded / TimedOut
 * TimedOut 時先撤銷交易，再回報固定的逾時訊息。
 */

import type { Auxiliary, BarcodeOutcome, Order } from "@/types/payment";
import logger from "@/utils/logger";
import type { AlipayClient } from "../alipay-client";
import { BARCODE_SCENE, METHOD, PAYMENT_TIMEOUT_MESSAGE, PRODUCT_CODE, SUCCESS_CODE, WAIT_USER_CODE } from "../constants";
import { DEFAULT_POLL_POLICY, pollTradeState, type PollPolicy } from "../poller";
import { orderContent } from "./order-content";
import { cancelTrade, queryTrade } from "./trade-operations";
import { validateOrder } from "../validation";

/**
 * 撤銷為盡力而為：失敗只記錄，不重試
 */
async function cancelAfterTimeout(client: AlipayClient, auxiliary: Auxiliary): Promise<boolean> {
  try {
    await cancelTrade(client, auxiliary);
    logger.info("逾時交易已撤銷", { tradeNo: auxiliary.tradeNo });
    return true;
  } catch (error: unknown) {
    logger.error("撤銷逾時交易失敗", {
      tradeNo: auxiliary.tradeNo,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

export async function payByBarcode(
  client: AlipayClient,
  order: Order,
  policy: PollPolicy = DEFAULT_POLL_POLICY
): Promise<BarcodeOutcome> {
  validateOrder(order, { requireAuthCode: true });

  const notify = await client.commitUnchecked(
    METHOD.BARCODE,
    orderContent({ ...order, scene: order.scene ?? BARCODE_SCENE }, PRODUCT_CODE.FACE_TO_FACE_PAYMENT)
  );

  if (notify.code === SUCCESS_CODE) {
    return { status: "succeeded", notify, attempts: 0 };
  }

  if (!notify.tradeNo) {
    logger.warn("條碼支付失敗，沒有交易號", {
      outTradeNo: order.outTradeNo,
      code: notify.code,
      subCode: notify.subCode,
    });
    return {
      status: "failed",
      message: notify.subMsg ?? notify.msg ?? "",
      notify,
      attempts: 0,
      cancelled: false,
    };
  }

  logger.info(notify.code === WAIT_USER_CODE ? "等待用戶付款，開始輪詢" : "付款結果未定，開始輪詢", {
    outTradeNo: order.outTradeNo,
    tradeNo: notify.tradeNo,
  });

  const auxiliary: Auxiliary = { tradeNo: notify.tradeNo };
  const result = await pollTradeState(() => queryTrade(client, auxiliary), policy);

  if (result.status === "succeeded") {
    return { status: "succeeded", notify: result.notify, attempts: result.attempts };
  }

  const cancelled = await cancelAfterTimeout(client, auxiliary);
  return {
    status: "failed",
    message: PAYMENT_TIMEOUT_MESSAGE,
    notify: result.lastNotify ?? notify,
    attempts: result.attempts,
    cancelled,
  };
}
