import type { Order } from "@/types/payment";
import { MalformedResponseError } from "@/utils/errors";
import type { AlipayClient } from "../alipay-client";
import { METHOD } from "../constants";
import { validateOrder } from "../validation";
import { orderContent } from "./order-content";

/**
 * 掃碼支付：預建立訂單後回傳 qr_code 內容
 */
export async function buildScanPayment(client: AlipayClient, order: Order): Promise<string> {
  validateOrder(order);

  const notify = await client.commit(METHOD.SCAN, orderContent(order));
  if (!notify.qrCode) {
    throw new MalformedResponseError("預建立訂單回應缺少 qr_code", { outTradeNo: order.outTradeNo });
  }
  return notify.qrCode;
}
