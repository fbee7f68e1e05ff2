import type { Order } from "@/types/payment";
import type { AlipayClient } from "../alipay-client";
import { METHOD, PRODUCT_CODE } from "../constants";
import { validateOrder } from "../validation";
import { orderContent } from "./order-content";

/**
 * 電腦網站支付：回傳自動送出的 HTML 表單
 */
export function buildFormPayment(client: AlipayClient, order: Order): string {
  validateOrder(order);

  const data = client.assemble(METHOD.WEB, orderContent(order, PRODUCT_CODE.FAST_INSTANT_TRADE_PAY));
  return data.toForm(client.requestUrl);
}
