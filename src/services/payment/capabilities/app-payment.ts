import type { Order } from "@/types/payment";
import type { AlipayClient } from "../alipay-client";
import { METHOD, PRODUCT_CODE } from "../constants";
import { validateOrder } from "../validation";
import { orderContent } from "./order-content";

/**
 * App 支付：回傳交給客戶端 SDK 的 orderString
 */
export function buildAppPayment(client: AlipayClient, order: Order): string {
  validateOrder(order);

  return client.sdkExecute({
    method: METHOD.APP,
    bizContent: orderContent(order, PRODUCT_CODE.QUICK_MSECURITY_PAY),
  });
}

/**
 * 小程序支付與 App 支付使用相同的參數
 */
export function buildAppletPayment(client: AlipayClient, order: Order): string {
  return buildAppPayment(client, order);
}
