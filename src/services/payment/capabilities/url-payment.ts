import type { Order } from "@/types/payment";
import type { AlipayClient } from "../alipay-client";
import { METHOD, PRODUCT_CODE } from "../constants";
import { validateOrder } from "../validation";
import { orderContent } from "./order-content";

/**
 * 手機網站支付：回傳可直接跳轉的 URL
 */
export function buildUrlPayment(client: AlipayClient, order: Order): string {
  validateOrder(order);

  const data = client.assemble(METHOD.WAP, orderContent(order, PRODUCT_CODE.QUICK_WAP_WAY));
  return `${client.requestUrl}&${data.toUrlEncodedBody()}`;
}
