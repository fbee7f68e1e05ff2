import type { Auxiliary, Order } from "@/types/payment";
import { formatAmount } from "@/utils/payment-helpers";

/**
 * 金額統一轉成兩位小數字串後再放進 biz_content
 */
export function orderContent(order: Order, productCode?: string): object {
  return {
    ...order,
    totalAmount: formatAmount(order.totalAmount),
    productCode: productCode ?? order.productCode,
  };
}

export function auxiliaryContent(auxiliary: Auxiliary): object {
  return {
    ...auxiliary,
    refundAmount: auxiliary.refundAmount === undefined ? undefined : formatAmount(auxiliary.refundAmount),
  };
}
