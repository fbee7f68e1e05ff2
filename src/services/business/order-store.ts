/**
 * 訂單儲存
 *
 * 建立付款時寫入待付款訂單，通知或條碼支付成功後更新狀態。
 * 正式環境可換成資料庫實作，只要符合 OrderStore 介面即可。
 */

import type { Order } from "@/types/payment";
import { formatAmount } from "@/utils/payment-helpers";

export type OrderStatus = "pending" | "paid" | "closed";

export interface StoredOrder {
  outTradeNo: string;
  subject: string;
  /** 兩位小數字串，與通知的 total_amount 直接比對 */
  totalAmount: string;
  status: OrderStatus;
  tradeNo?: string;
  paidAt?: string;
}

export interface OrderStore {
  saveOrder(order: Order): Promise<StoredOrder>;
  getOrder(outTradeNo: string): Promise<StoredOrder | null>;
  markPaid(outTradeNo: string, tradeNo: string | undefined, paidAt: string): Promise<boolean>;
  markClosed(outTradeNo: string): Promise<boolean>;
}

export class InMemoryOrderStore implements OrderStore {
  private orders = new Map<string, StoredOrder>();

  async saveOrder(order: Order): Promise<StoredOrder> {
    const stored: StoredOrder = {
      outTradeNo: order.outTradeNo,
      subject: order.subject,
      totalAmount: formatAmount(order.totalAmount),
      status: "pending",
    };
    this.orders.set(order.outTradeNo, stored);
    return { ...stored };
  }

  async getOrder(outTradeNo: string): Promise<StoredOrder | null> {
    const order = this.orders.get(outTradeNo);
    return order ? { ...order } : null;
  }

  async markPaid(outTradeNo: string, tradeNo: string | undefined, paidAt: string): Promise<boolean> {
    const order = this.orders.get(outTradeNo);
    if (!order) return false;
    this.orders.set(outTradeNo, { ...order, status: "paid", tradeNo, paidAt });
    return true;
  }

  async markClosed(outTradeNo: string): Promise<boolean> {
    const order = this.orders.get(outTradeNo);
    if (!order) return false;
    this.orders.set(outTradeNo, { ...order, status: "closed" });
    return true;
  }
}
