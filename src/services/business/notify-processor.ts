/**
 * 通知業務處理器
 *
 * 職責：
 * - 核對金額與訂單是否一致
 * - 更新訂單狀態（付款成功、交易關閉）
 * - 重複通知直接視為成功，不重複處理
 *
 * 簽章驗證與主動查詢由 NotifyHandler 負責，
 * 這裡只處理「驗證通過後該做什麼」。
 *
 * 使用範例：
 *   const processor = new NotifyProcessor(store);
 *   await processor.processPayment(notify);
 */

import type { ProcessResult } from "@/types/api";
import type { Notify } from "@/types/payment";
import logger from "@/utils/logger";
import { formatTimestamp } from "@/utils/payment-helpers";
import type { OrderStore, StoredOrder } from "./order-store";

function sameAmount(left: string | undefined, right: string): boolean {
  return left !== undefined && Number(left).toFixed(2) === right;
}

export class NotifyProcessor {
  private store: OrderStore;

  constructor(store: OrderStore) {
    this.store = store;
    logger.info("NotifyProcessor 已初始化");
  }

  /**
   * 付款成功：核對金額後標記為已付款
   */
  async processPayment(notify: Notify): Promise<ProcessResult> {
    const outTradeNo = notify.outTradeNo;
    try {
      const order = await this.findOrder(outTradeNo);
      if (!order) {
        return { success: false, message: "找不到訂單" };
      }

      if (order.status === "paid") {
        logger.info("重複的付款通知，略過", { outTradeNo, tradeNo: notify.tradeNo });
        return this.result("重複通知", order, notify);
      }

      if (!sameAmount(notify.totalAmount, order.totalAmount)) {
        logger.error("通知金額與訂單不符", {
          outTradeNo,
          notifyAmount: notify.totalAmount,
          orderAmount: order.totalAmount,
        });
        return { success: false, message: "金額驗證失敗" };
      }

      const paidAt = notify.gmtPayment ?? formatTimestamp(new Date());
      const updated = await this.store.markPaid(order.outTradeNo, notify.tradeNo, paidAt);
      if (!updated) {
        logger.error("更新訂單失敗", { outTradeNo });
        return { success: false, message: "更新訂單失敗" };
      }

      logger.info("訂單已標記為付款成功", { outTradeNo, tradeNo: notify.tradeNo, amount: order.totalAmount });
      return this.result("付款處理成功", order, notify);
    } catch (error: unknown) {
      logger.error("處理付款通知失敗", {
        outTradeNo,
        error: error instanceof Error ? error.message : String(error),
      });
      return { success: false, message: "處理失敗" };
    }
  }

  /**
   * 交易關閉（逾時未付款或全額退款）
   */
  async processClosed(notify: Notify): Promise<ProcessResult> {
    const outTradeNo = notify.outTradeNo;
    try {
      const order = await this.findOrder(outTradeNo);
      if (!order) {
        return { success: false, message: "找不到訂單" };
      }

      if (order.status !== "closed") {
        await this.store.markClosed(order.outTradeNo);
        logger.info("訂單已關閉", { outTradeNo, previousStatus: order.status });
      }

      return this.result("交易關閉處理成功", order, notify);
    } catch (error: unknown) {
      logger.error("處理關閉通知失敗", {
        outTradeNo,
        error: error instanceof Error ? error.message : String(error),
      });
      return { success: false, message: "處理失敗" };
    }
  }

  private async findOrder(outTradeNo: string | undefined): Promise<StoredOrder | null> {
    if (!outTradeNo) {
      logger.warn("通知缺少商戶訂單編號");
      return null;
    }
    const order = await this.store.getOrder(outTradeNo);
    if (!order) {
      logger.warn("通知對應的訂單不存在", { outTradeNo });
    }
    return order;
  }

  private result(message: string, order: StoredOrder, notify: Notify): ProcessResult {
    return {
      success: true,
      message,
      data: {
        outTradeNo: order.outTradeNo,
        tradeNo: notify.tradeNo,
        amount: order.totalAmount,
      },
    };
  }
}

export function createNotifyProcessor(store: OrderStore): NotifyProcessor {
  return new NotifyProcessor(store);
}

export default NotifyProcessor;
