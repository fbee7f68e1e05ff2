/**
 * 非同步通知處理服務
 *
 * 職責：
 * - 驗證通知簽章（未通過一律拒絕）
 * - 付款成功的通知再向支付寶查詢一次確認（以查詢結果為準）
 * - 依交易狀態委派給 NotifyProcessor 處理業務邏輯
 *
 * 設計理念：
 * - 這是「金流驗證層」+「流程協調層」
 * - 業務邏輯（更新訂單）由 NotifyProcessor 處理
 *
 * 使用範例：
 *   const handler = new NotifyHandler(gateway, processor);
 *   const result = await handler.handleNotify(req.body);
 *   res.type("text").send(result.success ? "success" : "fail");
 */

import type { ProcessResult } from "@/types/api";
import type { Auxiliary, Notify, ValidatedNotify } from "@/types/payment";
import { PaymentError } from "@/utils/errors";
import logger from "@/utils/logger";
import { isSuccessPay } from "../payment/notify";

interface NotifyGateway {
  validateNotify(params: Record<string, unknown>): ValidatedNotify;
  query(auxiliary: Auxiliary): Promise<Notify>;
}

interface PaymentNotifyProcessor {
  processPayment(notify: Notify): Promise<ProcessResult>;
  processClosed(notify: Notify): Promise<ProcessResult>;
}

export interface NotifyHandlerOptions {
  /** 付款成功的通知是否再查詢確認，預設為 true */
  confirmByQuery?: boolean;
}

export class NotifyHandler {
  private gateway: NotifyGateway;
  private processor: PaymentNotifyProcessor;
  private confirmByQuery: boolean;

  constructor(gateway: NotifyGateway, processor: PaymentNotifyProcessor, options: NotifyHandlerOptions = {}) {
    this.gateway = gateway;
    this.processor = processor;
    this.confirmByQuery = options.confirmByQuery ?? true;
    logger.info("NotifyHandler 已初始化", { confirmByQuery: this.confirmByQuery });
  }

  /**
   * 處理支付寶非同步通知
   *
   * 不會拋出異常，所有錯誤都轉成 success: false。
   */
  async handleNotify(params: Record<string, unknown>): Promise<ProcessResult> {
    let validated: ValidatedNotify;
    try {
      validated = this.gateway.validateNotify(params);
    } catch (error: unknown) {
      logger.warn("通知驗證失敗", {
        error: error instanceof Error ? error.message : String(error),
        code: error instanceof PaymentError ? error.code : undefined,
      });
      return { success: false, message: "通知驗證失敗" };
    }

    const { notify, state } = validated;
    logger.info("接收支付寶通知", {
      outTradeNo: notify.outTradeNo,
      tradeNo: notify.tradeNo,
      notifyId: notify.notifyId,
      state,
    });

    try {
      switch (state) {
        case "succeeded":
          return await this.handlePaid(notify);
        case "closed":
          return await this.processor.processClosed(notify);
        default:
          // 等待付款或未知狀態只需回覆收到
          return {
            success: true,
            message: "無需處理",
            data: { outTradeNo: notify.outTradeNo, tradeNo: notify.tradeNo, state },
          };
      }
    } catch (error: unknown) {
      logger.error("通知處理異常", {
        outTradeNo: notify.outTradeNo,
        error: error instanceof Error ? error.message : String(error),
      });
      return { success: false, message: "通知處理失敗" };
    }
  }

  private async handlePaid(notify: Notify): Promise<ProcessResult> {
    if (this.confirmByQuery) {
      const confirmed = await this.gateway.query({ tradeNo: notify.tradeNo, outTradeNo: notify.outTradeNo });
      if (!isSuccessPay(confirmed)) {
        logger.error("查詢結果與通知不符，放棄處理", {
          outTradeNo: notify.outTradeNo,
          notifyStatus: notify.tradeStatus,
          queryStatus: confirmed.tradeStatus,
        });
        return { success: false, message: "查詢結果與通知不符" };
      }
      logger.info("查詢確認付款成功", { outTradeNo: notify.outTradeNo, tradeNo: confirmed.tradeNo });
    }

    const result = await this.processor.processPayment(notify);
    if (!result.success) {
      logger.error("業務邏輯處理失敗", { outTradeNo: notify.outTradeNo, error: result.message });
    }
    return result;
  }
}

export function createNotifyHandler(
  gateway: NotifyGateway,
  processor: PaymentNotifyProcessor,
  options?: NotifyHandlerOptions
): NotifyHandler {
  return new NotifyHandler(gateway, processor, options);
}

export default NotifyHandler;
