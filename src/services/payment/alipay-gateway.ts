/**
 * 支付寶金流閘道
 *
 * 職責：
 * - 提供各付款方式與交易生命週期操作的統一入口
 * - 條碼支付結束時發出 paymentSucceeded / paymentFailed 事件
 * - 隱藏簽章請求引擎（AlipayClient）的實作細節
 *
 * 設計理念：
 * - 每一種能力都是獨立模組（capabilities/），只依賴 AlipayClient
 * - 這裡只負責組合、記錄日誌與發出事件
 *
 * 使用範例：
 *   const gateway = new AlipayGateway({ merchant, gatewayUrl });
 *   const html = gateway.buildFormPayment(order);
 *   const outcome = await gateway.payByBarcode(order);
 *   const { notify, state } = gateway.validateNotify(req.body);
 */

import { EventEmitter } from "events";
import type { Auxiliary, BarcodeOutcome, BillFile, Notify, Order, ValidatedNotify } from "@/types/payment";
import logger from "@/utils/logger";
import { AlipayClient, type AlipayClientOptions } from "./alipay-client";
import {
  buildAppPayment,
  buildAppletPayment,
  buildFormPayment,
  buildScanPayment,
  buildUrlPayment,
  cancelTrade,
  closeTrade,
  downloadBill,
  payByBarcode,
  queryRefund,
  queryTrade,
  refundTrade,
} from "./capabilities";
import { DEFAULT_POLL_POLICY, type PollPolicy } from "./poller";

export interface AlipayGatewayOptions extends AlipayClientOptions {
  pollPolicy?: PollPolicy;
}

type GatewayEvents = {
  paymentSucceeded: [Extract<BarcodeOutcome, { status: "succeeded" }>];
  paymentFailed: [Extract<BarcodeOutcome, { status: "failed" }>];
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class AlipayGateway extends EventEmitter<GatewayEvents> {
  readonly client: AlipayClient;
  private pollPolicy: PollPolicy;

  constructor(options: AlipayGatewayOptions) {
    super();
    this.client = new AlipayClient(options);
    this.pollPolicy = options.pollPolicy ?? DEFAULT_POLL_POLICY;
    logger.info("AlipayGateway 已初始化", {
      appId: options.merchant.appId,
      gatewayUrl: this.client.gatewayUrl,
    });
  }

  // ========================================
  // 支付相關
  // ========================================

  /**
   * 電腦網站支付
   *
   * @example
   * const html = gateway.buildFormPayment({
   *   outTradeNo: 'T20240101001',
   *   totalAmount: 88.8,
   *   subject: '年度會員',
   * });
   * res.type('html').send(html);
   */
  buildFormPayment(order: Order): string {
    const html = buildFormPayment(this.client, order);
    logger.info("網頁支付表單已生成", { outTradeNo: order.outTradeNo, amount: order.totalAmount });
    return html;
  }

  /**
   * 手機網站支付，回傳跳轉 URL
   */
  buildUrlPayment(order: Order): string {
    const url = buildUrlPayment(this.client, order);
    logger.info("手機網站支付連結已生成", { outTradeNo: order.outTradeNo, amount: order.totalAmount });
    return url;
  }

  buildAppPayment(order: Order): string {
    const orderString = buildAppPayment(this.client, order);
    logger.info("App 支付參數已生成", { outTradeNo: order.outTradeNo, amount: order.totalAmount });
    return orderString;
  }

  buildAppletPayment(order: Order): string {
    const orderString = buildAppletPayment(this.client, order);
    logger.info("小程序支付參數已生成", { outTradeNo: order.outTradeNo, amount: order.totalAmount });
    return orderString;
  }

  /**
   * 掃碼支付，回傳 QR code 內容
   */
  async buildScanPayment(order: Order): Promise<string> {
    try {
      const qrCode = await buildScanPayment(this.client, order);
      logger.info("掃碼支付 QR code 已生成", { outTradeNo: order.outTradeNo });
      return qrCode;
    } catch (error: unknown) {
      logger.error("建立掃碼支付失敗", { outTradeNo: order.outTradeNo, error: errorMessage(error) });
      throw error;
    }
  }

  /**
   * 條碼支付
   *
   * 回傳最終結果，同時發出對應事件。
   * 輪詢開始後無法中途取消；查詢失敗時直接拋出，不發事件。
   *
   * @example
   * gateway.on('paymentSucceeded', ({ notify }) => fulfil(notify.outTradeNo));
   * const outcome = await gateway.payByBarcode({ ...order, authCode: '2876...' });
   */
  async payByBarcode(order: Order): Promise<BarcodeOutcome> {
    const outcome = await payByBarcode(this.client, order, this.pollPolicy);

    if (outcome.status === "succeeded") {
      logger.info("條碼支付成功", {
        outTradeNo: order.outTradeNo,
        tradeNo: outcome.notify.tradeNo,
        attempts: outcome.attempts,
      });
      this.emit("paymentSucceeded", outcome);
    } else {
      logger.warn("條碼支付失敗", {
        outTradeNo: order.outTradeNo,
        message: outcome.message,
        attempts: outcome.attempts,
        cancelled: outcome.cancelled,
      });
      this.emit("paymentFailed", outcome);
    }

    return outcome;
  }

  // ========================================
  // 交易操作
  // ========================================

  async query(auxiliary: Auxiliary): Promise<Notify> {
    return this.runAuxiliary("查詢訂單", auxiliary, () => queryTrade(this.client, auxiliary));
  }

  async cancel(auxiliary: Auxiliary): Promise<Notify> {
    return this.runAuxiliary("撤銷訂單", auxiliary, () => cancelTrade(this.client, auxiliary));
  }

  async close(auxiliary: Auxiliary): Promise<Notify> {
    return this.runAuxiliary("關閉訂單", auxiliary, () => closeTrade(this.client, auxiliary));
  }

  async refund(auxiliary: Auxiliary): Promise<Notify> {
    return this.runAuxiliary("訂單退款", auxiliary, () => refundTrade(this.client, auxiliary));
  }

  async refundQuery(auxiliary: Auxiliary): Promise<Notify> {
    return this.runAuxiliary("查詢退款", auxiliary, () => queryRefund(this.client, auxiliary));
  }

  async billDownload(auxiliary: Auxiliary): Promise<BillFile> {
    try {
      return await downloadBill(this.client, auxiliary);
    } catch (error: unknown) {
      logger.error("下載對帳單失敗", {
        billType: auxiliary.billType,
        billDate: auxiliary.billDate,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  // ========================================
  // 通知相關
  // ========================================

  /**
   * 驗證支付寶非同步通知；驗簽失敗拋出 SignatureMismatchError
   */
  validateNotify(params: Record<string, unknown>): ValidatedNotify {
    return this.client.validateNotify(params);
  }

  // ========================================
  // 私有方法
  // ========================================

  private async runAuxiliary(action: string, auxiliary: Auxiliary, operation: () => Promise<Notify>): Promise<Notify> {
    try {
      const notify = await operation();
      logger.info(`${action}成功`, {
        outTradeNo: notify.outTradeNo ?? auxiliary.outTradeNo,
        tradeNo: notify.tradeNo ?? auxiliary.tradeNo,
        tradeStatus: notify.tradeStatus,
      });
      return notify;
    } catch (error: unknown) {
      logger.error(`${action}失敗`, {
        outTradeNo: auxiliary.outTradeNo,
        tradeNo: auxiliary.tradeNo,
        error: errorMessage(error),
      });
      throw error;
    }
  }
}

/**
 * 建立 AlipayGateway 實例的工廠函數
 */
export function createAlipayGateway(options: AlipayGatewayOptions): AlipayGateway {
  return new AlipayGateway(options);
}

export default AlipayGateway;
