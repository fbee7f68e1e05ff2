import { z } from "zod";
import type { Notify, NotifyState } from "@/types/payment";
import { TRADE_STATUS } from "./constants";
import type { GatewayData } from "./gateway-data";

const field = z.string().optional();

const NotifySchema = z.object({
  code: field,
  msg: field,
  subCode: field,
  subMsg: field,
  sign: field,
  signType: field,
  appId: field,
  version: field,
  charset: field,
  tradeNo: field,
  outTradeNo: field,
  tradeStatus: field,
  totalAmount: field,
  receiptAmount: field,
  buyerLogonId: field,
  buyerId: field,
  sellerId: field,
  gmtPayment: field,
  notifyTime: field,
  notifyType: field,
  notifyId: field,
  qrCode: field,
  billDownloadUrl: field,
  refundFee: field,
  outRequestNo: field,
  refundAmount: field,
});

/**
 * 將容器內容轉成 Notify，原始欄位保留在 raw
 */
export function toNotify(data: GatewayData): Notify {
  return {
    ...data.toObject(NotifySchema, "snake"),
    raw: data.toRecord(),
  };
}

export function isSuccessPay(notify: Notify): boolean {
  return notify.tradeStatus === TRADE_STATUS.TRADE_SUCCESS || notify.tradeStatus === TRADE_STATUS.TRADE_FINISHED;
}

export function isWaitPay(notify: Notify): boolean {
  return notify.tradeStatus === TRADE_STATUS.WAIT_BUYER_PAY;
}

export function classifyNotify(notify: Notify): NotifyState {
  if (isSuccessPay(notify)) return "succeeded";
  if (isWaitPay(notify)) return "awaiting";
  if (notify.tradeStatus === TRADE_STATUS.TRADE_CLOSED) return "closed";
  return "unknown";
}
