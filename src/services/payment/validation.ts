/**
 * 送出請求前的參數檢查；未通過時不會發出任何網路請求
 */

import type { FieldError } from "@/types/errors";
import type { Auxiliary, AuxiliaryType, Order } from "@/types/payment";
import { ValidationError } from "@/utils/errors";

const BILL_DATE_PATTERN = /^\d{4}-\d{2}(-\d{2})?$/;

function isPositive(value: number | undefined): boolean {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

export function validateOrder(order: Order, options: { requireAuthCode?: boolean } = {}): void {
  const errors: FieldError[] = [];

  if (!order.outTradeNo) {
    errors.push({ field: "outTradeNo", message: "缺少訂單編號" });
  }
  if (!order.subject) {
    errors.push({ field: "subject", message: "缺少訂單標題" });
  }
  if (!isPositive(order.totalAmount)) {
    errors.push({ field: "totalAmount", message: "訂單金額必須大於 0" });
  }
  if (options.requireAuthCode && !order.authCode) {
    errors.push({ field: "authCode", message: "缺少付款條碼" });
  }

  if (errors.length > 0) {
    throw new ValidationError(errors, { outTradeNo: order.outTradeNo });
  }
}

export function validateAuxiliary(type: AuxiliaryType, auxiliary: Auxiliary): void {
  const errors: FieldError[] = [];

  if (type === "billDownload") {
    if (auxiliary.billType !== "trade" && auxiliary.billType !== "signcustomer") {
      errors.push({ field: "billType", message: "對帳單類型必須是 trade 或 signcustomer" });
    }
    if (!auxiliary.billDate || !BILL_DATE_PATTERN.test(auxiliary.billDate)) {
      errors.push({ field: "billDate", message: "對帳單日期格式必須是 yyyy-MM-dd 或 yyyy-MM" });
    }
  } else {
    if (!auxiliary.outTradeNo && !auxiliary.tradeNo) {
      errors.push({ field: "outTradeNo", message: "商戶訂單編號與支付寶交易號至少需提供一個" });
    }
    if (type === "refund" && !isPositive(auxiliary.refundAmount)) {
      errors.push({ field: "refundAmount", message: "退款金額必須大於 0" });
    }
    if (type === "refundQuery" && !auxiliary.outRequestNo) {
      errors.push({ field: "outRequestNo", message: "缺少退款請求編號" });
    }
  }

  if (errors.length > 0) {
    throw new ValidationError(errors, { type });
  }
}
