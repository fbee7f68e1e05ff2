/**
 * 金流錯誤類別
 *
 * 所有對外拋出的錯誤都繼承 PaymentError，
 * 由 errorHandler 依 statusCode 轉成 HTTP 回應。
 */

import type { ErrorCode, FieldError } from "@/types/errors";
import type { Notify } from "@/types/payment";

export class PaymentError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "PaymentError";
  }
}

/**
 * 金流商回傳非成功狀態碼
 */
export class GatewayOperationError extends PaymentError {
  readonly subMessage: string;
  readonly resultCode?: string;
  readonly subCode?: string;
  readonly notify?: Notify;

  constructor(subMessage: string, notify?: Notify) {
    super(subMessage, "GATEWAY_OPERATION_ERROR", 502, {
      code: notify?.code,
      subCode: notify?.subCode,
      outTradeNo: notify?.outTradeNo,
      tradeNo: notify?.tradeNo,
    });
    this.name = "GatewayOperationError";
    this.subMessage = subMessage;
    this.resultCode = notify?.code;
    this.subCode = notify?.subCode;
    this.notify = notify;
  }
}

/**
 * 通知簽章驗證失敗，後續的付款成功流程一律不得執行
 */
export class SignatureMismatchError extends PaymentError {
  constructor(context: Record<string, unknown> = {}) {
    super("簽章不一致", "SIGNATURE_MISMATCH", 401, context);
    this.name = "SignatureMismatchError";
  }
}

export class MalformedResponseError extends PaymentError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "MALFORMED_RESPONSE", 502, context);
    this.name = "MalformedResponseError";
  }
}

export class ValidationError extends PaymentError {
  readonly errors: FieldError[];

  constructor(errors: FieldError[], context: Record<string, unknown> = {}) {
    super(errors.map((e) => e.message).join("; "), "VALIDATION_ERROR", 400, context);
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * 常用 HTTP 錯誤的工廠方法
 */
export const PaymentErrors = {
  NotFound: (message: string, context: Record<string, unknown> = {}): PaymentError =>
    new PaymentError(message, "NOT_FOUND", 404, context),
};
