import type { NextFunction, Request, Response } from "express";
import { body, query, validationResult } from "express-validator";
import { ValidationError } from "./errors";

const TRADE_IDENTITY_MESSAGE = "商戶訂單編號與支付寶交易號至少需提供一個";

function hasText(value: unknown): boolean {
  return typeof value === "string" && value.trim() !== "";
}

/**
 * 建立付款（form / url / app / applet / scan）的請求驗證規則
 *
 * outTradeNo 未提供時由路由自動產生。
 */
export const orderValidation = [
  body("outTradeNo").optional().isString().isLength({ max: 64 }).withMessage("訂單編號最長 64 字元"),
  body("totalAmount").isFloat({ gt: 0 }).withMessage("訂單金額必須大於 0").toFloat(),
  body("subject")
    .isString()
    .withMessage("缺少訂單標題")
    .bail()
    .trim()
    .notEmpty()
    .withMessage("缺少訂單標題")
    .isLength({ max: 256 })
    .withMessage("訂單標題最長 256 字元"),
  body("body").optional().isString().isLength({ max: 128 }),
  body("timeoutExpress")
    .optional()
    .matches(/^\d+[mhdc]$/)
    .withMessage("timeoutExpress 格式為數字加單位 m/h/d/c，例如 90m"),
];

/**
 * 條碼支付：另外需要付款條碼
 */
export const barcodeValidation = [
  ...orderValidation,
  body("authCode")
    .isString()
    .withMessage("缺少付款條碼")
    .bail()
    .matches(/^\d{16,24}$/)
    .withMessage("付款條碼格式不正確"),
  body("storeId").optional().isString().isLength({ max: 32 }),
  body("terminalId").optional().isString().isLength({ max: 32 }),
];

const bodyTradeIdentity = body("outTradeNo")
  .custom((value: unknown, { req }) => hasText(value) || hasText(req.body?.tradeNo))
  .withMessage(TRADE_IDENTITY_MESSAGE);

const queryTradeIdentity = query("outTradeNo")
  .custom((value: unknown, { req }) => hasText(value) || hasText(req.query?.tradeNo))
  .withMessage(TRADE_IDENTITY_MESSAGE);

/** 查詢 */
export const tradeQueryValidation = [queryTradeIdentity];

/** 撤銷、關閉 */
export const tradeActionValidation = [bodyTradeIdentity, body("operatorId").optional().isString().isLength({ max: 28 })];

export const refundValidation = [
  bodyTradeIdentity,
  body("refundAmount").isFloat({ gt: 0 }).withMessage("退款金額必須大於 0").toFloat(),
  body("refundReason").optional().isString().isLength({ max: 256 }),
  body("outRequestNo").optional().isString().isLength({ max: 64 }),
];

export const refundQueryValidation = [
  queryTradeIdentity,
  query("outRequestNo").isString().withMessage("缺少退款請求編號").bail().notEmpty().withMessage("缺少退款請求編號"),
];

export const billValidation = [
  query("billType").isIn(["trade", "signcustomer"]).withMessage("對帳單類型必須是 trade 或 signcustomer"),
  query("billDate")
    .matches(/^\d{4}-\d{2}(-\d{2})?$/)
    .withMessage("對帳單日期格式必須是 yyyy-MM-dd 或 yyyy-MM"),
];

/**
 * 收集驗證結果；有錯誤時交給 errorHandler 回應 400
 *
 * @example
 * router.post("/api/payments/url", orderValidation, validate, handler);
 */
export function validate(req: Request, _res: Response, next: NextFunction): void {
  const result = validationResult(req);
  if (result.isEmpty()) {
    next();
    return;
  }

  next(
    new ValidationError(
      result.array().map((error) => ({
        field: error.type === "field" ? error.path : error.type,
        message: String(error.msg),
      })),
      { path: req.path }
    )
  );
}
