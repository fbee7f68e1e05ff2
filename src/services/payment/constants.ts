/**
 * 支付寶開放平台常數
 */

export const SIGN = "sign";
export const SIGN_TYPE = "sign_type";
export const BODY = "body";
export const FILE_TYPE = "fileType";

export const SUCCESS_CODE = "10000";
export const WAIT_USER_CODE = "10003";

export const TRADE_STATUS = {
  WAIT_BUYER_PAY: "WAIT_BUYER_PAY",
  TRADE_SUCCESS: "TRADE_SUCCESS",
  TRADE_FINISHED: "TRADE_FINISHED",
  TRADE_CLOSED: "TRADE_CLOSED",
} as const;

export const METHOD = {
  WEB: "alipay.trade.page.pay",
  WAP: "alipay.trade.wap.pay",
  APP: "alipay.trade.app.pay",
  SCAN: "alipay.trade.precreate",
  BARCODE: "alipay.trade.pay",
  QUERY: "alipay.trade.query",
  CANCEL: "alipay.trade.cancel",
  CLOSE: "alipay.trade.close",
  REFUND: "alipay.trade.refund",
  REFUND_QUERY: "alipay.trade.fastpay.refund.query",
  BILL_DOWNLOAD: "alipay.data.dataservice.bill.downloadurl.query",
} as const;

export type MethodName = (typeof METHOD)[keyof typeof METHOD];

export const PRODUCT_CODE = {
  FAST_INSTANT_TRADE_PAY: "FAST_INSTANT_TRADE_PAY",
  QUICK_WAP_WAY: "QUICK_WAP_WAY",
  QUICK_MSECURITY_PAY: "QUICK_MSECURITY_PAY",
  FACE_TO_FACE_PAYMENT: "FACE_TO_FACE_PAYMENT",
} as const;

export const BARCODE_SCENE = "bar_code";

/** 提交給 gateway.do 的固定路徑 */
export const GATEWAY_PATH = "gateway.do?charset=UTF-8";

/** 固定的逾時訊息，輪詢用盡時回報 */
export const PAYMENT_TIMEOUT_MESSAGE = "支付逾時";

/**
 * alipay.trade.query -> alipay_trade_query_response
 */
export function responseKeyOf(method: string): string {
  return `${method.replace(/\./g, "_")}_response`;
}
