/**
 * 支付相關型別定義
 */

export type SignType = 'RSA' | 'RSA2';

/** 商戶設定；金鑰只用於簽章，不會出現在請求參數中 */
export interface Merchant {
  appId: string;
  privateKey: string;
  alipayPublicKey: string;
  signType?: SignType;
  format?: string;
  charset?: string;
  version?: string;
  notifyUrl?: string;
  returnUrl?: string;
  appAuthToken?: string;
}

/** 一次付款的訂單內容 */
export interface Order {
  outTradeNo: string;
  totalAmount: number;
  subject: string;
  body?: string;
  productCode?: string;
  timeoutExpress?: string;
  authCode?: string;
  scene?: string;
  storeId?: string;
  operatorId?: string;
  terminalId?: string;
}

export type BillType = 'trade' | 'signcustomer';

/** 查詢、撤銷、關閉、退款、退款查詢、對帳單下載的參數 */
export interface Auxiliary {
  outTradeNo?: string;
  tradeNo?: string;
  refundAmount?: number;
  refundReason?: string;
  outRequestNo?: string;
  operatorId?: string;
  billType?: BillType;
  billDate?: string;
}

export type AuxiliaryType = 'query' | 'cancel' | 'close' | 'refund' | 'refundQuery' | 'billDownload';

/** 同步回應或非同步通知 */
export interface Notify {
  code?: string;
  msg?: string;
  subCode?: string;
  subMsg?: string;
  sign?: string;
  signType?: string;
  appId?: string;
  version?: string;
  charset?: string;
  tradeNo?: string;
  outTradeNo?: string;
  tradeStatus?: string;
  totalAmount?: string;
  receiptAmount?: string;
  buyerLogonId?: string;
  buyerId?: string;
  sellerId?: string;
  gmtPayment?: string;
  notifyTime?: string;
  notifyType?: string;
  notifyId?: string;
  qrCode?: string;
  billDownloadUrl?: string;
  refundFee?: string;
  outRequestNo?: string;
  refundAmount?: string;
  /** 原始欄位（wire 名稱） */
  raw: Record<string, string>;
}

export type NotifyState = 'succeeded' | 'awaiting' | 'closed' | 'unknown';

export interface ValidatedNotify {
  notify: Notify;
  state: NotifyState;
}

export type BarcodeOutcome =
  | { status: 'succeeded'; notify: Notify; attempts: number }
  | { status: 'failed'; message: string; notify: Notify; attempts: number; cancelled: boolean };

export interface BillFile {
  url: string;
  fileName: string;
  fileType: string;
  content: Buffer;
}
