/**
 * API 請求/回應型別定義
 */

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
}

/** 通知處理結果；success 為 false 時回覆 fail，支付寶會重送 */
export interface ProcessResult {
  success: boolean;
  message: string;
  data?: {
    outTradeNo?: string;
    tradeNo?: string;
    state?: string;
    amount?: string;
  };
}
