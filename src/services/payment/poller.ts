/**
 * 交易狀態輪詢
 *
 * 條碼支付的同步回應可能是「處理中」，需要反覆查詢直到成功或次數用盡。
 * 次數與間隔由 PollPolicy 決定，測試可換成不等待的策略。
 */

import { setTimeout as sleep } from "timers/promises";
import type { Notify } from "@/types/payment";
import logger from "@/utils/logger";
import { isSuccessPay } from "./notify";

export interface PollPolicy {
  maxAttempts: number;
  /** 第 attempt 次查詢前的等待毫秒數（第一次查詢不等待） */
  delay(attempt: number): number;
  sleep(ms: number): Promise<void>;
}

/** 每 5 秒查詢一次，共 5 次 */
export const DEFAULT_POLL_POLICY: PollPolicy = {
  maxAttempts: 5,
  delay: () => 5000,
  sleep: async (ms) => {
    await sleep(ms);
  },
};

export type PollResult =
  | { status: "succeeded"; notify: Notify; attempts: number }
  | { status: "timedOut"; attempts: number; lastNotify?: Notify };

/**
 * 依序查詢，任一次 trade_status 為成功即停止。
 * 只有查詢成功且狀態未付款才算尚未完成；查詢失敗（業務錯誤或傳輸錯誤）直接往上拋。
 */
export async function pollTradeState(
  query: () => Promise<Notify>,
  policy: PollPolicy = DEFAULT_POLL_POLICY
): Promise<PollResult> {
  let lastNotify: Notify | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (attempt > 1) {
      await policy.sleep(policy.delay(attempt));
    }

    lastNotify = await query();

    if (isSuccessPay(lastNotify)) {
      logger.info("輪詢確認付款成功", { attempt, tradeNo: lastNotify.tradeNo });
      return { status: "succeeded", notify: lastNotify, attempts: attempt };
    }

    logger.info("交易尚未完成", { attempt, tradeStatus: lastNotify.tradeStatus });
  }

  return { status: "timedOut", attempts: policy.maxAttempts, lastNotify };
}
