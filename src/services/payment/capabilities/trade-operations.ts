/**
 * 查詢、撤銷、關閉、退款、退款查詢
 *
 * 每個操作都先檢查參數，再以對應的 method 提交。
 */

import type { Auxiliary, AuxiliaryType, Notify } from "@/types/payment";
import type { AlipayClient } from "../alipay-client";
import { METHOD, type MethodName } from "../constants";
import { validateAuxiliary } from "../validation";
import { auxiliaryContent } from "./order-content";

const AUXILIARY_METHODS: Record<Exclude<AuxiliaryType, "billDownload">, MethodName> = {
  query: METHOD.QUERY,
  cancel: METHOD.CANCEL,
  close: METHOD.CLOSE,
  refund: METHOD.REFUND,
  refundQuery: METHOD.REFUND_QUERY,
};

async function commitAuxiliary(
  client: AlipayClient,
  type: Exclude<AuxiliaryType, "billDownload">,
  auxiliary: Auxiliary
): Promise<Notify> {
  validateAuxiliary(type, auxiliary);
  return client.commit(AUXILIARY_METHODS[type], auxiliaryContent(auxiliary));
}

export function queryTrade(client: AlipayClient, auxiliary: Auxiliary): Promise<Notify> {
  return commitAuxiliary(client, "query", auxiliary);
}

export function cancelTrade(client: AlipayClient, auxiliary: Auxiliary): Promise<Notify> {
  return commitAuxiliary(client, "cancel", auxiliary);
}

export function closeTrade(client: AlipayClient, auxiliary: Auxiliary): Promise<Notify> {
  return commitAuxiliary(client, "close", auxiliary);
}

export function refundTrade(client: AlipayClient, auxiliary: Auxiliary): Promise<Notify> {
  return commitAuxiliary(client, "refund", auxiliary);
}

export function queryRefund(client: AlipayClient, auxiliary: Auxiliary): Promise<Notify> {
  return commitAuxiliary(client, "refundQuery", auxiliary);
}
