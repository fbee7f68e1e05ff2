import type { Auxiliary, BillFile } from "@/types/payment";
import { MalformedResponseError } from "@/utils/errors";
import logger from "@/utils/logger";
import { formatCompactTimestamp } from "@/utils/payment-helpers";
import type { AlipayClient } from "../alipay-client";
import { FILE_TYPE, METHOD } from "../constants";
import { GatewayData } from "../gateway-data";
import { validateAuxiliary } from "../validation";

/**
 * 下載對帳單；檔案內容交由呼叫端保存
 */
export async function downloadBill(client: AlipayClient, auxiliary: Auxiliary, now: Date = new Date()): Promise<BillFile> {
  validateAuxiliary("billDownload", auxiliary);

  const notify = await client.commit(METHOD.BILL_DOWNLOAD, {
    billType: auxiliary.billType,
    billDate: auxiliary.billDate,
  });

  const url = notify.billDownloadUrl;
  if (!url) {
    throw new MalformedResponseError("回應缺少 bill_download_url", { billDate: auxiliary.billDate });
  }

  const fileType = new GatewayData().fromUrl(url).get(FILE_TYPE) ?? "zip";
  const content = await client.download(url);

  logger.info("對帳單已下載", {
    billType: auxiliary.billType,
    billDate: auxiliary.billDate,
    bytes: content.length,
  });

  return {
    url,
    fileName: `${formatCompactTimestamp(now)}.${fileType}`,
    fileType,
    content,
  };
}
