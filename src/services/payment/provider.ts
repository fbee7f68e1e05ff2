/**
 * 支付寶閘道提供者
 * 管理 AlipayGateway 單例實例
 */

import { ALIPAY_CONFIG } from "@/config/constants";
import logger from "@/utils/logger";
import { AlipayGateway } from "./alipay-gateway";

let gatewayInstance: AlipayGateway | null = null;

/**
 * 依環境變數初始化 AlipayGateway 實例
 */
export function initAlipayGateway(): AlipayGateway {
  try {
    if (!gatewayInstance) {
      const { APP_ID, PRIVATE_KEY, ALIPAY_PUBLIC_KEY } = ALIPAY_CONFIG;
      if (!APP_ID || !PRIVATE_KEY || !ALIPAY_PUBLIC_KEY) {
        throw new Error("缺少支付寶設定：ALIPAY_APP_ID, ALIPAY_PRIVATE_KEY, ALIPAY_PUBLIC_KEY");
      }

      gatewayInstance = new AlipayGateway({
        merchant: {
          appId: APP_ID,
          privateKey: PRIVATE_KEY,
          alipayPublicKey: ALIPAY_PUBLIC_KEY,
          signType: ALIPAY_CONFIG.SIGN_TYPE,
          notifyUrl: ALIPAY_CONFIG.NOTIFY_URL,
          returnUrl: ALIPAY_CONFIG.RETURN_URL,
        },
        gatewayUrl: ALIPAY_CONFIG.GATEWAY_URL,
      });
      logger.info("AlipayGateway 實例已初始化");
    }
    return gatewayInstance;
  } catch (error: unknown) {
    logger.error("初始化 AlipayGateway 失敗", { error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
}

/**
 * 取得 AlipayGateway 實例（延遲初始化）
 */
export function getAlipayGateway(): AlipayGateway {
  if (!gatewayInstance) {
    return initAlipayGateway();
  }
  return gatewayInstance;
}

/**
 * 重置實例（用於測試）
 */
export function resetAlipayGateway(): void {
  gatewayInstance = null;
}

export default {
  initAlipayGateway,
  getAlipayGateway,
  resetAlipayGateway,
};
