import { createApp } from "./src/app";
import { ALIPAY_CONFIG, REQUIRED_ENV_VARS, SERVER_CONFIG } from "./src/config/constants";
import { createNotifyProcessor } from "./src/services/business/notify-processor";
import { InMemoryOrderStore } from "./src/services/business/order-store";
import { createNotifyHandler } from "./src/services/orchestration/notify-handler";
import { initAlipayGateway } from "./src/services/payment/provider";
import logger from "./src/utils/logger";
import { printEnvironmentConfig, printError, printStartupBanner, printSuccess, printWarning } from "./src/utils/startup";

// ========================================
// 環境檢查
// ========================================

printStartupBanner();

const missingEnvVars = REQUIRED_ENV_VARS.filter((envVar) => !process.env[envVar]);
printEnvironmentConfig(process.env);

if (missingEnvVars.length > 0) {
  printError(`缺少以下必要的環境變數: ${missingEnvVars.join(", ")}`);
  process.exit(1);
}

if (!ALIPAY_CONFIG.GATEWAY_URL.includes("sandbox")) {
  printWarning("ALIPAY_GATEWAY_URL 不是沙箱環境！請確認您是否要使用正式環境。");
}

if (!ALIPAY_CONFIG.NOTIFY_URL) {
  printWarning("未設定 ALIPAY_NOTIFY_URL，支付寶不會推送非同步通知。");
}

// ========================================
// 服務初始化
// ========================================

const gateway = initAlipayGateway();
const store = new InMemoryOrderStore();
const notifyHandler = createNotifyHandler(gateway, createNotifyProcessor(store));

gateway.on("paymentSucceeded", ({ notify, attempts }) => {
  logger.info("條碼支付完成", { outTradeNo: notify.outTradeNo, attempts });
});
gateway.on("paymentFailed", ({ notify, message, cancelled }) => {
  logger.warn("條碼支付未完成", { outTradeNo: notify.outTradeNo, message, cancelled });
});

const app = createApp({ gateway, store, notifyHandler });
const port = SERVER_CONFIG.PORT;

if (SERVER_CONFIG.NODE_ENV === "production") {
  app.set("trust proxy", 1);
  logger.info("Production mode: trust proxy enabled");
}

/**
 * 未捕捉的例外
 */
process.on("uncaughtException", (error) => {
  logger.error("Uncaught exception", {
    message: error.message,
  });
  process.exit(1);
});

/**
 * 未處理的 Promise 拒絕
 */
process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", {
    reason: String(reason),
  });
});

// ========================================
// 伺服器啟動
// ========================================

const server = app.listen(port, () => {
  logger.info(`Backend server listening at http://localhost:${port}`);
  printSuccess(port);
});

server.on("error", (error: NodeJS.ErrnoException) => {
  if (error.code === "EADDRINUSE") {
    logger.error(`Port ${port} is already in use`);
  } else {
    logger.error("Server error", {
      message: error.message,
      stack: error.stack,
    });
  }
  process.exit(1);
});
