/**
 * 應用程式設定
 *
 * 所有環境變數集中在此讀取，其他模組只引用這裡匯出的常數。
 */

import dotenv from "dotenv";

dotenv.config();

function toNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const REQUIRED_ENV_VARS = ["ALIPAY_APP_ID", "ALIPAY_PRIVATE_KEY", "ALIPAY_PUBLIC_KEY"] as const;

export const ALIPAY_CONFIG = {
  APP_ID: process.env.ALIPAY_APP_ID,
  PRIVATE_KEY: process.env.ALIPAY_PRIVATE_KEY,
  ALIPAY_PUBLIC_KEY: process.env.ALIPAY_PUBLIC_KEY,
  SIGN_TYPE: process.env.ALIPAY_SIGN_TYPE === "RSA" ? "RSA" : "RSA2",
  GATEWAY_URL: process.env.ALIPAY_GATEWAY_URL || "https://openapi.alipay.com/",
  NOTIFY_URL: process.env.ALIPAY_NOTIFY_URL,
  RETURN_URL: process.env.ALIPAY_RETURN_URL,
} as const;

export const HTTP_CONFIG = {
  TIMEOUT: toNumber(process.env.ALIPAY_HTTP_TIMEOUT, 15000),
  USER_AGENT: "alipay-gateway",
} as const;

export const SERVER_CONFIG = {
  PORT: toNumber(process.env.PORT, 3000),
  NODE_ENV: process.env.NODE_ENV || "development",
} as const;
