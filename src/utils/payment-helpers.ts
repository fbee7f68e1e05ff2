import { v4 as uuidv4 } from "uuid";

/**
 * 生成訂單編號
 *
 * UUID v4 去掉連字符後截取前 20 位，例如：a1b2c3d4e5f6a7b8c9d0
 * 可用於 out_trade_no（商戶訂單編號）
 */
export function generateTradeNo(): string {
  return uuidv4().replace(/-/g, "").substring(0, 20);
}

/**
 * 生成退款請求編號（out_request_no），部分退款時每次都要不同
 */
export function generateRequestNo(): string {
  return `R${uuidv4().replace(/-/g, "").substring(0, 19)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * yyyy-MM-dd HH:mm:ss（請求的 timestamp 參數）
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * yyyyMMddHHmmss（對帳單檔名）
 */
export function formatCompactTimestamp(date: Date): string {
  return formatTimestamp(date).replace(/[-: ]/g, "");
}

/**
 * 金額以元為單位，固定兩位小數
 */
export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}
