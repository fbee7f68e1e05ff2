import winston from "winston";

// 敏感欄位清單（比對時忽略大小寫，只要鍵名包含即遮蔽）
const sensitiveFields: string[] = [
  "privateKey",
  "private_key",
  "publicKey",
  "public_key",
  "ALIPAY_PRIVATE_KEY",
  "biz_content",
  "auth_code",
  "authCode",
  "password",
  "token",
  "secret",
];

// 簽章只比對完整鍵名，signType 等欄位照常輸出
const sensitiveExactFields: string[] = ["sign", "signature"];

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return (
    sensitiveExactFields.includes(lower) || sensitiveFields.some((field) => lower.includes(field.toLowerCase()))
  );
}

// 遞迴過濾敏感資訊
function sanitizeLog(data: unknown): unknown {
  if (typeof data !== "object" || data === null) return data;

  if (Array.isArray(data)) {
    return data.map((item) => sanitizeLog(item));
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (isSensitiveKey(key)) {
      sanitized[key] = "***REDACTED***";
    } else if (typeof value === "object") {
      sanitized[key] = sanitizeLog(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

const isTest = process.env.NODE_ENV === "test";

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ level, message, timestamp, ...meta }) => {
        return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length > 0 ? JSON.stringify(meta, null, 2) : ""}`;
      })
    ),
  }),
];

if (!isTest) {
  transports.push(
    new winston.transports.File({ filename: "logs/error.log", level: "error" }),
    new winston.transports.File({ filename: "logs/combined.log" })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format((info) => {
      // 過濾 message 以外的欄位
      Object.keys(info).forEach((key) => {
        if (!["level", "message", "timestamp", "service"].includes(key)) {
          info[key] = sanitizeLog(info[key]);
        }
      });
      return info;
    })(),
    winston.format.json()
  ),
  defaultMeta: { service: "alipay-gateway" },
  transports,
});

export { sanitizeLog };

export default logger;
