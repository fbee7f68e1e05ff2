import { PaymentError, ValidationError } from "@/utils/errors";
import logger from "@/utils/logger";
import type { Request, Response, NextFunction, RequestHandler } from "express";

const HIDDEN_MESSAGE = "系統處理異常，請稍後再試";

function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

/**
 * 把 async 路由的 rejection 交給 next，由 errorHandler 統一處理
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * 全局錯誤處理中間件
 * 統一處理所有路由拋出的錯誤
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  // 參數驗證錯誤（express-validator 與服務層檢查）
  if (err instanceof ValidationError) {
    logger.warn("驗證錯誤", { errors: err.errors, path: req.path });
    res.status(err.statusCode).json({
      error: "輸入資料不正確",
      details: err.errors.map((e) => e.message),
    });
    return;
  }

  // 處理自定義支付錯誤
  if (err instanceof PaymentError) {
    logger.error("支付錯誤", {
      errorMessage: err.message,
      statusCode: err.statusCode,
      context: err.context,
      path: req.path,
      method: req.method,
    });

    // 生產環境隱藏詳細錯誤訊息
    res.status(err.statusCode).json({
      error: isProduction() ? HIDDEN_MESSAGE : err.message,
      code: err.code,
      ...(!isProduction() && { context: err.context }),
    });
    return;
  }

  // 未預期的錯誤（包含傳輸錯誤）
  const message = err instanceof Error ? err.message : String(err);
  logger.error("未預期的錯誤", {
    errorMessage: message,
    stack: err instanceof Error ? err.stack : undefined,
    path: req.path,
  });

  res.status(500).json({
    error: isProduction() ? HIDDEN_MESSAGE : message,
  });
}
