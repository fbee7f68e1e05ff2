import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { errorHandler } from "@/middleware/errorHandler";
import { PaymentErrors } from "@/utils/errors";
import { createPaymentRoutes, type PaymentRouteDependencies } from "@/routes/payment";
import logger from "@/utils/logger";

/**
 * 組裝 express 應用；伺服器啟動與環境檢查在 index.ts
 */
export function createApp(dependencies: PaymentRouteDependencies): Express {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // 請求日誌
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logger.info("HTTP 請求", {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.use(createPaymentRoutes(dependencies));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(PaymentErrors.NotFound("找不到資源", { path: req.path }));
  });

  app.use(errorHandler);

  return app;
}
