import { Router, type Request, type Response } from "express";
import { asyncHandler } from "@/middleware/errorHandler";
import type { OrderStore } from "@/services/business/order-store";
import type { NotifyHandler } from "@/services/orchestration/notify-handler";
import type { AlipayGateway } from "@/services/payment/alipay-gateway";
import type { ApiResponse, Auxiliary, BillType, Notify, Order } from "@/types";
import logger from "@/utils/logger";
import { formatTimestamp, generateRequestNo, generateTradeNo } from "@/utils/payment-helpers";
import {
  barcodeValidation,
  billValidation,
  orderValidation,
  refundQueryValidation,
  refundValidation,
  tradeActionValidation,
  tradeQueryValidation,
  validate,
} from "@/utils/validators";

export interface PaymentRouteDependencies {
  gateway: AlipayGateway;
  store: OrderStore;
  notifyHandler: NotifyHandler;
}

function text(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function amount(value: unknown): number | undefined {
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function billType(value: unknown): BillType | undefined {
  return value === "trade" || value === "signcustomer" ? value : undefined;
}

function orderFrom(source: Record<string, unknown>): Order {
  return {
    outTradeNo: text(source.outTradeNo) ?? generateTradeNo(),
    totalAmount: amount(source.totalAmount) ?? 0,
    subject: text(source.subject) ?? "",
    body: text(source.body),
    timeoutExpress: text(source.timeoutExpress),
    authCode: text(source.authCode),
    storeId: text(source.storeId),
    terminalId: text(source.terminalId),
  };
}

function auxiliaryFrom(source: Record<string, unknown>): Auxiliary {
  return {
    outTradeNo: text(source.outTradeNo),
    tradeNo: text(source.tradeNo),
    refundAmount: amount(source.refundAmount),
    refundReason: text(source.refundReason),
    outRequestNo: text(source.outRequestNo),
    operatorId: text(source.operatorId),
    billType: billType(source.billType),
    billDate: text(source.billDate),
  };
}

/**
 * 回應中不帶簽章與原始欄位
 */
function publicNotify(notify: Notify): Omit<Notify, "raw" | "sign" | "signType"> {
  const { raw: _raw, sign: _sign, signType: _signType, ...rest } = notify;
  return rest;
}

function sendData<T>(res: Response, data: T): void {
  const payload: ApiResponse<T> = { success: true, data };
  res.json(payload);
}

/**
 * 建立支付路由
 *
 * 包含以下端點：
 * - POST /api/payments/{form,url,app,applet,scan,barcode} - 建立付款
 * - GET  /api/trades/query、POST /api/trades/{cancel,close,refund}、GET /api/trades/refund - 交易操作
 * - GET  /api/bills - 下載對帳單
 * - POST /notify/alipay - 支付寶非同步通知
 *
 * @example
 * app.use(createPaymentRoutes({ gateway, store, notifyHandler }));
 */
export function createPaymentRoutes({ gateway, store, notifyHandler }: PaymentRouteDependencies): Router {
  const router = Router();

  // ========================================
  // 建立付款
  // ========================================

  router.post(
    "/api/payments/form",
    orderValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const order = orderFrom(req.body);
      const html = gateway.buildFormPayment(order);
      await store.saveOrder(order);
      res.type("html").send(html);
    })
  );

  router.post(
    "/api/payments/url",
    orderValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const order = orderFrom(req.body);
      const url = gateway.buildUrlPayment(order);
      await store.saveOrder(order);
      sendData(res, { outTradeNo: order.outTradeNo, url });
    })
  );

  router.post(
    "/api/payments/app",
    orderValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const order = orderFrom(req.body);
      const orderString = gateway.buildAppPayment(order);
      await store.saveOrder(order);
      sendData(res, { outTradeNo: order.outTradeNo, orderString });
    })
  );

  router.post(
    "/api/payments/applet",
    orderValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const order = orderFrom(req.body);
      const orderString = gateway.buildAppletPayment(order);
      await store.saveOrder(order);
      sendData(res, { outTradeNo: order.outTradeNo, orderString });
    })
  );

  router.post(
    "/api/payments/scan",
    orderValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const order = orderFrom(req.body);
      const qrCode = await gateway.buildScanPayment(order);
      await store.saveOrder(order);
      sendData(res, { outTradeNo: order.outTradeNo, qrCode });
    })
  );

  router.post(
    "/api/payments/barcode",
    barcodeValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const order = orderFrom(req.body);
      await store.saveOrder(order);

      const outcome = await gateway.payByBarcode(order);
      if (outcome.status === "succeeded") {
        await store.markPaid(order.outTradeNo, outcome.notify.tradeNo, outcome.notify.gmtPayment ?? formatTimestamp(new Date()));
        sendData(res, {
          outTradeNo: order.outTradeNo,
          status: outcome.status,
          tradeNo: outcome.notify.tradeNo,
          attempts: outcome.attempts,
        });
        return;
      }

      if (outcome.cancelled) {
        await store.markClosed(order.outTradeNo);
      }
      const payload: ApiResponse<{ outTradeNo: string; status: string; message: string; attempts: number; cancelled: boolean }> = {
        success: false,
        data: {
          outTradeNo: order.outTradeNo,
          status: outcome.status,
          message: outcome.message,
          attempts: outcome.attempts,
          cancelled: outcome.cancelled,
        },
      };
      res.json(payload);
    })
  );

  // ========================================
  // 交易操作
  // ========================================

  router.get(
    "/api/trades/query",
    tradeQueryValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const notify = await gateway.query(auxiliaryFrom(req.query));
      sendData(res, publicNotify(notify));
    })
  );

  router.post(
    "/api/trades/cancel",
    tradeActionValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const notify = await gateway.cancel(auxiliaryFrom(req.body));
      sendData(res, publicNotify(notify));
    })
  );

  router.post(
    "/api/trades/close",
    tradeActionValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const auxiliary = auxiliaryFrom(req.body);
      const notify = await gateway.close(auxiliary);
      const outTradeNo = notify.outTradeNo ?? auxiliary.outTradeNo;
      if (outTradeNo) {
        await store.markClosed(outTradeNo);
      }
      sendData(res, publicNotify(notify));
    })
  );

  router.post(
    "/api/trades/refund",
    refundValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const auxiliary = auxiliaryFrom(req.body);
      // 部分退款時每一筆都需要不同的 out_request_no
      const outRequestNo = auxiliary.outRequestNo ?? generateRequestNo();
      const notify = await gateway.refund({ ...auxiliary, outRequestNo });
      sendData(res, { ...publicNotify(notify), outRequestNo });
    })
  );

  router.get(
    "/api/trades/refund",
    refundQueryValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const notify = await gateway.refundQuery(auxiliaryFrom(req.query));
      sendData(res, publicNotify(notify));
    })
  );

  // ========================================
  // 對帳單
  // ========================================

  router.get(
    "/api/bills",
    billValidation,
    validate,
    asyncHandler(async (req: Request, res: Response) => {
      const file = await gateway.billDownload(auxiliaryFrom(req.query));
      res.attachment(file.fileName);
      res.send(file.content);
    })
  );

  // ========================================
  // 非同步通知
  // ========================================

  /**
   * 支付寶以 application/x-www-form-urlencoded POST 通知；
   * 回覆純文字 success 後才會停止重送
   */
  router.post(
    "/notify/alipay",
    asyncHandler(async (req: Request, res: Response) => {
      const result = await notifyHandler.handleNotify(req.body ?? {});
      if (!result.success) {
        logger.warn("通知處理未成功，回覆 fail", { message: result.message });
      }
      res.type("text/plain").send(result.success ? "success" : "fail");
    })
  );

  return router;
}
