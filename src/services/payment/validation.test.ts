import { describe, it, expect } from "vitest";
import { ValidationError } from "@/utils/errors";
import { validateAuxiliary, validateOrder } from "./validation";

const ORDER = { outTradeNo: "T1", subject: "Coffee", totalAmount: 12 };

function captureValidation(fn: () => void): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error("expected a ValidationError");
}

describe("validateOrder", () => {
  it("accepts a complete order", () => {
    expect(() => validateOrder(ORDER)).not.toThrow();
  });

  it("reports every missing field at once", () => {
    const error = captureValidation(() => validateOrder({ outTradeNo: "", subject: "", totalAmount: 0 }));
    expect(error.errors.map((e) => e.field)).toEqual(["outTradeNo", "subject", "totalAmount"]);
    expect(error.statusCode).toBe(400);
  });

  it("requires the auth code for barcode payments", () => {
    const error = captureValidation(() => validateOrder(ORDER, { requireAuthCode: true }));
    expect(error.errors).toEqual([{ field: "authCode", message: "缺少付款條碼" }]);
  });
});

describe("validateAuxiliary", () => {
  it.each(["query", "cancel", "close"] as const)("%s needs outTradeNo or tradeNo", (type) => {
    expect(() => validateAuxiliary(type, {})).toThrow(ValidationError);
    expect(() => validateAuxiliary(type, { tradeNo: "2024" })).not.toThrow();
    expect(() => validateAuxiliary(type, { outTradeNo: "T1" })).not.toThrow();
  });

  it("refund needs a positive refund amount", () => {
    const error = captureValidation(() => validateAuxiliary("refund", { outTradeNo: "T1", refundAmount: -1 }));
    expect(error.errors.map((e) => e.field)).toEqual(["refundAmount"]);
    expect(() => validateAuxiliary("refund", { outTradeNo: "T1", refundAmount: 1 })).not.toThrow();
  });

  it("refund query needs the request number", () => {
    const error = captureValidation(() => validateAuxiliary("refundQuery", { tradeNo: "2024" }));
    expect(error.errors.map((e) => e.field)).toEqual(["outRequestNo"]);
  });

  it("bill download checks type and date", () => {
    const error = captureValidation(() => validateAuxiliary("billDownload", { billDate: "2024/01/01" }));
    expect(error.errors.map((e) => e.field)).toEqual(["billType", "billDate"]);
    expect(() => validateAuxiliary("billDownload", { billType: "trade", billDate: "2024-01" })).not.toThrow();
    expect(() => validateAuxiliary("billDownload", { billType: "signcustomer", billDate: "2024-01-31" })).not.toThrow();
  });
});
