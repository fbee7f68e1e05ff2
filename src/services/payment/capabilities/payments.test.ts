import { describe, it, expect } from "vitest";
import type { Order } from "@/types/payment";
import { verify } from "@/utils/crypto";
import { GatewayOperationError, MalformedResponseError, ValidationError } from "@/utils/errors";
import { AlipayClient } from "../alipay-client";
import { METHOD } from "../constants";
import { GatewayData } from "../gateway-data";
import { FakeTransport, TEST_GATEWAY_URL, envelope, fixedClock, merchantKeys, testMerchant } from "../test-support";
import { buildAppPayment, buildAppletPayment } from "./app-payment";
import { buildFormPayment } from "./form-payment";
import { buildScanPayment } from "./scan-payment";
import { buildUrlPayment } from "./url-payment";

const order: Order = { outTradeNo: "T300", totalAmount: 12.5, subject: "月費" };

function buildClient(transport = new FakeTransport(() => "{}")): AlipayClient {
  return new AlipayClient({
    merchant: testMerchant({ returnUrl: "https://shop.test/return" }),
    gatewayUrl: TEST_GATEWAY_URL,
    transport,
    clock: fixedClock,
  });
}

function bizContent(params: URLSearchParams): unknown {
  return JSON.parse(params.get("biz_content") ?? "{}");
}

describe("buildFormPayment", () => {
  it("renders a self-submitting form posting to the gateway", () => {
    const html = buildFormPayment(buildClient(), order);

    expect(html.startsWith(
      '<form id="gatewayForm" name="gatewayForm" action="https://gateway.test/gateway.do?charset=UTF-8" method="post">'
    )).toBe(true);
    expect(html.endsWith('</form><script>document.forms["gatewayForm"].submit();</script>')).toBe(true);
    expect(html).toContain('<input type="hidden" name="method" value="alipay.trade.page.pay" />');
    expect(html).toContain('<input type="hidden" name="return_url" value="https://shop.test/return" />');
    expect(html).toContain(
      '<input type="hidden" name="biz_content" value="{&quot;out_trade_no&quot;:&quot;T300&quot;,&quot;total_amount&quot;:&quot;12.50&quot;,&quot;subject&quot;:&quot;月費&quot;,&quot;product_code&quot;:&quot;FAST_INSTANT_TRADE_PAY&quot;}" />'
    );
  });

  it("validates the order before signing", () => {
    expect(() => buildFormPayment(buildClient(), { ...order, totalAmount: 0 })).toThrow(ValidationError);
  });
});

describe("buildUrlPayment", () => {
  it("appends the signed parameters to the gateway URL", () => {
    const url = buildUrlPayment(buildClient(), order);

    expect(url.startsWith("https://gateway.test/gateway.do?charset=UTF-8&app_id=2021000000000001&method=alipay.trade.wap.pay&")).toBe(
      true
    );
    const params = new URL(url).searchParams;
    expect(bizContent(params)).toEqual({
      out_trade_no: "T300",
      total_amount: "12.50",
      subject: "月費",
      product_code: "QUICK_WAP_WAY",
    });
  });

  it("carries a signature that verifies against the merchant key", () => {
    const url = buildUrlPayment(buildClient(), order);
    const signed = new GatewayData().fromUrl(url.replace("gateway.do?charset=UTF-8&", "gateway.do?"));

    expect(verify(signed.toCanonicalString(false), signed.get("sign") ?? "", merchantKeys.publicKey, "RSA2")).toBe(true);
  });
});

describe("buildAppPayment", () => {
  it("returns a signed order string without calling the gateway", () => {
    const transport = new FakeTransport(() => "{}");
    const orderString = buildAppPayment(buildClient(transport), order);
    const params = new URLSearchParams(orderString);

    expect(params.get("method")).toBe(METHOD.APP);
    expect(bizContent(params)).toMatchObject({ product_code: "QUICK_MSECURITY_PAY" });
    expect(params.get("sign")).toBeTruthy();
    expect(transport.requests).toHaveLength(0);
  });

  it("gives mini-program payments the same parameters", () => {
    const client = buildClient();
    expect(buildAppletPayment(client, order)).toBe(buildAppPayment(client, order));
  });
});

describe("buildScanPayment", () => {
  it("returns the QR code content of the pre-created order", async () => {
    const transport = new FakeTransport(() =>
      envelope(METHOD.SCAN, { code: "10000", msg: "Success", out_trade_no: "T300", qr_code: "https://qr.alipay.test/bax01" })
    );

    await expect(buildScanPayment(buildClient(transport), order)).resolves.toBe("https://qr.alipay.test/bax01");
    expect(transport.methods()).toEqual([METHOD.SCAN]);
  });

  it("fails when the response has no QR code", async () => {
    const transport = new FakeTransport(() => envelope(METHOD.SCAN, { code: "10000", msg: "Success" }));
    await expect(buildScanPayment(buildClient(transport), order)).rejects.toThrow(MalformedResponseError);
  });

  it("surfaces the provider's refusal", async () => {
    const transport = new FakeTransport(() =>
      envelope(METHOD.SCAN, { code: "40004", msg: "Business Failed", sub_msg: "交易已存在" })
    );
    await expect(buildScanPayment(buildClient(transport), order)).rejects.toThrow(new GatewayOperationError("交易已存在"));
  });
});
