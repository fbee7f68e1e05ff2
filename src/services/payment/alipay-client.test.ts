import { describe, it, expect } from "vitest";
import { z } from "zod";
import { verify } from "@/utils/crypto";
import { GatewayOperationError, MalformedResponseError, SignatureMismatchError } from "@/utils/errors";
import { AlipayClient, toBizContent } from "./alipay-client";
import { METHOD } from "./constants";
import {
  FakeTransport,
  TEST_GATEWAY_URL,
  envelope,
  fixedClock,
  merchantKeys,
  signedNotify,
  testMerchant,
} from "./test-support";

function buildClient(transport: FakeTransport, signType: "RSA" | "RSA2" = "RSA2"): AlipayClient {
  return new AlipayClient({
    merchant: testMerchant({ signType }),
    gatewayUrl: TEST_GATEWAY_URL,
    transport,
    clock: fixedClock,
  });
}

const QUERY_SUCCESS = {
  code: "10000",
  msg: "Success",
  trade_no: "2024010222001400000000000001",
  out_trade_no: "T100",
  trade_status: "TRADE_SUCCESS",
  total_amount: "88.80",
};

describe("AlipayClient constructor", () => {
  it("requires app id and both keys", () => {
    expect(() => new AlipayClient({ merchant: testMerchant({ privateKey: "" }) })).toThrow(/配置不完整/);
  });

  it("appends a trailing slash to the gateway URL", () => {
    const client = new AlipayClient({ merchant: testMerchant(), gatewayUrl: "https://gateway.test" });
    expect(client.requestUrl).toBe("https://gateway.test/gateway.do?charset=UTF-8");
  });
});

describe("AlipayClient.assemble", () => {
  const client = buildClient(new FakeTransport(() => "{}"));

  it("lays out the public parameters in a fixed order and signs last", () => {
    const data = client.assemble(METHOD.QUERY, { outTradeNo: "T100" });
    expect(data.entries().map(([key]) => key)).toEqual([
      "app_id",
      "method",
      "format",
      "charset",
      "sign_type",
      "timestamp",
      "version",
      "notify_url",
      "biz_content",
      "sign",
    ]);
    expect(data.get("timestamp")).toBe("2024-01-02 03:04:05");
    expect(data.get("biz_content")).toBe('{"out_trade_no":"T100"}');
  });

  it("never puts key material on the wire", () => {
    const body = client.assemble(METHOD.QUERY, { outTradeNo: "T100" }).toUrlEncodedBody();
    expect(body).not.toContain("private");
    expect(body).not.toContain("public_key");
  });

  it("signs the canonical string without sign and sign_type", () => {
    const data = client.assemble(METHOD.QUERY, { outTradeNo: "T100" });
    const canonical = data.toCanonicalString(false);
    expect(canonical).not.toMatch(/(^|&)sign=/);
    expect(canonical).not.toContain("sign_type=");
    expect(verify(canonical, data.get("sign") ?? "", merchantKeys.publicKey, "RSA2")).toBe(true);
  });

  it("signs with SHA-1 when the merchant uses RSA", () => {
    const rsaClient = buildClient(new FakeTransport(() => "{}"), "RSA");
    const data = rsaClient.assemble(METHOD.QUERY, { outTradeNo: "T100" });
    expect(data.get("sign_type")).toBe("RSA");
    expect(verify(data.toCanonicalString(false), data.get("sign") ?? "", merchantKeys.publicKey, "RSA")).toBe(true);
  });

  it("produces the same signature for the same call", () => {
    const first = client.assemble(METHOD.QUERY, { outTradeNo: "T100" });
    const second = client.assemble(METHOD.QUERY, { outTradeNo: "T100" });
    expect(second.get("sign")).toBe(first.get("sign"));
  });
});

describe("toBizContent", () => {
  it("converts names to snake_case and drops empty fields", () => {
    expect(toBizContent({ outTradeNo: "T1", tradeNo: undefined, refundReason: "" })).toBe('{"out_trade_no":"T1"}');
  });
});

describe("AlipayClient.commit", () => {
  it("posts the signed form body to the gateway", async () => {
    const transport = new FakeTransport(() => envelope(METHOD.QUERY, QUERY_SUCCESS));
    await buildClient(transport).commit(METHOD.QUERY, { outTradeNo: "T100" });

    expect(transport.requests).toHaveLength(1);
    const [request] = transport.requests;
    expect(request?.url).toBe("https://gateway.test/gateway.do?charset=UTF-8");
    expect(request?.params.get("method")).toBe("alipay.trade.query");
    expect(request?.params.get("biz_content")).toBe('{"out_trade_no":"T100"}');
    expect(request?.params.get("sign")).toBeTruthy();
  });

  it("returns the notify for a success code and attaches the envelope sign", async () => {
    const transport = new FakeTransport(() => envelope(METHOD.QUERY, QUERY_SUCCESS, "outer-sign"));
    const notify = await buildClient(transport).commit(METHOD.QUERY, { outTradeNo: "T100" });

    expect(notify.code).toBe("10000");
    expect(notify.tradeNo).toBe("2024010222001400000000000001");
    expect(notify.tradeStatus).toBe("TRADE_SUCCESS");
    expect(notify.totalAmount).toBe("88.80");
    expect(notify.sign).toBe("outer-sign");
    expect(notify.raw.out_trade_no).toBe("T100");
  });

  it("accepts a nested result encoded as a JSON string", async () => {
    const body = JSON.stringify({
      alipay_trade_query_response: JSON.stringify(QUERY_SUCCESS),
      sign: "outer-sign",
    });
    const notify = await buildClient(new FakeTransport(() => body)).commit(METHOD.QUERY, { outTradeNo: "T100" });
    expect(notify.outTradeNo).toBe("T100");
  });

  it("throws GatewayOperationError with the provider sub-message verbatim", async () => {
    const transport = new FakeTransport(() =>
      envelope(METHOD.QUERY, {
        code: "40004",
        msg: "Business Failed",
        sub_code: "ACQ.TRADE_NOT_EXIST",
        sub_msg: "ORDER_NOT_EXIST",
      })
    );

    const error = await buildClient(transport)
      .commit(METHOD.QUERY, { outTradeNo: "T404" })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GatewayOperationError);
    expect(error).toMatchObject({
      message: "ORDER_NOT_EXIST",
      subMessage: "ORDER_NOT_EXIST",
      resultCode: "40004",
      subCode: "ACQ.TRADE_NOT_EXIST",
    });
  });

  it("falls back to msg when sub_msg is absent", async () => {
    const transport = new FakeTransport(() => envelope(METHOD.QUERY, { code: "20000", msg: "Service Currently Unavailable" }));
    await expect(buildClient(transport).commit(METHOD.QUERY, { outTradeNo: "T1" })).rejects.toThrow(
      "Service Currently Unavailable"
    );
  });

  it("reads error_response when the operation key is missing", async () => {
    const body = JSON.stringify({
      error_response: { code: "40002", msg: "Invalid Arguments", sub_msg: "無效的AppID參數" },
      sign: "outer-sign",
    });
    await expect(buildClient(new FakeTransport(() => body)).commit(METHOD.QUERY, { outTradeNo: "T1" })).rejects.toThrow(
      GatewayOperationError
    );
  });

  it("throws MalformedResponseError for a non-JSON body", async () => {
    await expect(
      buildClient(new FakeTransport(() => "<html>502</html>")).commit(METHOD.QUERY, { outTradeNo: "T1" })
    ).rejects.toThrow(MalformedResponseError);
  });

  it("throws MalformedResponseError when the result key is missing", async () => {
    const body = JSON.stringify({ alipay_trade_close_response: QUERY_SUCCESS, sign: "s" });
    await expect(buildClient(new FakeTransport(() => body)).commit(METHOD.QUERY, { outTradeNo: "T1" })).rejects.toThrow(
      MalformedResponseError
    );
  });

  it("propagates transport failures unchanged", async () => {
    const failure = new Error("socket hang up");
    const transport = new FakeTransport(() => Promise.reject(failure));
    await expect(buildClient(transport).commit(METHOD.QUERY, { outTradeNo: "T1" })).rejects.toBe(failure);
  });
});

describe("AlipayClient.commitUnchecked", () => {
  it("returns non-success notifies without throwing", async () => {
    const transport = new FakeTransport(() =>
      envelope(METHOD.BARCODE, { code: "10003", msg: "order success pay inprocess", trade_no: "2024X" })
    );
    const notify = await buildClient(transport).commitUnchecked(METHOD.BARCODE, { outTradeNo: "T1" });
    expect(notify.code).toBe("10003");
    expect(notify.tradeNo).toBe("2024X");
  });
});

describe("AlipayClient.execute", () => {
  const schema = z.object({
    code: z.string(),
    tradeNo: z.string(),
    sign: z.string().optional(),
    body: z.string(),
  });

  it("materializes the first non-sign envelope field with the caller's schema", async () => {
    const raw = JSON.stringify({ sign: "outer-sign", alipay_trade_create_response: { code: "10000", trade_no: "2024Y" } });
    const transport = new FakeTransport(() => raw);

    const result = await buildClient(transport).execute({ method: "alipay.trade.create", bizContent: { outTradeNo: "T1" } }, schema);

    expect(result).toEqual({ code: "10000", tradeNo: "2024Y", sign: "outer-sign", body: raw });
  });

  it("uses the named response key and extra request parameters", async () => {
    const raw = JSON.stringify({
      other: { code: "0", trade_no: "ignored" },
      custom_response: { code: "10000", trade_no: "2024Z" },
      sign: "s",
    });
    const transport = new FakeTransport(() => raw);

    const result = await buildClient(transport).execute(
      { method: "alipay.custom.api", params: { extra_param: "x" }, requestUrl: "custom.do", responseKey: "custom_response" },
      schema
    );

    expect(result.tradeNo).toBe("2024Z");
    expect(transport.requests[0]?.url).toBe("https://gateway.test/custom.do");
    expect(transport.requests[0]?.params.get("extra_param")).toBe("x");
  });

  it("throws MalformedResponseError for an envelope with only a sign", async () => {
    const transport = new FakeTransport(() => JSON.stringify({ sign: "s" }));
    await expect(buildClient(transport).execute({ method: "alipay.custom.api" }, schema)).rejects.toThrow(
      MalformedResponseError
    );
  });
});

describe("AlipayClient.sdkExecute", () => {
  it("returns a signed query string without calling the network", () => {
    const transport = new FakeTransport(() => "{}");
    const query = buildClient(transport).sdkExecute({ method: METHOD.APP, bizContent: { outTradeNo: "T1" } });
    const params = new URLSearchParams(query);

    expect(params.get("method")).toBe("alipay.trade.app.pay");
    expect(params.get("sign")).toBeTruthy();
    expect(transport.requests).toHaveLength(0);
  });
});

describe("AlipayClient.validateNotify", () => {
  const client = buildClient(new FakeTransport(() => "{}"));

  const base = {
    notify_time: "2024-01-02 03:04:05",
    notify_type: "trade_status_sync",
    notify_id: "ac05099524730693a8b330c5ecf72da9786",
    app_id: "2021000000000001",
    charset: "utf-8",
    version: "1.0",
    trade_no: "2024010222001400000000000001",
    out_trade_no: "T100",
    total_amount: "88.80",
  };

  it("authenticates a correctly signed payment notify", () => {
    const { notify, state } = client.validateNotify(signedNotify({ ...base, trade_status: "TRADE_SUCCESS" }));
    expect(state).toBe("succeeded");
    expect(notify.outTradeNo).toBe("T100");
    expect(notify.notifyId).toBe("ac05099524730693a8b330c5ecf72da9786");
  });

  it("reports a waiting trade as awaiting", () => {
    const { state } = client.validateNotify(signedNotify({ ...base, trade_status: "WAIT_BUYER_PAY" }));
    expect(state).toBe("awaiting");
  });

  it("classifies closed and unknown statuses", () => {
    expect(client.validateNotify(signedNotify({ ...base, trade_status: "TRADE_CLOSED" })).state).toBe("closed");
    expect(client.validateNotify(signedNotify({ ...base, trade_status: "SOMETHING_ELSE" })).state).toBe("unknown");
  });

  it("rejects a success notify whose fields were altered after signing", () => {
    const forged = { ...signedNotify({ ...base, trade_status: "WAIT_BUYER_PAY" }), trade_status: "TRADE_SUCCESS" };
    expect(() => client.validateNotify(forged)).toThrow(SignatureMismatchError);
  });

  it("rejects a notify signed by someone else", () => {
    const forged = { ...base, trade_status: "TRADE_SUCCESS", sign_type: "RSA2", sign: "Zm9yZ2Vk" };
    expect(() => client.validateNotify(forged)).toThrow(SignatureMismatchError);
  });

  it("ignores where sign and sign_type sit among the parameters", () => {
    const signed = signedNotify({ ...base, trade_status: "TRADE_SUCCESS" });
    const { sign, sign_type, ...rest } = signed;
    const reordered = { sign, sign_type, ...rest };
    expect(client.validateNotify(reordered).state).toBe("succeeded");
  });

  it("requires the authentication fields", () => {
    const { trade_no: _omitted, ...withoutTradeNo } = signedNotify({ ...base, trade_status: "TRADE_SUCCESS" });
    expect(() => client.validateNotify(withoutTradeNo)).toThrow(MalformedResponseError);
  });
});
