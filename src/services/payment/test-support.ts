/**
 * 測試用的行程內替身：金鑰、假傳輸層與回應信封
 */

import { generateKeyPairSync } from "crypto";
import type { Merchant } from "@/types/payment";
import { sign } from "@/utils/crypto";
import { responseKeyOf } from "./constants";
import { GatewayData } from "./gateway-data";
import type { HttpTransport } from "./http-client";

function rsaKeyPair(): { privateKey: string; publicKey: string } {
  return generateKeyPairSync("rsa", {
    modulusLength: 2048,
    privateKeyEncoding: { type: "pkcs8", format: "pem" },
    publicKeyEncoding: { type: "spki", format: "pem" },
  });
}

/** 商戶自己的金鑰 */
export const merchantKeys = rsaKeyPair();

/** 扮演支付寶的金鑰 */
export const providerKeys = rsaKeyPair();

export const TEST_GATEWAY_URL = "https://gateway.test/";

export function testMerchant(overrides: Partial<Merchant> = {}): Merchant {
  return {
    appId: "2021000000000001",
    privateKey: merchantKeys.privateKey,
    alipayPublicKey: providerKeys.publicKey,
    notifyUrl: "https://shop.test/notify",
    ...overrides,
  };
}

export function fixedClock(): Date {
  return new Date(2024, 0, 2, 3, 4, 5);
}

export function envelope(method: string, payload: Record<string, unknown>, signature = "envelope-sign"): string {
  return JSON.stringify({ [responseKeyOf(method)]: payload, sign: signature });
}

export interface RecordedRequest {
  url: string;
  params: URLSearchParams;
}

type Responder = (request: RecordedRequest) => string | Promise<string>;

export class FakeTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  readonly downloads: string[] = [];

  constructor(
    private respond: Responder,
    private files: Record<string, Buffer> = {}
  ) {}

  async postForm(url: string, body: string): Promise<string> {
    const request = { url, params: new URLSearchParams(body) };
    this.requests.push(request);
    return this.respond(request);
  }

  async download(url: string): Promise<Buffer> {
    this.downloads.push(url);
    const file = this.files[url];
    if (!file) {
      throw new Error(`no file registered for ${url}`);
    }
    return file;
  }

  methods(): Array<string | null> {
    return this.requests.map((request) => request.params.get("method"));
  }
}

/**
 * 以支付寶私鑰簽出一份非同步通知
 */
export function signedNotify(fields: Record<string, string>, signType: "RSA" | "RSA2" = "RSA2"): Record<string, string> {
  const content = new GatewayData().fromForm(fields).toCanonicalString(false);
  return {
    ...fields,
    sign_type: signType,
    sign: sign(content, providerKeys.privateKey, signType),
  };
}

/**
 * 依 method 依序回傳預先排好的回應，用完後重複最後一個
 */
export function scriptedTransport(
  script: Record<string, Array<Record<string, string>>>,
  files: Record<string, Buffer> = {}
): FakeTransport {
  const cursor: Record<string, number> = {};
  return new FakeTransport((request) => {
    const method = request.params.get("method") ?? "";
    const replies = script[method] ?? [];
    const index = cursor[method] ?? 0;
    cursor[method] = index + 1;
    const reply = replies[Math.min(index, replies.length - 1)];
    if (!reply) {
      throw new Error(`unexpected method ${method}`);
    }
    return envelope(method, reply);
  }, files);
}
