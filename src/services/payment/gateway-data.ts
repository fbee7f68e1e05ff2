/**
 * GatewayData
 *
 * 請求與回應共用的有序參數容器。
 * 簽章與驗簽都透過 toCanonicalString(false) 取得待簽字串，
 * 兩端永遠走同一條序列化路徑。
 *
 * 使用範例：
 *   const data = new GatewayData();
 *   data.add({ appId: "2021...", method: "alipay.trade.query" }, "snake");
 *   data.set("sign", signature);
 *   const body = data.toUrlEncodedBody();
 */

import querystring from "querystring";
import type { z } from "zod";
import type { ParameterValue, StringCase } from "@/types/common";
import { MalformedResponseError } from "@/utils/errors";
import { convertCase, toCamelCase } from "@/utils/string-case";
import { SIGN, SIGN_TYPE } from "./constants";

function stringify(value: ParameterValue): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export class GatewayData {
  private values = new Map<string, string>();

  get size(): number {
    return this.values.size;
  }

  /**
   * 依物件欄位宣告順序加入參數；空值略過，鍵名重複則覆寫（保留原位置）
   */
  add(source: object, stringCase: StringCase = "snake"): this {
    for (const [name, value] of Object.entries(source)) {
      this.set(convertCase(name, stringCase), value);
    }
    return this;
  }

  set(key: string, value: ParameterValue): this {
    const text = stringify(value);
    if (text === null || text === "") {
      return this;
    }
    this.values.set(key, text);
    return this;
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  remove(key: string): this {
    this.values.delete(key);
    return this;
  }

  entries(): Array<[string, string]> {
    return [...this.values.entries()];
  }

  first(): [string, string] | undefined {
    return this.entries()[0];
  }

  clear(): this {
    this.values.clear();
    return this;
  }

  /**
   * 待簽字串：key1=value1&key2=value2，值經 URL 編碼。
   * includeSignatureFields 為 false 時略過 sign 與 sign_type。
   */
  toCanonicalString(includeSignatureFields: boolean): string {
    return this.entries()
      .filter(([key]) => includeSignatureFields || (key !== SIGN && key !== SIGN_TYPE))
      .map(([key, value]) => `${key}=${querystring.escape(value)}`)
      .join("&");
  }

  toUrlEncodedBody(): string {
    return this.toCanonicalString(true);
  }

  /**
   * 產生自動送出的 HTML 表單（網頁支付）
   */
  toForm(actionUrl: string): string {
    const inputs = this.entries()
      .map(([key, value]) => `<input type="hidden" name="${escapeHtml(key)}" value="${escapeHtml(value)}" />`)
      .join("");

    return (
      `<form id="gatewayForm" name="gatewayForm" action="${escapeHtml(actionUrl)}" method="post">` +
      inputs +
      `</form><script>document.forms["gatewayForm"].submit();</script>`
    );
  }

  fromJson(text: string): this {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new MalformedResponseError("回應不是合法的 JSON", { preview: text.slice(0, 200) });
    }
    return this.fromStructured(parsed);
  }

  fromStructured(source: unknown): this {
    if (typeof source !== "object" || source === null || Array.isArray(source)) {
      throw new MalformedResponseError("回應不是 JSON 物件", { type: Array.isArray(source) ? "array" : typeof source });
    }

    this.clear();
    for (const [key, value] of Object.entries(source)) {
      this.set(key, value);
    }
    return this;
  }

  /**
   * 以 URL 的查詢字串取代目前內容
   */
  fromUrl(url: string): this {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new MalformedResponseError("無法解析的 URL", { url });
    }

    this.clear();
    parsed.searchParams.forEach((value, key) => {
      this.set(key, value);
    });
    return this;
  }

  /**
   * 以表單或查詢參數取代目前內容；陣列取第一個值
   */
  fromForm(params: Record<string, unknown>): this {
    this.clear();
    for (const [key, value] of Object.entries(params)) {
      const first = Array.isArray(value) ? value[0] : value;
      if (typeof first === "string") {
        this.set(key, first);
      }
    }
    return this;
  }

  /**
   * 轉為型別化物件；wireCase 為 snake 時鍵名轉回 camelCase
   */
  toObject<T>(schema: z.ZodType<T>, wireCase: StringCase = "snake"): T {
    const source: Record<string, string> = {};
    for (const [key, value] of this.values) {
      source[wireCase === "snake" ? toCamelCase(key) : key] = value;
    }

    const result = schema.safeParse(source);
    if (!result.success) {
      throw new MalformedResponseError("回應欄位格式不符", {
        issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    return result.data;
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

export default GatewayData;
