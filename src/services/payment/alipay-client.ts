/**
 * 支付寶簽章請求引擎
 *
 * 職責：
 * - 組裝商戶參數與 biz_content，計算簽章
 * - 提交請求並拆解回應信封（envelope）
 * - 依狀態碼判斷同步回應是否成功
 * - 驗證支付寶主動推送的非同步通知
 *
 * 每次呼叫都使用新的 GatewayData，同一個實例可同時處理不同的交易。
 *
 * 使用範例：
 *   const client = new AlipayClient({ merchant });
 *   const notify = await client.commit(METHOD.QUERY, { outTradeNo: "T100" });
 *   const { notify, state } = client.validateNotify(req.body);
 */

import type { z } from "zod";
import type { ParameterValue } from "@/types/common";
import type { Merchant, Notify, SignType, ValidatedNotify } from "@/types/payment";
import { sign, verify } from "@/utils/crypto";
import { GatewayOperationError, MalformedResponseError, SignatureMismatchError } from "@/utils/errors";
import logger from "@/utils/logger";
import { formatTimestamp } from "@/utils/payment-helpers";
import { BODY, GATEWAY_PATH, SIGN, SIGN_TYPE, SUCCESS_CODE, responseKeyOf } from "./constants";
import { GatewayData } from "./gateway-data";
import { AxiosTransport, type HttpTransport } from "./http-client";
import { classifyNotify, toNotify } from "./notify";

export const DEFAULT_GATEWAY_URL = "https://openapi.alipay.com/";

const ERROR_RESPONSE_KEY = "error_response";

/** 非同步通知必須帶的欄位 */
export const NOTIFY_VERIFY_PARAMETERS = ["app_id", "version", "charset", "trade_no", SIGN, SIGN_TYPE] as const;

export interface AlipayClientOptions {
  merchant: Merchant;
  gatewayUrl?: string;
  transport?: HttpTransport;
  clock?: () => Date;
}

/**
 * 自訂 API 請求（execute / sdkExecute）
 */
export interface GatewayRequest {
  method: string;
  bizContent?: object;
  /** 直接附加在公共參數之後的額外參數，鍵名不轉換 */
  params?: Record<string, ParameterValue>;
  /** 預設為 gateway.do?charset=UTF-8 */
  requestUrl?: string;
  /** 預設取信封中 sign 以外的第一個欄位 */
  responseKey?: string;
}

/**
 * biz_content：欄位轉 snake_case、略過空值後序列化成 JSON
 */
export function toBizContent(source: object): string {
  return JSON.stringify(new GatewayData().add(source, "snake").toRecord());
}

export class AlipayClient {
  readonly merchant: Merchant;
  readonly gatewayUrl: string;
  private transport: HttpTransport;
  private clock: () => Date;

  constructor(options: AlipayClientOptions) {
    const { merchant } = options;
    if (!merchant.appId || !merchant.privateKey || !merchant.alipayPublicKey) {
      throw new Error("AlipayClient 配置不完整：需要 appId, privateKey, alipayPublicKey");
    }

    this.merchant = merchant;
    const gatewayUrl = options.gatewayUrl ?? DEFAULT_GATEWAY_URL;
    this.gatewayUrl = gatewayUrl.endsWith("/") ? gatewayUrl : `${gatewayUrl}/`;
    this.transport = options.transport ?? new AxiosTransport();
    this.clock = options.clock ?? (() => new Date());
  }

  get signType(): SignType {
    return this.merchant.signType ?? "RSA2";
  }

  get requestUrl(): string {
    return `${this.gatewayUrl}${GATEWAY_PATH}`;
  }

  /**
   * 組裝並簽章。method 在簽章前決定，之後不再變動。
   */
  assemble(method: string, bizContent?: object, params?: Record<string, ParameterValue>): GatewayData {
    const { merchant } = this;
    const data = new GatewayData().add(
      {
        appId: merchant.appId,
        method,
        format: merchant.format ?? "JSON",
        charset: merchant.charset ?? "UTF-8",
        signType: this.signType,
        timestamp: formatTimestamp(this.clock()),
        version: merchant.version ?? "1.0",
        notifyUrl: merchant.notifyUrl,
        returnUrl: merchant.returnUrl,
        appAuthToken: merchant.appAuthToken,
        bizContent: bizContent ? toBizContent(bizContent) : undefined,
      },
      "snake"
    );

    if (params) {
      data.add(params, "none");
    }

    data.set(SIGN, this.buildSign(data));
    return data;
  }

  buildSign(data: GatewayData): string {
    return sign(data.toCanonicalString(false), this.merchant.privateKey, this.signType);
  }

  /**
   * 提交並回傳 Notify；狀態碼不是 10000 時拋出 GatewayOperationError
   */
  async commit(method: string, bizContent: object): Promise<Notify> {
    const notify = await this.commitUnchecked(method, bizContent);
    return this.ensureSuccess(method, notify);
  }

  /**
   * 提交並拆解回應，不檢查狀態碼（條碼支付需自行判斷「處理中」）
   */
  async commitUnchecked(method: string, bizContent: object): Promise<Notify> {
    const data = this.assemble(method, bizContent);

    logger.info("提交支付寶請求", { method });
    const body = await this.transport.postForm(this.requestUrl, data.toUrlEncodedBody());

    const notify = this.readReturnResult(body, responseKeyOf(method));

    logger.info("支付寶回應", {
      method,
      code: notify.code,
      subCode: notify.subCode,
      outTradeNo: notify.outTradeNo,
      tradeNo: notify.tradeNo,
    });

    return notify;
  }

  /**
   * 通用 API 呼叫：取信封中指定（或第一個）欄位，以呼叫端的 schema 轉型
   */
  async execute<T>(request: GatewayRequest, schema: z.ZodType<T>): Promise<T> {
    const data = this.assemble(request.method, request.bizContent, request.params);
    const url = `${this.gatewayUrl}${request.requestUrl ?? GATEWAY_PATH}`;

    logger.info("提交自訂請求", { method: request.method });
    const body = await this.transport.postForm(url, data.toUrlEncodedBody());

    const envelope = new GatewayData().fromJson(body);
    const signature = envelope.get(SIGN);
    envelope.remove(SIGN);

    const key = request.responseKey ?? envelope.first()?.[0];
    const nested = key ? envelope.get(key) : undefined;
    if (!key || nested === undefined) {
      throw new MalformedResponseError("回應缺少結果欄位", { method: request.method, key });
    }

    const result = new GatewayData().fromJson(nested);
    result.set(SIGN, signature);
    result.set(BODY, body);

    return result.toObject(schema, "snake");
  }

  /**
   * 只組裝並簽章，回傳給客戶端 SDK 使用的查詢字串
   */
  sdkExecute(request: GatewayRequest): string {
    return this.assemble(request.method, request.bizContent, request.params).toUrlEncodedBody();
  }

  download(url: string): Promise<Buffer> {
    return this.transport.download(url);
  }

  /**
   * 驗證非同步通知
   *
   * 簽章通過後才依 trade_status 判斷狀態；
   * 驗簽失敗一律拋出 SignatureMismatchError，不得進入付款成功流程。
   */
  validateNotify(params: Record<string, unknown>): ValidatedNotify {
    const data = new GatewayData().fromForm(params);

    const missing = NOTIFY_VERIFY_PARAMETERS.filter((key) => !data.has(key));
    if (missing.length > 0) {
      throw new MalformedResponseError("通知缺少必要欄位", { missing });
    }

    const notify = toNotify(data);

    data.remove(SIGN);
    data.remove(SIGN_TYPE);

    const valid = verify(data.toCanonicalString(false), notify.sign ?? "", this.merchant.alipayPublicKey, this.signType);
    if (!valid) {
      logger.warn("通知簽章驗證失敗", {
        outTradeNo: notify.outTradeNo,
        tradeNo: notify.tradeNo,
        notifyId: notify.notifyId,
      });
      throw new SignatureMismatchError({ outTradeNo: notify.outTradeNo, tradeNo: notify.tradeNo });
    }

    const state = classifyNotify(notify);
    logger.info("通知簽章驗證成功", {
      outTradeNo: notify.outTradeNo,
      tradeNo: notify.tradeNo,
      tradeStatus: notify.tradeStatus,
      state,
    });

    return { notify, state };
  }

  /**
   * 拆解回應信封：外層的 sign 只作參考，結果以狀態碼為準
   */
  private readReturnResult(body: string, key: string): Notify {
    const envelope = new GatewayData().fromJson(body);
    const signature = envelope.get(SIGN);

    // 公共參數錯誤（例如 app_id 無效）時，支付寶改用 error_response
    const nested = envelope.get(key) ?? envelope.get(ERROR_RESPONSE_KEY);
    if (nested === undefined) {
      throw new MalformedResponseError("回應缺少結果欄位", { key });
    }

    const notify = toNotify(new GatewayData().fromJson(nested));
    return { ...notify, sign: signature };
  }

  private ensureSuccess(method: string, notify: Notify): Notify {
    if (notify.code !== SUCCESS_CODE) {
      logger.warn("支付寶回傳失敗狀態", {
        method,
        code: notify.code,
        subCode: notify.subCode,
        subMsg: notify.subMsg,
      });
      throw new GatewayOperationError(notify.subMsg ?? notify.msg ?? "未知錯誤", notify);
    }
    return notify;
  }
}

export default AlipayClient;
