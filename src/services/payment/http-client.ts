/**
 * 對金流商的 HTTP 傳輸層
 *
 * 傳輸錯誤原樣往上拋，協定層不重試。
 */

import axios, { type AxiosInstance } from "axios";
import { HTTP_CONFIG } from "@/config/constants";
import logger from "@/utils/logger";

export interface HttpTransport {
  postForm(url: string, body: string): Promise<string>;
  download(url: string): Promise<Buffer>;
}

export class AxiosTransport implements HttpTransport {
  private client: AxiosInstance;

  constructor(timeout: number = HTTP_CONFIG.TIMEOUT) {
    this.client = axios.create({
      timeout,
      headers: { "User-Agent": HTTP_CONFIG.USER_AGENT },
    });
  }

  async postForm(url: string, body: string): Promise<string> {
    try {
      const response = await this.client.post<string>(url, body, {
        headers: { "Content-Type": "application/x-www-form-urlencoded;charset=utf-8" },
        responseType: "text",
        // 回應交給 GatewayData 解析
        transformResponse: (data: string) => data,
      });
      return response.data;
    } catch (error: unknown) {
      logger.error("提交請求失敗", {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  async download(url: string): Promise<Buffer> {
    try {
      const response = await this.client.get<ArrayBuffer>(url, { responseType: "arraybuffer" });
      return Buffer.from(response.data);
    } catch (error: unknown) {
      logger.error("下載檔案失敗", {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
