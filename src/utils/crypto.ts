import crypto from "crypto";
import type { SignType } from "@/types/payment";
import logger from "./logger";

const ALGORITHMS: Record<SignType, string> = {
  RSA: "RSA-SHA1",
  RSA2: "RSA-SHA256",
};

/**
 * 金流商後台給的金鑰通常是不含標頭的 base64，這裡補成 PEM。
 * 私鑰為 PKCS#8，公鑰為 X.509 (SPKI)。
 */
export function toPem(key: string, kind: "private" | "public"): string {
  const trimmed = key.trim();
  if (trimmed.startsWith("-----BEGIN")) {
    return trimmed;
  }

  const label = kind === "private" ? "PRIVATE KEY" : "PUBLIC KEY";
  const body = trimmed.replace(/\s+/g, "").match(/.{1,64}/g) ?? [];
  return `-----BEGIN ${label}-----\n${body.join("\n")}\n-----END ${label}-----`;
}

export function sign(content: string, privateKey: string, signType: SignType): string {
  const signer = crypto.createSign(ALGORITHMS[signType]);
  signer.update(content, "utf8");
  return signer.sign(toPem(privateKey, "private"), "base64");
}

/**
 * 驗證簽章；不一致或金鑰格式錯誤都回傳 false，由呼叫端決定如何處理
 */
export function verify(content: string, signature: string, publicKey: string, signType: SignType): boolean {
  if (!signature) {
    return false;
  }

  try {
    const verifier = crypto.createVerify(ALGORITHMS[signType]);
    verifier.update(content, "utf8");
    return verifier.verify(toPem(publicKey, "public"), signature, "base64");
  } catch (error: unknown) {
    logger.warn("驗簽時發生錯誤", {
      signType,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
