/**
 * 啟動時的主控台輸出
 */

const LINE = "=".repeat(50);

function mask(value: string | undefined): string {
  if (!value) return "(未設定)";
  if (value.length <= 8) return "****";
  return `${value.slice(0, 4)}****${value.slice(-4)}`;
}

export function printStartupBanner(): void {
  console.log(LINE);
  console.log("  Alipay Gateway 服務啟動中");
  console.log(LINE);
}

/**
 * 列出目前設定；金鑰只顯示前後四碼
 */
export function printEnvironmentConfig(env: NodeJS.ProcessEnv): void {
  console.log("環境設定：");
  console.log(`  NODE_ENV            ${env.NODE_ENV ?? "development"}`);
  console.log(`  ALIPAY_APP_ID       ${env.ALIPAY_APP_ID ?? "(未設定)"}`);
  console.log(`  ALIPAY_SIGN_TYPE    ${env.ALIPAY_SIGN_TYPE ?? "RSA2"}`);
  console.log(`  ALIPAY_GATEWAY_URL  ${env.ALIPAY_GATEWAY_URL ?? "(預設正式環境)"}`);
  console.log(`  ALIPAY_NOTIFY_URL   ${env.ALIPAY_NOTIFY_URL ?? "(未設定)"}`);
  console.log(`  ALIPAY_PRIVATE_KEY  ${mask(env.ALIPAY_PRIVATE_KEY)}`);
  console.log(`  ALIPAY_PUBLIC_KEY   ${mask(env.ALIPAY_PUBLIC_KEY)}`);
}

export function printError(message: string): void {
  console.error(`❌ ${message}`);
}

export function printWarning(message: string): void {
  console.warn(`⚠️  ${message}`);
}

export function printSuccess(port: number): void {
  console.log(LINE);
  console.log(`  ✓ 伺服器已啟動：http://localhost:${port}`);
  console.log(`  ✓ 非同步通知：POST http://localhost:${port}/notify/alipay`);
  console.log(LINE);
}
