/**
 * 通用型別定義
 */

/** 欄位名稱轉換方式 */
export type StringCase = 'snake' | 'camel' | 'none';

/** 可放入 GatewayData 的值；物件會以 JSON 字串保存 */
export type ParameterValue = string | number | boolean | null | undefined | object;
