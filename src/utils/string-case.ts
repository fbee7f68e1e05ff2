import type { StringCase } from "@/types/common";

/**
 * outTradeNo -> out_trade_no
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .toLowerCase();
}

/**
 * out_trade_no -> outTradeNo
 */
export function toCamelCase(name: string): string {
  return name.replace(/_([a-z0-9])/g, (_, ch: string) => ch.toUpperCase());
}

export function convertCase(name: string, stringCase: StringCase): string {
  switch (stringCase) {
    case "snake":
      return toSnakeCase(name);
    case "camel":
      return toCamelCase(name);
    default:
      return name;
  }
}
